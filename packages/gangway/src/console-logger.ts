import chalk from "chalk";
import { pino } from "pino";
import type { DestinationStream, LevelWithSilent, Logger } from "pino";
import { z } from "zod";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

const levelSchema = z.enum(LOG_LEVELS);

const recordSchema = z.object({
  level: z.number(),
  msg: z.string().optional(),
  resource: z.string().optional(),
  err: z.object({ message: z.string() }).optional(),
});

/** pino's numeric levels */
const WARN = 40;
const ERROR = 50;
const INFO = 30;

/** Validate a level name from the environment; `info` when unset. */
export function resolveLogLevel(value: string | undefined): LevelWithSilent {
  if (value === undefined || value === "") return "info";
  const result = levelSchema.safeParse(value.toLowerCase());
  if (!result.success) {
    throw new Error(`Invalid log level "${value}". Expected one of: ${LOG_LEVELS.join(", ")}`);
  }
  return result.data;
}

/**
 * Render one pino JSON record as `[resource] message`, coloured by
 * severity. Lines that are not pino records are returned unchanged.
 */
export function formatLogLine(line: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return line;
  }
  const result = recordSchema.safeParse(parsed);
  if (!result.success) return line;

  const record = result.data;
  const prefix = record.resource ? `${chalk.gray(`[${record.resource}]`)} ` : "";
  let text = record.msg ?? "";
  if (record.err) {
    text = text ? `${text}: ${record.err.message}` : record.err.message;
  }

  if (record.level >= ERROR) return prefix + chalk.red(text);
  if (record.level >= WARN) return prefix + chalk.yellow(text);
  if (record.level < INFO) return prefix + chalk.gray(text);
  return prefix + text;
}

/** A root pino logger whose records are written as formatted console lines. */
export function createConsoleLogger(
  level: LevelWithSilent,
  write: (line: string) => void = (line) => process.stdout.write(`${line}\n`)
): Logger {
  const destination: DestinationStream = {
    write(chunk: string) {
      for (const line of chunk.split("\n")) {
        if (line) write(formatLogLine(line));
      }
    },
  };
  return pino({ level }, destination);
}
