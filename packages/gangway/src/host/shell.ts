import * as fs from "node:fs";
import * as path from "node:path";
import { spawn } from "node:child_process";
import type { ChildProcess } from "node:child_process";

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = {
  SIGHUP: 1,
  SIGINT: 2,
  SIGQUIT: 3,
  SIGABRT: 6,
  SIGKILL: 9,
  SIGTERM: 15,
};

export interface LaunchOptions {
  /** Host environment the process starts from. */
  baseEnvironment: Record<string, string | undefined>;
  /** Resolved resource environment; overrides the base. */
  environment: Record<string, string>;
  cwd: string;
}

/** Quote one argument for `/bin/sh`. */
export function quoteArgument(arg: string): string {
  return `'${arg.replace(/'/g, "'\\''")}'`;
}

/** Every `node_modules/.bin` directory from `dir` up to the root, nearest first. */
export function localBinDirectories(dir: string): string[] {
  const found: string[] = [];
  for (let current = dir; ; current = path.dirname(current)) {
    const bin = path.join(current, "node_modules", ".bin");
    if (fs.existsSync(bin)) found.push(bin);
    if (path.dirname(current) === current) return found;
  }
}

/**
 * Environment an executable is launched with: the host's variables, then
 * the resource's, with local `node_modules/.bin` directories put ahead of
 * the inherited PATH.
 */
export function launchEnvironment(options: LaunchOptions): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...options.baseEnvironment, ...options.environment };
  const inherited = env.PATH ? [env.PATH] : [];
  env.PATH = [...localBinDirectories(options.cwd), ...inherited].join(path.delimiter);
  return env;
}

/** Run `command` with `args` through `/bin/sh -c`, stdout and stderr piped. */
export function spawnShell(command: string, args: readonly string[], options: LaunchOptions): ChildProcess {
  const line = [command, ...args].map(quoteArgument).join(" ");
  return spawn("/bin/sh", ["-c", line], {
    cwd: options.cwd,
    env: launchEnvironment(options),
    stdio: ["ignore", "pipe", "pipe"],
  });
}

/** Exit code of a finished process; `128 + n` when signal `n` ended it. */
export function exitCodeOf(code: number | null, signal: NodeJS.Signals | null): number {
  if (code !== null) return code;
  return signal ? 128 + (SIGNAL_NUMBERS[signal] ?? 15) : 1;
}
