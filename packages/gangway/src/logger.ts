import type { Logger as PinoLogger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal";

export type LogFields = Record<string, unknown>;

/** Logging contract of the embedded proxy. */
export interface Logger {
  isEnabled(level: LogLevel): boolean;
  log(level: LogLevel, message: string, fields?: LogFields, err?: Error): void;
  /** Returns a logger whose records carry `bindings`. */
  beginScope(bindings: LogFields): Logger;
}

/**
 * Relays the proxy's log calls to a host-owned pino logger. Every record,
 * scope and severity check is forwarded as-is; filtering is left to the
 * target logger.
 */
export class ResourceLoggerRelay implements Logger {
  constructor(private readonly target: PinoLogger) {}

  isEnabled(level: LogLevel): boolean {
    return this.target.isLevelEnabled(level);
  }

  log(level: LogLevel, message: string, fields: LogFields = {}, err?: Error): void {
    if (err) {
      this.target[level]({ ...fields, err }, message);
    } else {
      this.target[level](fields, message);
    }
  }

  beginScope(bindings: LogFields): Logger {
    return new ResourceLoggerRelay(this.target.child(bindings));
  }
}
