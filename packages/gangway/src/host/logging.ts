import type { Logger } from "pino";

/** Hands out one pino child logger per resource, bound with `{ resource: name }`. */
export class ResourceLoggerService {
  private readonly loggers = new Map<string, Logger>();

  constructor(private readonly root: Logger) {}

  getLogger(resourceName: string): Logger {
    let logger = this.loggers.get(resourceName);
    if (!logger) {
      logger = this.root.child({ resource: resourceName });
      this.loggers.set(resourceName, logger);
    }
    return logger;
  }
}
