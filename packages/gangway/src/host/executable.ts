import * as path from "node:path";
import * as readline from "node:readline";
import type { ChildProcess } from "node:child_process";
import type { Logger } from "pino";
import { resolveEnvironment } from "./environment.js";
import { Resource } from "./model.js";
import type { ExecutionContext, ResourceWithServiceDiscovery } from "./model.js";
import type { ResourceNotificationService } from "./notifications.js";
import { exitCodeOf, spawnShell } from "./shell.js";

export interface ExecutableOptions {
  args?: string[];
  /** Working directory, resolved against the host's content root. */
  cwd?: string;
}

/** A local process the host launches, e.g. `npm run dev`. */
export class ExecutableResource extends Resource implements ResourceWithServiceDiscovery {
  readonly resourceType = "Executable";
  readonly supportsServiceDiscovery = true as const;
  readonly args: string[];
  readonly cwd: string | undefined;

  constructor(
    name: string,
    readonly command: string,
    options: ExecutableOptions = {}
  ) {
    super(name);
    this.args = options.args ?? [];
    this.cwd = options.cwd;
  }
}

export interface ExecutableContext {
  executionContext: ExecutionContext;
  notifications: ResourceNotificationService;
  logger: Logger;
  contentRoot: string;
  variables: Record<string, string | undefined>;
}

/** A running instance of an {@link ExecutableResource}. */
export class ExecutableProcess {
  private child: ChildProcess | null = null;
  private exited: Promise<void> = Promise.resolve();

  constructor(
    readonly resource: ExecutableResource,
    private readonly context: ExecutableContext
  ) {}

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(signal?: AbortSignal): Promise<void> {
    const { resource, context } = this;
    await context.notifications.publishUpdate(resource, (s) => ({ ...s, state: "Starting" }));

    const resolved = await resolveEnvironment(resource, context.executionContext, signal);
    signal?.throwIfAborted();

    const cwd = path.resolve(context.contentRoot, resource.cwd ?? ".");
    context.logger.info({ command: [resource.command, ...resource.args].join(" "), cwd }, "Starting process");
    const child = spawnShell(resource.command, resource.args, {
      baseEnvironment: context.variables,
      environment: resolved,
      cwd,
    });
    this.child = child;

    this.relay(child);
    this.exited = new Promise((resolve, reject) => {
      child.on("exit", (code, exitSignal) => {
        const exitCode = exitCodeOf(code, exitSignal);
        context.logger.info({ exitCode }, "Process exited");
        context.notifications
          .publishUpdate(resource, (s) => ({ ...s, state: "Exited", exitCode }))
          .then(resolve, reject);
      });
    });

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", (err) => {
        this.child = null;
        reject(err);
      });
    });

    const urls = resource.declaredEndpoints().flatMap((endpoint) =>
      endpoint.allocatedEndpoint
        ? [{ name: endpoint.name, url: endpoint.allocatedEndpoint.url, isInternal: false }]
        : []
    );
    await context.notifications.publishUpdate(resource, (s) => ({
      ...s,
      state: "Running",
      urls,
      properties: { ...s.properties, pid: String(child.pid) },
    }));
  }

  /** Send SIGTERM and wait for the process to exit. */
  async stop(): Promise<void> {
    const child = this.child;
    if (!child) return;
    if (child.exitCode === null && child.signalCode === null) {
      child.kill("SIGTERM");
    }
    await this.exited;
  }

  private relay(child: ChildProcess): void {
    const { logger } = this.context;
    if (child.stdout) {
      readline.createInterface({ input: child.stdout }).on("line", (line) => logger.info(line));
    }
    if (child.stderr) {
      readline.createInterface({ input: child.stderr }).on("line", (line) => logger.error(line));
    }
  }
}
