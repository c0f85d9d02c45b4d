import { LOOPBACK_HOST, loopbackUrl } from "../utils.js";
import { collectEnvironment, toEnvironmentValue } from "./environment.js";
import { ExecutableProcess, ExecutableResource } from "./executable.js";
import { EndpointAnnotation, ManifestExclusionAnnotation } from "./model.js";
import type { ApplicationModel, Resource } from "./model.js";
import type { HostServices, LifecycleHook, LifecycleHookRegistry } from "./builder.js";
import { DEFAULT_PORT_RANGE, PortAllocator } from "./ports.js";
import type { PortRange } from "./ports.js";

export interface ManifestBinding {
  scheme: string;
  port?: number;
  targetPort?: number;
  external: boolean;
}

export interface ManifestResource {
  type: string;
  command?: string;
  args?: string[];
  env: Record<string, string>;
  bindings: Record<string, ManifestBinding>;
}

/** Deployment description produced in publish mode. */
export interface Manifest {
  resources: Record<string, ManifestResource>;
}

/**
 * Order resources so that every resource comes after the resources it
 * references. Throws on a reference cycle.
 */
export function startOrder(resources: readonly Resource[]): Resource[] {
  const ordered: Resource[] = [];
  const done = new Set<Resource>();
  const visiting: Resource[] = [];

  const visit = (resource: Resource) => {
    if (done.has(resource)) return;
    const index = visiting.indexOf(resource);
    if (index !== -1) {
      const cycle = [...visiting.slice(index), resource].map((r) => r.name).join(" -> ");
      throw new Error(`Resource reference cycle detected: ${cycle}`);
    }
    visiting.push(resource);
    for (const dependency of resource.dependencies()) {
      visit(dependency);
    }
    visiting.pop();
    done.add(resource);
    ordered.push(resource);
  };

  for (const resource of resources) {
    visit(resource);
  }
  return ordered;
}

/** A built application: starts hooks and processes, or describes them as a manifest. */
export class DistributedApplication {
  private hookInstances: LifecycleHook[] = [];
  private processes: ExecutableProcess[] = [];
  private started = false;

  constructor(
    readonly resources: readonly Resource[],
    private readonly hooks: LifecycleHookRegistry,
    readonly services: HostServices,
    /** Range ports are picked from for endpoints without a declared port. */
    readonly portRange: PortRange = DEFAULT_PORT_RANGE
  ) {}

  get model(): ApplicationModel {
    return { resources: this.resources };
  }

  get notifications() {
    return this.services.notifications;
  }

  /**
   * Run the startup sequence. In publish mode only the lifecycle hooks run;
   * nothing is allocated or launched.
   */
  async start(signal?: AbortSignal): Promise<void> {
    if (this.started) {
      throw new Error("The application has already been started.");
    }
    this.started = true;
    const { executionContext } = this.services;

    this.hookInstances = this.hooks.create(this.services);
    for (const hook of this.hookInstances) {
      await hook.beforeStart?.(this.model, signal);
    }

    if (executionContext.isRunMode) {
      await this.allocateEndpoints();
    }

    for (const hook of this.hookInstances) {
      await hook.afterEndpointsAllocated?.(this.model, signal);
    }

    if (!executionContext.isRunMode) return;

    for (const resource of startOrder(this.resources)) {
      if (!(resource instanceof ExecutableResource)) continue;
      const instance = new ExecutableProcess(resource, {
        executionContext,
        notifications: this.services.notifications,
        logger: this.services.loggers.getLogger(resource.name),
        contentRoot: this.services.environment.contentRoot,
        variables: this.services.environment.variables,
      });
      this.processes.push(instance);
      await instance.start(signal);
    }
  }

  /** Stop processes in reverse start order, then dispose hooks in reverse registration order. */
  async stop(): Promise<void> {
    for (const instance of [...this.processes].reverse()) {
      await instance.stop();
    }
    this.processes = [];
    for (const hook of [...this.hookInstances].reverse()) {
      await hook.dispose?.();
    }
    this.hookInstances = [];
  }

  /** Start, wait for `signal` to abort, then stop. */
  async run(signal: AbortSignal): Promise<void> {
    try {
      await this.start(signal);
      if (!signal.aborted) {
        await new Promise<void>((resolve) => {
          signal.addEventListener("abort", () => resolve(), { once: true });
        });
      }
    } finally {
      await this.stop();
    }
  }

  /** Describe every resource not excluded from the manifest. */
  async publish(): Promise<Manifest> {
    const { executionContext } = this.services;
    const resources: Record<string, ManifestResource> = {};

    for (const resource of this.resources) {
      if (resource.annotationsOf(ManifestExclusionAnnotation).length > 0) continue;

      const env: Record<string, string> = {};
      const raw = await collectEnvironment(resource, executionContext);
      for (const [name, value] of Object.entries(raw)) {
        const classified = toEnvironmentValue(name, value);
        if (classified.kind === "literal") {
          env[name] = classified.value;
          continue;
        }
        const rendered = classified.provider.valueExpression ?? (await classified.provider.getValue());
        if (rendered !== undefined) env[name] = rendered;
      }

      const bindings: Record<string, ManifestBinding> = {};
      for (const endpoint of resource.declaredEndpoints()) {
        bindings[endpoint.name] = {
          scheme: endpoint.uriScheme ?? "http",
          ...(endpoint.port !== undefined ? { port: endpoint.port } : {}),
          ...(endpoint.targetPort !== undefined ? { targetPort: endpoint.targetPort } : {}),
          external: endpoint.isExternal,
        };
      }

      resources[resource.name] = {
        type: `${resource.resourceType.toLowerCase()}.v0`,
        ...(resource instanceof ExecutableResource
          ? { command: resource.command, args: resource.args }
          : {}),
        env,
        bindings,
      };
    }

    return { resources };
  }

  /**
   * Assign an address to every endpoint still annotated on a resource.
   * Declared ports are kept. A target port is used when no other endpoint
   * has it; otherwise a free port is picked from {@link portRange}.
   */
  private async allocateEndpoints(): Promise<void> {
    const ports = new PortAllocator(this.portRange);
    const endpoints = this.resources.flatMap((r) => r.annotationsOf(EndpointAnnotation));

    for (const endpoint of endpoints) {
      const fixed = endpoint.allocatedEndpoint?.port ?? endpoint.port;
      if (fixed !== undefined) ports.reserve(fixed);
    }

    for (const endpoint of endpoints) {
      if (endpoint.allocatedEndpoint) continue;
      let port = endpoint.port;
      if (port === undefined && endpoint.targetPort !== undefined && !ports.isReserved(endpoint.targetPort)) {
        port = endpoint.targetPort;
        ports.reserve(port);
      }
      if (port === undefined) {
        port = await ports.allocate();
      }

      const scheme = endpoint.uriScheme ?? "http";
      endpoint.allocatedEndpoint = { scheme, host: LOOPBACK_HOST, port, url: loopbackUrl(scheme, port) };
    }
  }
}
