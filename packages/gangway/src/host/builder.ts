import type { Logger as PinoLogger } from "pino";
import { DuplicateResourceError } from "./errors.js";
import { ResourceLoggerService } from "./logging.js";
import {
  EndpointAnnotation,
  EndpointReference,
  EnvironmentCallbackAnnotation,
  ExecutionContext,
  ManifestExclusionAnnotation,
  ResourceRelationshipAnnotation,
} from "./model.js";
import type {
  ApplicationModel,
  EndpointOptions,
  EnvironmentCallback,
  Operation,
  Resource,
  ResourceAnnotation,
  ResourceWithServiceDiscovery,
  ValueProvider,
} from "./model.js";
import { ResourceNotificationService } from "./notifications.js";
import { ExecutableResource } from "./executable.js";
import type { ExecutableOptions } from "./executable.js";
import { DistributedApplication } from "./application.js";
import { DEFAULT_PORT_RANGE, PortAllocator } from "./ports.js";
import type { PortRange } from "./ports.js";

// ---------------------------------------------------------------------------
// Lifecycle hooks
// ---------------------------------------------------------------------------

/** Extension points the host calls while starting the application. */
export interface LifecycleHook {
  beforeStart?(model: ApplicationModel, signal?: AbortSignal): Promise<void>;
  afterEndpointsAllocated?(model: ApplicationModel, signal?: AbortSignal): Promise<void>;
  dispose?(): Promise<void>;
}

export interface HostEnvironment {
  /** Directory application settings files are read from. */
  contentRoot: string;
  /** The host process environment. */
  variables: Record<string, string | undefined>;
}

/** Host services handed to lifecycle hook factories. */
export interface HostServices {
  executionContext: ExecutionContext;
  notifications: ResourceNotificationService;
  loggers: ResourceLoggerService;
  environment: HostEnvironment;
}

export type LifecycleHookFactory = (services: HostServices) => LifecycleHook;

/** Hook factories keyed by kind, instantiated once when the application starts. */
export class LifecycleHookRegistry {
  private readonly factories = new Map<string, LifecycleHookFactory>();

  /** Register `factory` under `key` unless one is already registered. */
  tryAdd(key: string, factory: LifecycleHookFactory): boolean {
    if (this.factories.has(key)) return false;
    this.factories.set(key, factory);
    return true;
  }

  get size(): number {
    return this.factories.size;
  }

  /** Instantiate every hook in registration order. */
  create(services: HostServices): LifecycleHook[] {
    return [...this.factories.values()].map((factory) => factory(services));
  }
}

// ---------------------------------------------------------------------------
// Resource registry
// ---------------------------------------------------------------------------

export interface AddResourceOptions {
  /** Allow at most one resource of this class per application. */
  singleton?: boolean;
}

/** Resources of an application, in declaration order. Names are unique, case-insensitively. */
export class ResourceCollection implements Iterable<Resource> {
  private readonly items: Resource[] = [];

  add<T extends Resource>(resource: T, options: AddResourceOptions = {}): T {
    if (options.singleton) {
      const existing = this.items.find((r) => r.constructor === resource.constructor);
      if (existing) {
        throw new DuplicateResourceError(
          resource.name,
          `A ${resource.resourceType.toLowerCase()} resource has already been added to this application ("${existing.name}").`
        );
      }
    }
    const lower = resource.name.toLowerCase();
    if (this.items.some((r) => r.name.toLowerCase() === lower)) {
      throw new DuplicateResourceError(
        resource.name,
        `Cannot add resource "${resource.name}": a resource with that name already exists.`
      );
    }
    this.items.push(resource);
    return resource;
  }

  find(name: string): Resource | undefined {
    const lower = name.toLowerCase();
    return this.items.find((r) => r.name.toLowerCase() === lower);
  }

  get size(): number {
    return this.items.length;
  }

  toArray(): Resource[] {
    return [...this.items];
  }

  [Symbol.iterator](): Iterator<Resource> {
    return this.items[Symbol.iterator]();
  }
}

// ---------------------------------------------------------------------------
// Resource builders
// ---------------------------------------------------------------------------

/** Fluent configuration of a resource that has been added to the application. */
export class ResourceBuilder<T extends Resource> {
  constructor(
    readonly application: DistributedApplicationBuilder,
    readonly resource: T
  ) {}

  withAnnotation(annotation: ResourceAnnotation): this {
    this.resource.annotations.push(annotation);
    return this;
  }

  withEndpoint(options: EndpointOptions = {}): this {
    const endpoint = new EndpointAnnotation(options);
    if (this.resource.declaredEndpoints().some((e) => e.name === endpoint.name)) {
      throw new Error(
        `Endpoint "${endpoint.name}" is already defined on resource "${this.resource.name}".`
      );
    }
    this.withAnnotation(endpoint);
    const env = options.env;
    if (env) {
      const port = new EndpointReference(this.resource, endpoint.name, "port");
      this.withEnvironmentCallback((context) => {
        context.environmentVariables[env] = port;
      });
    }
    return this;
  }

  withHttpEndpoint(options: Omit<EndpointOptions, "scheme"> = {}): this {
    return this.withEndpoint({ ...options, scheme: "http" });
  }

  withHttpsEndpoint(options: Omit<EndpointOptions, "scheme"> = {}): this {
    return this.withEndpoint({ ...options, scheme: "https" });
  }

  withEnvironment(name: string, value: string | ValueProvider): this {
    return this.withEnvironmentCallback((context) => {
      context.environmentVariables[name] = value;
    });
  }

  withEnvironmentCallback(callback: EnvironmentCallback): this {
    return this.withAnnotation(new EnvironmentCallbackAnnotation(callback));
  }

  /**
   * Make `target` a dependency of this resource and expose each of its
   * endpoints as a `services__<target>__<endpoint>__0` variable.
   */
  withReference(target: ResourceBuilder<ResourceWithServiceDiscovery>): this {
    const referenced = target.resource;
    this.withAnnotation(new ResourceRelationshipAnnotation(referenced, "Reference"));
    return this.withEnvironmentCallback((context) => {
      for (const endpoint of referenced.declaredEndpoints()) {
        context.environmentVariables[`services__${referenced.name}__${endpoint.name}__0`] =
          new EndpointReference(referenced, endpoint.name);
      }
    });
  }

  excludeFromManifest(): this {
    return this.withAnnotation(new ManifestExclusionAnnotation());
  }
}

// ---------------------------------------------------------------------------
// Application builder
// ---------------------------------------------------------------------------

export interface DistributedApplicationOptions {
  operation?: Operation;
  /** Defaults to `process.cwd()`. */
  contentRoot?: string;
  /** Defaults to `process.env`. */
  environment?: Record<string, string | undefined>;
  /** Root logger resource loggers are derived from. */
  logger: PinoLogger;
  /** Ports for endpoints without a declared port. Defaults to 4000-4999. */
  portRange?: PortRange;
}

/** Collects resources and lifecycle hooks, then builds the application. */
export class DistributedApplicationBuilder {
  readonly resources = new ResourceCollection();
  readonly hooks = new LifecycleHookRegistry();
  readonly executionContext: ExecutionContext;
  readonly environment: HostEnvironment;
  readonly logger: PinoLogger;
  readonly portRange: PortRange;

  constructor(options: DistributedApplicationOptions) {
    // Throws on an invalid range before anything is declared.
    this.portRange = new PortAllocator(options.portRange ?? DEFAULT_PORT_RANGE).range;
    this.executionContext = new ExecutionContext(options.operation ?? "run");
    this.environment = {
      contentRoot: options.contentRoot ?? process.cwd(),
      variables: options.environment ?? process.env,
    };
    this.logger = options.logger;
  }

  addResource<T extends Resource>(resource: T, options?: AddResourceOptions): ResourceBuilder<T> {
    return new ResourceBuilder(this, this.resources.add(resource, options));
  }

  addExecutable(
    name: string,
    command: string,
    options: ExecutableOptions = {}
  ): ResourceBuilder<ExecutableResource> {
    return this.addResource(new ExecutableResource(name, command, options));
  }

  build(): DistributedApplication {
    const services: HostServices = {
      executionContext: this.executionContext,
      notifications: new ResourceNotificationService(),
      loggers: new ResourceLoggerService(this.logger),
      environment: this.environment,
    };
    return new DistributedApplication(this.resources.toArray(), this.hooks, services, this.portRange);
  }
}
