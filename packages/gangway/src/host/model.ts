import { validateResourceName } from "../utils.js";
import { EndpointNotAllocatedError } from "./errors.js";

export type Operation = "run" | "publish";

/** Whether the host is running resources locally or producing a manifest. */
export class ExecutionContext {
  constructor(readonly operation: Operation) {}

  get isPublishMode(): boolean {
    return this.operation === "publish";
  }

  get isRunMode(): boolean {
    return this.operation === "run";
  }
}

/** A value resolved asynchronously when a resource is launched. */
export interface ValueProvider {
  getValue(signal?: AbortSignal): Promise<string | undefined>;
  /** Placeholder written to the publish manifest instead of the value. */
  readonly valueExpression?: string;
}

export function isValueProvider(value: unknown): value is ValueProvider {
  return (
    typeof value === "object" &&
    value !== null &&
    "getValue" in value &&
    typeof value.getValue === "function"
  );
}

/** Network address the host assigned to an endpoint. */
export interface AllocatedEndpoint {
  scheme: string;
  host: string;
  port: number;
  url: string;
}

export interface EndpointOptions {
  /** Endpoint name; defaults to the scheme. */
  name?: string;
  /** URI scheme, `http` when omitted. */
  scheme?: string;
  /** Fixed port. Omit for an ephemeral one. */
  port?: number;
  /** Port the process listens on, when it differs from `port`. */
  targetPort?: number;
  /** Environment variable that receives the allocated port. */
  env?: string;
  isExternal?: boolean;
}

/** A declared network binding of a resource. */
export class EndpointAnnotation {
  readonly type = "endpoint";
  readonly name: string;
  readonly uriScheme: string | undefined;
  readonly port: number | undefined;
  readonly targetPort: number | undefined;
  readonly env: string | undefined;
  readonly isExternal: boolean;
  allocatedEndpoint: AllocatedEndpoint | undefined;

  constructor(options: EndpointOptions = {}) {
    this.uriScheme = options.scheme;
    this.name = options.name ?? options.scheme ?? "http";
    this.port = options.port;
    this.targetPort = options.targetPort;
    this.env = options.env;
    this.isExternal = options.isExternal ?? false;
  }
}

export interface EnvironmentCallbackContext {
  readonly executionContext: ExecutionContext;
  /** Values are strings or value providers; anything else fails resolution. */
  readonly environmentVariables: Record<string, unknown>;
  readonly signal?: AbortSignal;
}

export type EnvironmentCallback = (context: EnvironmentCallbackContext) => void | Promise<void>;

/** Contributes environment variables when the resource is launched. */
export class EnvironmentCallbackAnnotation {
  readonly type = "environment";

  constructor(readonly callback: EnvironmentCallback) {}
}

export type RelationshipKind = "Reference" | "Parent";

/** A dependency edge; the host starts referenced resources first. */
export class ResourceRelationshipAnnotation {
  readonly type = "relationship";

  constructor(
    readonly resource: Resource,
    readonly kind: RelationshipKind
  ) {}
}

/** Keeps a resource out of the publish manifest. */
export class ManifestExclusionAnnotation {
  readonly type = "manifestExclusion";
}

export type ResourceAnnotation =
  | EndpointAnnotation
  | EnvironmentCallbackAnnotation
  | ResourceRelationshipAnnotation
  | ManifestExclusionAnnotation;

type AnnotationClass<T extends ResourceAnnotation> = new (...args: never[]) => T;

/** A named part of the application topology. */
export abstract class Resource {
  readonly name: string;
  readonly annotations: ResourceAnnotation[] = [];
  abstract readonly resourceType: string;

  constructor(name: string) {
    this.name = validateResourceName(name);
  }

  annotationsOf<T extends ResourceAnnotation>(kind: AnnotationClass<T>): T[] {
    return this.annotations.filter((a): a is T => a instanceof kind);
  }

  /** Endpoints other resources can reference. */
  declaredEndpoints(): EndpointAnnotation[] {
    return this.annotationsOf(EndpointAnnotation);
  }

  /** Resources this one references, in declaration order. */
  dependencies(): Resource[] {
    return this.annotationsOf(ResourceRelationshipAnnotation)
      .filter((a) => a.kind === "Reference")
      .map((a) => a.resource);
  }
}

/** A resource addressable by name through service discovery. */
export interface ResourceWithServiceDiscovery extends Resource {
  readonly supportsServiceDiscovery: true;
}

type EndpointProperty = "url" | "host" | "port" | "scheme";

/** Resolves to a property of another resource's allocated endpoint. */
export class EndpointReference implements ValueProvider {
  constructor(
    readonly resource: Resource,
    readonly endpointName: string,
    readonly property: EndpointProperty = "url"
  ) {}

  get endpoint(): EndpointAnnotation | undefined {
    return this.resource.declaredEndpoints().find((e) => e.name === this.endpointName);
  }

  get valueExpression(): string {
    return `{${this.resource.name}.bindings.${this.endpointName}.${this.property}}`;
  }

  async getValue(): Promise<string> {
    const allocated = this.endpoint?.allocatedEndpoint;
    if (!allocated) {
      throw new EndpointNotAllocatedError(this.resource.name, this.endpointName);
    }
    return String(allocated[this.property]);
  }
}

/** Read-only view of the resources handed to lifecycle hooks. */
export interface ApplicationModel {
  readonly resources: readonly Resource[];
}
