import { ResourceLoggerRelay } from "./logger.js";
import { DEFAULT_LISTEN_URL, ProxyHostBuilder } from "./proxy-host.js";
import type { ProxyHost } from "./proxy-host.js";
import { ProxyResource } from "./proxy-resource.js";
import { resolveEnvironment } from "./host/environment.js";
import { EndpointAnnotation } from "./host/model.js";
import type { ApplicationModel } from "./host/model.js";
import type { HostServices, LifecycleHook } from "./host/builder.js";
import { LOOPBACK_HOST, toConfigurationKey } from "./utils.js";

export type ProxyLifecycleState = "Uninitialized" | "Starting" | "Running";

/**
 * Listen addresses for the proxy's endpoints: one ephemeral loopback
 * address when none are declared, otherwise one per endpoint with its
 * declared scheme and port.
 */
export function listenUrls(endpoints: readonly EndpointAnnotation[]): string[] {
  if (endpoints.length === 0) return [DEFAULT_LISTEN_URL];
  return endpoints.map(
    (endpoint) => `${endpoint.uriScheme ?? "http"}://${LOOPBACK_HOST}:${endpoint.port ?? 0}`
  );
}

/**
 * Starts the embedded proxy for the application's proxy resource and
 * reports its state through the notification service.
 */
export class ProxyLifecycleHook implements LifecycleHook {
  private host: ProxyHost | null = null;
  private currentState: ProxyLifecycleState = "Uninitialized";

  constructor(private readonly services: HostServices) {}

  get state(): ProxyLifecycleState {
    return this.currentState;
  }

  async beforeStart(model: ApplicationModel): Promise<void> {
    if (this.services.executionContext.isPublishMode) return;
    const resource = findProxyResource(model);
    if (!resource) return;

    this.currentState = "Starting";
    await this.services.notifications.publishUpdate(resource, (s) => ({
      ...s,
      resourceType: resource.resourceType,
      state: "Starting",
    }));

    // The proxy binds its own endpoints; take them out of host allocation.
    const annotations = resource.annotations;
    for (let i = annotations.length - 1; i >= 0; i--) {
      const annotation = annotations[i];
      if (annotation instanceof EndpointAnnotation) {
        annotations.splice(i, 1);
        resource.endpoints.unshift(annotation);
      }
    }
  }

  async afterEndpointsAllocated(model: ApplicationModel, signal?: AbortSignal): Promise<void> {
    if (this.services.executionContext.isPublishMode) return;
    const resource = findProxyResource(model);
    if (!resource) return;
    signal?.throwIfAborted();

    const { environment, executionContext, loggers, notifications } = this.services;
    const builder = new ProxyHostBuilder({
      contentRoot: environment.contentRoot,
      environment: environment.variables,
    }).useLogger(new ResourceLoggerRelay(loggers.getLogger(resource.name)));

    const resolved = await resolveEnvironment(resource, executionContext, signal);
    const settings: Record<string, string> = {};
    for (const [key, value] of Object.entries(resolved)) {
      settings[toConfigurationKey(key)] = value;
    }
    builder.configuration.addInMemoryCollection(settings);

    builder.addServiceDiscovery();
    if (resource.routeConfigs.size > 0) {
      builder.loadFromMemory([...resource.routeConfigs.values()], [...resource.clusterConfigs.values()]);
    }
    if (resource.configurationSectionName !== undefined) {
      builder.loadFromConfig(resource.configurationSectionName);
    }
    builder.addServiceDiscoveryDestinationResolver();

    const host = builder.build();
    host.urls.push(...listenUrls(resource.endpoints));
    this.host = host;
    await host.start(signal);

    const addresses = host.addresses;
    for (const [index, endpoint] of resource.endpoints.entries()) {
      const address = addresses[index];
      if (!address) continue;
      const url = new URL(address);
      endpoint.allocatedEndpoint = {
        scheme: url.protocol.slice(0, -1),
        host: url.hostname,
        port: Number(url.port),
        url: address,
      };
    }

    this.currentState = "Running";
    await notifications.publishUpdate(resource, (s) => ({
      ...s,
      state: "Running",
      urls: addresses.map((url) => ({ name: url, url, isInternal: false })),
    }));
  }

  async dispose(): Promise<void> {
    const host = this.host;
    this.host = null;
    await host?.dispose();
  }
}

function findProxyResource(model: ApplicationModel): ProxyResource | undefined {
  return model.resources.find((r): r is ProxyResource => r instanceof ProxyResource);
}
