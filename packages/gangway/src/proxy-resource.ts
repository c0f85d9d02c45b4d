import { ProxyLifecycleHook } from "./lifecycle.js";
import { PATH_REMOVE_PREFIX } from "./routing.js";
import type { ClusterConfig, RouteConfig, RouteMatch, Transform } from "./types.js";
import { ResourceBuilder } from "./host/builder.js";
import type { DistributedApplicationBuilder } from "./host/builder.js";
import { EndpointAnnotation, Resource } from "./host/model.js";
import type { ResourceWithServiceDiscovery } from "./host/model.js";

/** Route path that matches any request path. */
export const CATCH_ALL = "/{**catchall}";

const PROXY_HOOK_KEY = "proxy";

/** The embedded reverse proxy of an application. At most one per application. */
export class ProxyResource extends Resource implements ResourceWithServiceDiscovery {
  readonly resourceType = "Proxy";
  readonly supportsServiceDiscovery = true as const;
  /** Routes by id, in registration order. */
  readonly routeConfigs = new Map<string, RouteConfig>();
  /** Clusters by id (the target resource's name), in registration order. */
  readonly clusterConfigs = new Map<string, ClusterConfig>();
  /** Endpoints the proxy binds itself, filled when the application starts. */
  readonly endpoints: EndpointAnnotation[] = [];
  /** Configuration section routes and clusters are also read from. */
  configurationSectionName: string | undefined;

  declaredEndpoints(): EndpointAnnotation[] {
    return [...this.endpoints, ...super.declaredEndpoints()];
  }
}

export interface RouteOptions {
  /** Path template to match, e.g. `/api` or {@link CATCH_ALL}. */
  path?: string;
  /** Host names to match. */
  hosts?: string[];
  /** Forward the matched path as-is instead of removing `path` from it. */
  preservePath?: boolean;
}

export class ProxyResourceBuilder extends ResourceBuilder<ProxyResource> {
  /**
   * Route requests matching `path` and `hosts` to `target`. Registering a
   * route id again replaces the earlier route. The first route to a
   * target creates its cluster and a reference to it.
   */
  route(
    routeId: string,
    target: ResourceBuilder<ResourceWithServiceDiscovery>,
    options: RouteOptions = {}
  ): this {
    const { path, hosts, preservePath = false } = options;
    const clusterId = target.resource.name;

    const match: RouteMatch = {};
    if (path !== undefined) match.path = path;
    if (hosts !== undefined) match.hosts = [...hosts];
    const transforms: Transform[] =
      path === undefined || preservePath ? [] : [{ [PATH_REMOVE_PREFIX]: path }];

    this.resource.routeConfigs.set(routeId, { routeId, clusterId, match, transforms });

    if (!this.resource.clusterConfigs.has(clusterId)) {
      this.resource.clusterConfigs.set(clusterId, {
        clusterId,
        destinations: { [clusterId]: { address: `http://${clusterId}` } },
      });
      this.withReference(target);
    }

    return this;
  }

  /** Also read routes and clusters from `sectionName` when the proxy starts. */
  loadFromConfiguration(sectionName: string): this {
    this.resource.configurationSectionName = sectionName;
    return this;
  }
}

/**
 * Add the application's proxy resource and register the hook that starts
 * it. Throws `DuplicateResourceError` when a proxy already exists.
 */
export function addProxy(builder: DistributedApplicationBuilder, name: string): ProxyResourceBuilder {
  const resource = builder.resources.add(new ProxyResource(name), { singleton: true });
  builder.hooks.tryAdd(PROXY_HOOK_KEY, (services) => new ProxyLifecycleHook(services));
  return new ProxyResourceBuilder(builder, resource).excludeFromManifest();
}
