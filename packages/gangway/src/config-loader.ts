import { z } from "zod";
import type { ConfigurationSection } from "./configuration.js";
import type { ClusterConfig, ProxyConfig, RouteConfig, Transform } from "./types.js";

/**
 * Thrown when proxy routes or clusters are invalid: schema errors in a
 * configuration section, ids defined by more than one source, or listen
 * addresses that cannot be served.
 */
export class ProxyConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}:\n  ${issues.join("\n  ")}` : message);
    this.name = "ProxyConfigurationError";
    this.issues = issues;
  }
}

const routeSchema = z.object({
  routeId: z.string().min(1),
  clusterId: z.string({ required_error: "ClusterId is required" }).min(1),
  order: z
    .string()
    .regex(/^-?\d+$/, "Order must be an integer")
    .transform(Number)
    .optional(),
  match: z.object({
    path: z.string().min(1).optional(),
    hosts: z.array(z.string().min(1)).optional(),
  }),
  transforms: z.array(z.record(z.string())),
});

const clusterSchema = z.object({
  clusterId: z.string().min(1),
  destinations: z.record(
    z.object({
      address: z.string({ required_error: "Address is required" }).url(),
    })
  ),
});

function formatIssues(prefix: string, error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = [prefix, ...issue.path.map(String)].join(".");
    return `${path}: ${issue.message}`;
  });
}

function childValues(section: ConfigurationSection): string[] | undefined {
  const children = section.getChildren();
  if (children.length === 0) return undefined;
  return children.map((c) => c.value).filter((v): v is string => v !== undefined);
}

function readTransforms(section: ConfigurationSection): Transform[] {
  return section.getChildren().map((transform) => {
    const entries: Transform = {};
    for (const field of transform.getChildren()) {
      if (field.value !== undefined) entries[field.key] = field.value;
    }
    return entries;
  });
}

function readRoute(section: ConfigurationSection): unknown {
  return {
    routeId: section.key,
    clusterId: section.get("ClusterId"),
    order: section.get("Order"),
    match: {
      path: section.get("Match:Path"),
      hosts: childValues(section.getSection("Match:Hosts")),
    },
    transforms: readTransforms(section.getSection("Transforms")),
  };
}

function readCluster(section: ConfigurationSection): unknown {
  const destinations: Record<string, { address: string | undefined }> = {};
  for (const destination of section.getSection("Destinations").getChildren()) {
    destinations[destination.key] = { address: destination.get("Address") };
  }
  return { clusterId: section.key, destinations };
}

/**
 * Read routes and clusters from a configuration section shaped as
 * `Routes:<routeId>:{ClusterId, Order, Match:{Path, Hosts}, Transforms}` and
 * `Clusters:<clusterId>:Destinations:<name>:Address`.
 */
export function loadProxyConfigFromSection(section: ConfigurationSection): ProxyConfig {
  const issues: string[] = [];
  const routes: RouteConfig[] = [];
  const clusters: ClusterConfig[] = [];

  for (const child of section.getSection("Routes").getChildren()) {
    const parsed = routeSchema.safeParse(readRoute(child));
    if (parsed.success) {
      routes.push(parsed.data);
    } else {
      issues.push(...formatIssues(`Routes.${child.key}`, parsed.error));
    }
  }

  for (const child of section.getSection("Clusters").getChildren()) {
    const parsed = clusterSchema.safeParse(readCluster(child));
    if (parsed.success) {
      clusters.push(parsed.data);
    } else {
      issues.push(...formatIssues(`Clusters.${child.key}`, parsed.error));
    }
  }

  if (issues.length > 0) {
    throw new ProxyConfigurationError(
      `Invalid proxy configuration in section "${section.path}"`,
      issues
    );
  }

  return { routes, clusters };
}

/**
 * Combine configuration from several sources. An id defined by more than
 * one source is an error; within one source ids are already unique.
 */
export function mergeProxyConfigs(sources: ProxyConfig[]): ProxyConfig {
  const routes = new Map<string, RouteConfig>();
  const clusters = new Map<string, ClusterConfig>();
  const issues: string[] = [];

  for (const source of sources) {
    for (const route of source.routes) {
      if (routes.has(route.routeId)) {
        issues.push(`Duplicate route "${route.routeId}"`);
      } else {
        routes.set(route.routeId, route);
      }
    }
    for (const cluster of source.clusters) {
      if (clusters.has(cluster.clusterId)) {
        issues.push(`Duplicate cluster "${cluster.clusterId}"`);
      } else {
        clusters.set(cluster.clusterId, cluster);
      }
    }
  }

  if (issues.length > 0) {
    throw new ProxyConfigurationError("Proxy configuration sources conflict", issues);
  }

  return { routes: [...routes.values()], clusters: [...clusters.values()] };
}
