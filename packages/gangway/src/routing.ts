import type { RouteConfig, Transform } from "./types.js";

/** Transform key that strips a leading path prefix before forwarding. */
export const PATH_REMOVE_PREFIX = "PathRemovePrefix";

type Segment =
  | { kind: "literal"; value: string }
  | { kind: "parameter" }
  | { kind: "catchAll" };

/** A route with its path template compiled, ready for matching. */
export interface CompiledRoute {
  config: RouteConfig;
  segments: Segment[] | null;
  hasCatchAll: boolean;
  literalCount: number;
  /** Position in the original route list; breaks ties. */
  index: number;
}

function splitPath(path: string): string[] {
  return path.split("/").filter((s) => s.length > 0);
}

function compileSegment(raw: string): Segment {
  if (raw.startsWith("{") && raw.endsWith("}")) {
    return raw.startsWith("{*") ? { kind: "catchAll" } : { kind: "parameter" };
  }
  return { kind: "literal", value: raw.toLowerCase() };
}

export function compileRoute(config: RouteConfig, index: number): CompiledRoute {
  const path = config.match.path;
  const segments = path === undefined ? null : splitPath(path).map(compileSegment);
  return {
    config,
    segments,
    hasCatchAll: segments?.some((s) => s.kind === "catchAll") ?? false,
    literalCount: segments?.filter((s) => s.kind === "literal").length ?? 0,
    index,
  };
}

/**
 * Order routes for matching: explicit `order` first, then host-constrained
 * routes, then more literal path segments, catch-all templates last, and
 * finally declaration order.
 */
export function compareRoutes(a: CompiledRoute, b: CompiledRoute): number {
  const orderDiff = (a.config.order ?? 0) - (b.config.order ?? 0);
  if (orderDiff !== 0) return orderDiff;

  const aHosts = a.config.match.hosts?.length ? 1 : 0;
  const bHosts = b.config.match.hosts?.length ? 1 : 0;
  if (aHosts !== bHosts) return bHosts - aHosts;

  if (a.literalCount !== b.literalCount) return b.literalCount - a.literalCount;

  if (a.hasCatchAll !== b.hasCatchAll) return a.hasCatchAll ? 1 : -1;

  return a.index - b.index;
}

export function compileRoutes(routes: RouteConfig[]): CompiledRoute[] {
  return routes.map(compileRoute).sort(compareRoutes);
}

/**
 * Match a request path against a compiled template. Templates without a
 * catch-all segment match as a prefix on a segment boundary.
 */
export function matchPath(route: CompiledRoute, requestPath: string): boolean {
  if (route.segments === null) return true;

  const parts = splitPath(requestPath);
  for (let i = 0; i < route.segments.length; i++) {
    const segment = route.segments[i];
    if (segment.kind === "catchAll") return true;
    const part = parts[i];
    if (part === undefined) return false;
    if (segment.kind === "literal" && decodeSegment(part).toLowerCase() !== segment.value) {
      return false;
    }
  }
  return true;
}

function decodeSegment(part: string): string {
  try {
    return decodeURIComponent(part);
  } catch {
    return part;
  }
}

/**
 * Match a request host (`name` or `name:port`) against a route's host list.
 * `*.example.com` matches any subdomain of example.com.
 */
export function matchHost(hosts: string[] | undefined, requestHost: string): boolean {
  if (!hosts || hosts.length === 0) return true;

  const [reqName = "", reqPort] = requestHost.toLowerCase().split(":");
  return hosts.some((pattern) => {
    const [name = "", port] = pattern.toLowerCase().split(":");
    if (port !== undefined && port !== reqPort) return false;
    if (name.startsWith("*.")) {
      return reqName.endsWith(name.slice(1)) && reqName.length > name.length - 1;
    }
    return name === reqName;
  });
}

/** Find the first route (in precedence order) matching the request. */
export function findRoute(
  routes: CompiledRoute[],
  requestHost: string,
  requestPath: string
): CompiledRoute | undefined {
  return routes.find(
    (r) => matchHost(r.config.match.hosts, requestHost) && matchPath(r, requestPath)
  );
}

/**
 * Remove `prefix` from `path` when the path starts with it on a segment
 * boundary. Segments compare the same way {@link matchPath} compares them:
 * percent-decoded and case-insensitive. Prefixes written as route templates
 * are left alone since they carry no literal text to remove.
 */
export function removePathPrefix(path: string, prefix: string): string {
  const normalized = prefix.endsWith("/") ? prefix.slice(0, -1) : prefix;
  if (!normalized.startsWith("/") || normalized.includes("{")) return path;

  const prefixSegments = normalized.slice(1).split("/").map((s) => s.toLowerCase());
  const pathSegments = path.split("/").slice(1);
  if (pathSegments.length < prefixSegments.length) return path;
  for (let i = 0; i < prefixSegments.length; i++) {
    if (decodeSegment(pathSegments[i]).toLowerCase() !== prefixSegments[i]) return path;
  }

  const rest = pathSegments.slice(prefixSegments.length).join("/");
  return rest ? `/${rest}` : "/";
}

export interface TransformResult {
  path: string;
  /** Prefix that was removed, for the X-Forwarded-Prefix header. */
  removedPrefix?: string;
}

/** Apply a route's transforms to a request path. Unknown transforms are ignored. */
export function applyTransforms(transforms: Transform[], path: string): TransformResult {
  let result: TransformResult = { path };
  for (const transform of transforms) {
    const prefix = transform[PATH_REMOVE_PREFIX];
    if (prefix === undefined) continue;
    const next = removePathPrefix(result.path, prefix);
    if (next !== result.path) {
      result = { path: next, removedPrefix: prefix };
    }
  }
  return result;
}
