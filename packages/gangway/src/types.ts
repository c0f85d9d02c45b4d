import type { Logger } from "./logger.js";

/** Request matcher of a route. Both fields absent matches every request. */
export interface RouteMatch {
  /** Path template, e.g. `/legacy` or `/{**catchall}`. */
  path?: string;
  /** Host names the request's Host header must match. */
  hosts?: string[];
}

/** A rewrite rule applied to a request before forwarding, e.g. `{ PathRemovePrefix: "/api" }`. */
export type Transform = Record<string, string>;

/** A named rule mapping matching requests to a cluster. */
export interface RouteConfig {
  routeId: string;
  clusterId: string;
  /** Lower values are matched first. */
  order?: number;
  match: RouteMatch;
  transforms: Transform[];
}

export interface DestinationConfig {
  /** Physical (`http://127.0.0.1:4123`) or logical (`http://api`) address. */
  address: string;
}

/** A named group of forwarding destinations. */
export interface ClusterConfig {
  clusterId: string;
  destinations: Record<string, DestinationConfig>;
}

/** Routes and clusters the proxy serves. */
export interface ProxyConfig {
  routes: RouteConfig[];
  clusters: ClusterConfig[];
}

/** Maps a destination address to the address a request is actually sent to. */
export type DestinationResolver = (address: string) => Promise<string>;

export interface ProxyServerOptions {
  /** Called on each request to get the current configuration. */
  getConfig: () => ProxyConfig;
  /** Resolves logical destination addresses; defaults to passing them through. */
  resolveDestination?: DestinationResolver;
  /** Receives proxy errors and request traces. */
  logger: Logger;
  /** When provided, enables HTTP/2 over TLS (HTTPS). */
  tls?: {
    cert: Buffer;
    key: Buffer;
  };
}
