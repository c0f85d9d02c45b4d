import * as http from "node:http";
import * as http2 from "node:http2";
import * as https from "node:https";
import type * as net from "node:net";
import { applyTransforms, compileRoutes, findRoute } from "./routing.js";
import type { CompiledRoute } from "./routing.js";
import type { ClusterConfig, ProxyConfig, ProxyServerOptions, RouteConfig } from "./types.js";
import { errorMessage, escapeHtml } from "./utils.js";

/** Response header naming the route that handled a request. */
export const ROUTE_HEADER = "X-Gangway-Route";

/**
 * HTTP/1.1 hop-by-hop headers that are forbidden in HTTP/2 responses.
 * These must be stripped when proxying an HTTP/1.1 backend response
 * back to an HTTP/2 client.
 */
const HOP_BY_HOP_HEADERS = new Set([
  "connection",
  "keep-alive",
  "proxy-connection",
  "transfer-encoding",
  "upgrade",
]);

/**
 * Get the effective host value from a request.
 * HTTP/2 uses the :authority pseudo-header; HTTP/1.1 uses Host.
 */
function getRequestHost(req: http.IncomingMessage): string {
  const authority = req.headers[":authority"];
  if (typeof authority === "string" && authority) return authority;
  return req.headers.host || "";
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Build X-Forwarded-* headers for a proxied request.
 */
function buildForwardedHeaders(
  req: http.IncomingMessage,
  tls: boolean,
  removedPrefix: string | undefined
): Record<string, string> {
  const headers: Record<string, string> = {};
  const remoteAddress = req.socket.remoteAddress || "127.0.0.1";
  const proto = tls ? "https" : "http";
  const defaultPort = tls ? "443" : "80";
  const hostHeader = getRequestHost(req);
  const forwardedFor = firstHeader(req.headers["x-forwarded-for"]);

  headers["x-forwarded-for"] = forwardedFor ? `${forwardedFor}, ${remoteAddress}` : remoteAddress;
  headers["x-forwarded-proto"] = firstHeader(req.headers["x-forwarded-proto"]) || proto;
  headers["x-forwarded-host"] = firstHeader(req.headers["x-forwarded-host"]) || hostHeader;
  headers["x-forwarded-port"] =
    firstHeader(req.headers["x-forwarded-port"]) || hostHeader.split(":")[1] || defaultPort;
  if (removedPrefix) {
    headers["x-forwarded-prefix"] = removedPrefix;
  }

  return headers;
}

/**
 * Copy inbound headers for the outgoing request. The Host header is left to
 * the destination; the original value travels in X-Forwarded-Host.
 */
function buildProxyRequestHeaders(
  req: http.IncomingMessage,
  forwardedHeaders: Record<string, string>
): http.OutgoingHttpHeaders {
  const proxyReqHeaders: http.OutgoingHttpHeaders = { ...req.headers };
  delete proxyReqHeaders.host;
  for (const [key, value] of Object.entries(forwardedHeaders)) {
    proxyReqHeaders[key] = value;
  }
  // Remove HTTP/2 pseudo-headers before forwarding to HTTP/1.1 backend
  for (const key of Object.keys(proxyReqHeaders)) {
    if (key.startsWith(":")) {
      delete proxyReqHeaders[key];
    }
  }
  return proxyReqHeaders;
}

/** Send a request over http or https depending on the destination scheme. */
function sendRequest(
  url: URL,
  options: http.RequestOptions,
  callback?: (res: http.IncomingMessage) => void
): http.ClientRequest {
  return url.protocol === "https:"
    ? https.request(url, options, callback)
    : http.request(url, options, callback);
}

function splitUrl(url: string): { path: string; query: string } {
  const queryIndex = url.indexOf("?");
  return queryIndex === -1
    ? { path: url || "/", query: "" }
    : { path: url.slice(0, queryIndex) || "/", query: url.slice(queryIndex) };
}

/** Server type returned by createProxyServer. */
export type ProxyServer = http.Server | http2.Http2SecureServer;

interface ForwardTarget {
  route: RouteConfig;
  url: URL;
  removedPrefix: string | undefined;
}

type Resolution =
  | { kind: "target"; target: ForwardTarget }
  | { kind: "noRoute" }
  | { kind: "noDestination"; route: RouteConfig };

function renderNotFound(host: string, path: string, routes: RouteConfig[]): string {
  return `
        <html>
          <head><title>gangway - Not Found</title></head>
          <body style="font-family: system-ui; padding: 40px; max-width: 600px; margin: 0 auto;">
            <h1>Not Found</h1>
            <p>No route matches <strong>${escapeHtml(host)}${escapeHtml(path)}</strong></p>
            ${
              routes.length > 0
                ? `
              <h2>Configured routes:</h2>
              <ul>
                ${routes.map((r) => `<li><code>${escapeHtml(r.match.path ?? "*")}</code>${r.match.hosts?.length ? ` on ${escapeHtml(r.match.hosts.join(", "))}` : ""} - ${escapeHtml(r.clusterId)}</li>`).join("")}
              </ul>
            `
                : "<p><em>No routes configured.</em></p>"
            }
          </body>
        </html>
      `;
}

/**
 * Create a reverse proxy server that matches requests against configured
 * routes by host and path, applies the route's transforms and forwards to
 * the first destination of the route's cluster.
 *
 * Uses Node's built-in http modules for proxying. `getConfig` is invoked
 * per request; the compiled route table is cached until it returns a
 * different object.
 *
 * When `tls` is provided, creates an HTTP/2 secure server with HTTP/1.1
 * fallback (`allowHTTP1: true`) so WebSocket upgrades keep working.
 */
export function createProxyServer(options: ProxyServerOptions): ProxyServer {
  const { getConfig, logger, tls } = options;
  const resolveDestination = options.resolveDestination ?? ((address: string) => Promise.resolve(address));
  const isTls = !!tls;

  let compiledFor: ProxyConfig | null = null;
  let compiled: CompiledRoute[] = [];
  let clusters = new Map<string, ClusterConfig>();

  const currentTable = (): { config: ProxyConfig; routes: CompiledRoute[] } => {
    const config = getConfig();
    if (config !== compiledFor) {
      compiled = compileRoutes(config.routes);
      clusters = new Map(config.clusters.map((c) => [c.clusterId, c]));
      compiledFor = config;
    }
    return { config, routes: compiled };
  };

  const resolveTarget = async (host: string, rawUrl: string): Promise<Resolution> => {
    const { routes } = currentTable();
    const { path, query } = splitUrl(rawUrl);
    const match = findRoute(routes, host, path);
    if (!match) return { kind: "noRoute" };

    const route = match.config;
    const cluster = clusters.get(route.clusterId);
    const destination = cluster ? Object.values(cluster.destinations)[0] : undefined;
    if (!destination) return { kind: "noDestination", route };

    const transformed = applyTransforms(route.transforms, path);
    const base = new URL(await resolveDestination(destination.address));
    // Set path and query on a copy of the base so the request path can never change the host.
    const url = new URL(base.href);
    url.pathname = `${base.pathname.replace(/\/+$/, "")}${transformed.path}`;
    url.search = query;

    return { kind: "target", target: { route, url, removedPrefix: transformed.removedPrefix } };
  };

  const forward = (
    req: http.IncomingMessage,
    res: http.ServerResponse,
    { route, url, removedPrefix }: ForwardTarget
  ) => {
    const forwardedHeaders = buildForwardedHeaders(req, isTls, removedPrefix);
    res.setHeader(ROUTE_HEADER, route.routeId);

    if (logger.isEnabled("debug")) {
      logger.log("debug", "Proxying request", {
        routeId: route.routeId,
        method: req.method,
        path: req.url,
        destination: url.href,
      });
    }

    const proxyReq = sendRequest(
      url,
      {
        method: req.method,
        headers: buildProxyRequestHeaders(req, forwardedHeaders),
      },
      (proxyRes) => {
        const responseHeaders: http.OutgoingHttpHeaders = { ...proxyRes.headers };
        if (isTls) {
          for (const h of HOP_BY_HOP_HEADERS) {
            delete responseHeaders[h];
          }
        }
        res.writeHead(proxyRes.statusCode || 502, responseHeaders);
        proxyRes.pipe(res);
      }
    );

    proxyReq.on("error", (err: NodeJS.ErrnoException) => {
      logger.log("error", `Proxy error for route ${route.routeId}`, { destination: url.href }, err);
      if (!res.headersSent) {
        const message =
          err.code === "ECONNREFUSED"
            ? "Bad Gateway: the destination is not responding. It may have crashed."
            : "Bad Gateway: the destination may not be running.";
        res.writeHead(502, { "Content-Type": "text/plain" });
        res.end(message);
      }
    });

    // Abort the outgoing request if the client disconnects
    res.on("close", () => {
      if (!proxyReq.destroyed) {
        proxyReq.destroy();
      }
    });

    req.on("error", () => {
      if (!proxyReq.destroyed) {
        proxyReq.destroy();
      }
    });

    req.pipe(proxyReq);
  };

  const handleRequest = (req: http.IncomingMessage, res: http.ServerResponse) => {
    const host = getRequestHost(req);
    const rawUrl = req.url || "/";

    resolveTarget(host, rawUrl)
      .then((resolution) => {
        if (resolution.kind === "noRoute") {
          res.writeHead(404, { "Content-Type": "text/html" });
          res.end(renderNotFound(host, splitUrl(rawUrl).path, currentTable().config.routes));
          return;
        }
        if (resolution.kind === "noDestination") {
          logger.log("warn", `No destination available for route ${resolution.route.routeId}`, {
            clusterId: resolution.route.clusterId,
          });
          res.setHeader(ROUTE_HEADER, resolution.route.routeId);
          res.writeHead(503, { "Content-Type": "text/plain" });
          res.end(`Service Unavailable: cluster "${resolution.route.clusterId}" has no destinations.`);
          return;
        }
        forward(req, res, resolution.target);
      })
      .catch((err: unknown) => {
        logger.log(
          "error",
          `Could not resolve destination for ${host}${rawUrl}: ${errorMessage(err)}`,
          {},
          err instanceof Error ? err : undefined
        );
        if (!res.headersSent) {
          res.writeHead(502, { "Content-Type": "text/plain" });
          res.end("Bad Gateway: the destination address could not be resolved.");
        }
      });
  };

  const upgrade = (
    req: http.IncomingMessage,
    socket: net.Socket,
    head: Buffer,
    { route, url, removedPrefix }: ForwardTarget
  ) => {
    const forwardedHeaders = buildForwardedHeaders(req, isTls, removedPrefix);
    const proxyReq = sendRequest(url, {
      method: req.method,
      headers: buildProxyRequestHeaders(req, forwardedHeaders),
    });

    proxyReq.on("upgrade", (proxyRes, proxySocket, proxyHead) => {
      // Forward the backend's actual 101 response including Sec-WebSocket-Accept,
      // subprotocol negotiation, and extension headers.
      let response = `HTTP/1.1 101 Switching Protocols\r\n`;
      for (let i = 0; i < proxyRes.rawHeaders.length; i += 2) {
        response += `${proxyRes.rawHeaders[i]}: ${proxyRes.rawHeaders[i + 1]}\r\n`;
      }
      response += "\r\n";
      socket.write(response);

      if (proxyHead.length > 0) {
        socket.write(proxyHead);
      }
      proxySocket.pipe(socket);
      socket.pipe(proxySocket);

      proxySocket.on("error", () => socket.destroy());
      socket.on("error", () => proxySocket.destroy());
    });

    proxyReq.on("error", (err) => {
      logger.log("error", `WebSocket proxy error for route ${route.routeId}`, { destination: url.href }, err);
      socket.destroy();
    });

    proxyReq.on("response", (res) => {
      // The backend responded with a normal HTTP response instead of upgrading.
      // Forward the rejection to the client.
      if (!socket.destroyed) {
        let response = `HTTP/1.1 ${res.statusCode} ${res.statusMessage}\r\n`;
        for (let i = 0; i < res.rawHeaders.length; i += 2) {
          response += `${res.rawHeaders[i]}: ${res.rawHeaders[i + 1]}\r\n`;
        }
        response += "\r\n";
        socket.write(response);
        res.pipe(socket);
      }
    });

    if (head.length > 0) {
      proxyReq.write(head);
    }
    proxyReq.end();
  };

  const handleUpgrade = (req: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
    resolveTarget(getRequestHost(req), req.url || "/")
      .then((resolution) => {
        if (resolution.kind !== "target") {
          socket.destroy();
          return;
        }
        upgrade(req, socket, head, resolution.target);
      })
      .catch((err: unknown) => {
        logger.log("error", `Could not resolve WebSocket destination: ${errorMessage(err)}`);
        socket.destroy();
      });
  };

  if (tls) {
    const h2Server = http2.createSecureServer({
      cert: tls.cert,
      key: tls.key,
      allowHTTP1: true,
    });
    // With allowHTTP1, the 'request' event receives objects compatible with
    // http.IncomingMessage / http.ServerResponse. Cast explicitly to satisfy TypeScript.
    h2Server.on("request", (req: http2.Http2ServerRequest, res: http2.Http2ServerResponse) => {
      handleRequest(req as unknown as http.IncomingMessage, res as unknown as http.ServerResponse);
    });
    // WebSocket upgrades arrive over HTTP/1.1 connections (allowHTTP1)
    h2Server.on("upgrade", (req: http.IncomingMessage, socket: net.Socket, head: Buffer) => {
      handleUpgrade(req, socket, head);
    });
    return h2Server;
  }

  const httpServer = http.createServer(handleRequest);
  httpServer.on("upgrade", handleUpgrade);

  return httpServer;
}
