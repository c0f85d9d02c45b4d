import * as fs from "node:fs";
import * as path from "node:path";
import type { AddressInfo, Server } from "node:net";
import { pino } from "pino";
import { ConfigurationBuilder } from "./configuration.js";
import type { Configuration } from "./configuration.js";
import { ProxyConfigurationError, loadProxyConfigFromSection, mergeProxyConfigs } from "./config-loader.js";
import { ResourceLoggerRelay } from "./logger.js";
import type { Logger } from "./logger.js";
import { createProxyServer } from "./proxy.js";
import { ServiceEndpointResolver } from "./service-discovery.js";
import type { ClusterConfig, DestinationResolver, ProxyConfig, RouteConfig } from "./types.js";
import { LOOPBACK_HOST } from "./utils.js";

/** Optional settings file read from the content root. */
export const APP_SETTINGS_FILE = "appsettings.json";

/** Listen address used when none is configured: one ephemeral loopback port. */
export const DEFAULT_LISTEN_URL = `http://${LOOPBACK_HOST}:0`;

const CERTIFICATE_PATH_KEY = "Certificates:Default:Path";
const CERTIFICATE_KEY_PATH_KEY = "Certificates:Default:KeyPath";

interface ListenAddress {
  url: string;
  scheme: "http" | "https";
  host: string;
  port: number;
}

function parseListenUrl(url: string): ListenAddress {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    throw new ProxyConfigurationError(`Invalid listen address "${url}"`);
  }
  const scheme = parsed.protocol.slice(0, -1);
  if (scheme !== "http" && scheme !== "https") {
    throw new ProxyConfigurationError(
      `Unsupported listen address scheme "${scheme}" in "${url}". Use http or https.`
    );
  }
  const host = parsed.hostname.replace(/^\[|\]$/g, "") || LOOPBACK_HOST;
  return { url, scheme, host, port: parsed.port ? Number(parsed.port) : 0 };
}

function formatAddress(scheme: string, address: AddressInfo): string {
  const host = address.family === "IPv6" ? `[${address.address}]` : address.address;
  return `${scheme}://${host}:${address.port}`;
}

function listen(server: Server, port: number, host: string): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => {
      server.off("listening", onListening);
      reject(err);
    };
    const onListening = () => {
      server.off("error", onError);
      resolve();
    };
    server.once("error", onError);
    server.once("listening", onListening);
    server.listen(port, host);
  });
}

function close(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

export interface ProxyHostBuilderOptions {
  /** Directory `appsettings.json` and relative certificate paths are resolved against. */
  contentRoot: string;
  /** Process environment added as a configuration source. */
  environment: NodeJS.ProcessEnv;
}

/**
 * Assembles an embedded proxy host: configuration sources, logging, route
 * sources and destination resolution.
 */
export class ProxyHostBuilder {
  /** Further sources added here take precedence over the settings file and environment. */
  readonly configuration = new ConfigurationBuilder();
  private readonly contentRoot: string;
  private logger: Logger | undefined;
  private serviceDiscovery = false;
  private discoveryResolver = false;
  private memory: ProxyConfig | undefined;
  private sectionName: string | undefined;

  constructor(options: ProxyHostBuilderOptions) {
    this.contentRoot = options.contentRoot;
    this.configuration
      .addJsonFile(path.join(options.contentRoot, APP_SETTINGS_FILE), { optional: true })
      .addEnvironmentVariables(options.environment);
  }

  useLogger(logger: Logger): this {
    this.logger = logger;
    return this;
  }

  addServiceDiscovery(): this {
    this.serviceDiscovery = true;
    return this;
  }

  loadFromMemory(routes: RouteConfig[], clusters: ClusterConfig[]): this {
    this.memory = { routes, clusters };
    return this;
  }

  loadFromConfig(sectionName: string): this {
    this.sectionName = sectionName;
    return this;
  }

  /** Resolve logical destination addresses through service discovery. */
  addServiceDiscoveryDestinationResolver(): this {
    this.discoveryResolver = true;
    return this;
  }

  build(): ProxyHost {
    if (this.discoveryResolver && !this.serviceDiscovery) {
      throw new Error("addServiceDiscovery() must be called before adding its destination resolver.");
    }

    const configuration = this.configuration.build();
    const sources: ProxyConfig[] = [];
    if (this.memory) {
      sources.push(this.memory);
    }
    if (this.sectionName !== undefined) {
      sources.push(loadProxyConfigFromSection(configuration.getSection(this.sectionName)));
    }

    const resolveDestination = this.discoveryResolver
      ? new ServiceEndpointResolver(configuration).toDestinationResolver()
      : undefined;

    return new ProxyHost({
      configuration,
      proxyConfig: mergeProxyConfigs(sources),
      logger: this.logger ?? new ResourceLoggerRelay(pino({ enabled: false })),
      resolveDestination,
      contentRoot: this.contentRoot,
    });
  }
}

interface ProxyHostOptions {
  configuration: Configuration;
  proxyConfig: ProxyConfig;
  logger: Logger;
  resolveDestination: DestinationResolver | undefined;
  contentRoot: string;
}

/** An embedded proxy serving one configuration on one or more listen addresses. */
export class ProxyHost {
  /** Listen addresses; set before {@link start}. Empty means {@link DEFAULT_LISTEN_URL}. */
  readonly urls: string[] = [];
  readonly configuration: Configuration;
  readonly proxyConfig: ProxyConfig;
  private readonly options: ProxyHostOptions;
  private servers: { scheme: string; server: Server }[] = [];

  constructor(options: ProxyHostOptions) {
    this.options = options;
    this.configuration = options.configuration;
    this.proxyConfig = options.proxyConfig;
  }

  /**
   * Bind every listen address. If any bind fails, servers bound so far are
   * closed and the error is rethrown.
   */
  async start(signal?: AbortSignal): Promise<void> {
    signal?.throwIfAborted();
    if (this.servers.length > 0) {
      throw new Error("The proxy host has already been started.");
    }

    const addresses = (this.urls.length > 0 ? this.urls : [DEFAULT_LISTEN_URL]).map(parseListenUrl);
    const tls = addresses.some((a) => a.scheme === "https") ? this.loadCertificate() : undefined;
    const { logger, resolveDestination, proxyConfig } = this.options;

    for (const address of addresses) {
      const server = createProxyServer({
        getConfig: () => proxyConfig,
        resolveDestination,
        logger,
        tls: address.scheme === "https" ? tls : undefined,
      });
      try {
        await listen(server, address.port, address.host);
      } catch (err) {
        await this.dispose();
        throw err;
      }
      this.servers.push({ scheme: address.scheme, server });
    }

    for (const url of this.addresses) {
      logger.log("info", `Now listening on: ${url}`);
    }
  }

  /** Addresses the running servers are bound to, in listen order. */
  get addresses(): string[] {
    return this.servers.flatMap(({ scheme, server }) => {
      const address = server.address();
      return address && typeof address === "object" ? [formatAddress(scheme, address)] : [];
    });
  }

  /** Close every server. Safe to call when nothing is running. */
  async dispose(): Promise<void> {
    const servers = this.servers;
    this.servers = [];
    await Promise.all(servers.map(({ server }) => close(server)));
  }

  private loadCertificate(): { cert: Buffer; key: Buffer } {
    const certPath = this.configuration.get(CERTIFICATE_PATH_KEY);
    const keyPath = this.configuration.get(CERTIFICATE_KEY_PATH_KEY);
    if (!certPath || !keyPath) {
      throw new ProxyConfigurationError("An https listen address requires a certificate", [
        `Set ${CERTIFICATE_PATH_KEY} and ${CERTIFICATE_KEY_PATH_KEY} to PEM files`,
      ]);
    }
    const { contentRoot } = this.options;
    return {
      cert: fs.readFileSync(path.resolve(contentRoot, certPath)),
      key: fs.readFileSync(path.resolve(contentRoot, keyPath)),
    };
  }
}
