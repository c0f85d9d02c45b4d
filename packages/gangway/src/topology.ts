import * as fs from "node:fs";
import { z } from "zod";
import { CATCH_ALL, addProxy } from "./proxy-resource.js";
import type { ProxyResourceBuilder } from "./proxy-resource.js";
import { DistributedApplicationBuilder } from "./host/builder.js";
import type { DistributedApplicationOptions, ResourceBuilder } from "./host/builder.js";
import type { ExecutableResource } from "./host/executable.js";
import { isErrnoException } from "./utils.js";

/** Topology file `gangway run` reads when none is named. */
export const DEFAULT_TOPOLOGY_FILE = "gangway.json";

const portSchema = z.number().int().min(0).max(65535);

const appSchema = z
  .object({
    command: z.string().min(1),
    args: z.array(z.string()).optional(),
    cwd: z.string().min(1).optional(),
    env: z.record(z.string()).optional(),
    port: portSchema.min(1).optional(),
  })
  .strict();

const endpointSchema = z
  .object({
    name: z.string().min(1).optional(),
    scheme: z.enum(["http", "https"]).optional(),
    port: portSchema.optional(),
  })
  .strict();

const routeSchema = z
  .object({
    id: z.string().min(1),
    target: z.string().min(1),
    /** `"*"` matches any path. */
    path: z.string().min(1).optional(),
    hosts: z.array(z.string().min(1)).optional(),
    preservePath: z.boolean().optional(),
  })
  .strict();

const proxySchema = z
  .object({
    name: z.string().min(1),
    endpoints: z.array(endpointSchema).optional(),
    routes: z.array(routeSchema).optional(),
    configurationSection: z.string().min(1).optional(),
  })
  .strict();

export const topologySchema = z
  .object({
    apps: z.record(appSchema),
    proxy: proxySchema.optional(),
  })
  .strict();

/** Contents of a `gangway.json` file. */
export type Topology = z.infer<typeof topologySchema>;

/** Thrown when a topology file cannot be read, parsed or applied. */
export class TopologyError extends Error {
  readonly source: string;
  readonly issues: string[];

  constructor(source: string, message: string, issues: string[] = []) {
    super(
      issues.length > 0 ? `${message} (${source}):\n  ${issues.join("\n  ")}` : `${message} (${source})`
    );
    this.name = "TopologyError";
    this.source = source;
    this.issues = issues;
  }
}

export function parseTopology(input: unknown, source: string): Topology {
  const result = topologySchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message
    );
    throw new TopologyError(source, "Invalid topology", issues);
  }
  return result.data;
}

export function loadTopology(filePath: string): Topology {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new TopologyError(filePath, "Topology file not found");
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    throw new TopologyError(filePath, "Topology file is not valid JSON");
  }
  return parseTopology(parsed, filePath);
}

export interface TopologyApplication {
  builder: DistributedApplicationBuilder;
  apps: Map<string, ResourceBuilder<ExecutableResource>>;
  proxy: ProxyResourceBuilder | undefined;
}

/**
 * Declare the topology's resources: one executable per app with an `http`
 * endpoint exposed to it as `PORT`, and the proxy with its routes.
 */
export function buildTopology(
  topology: Topology,
  options: DistributedApplicationOptions
): TopologyApplication {
  const builder = new DistributedApplicationBuilder(options);
  const apps = new Map<string, ResourceBuilder<ExecutableResource>>();

  for (const [name, app] of Object.entries(topology.apps)) {
    const resource = builder
      .addExecutable(name, app.command, { args: app.args, cwd: app.cwd })
      .withHttpEndpoint({ port: app.port, env: "PORT" });
    for (const [key, value] of Object.entries(app.env ?? {})) {
      resource.withEnvironment(key, value);
    }
    apps.set(name, resource);
  }

  const proxyConfig = topology.proxy;
  if (!proxyConfig) return { builder, apps, proxy: undefined };

  const proxy = addProxy(builder, proxyConfig.name);
  for (const endpoint of proxyConfig.endpoints ?? []) {
    proxy.withEndpoint(endpoint);
  }
  for (const route of proxyConfig.routes ?? []) {
    const target = apps.get(route.target);
    if (!target) {
      throw new TopologyError("proxy.routes", `Route "${route.id}" targets unknown app "${route.target}"`);
    }
    proxy.route(route.id, target, {
      path: route.path === "*" ? CATCH_ALL : route.path,
      hosts: route.hosts,
      preservePath: route.preservePath,
    });
  }
  if (proxyConfig.configurationSection) {
    proxy.loadFromConfiguration(proxyConfig.configurationSection);
  }

  return { builder, apps, proxy };
}
