import { describe, it, expect, afterEach } from "vitest";
import { execFileSync } from "node:child_process";
import * as fs from "node:fs";
import * as http from "node:http";
import * as https from "node:https";
import * as os from "node:os";
import * as path from "node:path";
import { ProxyLifecycleHook, listenUrls } from "./lifecycle.js";
import { CATCH_ALL, addProxy } from "./proxy-resource.js";
import { close, closedPort, get, listen, silentLogger, startEchoBackend } from "./test-helpers.js";
import type { DistributedApplication } from "./host/application.js";
import { DistributedApplicationBuilder } from "./host/builder.js";
import { resolveEnvironment } from "./host/environment.js";
import { UnsupportedValueTypeError } from "./host/errors.js";
import { EndpointAnnotation, Resource } from "./host/model.js";
import type { ResourceWithServiceDiscovery } from "./host/model.js";

/** A service running outside the host at a fixed port. */
class ExternalService extends Resource implements ResourceWithServiceDiscovery {
  readonly resourceType = "External";
  readonly supportsServiceDiscovery = true as const;
}

describe("listenUrls", () => {
  it("uses one ephemeral loopback address without endpoints", () => {
    expect(listenUrls([])).toEqual(["http://127.0.0.1:0"]);
  });

  it("keeps each endpoint's scheme and port", () => {
    expect(
      listenUrls([
        new EndpointAnnotation({ name: "plain" }),
        new EndpointAnnotation({ scheme: "http" }),
        new EndpointAnnotation({ scheme: "https", port: 8443 }),
      ])
    ).toEqual(["http://127.0.0.1:0", "http://127.0.0.1:0", "https://127.0.0.1:8443"]);
  });
});

describe("ProxyLifecycleHook", () => {
  const apps: DistributedApplication[] = [];
  const servers: http.Server[] = [];
  const tmpDirs: string[] = [];

  function appBuilder(operation: "run" | "publish" = "run"): DistributedApplicationBuilder {
    const contentRoot = fs.mkdtempSync(path.join(os.tmpdir(), "gangway-lifecycle-"));
    tmpDirs.push(contentRoot);
    return new DistributedApplicationBuilder({ logger: silentLogger(), operation, contentRoot, environment: {} });
  }

  async function backend(builder: DistributedApplicationBuilder, name: string) {
    const echo = await startEchoBackend(name);
    servers.push(echo.server);
    return builder.addResource(new ExternalService(name)).withHttpEndpoint({ port: echo.port });
  }

  function track(app: DistributedApplication): DistributedApplication {
    apps.push(app);
    return app;
  }

  afterEach(async () => {
    for (const app of apps) {
      await app.stop();
    }
    apps.length = 0;
    for (const server of servers) {
      await close(server);
    }
    servers.length = 0;
    for (const dir of tmpDirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  it("routes requests to referenced resources through service discovery", async () => {
    const builder = appBuilder();
    const legacy = await backend(builder, "legacy");
    const web = await backend(builder, "web");
    const proxy = addProxy(builder, "gateway")
      .route("legacy", legacy, { path: "/legacy" })
      .route("web", web, { path: CATCH_ALL });

    const app = track(builder.build());
    await app.start();

    const snapshot = app.notifications.getSnapshot(proxy.resource);
    expect(snapshot.resourceType).toBe("Proxy");
    expect(snapshot.state).toBe("Running");
    expect(snapshot.urls).toHaveLength(1);
    const url = snapshot.urls[0]?.url ?? "";
    expect(snapshot.urls[0]).toEqual({ name: url, url, isInternal: false });

    expect((await get(`${url}/legacy/ping`)).body).toBe("legacy /ping");
    expect((await get(`${url}/about`)).body).toBe("web /about");
  });

  it("publishes Starting and then Running", async () => {
    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway");
    const app = track(builder.build());
    const states: (string | undefined)[] = [];
    app.notifications.subscribe(({ resource, snapshot }) => {
      if (resource === proxy.resource) states.push(snapshot.state);
    });

    await app.start();
    expect(states).toEqual(["Starting", "Running"]);
  });

  it("binds every declared endpoint and reports each bound address", async () => {
    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway")
      .withHttpEndpoint({ name: "public" })
      .withEndpoint({ name: "admin", scheme: "http" });

    const app = track(builder.build());
    await app.start();

    const resource = proxy.resource;
    expect(resource.annotationsOf(EndpointAnnotation)).toEqual([]);
    expect(resource.endpoints.map((e) => e.name)).toEqual(["public", "admin"]);

    const urls = app.notifications.getSnapshot(resource).urls.map((u) => u.url);
    expect(urls).toHaveLength(2);
    expect(new Set(urls).size).toBe(2);
    expect(resource.endpoints.map((e) => e.allocatedEndpoint?.url)).toEqual(urls);
    for (const url of urls) {
      expect((await get(url)).status).toBe(404);
    }
  });

  it("serves https endpoints with the configured certificate", async () => {
    const certDir = fs.mkdtempSync(path.join(os.tmpdir(), "gangway-cert-"));
    tmpDirs.push(certDir);
    const cert = path.join(certDir, "cert.pem");
    const key = path.join(certDir, "key.pem");
    execFileSync(
      "openssl",
      ["req", "-x509", "-newkey", "rsa:2048", "-nodes", "-keyout", key, "-out", cert, "-days", "1", "-subj", "/CN=localhost"],
      { stdio: "ignore" }
    );
    const httpsPort = await closedPort();

    const builder = new DistributedApplicationBuilder({
      logger: silentLogger(),
      contentRoot: certDir,
      environment: { Certificates__Default__Path: cert, Certificates__Default__KeyPath: key },
    });
    const proxy = addProxy(builder, "gateway").withHttpEndpoint().withHttpsEndpoint({ port: httpsPort });

    const app = track(builder.build());
    await app.start();

    const urls = app.notifications.getSnapshot(proxy.resource).urls.map((u) => u.url);
    expect(urls).toHaveLength(2);
    expect(urls[0]).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(urls[1]).toBe(`https://127.0.0.1:${httpsPort}`);

    const status = await new Promise<number | undefined>((resolve, reject) => {
      https
        .get(`${urls[1]}/missing`, { rejectUnauthorized: false }, (res) => {
          res.resume();
          res.on("end", () => resolve(res.statusCode));
        })
        .on("error", reject);
    });
    expect(status).toBe(404);
  });

  it("lets other resources reference the proxy's bound endpoints", async () => {
    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway").withHttpEndpoint();
    const client = builder.addResource(new ExternalService("client")).withReference(proxy);

    const app = track(builder.build());
    await app.start();

    const url = proxy.resource.endpoints[0]?.allocatedEndpoint?.url;
    expect(url).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);
    expect(await resolveEnvironment(client.resource, app.services.executionContext)).toEqual({
      services__gateway__http__0: url,
    });
  });

  it("reads routes from the resource's environment as configuration", async () => {
    const builder = appBuilder();
    const docs = await startEchoBackend("docs");
    servers.push(docs.server);
    const proxy = addProxy(builder, "gateway")
      .withEnvironment("ReverseProxy__Routes__docs__ClusterId", "docs")
      .withEnvironment("ReverseProxy__Routes__docs__Match__Path", "/docs")
      .withEnvironment("ReverseProxy__Clusters__docs__Destinations__d1__Address", docs.url)
      .loadFromConfiguration("ReverseProxy");

    const app = track(builder.build());
    await app.start();

    const url = app.notifications.getSnapshot(proxy.resource).urls[0]?.url ?? "";
    expect((await get(`${url}/docs/intro`)).body).toBe("docs /docs/intro");
  });

  it("does nothing in publish mode", async () => {
    const builder = appBuilder("publish");
    const web = builder.addResource(new ExternalService("web")).withHttpEndpoint({ port: 3000 });
    const proxy = addProxy(builder, "gateway").withHttpEndpoint().route("web", web);
    const app = track(builder.build());
    const states: (string | undefined)[] = [];
    app.notifications.subscribe(({ resource, snapshot }) => {
      if (resource === proxy.resource) states.push(snapshot.state);
    });

    await app.start();

    expect(states).toEqual([]);
    expect(proxy.resource.endpoints).toEqual([]);
    expect(proxy.resource.annotationsOf(EndpointAnnotation)).toHaveLength(1);
  });

  it("leaves the state untouched when there is no proxy", async () => {
    const app = track(appBuilder().build());
    const hook = new ProxyLifecycleHook(app.services);

    await hook.beforeStart(app.model);
    await hook.afterEndpointsAllocated(app.model);
    expect(hook.state).toBe("Uninitialized");
  });

  it("stops before building the host when the signal is aborted", async () => {
    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway");
    const app = track(builder.build());
    const hook = new ProxyLifecycleHook(app.services);

    await hook.beforeStart(app.model);
    expect(hook.state).toBe("Starting");

    await expect(hook.afterEndpointsAllocated(app.model, AbortSignal.abort())).rejects.toThrow();
    expect(hook.state).toBe("Starting");
    expect(app.notifications.getSnapshot(proxy.resource).state).toBe("Starting");
    await hook.dispose();
  });

  it("fails on environment values that are neither strings nor providers", async () => {
    const builder = appBuilder();
    addProxy(builder, "gateway").withEnvironmentCallback((ctx) => {
      ctx.environmentVariables.RETRIES = 3;
    });

    const app = track(builder.build());
    await expect(app.start()).rejects.toThrow(UnsupportedValueTypeError);
  });

  it("propagates bind failures", async () => {
    const occupied = http.createServer();
    servers.push(occupied);
    const busyPort = await listen(occupied);

    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway").withHttpEndpoint({ port: busyPort });
    const app = track(builder.build());

    await expect(app.start()).rejects.toMatchObject({ code: "EADDRINUSE" });
    expect(app.notifications.getSnapshot(proxy.resource).state).toBe("Starting");
  });

  it("closes the proxy when the application stops", async () => {
    const builder = appBuilder();
    const proxy = addProxy(builder, "gateway");
    const app = builder.build();
    await app.start();
    const url = app.notifications.getSnapshot(proxy.resource).urls[0]?.url ?? "";

    await app.stop();
    await expect(get(url)).rejects.toMatchObject({ code: "ECONNREFUSED" });
  });
});
