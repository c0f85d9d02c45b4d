import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { ConfigurationBuilder, ConfigurationError } from "./configuration.js";

describe("ConfigurationBuilder", () => {
  const tmpDirs: string[] = [];

  function tmpDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gangway-config-"));
    tmpDirs.push(dir);
    return dir;
  }

  afterEach(() => {
    for (const dir of tmpDirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  it("flattens JSON objects and arrays into colon-separated keys", () => {
    const dir = tmpDir();
    const file = path.join(dir, "appsettings.json");
    fs.writeFileSync(
      file,
      JSON.stringify({
        Proxy: { Routes: { api: { ClusterId: "api", Match: { Hosts: ["a.test", "b.test"] } } } },
        Port: 8080,
        Enabled: true,
        Missing: null,
      })
    );

    const config = new ConfigurationBuilder().addJsonFile(file).build();
    expect(config.get("Proxy:Routes:api:ClusterId")).toBe("api");
    expect(config.get("Proxy:Routes:api:Match:Hosts:1")).toBe("b.test");
    expect(config.get("Port")).toBe("8080");
    expect(config.get("Enabled")).toBe("true");
    expect(config.get("Missing")).toBeUndefined();
  });

  it("skips a missing optional JSON file", () => {
    const dir = tmpDir();
    const config = new ConfigurationBuilder()
      .addJsonFile(path.join(dir, "missing.json"), { optional: true })
      .build();
    expect(config.getChildren()).toEqual([]);
  });

  it("throws ConfigurationError for a missing required JSON file", () => {
    const file = path.join(tmpDir(), "missing.json");
    const builder = new ConfigurationBuilder().addJsonFile(file);
    expect(() => builder.build()).toThrow(ConfigurationError);
    expect(() => builder.build()).toThrow(`Configuration file could not be read (${file})`);
  });

  it("throws ConfigurationError for invalid JSON", () => {
    const file = path.join(tmpDir(), "broken.json");
    fs.writeFileSync(file, "{ not json");
    expect(() => new ConfigurationBuilder().addJsonFile(file, { optional: true }).build()).toThrow(
      `Configuration file is not valid JSON (${file})`
    );
  });

  it("rewrites double underscores in environment variable names", () => {
    const config = new ConfigurationBuilder()
      .addEnvironmentVariables({ services__api__http__0: "http://127.0.0.1:4001", PATH: "/usr/bin" })
      .build();
    expect(config.get("services:api:http:0")).toBe("http://127.0.0.1:4001");
    expect(config.get("PATH")).toBe("/usr/bin");
  });

  it("reads only prefixed environment variables when a prefix is given", () => {
    const config = new ConfigurationBuilder()
      .addEnvironmentVariables({ APP_Proxy__Name: "gateway", OTHER: "x" }, "APP_")
      .build();
    expect(config.get("Proxy:Name")).toBe("gateway");
    expect(config.get("OTHER")).toBeUndefined();
  });

  it("lets later sources override earlier ones, case-insensitively", () => {
    const config = new ConfigurationBuilder()
      .addInMemoryCollection({ "Proxy:Name": "first", "Proxy:Port": "80" })
      .addEnvironmentVariables({ PROXY__NAME: "second" })
      .addInMemoryCollection({ "proxy:port": undefined })
      .build();
    expect(config.get("proxy:name")).toBe("second");
    expect(config.get("Proxy:Port")).toBe("80");
    expect(config.getSection("PROXY").getChildren().map((c) => c.key)).toEqual(["Name", "Port"]);
  });
});

describe("ConfigurationSection", () => {
  const config = new ConfigurationBuilder()
    .addInMemoryCollection({
      "Hosts:10": "k.test",
      "Hosts:2": "c.test",
      "Hosts:0": "a.test",
      "Routes:web:ClusterId": "web",
      "Routes:api:ClusterId": "api",
      Name: "gateway",
    })
    .build();

  it("orders numeric children numerically", () => {
    const hosts = config.getSection("Hosts").getChildren();
    expect(hosts.map((h) => h.value)).toEqual(["a.test", "c.test", "k.test"]);
  });

  it("puts numeric children first when keys are mixed", () => {
    const mixed = new ConfigurationBuilder()
      .addInMemoryCollection({ "List:10": "ten", "List:a": "named", "List:2": "two", "List:b": "other" })
      .build();
    expect(mixed.getSection("List").getChildren().map((c) => c.key)).toEqual(["2", "10", "a", "b"]);
  });

  it("keeps first-seen order for named children", () => {
    expect(config.getSection("Routes").getChildren().map((c) => c.key)).toEqual(["web", "api"]);
  });

  it("exposes key, path and value", () => {
    const section = config.getSection("Routes").getSection("api").getSection("ClusterId");
    expect(section.key).toBe("ClusterId");
    expect(section.path).toBe("Routes:api:ClusterId");
    expect(section.value).toBe("api");
  });

  it("reports whether a section exists", () => {
    expect(config.getSection("Routes").exists()).toBe(true);
    expect(config.getSection("Name").exists()).toBe(true);
    expect(config.getSection("Clusters").exists()).toBe(false);
  });
});
