import { describe, it, expect, beforeAll, afterAll } from "vitest";
import chalk from "chalk";
import { createConsoleLogger, formatLogLine, resolveLogLevel } from "./console-logger.js";

describe("formatLogLine", () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  it("prefixes the resource name", () => {
    expect(formatLogLine('{"level":30,"resource":"api","msg":"Listening"}')).toBe("[api] Listening");
  });

  it("appends the error message", () => {
    const line = JSON.stringify({
      level: 50,
      resource: "gateway",
      msg: "Proxy error for route api",
      err: { type: "Error", message: "connect ECONNREFUSED 127.0.0.1:4001" },
    });
    expect(formatLogLine(line)).toBe("[gateway] Proxy error for route api: connect ECONNREFUSED 127.0.0.1:4001");
  });

  it("omits the prefix for records without a resource", () => {
    expect(formatLogLine('{"level":40,"msg":"careful"}')).toBe("careful");
  });

  it("returns other lines unchanged", () => {
    expect(formatLogLine("plain text")).toBe("plain text");
    expect(formatLogLine('{"msg":"no level"}')).toBe('{"msg":"no level"}');
  });
});

describe("createConsoleLogger", () => {
  it("writes formatted records at or above the level", () => {
    const originalLevel = chalk.level;
    chalk.level = 0;
    try {
      const lines: string[] = [];
      const logger = createConsoleLogger("info", (line) => lines.push(line));
      const web = logger.child({ resource: "web" });
      web.debug("hidden");
      web.info("ready");
      web.error("crashed");
      expect(lines).toEqual(["[web] ready", "[web] crashed"]);
    } finally {
      chalk.level = originalLevel;
    }
  });
});

describe("resolveLogLevel", () => {
  it("defaults to info", () => {
    expect(resolveLogLevel(undefined)).toBe("info");
    expect(resolveLogLevel("")).toBe("info");
  });

  it("accepts level names case-insensitively", () => {
    expect(resolveLogLevel("DEBUG")).toBe("debug");
    expect(resolveLogLevel("silent")).toBe("silent");
  });

  it("rejects unknown levels", () => {
    expect(() => resolveLogLevel("loud")).toThrow(
      'Invalid log level "loud". Expected one of: trace, debug, info, warn, error, fatal, silent'
    );
  });
});
