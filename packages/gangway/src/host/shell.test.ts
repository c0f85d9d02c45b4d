import { describe, it, expect, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type { ChildProcess } from "node:child_process";
import { exitCodeOf, launchEnvironment, localBinDirectories, quoteArgument, spawnShell } from "./shell.js";

describe("quoteArgument", () => {
  it("wraps arguments in single quotes", () => {
    expect(quoteArgument("npm")).toBe("'npm'");
    expect(quoteArgument("a b")).toBe("'a b'");
  });

  it("escapes embedded single quotes", () => {
    expect(quoteArgument("it's")).toBe("'it'\\''s'");
  });
});

describe("exitCodeOf", () => {
  it("keeps a normal exit code", () => {
    expect(exitCodeOf(0, null)).toBe(0);
    expect(exitCodeOf(3, null)).toBe(3);
  });

  it("adds the signal number to 128", () => {
    expect(exitCodeOf(null, "SIGINT")).toBe(130);
    expect(exitCodeOf(null, "SIGTERM")).toBe(143);
    expect(exitCodeOf(null, "SIGKILL")).toBe(137);
  });

  it("uses SIGTERM's number for other signals and 1 without either", () => {
    expect(exitCodeOf(null, "SIGUSR1")).toBe(143);
    expect(exitCodeOf(null, null)).toBe(1);
  });
});

describe("launch environment", () => {
  const tmpDirs: string[] = [];

  function projectTree(): { root: string; app: string } {
    const root = fs.mkdtempSync(path.join(os.tmpdir(), "gangway-shell-"));
    tmpDirs.push(root);
    const app = path.join(root, "apps", "web");
    fs.mkdirSync(path.join(root, "node_modules", ".bin"), { recursive: true });
    fs.mkdirSync(path.join(app, "node_modules", ".bin"), { recursive: true });
    return { root, app };
  }

  afterEach(() => {
    for (const dir of tmpDirs) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
    tmpDirs.length = 0;
  });

  it("finds node_modules/.bin directories nearest first", () => {
    const { root, app } = projectTree();
    const dirs = localBinDirectories(app);
    expect(dirs[0]).toBe(path.join(app, "node_modules", ".bin"));
    expect(dirs[1]).toBe(path.join(root, "node_modules", ".bin"));
  });

  it("layers resource variables over the host's and prepends local binaries to PATH", () => {
    const { app } = projectTree();
    const env = launchEnvironment({
      baseEnvironment: { PATH: "/usr/bin", MODE: "host", HOME: "/home/dev" },
      environment: { MODE: "resource", PORT: "4100" },
      cwd: app,
    });

    expect(env.MODE).toBe("resource");
    expect(env.PORT).toBe("4100");
    expect(env.HOME).toBe("/home/dev");
    const parts = (env.PATH ?? "").split(path.delimiter);
    expect(parts[0]).toBe(path.join(app, "node_modules", ".bin"));
    expect(parts[parts.length - 1]).toBe("/usr/bin");
  });

  it("uses the resource's PATH when it sets one", () => {
    const env = launchEnvironment({
      baseEnvironment: { PATH: "/usr/bin" },
      environment: { PATH: "/opt/tools/bin" },
      cwd: "/",
    });
    expect(env.PATH?.split(path.delimiter).pop()).toBe("/opt/tools/bin");
  });
});

describe("spawnShell", () => {
  function output(child: ChildProcess): Promise<{ stdout: string; code: number | null }> {
    return new Promise((resolve, reject) => {
      let stdout = "";
      child.stdout?.on("data", (chunk) => (stdout += chunk));
      child.on("error", reject);
      child.on("close", (code) => resolve({ stdout, code }));
    });
  }

  it("runs the command through the shell with arguments kept intact", async () => {
    const child = spawnShell("printf", ["%s|", "a b", "it's"], {
      baseEnvironment: process.env,
      environment: {},
      cwd: os.tmpdir(),
    });
    expect(await output(child)).toEqual({ stdout: "a b|it's|", code: 0 });
  });

  it("passes the resolved environment", async () => {
    const child = spawnShell("sh", ["-c", 'printf %s "$GREETING"'], {
      baseEnvironment: process.env,
      environment: { GREETING: "hello" },
      cwd: os.tmpdir(),
    });
    expect(await output(child)).toEqual({ stdout: "hello", code: 0 });
  });
});
