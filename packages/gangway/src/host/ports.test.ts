import { describe, it, expect, afterEach } from "vitest";
import * as net from "node:net";
import { DEFAULT_PORT_RANGE, PortAllocator } from "./ports.js";

function bind(port = 0): Promise<net.Server> {
  return new Promise((resolve, reject) => {
    const server = net.createServer();
    server.once("error", reject);
    server.listen(port, () => resolve(server));
  });
}

function portOf(server: net.Server): number {
  const addr = server.address();
  if (!addr || typeof addr === "string") throw new Error("Server not listening");
  return addr.port;
}

function close(server: net.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/** A port nothing listens on right now. */
async function releasedPort(): Promise<number> {
  const server = await bind();
  const port = portOf(server);
  await close(server);
  return port;
}

describe("PortAllocator", () => {
  const servers: net.Server[] = [];

  afterEach(async () => {
    for (const server of servers) {
      await close(server);
    }
    servers.length = 0;
  });

  it("allocates from 4000-4999 by default", async () => {
    const allocator = new PortAllocator();
    expect(allocator.range).toEqual(DEFAULT_PORT_RANGE);

    const port = await allocator.allocate();
    expect(port).toBeGreaterThanOrEqual(4000);
    expect(port).toBeLessThanOrEqual(4999);
  });

  it("hands out ports that can be bound", async () => {
    const port = await new PortAllocator().allocate();
    const server = await bind(port);
    servers.push(server);
    expect(portOf(server)).toBe(port);
  });

  it("never hands out the same port twice", async () => {
    const port = await releasedPort();
    const allocator = new PortAllocator({ min: port, max: port });

    expect(await allocator.allocate()).toBe(port);
    expect(allocator.isReserved(port)).toBe(true);
    await expect(allocator.allocate()).rejects.toThrow(`No free port in range ${port}-${port}`);
  });

  it("skips reserved ports", async () => {
    const port = await releasedPort();
    const allocator = new PortAllocator({ min: port, max: port });
    allocator.reserve(port);

    await expect(allocator.allocate()).rejects.toThrow(`No free port in range ${port}-${port}`);
  });

  it("skips ports something already listens on", async () => {
    const server = await bind();
    servers.push(server);
    const port = portOf(server);

    await expect(new PortAllocator({ min: port, max: port }).allocate()).rejects.toThrow(
      `No free port in range ${port}-${port}`
    );
  });

  it("rejects invalid ranges", () => {
    expect(() => new PortAllocator({ min: 5000, max: 4000 })).toThrow("Invalid port range 5000-4000");
    expect(() => new PortAllocator({ min: 0, max: 10 })).toThrow("Invalid port range 0-10");
    expect(() => new PortAllocator({ min: 60000, max: 70000 })).toThrow("Invalid port range 60000-70000");
  });
});
