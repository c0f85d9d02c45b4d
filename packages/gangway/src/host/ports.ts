import * as net from "node:net";

export interface PortRange {
  min: number;
  max: number;
}

/** Ports handed to endpoints that declare neither a port nor a target port. */
export const DEFAULT_PORT_RANGE: PortRange = { min: 4000, max: 4999 };

const RANDOM_ATTEMPTS = 50;

function canBind(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once("error", () => resolve(false));
    server.listen(port, () => {
      server.close(() => resolve(true));
    });
  });
}

/**
 * Hands out ports for one allocation pass. A port is never handed out
 * twice, and reserved ports (declared by an endpoint or already allocated)
 * are skipped. A port is only offered when it can be bound at that moment;
 * the process it is meant for binds it later.
 */
export class PortAllocator {
  private readonly reserved = new Set<number>();

  constructor(readonly range: PortRange = DEFAULT_PORT_RANGE) {
    const { min, max } = range;
    if (!Number.isInteger(min) || !Number.isInteger(max) || min < 1 || max > 65535 || min > max) {
      throw new Error(`Invalid port range ${min}-${max}`);
    }
  }

  reserve(port: number): void {
    this.reserved.add(port);
  }

  isReserved(port: number): boolean {
    return this.reserved.has(port);
  }

  /** Random picks first, then a scan of the whole range. */
  async allocate(): Promise<number> {
    const { min, max } = this.range;
    for (let i = 0; i < RANDOM_ATTEMPTS; i++) {
      const port = min + Math.floor(Math.random() * (max - min + 1));
      if (await this.take(port)) return port;
    }
    for (let port = min; port <= max; port++) {
      if (await this.take(port)) return port;
    }
    throw new Error(`No free port in range ${min}-${max}`);
  }

  private async take(port: number): Promise<boolean> {
    if (this.reserved.has(port) || !(await canBind(port))) return false;
    this.reserved.add(port);
    return true;
  }
}
