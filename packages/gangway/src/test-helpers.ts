import * as http from "node:http";
import { pino } from "pino";
import type { Logger } from "pino";

/** A pino logger that discards everything. */
export function silentLogger(): Logger {
  return pino({ enabled: false });
}

/** A pino logger that keeps parsed records in memory. */
export function memoryPinoLogger(): { logger: Logger; records: Record<string, unknown>[] } {
  const records: Record<string, unknown>[] = [];
  const logger = pino(
    { level: "trace", base: undefined, timestamp: false },
    {
      write(msg: string) {
        records.push(JSON.parse(msg));
      },
    }
  );
  return { logger, records };
}

export function listen(server: http.Server, port = 0): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, "127.0.0.1", () => {
      const addr = server.address();
      if (!addr || typeof addr === "string") {
        reject(new Error("Server not listening"));
        return;
      }
      resolve(addr.port);
    });
  });
}

export function close(server: http.Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

/** Port that nothing listens on. */
export async function closedPort(): Promise<number> {
  const server = http.createServer();
  const port = await listen(server);
  await close(server);
  return port;
}

/** Backend that answers every request with the path it received. */
export async function startEchoBackend(
  name: string
): Promise<{ server: http.Server; port: number; url: string }> {
  const server = http.createServer((req, res) => {
    res.writeHead(200, { "Content-Type": "text/plain" });
    res.end(`${name} ${req.url}`);
  });
  const port = await listen(server);
  return { server, port, url: `http://127.0.0.1:${port}` };
}

export function get(
  url: string,
  headers: http.OutgoingHttpHeaders = {}
): Promise<{ status: number; headers: http.IncomingHttpHeaders; body: string }> {
  return new Promise((resolve, reject) => {
    const req = http.get(url, { headers }, (res) => {
      let body = "";
      res.on("data", (chunk) => (body += chunk));
      res.on("end", () => resolve({ status: res.statusCode ?? 0, headers: res.headers, body }));
    });
    req.on("error", reject);
  });
}
