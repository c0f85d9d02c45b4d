import type { ConfigurationSection } from "./configuration.js";
import type { DestinationResolver } from "./types.js";

/** Root configuration section holding discovered service endpoints. */
export const SERVICES_SECTION = "services";

/**
 * Resolves logical service addresses (`http://api`) through configuration
 * entries of the form `services:<name>:<endpoint>:<index>`. The endpoint
 * name is taken from the address scheme; `https+http://api` tries `https`
 * first, then `http`. Addresses without a configured endpoint pass through
 * unchanged.
 */
export class ServiceEndpointResolver {
  constructor(private readonly configuration: ConfigurationSection) {}

  /** All configured endpoints for a service and endpoint name, in index order. */
  endpoints(serviceName: string, endpointName: string): string[] {
    return this.configuration
      .getSection(`${SERVICES_SECTION}:${serviceName}:${endpointName}`)
      .getChildren()
      .map((child) => child.value)
      .filter((value): value is string => value !== undefined && value !== "");
  }

  async resolve(address: string): Promise<string> {
    let url: URL;
    try {
      url = new URL(address);
    } catch {
      return address;
    }

    const serviceName = url.hostname;
    if (!serviceName) return address;

    const schemes = url.protocol.slice(0, -1).split("+");
    const originalPath = url.pathname === "/" ? "" : url.pathname;
    for (const scheme of schemes) {
      const [endpoint] = this.endpoints(serviceName, scheme);
      if (endpoint !== undefined) {
        return `${endpoint.replace(/\/+$/, "")}${originalPath}`;
      }
    }

    return address;
  }

  toDestinationResolver(): DestinationResolver {
    return (address) => this.resolve(address);
  }
}
