import * as fs from "node:fs";
import { isErrnoException, toConfigurationKey } from "./utils.js";

/** Separator between the segments of a configuration key. */
export const KEY_DELIMITER = ":";

/** Thrown when a configuration source cannot be read. */
export class ConfigurationError extends Error {
  readonly source: string;

  constructor(source: string, message: string) {
    super(`${message} (${source})`);
    this.name = "ConfigurationError";
    this.source = source;
  }
}

interface Entry {
  key: string;
  value: string;
}

type Source = () => Iterable<[string, string]>;

function joinKey(parent: string, child: string): string {
  return parent ? `${parent}${KEY_DELIMITER}${child}` : child;
}

function isNumericKey(key: string): boolean {
  return /^\d+$/.test(key);
}

/**
 * A node in the configuration tree. Lookups are case-insensitive; the
 * casing of the first source that wrote a key is kept for `key` and
 * `getChildren()`.
 */
export class ConfigurationSection {
  /** Last segment of the path (empty for the root). */
  readonly key: string;

  constructor(
    private readonly entries: ReadonlyMap<string, Entry>,
    readonly path: string
  ) {
    const segments = path.split(KEY_DELIMITER);
    this.key = segments[segments.length - 1] ?? "";
  }

  /** Value stored at this section's own path, if any. */
  get value(): string | undefined {
    return this.path ? this.entries.get(this.path.toLowerCase())?.value : undefined;
  }

  get(key: string): string | undefined {
    return this.entries.get(joinKey(this.path, key).toLowerCase())?.value;
  }

  getSection(key: string): ConfigurationSection {
    return new ConfigurationSection(this.entries, joinKey(this.path, key));
  }

  /**
   * Immediate children. Numeric keys come first, sorted numerically; the
   * others follow in first-seen order.
   */
  getChildren(): ConfigurationSection[] {
    const prefix = this.path ? `${this.path.toLowerCase()}${KEY_DELIMITER}` : "";
    const seen = new Map<string, string>();
    for (const [lower, entry] of this.entries) {
      if (!lower.startsWith(prefix)) continue;
      const segment = entry.key.slice(prefix.length).split(KEY_DELIMITER)[0];
      if (segment === undefined || segment === "") continue;
      if (!seen.has(segment.toLowerCase())) {
        seen.set(segment.toLowerCase(), segment);
      }
    }

    const keys = [...seen.values()];
    const numeric = keys.filter(isNumericKey).sort((a, b) => Number(a) - Number(b));
    const named = keys.filter((key) => !isNumericKey(key));
    return [...numeric, ...named].map((child) => this.getSection(child));
  }

  /** Whether this section has a value or any descendants. */
  exists(): boolean {
    return this.value !== undefined || this.getChildren().length > 0;
  }
}

/** Root of a built configuration. */
export class Configuration extends ConfigurationSection {
  constructor(entries: ReadonlyMap<string, Entry>) {
    super(entries, "");
  }
}

/** Flatten a parsed JSON document into colon-separated keys. */
function flattenJson(value: unknown, prefix: string, out: [string, string][]): void {
  if (value === null || value === undefined) return;
  if (Array.isArray(value)) {
    value.forEach((item, index) => flattenJson(item, joinKey(prefix, String(index)), out));
    return;
  }
  if (typeof value === "object") {
    for (const [key, child] of Object.entries(value)) {
      flattenJson(child, joinKey(prefix, key), out);
    }
    return;
  }
  if (prefix) {
    out.push([prefix, String(value)]);
  }
}

/**
 * Collects configuration sources in order; later sources override earlier
 * ones key by key.
 */
export class ConfigurationBuilder {
  private readonly sources: Source[] = [];

  addJsonFile(filePath: string, options: { optional?: boolean } = {}): this {
    this.sources.push(() => {
      let raw: string;
      try {
        raw = fs.readFileSync(filePath, "utf-8");
      } catch (err: unknown) {
        if (options.optional && isErrnoException(err) && err.code === "ENOENT") {
          return [];
        }
        throw new ConfigurationError(filePath, "Configuration file could not be read");
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch {
        throw new ConfigurationError(filePath, "Configuration file is not valid JSON");
      }
      const out: [string, string][] = [];
      flattenJson(parsed, "", out);
      return out;
    });
    return this;
  }

  /**
   * Add environment variables. When `prefix` is given only matching
   * variables are read and the prefix is stripped.
   */
  addEnvironmentVariables(env: NodeJS.ProcessEnv = process.env, prefix = ""): this {
    this.sources.push(() => {
      const out: [string, string][] = [];
      for (const [name, value] of Object.entries(env)) {
        if (value === undefined || !name.startsWith(prefix)) continue;
        const key = toConfigurationKey(name.slice(prefix.length));
        if (key) out.push([key, value]);
      }
      return out;
    });
    return this;
  }

  addInMemoryCollection(values: Record<string, string | undefined>): this {
    this.sources.push(() => {
      const out: [string, string][] = [];
      for (const [key, value] of Object.entries(values)) {
        if (value !== undefined) out.push([key, value]);
      }
      return out;
    });
    return this;
  }

  build(): Configuration {
    const entries = new Map<string, Entry>();
    for (const source of this.sources) {
      for (const [key, value] of source()) {
        const lower = key.toLowerCase();
        const existing = entries.get(lower);
        entries.set(lower, { key: existing?.key ?? key, value });
      }
    }
    return new Configuration(entries);
  }
}
