/** Loopback interface every listener and allocated endpoint binds to. */
export const LOOPBACK_HOST = "127.0.0.1";

/** Maximum length of a resource name. */
const MAX_RESOURCE_NAME_LENGTH = 64;

/** Type guard for Node.js system errors with an error code. */
export function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof (err as Record<string, unknown>).code === "string"
  );
}

/**
 * Escape HTML special characters to prevent XSS.
 */
export function escapeHtml(str: string): string {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

/**
 * Build a loopback URL for the given scheme. Port 0 asks the OS for an
 * ephemeral port when the URL is bound.
 */
export function loopbackUrl(scheme: string, port: number): string {
  return `${scheme}://${LOOPBACK_HOST}:${port}`;
}

/**
 * Rewrite an environment-variable style key (`Section__Child`) into the
 * colon-separated form the configuration system uses (`Section:Child`).
 */
export function toConfigurationKey(key: string): string {
  return key.replace(/__/g, ":");
}

/**
 * Validate a resource name. Names are used as service-discovery host names
 * and in environment variable keys, so they are restricted to ASCII
 * letters, digits and single hyphens, starting with a letter.
 */
export function validateResourceName(input: string): string {
  const name = input.trim();

  if (!name) {
    throw new Error("Resource name cannot be empty");
  }
  if (name.length > MAX_RESOURCE_NAME_LENGTH) {
    throw new Error(
      `Invalid resource name "${name}": must be at most ${MAX_RESOURCE_NAME_LENGTH} characters`
    );
  }
  if (name.includes("--")) {
    throw new Error(`Invalid resource name "${name}": consecutive hyphens are not allowed`);
  }
  if (!/^[A-Za-z]([A-Za-z0-9-]*[A-Za-z0-9])?$/.test(name)) {
    throw new Error(
      `Invalid resource name "${name}": must start with a letter and contain only letters, digits, and hyphens`
    );
  }

  return name;
}

/** Format an unknown thrown value for a log line or console message. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
