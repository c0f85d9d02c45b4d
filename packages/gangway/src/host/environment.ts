import { UnsupportedValueTypeError } from "./errors.js";
import { EnvironmentCallbackAnnotation, isValueProvider } from "./model.js";
import type { EnvironmentCallbackContext, ExecutionContext, Resource, ValueProvider } from "./model.js";

/** An environment value after classification. */
export type EnvironmentValue =
  | { kind: "literal"; value: string }
  | { kind: "resolvable"; provider: ValueProvider };

export function toEnvironmentValue(name: string, value: unknown): EnvironmentValue {
  if (typeof value === "string") return { kind: "literal", value };
  if (isValueProvider(value)) return { kind: "resolvable", provider: value };
  throw new UnsupportedValueTypeError(name, value);
}

/**
 * Run the resource's environment callbacks in declaration order and return
 * the raw values they produced.
 */
export async function collectEnvironment(
  resource: Resource,
  executionContext: ExecutionContext,
  signal?: AbortSignal
): Promise<Record<string, unknown>> {
  const context: EnvironmentCallbackContext = {
    executionContext,
    environmentVariables: {},
    signal,
  };
  for (const annotation of resource.annotationsOf(EnvironmentCallbackAnnotation)) {
    await annotation.callback(context);
  }
  return context.environmentVariables;
}

/**
 * Resolve a resource's environment into plain strings. Value providers are
 * awaited one at a time in declaration order; providers yielding
 * `undefined` drop the variable.
 */
export async function resolveEnvironment(
  resource: Resource,
  executionContext: ExecutionContext,
  signal?: AbortSignal
): Promise<Record<string, string>> {
  const raw = await collectEnvironment(resource, executionContext, signal);
  const resolved: Record<string, string> = {};

  for (const [name, value] of Object.entries(raw)) {
    const classified = toEnvironmentValue(name, value);
    const result =
      classified.kind === "literal" ? classified.value : await classified.provider.getValue(signal);
    if (result !== undefined) {
      resolved[name] = result;
    }
  }

  return resolved;
}
