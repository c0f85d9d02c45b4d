/**
 * Thrown when a resource cannot be added to the application model: its
 * name is taken, or it is of a kind that allows only one instance.
 */
export class DuplicateResourceError extends Error {
  readonly resourceName: string;

  constructor(resourceName: string, message: string) {
    super(message);
    this.name = "DuplicateResourceError";
    this.resourceName = resourceName;
  }
}

/**
 * Thrown when an environment value is neither a string nor a value
 * provider.
 */
export class UnsupportedValueTypeError extends Error {
  readonly variable: string;
  readonly valueType: string;

  constructor(variable: string, value: unknown) {
    const valueType = value === null ? "null" : typeof value;
    super(
      `Environment variable "${variable}" has an unsupported value of type ${valueType}. ` +
        `Expected a string or a value provider.`
    );
    this.name = "UnsupportedValueTypeError";
    this.variable = variable;
    this.valueType = valueType;
  }
}

/** Thrown when an endpoint reference is read before the host allocated it. */
export class EndpointNotAllocatedError extends Error {
  readonly resourceName: string;
  readonly endpointName: string;

  constructor(resourceName: string, endpointName: string) {
    super(`Endpoint "${endpointName}" of resource "${resourceName}" has not been allocated yet.`);
    this.name = "EndpointNotAllocatedError";
    this.resourceName = resourceName;
    this.endpointName = endpointName;
  }
}
