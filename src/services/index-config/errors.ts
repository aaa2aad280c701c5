/**
 * Raised when an index configuration is defined with conflicting or unknown
 * field attributes.
 */
export class IndexConfigError extends Error {
  readonly _tag = "IndexConfigError";

  constructor(
    public readonly typeName: string,
    public readonly field: string,
    message: string
  ) {
    super(`${typeName}.${field}: ${message}`);
    this.name = "IndexConfigError";
    Object.setPrototypeOf(this, IndexConfigError.prototype);
  }
}
