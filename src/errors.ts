export class SchemaResolutionError extends Error {
  override readonly name = 'SchemaResolutionError';

  constructor(
    readonly source: string,
    message?: string,
  ) {
    super(message ?? `Cannot resolve schema for source "${source}"`);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class SearchExecutionError extends Error {
  override readonly name = 'SearchExecutionError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
