/**
 * Raised when a caller hands the index a value it cannot store
 * (empty word, non-positive line number). Nothing is mutated when it is thrown.
 */
export class InvalidArgumentError extends Error {
  readonly code = "INVALID_ARGUMENT";

  constructor(message: string, readonly path?: string) {
    super(message);
    this.name = "InvalidArgumentError";
  }
}
