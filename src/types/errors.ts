/**
 * Error thrown when a caller breaks an input contract (duplicate rule
 * ids, malformed build URIs, credentials basic auth cannot carry).
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/**
 * Extracts a printable message from anything that was thrown.
 */
export function errorMessage(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
