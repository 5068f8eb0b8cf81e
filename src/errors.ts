/**
 * Error types surfaced by the gateway.
 *
 * Only InvalidRequestError ever reaches a caller. Backend problems are
 * folded into a BackendStatus by the detector adapters, and aggregation
 * inconsistencies are logged and counted rather than thrown.
 */

export class InvalidRequestError extends Error {
  readonly code = "invalid_request";

  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
  }
}

/**
 * Thrown at startup when configuration or the category table cannot be used.
 */
export class ConfigurationError extends Error {
  constructor(message: string, readonly source?: string) {
    super(source ? `${message} (${source})` : message);
    this.name = "ConfigurationError";
  }
}

/**
 * A backend answered, but not with something the adapter can read.
 * Never escapes an adapter.
 */
export class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

export function isInvalidRequestError(err: unknown): err is InvalidRequestError {
  return err instanceof InvalidRequestError;
}
