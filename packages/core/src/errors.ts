/**
 * Error types raised by remote clients and recognized by the error normalizer
 */

/**
 * Thrown when no credentials are configured for the remote API
 */
export class MissingCredentialsError extends Error {
  constructor(message = 'No API credentials configured') {
    super(message);
    this.name = 'MissingCredentialsError';
  }
}

/**
 * Thrown by remote clients for non-2xx HTTP responses
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'HttpStatusError';
    this.status = status;
  }
}
