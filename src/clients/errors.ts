/**
 * Client Errors
 *
 * Every REST client raises a subclass of ApiClientError. `retryable` is
 * true for rate limiting (429), server errors (5xx), timeouts and network
 * failures; the collector's retry loop only retries those.
 */

export class ApiClientError extends Error {
  constructor(
    message: string,
    public statusCode: number,
    public retryable: boolean
  ) {
    super(message);
    this.name = 'ApiClientError';
  }
}

/** Status code used when the request never produced an HTTP response. */
export const NO_RESPONSE = 0;

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ApiClientError && error.retryable;
}

/** Message of a transport failure (timeout, refused connection, DNS). */
export function describeTransportError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === 'AbortError' ? 'request timed out' : error.message;
  }
  return String(error);
}
