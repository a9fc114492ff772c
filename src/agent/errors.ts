/**
 * Errors thrown by the interactions client.
 *
 * The poll loop folds any of these into a `Polling failed: <message>` result;
 * job creation surfaces them as a rejected run.
 */

/**
 * Non-2xx response with no more specific class. `code` carries the API's
 * error status string when the body has one.
 */
export class ResearchApiError extends Error {
  constructor(
    message: string,
    public code: string,
    public status: number,
    public details?: unknown
  ) {
    super(message);
    this.name = 'ResearchApiError';
  }
}

/**
 * The request never produced a response: DNS or socket failure, or the
 * per-request timeout (`Request timeout`). Caller aborts are not wrapped.
 */
export class NetworkError extends ResearchApiError {
  constructor(message: string, cause?: unknown) {
    super(message, 'NETWORK_ERROR', 0);
    this.name = 'NetworkError';
    this.cause = cause;
  }
}

/**
 * Polling an interaction id the API does not know, usually one that has
 * expired or belongs to another key.
 */
export class NotFoundError extends ResearchApiError {
  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, 'NOT_FOUND', 404);
    this.name = 'NotFoundError';
  }
}

/**
 * The API rejected the request body (400), e.g. an unknown agent name.
 */
export class ValidationError extends ResearchApiError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * GEMINI_API_KEY was refused (401), or the key lacks access to the
 * deep-research agent (403).
 */
export class AuthenticationError extends ResearchApiError {
  constructor(message = 'Authentication failed', status = 401) {
    super(message, 'UNAUTHORIZED', status);
    this.name = 'AuthenticationError';
  }
}

/**
 * Quota exhausted. `retryAfter` is the Retry-After header in seconds, when sent.
 */
export class RateLimitError extends ResearchApiError {
  constructor(message: string, public retryAfter?: number) {
    super(message, 'RATE_LIMIT', 429);
    this.name = 'RateLimitError';
  }
}

/** Agent backend failure (5xx). */
export class ServerError extends ResearchApiError {
  constructor(message: string, status = 500) {
    super(message, 'SERVER_ERROR', status);
    this.name = 'ServerError';
  }
}

/**
 * A 2xx whose body is unusable: not JSON, not an interaction object, or a
 * create response without an id.
 */
export class InvalidResponseError extends ResearchApiError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_RESPONSE', 200, details);
    this.name = 'InvalidResponseError';
  }
}

/** Caller abort or `AbortSignal.timeout` expiry */
export function isAbortError(error: unknown): boolean {
  return (
    error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError')
  );
}
