// src/services/errors.ts
// Error kinds surfaced by the core and their retry / HTTP semantics

export type ErrorKind =
  | 'AuthExpired'
  | 'RateLimited'
  | 'UpstreamUnavailable'
  | 'ValidationFailed'
  | 'DeadlineExceeded';

/**
 * Base class for every classified failure.
 * Anything that is not a CoreError is treated as UpstreamUnavailable at the edge.
 */
export abstract class CoreError extends Error {
  abstract readonly kind: ErrorKind;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The user must re-authorize the wearable link. Never retried. */
export class AuthExpiredError extends CoreError {
  readonly kind = 'AuthExpired' as const;
  readonly retryable = false;
}

export class RateLimitedError extends CoreError {
  readonly kind = 'RateLimited' as const;
  readonly retryable = true;

  constructor(
    message: string,
    public readonly retryAfterSeconds: number = 60,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class UpstreamUnavailableError extends CoreError {
  readonly kind = 'UpstreamUnavailable' as const;
  readonly retryable = true;

  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/** Malformed or unauthenticated inbound request. Never retried. */
export class ValidationFailedError extends CoreError {
  readonly kind = 'ValidationFailed' as const;
  readonly retryable = false;

  constructor(
    message: string,
    public readonly status: 400 | 401 | 403 = 403,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class DeadlineExceededError extends CoreError {
  readonly kind = 'DeadlineExceeded' as const;
  readonly retryable = true;

  constructor(message: string = 'Request budget exhausted', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isCoreError(err: unknown): err is CoreError {
  return err instanceof CoreError;
}

export function isRetryable(err: unknown): boolean {
  return isCoreError(err) ? err.retryable : true;
}

/**
 * True for fetch/SDK failures caused by an AbortSignal firing
 */
export function isAbortError(err: unknown): boolean {
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Classify an unknown failure from an external call.
 * Core errors pass through; aborts and network failures become UpstreamUnavailable.
 */
export function toCoreError(err: unknown, service: string): CoreError {
  if (isCoreError(err)) return err;
  if (isAbortError(err)) {
    return new UpstreamUnavailableError(`${service} call timed out`, undefined, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new UpstreamUnavailableError(`${service} unavailable: ${message}`, undefined, { cause: err });
}

/**
 * HTTP status for a failed trigger. 4xx tells the caller not to retry, 5xx asks for a retry.
 */
export function httpStatusFor(err: CoreError): number {
  switch (err.kind) {
    case 'ValidationFailed':
      return err instanceof ValidationFailedError ? err.status : 403;
    case 'AuthExpired':
      return 422;
    case 'RateLimited':
    case 'UpstreamUnavailable':
      return 503;
    case 'DeadlineExceeded':
      return 504;
  }
}
