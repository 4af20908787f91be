/**
 * Exponential backoff for WHOOP and Telegram retries
 */

import type { Deadline } from './deadline';
import { DeadlineExceededError, isRetryable, RateLimitedError } from './errors';

export interface BackoffOptions {
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Multiplier for each attempt (default: 2) */
  multiplier?: number;
  /** Maximum number of attempts before giving up (default: 10) */
  maxAttempts?: number;
  /** Add random jitter so parallel retries spread out (default: true) */
  jitter?: boolean;
}

export interface BackoffState {
  attempt: number;
  nextDelay: number;
  exhausted: boolean;
}

const DEFAULT_OPTIONS: Required<BackoffOptions> = {
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
  maxAttempts: 10,
  jitter: true,
};

export function calculateBackoff(attempt: number, options: BackoffOptions = {}): BackoffState {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  if (attempt >= opts.maxAttempts) {
    return { attempt, nextDelay: 0, exhausted: true };
  }

  let delay = Math.min(opts.initialDelay * Math.pow(opts.multiplier, attempt), opts.maxDelay);

  // ±25%
  if (opts.jitter) {
    const jitterRange = delay * 0.25;
    delay = delay - jitterRange + Math.random() * jitterRange * 2;
  }

  return { attempt, nextDelay: Math.round(delay), exhausted: false };
}

export function createBackoffController(options: BackoffOptions = {}) {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let attempt = 0;

  return {
    getAttempt: () => attempt,

    next: (): BackoffState => {
      const state = calculateBackoff(attempt, opts);
      attempt++;
      return state;
    },

    /** Call after a successful connection */
    reset: () => {
      attempt = 0;
    },

    isExhausted: () => attempt >= opts.maxAttempts,
  };
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * setTimeout as a promise, rejected with the signal's reason on abort
 */
export const sleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

export interface RetryOptions extends BackoffOptions {
  deadline?: Deadline;
  /** Cancels the retry loop and any wait between attempts */
  signal?: AbortSignal;
  /** Defaults to the error's own `retryable` flag */
  shouldRetry?: (err: unknown) => boolean;
  sleep?: Sleep;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run `fn` until it succeeds, a non-retryable error is thrown, attempts run out,
 * or the next wait would overrun the deadline. The last error is rethrown as-is.
 */
export async function retryWithBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { deadline, signal, shouldRetry = isRetryable, onRetry } = options;
  const wait = options.sleep ?? sleep;
  const backoff = createBackoffController({ maxAttempts: 4, maxDelay: 8000, ...options });

  for (;;) {
    deadline?.throwIfExpired();
    if (signal?.aborted) throw signal.reason;
    const attempt = backoff.getAttempt();

    try {
      return await fn(attempt);
    } catch (err) {
      if (err instanceof DeadlineExceededError || !shouldRetry(err)) throw err;

      const state = backoff.next();
      // the final attempt has already run
      if (state.exhausted || backoff.isExhausted()) throw err;

      const delay =
        err instanceof RateLimitedError
          ? Math.max(state.nextDelay, err.retryAfterSeconds * 1000)
          : state.nextDelay;

      if (deadline && delay >= deadline.remainingMs()) throw err;

      onRetry?.(err, attempt + 1, delay);
      await wait(delay, deadline?.signal ?? signal);
    }
  }
}
