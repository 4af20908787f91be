// src/services/deadline.ts
// Per-request wall-clock budget. Every external call takes its signal from here.

import { DeadlineExceededError } from './errors';

/**
 * Combine several abort signals into one that fires when any of them does
 */
export function linkSignals(...signals: AbortSignal[]): AbortSignal {
  const controller = new AbortController();

  for (const signal of signals) {
    if (signal.aborted) {
      controller.abort(signal.reason);
      return controller.signal;
    }
  }

  const onAbort = (event: Event) => {
    const source = event.target instanceof AbortSignal ? event.target : undefined;
    controller.abort(source?.reason);
    for (const signal of signals) signal.removeEventListener('abort', onAbort);
  };

  for (const signal of signals) {
    signal.addEventListener('abort', onAbort, { once: true });
  }

  return controller.signal;
}

export class Deadline {
  private readonly controller = new AbortController();
  private readonly timer: NodeJS.Timeout;
  readonly expiresAt: number;

  constructor(
    budgetMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + budgetMs;
    this.timer = setTimeout(
      () => this.controller.abort(new DeadlineExceededError()),
      Math.max(0, budgetMs)
    );
    this.timer.unref();
  }

  /** Fires when the budget runs out or the request finishes */
  get signal(): AbortSignal {
    return this.controller.signal;
  }

  remainingMs(): number {
    return Math.max(0, this.expiresAt - this.now());
  }

  expired(): boolean {
    return this.controller.signal.reason instanceof DeadlineExceededError || this.remainingMs() === 0;
  }

  throwIfExpired(): void {
    if (this.expired()) {
      throw new DeadlineExceededError();
    }
  }

  /**
   * Signal for a single external call: aborts at the per-call timeout or the deadline, whichever is first
   */
  signalFor(timeoutMs: number): AbortSignal {
    const callTimeout = AbortSignal.timeout(Math.max(1, Math.min(timeoutMs, this.remainingMs())));
    return linkSignals(this.controller.signal, callTimeout);
  }

  /**
   * End the request. In-flight calls still holding the signal are aborted.
   */
  release(): void {
    clearTimeout(this.timer);
    if (!this.controller.signal.aborted) {
      this.controller.abort(new Error('Request finished'));
    }
  }
}
