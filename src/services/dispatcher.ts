// src/services/dispatcher.ts
// Idempotent Telegram delivery: one `sent` DispatchRecord per trigger id

import type { DispatchOutcome } from '../domain/types';
import type { DispatchLedger } from '../db/store';
import { retryWithBackoff, RetryOptions } from './backoff';
import type { Deadline } from './deadline';
import { linkSignals } from './deadline';
import { RateLimitedError, toCoreError } from './errors';
import type { EventSink } from './events';
import { KeyedSingleFlight } from './singleFlight';
import { DeliveryRejectedError, Messenger } from './telegram';

export interface DispatchResult {
  triggerId: string;
  outcome: DispatchOutcome;
  /** A `sent` record already existed; nothing was sent this time */
  replayed: boolean;
  platformMessageId?: string;
  error?: string;
}

export interface DispatcherOptions {
  sendTimeoutMs?: number;
  retry?: Omit<RetryOptions, 'deadline' | 'signal' | 'shouldRetry'>;
  events?: EventSink;
  now?: () => number;
}

export class Dispatcher {
  private readonly inFlight = new KeyedSingleFlight<DispatchResult>();
  private readonly sendTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly ledger: DispatchLedger,
    private readonly messenger: Messenger,
    private readonly options: DispatcherOptions = {}
  ) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? 10_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Chat id is the user id (private chats only).
   * Concurrent calls for one trigger share a single send; each waits under its own deadline.
   * @throws RateLimitedError, UpstreamUnavailableError or DeadlineExceededError when the send should be retried later
   */
  async dispatch(triggerId: string, userId: string, body: string, deadline?: Deadline): Promise<DispatchResult> {
    deadline?.throwIfExpired();
    return this.inFlight.run(
      triggerId,
      (signal) => this.dispatchOnce(triggerId, userId, body, signal),
      deadline?.signal
    );
  }

  private async dispatchOnce(
    triggerId: string,
    userId: string,
    body: string,
    shared: AbortSignal
  ): Promise<DispatchResult> {
    const existing = await this.ledger.findSent(triggerId);
    if (existing) {
      console.log(`[dispatch] ${triggerId} already sent, replaying outcome`);
      return {
        triggerId,
        outcome: existing.outcome,
        replayed: true,
        ...(existing.platformMessageId ? { platformMessageId: existing.platformMessageId } : {}),
      };
    }

    try {
      const sent = await retryWithBackoff(
        () => this.messenger.send(userId, body, linkSignals(shared, AbortSignal.timeout(this.sendTimeoutMs))),
        {
          ...this.options.retry,
          signal: shared,
          shouldRetry: (err) => err instanceof RateLimitedError,
        }
      );

      await this.ledger.record({
        triggerId,
        userId,
        sentAt: new Date(this.now()),
        outcome: 'sent',
        platformMessageId: sent.messageId,
      });

      return { triggerId, outcome: 'sent', replayed: false, platformMessageId: sent.messageId };
    } catch (err) {
      if (err instanceof DeliveryRejectedError) {
        await this.recordFailure(triggerId, userId, err.message);
        this.options.events?.emit('dispatch_rejected', 'WARNING', {
          triggerId,
          userId,
          errorCode: err.errorCode,
          error: err.message,
        });
        return { triggerId, outcome: 'failed', replayed: false, error: err.message };
      }

      const classified = toCoreError(err, 'Telegram');
      await this.recordFailure(triggerId, userId, classified.message);
      throw classified;
    }
  }

  private async recordFailure(triggerId: string, userId: string, error: string): Promise<void> {
    try {
      await this.ledger.record({
        triggerId,
        userId,
        sentAt: new Date(this.now()),
        outcome: 'failed',
        error,
      });
    } catch (err) {
      // the send failure is what the caller needs to see
      console.error(`[dispatch] could not record failure for ${triggerId}:`, err);
    }
  }
}
