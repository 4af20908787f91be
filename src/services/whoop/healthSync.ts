// src/services/whoop/healthSync.ts
// Incremental pull of WHOOP collections into health_records, then the cursor

import type { HealthRecord, SyncCursor } from '../../domain/types';
import type { CursorStore, HealthRecordStore } from '../../db/store';
import { retryWithBackoff, RetryOptions } from '../backoff';
import type { Deadline } from '../deadline';
import { AuthExpiredError } from '../errors';
import type { EventSink } from '../events';
import { CollectionSource, TokenRejectedError } from './client';
import { normalizePage } from './normalizer';
import type { AccessTokenProvider } from './tokenVault';
import { PageRequest, WHOOP_COLLECTIONS, WhoopPage } from './types';

const HOUR_MS = 60 * 60 * 1000;

export interface SyncResult {
  recordsIngested: number;
  cursorAdvanced: boolean;
  pagesFetched: number;
}

export interface HealthSyncOptions {
  /** Re-read this much before the cursor to catch late-scored records (default 24h) */
  overlapMs?: number;
  /** Window for a user's first sync (default 7 days) */
  initialLookbackMs?: number;
  /** Stop paging a collection after this many pages; the cursor then stays put */
  maxPagesPerCollection?: number;
  callTimeoutMs?: number;
  retry?: Omit<RetryOptions, 'deadline'>;
  events?: EventSink;
  now?: () => number;
}

/** Mutable per-run state: the token in use and whether the one forced refresh is spent */
interface RunAuth {
  accessToken: string;
  forcedRefresh: boolean;
}

export class HealthSync {
  private readonly overlapMs: number;
  private readonly initialLookbackMs: number;
  private readonly maxPages: number;
  private readonly callTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly tokens: AccessTokenProvider,
    private readonly source: CollectionSource,
    private readonly store: CursorStore & HealthRecordStore,
    private readonly options: HealthSyncOptions = {}
  ) {
    this.overlapMs = options.overlapMs ?? 24 * HOUR_MS;
    this.initialLookbackMs = options.initialLookbackMs ?? 7 * 24 * HOUR_MS;
    this.maxPages = options.maxPagesPerCollection ?? 40;
    this.callTimeoutMs = options.callTimeoutMs ?? 15_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * One incremental pass over every collection. The cursor only moves once all of them are exhausted.
   * @throws AuthExpiredError when the user has to re-link WHOOP
   */
  async sync(userId: string, deadline: Deadline): Promise<SyncResult> {
    try {
      return await this.run(userId, deadline);
    } catch (err) {
      if (err instanceof AuthExpiredError) {
        this.options.events?.emit('whoop_auth_expired', 'WARNING', { userId, reason: err.message });
      }
      throw err;
    }
  }

  private async run(userId: string, deadline: Deadline): Promise<SyncResult> {
    const windowEnd = new Date(this.now());
    const cursor = await this.store.getCursor(userId);
    const windowStart = cursor
      ? new Date(cursor.lastSyncedAt.getTime() - this.overlapMs)
      : new Date(windowEnd.getTime() - this.initialLookbackMs);

    const auth: RunAuth = {
      accessToken: await this.tokens.getValidToken(userId, deadline),
      forcedRefresh: false,
    };

    const result: SyncResult = { recordsIngested: 0, cursorAdvanced: false, pagesFetched: 0 };
    let newest: HealthRecord | null = null;
    let exhausted = true;

    for (const collection of WHOOP_COLLECTIONS) {
      let nextToken: string | undefined;
      let pages = 0;

      for (;;) {
        if (pages >= this.maxPages) {
          console.warn(`[sync] ${collection} for user ${userId} still paging after ${pages} pages`);
          exhausted = false;
          break;
        }

        const page = await this.fetchPage(
          userId,
          { collection, start: windowStart, end: windowEnd, nextToken },
          auth,
          deadline
        );
        pages++;
        result.pagesFetched++;

        const records = normalizePage(userId, page, new Date(this.now()));
        if (records.length > 0) {
          const { inserted } = await this.store.upsertRecords(records);
          result.recordsIngested += inserted;
          for (const record of records) {
            if (!newest || record.recordedAt.getTime() > newest.recordedAt.getTime()) newest = record;
          }
        }

        if (page.records.length === 0 || !page.nextToken) break;
        nextToken = page.nextToken;
      }
    }

    if (!exhausted) {
      return result;
    }

    const next: SyncCursor = {
      userId,
      lastSyncedAt: windowEnd,
      lastRecordId: newest?.sourceRecordId ?? cursor?.lastRecordId ?? null,
    };
    await this.store.saveCursor(next);
    result.cursorAdvanced = true;

    console.log(
      `[sync] user ${userId}: ${result.recordsIngested} new records from ${result.pagesFetched} pages`
    );
    return result;
  }

  /**
   * One page with bounded retries. A 401 gets exactly one forced refresh per run.
   */
  private async fetchPage(
    userId: string,
    request: PageRequest,
    auth: RunAuth,
    deadline: Deadline
  ): Promise<WhoopPage> {
    const attempt = () =>
      retryWithBackoff(
        () => this.source.fetchPage(auth.accessToken, request, deadline.signalFor(this.callTimeoutMs)),
        {
          ...this.options.retry,
          deadline,
          onRetry: (err, n, delayMs) => {
            const message = err instanceof Error ? err.message : String(err);
            console.warn(`[sync] ${request.collection} retry ${n} in ${delayMs}ms: ${message}`);
          },
        }
      );

    try {
      return await attempt();
    } catch (err) {
      if (!(err instanceof TokenRejectedError)) throw err;
      if (auth.forcedRefresh) {
        throw new AuthExpiredError(`WHOOP keeps rejecting tokens for user ${userId}`, { cause: err });
      }
    }

    auth.forcedRefresh = true;
    auth.accessToken = await this.tokens.forceRefresh(userId, auth.accessToken, deadline);

    try {
      return await attempt();
    } catch (err) {
      if (err instanceof TokenRejectedError) {
        throw new AuthExpiredError(`WHOOP keeps rejecting tokens for user ${userId}`, { cause: err });
      }
      throw err;
    }
  }
}
