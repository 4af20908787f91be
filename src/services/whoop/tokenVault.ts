// src/services/whoop/tokenVault.ts
// Holds the WHOOP token pair per user and refreshes it before it expires

import type { TokenRecord } from '../../domain/types';
import type { CursorStore, TokenStore } from '../../db/store';
import type { Deadline } from '../deadline';
import { linkSignals } from '../deadline';
import { AuthExpiredError, UpstreamUnavailableError, toCoreError } from '../errors';
import type { EventSink } from '../events';
import { KeyedSingleFlight } from '../singleFlight';
import type { TokenGrant } from './types';

export interface TokenRefresher {
  refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant>;
}

/**
 * What sync needs from the vault
 */
export interface AccessTokenProvider {
  getValidToken(userId: string, deadline?: Deadline): Promise<string>;
  forceRefresh(userId: string, rejectedAccessToken: string, deadline?: Deadline): Promise<string>;
}

export interface TokenVaultOptions {
  /** Refresh when the token expires within this window (default 60s) */
  safetyMarginMs?: number;
  refreshTimeoutMs?: number;
  events?: EventSink;
  now?: () => number;
}

export class TokenVault implements AccessTokenProvider {
  private readonly refreshes = new KeyedSingleFlight<TokenRecord>();
  private readonly safetyMarginMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly store: TokenStore & Pick<CursorStore, 'deleteCursor'>,
    private readonly oauth: TokenRefresher,
    private readonly options: TokenVaultOptions = {}
  ) {
    this.safetyMarginMs = options.safetyMarginMs ?? 60_000;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? 15_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Access token good for at least one downstream call.
   * @throws AuthExpiredError when the user is not linked or the refresh token is dead
   */
  async getValidToken(userId: string, deadline?: Deadline): Promise<string> {
    const record = await this.load(userId);
    if (this.isUsable(record)) {
      return record.accessToken;
    }

    return this.sharedRefresh(userId, undefined, deadline);
  }

  /**
   * Refresh after WHOOP rejected `rejectedAccessToken`.
   * If the stored token has already moved on, that one is returned instead.
   */
  async forceRefresh(userId: string, rejectedAccessToken: string, deadline?: Deadline): Promise<string> {
    const record = await this.load(userId);
    if (this.isUsable(record, rejectedAccessToken)) {
      return record.accessToken;
    }

    const token = await this.sharedRefresh(userId, rejectedAccessToken, deadline);
    // joined a refresh that found the rejected token still stored as valid
    if (token === rejectedAccessToken) {
      return this.sharedRefresh(userId, rejectedAccessToken, deadline);
    }
    return token;
  }

  async link(userId: string, grant: TokenGrant): Promise<void> {
    const existing = await this.store.getToken(userId);
    await this.store.putToken(userId, {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt: grant.expiresAt,
      scope: grant.scope,
      version: (existing?.version ?? 0) + 1,
    });
    console.log(`[vault] linked WHOOP for user ${userId}`);
  }

  /**
   * Drops the token pair and the sync cursor, so a later link starts from the first-sync lookback
   */
  async unlink(userId: string): Promise<boolean> {
    const removed = await this.store.deleteToken(userId);
    await this.store.deleteCursor(userId);
    if (removed) console.log(`[vault] unlinked WHOOP for user ${userId}`);
    return removed;
  }

  async isLinked(userId: string): Promise<boolean> {
    return (await this.store.getToken(userId)) !== null;
  }

  needsRefresh(record: TokenRecord): boolean {
    return record.expiresAt.getTime() - this.now() <= this.safetyMarginMs;
  }

  private isUsable(record: TokenRecord, rejectedAccessToken?: string): boolean {
    return record.accessToken !== rejectedAccessToken && !this.needsRefresh(record);
  }

  /**
   * One refresh per user at a time. The refresh runs under its own timeout;
   * each caller only waits as long as its own deadline allows.
   */
  private async sharedRefresh(
    userId: string,
    rejectedAccessToken: string | undefined,
    deadline?: Deadline
  ): Promise<string> {
    deadline?.throwIfExpired();
    const record = await this.refreshes.run(
      userId,
      (signal) => this.refresh(userId, rejectedAccessToken, signal),
      deadline?.signal
    );
    return record.accessToken;
  }

  private async load(userId: string): Promise<TokenRecord> {
    const record = await this.store.getToken(userId);
    if (!record) {
      throw new AuthExpiredError(`User ${userId} has no WHOOP link`);
    }
    return record;
  }

  private async refresh(
    userId: string,
    rejectedAccessToken: string | undefined,
    shared: AbortSignal
  ): Promise<TokenRecord> {
    // The caller's read may predate a refresh that already rotated the pair
    const current = await this.load(userId);
    if (this.isUsable(current, rejectedAccessToken)) {
      return current;
    }

    let grant: TokenGrant;
    try {
      grant = await this.oauth.refresh(
        current.refreshToken,
        linkSignals(shared, AbortSignal.timeout(this.refreshTimeoutMs))
      );
    } catch (err) {
      const classified = toCoreError(err, 'WHOOP token refresh');
      if (classified instanceof AuthExpiredError) {
        // Another instance may have spent this refresh token first
        const winner = await this.store.getToken(userId);
        if (winner && winner.version > current.version) {
          console.log(`[vault] refresh token already rotated for user ${userId}, reusing v${winner.version}`);
          return winner;
        }
        this.options.events?.emit('token_refresh_rejected', 'WARNING', {
          userId,
          error: classified.message,
        });
      }
      throw classified;
    }

    const next: TokenRecord = {
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiresAt: grant.expiresAt,
      scope: grant.scope || current.scope,
      version: current.version + 1,
    };

    if (await this.store.replaceToken(userId, next, current.version)) {
      console.log(`[vault] refreshed token for user ${userId} (v${next.version})`);
      return next;
    }

    // Another instance refreshed first: use whatever it stored
    const winner = await this.store.getToken(userId);
    if (!winner) {
      throw new AuthExpiredError(`User ${userId} unlinked WHOOP during refresh`);
    }
    if (winner.version > current.version) {
      console.log(`[vault] lost refresh race for user ${userId}, reusing v${winner.version}`);
      return winner;
    }

    throw new UpstreamUnavailableError(`Token for user ${userId} changed during refresh`);
  }
}
