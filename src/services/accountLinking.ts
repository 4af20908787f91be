// src/services/accountLinking.ts
// /linkwhoop → WHOOP consent → /whoop/callback

import { v4 as uuidv4 } from 'uuid';
import type { OAuthStateStore } from '../db/store';
import type { Deadline } from './deadline';
import { ValidationFailedError } from './errors';
import type { TokenGrant } from './whoop/types';
import type { TokenVault } from './whoop/tokenVault';

export interface AuthorizationCodeClient {
  authorizeUrl(state: string): string;
  exchangeCode(code: string, signal?: AbortSignal): Promise<TokenGrant>;
}

export interface AccountLinkingOptions {
  stateTtlMs?: number;
  exchangeTimeoutMs?: number;
  now?: () => number;
}

export class AccountLinking {
  private readonly stateTtlMs: number;
  private readonly exchangeTimeoutMs: number;
  private readonly now: () => number;

  constructor(
    private readonly states: OAuthStateStore,
    private readonly oauth: AuthorizationCodeClient,
    private readonly vault: TokenVault,
    options: AccountLinkingOptions = {}
  ) {
    this.stateTtlMs = options.stateTtlMs ?? 10 * 60 * 1000;
    this.exchangeTimeoutMs = options.exchangeTimeoutMs ?? 15_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Fresh single-use state for `userId`; returns the WHOOP consent URL
   */
  async beginLink(userId: string): Promise<string> {
    await this.purgeExpiredStates();
    const state = uuidv4();
    await this.states.saveState({
      state,
      userId,
      expiresAt: new Date(this.now() + this.stateTtlMs),
    });
    return this.oauth.authorizeUrl(state);
  }

  /**
   * @throws ValidationFailedError (400) for an unknown or expired state
   */
  async completeLink(code: string, state: string, deadline?: Deadline): Promise<{ userId: string }> {
    const stored = await this.states.consumeState(state);
    if (!stored) {
      throw new ValidationFailedError('Unknown or already used link state', 400);
    }
    if (stored.expiresAt.getTime() < this.now()) {
      throw new ValidationFailedError('Link state expired, send /linkwhoop again', 400);
    }

    const signal = deadline
      ? deadline.signalFor(this.exchangeTimeoutMs)
      : AbortSignal.timeout(this.exchangeTimeoutMs);
    const grant = await this.oauth.exchangeCode(code, signal);
    await this.vault.link(stored.userId, grant);

    return { userId: stored.userId };
  }

  unlink(userId: string): Promise<boolean> {
    return this.vault.unlink(userId);
  }

  private async purgeExpiredStates(): Promise<void> {
    try {
      const purged = await this.states.purgeExpiredStates(new Date(this.now()));
      if (purged > 0) console.log(`[linking] purged ${purged} expired link states`);
    } catch (err) {
      // completeLink refuses expired states, so the new link can go ahead
      console.error('[linking] could not purge expired link states:', err);
    }
  }
}
