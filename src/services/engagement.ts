// src/services/engagement.ts
// Per-user sequences: (sync) → health summary → generate → dispatch

import type { MessageIntent, MessageKind } from '../domain/types';
import type { ChatMessageStore, DispatchLedger, HealthRecordStore, UserStore } from '../db/store';
import type { ChatTurn } from './aiPromptTemplates';
import type { Deadline } from './deadline';
import { DeadlineExceededError } from './errors';
import type { ContentGenerator } from './contentGenerator';
import type { Dispatcher } from './dispatcher';
import { summarizeHealth } from './healthSummary';
import { TEXTS } from './templates';
import type { HealthSync, SyncResult } from './whoop/healthSync';

const SUMMARY_LOOKBACK_MS = 48 * 60 * 60 * 1000;
const HISTORY_TURNS = 10;

type SyncMode = 'none' | 'best-effort' | 'required';

const SYNC_BEFORE: Record<MessageKind, SyncMode> = {
  morning_motivation: 'none',
  check_in: 'best-effort',
  health_update: 'required',
};

export interface DeliveryReport {
  userId: string;
  triggerId: string;
  kind: MessageKind;
  status: 'sent' | 'replayed' | 'rejected';
  source?: 'generated' | 'template' | 'static';
  recordsIngested?: number;
  error?: string;
}

export interface LinkStatus {
  isLinked(userId: string): Promise<boolean>;
}

export interface EngagementDeps {
  users: UserStore;
  records: HealthRecordStore;
  ledger: DispatchLedger;
  chats: ChatMessageStore;
  links: LinkStatus;
  sync: Pick<HealthSync, 'sync'>;
  generator: Pick<ContentGenerator, 'generate'>;
  dispatcher: Pick<Dispatcher, 'dispatch'>;
  /** Earlier turns shown to the model (default 10) */
  historyTurns?: number;
  now?: () => number;
}

export class EngagementService {
  private readonly now: () => number;
  private readonly historyTurns: number;

  constructor(private readonly deps: EngagementDeps) {
    this.now = deps.now ?? Date.now;
    this.historyTurns = deps.historyTurns ?? HISTORY_TURNS;
  }

  async deliver(
    intent: MessageIntent,
    deadline: Deadline,
    options: { userMessage?: string } = {}
  ): Promise<DeliveryReport> {
    const { userId, triggerId, kind } = intent;
    const base = { userId, triggerId, kind };

    // A retried trigger should not pay for sync and generation again
    if (await this.deps.ledger.findSent(triggerId)) {
      return { ...base, status: 'replayed' };
    }

    let recordsIngested: number | undefined;
    const mode = SYNC_BEFORE[kind];

    if (mode !== 'none') {
      const linked = await this.deps.links.isLinked(userId);

      if (!linked && mode === 'required') {
        const result = await this.deps.dispatcher.dispatch(triggerId, userId, TEXTS.notLinked, deadline);
        return { ...base, status: this.statusOf(result.outcome, result.replayed), source: 'static' };
      }

      if (linked) {
        const synced = await this.syncFor(userId, deadline, mode);
        recordsIngested = synced?.recordsIngested;
      }
    }

    const profile = await this.deps.users.getUser(userId);
    const records = await this.deps.records.listRecordsSince(
      userId,
      new Date(this.now() - SUMMARY_LOOKBACK_MS)
    );
    const history = await this.loadHistory(userId);

    const message = await this.deps.generator.generate(
      intent,
      {
        ...(profile?.name ? { name: profile.name } : {}),
        healthSummary: summarizeHealth(records),
        ...(history.length > 0 ? { history } : {}),
        ...(options.userMessage ? { userMessage: options.userMessage } : {}),
      },
      deadline
    );

    const result = await this.deps.dispatcher.dispatch(triggerId, userId, message.body, deadline);
    if (result.outcome === 'sent' && !result.replayed) {
      await this.recordTurns(userId, options.userMessage, message.body);
    }

    return {
      ...base,
      status: this.statusOf(result.outcome, result.replayed),
      source: message.source,
      ...(recordsIngested !== undefined ? { recordsIngested } : {}),
      ...(result.error ? { error: result.error } : {}),
    };
  }

  /**
   * Sync only, for the scheduled health-data job. Unlinked users are skipped.
   */
  async syncUser(userId: string, deadline: Deadline): Promise<SyncResult | null> {
    if (!(await this.deps.links.isLinked(userId))) return null;
    return this.deps.sync.sync(userId, deadline);
  }

  private async syncFor(userId: string, deadline: Deadline, mode: SyncMode): Promise<SyncResult | null> {
    if (mode === 'required') {
      return this.deps.sync.sync(userId, deadline);
    }

    try {
      return await this.deps.sync.sync(userId, deadline);
    } catch (err) {
      if (err instanceof DeadlineExceededError) throw err;
      // stale data is fine for a check-in
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[engagement] sync skipped for ${userId}: ${message}`);
      return null;
    }
  }

  private async loadHistory(userId: string): Promise<ChatTurn[]> {
    try {
      const turns = await this.deps.chats.listRecentChatMessages(userId, this.historyTurns);
      return turns.map(({ role, text }) => ({ role, text }));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.warn(`[engagement] chat history unavailable for ${userId}: ${message}`);
      return [];
    }
  }

  /**
   * The message is already delivered, so a failed write is logged rather than thrown
   */
  private async recordTurns(userId: string, userMessage: string | undefined, reply: string): Promise<void> {
    const createdAt = new Date(this.now());
    try {
      if (userMessage) {
        await this.deps.chats.appendChatMessage({ userId, role: 'user', text: userMessage, createdAt });
      }
      await this.deps.chats.appendChatMessage({ userId, role: 'assistant', text: reply, createdAt });
    } catch (err) {
      console.error(`[engagement] could not store chat turns for ${userId}:`, err);
    }
  }

  private statusOf(outcome: 'sent' | 'failed', replayed: boolean): DeliveryReport['status'] {
    if (outcome === 'failed') return 'rejected';
    return replayed ? 'replayed' : 'sent';
  }
}
