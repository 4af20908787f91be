import type {
  ChatMessage,
  DispatchRecord,
  HealthRecord,
  OAuthState,
  SyncCursor,
  TokenRecord,
  UserProfile,
} from "../domain/types";
import type { Store } from "../db/store";

// Local runs and tests (STORAGE_DRIVER=memory). Nothing survives a restart.
export class InMemoryStore implements Store {
  readonly tokens = new Map<string, TokenRecord>();
  readonly cursors = new Map<string, SyncCursor>();
  readonly healthRecords = new Map<string, HealthRecord>();
  readonly dispatches = new Map<string, DispatchRecord>();
  readonly users = new Map<string, UserProfile>();
  readonly oauthStates = new Map<string, OAuthState>();
  readonly chatMessages: ChatMessage[] = [];

  async getToken(userId: string): Promise<TokenRecord | null> {
    const record = this.tokens.get(userId);
    return record ? { ...record } : null;
  }

  async putToken(userId: string, record: TokenRecord): Promise<void> {
    this.tokens.set(userId, { ...record });
  }

  async replaceToken(userId: string, next: TokenRecord, expectedVersion: number): Promise<boolean> {
    const current = this.tokens.get(userId);
    if (!current || current.version !== expectedVersion) return false;
    this.tokens.set(userId, { ...next });
    return true;
  }

  async deleteToken(userId: string): Promise<boolean> {
    return this.tokens.delete(userId);
  }

  async listLinkedUserIds(): Promise<string[]> {
    return [...this.tokens.keys()].sort();
  }

  async getCursor(userId: string): Promise<SyncCursor | null> {
    const cursor = this.cursors.get(userId);
    return cursor ? { ...cursor } : null;
  }

  async saveCursor(cursor: SyncCursor): Promise<SyncCursor> {
    const current = this.cursors.get(cursor.userId);
    if (current && current.lastSyncedAt.getTime() > cursor.lastSyncedAt.getTime()) {
      return { ...current };
    }
    this.cursors.set(cursor.userId, { ...cursor });
    return { ...cursor };
  }

  async deleteCursor(userId: string): Promise<void> {
    this.cursors.delete(userId);
  }

  async upsertRecords(records: HealthRecord[]): Promise<{ inserted: number }> {
    let inserted = 0;
    for (const record of records) {
      const key = `${record.userId}|${record.metricType}|${record.recordedAt.toISOString()}`;
      if (this.healthRecords.has(key)) continue;
      this.healthRecords.set(key, { ...record });
      inserted++;
    }
    return { inserted };
  }

  async listRecordsSince(userId: string, since: Date): Promise<HealthRecord[]> {
    return [...this.healthRecords.values()]
      .filter((r) => r.userId === userId && r.recordedAt.getTime() >= since.getTime())
      .sort((a, b) => b.recordedAt.getTime() - a.recordedAt.getTime());
  }

  async findSent(triggerId: string): Promise<DispatchRecord | null> {
    const record = this.dispatches.get(triggerId);
    return record && record.outcome === "sent" ? { ...record } : null;
  }

  async record(entry: DispatchRecord): Promise<void> {
    if (this.dispatches.get(entry.triggerId)?.outcome === "sent") return;
    this.dispatches.set(entry.triggerId, { ...entry });
  }

  async getUser(userId: string): Promise<UserProfile | null> {
    const user = this.users.get(userId);
    return user ? { ...user } : null;
  }

  async upsertUser(profile: UserProfile): Promise<UserProfile> {
    const existing = this.users.get(profile.userId);
    const name = profile.name ?? existing?.name;
    const merged: UserProfile = {
      userId: profile.userId,
      chatId: profile.chatId,
      ...(name ? { name } : {}),
      joinedAt: existing?.joinedAt ?? profile.joinedAt,
    };
    this.users.set(profile.userId, merged);
    return { ...merged };
  }

  async listUsers(): Promise<UserProfile[]> {
    return [...this.users.values()]
      .sort((a, b) => a.joinedAt.getTime() - b.joinedAt.getTime() || a.userId.localeCompare(b.userId))
      .map((user) => ({ ...user }));
  }

  async saveState(state: OAuthState): Promise<void> {
    this.oauthStates.set(state.state, { ...state });
  }

  async consumeState(state: string): Promise<OAuthState | null> {
    const found = this.oauthStates.get(state);
    this.oauthStates.delete(state);
    return found ?? null;
  }

  async purgeExpiredStates(now: Date): Promise<number> {
    let purged = 0;
    for (const [key, state] of this.oauthStates) {
      if (state.expiresAt.getTime() < now.getTime()) {
        this.oauthStates.delete(key);
        purged++;
      }
    }
    return purged;
  }

  async appendChatMessage(message: ChatMessage): Promise<void> {
    this.chatMessages.push({ ...message });
  }

  async listRecentChatMessages(userId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) return [];
    return this.chatMessages
      .filter((m) => m.userId === userId)
      .slice(-limit)
      .map((m) => ({ ...m }));
  }

  async close(): Promise<void> {
    // nothing to release
  }
}
