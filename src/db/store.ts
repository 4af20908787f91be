// src/db/store.ts
// Repository interfaces. Postgres and in-memory implementations share them.

import type {
  ChatMessage,
  DispatchRecord,
  HealthRecord,
  OAuthState,
  SyncCursor,
  TokenRecord,
  UserProfile,
} from '../domain/types';

export interface TokenStore {
  getToken(userId: string): Promise<TokenRecord | null>;
  /** Unconditional write, used when a user links their account */
  putToken(userId: string, record: TokenRecord): Promise<void>;
  /**
   * Compare-and-swap on `version`.
   * Returns false when the stored version no longer matches (another refresh won).
   */
  replaceToken(userId: string, next: TokenRecord, expectedVersion: number): Promise<boolean>;
  deleteToken(userId: string): Promise<boolean>;
  listLinkedUserIds(): Promise<string[]>;
}

export interface CursorStore {
  getCursor(userId: string): Promise<SyncCursor | null>;
  /** Never moves `lastSyncedAt` backwards. Returns the stored cursor. */
  saveCursor(cursor: SyncCursor): Promise<SyncCursor>;
  deleteCursor(userId: string): Promise<void>;
}

export interface HealthRecordStore {
  /** Insert, skipping rows whose (userId, metricType, recordedAt) already exists */
  upsertRecords(records: HealthRecord[]): Promise<{ inserted: number }>;
  /** Newest first */
  listRecordsSince(userId: string, since: Date): Promise<HealthRecord[]>;
}

export interface DispatchLedger {
  findSent(triggerId: string): Promise<DispatchRecord | null>;
  /** A record with outcome `sent` is never overwritten */
  record(entry: DispatchRecord): Promise<void>;
}

export interface UserStore {
  getUser(userId: string): Promise<UserProfile | null>;
  /** Keeps the original `joinedAt` on re-registration */
  upsertUser(profile: UserProfile): Promise<UserProfile>;
  listUsers(): Promise<UserProfile[]>;
}

export interface OAuthStateStore {
  saveState(state: OAuthState): Promise<void>;
  /** Single use: the state is removed whether or not it has expired */
  consumeState(state: string): Promise<OAuthState | null>;
  /** Returns how many states had expired before `now` */
  purgeExpiredStates(now: Date): Promise<number>;
}

export interface ChatMessageStore {
  appendChatMessage(message: ChatMessage): Promise<void>;
  /** The latest `limit` turns, oldest first */
  listRecentChatMessages(userId: string, limit: number): Promise<ChatMessage[]>;
}

export interface Store
  extends TokenStore,
    CursorStore,
    HealthRecordStore,
    DispatchLedger,
    UserStore,
    OAuthStateStore,
    ChatMessageStore {
  close(): Promise<void>;
}
