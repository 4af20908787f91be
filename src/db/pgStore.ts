// src/db/pgStore.ts
// Postgres-backed repositories. Tokens are encrypted before they leave the process.

import type {
  ChatMessage,
  ChatRole,
  DispatchOutcome,
  DispatchRecord,
  HealthRecord,
  MetricType,
  OAuthState,
  SyncCursor,
  TokenRecord,
  UserProfile,
} from '../domain/types';
import { FieldContext, TokenCipher } from '../services/encryption';
import type { SqlClient } from './pool';
import type { Store } from './store';

interface TokenRow {
  access_token_encrypted: string;
  refresh_token_encrypted: string;
  expires_at: Date;
  scope: string;
  version: number;
}

interface CursorRow {
  user_id: string;
  last_synced_at: Date;
  last_record_id: string | null;
}

interface HealthRecordRow {
  user_id: string;
  metric_type: MetricType;
  value: number;
  recorded_at: Date;
  ingested_at: Date;
  source_record_id: string;
}

interface DispatchRow {
  trigger_id: string;
  user_id: string;
  sent_at: Date;
  outcome: DispatchOutcome;
  platform_message_id: string | null;
  error: string | null;
}

interface UserRow {
  user_id: string;
  chat_id: string;
  name: string | null;
  joined_at: Date;
}

interface OAuthStateRow {
  state: string;
  user_id: string;
  expires_at: Date;
}

interface ChatMessageRow {
  user_id: string;
  role: ChatRole;
  text: string;
  created_at: Date;
}

// 6 columns per record, Postgres allows 65535 parameters per statement
const INSERT_BATCH_SIZE = 500;

function toCursor(row: CursorRow): SyncCursor {
  return {
    userId: row.user_id,
    lastSyncedAt: row.last_synced_at,
    lastRecordId: row.last_record_id,
  };
}

function toUser(row: UserRow): UserProfile {
  return {
    userId: row.user_id,
    chatId: row.chat_id,
    ...(row.name ? { name: row.name } : {}),
    joinedAt: row.joined_at,
  };
}

export class PgStore implements Store {
  constructor(
    private readonly db: SqlClient,
    private readonly cipher: TokenCipher,
    private readonly onClose: () => Promise<void> = async () => undefined
  ) {}

  // ------------------------------------------------------------------
  // Tokens
  // ------------------------------------------------------------------

  async getToken(userId: string): Promise<TokenRecord | null> {
    const result = await this.db.query<TokenRow>(
      `SELECT access_token_encrypted, refresh_token_encrypted, expires_at, scope, version
       FROM whoop_tokens WHERE user_id = $1`,
      [userId]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      accessToken: this.cipher.decrypt(row.access_token_encrypted, FieldContext.ACCESS_TOKEN),
      refreshToken: this.cipher.decrypt(row.refresh_token_encrypted, FieldContext.REFRESH_TOKEN),
      expiresAt: row.expires_at,
      scope: row.scope,
      version: row.version,
    };
  }

  async putToken(userId: string, record: TokenRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO whoop_tokens
         (user_id, access_token_encrypted, refresh_token_encrypted, expires_at, scope, version, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6, NOW())
       ON CONFLICT (user_id) DO UPDATE SET
         access_token_encrypted = EXCLUDED.access_token_encrypted,
         refresh_token_encrypted = EXCLUDED.refresh_token_encrypted,
         expires_at = EXCLUDED.expires_at,
         scope = EXCLUDED.scope,
         version = EXCLUDED.version,
         updated_at = NOW()`,
      this.tokenParams(userId, record)
    );
  }

  async replaceToken(userId: string, next: TokenRecord, expectedVersion: number): Promise<boolean> {
    const result = await this.db.query(
      `UPDATE whoop_tokens SET
         access_token_encrypted = $2,
         refresh_token_encrypted = $3,
         expires_at = $4,
         scope = $5,
         version = $6,
         updated_at = NOW()
       WHERE user_id = $1 AND version = $7`,
      [...this.tokenParams(userId, next), expectedVersion]
    );
    return result.rowCount === 1;
  }

  async deleteToken(userId: string): Promise<boolean> {
    const result = await this.db.query('DELETE FROM whoop_tokens WHERE user_id = $1', [userId]);
    return (result.rowCount ?? 0) > 0;
  }

  async listLinkedUserIds(): Promise<string[]> {
    const result = await this.db.query<{ user_id: string }>(
      'SELECT user_id FROM whoop_tokens ORDER BY user_id'
    );
    return result.rows.map((row) => row.user_id);
  }

  private tokenParams(userId: string, record: TokenRecord): unknown[] {
    return [
      userId,
      this.cipher.encrypt(record.accessToken, FieldContext.ACCESS_TOKEN),
      this.cipher.encrypt(record.refreshToken, FieldContext.REFRESH_TOKEN),
      record.expiresAt,
      record.scope,
      record.version,
    ];
  }

  // ------------------------------------------------------------------
  // Sync cursors
  // ------------------------------------------------------------------

  async getCursor(userId: string): Promise<SyncCursor | null> {
    const result = await this.db.query<CursorRow>(
      'SELECT user_id, last_synced_at, last_record_id FROM sync_cursors WHERE user_id = $1',
      [userId]
    );
    const row = result.rows[0];
    return row ? toCursor(row) : null;
  }

  async saveCursor(cursor: SyncCursor): Promise<SyncCursor> {
    const result = await this.db.query<CursorRow>(
      `INSERT INTO sync_cursors (user_id, last_synced_at, last_record_id, updated_at)
       VALUES ($1, $2, $3, NOW())
       ON CONFLICT (user_id) DO UPDATE SET
         last_synced_at = GREATEST(sync_cursors.last_synced_at, EXCLUDED.last_synced_at),
         last_record_id = CASE
           WHEN EXCLUDED.last_synced_at >= sync_cursors.last_synced_at THEN EXCLUDED.last_record_id
           ELSE sync_cursors.last_record_id
         END,
         updated_at = NOW()
       RETURNING user_id, last_synced_at, last_record_id`,
      [cursor.userId, cursor.lastSyncedAt, cursor.lastRecordId]
    );
    const row = result.rows[0];
    return row ? toCursor(row) : cursor;
  }

  async deleteCursor(userId: string): Promise<void> {
    await this.db.query('DELETE FROM sync_cursors WHERE user_id = $1', [userId]);
  }

  // ------------------------------------------------------------------
  // Health records
  // ------------------------------------------------------------------

  async upsertRecords(records: HealthRecord[]): Promise<{ inserted: number }> {
    let inserted = 0;

    for (let i = 0; i < records.length; i += INSERT_BATCH_SIZE) {
      const batch = records.slice(i, i + INSERT_BATCH_SIZE);
      const values: unknown[] = [];
      const tuples = batch.map((record, index) => {
        const base = index * 6;
        values.push(
          record.userId,
          record.metricType,
          record.value,
          record.recordedAt,
          record.ingestedAt,
          record.sourceRecordId
        );
        return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
      });

      const result = await this.db.query(
        `INSERT INTO health_records
           (user_id, metric_type, value, recorded_at, ingested_at, source_record_id)
         VALUES ${tuples.join(', ')}
         ON CONFLICT (user_id, metric_type, recorded_at) DO NOTHING`,
        values
      );
      inserted += result.rowCount ?? 0;
    }

    return { inserted };
  }

  async listRecordsSince(userId: string, since: Date): Promise<HealthRecord[]> {
    const result = await this.db.query<HealthRecordRow>(
      `SELECT user_id, metric_type, value, recorded_at, ingested_at, source_record_id
       FROM health_records
       WHERE user_id = $1 AND recorded_at >= $2
       ORDER BY recorded_at DESC`,
      [userId, since]
    );
    return result.rows.map((row) => ({
      userId: row.user_id,
      metricType: row.metric_type,
      value: Number(row.value),
      recordedAt: row.recorded_at,
      ingestedAt: row.ingested_at,
      sourceRecordId: row.source_record_id,
    }));
  }

  // ------------------------------------------------------------------
  // Dispatch ledger
  // ------------------------------------------------------------------

  async findSent(triggerId: string): Promise<DispatchRecord | null> {
    const result = await this.db.query<DispatchRow>(
      `SELECT trigger_id, user_id, sent_at, outcome, platform_message_id, error
       FROM dispatch_records WHERE trigger_id = $1 AND outcome = 'sent'`,
      [triggerId]
    );
    const row = result.rows[0];
    if (!row) return null;

    return {
      triggerId: row.trigger_id,
      userId: row.user_id,
      sentAt: row.sent_at,
      outcome: row.outcome,
      ...(row.platform_message_id ? { platformMessageId: row.platform_message_id } : {}),
      ...(row.error ? { error: row.error } : {}),
    };
  }

  async record(entry: DispatchRecord): Promise<void> {
    await this.db.query(
      `INSERT INTO dispatch_records (trigger_id, user_id, sent_at, outcome, platform_message_id, error)
       VALUES ($1, $2, $3, $4, $5, $6)
       ON CONFLICT (trigger_id) DO UPDATE SET
         user_id = EXCLUDED.user_id,
         sent_at = EXCLUDED.sent_at,
         outcome = EXCLUDED.outcome,
         platform_message_id = EXCLUDED.platform_message_id,
         error = EXCLUDED.error
       WHERE dispatch_records.outcome <> 'sent'`,
      [
        entry.triggerId,
        entry.userId,
        entry.sentAt,
        entry.outcome,
        entry.platformMessageId ?? null,
        entry.error ?? null,
      ]
    );
  }

  // ------------------------------------------------------------------
  // Users
  // ------------------------------------------------------------------

  async getUser(userId: string): Promise<UserProfile | null> {
    const result = await this.db.query<UserRow>(
      'SELECT user_id, chat_id, name, joined_at FROM users WHERE user_id = $1',
      [userId]
    );
    const row = result.rows[0];
    return row ? toUser(row) : null;
  }

  async upsertUser(profile: UserProfile): Promise<UserProfile> {
    const result = await this.db.query<UserRow>(
      `INSERT INTO users (user_id, chat_id, name, joined_at)
       VALUES ($1, $2, $3, $4)
       ON CONFLICT (user_id) DO UPDATE SET
         chat_id = EXCLUDED.chat_id,
         name = COALESCE(EXCLUDED.name, users.name)
       RETURNING user_id, chat_id, name, joined_at`,
      [profile.userId, profile.chatId, profile.name ?? null, profile.joinedAt]
    );
    const row = result.rows[0];
    return row ? toUser(row) : profile;
  }

  async listUsers(): Promise<UserProfile[]> {
    const result = await this.db.query<UserRow>(
      'SELECT user_id, chat_id, name, joined_at FROM users ORDER BY joined_at, user_id'
    );
    return result.rows.map(toUser);
  }

  // ------------------------------------------------------------------
  // OAuth states
  // ------------------------------------------------------------------

  async saveState(state: OAuthState): Promise<void> {
    await this.db.query(
      'INSERT INTO oauth_states (state, user_id, expires_at) VALUES ($1, $2, $3)',
      [state.state, state.userId, state.expiresAt]
    );
  }

  async consumeState(state: string): Promise<OAuthState | null> {
    const result = await this.db.query<OAuthStateRow>(
      'DELETE FROM oauth_states WHERE state = $1 RETURNING state, user_id, expires_at',
      [state]
    );
    const row = result.rows[0];
    return row ? { state: row.state, userId: row.user_id, expiresAt: row.expires_at } : null;
  }

  async purgeExpiredStates(now: Date): Promise<number> {
    const result = await this.db.query('DELETE FROM oauth_states WHERE expires_at < $1', [now]);
    return result.rowCount ?? 0;
  }

  // ------------------------------------------------------------------
  // Chat history
  // ------------------------------------------------------------------

  async appendChatMessage(message: ChatMessage): Promise<void> {
    await this.db.query(
      'INSERT INTO chat_messages (user_id, role, text, created_at) VALUES ($1, $2, $3, $4)',
      [message.userId, message.role, message.text, message.createdAt]
    );
  }

  async listRecentChatMessages(userId: string, limit: number): Promise<ChatMessage[]> {
    if (limit <= 0) return [];
    const result = await this.db.query<ChatMessageRow>(
      `SELECT user_id, role, text, created_at
       FROM chat_messages
       WHERE user_id = $1
       ORDER BY created_at DESC, id DESC
       LIMIT $2`,
      [userId, limit]
    );
    return result.rows
      .map((row) => ({ userId: row.user_id, role: row.role, text: row.text, createdAt: row.created_at }))
      .reverse();
  }

  async close(): Promise<void> {
    await this.onClose();
  }
}
