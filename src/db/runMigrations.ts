// src/db/runMigrations.ts
// Auto-run database migrations on startup
import type { SqlClient } from './pool';

const TABLES: Array<{ name: string; sql: string }> = [
  {
    name: 'users',
    sql: `
      CREATE TABLE IF NOT EXISTS users (
        user_id TEXT PRIMARY KEY,
        chat_id TEXT NOT NULL,
        name TEXT,
        joined_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `,
  },
  {
    // access/refresh tokens are AES-256-GCM encrypted
    name: 'whoop_tokens',
    sql: `
      CREATE TABLE IF NOT EXISTS whoop_tokens (
        user_id TEXT PRIMARY KEY,
        access_token_encrypted TEXT NOT NULL,
        refresh_token_encrypted TEXT NOT NULL,
        expires_at TIMESTAMPTZ NOT NULL,
        scope TEXT NOT NULL DEFAULT '',
        version INTEGER NOT NULL DEFAULT 1,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `,
  },
  {
    name: 'sync_cursors',
    sql: `
      CREATE TABLE IF NOT EXISTS sync_cursors (
        user_id TEXT PRIMARY KEY,
        last_synced_at TIMESTAMPTZ NOT NULL,
        last_record_id TEXT,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
    `,
  },
  {
    name: 'health_records',
    sql: `
      CREATE TABLE IF NOT EXISTS health_records (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        metric_type TEXT NOT NULL,
        value DOUBLE PRECISION NOT NULL,
        recorded_at TIMESTAMPTZ NOT NULL,
        ingested_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
        source_record_id TEXT NOT NULL,
        CONSTRAINT health_records_dedup UNIQUE (user_id, metric_type, recorded_at)
      );
      CREATE INDEX IF NOT EXISTS idx_health_records_user_recorded
        ON health_records(user_id, recorded_at DESC);
    `,
  },
  {
    name: 'dispatch_records',
    sql: `
      CREATE TABLE IF NOT EXISTS dispatch_records (
        trigger_id TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        sent_at TIMESTAMPTZ NOT NULL,
        outcome TEXT NOT NULL CHECK (outcome IN ('sent', 'failed')),
        platform_message_id TEXT,
        error TEXT
      );
    `,
  },
  {
    name: 'oauth_states',
    sql: `
      CREATE TABLE IF NOT EXISTS oauth_states (
        state TEXT PRIMARY KEY,
        user_id TEXT NOT NULL,
        expires_at TIMESTAMPTZ NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_oauth_states_expires
        ON oauth_states(expires_at);
    `,
  },
  {
    name: 'chat_messages',
    sql: `
      CREATE TABLE IF NOT EXISTS chat_messages (
        id BIGSERIAL PRIMARY KEY,
        user_id TEXT NOT NULL,
        role TEXT NOT NULL CHECK (role IN ('user', 'assistant')),
        text TEXT NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      );
      CREATE INDEX IF NOT EXISTS idx_chat_messages_user_created
        ON chat_messages(user_id, created_at DESC);
    `,
  },
];

export const TABLE_NAMES = TABLES.map((table) => table.name);

export async function runMigrations(client: SqlClient): Promise<void> {
  console.log('[Migrations] Running database migrations...');

  for (const table of TABLES) {
    await client.query(table.sql);
    console.log(`[Migrations] ✅ ${table.name} ready`);
  }

  // Expired link attempts are never consumed
  const purged = await client.query('DELETE FROM oauth_states WHERE expires_at < NOW()');
  if (purged.rowCount) {
    console.log(`[Migrations] Purged ${purged.rowCount} expired oauth states`);
  }

  console.log('[Migrations] Done');
}
