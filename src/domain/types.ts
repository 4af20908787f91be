// src/domain/types.ts
// Core entities shared by the vault, sync, generator, dispatcher and router

/**
 * OAuth token pair for a user's WHOOP link.
 * `version` increments on every refresh and guards compare-and-swap writes.
 */
export interface TokenRecord {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  scope: string;
  version: number;
}

/**
 * Incremental sync progress, one per user
 */
export interface SyncCursor {
  userId: string;
  lastSyncedAt: Date;
  lastRecordId: string | null;
}

export type MetricType =
  | 'sleep_performance'
  | 'sleep_duration_ms'
  | 'slow_wave_sleep_ms'
  | 'rem_sleep_ms'
  | 'recovery_score'
  | 'resting_heart_rate'
  | 'hrv_rmssd'
  | 'strain'
  | 'kilojoules'
  | 'average_heart_rate';

/**
 * Immutable biometric sample. Deduplicated by (userId, metricType, recordedAt).
 */
export interface HealthRecord {
  userId: string;
  metricType: MetricType;
  value: number;
  recordedAt: Date;
  ingestedAt: Date;
  sourceRecordId: string;
}

export type MessageKind = 'morning_motivation' | 'check_in' | 'health_update';

export interface MessageIntent {
  userId: string;
  kind: MessageKind;
  triggerId: string;
}

export type DispatchOutcome = 'sent' | 'failed';

export interface DispatchRecord {
  triggerId: string;
  userId: string;
  sentAt: Date;
  outcome: DispatchOutcome;
  platformMessageId?: string;
  error?: string;
}

export interface UserProfile {
  userId: string;
  chatId: string;
  name?: string;
  joinedAt: Date;
}

export type ChatRole = 'user' | 'assistant';

/**
 * One turn of the Telegram conversation, kept so replies can see what came before
 */
export interface ChatMessage {
  userId: string;
  role: ChatRole;
  text: string;
  createdAt: Date;
}

export interface OAuthState {
  state: string;
  userId: string;
  expiresAt: Date;
}
