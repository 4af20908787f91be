// src/services/whoop/types.ts
// WHOOP developer API payloads, validated at the boundary with zod

import { z } from 'zod';

export type WhoopCollection = 'sleep' | 'recovery' | 'workout';

export const WHOOP_COLLECTIONS: readonly WhoopCollection[] = ['sleep', 'recovery', 'workout'];

const recordId = z.union([z.number(), z.string()]).transform(String);

const scoreState = z.enum(['SCORED', 'PENDING_SCORE', 'UNSCORABLE']);

export const sleepRecordSchema = z.object({
  id: recordId,
  start: z.string(),
  end: z.string(),
  nap: z.boolean().optional(),
  score_state: scoreState,
  score: z
    .object({
      stage_summary: z.object({
        total_in_bed_time_milli: z.number(),
        total_awake_time_milli: z.number(),
        total_light_sleep_time_milli: z.number(),
        total_slow_wave_sleep_time_milli: z.number(),
        total_rem_sleep_time_milli: z.number(),
        sleep_cycle_count: z.number().optional(),
      }),
      sleep_performance_percentage: z.number().nullish(),
      sleep_efficiency_percentage: z.number().nullish(),
    })
    .nullish(),
});

export const recoveryRecordSchema = z.object({
  cycle_id: recordId,
  sleep_id: recordId.nullish(),
  created_at: z.string(),
  score_state: scoreState,
  score: z
    .object({
      recovery_score: z.number(),
      resting_heart_rate: z.number(),
      hrv_rmssd_milli: z.number(),
    })
    .nullish(),
});

export const workoutRecordSchema = z.object({
  id: recordId,
  start: z.string(),
  end: z.string(),
  sport_id: z.number().optional(),
  score_state: scoreState,
  score: z
    .object({
      strain: z.number(),
      average_heart_rate: z.number(),
      max_heart_rate: z.number().optional(),
      kilojoule: z.number(),
    })
    .nullish(),
});

export type WhoopSleep = z.infer<typeof sleepRecordSchema>;
export type WhoopRecovery = z.infer<typeof recoveryRecordSchema>;
export type WhoopWorkout = z.infer<typeof workoutRecordSchema>;

export type WhoopPage =
  | { collection: 'sleep'; records: WhoopSleep[]; nextToken: string | null }
  | { collection: 'recovery'; records: WhoopRecovery[]; nextToken: string | null }
  | { collection: 'workout'; records: WhoopWorkout[]; nextToken: string | null };

export function pageSchema<T extends z.ZodTypeAny>(record: T) {
  return z.object({
    records: z.array(record).default([]),
    next_token: z.string().nullish(),
  });
}

export const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().positive(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export const oauthErrorSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * Result of an authorization-code exchange or a refresh
 */
export interface TokenGrant {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date;
  scope: string;
}

export interface PageRequest {
  collection: WhoopCollection;
  start: Date;
  end: Date;
  nextToken?: string;
}
