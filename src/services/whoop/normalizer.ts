// src/services/whoop/normalizer.ts
// WHOOP page → HealthRecord rows. Unscored records are skipped until WHOOP scores them.

import type { HealthRecord, MetricType } from '../../domain/types';
import type { WhoopPage, WhoopRecovery, WhoopSleep, WhoopWorkout } from './types';

type Sample = [MetricType, number | null | undefined];

function toRecords(
  userId: string,
  sourceRecordId: string,
  recordedAt: Date,
  ingestedAt: Date,
  samples: Sample[]
): HealthRecord[] {
  if (Number.isNaN(recordedAt.getTime())) return [];

  const records: HealthRecord[] = [];
  for (const [metricType, value] of samples) {
    if (value === null || value === undefined || !Number.isFinite(value)) continue;
    records.push({ userId, metricType, value, recordedAt, ingestedAt, sourceRecordId });
  }
  return records;
}

function fromSleep(userId: string, sleep: WhoopSleep, ingestedAt: Date): HealthRecord[] {
  if (sleep.score_state !== 'SCORED' || !sleep.score) return [];
  const stages = sleep.score.stage_summary;

  return toRecords(userId, `sleep:${sleep.id}`, new Date(sleep.end), ingestedAt, [
    ['sleep_performance', sleep.score.sleep_performance_percentage],
    [
      'sleep_duration_ms',
      stages.total_light_sleep_time_milli +
        stages.total_slow_wave_sleep_time_milli +
        stages.total_rem_sleep_time_milli,
    ],
    ['slow_wave_sleep_ms', stages.total_slow_wave_sleep_time_milli],
    ['rem_sleep_ms', stages.total_rem_sleep_time_milli],
  ]);
}

function fromRecovery(userId: string, recovery: WhoopRecovery, ingestedAt: Date): HealthRecord[] {
  if (recovery.score_state !== 'SCORED' || !recovery.score) return [];

  return toRecords(userId, `recovery:${recovery.cycle_id}`, new Date(recovery.created_at), ingestedAt, [
    ['recovery_score', recovery.score.recovery_score],
    ['resting_heart_rate', recovery.score.resting_heart_rate],
    ['hrv_rmssd', recovery.score.hrv_rmssd_milli],
  ]);
}

function fromWorkout(userId: string, workout: WhoopWorkout, ingestedAt: Date): HealthRecord[] {
  if (workout.score_state !== 'SCORED' || !workout.score) return [];

  return toRecords(userId, `workout:${workout.id}`, new Date(workout.start), ingestedAt, [
    ['strain', workout.score.strain],
    ['kilojoules', workout.score.kilojoule],
    ['average_heart_rate', workout.score.average_heart_rate],
  ]);
}

export function normalizePage(userId: string, page: WhoopPage, ingestedAt: Date): HealthRecord[] {
  switch (page.collection) {
    case 'sleep':
      return page.records.flatMap((r) => fromSleep(userId, r, ingestedAt));
    case 'recovery':
      return page.records.flatMap((r) => fromRecovery(userId, r, ingestedAt));
    case 'workout':
      return page.records.flatMap((r) => fromWorkout(userId, r, ingestedAt));
  }
}
