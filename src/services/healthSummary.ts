// src/services/healthSummary.ts
// Stored health records → short text summary for prompts, reports and templates

import type { HealthRecord, MetricType } from '../domain/types';

type LatestByMetric = Partial<Record<MetricType, HealthRecord>>;

const METRIC_ORDER: Array<[MetricType, string, (value: number) => string]> = [
  ['sleep_performance', 'Sleep performance', (v) => `${Math.round(v)}%`],
  ['sleep_duration_ms', 'Sleep duration', (v) => millisToHhmm(v)],
  ['slow_wave_sleep_ms', 'Slow wave sleep', (v) => millisToHhmm(v)],
  ['rem_sleep_ms', 'REM sleep', (v) => millisToHhmm(v)],
  ['recovery_score', 'Recovery score', (v) => `${Math.round(v)}%`],
  ['resting_heart_rate', 'Resting heart rate', (v) => `${Math.round(v)} bpm`],
  ['hrv_rmssd', 'HRV', (v) => `${v.toFixed(1)} ms`],
  ['strain', 'Strain', (v) => v.toFixed(1)],
  ['kilojoules', 'Energy', (v) => `${Math.round(v)} kJ`],
  ['average_heart_rate', 'Average workout heart rate', (v) => `${Math.round(v)} bpm`],
];

/**
 * Milliseconds → "HH:MM", e.g. 27_000_000 → "07:30"
 */
export function millisToHhmm(milliseconds: number): string {
  const totalMinutes = Math.floor(Math.max(0, milliseconds) / 60_000);
  const hours = Math.floor(totalMinutes / 60);
  const minutes = totalMinutes % 60;
  return `${String(hours).padStart(2, '0')}:${String(minutes).padStart(2, '0')}`;
}

export function latestByMetric(records: HealthRecord[]): LatestByMetric {
  const latest: LatestByMetric = {};
  for (const record of records) {
    const current = latest[record.metricType];
    if (!current || record.recordedAt.getTime() > current.recordedAt.getTime()) {
      latest[record.metricType] = record;
    }
  }
  return latest;
}

/**
 * One "Label: value" line per metric with data, or null when there is none
 */
export function summarizeHealth(records: HealthRecord[]): string | null {
  const latest = latestByMetric(records);
  const lines: string[] = [];

  for (const [metric, label, format] of METRIC_ORDER) {
    const record = latest[metric];
    if (record) lines.push(`${label}: ${format(record.value)}`);
  }

  return lines.length > 0 ? lines.join('\n') : null;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

/**
 * Model output → Telegram HTML. Escapes everything, then turns **bold** pairs into <b>.
 * An unmatched trailing ** is left as text.
 */
export function markdownToTelegramHtml(text: string): string {
  const parts = escapeHtml(text).split('**');
  let html = parts[0] ?? '';

  for (let i = 1; i < parts.length; i += 2) {
    const inner = parts[i] ?? '';
    const after = parts[i + 1];
    if (after === undefined) {
      html += `**${inner}`;
    } else {
      html += `<b>${inner}</b>${after}`;
    }
  }

  return html;
}
