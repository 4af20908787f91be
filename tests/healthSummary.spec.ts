import { describe, expect, it } from 'vitest';
import type { HealthRecord, MetricType } from '../src/domain/types';
import { markdownToTelegramHtml, millisToHhmm, summarizeHealth } from '../src/services/healthSummary';
import { renderFallback, TEXTS } from '../src/services/templates';

function record(metricType: MetricType, value: number, recordedAt: string): HealthRecord {
  return {
    userId: '42',
    metricType,
    value,
    recordedAt: new Date(recordedAt),
    ingestedAt: new Date('2026-03-02T09:00:00.000Z'),
    sourceRecordId: `test:${metricType}`,
  };
}

describe('millisToHhmm', () => {
  it('formats hours and minutes with leading zeros', () => {
    expect(millisToHhmm(27_000_000)).toBe('07:30');
    expect(millisToHhmm(59_999)).toBe('00:00');
    expect(millisToHhmm(36_000_000 + 5 * 60_000)).toBe('10:05');
  });
});

describe('summarizeHealth', () => {
  it('lists the newest value of each metric in a fixed order', () => {
    const summary = summarizeHealth([
      record('strain', 14.2, '2026-03-01T18:00:00.000Z'),
      record('recovery_score', 41, '2026-03-01T06:00:00.000Z'),
      record('recovery_score', 63.6, '2026-03-02T06:00:00.000Z'),
      record('hrv_rmssd', 52.44, '2026-03-02T06:00:00.000Z'),
      record('sleep_duration_ms', 27_000_000, '2026-03-02T05:50:00.000Z'),
    ]);

    expect(summary).toBe('Sleep duration: 07:30\nRecovery score: 64%\nHRV: 52.4 ms\nStrain: 14.2');
  });

  it('returns null without records', () => {
    expect(summarizeHealth([])).toBeNull();
  });
});

describe('markdownToTelegramHtml', () => {
  it('leaves an unmatched marker as text', () => {
    expect(markdownToTelegramHtml('**Drink** water **now')).toBe('<b>Drink</b> water **now');
  });

  it('escapes markup the model produced', () => {
    expect(markdownToTelegramHtml('<script>x</script>')).toBe('&lt;script&gt;x&lt;/script&gt;');
  });
});

describe('templates', () => {
  it('escapes names in greetings', () => {
    expect(TEXTS.welcome('<Ada>')).toMatch(/^Welcome, &lt;Ada&gt;! 🤖\n\n/);
    expect(renderFallback('check_in', { name: 'Ada & Bo' })).toBe(
      'Hey, Ada &amp; Bo, quick check-in: how are you feeling right now? ' +
        'A short walk or a glass of water is a good reset if the day is getting away from you.'
    );
  });

  it('explains missing data in a health update', () => {
    expect(renderFallback('health_update', { healthSummary: null })).toBe(
      'No recent WHOOP data yet. Make sure your strap is synced with the WHOOP app.'
    );
  });

  it('escapes the authorize URL in the link prompt', () => {
    expect(TEXTS.linkPrompt('https://whoop.example.com/oauth?a=1&b=2')).toBe(
      'Tap to connect your WHOOP account:\n<a href="https://whoop.example.com/oauth?a=1&amp;b=2">Link WHOOP</a>\n\n' +
        'The link expires in 10 minutes.'
    );
  });
});
