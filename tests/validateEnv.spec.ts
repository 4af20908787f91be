import { beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError, validateEnvironment } from '../src/middleware/validateEnv';

function env(overrides: Record<string, string | undefined> = {}): NodeJS.ProcessEnv {
  return {
    URL: 'https://svc.example.com/',
    GCP_PROJECT_ID: 'test-project',
    TELEGRAM_TOKEN: 'test-token',
    TELEGRAM_WEBHOOK_SECRET: 'test-secret',
    WHOOP_CLIENT_ID: 'test-client',
    WHOOP_CLIENT_SECRET: 'test-secret',
    GENAI_API_KEY: 'test-key',
    STORAGE_DRIVER: 'memory',
    SCHEDULER_SERVICE_ACCOUNT: 'scheduler@test-project.iam.gserviceaccount.com',
    ...overrides,
  };
}

function issuesOf(source: NodeJS.ProcessEnv): string[] {
  try {
    validateEnvironment(source);
  } catch (err) {
    if (err instanceof ConfigError) return err.issues;
    throw err;
  }
  return [];
}

describe('validateEnvironment', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  it('builds the typed config with defaults', () => {
    const config = validateEnvironment(env());

    expect(config).toEqual({
      port: 8080,
      nodeEnv: 'development',
      serviceUrl: 'https://svc.example.com',
      projectId: 'test-project',
      telegram: { token: 'test-token', mode: 'webhook', webhookSecret: 'test-secret' },
      whoop: {
        clientId: 'test-client',
        clientSecret: 'test-secret',
        redirectUri: 'https://svc.example.com/whoop/callback',
      },
      genai: {
        apiKey: 'test-key',
        baseUrl: 'https://generativelanguage.googleapis.com/v1beta/openai/',
        model: 'gemini-2.0-flash',
        timeoutMs: 20_000,
      },
      scheduler: {
        serviceAccount: 'scheduler@test-project.iam.gserviceaccount.com',
        local: false,
        timezone: 'UTC',
        bucketMinutes: 60,
      },
      storage: { driver: 'memory' },
      budgets: { requestMs: 280_000, webhookMs: 50_000, tokenSafetyMarginMs: 60_000 },
    });
    expect(console.log).toHaveBeenCalledWith('Environment validation passed');
  });

  it('coerces numbers and flags', () => {
    const config = validateEnvironment(
      env({ PORT: '3000', LOCAL_SCHEDULER: '1', TRIGGER_BUCKET_MINUTES: '15', SCHEDULE_TIMEZONE: 'Europe/Berlin' })
    );

    expect(config.port).toBe(3000);
    expect(config.scheduler).toMatchObject({ local: true, bucketMinutes: 15, timezone: 'Europe/Berlin' });
  });

  it('requires a database and key for postgres storage', () => {
    expect(issuesOf(env({ STORAGE_DRIVER: 'postgres' }))).toEqual([
      'DATABASE_URL: DATABASE_URL is required for postgres storage',
      'ENCRYPTION_KEY: ENCRYPTION_KEY is required for postgres storage',
    ]);
  });

  it('passes postgres settings through', () => {
    const config = validateEnvironment(
      env({ STORAGE_DRIVER: 'postgres', DATABASE_URL: 'postgres://localhost/test', ENCRYPTION_KEY: 'test-key' })
    );

    expect(config.storage).toEqual({
      driver: 'postgres',
      databaseUrl: 'postgres://localhost/test',
      encryptionKey: 'test-key',
    });
  });

  it('requires the webhook secret only in webhook mode', () => {
    expect(issuesOf(env({ TELEGRAM_WEBHOOK_SECRET: undefined }))).toEqual([
      'TELEGRAM_WEBHOOK_SECRET: TELEGRAM_WEBHOOK_SECRET is required in webhook mode',
    ]);
    expect(issuesOf(env({ TELEGRAM_WEBHOOK_SECRET: undefined, BOT_MODE: 'polling', LOCAL_SCHEDULER: 'true' }))).toEqual(
      []
    );
  });

  it('rejects secrets Telegram would not accept', () => {
    expect(issuesOf(env({ TELEGRAM_WEBHOOK_SECRET: 'has spaces' }))).toEqual([
      'TELEGRAM_WEBHOOK_SECRET: TELEGRAM_WEBHOOK_SECRET may only contain A-Z, a-z, 0-9, _ and -',
    ]);
  });

  it('keeps the webhook budget below the request budget', () => {
    expect(issuesOf(env({ WEBHOOK_BUDGET_MS: '300000' }))).toEqual([
      'WEBHOOK_BUDGET_MS: WEBHOOK_BUDGET_MS must be below REQUEST_BUDGET_MS',
    ]);
  });

  it('lists every missing variable at once', () => {
    const issues = issuesOf(env({ TELEGRAM_TOKEN: undefined, GENAI_API_KEY: undefined }));

    expect(issues).toHaveLength(2);
    expect(issues[0]).toMatch(/^TELEGRAM_TOKEN: /);
    expect(issues[1]).toMatch(/^GENAI_API_KEY: /);
    expect(console.error).toHaveBeenCalledWith('Environment validation failed:');
  });

  it('warns when any Google identity may call the scheduled routes', () => {
    validateEnvironment(env({ SCHEDULER_SERVICE_ACCOUNT: undefined }));

    expect(console.warn).toHaveBeenCalledWith(
      '  - SCHEDULER_SERVICE_ACCOUNT is not set - any Google identity with the right audience can trigger jobs'
    );
  });
});
