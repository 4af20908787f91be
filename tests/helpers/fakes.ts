// tests/helpers/fakes.ts
// In-process stand-ins for Telegram, WHOOP, the generative API and Google's token verifier

import type { TokenPayload } from 'google-auth-library';
import type OpenAI from 'openai';
import type { AuthorizationCodeClient } from '../../src/services/accountLinking';
import type { ChatCompletionsApi } from '../../src/services/contentGenerator';
import type { IdTokenVerifier } from '../../src/services/identity';
import type { Messenger, SentMessage } from '../../src/services/telegram';
import type { CollectionSource } from '../../src/services/whoop/client';
import type { TokenRefresher } from '../../src/services/whoop/tokenVault';
import type {
  PageRequest,
  TokenGrant,
  WhoopCollection,
  WhoopPage,
  WhoopRecovery,
  WhoopSleep,
  WhoopWorkout,
} from '../../src/services/whoop/types';

export const T0 = Date.parse('2026-03-02T09:00:07.000Z');
export const HOUR = 60 * 60 * 1000;

export class FakeClock {
  constructor(public current: number = T0) {}

  now = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

// ------------------------------------------------------------------
// Telegram
// ------------------------------------------------------------------

export class FakeMessenger implements Messenger {
  readonly sent: Array<{ chatId: string; html: string }> = [];
  private readonly failures = new Map<string, Error[]>();
  attempts = 0;
  /** Real time each send takes before it lands */
  latencyMs = 0;

  failNext(chatId: string, ...errors: Error[]): void {
    this.failures.set(chatId, [...(this.failures.get(chatId) ?? []), ...errors]);
  }

  async send(chatId: string, html: string): Promise<SentMessage> {
    this.attempts++;
    if (this.latencyMs > 0) await new Promise((resolve) => setTimeout(resolve, this.latencyMs));
    const failure = this.failures.get(chatId)?.shift();
    if (failure) throw failure;

    this.sent.push({ chatId, html });
    return { messageId: String(this.sent.length) };
  }

  textsFor(chatId: string): string[] {
    return this.sent.filter((m) => m.chatId === chatId).map((m) => m.html);
  }
}

export interface TextUpdateOptions {
  chatType?: string;
  firstName?: string;
}

export function textUpdate(
  updateId: number,
  chatId: number,
  messageId: number,
  text: string,
  options: TextUpdateOptions = {}
) {
  return {
    update_id: updateId,
    message: {
      message_id: messageId,
      date: 1_772_442_007,
      chat: { id: chatId, type: options.chatType ?? 'private' },
      from: { id: chatId, is_bot: false, first_name: options.firstName ?? 'Ada' },
      text,
    },
  };
}

// ------------------------------------------------------------------
// Generative API
// ------------------------------------------------------------------

export function completion(content: string | null): OpenAI.ChatCompletion {
  return {
    id: 'chatcmpl-test',
    object: 'chat.completion',
    created: 0,
    model: 'test-model',
    choices: [
      {
        index: 0,
        finish_reason: 'stop',
        logprobs: null,
        message: { role: 'assistant', content, refusal: null },
      },
    ],
  };
}

export class FakeCompletions implements ChatCompletionsApi {
  readonly requests: OpenAI.ChatCompletionCreateParamsNonStreaming[] = [];
  reply: string | null | Error = 'Keep going, you are doing great.';
  onCall?: () => void;

  async create(body: OpenAI.ChatCompletionCreateParamsNonStreaming): Promise<OpenAI.ChatCompletion> {
    this.requests.push(body);
    this.onCall?.();
    if (this.reply instanceof Error) throw this.reply;
    return completion(this.reply);
  }
}

// ------------------------------------------------------------------
// Google identity
// ------------------------------------------------------------------

export const SERVICE_URL = 'https://svc.example.com';
export const SCHEDULER_EMAIL = 'scheduler@test-project.iam.gserviceaccount.com';

export function schedulerPayload(overrides: Partial<TokenPayload> = {}): TokenPayload {
  return {
    iss: 'https://accounts.google.com',
    sub: '1000000000000000001',
    aud: SERVICE_URL,
    iat: 0,
    exp: 0,
    email: SCHEDULER_EMAIL,
    email_verified: true,
    ...overrides,
  };
}

export class FakeVerifier implements IdTokenVerifier {
  readonly calls: Array<{ idToken: string; audience: string | string[] }> = [];
  readonly tokens = new Map<string, TokenPayload>();

  async verifyIdToken(options: { idToken: string; audience: string | string[] }) {
    this.calls.push(options);
    const payload = this.tokens.get(options.idToken);
    if (!payload) throw new Error('Invalid token signature');

    const audiences = Array.isArray(options.audience) ? options.audience : [options.audience];
    if (!audiences.includes(payload.aud)) {
      throw new Error('Wrong recipient, payload audience != requiredAudience');
    }
    return { getPayload: () => payload };
  }
}

// ------------------------------------------------------------------
// WHOOP
// ------------------------------------------------------------------

export class FakeWhoopOAuth implements AuthorizationCodeClient, TokenRefresher {
  readonly refreshed: string[] = [];
  readonly exchanged: string[] = [];

  refreshImpl: (refreshToken: string) => Promise<TokenGrant>;
  exchangeImpl: (code: string) => Promise<TokenGrant>;

  constructor(clock: FakeClock) {
    this.refreshImpl = async () => ({
      accessToken: 'access-refreshed',
      refreshToken: 'refresh-rotated',
      expiresAt: new Date(clock.now() + HOUR),
      scope: 'offline read:sleep',
    });
    this.exchangeImpl = async () => ({
      accessToken: 'access-linked',
      refreshToken: 'refresh-linked',
      expiresAt: new Date(clock.now() + HOUR),
      scope: 'offline read:sleep',
    });
  }

  authorizeUrl(state: string): string {
    return `https://whoop.example.com/oauth?state=${state}`;
  }

  exchangeCode(code: string): Promise<TokenGrant> {
    this.exchanged.push(code);
    return this.exchangeImpl(code);
  }

  refresh(refreshToken: string): Promise<TokenGrant> {
    this.refreshed.push(refreshToken);
    return this.refreshImpl(refreshToken);
  }
}

function emptyPage(collection: WhoopCollection): WhoopPage {
  switch (collection) {
    case 'sleep':
      return { collection, records: [], nextToken: null };
    case 'recovery':
      return { collection, records: [], nextToken: null };
    case 'workout':
      return { collection, records: [], nextToken: null };
  }
}

/**
 * Serves pages by (collection, nextToken). Anything unscripted is an empty last page.
 */
export class ScriptedSource implements CollectionSource {
  readonly calls: Array<{ accessToken: string; request: PageRequest }> = [];
  private readonly pages = new Map<string, WhoopPage>();
  private readonly failures = new Map<WhoopCollection, Error[]>();

  addPage(page: WhoopPage, token?: string): this {
    this.pages.set(`${page.collection}:${token ?? ''}`, page);
    return this;
  }

  failNext(collection: WhoopCollection, ...errors: Error[]): this {
    this.failures.set(collection, [...(this.failures.get(collection) ?? []), ...errors]);
    return this;
  }

  async fetchPage(accessToken: string, request: PageRequest): Promise<WhoopPage> {
    this.calls.push({ accessToken, request: { ...request } });
    const failure = this.failures.get(request.collection)?.shift();
    if (failure) throw failure;
    return this.pages.get(`${request.collection}:${request.nextToken ?? ''}`) ?? emptyPage(request.collection);
  }
}

export function scoredSleep(id: number, end: string, performance: number = 85): WhoopSleep {
  return {
    id: String(id),
    start: new Date(Date.parse(end) - 8 * HOUR).toISOString(),
    end,
    score_state: 'SCORED',
    score: {
      stage_summary: {
        total_in_bed_time_milli: 28_800_000,
        total_awake_time_milli: 1_800_000,
        total_light_sleep_time_milli: 14_400_000,
        total_slow_wave_sleep_time_milli: 5_400_000,
        total_rem_sleep_time_milli: 7_200_000,
      },
      sleep_performance_percentage: performance,
    },
  };
}

export function scoredRecovery(
  cycleId: number,
  createdAt: string,
  score: { recovery: number; restingHeartRate: number; hrv: number }
): WhoopRecovery {
  return {
    cycle_id: String(cycleId),
    created_at: createdAt,
    score_state: 'SCORED',
    score: {
      recovery_score: score.recovery,
      resting_heart_rate: score.restingHeartRate,
      hrv_rmssd_milli: score.hrv,
    },
  };
}

export function scoredWorkout(id: number, start: string, strain: number): WhoopWorkout {
  return {
    id: String(id),
    start,
    end: new Date(Date.parse(start) + HOUR).toISOString(),
    score_state: 'SCORED',
    score: { strain, average_heart_rate: 141, kilojoule: 1850 },
  };
}
