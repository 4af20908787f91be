// src/services/triggerRouter.ts
// Entry surface for scheduler and Telegram triggers: validate, derive the trigger id,
// run under a budget and map the outcome to an HTTP status

import type { UserStore, TokenStore } from '../db/store';
import { Deadline } from './deadline';
import {
  CoreError,
  httpStatusFor,
  isRetryable,
  RateLimitedError,
  toCoreError,
  ValidationFailedError,
} from './errors';
import type { EngagementService, DeliveryReport } from './engagement';
import type { EventSink } from './events';
import { SchedulerAuthenticator, verifyTelegramSecret } from './identity';
import { TelegramUpdate, telegramUpdateSchema, UpdateHandler, UpdateOutcome } from './updateHandler';

export type ScheduledJob = 'morning_motivation' | 'check_in' | 'update_health_data';

export type RequestState = 'RECEIVED' | 'VALIDATED' | 'PROCESSING' | 'COMPLETED' | 'FAILED';

const TRANSITIONS: Record<RequestState, RequestState[]> = {
  RECEIVED: ['VALIDATED', 'FAILED'],
  VALIDATED: ['PROCESSING', 'FAILED'],
  PROCESSING: ['COMPLETED', 'FAILED'],
  COMPLETED: [],
  FAILED: [],
};

/**
 * One inbound request's lifecycle
 */
export class RequestLifecycle {
  private current: RequestState = 'RECEIVED';
  readonly history: RequestState[] = ['RECEIVED'];

  get state(): RequestState {
    return this.current;
  }

  transition(next: RequestState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal request transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.history.push(next);
  }
}

export interface UserJobOutcome {
  userId: string;
  triggerId: string;
  status: DeliveryReport['status'] | 'synced' | 'skipped' | 'failed';
  source?: DeliveryReport['source'];
  recordsIngested?: number;
  cursorAdvanced?: boolean;
  error?: string;
}

export interface JobReport {
  job: ScheduledJob;
  triggerId: string;
  users: UserJobOutcome[];
}

export interface TriggerResponse {
  status: number;
  body: Record<string, unknown>;
  headers?: Record<string, string>;
}

export interface ScheduledRequest {
  authorization?: string;
  /** X-CloudScheduler-JobName */
  jobName?: string;
  /** X-CloudScheduler-ScheduleTime, identical on every retry of one firing */
  scheduleTime?: string;
}

export interface WebhookRequest {
  secretToken?: string;
  body: unknown;
}

export interface TriggerRouterOptions {
  requestBudgetMs: number;
  webhookBudgetMs: number;
  bucketMinutes: number;
  concurrency?: number;
  now?: () => number;
}

export interface TriggerRouterDeps {
  authenticator: SchedulerAuthenticator;
  webhookSecret?: string;
  users: Pick<UserStore, 'listUsers'>;
  tokens: Pick<TokenStore, 'listLinkedUserIds'>;
  engagement: Pick<EngagementService, 'deliver' | 'syncUser'>;
  updates: Pick<UpdateHandler, 'handle'>;
  events: EventSink;
}

/**
 * Bucket start for `at`, e.g. 09:00:07 with 60-minute buckets → 09:00:00.000Z
 */
export function bucketStart(at: Date, bucketMinutes: number): Date {
  const size = bucketMinutes * 60_000;
  return new Date(Math.floor(at.getTime() / size) * size);
}

export function deriveScheduledTriggerId(
  job: ScheduledJob,
  request: ScheduledRequest,
  bucketMinutes: number,
  now: Date
): string {
  const jobName = request.jobName?.trim() || job;
  const scheduled = request.scheduleTime ? new Date(request.scheduleTime) : now;
  const at = Number.isNaN(scheduled.getTime()) ? now : scheduled;
  return `${jobName}@${bucketStart(at, bucketMinutes).toISOString()}`;
}

export class TriggerRouter {
  private readonly concurrency: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: TriggerRouterDeps,
    private readonly options: TriggerRouterOptions
  ) {
    this.concurrency = options.concurrency ?? 5;
    this.now = options.now ?? Date.now;
  }

  async handleScheduled(job: ScheduledJob, request: ScheduledRequest): Promise<TriggerResponse> {
    const lifecycle = new RequestLifecycle();
    let triggerId: string | undefined;

    try {
      await this.deps.authenticator.authenticate(request.authorization);
      triggerId = deriveScheduledTriggerId(job, request, this.options.bucketMinutes, new Date(this.now()));
      lifecycle.transition('VALIDATED');
    } catch (err) {
      return this.fail(lifecycle, toCoreError(err, 'identity verification'), { job });
    }

    const deadline = new Deadline(this.options.requestBudgetMs, this.now);
    try {
      lifecycle.transition('PROCESSING');
      const report = await this.runJob(job, triggerId, deadline);
      lifecycle.transition('COMPLETED');
      this.deps.events.emit('trigger_completed', 'INFO', {
        job,
        triggerId,
        users: report.users.length,
        failed: report.users.filter((u) => u.status === 'failed').length,
      });
      return { status: 200, body: { ok: true, data: report } };
    } catch (err) {
      return this.fail(lifecycle, toCoreError(err, job), { job, triggerId });
    } finally {
      deadline.release();
    }
  }

  /**
   * Same jobs without the identity check, for the in-process cron
   */
  async runScheduled(job: ScheduledJob): Promise<JobReport> {
    const triggerId = deriveScheduledTriggerId(job, {}, this.options.bucketMinutes, new Date(this.now()));
    const deadline = new Deadline(this.options.requestBudgetMs, this.now);
    try {
      return await this.runJob(job, triggerId, deadline);
    } finally {
      deadline.release();
    }
  }

  async handleWebhook(request: WebhookRequest): Promise<TriggerResponse> {
    const lifecycle = new RequestLifecycle();

    let update: TelegramUpdate;
    try {
      verifyTelegramSecret(request.secretToken, this.deps.webhookSecret);
      const parsed = telegramUpdateSchema.safeParse(request.body);
      if (!parsed.success) {
        throw new ValidationFailedError('Body is not a Telegram update', 400);
      }
      update = parsed.data;
      lifecycle.transition('VALIDATED');
    } catch (err) {
      return this.fail(lifecycle, toCoreError(err, 'webhook validation'), { job: 'telegram' });
    }

    const outcome = await this.processUpdate(update, lifecycle);
    return { status: 200, body: { ok: true, data: outcome } };
  }

  /**
   * Shared by the webhook and the long-polling loop. Update failures are answered
   * in the chat, never with a retryable status.
   */
  async processUpdate(
    update: TelegramUpdate,
    lifecycle: RequestLifecycle = new RequestLifecycle()
  ): Promise<UpdateOutcome> {
    if (lifecycle.state === 'RECEIVED') lifecycle.transition('VALIDATED');

    const deadline = new Deadline(this.options.webhookBudgetMs, this.now);
    try {
      lifecycle.transition('PROCESSING');
      const outcome = await this.deps.updates.handle(update, deadline);
      lifecycle.transition(outcome.status === 'failed' ? 'FAILED' : 'COMPLETED');
      return outcome;
    } finally {
      deadline.release();
    }
  }

  /**
   * Long-polling entry: Telegram itself is the caller, so there is no secret to check
   */
  async processPolledUpdate(raw: unknown): Promise<UpdateOutcome> {
    const parsed = telegramUpdateSchema.safeParse(raw);
    if (!parsed.success) {
      console.warn('[router] ignoring polled update with unexpected shape');
      return { status: 'skipped' };
    }
    return this.processUpdate(parsed.data);
  }

  private async runJob(job: ScheduledJob, triggerId: string, deadline: Deadline): Promise<JobReport> {
    let users: UserJobOutcome[];

    switch (job) {
      case 'morning_motivation':
      case 'check_in': {
        const profiles = await this.deps.users.listUsers();
        users = await this.fanOut(
          profiles.map((p) => p.userId),
          triggerId,
          deadline,
          async (userId, userTriggerId) => {
            const report = await this.deps.engagement.deliver(
              { userId, triggerId: userTriggerId, kind: job },
              deadline
            );
            return {
              userId,
              triggerId: userTriggerId,
              status: report.status,
              ...(report.source ? { source: report.source } : {}),
              ...(report.recordsIngested !== undefined ? { recordsIngested: report.recordsIngested } : {}),
              ...(report.error ? { error: report.error } : {}),
            };
          }
        );
        break;
      }

      case 'update_health_data': {
        const linked = await this.deps.tokens.listLinkedUserIds();
        users = await this.fanOut(linked, triggerId, deadline, async (userId, userTriggerId) => {
          const result = await this.deps.engagement.syncUser(userId, deadline);
          if (!result) return { userId, triggerId: userTriggerId, status: 'skipped' };
          return {
            userId,
            triggerId: userTriggerId,
            status: 'synced',
            recordsIngested: result.recordsIngested,
            cursorAdvanced: result.cursorAdvanced,
          };
        });
        break;
      }
    }

    console.log(`[router] ${triggerId}: ${users.length} users processed`);
    return { job, triggerId, users };
  }

  /**
   * Bounded-concurrency fan-out. A retryable failure for any user fails the whole
   * trigger so the scheduler retries it (users already sent replay). Permanent
   * failures are reported per user.
   */
  private async fanOut(
    userIds: string[],
    triggerId: string,
    deadline: Deadline,
    work: (userId: string, userTriggerId: string) => Promise<UserJobOutcome>
  ): Promise<UserJobOutcome[]> {
    const outcomes: UserJobOutcome[] = [];
    let retryable: CoreError | null = null;

    for (let i = 0; i < userIds.length; i += this.concurrency) {
      deadline.throwIfExpired();
      const chunk = userIds.slice(i, i + this.concurrency);

      const settled = await Promise.allSettled(
        chunk.map((userId) => work(userId, `${triggerId}:${userId}`))
      );

      for (const [index, result] of settled.entries()) {
        const userId = chunk[index] ?? 'unknown';
        const userTriggerId = `${triggerId}:${userId}`;

        if (result.status === 'fulfilled') {
          outcomes.push(result.value);
          continue;
        }

        const error = toCoreError(result.reason, 'user job');
        if (isRetryable(error)) {
          retryable = retryable ?? error;
        } else {
          this.deps.events.emit('user_job_failed', 'WARNING', {
            triggerId: userTriggerId,
            userId,
            kind: error.kind,
            error: error.message,
          });
        }
        outcomes.push({ userId, triggerId: userTriggerId, status: 'failed', error: error.message });
      }
    }

    if (retryable) throw retryable;
    return outcomes;
  }

  private fail(
    lifecycle: RequestLifecycle,
    error: CoreError,
    fields: { job: string; triggerId?: string }
  ): TriggerResponse {
    lifecycle.transition('FAILED');
    const status = httpStatusFor(error);

    if (!error.retryable) {
      this.deps.events.emit(
        error.kind === 'ValidationFailed' ? 'trigger_rejected' : 'trigger_failed',
        'WARNING',
        { ...fields, kind: error.kind, status, error: error.message }
      );
    } else {
      console.error(`[router] ${fields.triggerId ?? fields.job} failed (${status}): ${error.message}`);
    }

    const response: TriggerResponse = {
      status,
      body: { ok: false, error: error.message, meta: { kind: error.kind, ...fields } },
    };
    if (error instanceof RateLimitedError) {
      response.headers = { 'Retry-After': String(error.retryAfterSeconds) };
    }
    return response;
  }
}
