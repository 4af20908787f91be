// src/services/updateHandler.ts
// Telegram update → command or check-in reply

import { z } from 'zod';
import type { MessageKind } from '../domain/types';
import type { UserStore } from '../db/store';
import type { AccountLinking } from './accountLinking';
import { Deadline } from './deadline';
import type { Dispatcher } from './dispatcher';
import type { EngagementService } from './engagement';
import { AuthExpiredError, isCoreError } from './errors';
import type { EventSink } from './events';
import { TEXTS } from './templates';

export const telegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: z
    .object({
      message_id: z.number().int(),
      chat: z.object({ id: z.number().int(), type: z.string() }),
      from: z
        .object({
          id: z.number().int(),
          first_name: z.string().optional(),
          username: z.string().optional(),
        })
        .optional(),
      text: z.string().optional(),
    })
    .optional(),
});

export type TelegramUpdate = z.infer<typeof telegramUpdateSchema>;

export interface UpdateOutcome {
  status: 'handled' | 'skipped' | 'failed';
  triggerId?: string;
  command?: string;
  error?: string;
}

const COMMAND_KINDS: Record<string, MessageKind> = {
  report: 'health_update',
  motivateme: 'morning_motivation',
};

// Budget for the apology after a failure, outside the (possibly spent) request deadline
const FAILURE_NOTICE_BUDGET_MS = 5_000;

/**
 * "/report@my_bot now" → "report"
 */
export function parseCommand(text: string): string | null {
  const match = /^\/([A-Za-z0-9_]+)(?:@\S+)?(?:\s|$)/.exec(text.trim());
  return match?.[1]?.toLowerCase() ?? null;
}

export interface UpdateHandlerDeps {
  users: UserStore;
  linking: AccountLinking;
  engagement: Pick<EngagementService, 'deliver'>;
  dispatcher: Pick<Dispatcher, 'dispatch'>;
  events?: EventSink;
  now?: () => number;
}

export class UpdateHandler {
  private readonly now: () => number;

  constructor(private readonly deps: UpdateHandlerDeps) {
    this.now = deps.now ?? Date.now;
  }

  /**
   * Never throws: a failure is reported to the user and in the outcome,
   * so Telegram does not redeliver the update.
   */
  async handle(update: TelegramUpdate, deadline: Deadline): Promise<UpdateOutcome> {
    const message = update.message;
    if (!message || message.text === undefined || message.chat.type !== 'private') {
      return { status: 'skipped' };
    }

    const userId = String(message.chat.id);
    const triggerId = `telegram:${message.chat.id}:${message.message_id}`;
    const text = message.text;
    const command = parseCommand(text) ?? undefined;

    try {
      await this.route(userId, triggerId, text, command, message.from?.first_name, deadline);
      return { status: 'handled', triggerId, ...(command ? { command } : {}) };
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      console.error(`[telegram] update ${update.update_id} failed: ${error}`);
      this.deps.events?.emit('telegram_update_failed', 'ERROR', {
        triggerId,
        userId,
        kind: isCoreError(err) ? err.kind : 'Unknown',
        error,
      });

      await this.sendFailureNotice(userId, triggerId, err instanceof AuthExpiredError);
      return { status: 'failed', triggerId, error, ...(command ? { command } : {}) };
    }
  }

  private async route(
    userId: string,
    triggerId: string,
    text: string,
    command: string | undefined,
    firstName: string | undefined,
    deadline: Deadline
  ): Promise<void> {
    const { users, linking, engagement, dispatcher } = this.deps;

    if (command === 'start') {
      const profile = await users.upsertUser({
        userId,
        chatId: userId,
        ...(firstName ? { name: firstName } : {}),
        joinedAt: new Date(this.now()),
      });
      await dispatcher.dispatch(triggerId, userId, TEXTS.welcome(profile.name), deadline);
      return;
    }

    if (!(await users.getUser(userId))) {
      await dispatcher.dispatch(triggerId, userId, TEXTS.notRegistered, deadline);
      return;
    }

    switch (command) {
      case 'linkwhoop': {
        const url = await linking.beginLink(userId);
        await dispatcher.dispatch(triggerId, userId, TEXTS.linkPrompt(url), deadline);
        return;
      }
      case 'unlinkwhoop': {
        const removed = await linking.unlink(userId);
        await dispatcher.dispatch(triggerId, userId, removed ? TEXTS.unlinked : TEXTS.notLinked, deadline);
        return;
      }
      case 'report':
      case 'motivateme':
        await engagement.deliver({ userId, triggerId, kind: COMMAND_KINDS[command] ?? 'check_in' }, deadline);
        return;
      default:
        // unknown commands get a normal reply too
        await engagement.deliver({ userId, triggerId, kind: 'check_in' }, deadline, { userMessage: text });
    }
  }

  private async sendFailureNotice(userId: string, triggerId: string, relink: boolean): Promise<void> {
    const notice = new Deadline(FAILURE_NOTICE_BUDGET_MS);
    try {
      await this.deps.dispatcher.dispatch(
        `${triggerId}:failure`,
        userId,
        relink ? TEXTS.relink : TEXTS.genericFailure,
        notice
      );
    } catch (err) {
      const error = err instanceof Error ? err.message : String(err);
      console.error(`[telegram] could not notify ${userId} about the failure: ${error}`);
    } finally {
      notice.release();
    }
  }
}
