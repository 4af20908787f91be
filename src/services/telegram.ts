// src/services/telegram.ts
// Outbound Telegram messages, webhook registration and long-polling ingress (grammy)

import { Api, Bot, GrammyError, HttpError } from 'grammy';
import {
  DeadlineExceededError,
  RateLimitedError,
  UpstreamUnavailableError,
  toCoreError,
} from './errors';

export interface SentMessage {
  messageId: string;
}

export interface Messenger {
  send(chatId: string, html: string, signal?: AbortSignal): Promise<SentMessage>;
}

/**
 * Telegram refused the message for good (bot blocked, chat not found, bad markup).
 * Resending will not help.
 */
export class DeliveryRejectedError extends Error {
  constructor(
    message: string,
    public readonly errorCode: number
  ) {
    super(message);
    this.name = 'DeliveryRejectedError';
  }
}

export function classifyTelegramError(err: unknown, signal?: AbortSignal): Error {
  if (signal?.reason instanceof DeadlineExceededError) return signal.reason;

  if (err instanceof GrammyError) {
    if (err.error_code === 429) {
      return new RateLimitedError(
        `Telegram rate limited: ${err.description}`,
        err.parameters.retry_after ?? 1
      );
    }
    if (err.error_code >= 500) {
      return new UpstreamUnavailableError(`Telegram error: ${err.description}`, err.error_code);
    }
    return new DeliveryRejectedError(err.description, err.error_code);
  }

  if (err instanceof HttpError) {
    return toCoreError(err.error, 'Telegram');
  }

  return toCoreError(err, 'Telegram');
}

export class TelegramMessenger implements Messenger {
  constructor(private readonly api: Api) {}

  static fromToken(token: string): TelegramMessenger {
    return new TelegramMessenger(new Api(token));
  }

  async send(chatId: string, html: string, signal?: AbortSignal): Promise<SentMessage> {
    try {
      const message = await this.api.sendMessage(
        chatId,
        html,
        { parse_mode: 'HTML', link_preview_options: { is_disabled: true } },
        signal
      );
      return { messageId: String(message.message_id) };
    } catch (err) {
      throw classifyTelegramError(err, signal);
    }
  }
}

/**
 * Point Telegram at `${baseUrl}/webhook`. Telegram echoes `secret` in
 * X-Telegram-Bot-Api-Secret-Token on every delivery.
 */
export async function configureWebhook(api: Api, baseUrl: string, secret?: string): Promise<string> {
  const url = `${baseUrl.replace(/\/+$/, '')}/webhook`;
  await api.setWebhook(url, {
    allowed_updates: ['message'],
    ...(secret ? { secret_token: secret } : {}),
  });
  console.log(`[telegram] webhook set to ${url}`);
  return url;
}

export type UpdateListener = (update: unknown) => Promise<void>;

/**
 * Long-polling ingress for local runs (BOT_MODE=polling). grammy drops the
 * webhook before it starts polling and backs off on network errors itself.
 */
export class TelegramPoller {
  private running: Promise<void> | null = null;

  constructor(
    private readonly bot: Bot,
    listener: UpdateListener
  ) {
    bot.on('message', (ctx) => listener(ctx.update));
    bot.catch((err) => {
      console.error(`[telegram] update ${err.ctx.update.update_id} failed:`, err.error);
    });
  }

  /** Resolves once the first getUpdates call is about to go out */
  start(): Promise<void> {
    if (this.running) return Promise.resolve();

    return new Promise<void>((resolve, reject) => {
      this.running = this.bot
        .start({
          allowed_updates: ['message'],
          onStart: (me) => {
            console.log(`[telegram] polling for updates as @${me.username}`);
            resolve();
          },
        })
        .catch((err: unknown) => {
          console.error('[telegram] polling stopped:', err);
          this.running = null;
          reject(err);
        });
    });
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    await this.bot.stop();
    await this.running;
    this.running = null;
  }
}
