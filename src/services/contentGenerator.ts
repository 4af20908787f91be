// src/services/contentGenerator.ts
// Message bodies from the generative API, with a template whenever it cannot answer

import OpenAI from 'openai';
import type { MessageIntent } from '../domain/types';
import { ENGAGEMENT_PROMPTS, PromptParams } from './aiPromptTemplates';
import type { Deadline } from './deadline';
import { isAbortError } from './errors';
import { markdownToTelegramHtml } from './healthSummary';
import { renderFallback } from './templates';

export type FallbackReason = 'timeout' | 'error' | 'empty' | 'deadline';

export type GeneratedMessage =
  | { source: 'generated'; body: string }
  | { source: 'template'; body: string; reason: FallbackReason };

export type GenerationContext = PromptParams;

/**
 * The slice of `openai.chat.completions` the generator calls
 */
export interface ChatCompletionsApi {
  create(
    body: OpenAI.ChatCompletionCreateParamsNonStreaming,
    options?: { signal?: AbortSignal; timeout?: number; maxRetries?: number }
  ): Promise<OpenAI.ChatCompletion>;
}

export interface ContentGeneratorOptions {
  model: string;
  /** Upper bound per call; the remaining deadline may shorten it */
  timeoutMs?: number;
  temperature?: number;
}

// Gemini's OpenAI-compatible surface
export const GEMINI_OPENAI_BASE_URL = 'https://generativelanguage.googleapis.com/v1beta/openai/';

export function createChatCompletions(apiKey: string, baseURL: string = GEMINI_OPENAI_BASE_URL): ChatCompletionsApi {
  const client = new OpenAI({ apiKey, baseURL, maxRetries: 0 });
  return client.chat.completions;
}

export class ContentGenerator {
  private readonly timeoutMs: number;

  constructor(
    private readonly completions: ChatCompletionsApi,
    private readonly options: ContentGeneratorOptions
  ) {
    this.timeoutMs = options.timeoutMs ?? 20_000;
  }

  async generate(
    intent: MessageIntent,
    context: GenerationContext = {},
    deadline?: Deadline
  ): Promise<GeneratedMessage> {
    const fallback = (reason: FallbackReason): GeneratedMessage => {
      console.warn(`[generator] ${intent.kind} for ${intent.userId} using template (${reason})`);
      return {
        source: 'template',
        body: renderFallback(intent.kind, context),
        reason,
      };
    };

    if (deadline?.expired()) return fallback('deadline');

    const timeout = Math.max(1, Math.min(this.timeoutMs, deadline?.remainingMs() ?? this.timeoutMs));
    const signal = deadline ? deadline.signalFor(this.timeoutMs) : AbortSignal.timeout(this.timeoutMs);

    try {
      const completion = await this.completions.create(
        {
          model: this.options.model,
          messages: [
            { role: 'system', content: ENGAGEMENT_PROMPTS.SYSTEM },
            { role: 'user', content: ENGAGEMENT_PROMPTS.USER(intent.kind, context) },
          ],
          temperature: this.options.temperature ?? 0.8,
          max_tokens: 400,
        },
        { signal, timeout, maxRetries: 0 }
      );

      const text = completion.choices[0]?.message?.content?.trim();
      if (!text) return fallback('empty');

      return { source: 'generated', body: markdownToTelegramHtml(text) };
    } catch (err) {
      const timedOut =
        signal.aborted ||
        isAbortError(err) ||
        err instanceof OpenAI.APIConnectionTimeoutError ||
        err instanceof OpenAI.APIUserAbortError;
      if (!timedOut) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`[generator] completion failed: ${message}`);
      }
      return fallback(timedOut ? 'timeout' : 'error');
    }
  }
}
