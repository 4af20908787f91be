// src/services/aiPromptTemplates.ts
// Prompts for the generated Telegram messages

import type { ChatMessage, MessageKind } from '../domain/types';

export type ChatTurn = Pick<ChatMessage, 'role' | 'text'>;

export interface PromptParams {
  name?: string;
  healthSummary?: string | null;
  /** Earlier turns, oldest first */
  history?: ChatTurn[];
  userMessage?: string;
}

const TASKS: Record<MessageKind, string> = {
  morning_motivation: 'Write a short good-morning message that motivates them for the day ahead.',
  check_in: 'Write a short check-in that asks how they are doing and offers one suggestion.',
  health_update: 'Give a brief analysis of how they are doing overall, referencing specific numbers.',
};

export const ENGAGEMENT_PROMPTS = {
  SYSTEM: `You are a health coach talking to one person on Telegram.
You can see a short summary of their WHOOP data (sleep, recovery, strain).

Guidelines:
- Keep replies short: three sentences at most
- Base advice on the data you were given; never ask for numbers you already have
- One concrete, easy action per message
- Plain, warm language; no medical diagnoses
- Use **bold** sparingly for the single most important point
- Never mention that you are an AI model`,

  USER: (kind: MessageKind, params: PromptParams): string => {
    const lines = [
      `User's name: ${params.name || 'unknown'}`,
      `Health data:\n${params.healthSummary || 'No data'}`,
    ];
    if (params.history?.length) {
      const turns = params.history.map((turn) => `${turn.role === 'user' ? 'User' : 'You'}: ${turn.text}`);
      lines.push(`Recent conversation:\n${turns.join('\n')}`);
    }
    if (params.userMessage) {
      lines.push(`Their message: ${params.userMessage}`);
      lines.push('Reply to their message.');
    } else {
      lines.push(TASKS[kind]);
    }
    return lines.join('\n\n');
  },
};
