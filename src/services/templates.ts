// src/services/templates.ts
// Static Telegram texts (HTML parse mode) and the fallback bodies used when generation fails

import type { MessageKind } from '../domain/types';
import { escapeHtml } from './healthSummary';

export interface TemplateContext {
  name?: string;
  healthSummary?: string | null;
}

function greetingName(name?: string): string {
  return name ? `, ${escapeHtml(name)}` : '';
}

export const TEXTS = {
  welcome: (name?: string) =>
    `Welcome${greetingName(name)}! 🤖\n\n` +
    'I keep an eye on your sleep, recovery and strain and check in with you during the day.\n\n' +
    'Use /linkwhoop to connect your WHOOP, /report for your latest numbers and /motivateme when you need a push.',

  linkPrompt: (authorizeUrl: string) =>
    `Tap to connect your WHOOP account:\n<a href="${escapeHtml(authorizeUrl)}">Link WHOOP</a>\n\n` +
    'The link expires in 10 minutes.',

  linkSuccess: '✅ WHOOP connected. Your data will start syncing shortly.',

  unlinked: 'Your WHOOP account has been disconnected. Use /linkwhoop to connect it again.',

  notLinked: 'No WHOOP account is connected. Use /linkwhoop to connect one.',

  notRegistered: 'Please send /start first.',

  relink: '⌚️ I lost access to your WHOOP data. Please reconnect with /linkwhoop.',

  genericFailure: 'Something went wrong on my side. Please try again in a few minutes.',
};

/**
 * Body sent when the generative API is unavailable
 */
export function renderFallback(kind: MessageKind, context: TemplateContext = {}): string {
  const name = greetingName(context.name);

  switch (kind) {
    case 'morning_motivation':
      return (
        `Good morning${name}! ☀️\n\n` +
        'Every day is a fresh start. Drink some water, get outside for a few minutes, ' +
        'and pick one thing that will make today a win. 💪'
      );

    case 'check_in':
      return `Hey${name}, quick check-in: how are you feeling right now? ` +
        'A short walk or a glass of water is a good reset if the day is getting away from you.';

    case 'health_update':
      return context.healthSummary
        ? `<b>Your latest WHOOP data</b>\n${escapeHtml(context.healthSummary)}`
        : 'No recent WHOOP data yet. Make sure your strap is synced with the WHOOP app.';
  }
}
