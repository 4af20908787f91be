import type { Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app';
import { TEXTS } from '../src/services/templates';
import { textUpdate } from './helpers/fakes';
import { createHarness, Harness, registerUser } from './helpers/harness';

describe('HTTP surface', () => {
  let h: Harness;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    h = createHarness();
    const app = createApp(h.services, { nodeEnv: 'test', callbackBudgetMs: 5_000 });
    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('server is not listening on a port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  async function startLink(userId: string): Promise<string> {
    await registerUser(h, userId, 'Ada');
    await h.services.linking.beginLink(userId);
    const [stored] = [...h.store.oauthStates.values()];
    if (!stored) throw new Error('no link state saved');
    return stored.state;
  }

  it('answers the health check', async () => {
    const res = await fetch(`${baseUrl}/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true, data: { status: 'ok', service: 'engagement-core' } });
  });

  it('answers unknown routes with 404', async () => {
    const res = await fetch(`${baseUrl}/nope`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ ok: false, error: 'Not Found: GET /nope' });
  });

  it('rejects malformed JSON bodies', async () => {
    const res = await fetch(`${baseUrl}/webhook`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-telegram-bot-api-secret-token': 'test-secret' },
      body: '{"update_id": ',
    });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ ok: false, error: 'Malformed JSON body' });
  });

  it('handles a Telegram webhook delivery', async () => {
    const res = await fetch(`${baseUrl}/webhook`, {
      method: 'POST',
      headers: { 'content-type': 'application/json', 'x-telegram-bot-api-secret-token': 'test-secret' },
      body: JSON.stringify(textUpdate(1, 42, 1, '/start')),
    });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      ok: true,
      data: { status: 'handled', triggerId: 'telegram:42:1', command: 'start' },
    });
    expect(h.messenger.textsFor('42')).toEqual([TEXTS.welcome('Ada')]);
  });

  it('requires a bearer token on scheduled routes', async () => {
    const res = await fetch(`${baseUrl}/scheduled/check-in`, { method: 'POST' });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      ok: false,
      error: 'Missing or malformed bearer token',
      meta: { kind: 'ValidationFailed', job: 'check_in' },
    });
  });

  describe('/whoop/callback', () => {
    it('stores the token and confirms in Telegram', async () => {
      const state = await startLink('42');

      const res = await fetch(`${baseUrl}/whoop/callback?code=auth-code&state=${state}`);

      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toContain('text/plain');
      expect(await res.text()).toBe('WHOOP connected. You can close this window and return to Telegram.');
      expect(h.oauth.exchanged).toEqual(['auth-code']);
      expect(h.store.tokens.get('42')).toMatchObject({ accessToken: 'access-linked', version: 1 });
      expect(h.store.oauthStates.size).toBe(0);
      expect(h.messenger.sent).toEqual([{ chatId: '42', html: TEXTS.linkSuccess }]);
      expect(h.store.dispatches.get(`whoop-link:${state}`)?.outcome).toBe('sent');
    });

    it('refuses a state that was already used', async () => {
      const state = await startLink('42');
      await fetch(`${baseUrl}/whoop/callback?code=auth-code&state=${state}`);

      const res = await fetch(`${baseUrl}/whoop/callback?code=auth-code&state=${state}`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        ok: false,
        error: 'Unknown or already used link state',
        meta: { kind: 'ValidationFailed' },
      });
      expect(h.oauth.exchanged).toEqual(['auth-code']);
    });

    it('refuses an expired state', async () => {
      const state = await startLink('42');
      h.clock.advance(11 * 60 * 1000);

      const res = await fetch(`${baseUrl}/whoop/callback?code=auth-code&state=${state}`);

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: 'Link state expired, send /linkwhoop again' });
      expect(h.store.tokens.has('42')).toBe(false);
    });

    it('reports a missing code', async () => {
      const res = await fetch(`${baseUrl}/whoop/callback?state=abc`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ ok: false, error: 'Missing code or state' });
    });

    it('reports a denied consent', async () => {
      const res = await fetch(`${baseUrl}/whoop/callback?error=access_denied&state=abc`);

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({ ok: false, error: 'WHOOP authorization failed: access_denied' });
    });

    it('still links when the confirmation cannot be sent', async () => {
      const state = await startLink('42');
      h.messenger.failNext('42', new Error('chat not found'));

      const res = await fetch(`${baseUrl}/whoop/callback?code=auth-code&state=${state}`);

      expect(res.status).toBe(200);
      expect(h.store.tokens.has('42')).toBe(true);
    });
  });
});
