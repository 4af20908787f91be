import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AuthExpiredError,
  RateLimitedError,
  UpstreamUnavailableError,
} from '../src/services/errors';
import { TokenRejectedError, WhoopApiClient } from '../src/services/whoop/client';
import { WHOOP_TOKEN_URL, WhoopOAuthClient } from '../src/services/whoop/oauth';
import { FakeClock, HOUR } from './helpers/fakes';

function json(body: unknown, status: number = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

const fetchMock = vi.fn((..._args: Parameters<typeof fetch>) => Promise.resolve(json({})));

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function requestedUrl(call: number = 0): URL {
  const input = fetchMock.mock.calls[call]?.[0];
  return new URL(String(input));
}

function formBody(call: number = 0): URLSearchParams {
  return new URLSearchParams(String(fetchMock.mock.calls[call]?.[1]?.body));
}

describe('WhoopApiClient', () => {
  const client = new WhoopApiClient();
  const request = {
    collection: 'sleep' as const,
    start: new Date('2026-02-23T09:00:00.000Z'),
    end: new Date('2026-03-02T09:00:00.000Z'),
  };

  it('reads one page of a collection', async () => {
    fetchMock.mockResolvedValueOnce(
      json({
        records: [{ id: 10, start: '2026-03-01T22:00:00.000Z', end: '2026-03-02T06:00:00.000Z', score_state: 'PENDING_SCORE' }],
        next_token: 'n2',
      })
    );

    const page = await client.fetchPage('tok', { ...request, nextToken: 'n1' });

    const url = requestedUrl();
    expect(`${url.origin}${url.pathname}`).toBe('https://api.prod.whoop.com/developer/v1/activity/sleep');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      start: '2026-02-23T09:00:00.000Z',
      end: '2026-03-02T09:00:00.000Z',
      limit: '25',
      nextToken: 'n1',
    });
    expect(fetchMock.mock.calls[0]?.[1]?.headers).toEqual({
      Authorization: 'Bearer tok',
      'Content-Type': 'application/json',
    });
    expect(page).toMatchObject({
      collection: 'sleep',
      nextToken: 'n2',
      records: [{ id: '10', score_state: 'PENDING_SCORE' }],
    });
  });

  it('reads recovery from its own path', async () => {
    fetchMock.mockResolvedValueOnce(json({ records: [] }));

    const page = await client.fetchPage('tok', { ...request, collection: 'recovery' });

    expect(requestedUrl().pathname).toBe('/developer/v1/recovery');
    expect(page).toEqual({ collection: 'recovery', records: [], nextToken: null });
  });

  it('maps 401 to a rejected token and 403 to a lost consent', async () => {
    fetchMock.mockResolvedValueOnce(json({}, 401));
    await expect(client.fetchPage('tok', request)).rejects.toBeInstanceOf(TokenRejectedError);

    fetchMock.mockResolvedValueOnce(json({}, 403));
    const denied = client.fetchPage('tok', request);
    await expect(denied).rejects.toBeInstanceOf(AuthExpiredError);
    await expect(denied).rejects.not.toBeInstanceOf(TokenRejectedError);
  });

  it('honours Retry-After on 429', async () => {
    fetchMock.mockResolvedValueOnce(json({}, 429, { 'Retry-After': '7' }));

    const error = await client.fetchPage('tok', request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RateLimitedError);
    expect(error).toMatchObject({ retryAfterSeconds: 7 });
  });

  it('treats server errors, bad bodies and network failures as transient', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad gateway', { status: 502 }));
    await expect(client.fetchPage('tok', request)).rejects.toMatchObject({
      kind: 'UpstreamUnavailable',
      statusCode: 502,
      message: 'WHOOP API error (502): bad gateway',
    });

    fetchMock.mockResolvedValueOnce(json({ records: 'nope' }));
    await expect(client.fetchPage('tok', request)).rejects.toThrow('WHOOP sleep page did not match the expected shape');

    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    await expect(client.fetchPage('tok', request)).rejects.toThrow('WHOOP API unavailable: fetch failed');
  });
});

describe('WhoopOAuthClient', () => {
  const clock = new FakeClock();
  const oauth = new WhoopOAuthClient({
    clientId: 'test-client',
    clientSecret: 'test-secret',
    redirectUri: 'https://svc.example.com/whoop/callback',
    now: clock.now,
  });

  it('builds the consent URL with the offline scope', () => {
    const url = new URL(oauth.authorizeUrl('state-1'));

    expect(`${url.origin}${url.pathname}`).toBe('https://api.prod.whoop.com/oauth/oauth2/auth');
    expect(Object.fromEntries(url.searchParams)).toEqual({
      response_type: 'code',
      client_id: 'test-client',
      redirect_uri: 'https://svc.example.com/whoop/callback',
      scope: 'offline read:profile read:recovery read:sleep read:workout',
      state: 'state-1',
    });
  });

  it('refreshes with a form-encoded grant', async () => {
    fetchMock.mockResolvedValueOnce(
      json({ access_token: 'a2', refresh_token: 'r2', expires_in: 3600, scope: 'offline read:sleep' })
    );

    const grant = await oauth.refresh('r1');

    expect(String(fetchMock.mock.calls[0]?.[0])).toBe(WHOOP_TOKEN_URL);
    expect(Object.fromEntries(formBody())).toEqual({
      grant_type: 'refresh_token',
      refresh_token: 'r1',
      scope: 'offline',
      client_id: 'test-client',
      client_secret: 'test-secret',
    });
    expect(grant).toEqual({
      accessToken: 'a2',
      refreshToken: 'r2',
      expiresAt: new Date(clock.now() + HOUR),
      scope: 'offline read:sleep',
    });
  });

  it('keeps the old refresh token when none is returned', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: 'a2', expires_in: 60 }));

    await expect(oauth.refresh('r1')).resolves.toMatchObject({ refreshToken: 'r1', scope: '' });
  });

  it('needs a refresh token from the code exchange', async () => {
    fetchMock.mockResolvedValueOnce(json({ access_token: 'a1', expires_in: 3600 }));

    await expect(oauth.exchangeCode('code-1')).rejects.toThrow('WHOOP did not return a refresh token');
    expect(formBody().get('grant_type')).toBe('authorization_code');
    expect(formBody().get('redirect_uri')).toBe('https://svc.example.com/whoop/callback');
  });

  it('classifies token endpoint failures', async () => {
    fetchMock.mockResolvedValueOnce(json({ error: 'invalid_grant' }, 400));
    await expect(oauth.refresh('r1')).rejects.toThrow('WHOOP rejected the grant (invalid_grant)');

    fetchMock.mockResolvedValueOnce(json({ error: 'invalid_client' }, 401));
    await expect(oauth.refresh('r1')).rejects.toBeInstanceOf(AuthExpiredError);

    fetchMock.mockResolvedValueOnce(json({ error: 'invalid_request' }, 400));
    await expect(oauth.refresh('r1')).rejects.toThrow('WHOOP token endpoint error (400): invalid_request');

    fetchMock.mockResolvedValueOnce(json({}, 429));
    await expect(oauth.refresh('r1')).rejects.toMatchObject({ kind: 'RateLimited', retryAfterSeconds: 60 });

    fetchMock.mockResolvedValueOnce(new Response('unavailable', { status: 503 }));
    await expect(oauth.refresh('r1')).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });
});
