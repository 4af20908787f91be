// src/services/whoop/oauth.ts
// WHOOP OAuth2: authorize URL, code exchange and refresh-token grant

import {
  AuthExpiredError,
  RateLimitedError,
  UpstreamUnavailableError,
  toCoreError,
} from '../errors';
import { oauthErrorSchema, tokenResponseSchema, TokenGrant } from './types';

export const WHOOP_AUTHORIZE_URL = 'https://api.prod.whoop.com/oauth/oauth2/auth';
export const WHOOP_TOKEN_URL = 'https://api.prod.whoop.com/oauth/oauth2/token';
export const WHOOP_SCOPES = 'offline read:profile read:recovery read:sleep read:workout';

export interface WhoopOAuthConfig {
  clientId: string;
  clientSecret: string;
  /** `${URL}/whoop/callback` */
  redirectUri: string;
  now?: () => number;
}

export class WhoopOAuthClient {
  private readonly now: () => number;

  constructor(private readonly config: WhoopOAuthConfig) {
    this.now = config.now ?? Date.now;
  }

  authorizeUrl(state: string): string {
    const params = new URLSearchParams({
      response_type: 'code',
      client_id: this.config.clientId,
      redirect_uri: this.config.redirectUri,
      scope: WHOOP_SCOPES,
      state,
    });
    return `${WHOOP_AUTHORIZE_URL}?${params.toString()}`;
  }

  async exchangeCode(code: string, signal?: AbortSignal): Promise<TokenGrant> {
    return this.tokenRequest(
      {
        grant_type: 'authorization_code',
        code,
        redirect_uri: this.config.redirectUri,
      },
      undefined,
      signal
    );
  }

  /**
   * Refresh-token grant. WHOOP rotates the refresh token on every use.
   * @throws AuthExpiredError on invalid_grant
   */
  async refresh(refreshToken: string, signal?: AbortSignal): Promise<TokenGrant> {
    return this.tokenRequest(
      {
        grant_type: 'refresh_token',
        refresh_token: refreshToken,
        scope: 'offline',
      },
      refreshToken,
      signal
    );
  }

  private async tokenRequest(
    params: Record<string, string>,
    previousRefreshToken: string | undefined,
    signal?: AbortSignal
  ): Promise<TokenGrant> {
    let response: Response;
    try {
      response = await fetch(WHOOP_TOKEN_URL, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({
          ...params,
          client_id: this.config.clientId,
          client_secret: this.config.clientSecret,
        }),
        signal,
      });
    } catch (err) {
      throw toCoreError(err, 'WHOOP token endpoint');
    }

    if (!response.ok) {
      throw await this.classifyFailure(response);
    }

    const parsed = tokenResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new UpstreamUnavailableError('WHOOP token endpoint returned an unexpected body', response.status);
    }

    const data = parsed.data;
    const refreshToken = data.refresh_token ?? previousRefreshToken;
    if (!refreshToken) {
      // without `offline` scope there is nothing to refresh with later
      throw new AuthExpiredError('WHOOP did not return a refresh token');
    }

    return {
      accessToken: data.access_token,
      refreshToken,
      expiresAt: new Date(this.now() + data.expires_in * 1000),
      scope: data.scope ?? '',
    };
  }

  private async classifyFailure(response: Response): Promise<Error> {
    const text = await response.text();

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get('Retry-After'));
      return new RateLimitedError(
        'WHOOP token endpoint rate limited',
        Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : 60
      );
    }

    if (response.status >= 500) {
      return new UpstreamUnavailableError(
        `WHOOP token endpoint error (${response.status})`,
        response.status
      );
    }

    let oauthError: string | undefined;
    try {
      const body = oauthErrorSchema.safeParse(JSON.parse(text));
      oauthError = body.success ? body.data.error : undefined;
    } catch {
      oauthError = undefined;
    }

    if (oauthError === 'invalid_grant' || response.status === 401) {
      return new AuthExpiredError(`WHOOP rejected the grant (${oauthError ?? response.status})`);
    }

    return new UpstreamUnavailableError(
      `WHOOP token endpoint error (${response.status}): ${oauthError ?? text.slice(0, 200)}`,
      response.status
    );
  }
}
