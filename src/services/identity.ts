// src/services/identity.ts
// Caller verification: Google OIDC identity tokens (scheduler) and the Telegram webhook secret

import type { TokenPayload } from 'google-auth-library';
import { secureCompare } from './encryption';
import { ValidationFailedError } from './errors';

/**
 * The part of google-auth-library's OAuth2Client used here
 */
export interface IdTokenVerifier {
  verifyIdToken(options: {
    idToken: string;
    audience: string | string[];
  }): Promise<{ getPayload(): TokenPayload | undefined }>;
}

export interface SchedulerIdentity {
  email?: string;
  subject: string;
}

export interface SchedulerAuthOptions {
  /** Accepted `aud` values: the service URL, and the full endpoint URL */
  audiences: string[];
  /** When set, only this service account may call */
  allowedEmail?: string;
}

export class SchedulerAuthenticator {
  constructor(
    private readonly verifier: IdTokenVerifier,
    private readonly options: SchedulerAuthOptions
  ) {}

  /**
   * @throws ValidationFailedError 401 when the token is missing or malformed, 403 when it is rejected
   */
  async authenticate(authorization: string | undefined): Promise<SchedulerIdentity> {
    const match = /^Bearer\s+(\S+)$/i.exec(authorization?.trim() ?? '');
    const idToken = match?.[1];
    if (!idToken) {
      throw new ValidationFailedError('Missing or malformed bearer token', 401);
    }

    let payload: TokenPayload | undefined;
    try {
      const ticket = await this.verifier.verifyIdToken({
        idToken,
        audience: this.options.audiences,
      });
      payload = ticket.getPayload();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new ValidationFailedError(`Identity token rejected: ${reason}`, 403, { cause: err });
    }

    if (!payload) {
      throw new ValidationFailedError('Identity token has no payload', 403);
    }

    const { allowedEmail } = this.options;
    if (allowedEmail && (payload.email !== allowedEmail || payload.email_verified === false)) {
      throw new ValidationFailedError(`Caller ${payload.email ?? payload.sub} is not allowed`, 403);
    }

    return { email: payload.email, subject: payload.sub };
  }
}

/**
 * @throws ValidationFailedError 401 when the header is absent, 403 when it does not match
 */
export function verifyTelegramSecret(header: string | undefined, expected: string | undefined): void {
  // webhook secret not configured (polling mode)
  if (!expected) return;
  if (!header) {
    throw new ValidationFailedError('Missing Telegram secret token', 401);
  }
  if (!secureCompare(header, expected)) {
    throw new ValidationFailedError('Telegram secret token mismatch', 403);
  }
}
