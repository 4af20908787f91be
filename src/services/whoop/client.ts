// src/services/whoop/client.ts
// Paged reads of WHOOP collections (sleep, recovery, workout)

import { z } from 'zod';
import {
  AuthExpiredError,
  RateLimitedError,
  UpstreamUnavailableError,
  toCoreError,
} from '../errors';
import {
  pageSchema,
  PageRequest,
  recoveryRecordSchema,
  sleepRecordSchema,
  WhoopCollection,
  WhoopPage,
  workoutRecordSchema,
} from './types';

export const WHOOP_API_BASE = 'https://api.prod.whoop.com/developer/v1';

const COLLECTION_PATHS: Record<WhoopCollection, string> = {
  sleep: '/activity/sleep',
  recovery: '/recovery',
  workout: '/activity/workout',
};

const sleepPage = pageSchema(sleepRecordSchema);
const recoveryPage = pageSchema(recoveryRecordSchema);
const workoutPage = pageSchema(workoutRecordSchema);

/**
 * The vendor answered 401 for this access token. The caller decides whether to refresh.
 */
export class TokenRejectedError extends AuthExpiredError {}

/**
 * Anything that can hand back one page of a collection
 */
export interface CollectionSource {
  fetchPage(accessToken: string, request: PageRequest, signal?: AbortSignal): Promise<WhoopPage>;
}

export interface WhoopApiClientOptions {
  baseUrl?: string;
  /** WHOOP caps `limit` at 25 */
  pageSize?: number;
}

export class WhoopApiClient implements CollectionSource {
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(options: WhoopApiClientOptions = {}) {
    this.baseUrl = options.baseUrl ?? WHOOP_API_BASE;
    this.pageSize = Math.min(options.pageSize ?? 25, 25);
  }

  async fetchPage(accessToken: string, request: PageRequest, signal?: AbortSignal): Promise<WhoopPage> {
    const params = new URLSearchParams({
      start: request.start.toISOString(),
      end: request.end.toISOString(),
      limit: String(this.pageSize),
    });
    if (request.nextToken) params.set('nextToken', request.nextToken);

    const body = await this.apiRequest(
      accessToken,
      `${COLLECTION_PATHS[request.collection]}?${params.toString()}`,
      signal
    );

    switch (request.collection) {
      case 'sleep': {
        const page = this.parse(sleepPage, body, request.collection);
        return { collection: 'sleep', records: page.records, nextToken: page.next_token ?? null };
      }
      case 'recovery': {
        const page = this.parse(recoveryPage, body, request.collection);
        return { collection: 'recovery', records: page.records, nextToken: page.next_token ?? null };
      }
      case 'workout': {
        const page = this.parse(workoutPage, body, request.collection);
        return { collection: 'workout', records: page.records, nextToken: page.next_token ?? null };
      }
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, collection: WhoopCollection): z.infer<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new UpstreamUnavailableError(`WHOOP ${collection} page did not match the expected shape`);
    }
    return result.data;
  }

  /**
   * Authenticated GET with status classification
   */
  private async apiRequest(accessToken: string, endpoint: string, signal?: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await fetch(`${this.baseUrl}${endpoint}`, {
        headers: {
          Authorization: `Bearer ${accessToken}`,
          'Content-Type': 'application/json',
        },
        signal,
      });
    } catch (err) {
      throw toCoreError(err, 'WHOOP API');
    }

    if (response.status === 429) {
      const retryAfter = Number(response.headers.get('Retry-After'));
      throw new RateLimitedError(
        'WHOOP API rate limit exceeded',
        Number.isFinite(retryAfter) && retryAfter > 0 ? retryAfter : 60
      );
    }

    if (response.status === 401) {
      throw new TokenRejectedError('WHOOP rejected the access token');
    }

    // missing scope: only a new consent fixes it
    if (response.status === 403) {
      throw new AuthExpiredError('WHOOP denied access, scopes may have been revoked');
    }

    if (!response.ok) {
      const errorText = await response.text();
      throw new UpstreamUnavailableError(
        `WHOOP API error (${response.status}): ${errorText.slice(0, 200)}`,
        response.status
      );
    }

    return response.json();
  }
}
