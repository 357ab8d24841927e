import { z } from 'zod';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { httpRequest } from './http.js';
import type { RawResponse, Reliability, TransportStrategy } from './adapter.js';

const TOKEN_URL = 'https://www.reddit.com/api/v1/access_token';
const API_BASE = 'https://oauth.reddit.com';
// Refresh five minutes before the server-side expiry.
const EXPIRY_MARGIN_MS = 5 * 60 * 1000;

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().default(3600),
});

export interface OAuthCredentials {
  clientId: string;
  clientSecret: string;
  userAgent: string;
}

/**
 * Process-scoped access token. Written on first use, read by every forum
 * afterwards; never persisted.
 */
export class TokenCache {
  private token: string | null = null;
  private expiresAt = 0;

  constructor(private readonly now: () => number = Date.now) {}

  get(): string | null {
    if (this.token && this.now() < this.expiresAt) return this.token;
    return null;
  }

  set(token: string, expiresInSec: number): void {
    this.token = token;
    // Short-lived tokens keep at least half their lifetime.
    const margin = Math.min(EXPIRY_MARGIN_MS, expiresInSec * 500);
    this.expiresAt = this.now() + expiresInSec * 1000 - margin;
  }

  invalidate(): void {
    this.token = null;
    this.expiresAt = 0;
  }
}

export class OAuthStrategy implements TransportStrategy {
  readonly name = 'oauth';
  readonly reliability: Reliability = 'high';
  readonly format = 'listing' as const;

  constructor(
    readonly priority: number,
    private readonly credentials: OAuthCredentials,
    private readonly tokens: TokenCache,
    private readonly limit: number = 25,
  ) {}

  async fetch(forum: string, signal: AbortSignal): Promise<RawResponse> {
    const token = await this.accessToken(signal);
    const url = `${API_BASE}/r/${encodeURIComponent(forum)}/hot.json?limit=${this.limit}`;

    try {
      const response = await httpRequest({
        url,
        signal,
        headers: {
          Authorization: `Bearer ${token}`,
          'User-Agent': this.credentials.userAgent,
          Accept: 'application/json',
        },
      });

      return {
        forum,
        strategy: this.name,
        format: this.format,
        body: response.body,
        contentType: response.contentType,
        retrievedAt: new Date().toISOString(),
      };
    } catch (err) {
      // A rejected bearer token is stale; drop it so the next forum re-authenticates.
      if (err instanceof FetchError && err.status === 401) {
        this.tokens.invalidate();
      }
      throw err;
    }
  }

  private async accessToken(signal: AbortSignal): Promise<string> {
    const cached = this.tokens.get();
    if (cached) return cached;

    logger.debug('Requesting OAuth access token');
    const basic = Buffer.from(
      `${this.credentials.clientId}:${this.credentials.clientSecret}`,
    ).toString('base64');

    let body: string;
    try {
      ({ body } = await httpRequest({
        url: TOKEN_URL,
        method: 'POST',
        signal,
        headers: {
          Authorization: `Basic ${basic}`,
          'Content-Type': 'application/x-www-form-urlencoded',
          'User-Agent': this.credentials.userAgent,
        },
        body: 'grant_type=client_credentials',
      }));
    } catch (err) {
      if (err instanceof FetchError && err.kind === 'HTTPStatus' && err.status === 400) {
        throw new FetchError('AuthRejected', 'OAuth token request rejected: 400', {
          url: TOKEN_URL,
          status: 400,
        });
      }
      throw err;
    }

    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      throw new FetchError('MalformedResponse', 'OAuth token response is not valid JSON', {
        url: TOKEN_URL,
      });
    }

    const parsed = TokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      // Reddit answers bad credentials with 200 and {"error": "invalid_grant"}.
      throw new FetchError('AuthRejected', 'OAuth token response has no access_token', {
        url: TOKEN_URL,
      });
    }

    this.tokens.set(parsed.data.access_token, parsed.data.expires_in);
    logger.info({ expires_in: parsed.data.expires_in }, 'OAuth access token obtained');
    return parsed.data.access_token;
  }
}
