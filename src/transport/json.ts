import { requestFromMirrors } from './http.js';
import type { RawResponse, Reliability, TransportStrategy } from './adapter.js';

/**
 * Public `.json` listing endpoint. No credentials, but frequently answered
 * with a block page, which the validator rejects as malformed.
 */
export class JsonStrategy implements TransportStrategy {
  readonly name = 'json';
  readonly reliability: Reliability = 'low';
  readonly format = 'listing' as const;

  constructor(
    readonly priority: number,
    private readonly userAgent: string,
    private readonly mirrors: string[],
    private readonly limit: number = 25,
  ) {}

  async fetch(forum: string, signal: AbortSignal): Promise<RawResponse> {
    const response = await requestFromMirrors(
      this.mirrors,
      (host) => `https://${host}/r/${encodeURIComponent(forum)}.json?limit=${this.limit}`,
      {
        signal,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/json, text/javascript, */*; q=0.01',
          'Accept-Language': 'en-US,en;q=0.9',
        },
      },
    );

    return {
      forum,
      strategy: this.name,
      format: this.format,
      body: response.body,
      contentType: response.contentType,
      retrievedAt: new Date().toISOString(),
    };
  }
}
