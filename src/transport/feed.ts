import { requestFromMirrors } from './http.js';
import type { RawResponse, Reliability, TransportStrategy } from './adapter.js';

/**
 * Subreddit RSS/Atom feed. Officially supported and rarely blocked, but
 * carries no scores or comment counts.
 */
export class FeedStrategy implements TransportStrategy {
  readonly name = 'feed';
  readonly reliability: Reliability = 'medium';
  readonly format = 'feed' as const;

  constructor(
    readonly priority: number,
    private readonly userAgent: string,
    private readonly mirrors: string[],
  ) {}

  async fetch(forum: string, signal: AbortSignal): Promise<RawResponse> {
    const response = await requestFromMirrors(
      this.mirrors,
      (host) => `https://${host}/r/${encodeURIComponent(forum)}.rss`,
      {
        signal,
        headers: {
          'User-Agent': this.userAgent,
          Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
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
