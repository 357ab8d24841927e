import { z } from 'zod';
import { parseFeed } from '../pipeline/validate.js';
import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import { requestFromMirrors } from './http.js';
import type { RawResponse, Reliability, TransportStrategy } from './adapter.js';

const POST_ID = /\/comments\/([a-z0-9]+)\//;
const URL_PATH = /^https?:\/\/[^/]+(\/.*)$/;

// `/comments/<id>.json` answers with [post listing, comment listing].
const PostDetailSchema = z
  .tuple([
    z.object({
      data: z.object({
        children: z.array(z.object({ data: z.object({ id: z.string() }).passthrough() })).min(1),
      }),
    }),
  ])
  .rest(z.unknown());

export interface HybridOptions {
  limit?: number;
  postDelayMs?: number;
  attemptTimeoutMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

interface FeedEntry {
  id: string;
  link: string;
  path: string;
}

/**
 * Post list from the feed, then one public comments request per post for
 * score and comment counts. Produces a listing, so every listing view
 * applies. A post whose details fail is kept as a placeholder.
 */
export class HybridStrategy implements TransportStrategy {
  readonly name = 'hybrid';
  readonly reliability: Reliability = 'medium';
  readonly format = 'listing' as const;
  readonly attemptTimeoutMs?: number;

  private readonly limit: number;
  private readonly postDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    readonly priority: number,
    private readonly userAgent: string,
    private readonly mirrors: string[],
    options: HybridOptions = {},
  ) {
    this.limit = options.limit ?? 25;
    this.postDelayMs = options.postDelayMs ?? 1500;
    this.attemptTimeoutMs = options.attemptTimeoutMs;
    this.sleep = options.sleep ?? defaultSleep;
  }

  async fetch(forum: string, signal: AbortSignal): Promise<RawResponse> {
    const entries = await this.feedEntries(forum, signal);
    const children: Array<{ kind: 't3'; data: Record<string, unknown> }> = [];

    for (const [index, entry] of entries.entries()) {
      if (index > 0) await this.sleep(this.postDelayMs);
      if (signal.aborted) {
        throw new FetchError('Timeout', `Aborted after ${index} of ${entries.length} posts`, { forum });
      }
      children.push({ kind: 't3', data: await this.postDetails(forum, entry, signal) });
    }

    return {
      forum,
      strategy: this.name,
      format: this.format,
      body: JSON.stringify({ kind: 'Listing', data: { children } }),
      contentType: 'application/json',
      retrievedAt: new Date().toISOString(),
    };
  }

  private async feedEntries(forum: string, signal: AbortSignal): Promise<FeedEntry[]> {
    const response = await requestFromMirrors(
      this.mirrors,
      (host) => `https://${host}/r/${encodeURIComponent(forum)}.rss`,
      { signal, headers: this.headers('application/rss+xml, application/atom+xml, */*') },
    );

    const posts = await parseFeed({
      forum,
      strategy: this.name,
      format: 'feed',
      body: response.body,
      contentType: response.contentType,
      retrievedAt: new Date().toISOString(),
    });

    const entries: FeedEntry[] = [];
    for (const post of posts) {
      const match = POST_ID.exec(post.permalink);
      if (!match?.[1]) continue;
      const path = URL_PATH.exec(post.permalink)?.[1] ?? post.permalink;
      entries.push({ id: match[1], link: post.permalink, path });
    }

    if (entries.length === 0) {
      throw new FetchError('Empty', `No post links in feed for r/${forum}`, { forum });
    }
    return entries.slice(0, this.limit);
  }

  private async postDetails(
    forum: string,
    entry: FeedEntry,
    signal: AbortSignal,
  ): Promise<Record<string, unknown>> {
    try {
      const response = await requestFromMirrors(
        this.mirrors,
        (host) => `https://${host}/r/${encodeURIComponent(forum)}/comments/${entry.id}.json`,
        { signal, headers: this.headers('application/json, */*') },
      );
      const parsed = PostDetailSchema.safeParse(JSON.parse(response.body));
      if (!parsed.success) {
        throw new FetchError('MalformedResponse', `Unexpected details for post ${entry.id}`);
      }
      return parsed.data[0].data.children[0].data;
    } catch (err) {
      if (signal.aborted) throw err;
      logger.warn(
        { forum, post: entry.id, error: err instanceof Error ? err.message : String(err) },
        'Post details unavailable',
      );
      return {
        id: entry.id,
        title: 'Details unavailable',
        score: 0,
        num_comments: 0,
        permalink: entry.path,
        url: entry.link,
        is_self: false,
      };
    }
  }

  private headers(accept: string): Record<string, string> {
    return { 'User-Agent': this.userAgent, Accept: accept, 'Accept-Language': 'en-US,en;q=0.9' };
  }
}
