import { z } from 'zod';
import Parser from 'rss-parser';
import { FetchError, errorMessage } from '../shared/errors.js';
import { truncate } from '../shared/utils.js';
import type { AcceptedPayload, ForumPost, RawResponse } from '../transport/adapter.js';

const CONTENT_CHARS = 500;

const ListingPostSchema = z.object({
  id: z.string().default(''),
  title: z.string().default(''),
  author: z.string().default('[deleted]'),
  score: z.number().default(0),
  num_comments: z.number().default(0),
  upvote_ratio: z.number().default(0),
  created_utc: z.number().default(0),
  permalink: z.string().default(''),
  url: z.string().default(''),
  selftext: z.string().default(''),
  is_self: z.boolean().default(false),
});

const ListingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ data: ListingPostSchema })),
  }),
});

// Atom entries carry `id` and `author` in addition to the RSS item fields.
type FeedItem = { id?: string; author?: string };
const feedParser = new Parser<Record<string, unknown>, FeedItem>();

/**
 * Promote a raw response to an accepted payload, or throw FetchError with
 * kind `Empty` or `MalformedResponse`. There is no partial acceptance.
 */
export async function validateResponse(raw: RawResponse): Promise<AcceptedPayload> {
  if (raw.body.trim().length === 0) {
    throw new FetchError('Empty', `Empty ${raw.format} body from ${raw.strategy}`, {
      strategy: raw.strategy,
    });
  }

  const posts = raw.format === 'listing' ? parseListing(raw) : await parseFeed(raw);

  if (posts.length === 0) {
    throw new FetchError('Empty', `No posts in ${raw.format} from ${raw.strategy}`, {
      strategy: raw.strategy,
    });
  }

  return { ...raw, posts };
}

export function parseListing(raw: RawResponse): ForumPost[] {
  let json: unknown;
  try {
    json = JSON.parse(raw.body);
  } catch {
    throw new FetchError('MalformedResponse', `Response from ${raw.strategy} is not valid JSON`, {
      strategy: raw.strategy,
      contentType: raw.contentType,
      preview: raw.body.slice(0, 120),
    });
  }

  const parsed = ListingSchema.safeParse(json);
  if (!parsed.success) {
    throw new FetchError('MalformedResponse', `Response from ${raw.strategy} has no listing`, {
      strategy: raw.strategy,
      errors: parsed.error.flatten().fieldErrors,
    });
  }

  return parsed.data.data.children.map(({ data: p }, index) => {
    const content = p.selftext ? truncate(p.selftext, CONTENT_CHARS) : '';
    return {
      rank: index + 1,
      id: p.id,
      title: p.title,
      author: p.author,
      score: p.score,
      numComments: p.num_comments,
      upvoteRatio: p.upvote_ratio,
      createdUtc: p.created_utc,
      permalink: `https://reddit.com${p.permalink}`,
      url: p.url,
      content: content || `[Link Post - URL: ${p.url || 'N/A'}]`,
      isSelf: p.is_self,
    };
  });
}

export async function parseFeed(raw: RawResponse): Promise<ForumPost[]> {
  let feed: Parser.Output<FeedItem>;
  try {
    feed = await feedParser.parseString(raw.body);
  } catch (err) {
    throw new FetchError('MalformedResponse', `Feed from ${raw.strategy} did not parse: ${errorMessage(err)}`, {
      strategy: raw.strategy,
      contentType: raw.contentType,
    });
  }

  return feed.items.map((item, index) => {
    const link = item.link?.trim() ?? '';
    const published = item.isoDate ? Date.parse(item.isoDate) : Number.NaN;
    const snippet = item.contentSnippet?.trim() ?? '';
    return {
      rank: index + 1,
      id: item.id ?? item.guid ?? link,
      title: item.title?.trim() || 'No title',
      author: (item.author ?? item.creator ?? 'unknown').replace(/^\/?u\//, ''),
      createdUtc: Number.isNaN(published) ? undefined : Math.floor(published / 1000),
      permalink: link,
      url: link,
      content: truncate(snippet, CONTENT_CHARS),
      isSelf: false,
    };
  });
}
