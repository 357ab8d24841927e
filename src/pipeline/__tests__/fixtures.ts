import type { RawResponse } from '../../transport/adapter.js';

export interface ListingPostFixture {
  id: string;
  title: string;
  score?: number;
  num_comments?: number;
  selftext?: string;
  is_self?: boolean;
  url?: string;
}

export function listingBody(posts: ListingPostFixture[]): string {
  return JSON.stringify({
    kind: 'Listing',
    data: {
      after: null,
      children: posts.map((p) => ({
        kind: 't3',
        data: {
          id: p.id,
          title: p.title,
          author: 'test_user',
          score: p.score ?? 1,
          num_comments: p.num_comments ?? 0,
          upvote_ratio: 0.9,
          created_utc: 1704067200,
          permalink: `/r/macapps/comments/${p.id}/post/`,
          url: p.url ?? `https://www.reddit.com/r/macapps/comments/${p.id}/post/`,
          selftext: p.selftext ?? '',
          is_self: p.is_self ?? true,
        },
      })),
    },
  });
}

export const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>macapps</title>
  <entry>
    <author><name>/u/alice</name><uri>https://www.reddit.com/user/alice</uri></author>
    <id>t3_abc123</id>
    <link href="https://www.reddit.com/r/macapps/comments/abc123/first_post/"/>
    <updated>2024-01-01T00:00:00+00:00</updated>
    <title>First Post</title>
    <content type="html">&lt;p&gt;Hello there&lt;/p&gt;</content>
  </entry>
  <entry>
    <author><name>/u/bob</name></author>
    <id>t3_def456</id>
    <link href="https://www.reddit.com/r/macapps/comments/def456/second_post/"/>
    <updated>2024-01-02T00:00:00+00:00</updated>
    <title>Second Post</title>
  </entry>
</feed>`;

export function rawResponse(overrides: Partial<RawResponse> = {}): RawResponse {
  return {
    forum: 'macapps',
    strategy: 'json',
    format: 'listing',
    body: listingBody([{ id: 'p1', title: 'Test Post' }]),
    contentType: 'application/json',
    retrievedAt: '2024-01-01T00:00:00.000Z',
    ...overrides,
  };
}
