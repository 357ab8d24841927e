import { describe, it, expect } from 'vitest';
import { validateResponse } from '../validate.js';
import { FetchError } from '../../shared/errors.js';
import { ATOM_FEED, listingBody, rawResponse } from './fixtures.js';

async function rejection(promise: Promise<unknown>): Promise<FetchError> {
  const err = await promise.then(
    () => undefined,
    (e: unknown) => e,
  );
  if (!(err instanceof FetchError)) throw new Error('expected a FetchError');
  return err;
}

describe('validateResponse (listing)', () => {
  it('accepts a listing and normalizes posts', async () => {
    const payload = await validateResponse(rawResponse());

    expect(payload.posts).toHaveLength(1);
    expect(payload.posts[0]).toEqual({
      rank: 1,
      id: 'p1',
      title: 'Test Post',
      author: 'test_user',
      score: 1,
      numComments: 0,
      upvoteRatio: 0.9,
      createdUtc: 1704067200,
      permalink: 'https://reddit.com/r/macapps/comments/p1/post/',
      url: 'https://www.reddit.com/r/macapps/comments/p1/post/',
      content: '[Link Post - URL: https://www.reddit.com/r/macapps/comments/p1/post/]',
      isSelf: true,
    });
  });

  it('keeps the raw body verbatim', async () => {
    const raw = rawResponse();
    const payload = await validateResponse(raw);
    expect(payload.body).toBe(raw.body);
    expect(payload.strategy).toBe('json');
  });

  it('truncates long self text', async () => {
    const body = listingBody([{ id: 'p1', title: 'Long', selftext: 'x'.repeat(600) }]);
    const payload = await validateResponse(rawResponse({ body }));
    expect(payload.posts[0].content).toBe('x'.repeat(500) + '...');
  });

  it('rejects an HTML block page as MalformedResponse', async () => {
    const err = await rejection(
      validateResponse(rawResponse({ body: '<!doctype html><html><body>blocked</body></html>', contentType: 'text/html' })),
    );
    expect(err.kind).toBe('MalformedResponse');
  });

  it('rejects JSON without a listing field as MalformedResponse', async () => {
    const err = await rejection(validateResponse(rawResponse({ body: '{"message":"Forbidden","error":403}' })));
    expect(err.kind).toBe('MalformedResponse');
  });

  it('rejects a listing with no posts as Empty', async () => {
    const err = await rejection(validateResponse(rawResponse({ body: listingBody([]) })));
    expect(err.kind).toBe('Empty');
  });

  it('rejects a blank body as Empty', async () => {
    const err = await rejection(validateResponse(rawResponse({ body: '  \n' })));
    expect(err.kind).toBe('Empty');
  });
});

describe('validateResponse (feed)', () => {
  const feedRaw = (body: string) =>
    rawResponse({ strategy: 'feed', format: 'feed', body, contentType: 'application/atom+xml' });

  it('accepts an Atom feed and normalizes entries', async () => {
    const payload = await validateResponse(feedRaw(ATOM_FEED));

    expect(payload.posts.map((p) => p.title)).toEqual(['First Post', 'Second Post']);
    const first = payload.posts[0];
    expect(first.id).toBe('t3_abc123');
    expect(first.author).toBe('alice');
    expect(first.permalink).toBe('https://www.reddit.com/r/macapps/comments/abc123/first_post/');
    expect(first.content).toBe('Hello there');
    expect(first.createdUtc).toBe(1704067200);
    expect(first.score).toBeUndefined();
  });

  it('rejects non-XML as MalformedResponse', async () => {
    const err = await rejection(validateResponse(feedRaw('{"not":"xml"}')));
    expect(err.kind).toBe('MalformedResponse');
  });

  it('rejects a feed with no entries as Empty', async () => {
    const err = await rejection(
      validateResponse(feedRaw('<feed xmlns="http://www.w3.org/2005/Atom"><title>macapps</title></feed>')),
    );
    expect(err.kind).toBe('Empty');
  });
});
