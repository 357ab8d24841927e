import { describe, it, expect, vi, afterEach } from 'vitest';
import { httpRequest, requestFromMirrors } from '../http.js';
import { FetchError } from '../../shared/errors.js';

const originalFetch = globalThis.fetch;

async function failureOf(promise: Promise<unknown>): Promise<FetchError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof FetchError) return err;
    throw err;
  }
  throw new Error('expected a FetchError');
}

function request(url = 'https://example.test/r/macapps.json') {
  return { url, signal: new AbortController().signal, headers: { 'User-Agent': 'test-agent' } };
}

describe('httpRequest', () => {
  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('returns body and content type for 2xx responses', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(
      new Response('{"ok":true}', { status: 200, headers: { 'Content-Type': 'application/json' } }),
    );

    const res = await httpRequest(request());
    expect(res.status).toBe(200);
    expect(res.body).toBe('{"ok":true}');
    expect(res.contentType).toBe('application/json');
  });

  it('sends the given headers', async () => {
    const mockFetch = vi.fn().mockResolvedValue(new Response('x', { status: 200 }));
    globalThis.fetch = mockFetch;

    await httpRequest(request());
    expect(mockFetch.mock.calls[0][1].headers['User-Agent']).toBe('test-agent');
  });

  it('maps 401 and 403 to AuthRejected', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('blocked', { status: 403 }));
    const err = await failureOf(httpRequest(request()));
    expect(err.kind).toBe('AuthRejected');
    expect(err.status).toBe(403);
  });

  it('maps other non-2xx statuses to HTTPStatus', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('slow down', { status: 429 }));
    const err = await failureOf(httpRequest(request()));
    expect(err.kind).toBe('HTTPStatus');
    expect(err.status).toBe(429);
  });

  it('maps a blank body to Empty', async () => {
    globalThis.fetch = vi.fn().mockResolvedValue(new Response('   \n', { status: 200 }));
    const err = await failureOf(httpRequest(request()));
    expect(err.kind).toBe('Empty');
  });

  it('maps thrown network errors to NetworkUnreachable', async () => {
    globalThis.fetch = vi.fn().mockRejectedValue(new TypeError('fetch failed'));
    const err = await failureOf(httpRequest(request()));
    expect(err.kind).toBe('NetworkUnreachable');
    expect(err.message).toBe('Request failed: fetch failed');
  });

  it('maps an aborted request to Timeout', async () => {
    const controller = new AbortController();
    controller.abort();
    globalThis.fetch = vi.fn().mockRejectedValue(new DOMException('aborted', 'AbortError'));

    const err = await failureOf(
      httpRequest({ url: 'https://example.test/', signal: controller.signal, headers: {} }),
    );
    expect(err.kind).toBe('Timeout');
  });
});

describe('requestFromMirrors', () => {
  afterEach(() => {
    globalThis.fetch = originalFetch;
  });

  it('falls through to the next mirror on failure', async () => {
    const mockFetch = vi
      .fn()
      .mockResolvedValueOnce(new Response('nope', { status: 503 }))
      .mockResolvedValueOnce(new Response('<feed/>', { status: 200 }));
    globalThis.fetch = mockFetch;

    const res = await requestFromMirrors(
      ['www.example.test', 'old.example.test'],
      (host) => `https://${host}/r/macapps.rss`,
      { signal: new AbortController().signal, headers: {} },
    );

    expect(res.body).toBe('<feed/>');
    expect(mockFetch.mock.calls.map((c) => c[0])).toEqual([
      'https://www.example.test/r/macapps.rss',
      'https://old.example.test/r/macapps.rss',
    ]);
  });

  it('rethrows the last mirror failure', async () => {
    globalThis.fetch = vi
      .fn()
      .mockResolvedValueOnce(new Response('nope', { status: 503 }))
      .mockResolvedValueOnce(new Response('gone', { status: 404 }));

    const err = await failureOf(
      requestFromMirrors(['a.example.test', 'b.example.test'], (h) => `https://${h}/`, {
        signal: new AbortController().signal,
        headers: {},
      }),
    );
    expect(err.kind).toBe('HTTPStatus');
    expect(err.status).toBe(404);
  });
});
