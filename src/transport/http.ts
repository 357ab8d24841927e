import { FetchError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export interface HttpRequest {
  url: string;
  signal: AbortSignal;
  headers: Record<string, string>;
  method?: 'GET' | 'POST';
  body?: string;
}

export interface HttpResponse {
  url: string;
  status: number;
  body: string;
  contentType: string | null;
}

function isAbort(err: unknown, signal: AbortSignal): boolean {
  if (signal.aborted) return true;
  return err instanceof Error && (err.name === 'AbortError' || err.name === 'TimeoutError');
}

/**
 * Issue one request and map every failure onto a FetchError kind.
 * Resolves only for 2xx responses with a non-blank body.
 */
export async function httpRequest(req: HttpRequest): Promise<HttpResponse> {
  let response: Response;
  try {
    response = await fetch(req.url, {
      method: req.method ?? 'GET',
      headers: req.headers,
      body: req.body,
      signal: req.signal,
      redirect: 'follow',
    });
  } catch (err) {
    if (isAbort(err, req.signal)) {
      throw new FetchError('Timeout', `Request timed out: ${req.url}`, { url: req.url });
    }
    throw new FetchError(
      'NetworkUnreachable',
      `Request failed: ${err instanceof Error ? err.message : String(err)}`,
      { url: req.url },
    );
  }

  if (response.status === 401 || response.status === 403) {
    throw new FetchError('AuthRejected', `Access denied: ${response.status} from ${req.url}`, {
      url: req.url,
      status: response.status,
    });
  }

  if (!response.ok) {
    throw new FetchError('HTTPStatus', `HTTP ${response.status} from ${req.url}`, {
      url: req.url,
      status: response.status,
    });
  }

  let body: string;
  try {
    body = await response.text();
  } catch (err) {
    if (isAbort(err, req.signal)) {
      throw new FetchError('Timeout', `Response body timed out: ${req.url}`, { url: req.url });
    }
    throw new FetchError(
      'NetworkUnreachable',
      `Response body failed: ${err instanceof Error ? err.message : String(err)}`,
      { url: req.url },
    );
  }

  if (body.trim().length === 0) {
    throw new FetchError('Empty', `Empty response from ${req.url}`, {
      url: req.url,
      status: response.status,
    });
  }

  return {
    url: req.url,
    status: response.status,
    body,
    contentType: response.headers.get('content-type'),
  };
}

/**
 * Try the same path against each mirror host in order, returning the first
 * success. The last mirror's error is rethrown.
 */
export async function requestFromMirrors(
  mirrors: string[],
  buildUrl: (host: string) => string,
  init: Omit<HttpRequest, 'url'>,
): Promise<HttpResponse> {
  let lastError: FetchError | undefined;

  for (const host of mirrors) {
    const url = buildUrl(host);
    try {
      return await httpRequest({ ...init, url });
    } catch (err) {
      if (!(err instanceof FetchError)) throw err;
      lastError = err;
      logger.debug({ url, kind: err.kind, status: err.status }, 'Mirror request failed');
      if (err.kind === 'Timeout') break;
    }
  }

  throw lastError ?? new FetchError('NetworkUnreachable', 'No mirror hosts configured');
}
