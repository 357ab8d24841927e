import { FetchError, errorMessage } from '../shared/errors.js';
import { sleep as defaultSleep } from '../shared/utils.js';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  attemptTimeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 2000,
  maxDelayMs: 30000,
  attemptTimeoutMs: 30000,
};

export interface AttemptResult {
  attempt: number;
  ok: boolean;
  error?: FetchError;
  durationMs: number;
}

export interface RetryHooks {
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  onAttempt?: (result: AttemptResult) => void;
}

const RETRYABLE_STATUS = new Set([408, 425, 429]);

export function isRetryable(err: FetchError): boolean {
  switch (err.kind) {
    case 'NetworkUnreachable':
    case 'Timeout':
      return true;
    case 'HTTPStatus': {
      const status = err.status;
      return status !== undefined && (RETRYABLE_STATUS.has(status) || status >= 500);
    }
    default:
      return false;
  }
}

/**
 * Full-jitter exponential backoff before attempt `attempt + 1`.
 */
export function backoffDelay(attempt: number, policy: RetryPolicy, random: () => number): number {
  const ceiling = Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
  return Math.floor(random() * ceiling);
}

function toFetchError(err: unknown, signal: AbortSignal, timeoutMs: number): FetchError {
  if (err instanceof FetchError) return err;
  if (signal.aborted) {
    return new FetchError('Timeout', `Attempt exceeded ${timeoutMs}ms`, { timeoutMs });
  }
  return new FetchError('NetworkUnreachable', errorMessage(err));
}

/**
 * Run `operation` up to `maxAttempts` times. Each attempt gets its own
 * AbortSignal that fires after `attemptTimeoutMs`. Non-retryable failures
 * end the loop at once; otherwise the last failure is rethrown.
 */
export async function withRetry<T>(
  operation: (signal: AbortSignal, attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  const random = hooks.random ?? Math.random;
  let lastError: FetchError | undefined;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    const controller = new AbortController();
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(
          new FetchError('Timeout', `Attempt exceeded ${policy.attemptTimeoutMs}ms`, {
            timeoutMs: policy.attemptTimeoutMs,
          }),
        );
      }, policy.attemptTimeoutMs);
    });

    try {
      const result = await Promise.race([operation(controller.signal, attempt), timeout]);
      hooks.onAttempt?.({ attempt, ok: true, durationMs: Date.now() - started });
      return result;
    } catch (err) {
      lastError = toFetchError(err, controller.signal, policy.attemptTimeoutMs);
      hooks.onAttempt?.({ attempt, ok: false, error: lastError, durationMs: Date.now() - started });
    } finally {
      clearTimeout(timer);
    }

    if (!lastError || !isRetryable(lastError) || attempt === policy.maxAttempts) break;
    await sleep(backoffDelay(attempt, policy, random));
  }

  throw lastError ?? new FetchError('NetworkUnreachable', 'No attempts were made');
}
