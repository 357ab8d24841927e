import type { ArchiveResult } from '../archive/writer.js';
import { ArchiveWriteError, errorMessage, type FetchErrorKind } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import { sleep as defaultSleep } from '../shared/utils.js';
import type { AcceptedPayload, RawResponse, TransportStrategy } from '../transport/adapter.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from './retry.js';
import { validateResponse } from './validate.js';

export type ForumStatus = 'succeeded' | 'exhausted' | 'write_failed';

export interface AttemptRecord {
  strategy: string;
  attempt: number;
  ok: boolean;
  kind?: FetchErrorKind;
  status?: number;
  message?: string;
  durationMs: number;
}

export interface FetchOutcome {
  forum: string;
  status: ForumStatus;
  succeededVia: string | null;
  attempts: AttemptRecord[];
  archive?: ArchiveResult;
  error?: string;
}

export interface RunSummary {
  date: string;
  outcomes: FetchOutcome[];
  succeeded: number;
  failed: number;
  durationMs: number;
}

export interface ArchiveSink {
  write(payload: AcceptedPayload, date: string): ArchiveResult;
}

/**
 * Everything one run shares across forums. Built once per process and
 * passed in, so tests can swap strategies, delays and the archive.
 */
export interface RunContext {
  strategies: TransportStrategy[];
  archive: ArchiveSink;
  date: string;
  retry?: RetryPolicy;
  forumDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  validate?: (raw: RawResponse) => Promise<AcceptedPayload>;
  logger?: Logger;
}

export class Orchestrator {
  private readonly strategies: TransportStrategy[];
  private readonly retry: RetryPolicy;
  private readonly forumDelayMs: number;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly validate: (raw: RawResponse) => Promise<AcceptedPayload>;
  private readonly log: Logger;

  constructor(private readonly ctx: RunContext) {
    this.strategies = [...ctx.strategies].sort((a, b) => a.priority - b.priority);
    this.retry = ctx.retry ?? DEFAULT_RETRY_POLICY;
    this.forumDelayMs = ctx.forumDelayMs ?? 0;
    this.sleep = ctx.sleep ?? defaultSleep;
    this.validate = ctx.validate ?? validateResponse;
    this.log = ctx.logger ?? defaultLogger;
  }

  /**
   * Try each strategy in priority order until one yields an accepted
   * payload, then archive it. Never throws for fetch or write failures.
   */
  async processForum(forum: string): Promise<FetchOutcome> {
    const log = this.log.child({ forum });
    const outcome: FetchOutcome = { forum, status: 'exhausted', succeededVia: null, attempts: [] };

    let accepted: AcceptedPayload | null = null;
    for (const strategy of this.strategies) {
      log.info({ strategy: strategy.name, priority: strategy.priority }, 'Trying strategy');
      try {
        accepted = await withRetry(
          async (signal) => this.validate(await strategy.fetch(forum, signal)),
          strategy.attemptTimeoutMs
            ? { ...this.retry, attemptTimeoutMs: strategy.attemptTimeoutMs }
            : this.retry,
          {
            sleep: this.sleep,
            random: this.ctx.random,
            onAttempt: (result) => {
              outcome.attempts.push({
                strategy: strategy.name,
                attempt: result.attempt,
                ok: result.ok,
                kind: result.error?.kind,
                status: result.error?.status,
                message: result.error?.message,
                durationMs: result.durationMs,
              });
              if (result.error) {
                log.warn(
                  { strategy: strategy.name, attempt: result.attempt, kind: result.error.kind },
                  result.error.message,
                );
              }
            },
          },
        );
        outcome.succeededVia = strategy.name;
        log.info({ strategy: strategy.name, posts: accepted.posts.length }, 'Accepted payload');
        break;
      } catch (err) {
        log.warn({ strategy: strategy.name, error: errorMessage(err) }, 'Strategy exhausted, falling back');
      }
    }

    if (!accepted) {
      outcome.error = 'ExhaustedAllStrategies';
      log.error({ attempts: outcome.attempts.length }, 'All strategies failed');
      return outcome;
    }

    try {
      outcome.archive = this.ctx.archive.write(accepted, this.ctx.date);
      outcome.status = 'succeeded';
    } catch (err) {
      const error =
        err instanceof ArchiveWriteError
          ? err
          : new ArchiveWriteError(errorMessage(err), { forum });
      outcome.status = 'write_failed';
      outcome.error = error.message;
      log.error({ error: error.message }, 'Fetched but failed to archive');
    }

    return outcome;
  }

  /**
   * Process forums one at a time in the given order, pausing between
   * forums. One forum's failure never stops the batch.
   */
  async runBatch(forums: string[]): Promise<RunSummary> {
    const started = Date.now();
    const outcomes: FetchOutcome[] = [];

    for (const [index, forum] of forums.entries()) {
      if (index > 0) await this.sleep(this.forumDelayMs);
      outcomes.push(await this.processForum(forum));
    }

    const succeeded = outcomes.filter((o) => o.status === 'succeeded').length;
    const summary: RunSummary = {
      date: this.ctx.date,
      outcomes,
      succeeded,
      failed: outcomes.length - succeeded,
      durationMs: Date.now() - started,
    };

    this.log.info(
      { succeeded: summary.succeeded, failed: summary.failed, durationMs: summary.durationMs },
      'Run complete',
    );
    return summary;
  }
}

export function exitCodeFor(summary: RunSummary): number {
  return summary.failed === 0 && summary.outcomes.length > 0 ? 0 : 1;
}
