import { ArchiveWriter } from '../archive/writer.js';
import { loadForumList, resolveForumNames } from '../forums/resolver.js';
import type { Config, StrategyName } from '../shared/config.js';
import { ConfigError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { resolvePath, utcDate } from '../shared/utils.js';
import { buildStrategies, TokenCache } from '../transport/index.js';
import { Orchestrator, type RunContext, type RunSummary } from './orchestrator.js';

export const NO_STRATEGIES_AVAILABLE = 'NO_STRATEGIES_AVAILABLE';

export interface RunOptions {
  forums?: string[];
  forumsFile?: string;
  dataDir?: string;
  strategies?: StrategyName[];
  date?: string;
}

/**
 * Forums from explicit names when given, otherwise from the forum list file.
 * Throws ConfigError before any network activity when nothing resolves.
 */
export function resolveForums(config: Config, options: RunOptions = {}): string[] {
  if (options.forums && options.forums.length > 0) {
    return resolveForumNames(options.forums);
  }
  return loadForumList(resolvePath(options.forumsFile ?? config.forums_file));
}

/**
 * One batch pass: resolve forums, fetch each through the fallback chain,
 * archive accepted payloads.
 */
export async function runArchive(
  config: Config,
  options: RunOptions = {},
  overrides: Partial<RunContext> = {},
): Promise<RunSummary> {
  const forums = resolveForums(config, options);
  const date = options.date ?? utcDate();
  logger.info({ forums, date }, `Loaded ${forums.length} forum(s)`);

  const context: RunContext = {
    strategies: buildStrategies(config, new TokenCache(), options.strategies),
    archive: new ArchiveWriter(resolvePath(options.dataDir ?? config.data_dir)),
    date,
    retry: {
      maxAttempts: config.retry.max_attempts,
      baseDelayMs: config.retry.base_delay_ms,
      maxDelayMs: config.retry.max_delay_ms,
      attemptTimeoutMs: config.retry.attempt_timeout_ms,
    },
    forumDelayMs: config.pacing.forum_delay_ms,
    ...overrides,
  };

  if (context.strategies.length === 0) {
    throw new ConfigError(
      'No transport strategy is available; check the strategy list and credentials',
      { strategies: options.strategies ?? config.strategies },
      NO_STRATEGIES_AVAILABLE,
    );
  }

  return new Orchestrator(context).runBatch(forums);
}
