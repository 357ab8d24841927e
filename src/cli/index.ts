#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import fs from 'node:fs';
import { loadConfig, writeDefaultConfig, STRATEGY_NAMES, type StrategyName } from '../shared/config.js';
import { ArchiverError, errorMessage } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { isIsoDate, resolvePath } from '../shared/utils.js';
import { exitCodeFor } from '../pipeline/orchestrator.js';
import { formatSummary } from '../pipeline/report.js';
import { resolveForums, runArchive } from '../pipeline/run.js';

const SAMPLE_FORUM_LIST = `# One forum per line. Comment a line out with "#" to disable it.
subreddits:
  - macapps
  # - iosapps
`;

interface CommonOpts {
  config?: string;
  forumsFile?: string;
  forum?: string[];
}

interface RunOpts extends CommonOpts {
  dataDir?: string;
  strategies?: StrategyName[];
  date?: string;
  json?: boolean;
}

function parseStrategies(value: string): StrategyName[] {
  const names = value.split(',').map((s) => s.trim()).filter((s) => s.length > 0);
  const result: StrategyName[] = [];
  for (const name of names) {
    const match = STRATEGY_NAMES.find((s) => s === name);
    if (!match) {
      throw new InvalidArgumentError(`Unknown strategy "${name}". Known: ${STRATEGY_NAMES.join(', ')}`);
    }
    result.push(match);
  }
  if (result.length === 0) throw new InvalidArgumentError('At least one strategy is required');
  return result;
}

function parseDate(value: string): string {
  if (!isIsoDate(value)) throw new InvalidArgumentError('Expected YYYY-MM-DD');
  return value;
}

const program = new Command();

program
  .name('subarchive')
  .description('Archive subreddit listings to dated files, falling back across transports')
  .version('0.1.0');

// === run ===
program
  .command('run', { isDefault: true })
  .description('Fetch every configured forum once and write the archive')
  .option('-c, --config <path>', 'Config file (default: subarchive.config.yaml in cwd)')
  .option('-f, --forums-file <path>', 'Forum list file')
  .option('--forum <names...>', 'Forums to fetch instead of the forum list')
  .option('-d, --data-dir <dir>', 'Archive root directory')
  .option('-s, --strategies <list>', `Comma-separated fallback order (${STRATEGY_NAMES.join(',')})`, parseStrategies)
  .option('--date <YYYY-MM-DD>', 'Archive date (default: today, UTC)', parseDate)
  .option('--json', 'Print the run summary as JSON')
  .action(async (opts: RunOpts) => {
    const config = await loadConfig({ configPath: opts.config });
    const summary = await runArchive(config, {
      forums: opts.forum,
      forumsFile: opts.forumsFile,
      dataDir: opts.dataDir,
      strategies: opts.strategies,
      date: opts.date,
    });

    log(opts.json ? JSON.stringify(summary, null, 2) : formatSummary(summary));
    process.exitCode = exitCodeFor(summary);
  });

// === forums ===
program
  .command('forums')
  .description('Print the resolved forum list without fetching anything')
  .option('-c, --config <path>', 'Config file')
  .option('-f, --forums-file <path>', 'Forum list file')
  .option('--forum <names...>', 'Forums to resolve instead of the forum list')
  .action(async (opts: CommonOpts) => {
    const config = await loadConfig({ configPath: opts.config });
    const forums = resolveForums(config, { forums: opts.forum, forumsFile: opts.forumsFile });
    for (const forum of forums) {
      log(forum);
    }
  });

// === init ===
program
  .command('init')
  .description('Write a default config and a sample forum list when absent')
  .action(() => {
    const configPath = resolvePath('subarchive.config.yaml');
    if (!fs.existsSync(configPath)) {
      writeDefaultConfig(configPath);
      log('✓ subarchive.config.yaml created');
    } else {
      log('✓ subarchive.config.yaml already exists');
    }

    const forumsPath = resolvePath('subreddits.yml');
    if (!fs.existsSync(forumsPath)) {
      fs.writeFileSync(forumsPath, SAMPLE_FORUM_LIST, 'utf-8');
      log('✓ subreddits.yml created');
    } else {
      log('✓ subreddits.yml already exists');
    }
  });

function log(msg: string): void {
  // eslint-disable-next-line no-console
  console.log(msg);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  if (err instanceof ArchiverError) {
    logger.error({ code: err.code, details: err.details }, err.message);
  } else {
    logger.error({ error: errorMessage(err) }, 'Unexpected failure');
  }
  process.exitCode = 1;
});
