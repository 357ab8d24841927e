import fs from 'node:fs';
import path from 'node:path';
import { ArchiveWriteError, errorMessage } from '../shared/errors.js';
import { logger as defaultLogger, type Logger } from '../shared/logger.js';
import type { AcceptedPayload, PayloadFormat } from '../transport/adapter.js';
import { DEFAULT_VIEWS, viewsFor, type DerivedView } from './views.js';

const RAW_EXTENSIONS: Record<PayloadFormat, string> = {
  listing: '.json',
  feed: '.xml',
};

export interface ArchivePaths {
  dir: string;
  stem: string;
  raw: string;
}

export interface ArchiveResult {
  forum: string;
  date: string;
  rawFile: string;
  derivedFiles: string[];
  derivedFailures: Array<{ file: string; error: string }>;
  removedFiles: string[];
}

/**
 * Write `data` to `target` through a sibling temp file and a rename, so an
 * interrupted run never leaves a half-written artifact.
 */
export function writeFileAtomic(target: string, data: string): void {
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  try {
    fs.writeFileSync(tmp, data, 'utf-8');
    fs.renameSync(tmp, target);
  } catch (err) {
    fs.rmSync(tmp, { force: true });
    throw err;
  }
}

export class ArchiveWriter {
  private readonly knownSuffixes: string[];

  constructor(
    private readonly dataDir: string,
    private readonly views: readonly DerivedView[] = DEFAULT_VIEWS,
    private readonly log: Logger = defaultLogger,
  ) {
    this.knownSuffixes = [
      ...Object.values(RAW_EXTENSIONS),
      ...views.map((view) => view.suffix),
    ];
  }

  paths(forum: string, date: string, format: PayloadFormat): ArchivePaths {
    const dir = path.join(this.dataDir, forum);
    const stem = `${forum}_${date}`;
    return { dir, stem, raw: path.join(dir, stem + RAW_EXTENSIONS[format]) };
  }

  /**
   * Persist the raw payload verbatim, then each derived view the format
   * supports. Derived views are best effort; the raw file is not.
   */
  write(payload: AcceptedPayload, date: string): ArchiveResult {
    const { dir, stem, raw } = this.paths(payload.forum, date, payload.format);
    const log = this.log.child({ forum: payload.forum, date });

    try {
      fs.mkdirSync(dir, { recursive: true });
      writeFileAtomic(raw, payload.body);
    } catch (err) {
      throw new ArchiveWriteError(`Failed to write raw archive ${raw}: ${errorMessage(err)}`, {
        forum: payload.forum,
        file: raw,
      });
    }
    log.info({ file: raw, bytes: Buffer.byteLength(payload.body) }, 'Saved raw data');

    const result: ArchiveResult = {
      forum: payload.forum,
      date,
      rawFile: raw,
      derivedFiles: [],
      derivedFailures: [],
      removedFiles: [],
    };

    for (const view of viewsFor(payload.format, this.views)) {
      const file = path.join(dir, stem + view.suffix);
      try {
        writeFileAtomic(file, view.render(payload, date));
        result.derivedFiles.push(file);
        log.debug({ file }, 'Saved derived view');
      } catch (err) {
        result.derivedFailures.push({ file, error: errorMessage(err) });
        log.warn({ file, error: errorMessage(err) }, 'Derived view failed, raw data kept');
      }
    }

    result.removedFiles = this.removeStale(dir, stem, [raw, ...result.derivedFiles]);
    return result;
  }

  /**
   * Drop same-day artifacts from an earlier run that this run did not
   * produce, e.g. an `.xml` feed file superseded by a `.json` listing.
   */
  private removeStale(dir: string, stem: string, keep: string[]): string[] {
    const keepNames = new Set(keep.map((file) => path.basename(file)));
    const removed: string[] = [];

    for (const name of fs.readdirSync(dir)) {
      if (keepNames.has(name) || !name.startsWith(stem)) continue;
      const suffix = name.slice(stem.length);
      if (!this.knownSuffixes.includes(suffix)) continue;

      const file = path.join(dir, name);
      try {
        fs.rmSync(file, { force: true });
        removed.push(file);
      } catch (err) {
        this.log.warn({ file, error: errorMessage(err) }, 'Could not remove stale archive file');
      }
    }

    return removed;
  }
}
