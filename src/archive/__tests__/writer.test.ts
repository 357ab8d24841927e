import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import pino from 'pino';
import { ArchiveWriteError } from '../../shared/errors.js';
import type { AcceptedPayload } from '../../transport/adapter.js';
import { readableView, type DerivedView } from '../views.js';
import { ArchiveWriter, writeFileAtomic } from '../writer.js';

const silent = pino({ level: 'silent' });
const DATE = '2024-01-01';

function payload(overrides: Partial<AcceptedPayload> = {}): AcceptedPayload {
  return {
    forum: 'macapps',
    strategy: 'json',
    format: 'listing',
    body: '{"kind":"Listing","version":1}',
    contentType: 'application/json',
    retrievedAt: '2024-01-01T00:00:00.000Z',
    posts: [
      {
        rank: 1,
        id: 'p1',
        title: 'Test Post',
        author: 'test_user',
        score: 3,
        numComments: 1,
        permalink: 'https://reddit.com/r/macapps/comments/p1/post/',
        url: 'https://reddit.com/r/macapps/comments/p1/post/',
        content: 'Hello',
        isSelf: true,
      },
    ],
    ...overrides,
  };
}

describe('ArchiveWriter', () => {
  let dataDir: string;
  let forumDir: string;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), 'subarchive-archive-'));
    forumDir = path.join(dataDir, 'macapps');
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it('derives paths from forum, date and format', () => {
    const writer = new ArchiveWriter(dataDir, undefined, silent);
    expect(writer.paths('macapps', DATE, 'feed')).toEqual({
      dir: forumDir,
      stem: 'macapps_2024-01-01',
      raw: path.join(forumDir, 'macapps_2024-01-01.xml'),
    });
  });

  it('writes the raw payload verbatim plus every listing view', () => {
    const writer = new ArchiveWriter(dataDir, undefined, silent);
    const result = writer.write(payload(), DATE);

    expect(result.rawFile).toBe(path.join(forumDir, 'macapps_2024-01-01.json'));
    expect(fs.readFileSync(result.rawFile, 'utf-8')).toBe('{"kind":"Listing","version":1}');
    expect(result.derivedFiles.map((f) => path.basename(f))).toEqual([
      'macapps_2024-01-01_processed.json',
      'macapps_2024-01-01_readable.txt',
      'macapps_2024-01-01_SUMMARY.txt',
      'macapps_2024-01-01_TOP10.txt',
    ]);
    expect(result.derivedFailures).toEqual([]);
    expect(result.removedFiles).toEqual([]);
    expect(fs.readdirSync(forumDir)).toHaveLength(5);
  });

  it('replaces the same day on a rerun instead of accumulating files', () => {
    const writer = new ArchiveWriter(dataDir, undefined, silent);
    writer.write(payload({ body: 'first' }), DATE);
    writer.write(payload({ body: 'second' }), DATE);

    expect(fs.readdirSync(forumDir)).toHaveLength(5);
    expect(fs.readFileSync(path.join(forumDir, 'macapps_2024-01-01.json'), 'utf-8')).toBe('second');
  });

  it('removes a superseded feed archive when a listing arrives the same day', () => {
    const writer = new ArchiveWriter(dataDir, undefined, silent);
    writer.write(payload({ strategy: 'feed', format: 'feed', body: '<feed/>' }), DATE);
    expect(fs.existsSync(path.join(forumDir, 'macapps_2024-01-01.xml'))).toBe(true);

    const result = writer.write(payload(), DATE);

    expect(result.removedFiles.map((f) => path.basename(f)).sort()).toEqual([
      'macapps_2024-01-01.xml',
      'macapps_2024-01-01_titles.txt',
    ]);
    expect(fs.existsSync(path.join(forumDir, 'macapps_2024-01-01.xml'))).toBe(false);
  });

  it('leaves other dates and unrelated files alone', () => {
    fs.mkdirSync(forumDir, { recursive: true });
    fs.writeFileSync(path.join(forumDir, 'macapps_2023-12-31.json'), 'older');
    fs.writeFileSync(path.join(forumDir, 'notes.txt'), 'keep me');

    new ArchiveWriter(dataDir, undefined, silent).write(payload(), DATE);

    expect(fs.readFileSync(path.join(forumDir, 'macapps_2023-12-31.json'), 'utf-8')).toBe('older');
    expect(fs.readFileSync(path.join(forumDir, 'notes.txt'), 'utf-8')).toBe('keep me');
  });

  it('keeps the raw file when a derived view fails', () => {
    const broken: DerivedView = {
      suffix: '_broken.txt',
      formats: ['listing'],
      render() {
        throw new Error('render failed');
      },
    };
    const writer = new ArchiveWriter(dataDir, [broken, readableView], silent);

    const result = writer.write(payload(), DATE);

    expect(fs.existsSync(result.rawFile)).toBe(true);
    expect(result.derivedFailures).toEqual([
      { file: path.join(forumDir, 'macapps_2024-01-01_broken.txt'), error: 'render failed' },
    ]);
    expect(result.derivedFiles).toEqual([path.join(forumDir, 'macapps_2024-01-01_readable.txt')]);
    expect(fs.existsSync(path.join(forumDir, 'macapps_2024-01-01_broken.txt'))).toBe(false);
  });

  it('raises ArchiveWriteError when the raw file cannot be written', () => {
    const blocked = path.join(dataDir, 'not-a-dir');
    fs.writeFileSync(blocked, '');
    const writer = new ArchiveWriter(blocked, undefined, silent);

    expect(() => writer.write(payload(), DATE)).toThrow(ArchiveWriteError);
  });
});

describe('writeFileAtomic', () => {
  it('leaves only the target behind', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'subarchive-atomic-'));
    try {
      const target = path.join(dir, 'out.txt');
      writeFileAtomic(target, 'content');
      expect(fs.readdirSync(dir)).toEqual(['out.txt']);
      expect(fs.readFileSync(target, 'utf-8')).toBe('content');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
