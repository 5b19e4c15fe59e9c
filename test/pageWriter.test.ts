import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  MATCHES_FILE,
  PageWriter,
  deriveFileName,
  shortHash,
} from '../src/crawler/persistence/pageWriter.js';
import { CrawlerError } from '../src/errors.js';
import type { MatchRecord } from '../src/types.js';

let outputDir: string;

beforeEach(() => {
  outputDir = mkdtempSync(path.join(tmpdir(), 'prefix-crawler-writer-'));
});

afterEach(() => {
  rmSync(outputDir, { recursive: true, force: true });
});

describe('deriveFileName', () => {
  it('joins path segments into a flat file name', () => {
    expect(deriveFileName('https://example.com/blog/post-12')).toBe('blog_post-12.html');
  });

  it('names the root page index', () => {
    expect(deriveFileName('https://example.com/')).toBe('index.html');
  });

  it('keeps a recognizable extension from the last segment', () => {
    expect(deriveFileName('https://example.com/docs/guide.PDF')).toBe('docs_guide.pdf');
  });

  it('replaces unsafe characters', () => {
    expect(deriveFileName('https://example.com/a%20b/c:d')).toBe('a_20b_c_d.html');
  });

  it('ignores the query string and appends a disambiguator when given', () => {
    expect(deriveFileName('https://example.com/list?page=2')).toBe('list.html');
    expect(deriveFileName('https://example.com/list?page=2', 'abc123')).toBe('list_abc123.html');
  });
});

describe('PageWriter', () => {
  it('writes the body under the host directory and returns the path', () => {
    const writer = new PageWriter(outputDir);

    const saved = writer.save('example.com', 'https://example.com/blog/post-12', Buffer.from('<p>hi</p>'));

    expect(saved).toBe(path.join(outputDir, 'example.com', 'blog_post-12.html'));
    expect(readFileSync(saved, 'utf8')).toBe('<p>hi</p>');
  });

  it('reuses the same path when the same URL is saved again', () => {
    const writer = new PageWriter(outputDir);
    const url = 'https://example.com/blog/post-12';

    const first = writer.save('example.com', url, Buffer.from('one'));
    const second = writer.save('example.com', url, Buffer.from('two'));

    expect(second).toBe(first);
    expect(readFileSync(second, 'utf8')).toBe('two');
  });

  it('disambiguates distinct URLs that map to the same file name', () => {
    const writer = new PageWriter(outputDir);
    const firstUrl = 'https://example.com/list?page=1';
    const secondUrl = 'https://example.com/list?page=2';

    const first = writer.save('example.com', firstUrl, Buffer.from('page one'));
    const second = writer.save('example.com', secondUrl, Buffer.from('page two'));

    expect(first).toBe(path.join(outputDir, 'example.com', 'list.html'));
    expect(second).toBe(path.join(outputDir, 'example.com', `list_${shortHash(secondUrl)}.html`));
    expect(readFileSync(first, 'utf8')).toBe('page one');
    expect(readFileSync(second, 'utf8')).toBe('page two');
  });

  it('appends one JSON object per line', () => {
    const writer = new PageWriter(outputDir);
    const records: MatchRecord[] = [
      {
        url: 'https://example.com/post-1',
        host: 'example.com',
        fetchedAt: '2026-01-01T00:00:00.000Z',
        httpStatus: 200,
        contentLength: 3,
        savedPath: path.join(outputDir, 'example.com', 'post-1.html'),
        matches: ['post-1'],
      },
      {
        url: 'https://example.com/post-2',
        host: 'example.com',
        fetchedAt: '2026-01-01T00:00:01.000Z',
        httpStatus: 200,
        contentLength: 5,
        savedPath: path.join(outputDir, 'example.com', 'post-2.html'),
        matches: ['post-2'],
      },
    ];

    records.forEach((record) => writer.appendRecord(record));

    const lines = readFileSync(path.join(outputDir, MATCHES_FILE), 'utf8').split('\n');
    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe('');
    expect(lines.slice(0, 2).map((line) => JSON.parse(line))).toEqual(records);
  });

  it('never truncates an existing matches file', () => {
    const recordsPath = path.join(outputDir, MATCHES_FILE);
    writeFileSync(recordsPath, 'earlier history\n');

    new PageWriter(outputDir).appendRecord({
      url: 'https://example.com/post-3',
      host: 'example.com',
      fetchedAt: '2026-01-01T00:00:00.000Z',
      httpStatus: 200,
      contentLength: 1,
      savedPath: 'x',
      matches: [],
    });

    expect(readFileSync(recordsPath, 'utf8').startsWith('earlier history\n')).toBe(true);
  });

  it('keeps files claimed by earlier runs for their own URLs', () => {
    const claimedPath = path.join(outputDir, 'example.com', 'list.html');
    const earlierUrl = 'https://example.com/list?page=1';
    writeFileSync(
      path.join(outputDir, MATCHES_FILE),
      `not json\n${JSON.stringify({ url: earlierUrl, savedPath: claimedPath })}\n`,
    );

    const writer = new PageWriter(outputDir);
    writer.loadClaims();
    const laterUrl = 'https://example.com/list?page=2';

    expect(writer.resolveTarget('example.com', laterUrl)).toBe(
      path.join(outputDir, 'example.com', `list_${shortHash(laterUrl)}.html`),
    );
    expect(writer.resolveTarget('example.com', earlierUrl)).toBe(claimedPath);
  });

  it('reports an unreadable matches file as a fatal persistence error', () => {
    mkdirSync(path.join(outputDir, MATCHES_FILE));
    const writer = new PageWriter(outputDir);

    expect(() => writer.loadClaims()).toThrowError('Failed to read existing match records');
  });

  it('reports write failures as fatal persistence errors', () => {
    const blocker = path.join(outputDir, 'not-a-directory');
    writeFileSync(blocker, 'occupied');
    const writer = new PageWriter(blocker);

    let thrown: unknown;
    try {
      writer.save('example.com', 'https://example.com/post-1', Buffer.from('body'));
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(CrawlerError);
    expect(thrown).toMatchObject({ name: 'PersistenceError', kind: 'persistence', severity: 'fatal' });
  });
});
