import { createHash } from 'node:crypto';
import { appendFileSync, existsSync, mkdirSync, readFileSync, writeFileSync } from 'node:fs';
import path from 'node:path';

import { createPersistenceError } from '../../errors.js';
import { getLogger } from '../../logger.js';
import type { MatchRecord } from '../../types.js';

export const MATCHES_FILE = 'matches.jsonl';

const MAX_STEM_LENGTH = 200;
const HASH_LENGTH = 10;
const DEFAULT_EXTENSION = '.html';
const EXTENSION_PATTERN = /\.([A-Za-z0-9]{1,8})$/;

/**
 * Writes matched pages under `<outputDir>/<host>/` and appends records to
 * `<outputDir>/matches.jsonl`. All writes are synchronous so a record line is never
 * interleaved with another. Any write failure surfaces as a fatal PersistenceError.
 */
export class PageWriter {
  readonly recordsPath: string;
  // saved path -> URL that owns it
  private readonly claims = new Map<string, string>();

  constructor(private readonly outputDir: string) {
    this.recordsPath = path.join(outputDir, MATCHES_FILE);
  }

  save(host: string, url: string, body: Uint8Array): string {
    const target = this.resolveTarget(host, url);

    try {
      mkdirSync(path.dirname(target), { recursive: true });
      writeFileSync(target, body);
    } catch (error) {
      throw createPersistenceError(
        `Failed to write page for ${url}`,
        { url, path: target },
        { cause: error },
      );
    }

    this.claims.set(target, url);
    return target;
  }

  appendRecord(record: MatchRecord): void {
    const line = `${JSON.stringify(record)}\n`;

    try {
      mkdirSync(this.outputDir, { recursive: true });
      appendFileSync(this.recordsPath, line, 'utf8');
    } catch (error) {
      throw createPersistenceError(
        `Failed to append match record for ${record.url}`,
        { url: record.url, path: this.recordsPath },
        { cause: error },
      );
    }
  }

  resolveTarget(host: string, url: string): string {
    const directory = path.join(this.outputDir, sanitizeHost(host));
    const preferred = path.join(directory, deriveFileName(url));
    const owner = this.claims.get(preferred);

    if (owner === undefined || owner === url) {
      return preferred;
    }

    return path.join(directory, deriveFileName(url, shortHash(url)));
  }

  /** Claims the saved paths listed in an existing `matches.jsonl`. Call once before saving. */
  loadClaims(): void {
    if (!existsSync(this.recordsPath)) {
      return;
    }

    let contents: string;
    try {
      contents = readFileSync(this.recordsPath, 'utf8');
    } catch (error) {
      throw createPersistenceError(
        'Failed to read existing match records',
        { path: this.recordsPath },
        { cause: error },
      );
    }

    let skipped = 0;
    for (const line of contents.split('\n')) {
      if (line.trim().length === 0) {
        continue;
      }

      const claim = parseClaim(line);
      if (claim) {
        this.claims.set(claim.savedPath, claim.url);
      } else {
        skipped += 1;
      }
    }

    if (skipped > 0) {
      getLogger().debug({ path: this.recordsPath, skipped }, 'Ignored unreadable match records');
    }
  }
}

/**
 * `/blog/post-12/` -> `blog_post-12.html`, `/` -> `index.html`, `/docs/guide.PDF` -> `docs_guide.pdf`.
 * The query string does not take part; URLs that differ only there collide and get a hash suffix.
 */
export function deriveFileName(url: string, disambiguator?: string): string {
  const segments = new URL(url).pathname.split('/').filter((segment) => segment.length > 0);
  let extension = DEFAULT_EXTENSION;

  const last = segments.pop();
  if (last !== undefined) {
    const match = EXTENSION_PATTERN.exec(last);
    if (match && match.index > 0) {
      extension = `.${match[1].toLowerCase()}`;
      segments.push(last.slice(0, match.index));
    } else {
      segments.push(last);
    }
  }

  const stem =
    segments
      .map(sanitizeSegment)
      .filter((segment) => segment.length > 0)
      .join('_')
      .slice(0, MAX_STEM_LENGTH) || 'index';

  return disambiguator ? `${stem}_${disambiguator}${extension}` : `${stem}${extension}`;
}

export function shortHash(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, HASH_LENGTH);
}

function sanitizeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9_-]+/g, '_').replace(/^_+|_+$/g, '');
}

function sanitizeHost(host: string): string {
  return host.toLowerCase().replace(/[^a-z0-9.-]+/g, '_') || 'site';
}

function parseClaim(line: string): { url: string; savedPath: string } | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return undefined;
  }

  if (
    typeof parsed === 'object' &&
    parsed !== null &&
    'url' in parsed &&
    'savedPath' in parsed &&
    typeof parsed.url === 'string' &&
    typeof parsed.savedPath === 'string'
  ) {
    return { url: parsed.url, savedPath: parsed.savedPath };
  }

  return undefined;
}
