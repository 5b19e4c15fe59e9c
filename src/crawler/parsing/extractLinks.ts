import { load, type CheerioAPI } from 'cheerio';
import type { Element } from 'domhandler';

import { createParseError } from '../../errors.js';
import { getLogger } from '../../logger.js';

const LINK_SELECTOR = '[href], [src]';
const LINK_ATTRIBUTES = ['href', 'src'] as const;

/**
 * Absolute http(s) URLs referenced by a document, in document order. Parsing happens on the
 * first iteration and is reused afterwards, so the sequence can be iterated any number of
 * times. Duplicates are yielded as they appear; dedup belongs to the Frontier.
 */
export class LinkSequence implements Iterable<string> {
  private readonly baseUrl: URL;
  private document: CheerioAPI | null | undefined;

  constructor(private readonly html: string, baseUrl: string | URL) {
    this.baseUrl = new URL(baseUrl);
  }

  *[Symbol.iterator](): Iterator<string> {
    const $ = this.parse();
    if (!$) {
      return;
    }

    const elements: Element[] = $(LINK_SELECTOR).toArray();
    for (const element of elements) {
      for (const attribute of LINK_ATTRIBUTES) {
        const resolved = resolveReference(element.attribs[attribute], this.baseUrl);
        if (resolved) {
          yield resolved;
        }
      }
    }
  }

  private parse(): CheerioAPI | null {
    if (this.document !== undefined) {
      return this.document;
    }

    let document: CheerioAPI | null;
    try {
      document = load(this.html);
    } catch (error) {
      // Unparsable markup yields no links rather than failing the page.
      const parseError = createParseError(
        'Failed to parse HTML for links',
        { url: this.baseUrl.href, htmlLength: this.html.length },
        { cause: error },
      );
      getLogger().debug({ url: this.baseUrl.href, err: parseError }, parseError.message);
      document = null;
    }

    this.document = document;
    return document;
  }
}

export function extractLinks(html: string, baseUrl: string | URL): LinkSequence {
  return new LinkSequence(html, baseUrl);
}

export function resolveReference(raw: string | undefined, baseUrl: URL): string | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }

  let resolved: URL;
  try {
    resolved = new URL(trimmed, baseUrl);
  } catch {
    return undefined;
  }

  if (resolved.protocol !== 'http:' && resolved.protocol !== 'https:') {
    return undefined;
  }

  return resolved.href;
}
