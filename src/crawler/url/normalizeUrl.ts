import { createConfigurationError } from '../../errors.js';

/**
 * Canonical form used for dedup: lowercase scheme and host, no fragment, no default port,
 * and no trailing slash except on the root path. Query strings are kept verbatim.
 * Returns null for anything that is not an absolute http(s) URL once resolved.
 */
export function normalizeUrl(raw: string, base?: string | URL): string | null {
  try {
    const url = new URL(raw, base);

    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }

    // URL already lowercases scheme and host and drops default ports.
    url.hash = '';
    normalizePath(url);

    return url.toString();
  } catch {
    return null;
  }
}

/**
 * Normalizes the configured prefix. Unlike page URLs the trailing slash survives, since
 * the prefix is compared as a literal string and `/blog/` must stay distinct from `/blog`.
 */
export function normalizePrefix(raw: string): string {
  let url: URL;

  try {
    url = new URL(raw.trim());
  } catch {
    throw createConfigurationError(`Invalid URL prefix: ${raw}`, { urlPrefix: raw });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('URL prefix must use http or https protocol.', {
      protocol: url.protocol,
      urlPrefix: raw,
    });
  }

  if (!url.hostname) {
    throw createConfigurationError('URL prefix must include a hostname.', { urlPrefix: raw });
  }

  url.hash = '';
  url.search = '';

  return url.toString();
}

function normalizePath(url: URL): void {
  if (url.pathname === '/') {
    return;
  }

  const trimmed = url.pathname.replace(/\/+$/, '');
  url.pathname = trimmed.length > 0 ? trimmed : '/';
}
