import { normalizeUrl } from './normalizeUrl.js';

/**
 * Literal string-prefix test against an already normalized prefix. `https://a.com/blog`
 * therefore admits `https://a.com/blog2/x`; a prefix ending in `/` does not.
 */
export function inScope(url: string, prefix: string): boolean {
  const normalized = normalizeUrl(url);
  return normalized !== null && normalized.startsWith(prefix);
}

/** Unanchored search; anchors inside the pattern still apply. */
export function isMatch(url: string, pattern: RegExp): boolean {
  return withoutState(pattern).test(url);
}

export function findMatches(url: string, pattern: RegExp): string[] {
  const flags = pattern.flags.includes('g') ? pattern.flags : `${pattern.flags}g`;
  const global = new RegExp(pattern.source, flags);
  return [...url.matchAll(global)].map((match) => match[0]);
}

// `g` and `y` make RegExp#test advance lastIndex between calls.
function withoutState(pattern: RegExp): RegExp {
  if (!pattern.global && !pattern.sticky) {
    return pattern;
  }

  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}
