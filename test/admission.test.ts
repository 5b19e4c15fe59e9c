import { describe, expect, it } from 'vitest';

import { findMatches, inScope, isMatch } from '../src/crawler/url/admission.js';

describe('inScope', () => {
  it('is a literal string-prefix test', () => {
    expect(inScope('https://a.com/blog/post-1', 'https://a.com/blog')).toBe(true);
    expect(inScope('https://a.com/blog2/x', 'https://a.com/blog')).toBe(true);
    expect(inScope('https://a.com/other', 'https://a.com/blog')).toBe(false);
  });

  it('gives word-boundary behaviour only when the prefix ends with a separator', () => {
    expect(inScope('https://a.com/blog2/x', 'https://a.com/blog/')).toBe(false);
    expect(inScope('https://a.com/blog/x', 'https://a.com/blog/')).toBe(true);
  });

  it('compares the normalized form of the candidate', () => {
    expect(inScope('HTTPS://A.COM:443/blog/x/#comments', 'https://a.com/blog/')).toBe(true);
  });

  it('rejects other hosts and unusable URLs', () => {
    expect(inScope('https://b.com/blog/x', 'https://a.com/blog')).toBe(false);
    expect(inScope('mailto:someone@a.com', 'https://a.com/')).toBe(false);
  });
});

describe('isMatch', () => {
  const pattern = /post-\d+/;

  it('finds the pattern anywhere in the URL', () => {
    expect(isMatch('https://a.com/blog/post-12', pattern)).toBe(true);
    expect(isMatch('https://a.com/blog/about', pattern)).toBe(false);
  });

  it('honours anchors written into the pattern', () => {
    expect(isMatch('https://a.com/post-12', /^post-\d+/)).toBe(false);
    expect(isMatch('https://a.com/post-12', /post-\d+$/)).toBe(true);
  });

  it('returns the same answer on repeated calls with a global pattern', () => {
    const global = /post/g;
    expect(isMatch('https://a.com/post', global)).toBe(true);
    expect(isMatch('https://a.com/post', global)).toBe(true);
    expect(global.lastIndex).toBe(0);
  });
});

describe('findMatches', () => {
  it('lists every match in order', () => {
    expect(findMatches('https://a.com/2024/post-12', /\d+/)).toEqual(['2024', '12']);
  });

  it('returns an empty list when nothing matches', () => {
    expect(findMatches('https://a.com/about', /post-\d+/)).toEqual([]);
  });
});
