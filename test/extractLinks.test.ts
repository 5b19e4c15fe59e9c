import { describe, expect, it } from 'vitest';

import { extractLinks, resolveReference } from '../src/crawler/parsing/extractLinks.js';

describe('extractLinks', () => {
  const base = 'https://example.com/blog/post';

  it('resolves href and src references against the document URL', () => {
    const html = `
      <html>
        <head><link rel="stylesheet" href="style.css"></head>
        <body>
          <a href="../about">About</a>
          <img src="/img/logo.png" alt="">
          <a href="https://other.example/x">Elsewhere</a>
        </body>
      </html>
    `;

    expect([...extractLinks(html, base)]).toEqual([
      'https://example.com/blog/style.css',
      'https://example.com/about',
      'https://example.com/img/logo.png',
      'https://other.example/x',
    ]);
  });

  it('skips empty references and non-http schemes', () => {
    const html = `
      <a>No href</a>
      <a href="">Empty</a>
      <a href="   ">Blank</a>
      <a href="mailto:someone@example.com">Mail</a>
      <a href="javascript:void(0)">Script</a>
      <a href="  /kept  ">Trimmed</a>
    `;

    expect([...extractLinks(html, base)]).toEqual(['https://example.com/kept']);
  });

  it('yields duplicates in document order', () => {
    const html = '<a href="/a">A</a><a href="/b">B</a><a href="/a">A again</a>';

    expect([...extractLinks(html, base)]).toEqual([
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/a',
    ]);
  });

  it('can be iterated more than once', () => {
    const links = extractLinks('<a href="/a">A</a><a href="/b">B</a>', base);

    const first = [...links];
    const second = [...links];

    expect(first).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect(second).toEqual(first);
  });

  it('is lazy: stopping early does not require the rest of the document', () => {
    const links = extractLinks('<a href="/a">A</a><a href="/b">B</a><a href="/c">C</a>', base);

    const iterator = links[Symbol.iterator]();
    expect(iterator.next()).toEqual({ value: 'https://example.com/a', done: false });
    expect(iterator.return?.()).toEqual({ value: undefined, done: true });
  });

  it('tolerates malformed markup', () => {
    const html = `<div><a href="/a">A</a></span></p><a href='/b'>B<a href=/c>C</div><a href="/d`;

    const unique = [...new Set(extractLinks(html, base))];
    expect(unique).toEqual([
      'https://example.com/a',
      'https://example.com/b',
      'https://example.com/c',
    ]);
  });

  it('yields nothing for a document without references', () => {
    expect([...extractLinks('', base)]).toEqual([]);
    expect([...extractLinks('plain text, not markup', base)]).toEqual([]);
  });
});

describe('resolveReference', () => {
  const base = new URL('https://example.com/docs/');

  it('returns undefined for values that do not form a URL', () => {
    expect(resolveReference(undefined, base)).toBeUndefined();
    expect(resolveReference('http://[broken', base)).toBeUndefined();
  });

  it('keeps query strings and fragments for the frontier to normalize', () => {
    expect(resolveReference('guide?v=2#intro', base)).toBe('https://example.com/docs/guide?v=2#intro');
  });
});
