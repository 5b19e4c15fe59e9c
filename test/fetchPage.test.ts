import { afterAll, beforeAll, describe, expect, it } from 'vitest';

import { detectContentKind, fetchPage } from '../src/crawler/network/fetchPage.js';
import { FetchError } from '../src/errors.js';
import { findClosedPort, startTestSite, type TestSite } from './helpers/testSite.js';

let site: TestSite;

beforeAll(async () => {
  site = await startTestSite({
    '/page': '<html><body><a href="/next">Next</a></body></html>',
    '/data.json': { body: '{"ok":true}', contentType: 'application/json' },
    '/old': { redirectTo: '/page' },
    '/broken': { status: 500, body: 'boom' },
    '/slow': { body: '<html></html>', delayMs: 1_000 },
  });
});

afterAll(async () => {
  await site.close();
});

async function captureFailure(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('Expected the fetch to fail.');
}

describe('fetchPage', () => {
  it('returns status, headers and body for an HTML page', async () => {
    const page = await fetchPage(`${site.baseUrl}/page`, { timeoutMs: 5_000 });

    expect(page.status).toBe(200);
    expect(page.contentKind).toBe('html');
    expect(page.contentType).toBe('text/html; charset=utf-8');
    expect(page.headers['content-type']).toBe('text/html; charset=utf-8');
    expect(page.body.toString('utf8')).toBe('<html><body><a href="/next">Next</a></body></html>');
  });

  it('marks non-HTML responses', async () => {
    const page = await fetchPage(`${site.baseUrl}/data.json`, { timeoutMs: 5_000 });

    expect(page.contentKind).toBe('other');
    expect(page.body.toString('utf8')).toBe('{"ok":true}');
  });

  it('follows redirects and reports the final URL', async () => {
    const page = await fetchPage(`${site.baseUrl}/old`, { timeoutMs: 5_000 });

    expect(page.url).toBe(`${site.baseUrl}/page`);
    expect(page.status).toBe(200);
  });

  it('fails with an HttpError for non-2xx responses', async () => {
    const error = await captureFailure(fetchPage(`${site.baseUrl}/broken`, { timeoutMs: 5_000 }));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      name: 'HttpError',
      reason: 'http',
      status: 500,
      message: 'HTTP 500',
      severity: 'recoverable',
    });
  });

  it('fails with a TimeoutError when the server is too slow', async () => {
    const error = await captureFailure(fetchPage(`${site.baseUrl}/slow`, { timeoutMs: 50 }));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({
      name: 'TimeoutError',
      reason: 'timeout',
      message: 'Request timed out after 50ms',
    });
  });

  it('fails with a NetworkError when nothing is listening', async () => {
    const port = await findClosedPort();
    const error = await captureFailure(fetchPage(`http://127.0.0.1:${port}/`, { timeoutMs: 5_000 }));

    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ name: 'NetworkError', reason: 'network', kind: 'fetch' });
  });
});

describe('detectContentKind', () => {
  it('recognises HTML media types regardless of parameters and case', () => {
    expect(detectContentKind('text/html')).toBe('html');
    expect(detectContentKind('Text/HTML; charset=ISO-8859-1')).toBe('html');
    expect(detectContentKind('application/xhtml+xml')).toBe('html');
  });

  it('treats everything else as other', () => {
    expect(detectContentKind(undefined)).toBe('other');
    expect(detectContentKind('application/pdf')).toBe('other');
    expect(detectContentKind('text/plain')).toBe('other');
  });
});
