import {
  createHttpError,
  createNetworkError,
  createTimeoutError,
  isFetchError,
  type FetchError,
} from '../../errors.js';
import type { ContentKind, FetchedPage, FetchPageOptions } from '../../types.js';

const HTML_CONTENT_TYPES = ['text/html', 'application/xhtml+xml'];

/**
 * Single GET with no retry. The timeout covers the whole exchange, body included.
 * Rejects with a FetchError: TimeoutError, NetworkError, or HttpError for non-2xx.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchedPage> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      redirect: 'follow',
      signal: controller.signal,
      headers: {
        'user-agent': 'prefix-crawler/0.1',
        accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
        'accept-encoding': 'gzip, deflate, br',
      },
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw createHttpError(url, response.status);
    }

    const body = Buffer.from(await response.arrayBuffer());
    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });
    const contentType = response.headers.get('content-type') ?? undefined;

    return {
      url: response.url || url,
      status: response.status,
      headers,
      contentType,
      contentKind: detectContentKind(contentType),
      body,
    };
  } catch (error) {
    throw toFetchError(error, url, options.timeoutMs, controller.signal.aborted);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function detectContentKind(contentType: string | undefined): ContentKind {
  if (!contentType) {
    return 'other';
  }

  const mediaType = contentType.split(';', 1)[0].trim().toLowerCase();
  return HTML_CONTENT_TYPES.includes(mediaType) ? 'html' : 'other';
}

function toFetchError(error: unknown, url: string, timeoutMs: number, aborted: boolean): FetchError {
  if (isFetchError(error)) {
    return error;
  }

  const err = error instanceof Error ? error : new Error(String(error));

  if (aborted) {
    return createTimeoutError(url, timeoutMs, { cause: err });
  }

  const code = extractErrorCode(err);
  const message = describeNetworkFailure(err, code);
  return createNetworkError(url, message, typeof code === 'string' ? { code } : {}, { cause: err });
}

// undici reports "fetch failed" and hides the useful part in `cause`.
function describeNetworkFailure(error: Error, code: string | undefined): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message) {
    return cause.message;
  }

  if (code) {
    return code;
  }

  return error.message || 'Request failed';
}

function extractErrorCode(error: Error): string | undefined {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
