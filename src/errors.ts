export type ErrorKind = 'fetch' | 'parse' | 'config' | 'persistence' | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = `${capitalize(kind)}Error`;
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export type FetchFailureReason = 'timeout' | 'network' | 'http';

const FETCH_ERROR_NAMES: Record<FetchFailureReason, string> = {
  timeout: 'TimeoutError',
  network: 'NetworkError',
  http: 'HttpError',
};

export interface FetchErrorProps extends Omit<CrawlerErrorProps, 'kind' | 'severity'> {
  reason: FetchFailureReason;
  status?: number;
}

/**
 * A failed fetch. Always recoverable: the engine counts it and moves on.
 * `status` is only set for `http` failures.
 */
export class FetchError extends CrawlerError {
  readonly reason: FetchFailureReason;
  readonly status?: number;

  constructor({ reason, status, ...props }: FetchErrorProps) {
    super({ ...props, kind: 'fetch', severity: 'recoverable' });
    this.name = FETCH_ERROR_NAMES[reason];
    this.reason = reason;
    this.status = status;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function isFetchError(value: unknown): value is FetchError {
  return value instanceof FetchError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createTimeoutError(
  url: string,
  timeoutMs: number,
  options: { cause?: unknown } = {},
): FetchError {
  return new FetchError({
    message: `Request timed out after ${timeoutMs}ms`,
    reason: 'timeout',
    details: { url, timeoutMs },
    cause: options.cause,
  });
}

export function createNetworkError(
  url: string,
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): FetchError {
  return new FetchError({
    message,
    reason: 'network',
    details: { url, ...details },
    cause: options.cause,
  });
}

export function createHttpError(url: string, status: number): FetchError {
  return new FetchError({
    message: `HTTP ${status}`,
    reason: 'http',
    status,
    details: { url, status },
  });
}

export function createParseError(
  message: string,
  details: Record<string, unknown> = {},
  options: { severity?: ErrorSeverity; cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'parse',
    severity: options.severity ?? 'recoverable',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createPersistenceError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'persistence',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}

function capitalize(value: string): string {
  if (!value) {
    return value;
  }
  return value.charAt(0).toUpperCase() + value.slice(1);
}
