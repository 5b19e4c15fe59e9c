export type OutputFormat = 'text' | 'json';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export type CrawlState = 'idle' | 'running' | 'completed' | 'aborted';

export type TerminalState = Extract<CrawlState, 'completed' | 'aborted'>;

/** Decides whether a response body is scanned for links. */
export type ContentKind = 'html' | 'other';

export interface CrawlConfig {
  /** Normalized prefix; in-scope URLs start with this exact string. */
  readonly urlPrefix: string;
  readonly matchPattern: RegExp;
  /** 0 means unbounded. */
  readonly maxPages: number;
  readonly requestTimeoutMs: number;
  readonly logLevel: LogLevel;
  readonly outputDir: string;
  readonly concurrency: number;
  readonly logDiscovered: boolean;
}

export interface FrontierEntry {
  url: string;
  sequence: number;
  depth: number;
}

export interface FetchedPage {
  /** Final URL after redirects. */
  url: string;
  status: number;
  headers: Record<string, string>;
  contentType?: string;
  contentKind: ContentKind;
  body: Buffer;
}

export interface FetchPageOptions {
  timeoutMs: number;
}

export type PageFetcher = (url: string, options: FetchPageOptions) => Promise<FetchedPage>;

export interface MatchRecord {
  url: string;
  host: string;
  fetchedAt: string;
  httpStatus: number;
  contentLength: number;
  savedPath: string;
  matches: string[];
}

export interface FailureEvent {
  url: string;
  depth: number;
  reason: string;
  errorName: string;
}

export interface PageResult {
  url: string;
  depth: number;
  sequence: number;
  links: string[];
  status?: number;
  contentType?: string;
  matched: boolean;
  savedPath?: string;
  error?: string;
}

export interface CrawlSummary {
  status: TerminalState;
  pagesFetched: number;
  pagesSucceeded: number;
  pagesMatched: number;
  pagesSkipped: number;
  fetchErrors: number;
  uniqueUrlsDiscovered: number;
  duplicatesFiltered: number;
  frontierRemaining: number;
  maxDepth: number;
  totalLinksExtracted: number;
  statusCounts: Record<string, number>;
  failureReasons: Record<string, number>;
  durationMs: number;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  failureLog: FailureEvent[];
  fatalError?: { kind: string; message: string };
}

export interface CrawlHandlers {
  onPage(result: PageResult): void;
  onError?(error: Error, context: { url: string; depth: number }): void;
  onComplete?(summary: CrawlSummary): void;
}
