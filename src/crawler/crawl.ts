import pLimit from 'p-limit';

import {
  CrawlConfig,
  CrawlHandlers,
  CrawlState,
  CrawlSummary,
  FetchedPage,
  FrontierEntry,
  MatchRecord,
  OutputFormat,
  PageFetcher,
  PageResult,
  TerminalState,
} from '../types.js';
import {
  CrawlerError,
  createConfigurationError,
  ensureCrawlerError,
  isFetchError,
} from '../errors.js';
import { getLogger, type LoggerLike } from '../logger.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { resetOutputConfig, setOutputConfig, writeSummary } from '../util/output.js';
import { fetchPage } from './network/fetchPage.js';
import { extractLinks } from './parsing/extractLinks.js';
import { PageWriter } from './persistence/pageWriter.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { createDefaultHandlers } from './handlers/defaultHandlers.js';
import { FailureTracker } from './state/failures.js';
import { Frontier } from './state/frontier.js';
import { CrawlStats, initializeStats, recordPageMetrics } from './state/stats.js';
import { findMatches, inScope, isMatch } from './url/admission.js';
import { normalizeUrl } from './url/normalizeUrl.js';

export interface CrawlRuntimeOptions {
  handlers?: Partial<CrawlHandlers>;
  fetcher?: PageFetcher;
  writer?: PageWriter;
  clock?: () => Date;
  format?: OutputFormat;
  quiet?: boolean;
}

interface EngineDependencies {
  handlers: CrawlHandlers;
  fetcher: PageFetcher;
  writer: PageWriter;
  clock: () => Date;
}

/**
 * Idle -> Running -> Completed | Aborted. Owns the frontier, counters and failure log for
 * exactly one run. Fetches are the only await points; everything after a fetch resolves
 * runs synchronously, so frontier pushes and the page bound never race each other.
 */
class CrawlerEngine {
  private state: CrawlState = 'idle';
  private readonly frontier = new Frontier();
  private readonly failures = new FailureTracker();
  private readonly stats: CrawlStats = initializeStats(0);
  private readonly limiter: ReturnType<typeof pLimit>;
  private readonly activePromises = new Set<Promise<void>>();
  private readonly logger: LoggerLike;
  private startTime = 0;
  private scheduledCount = 0;
  private activeCount = 0;
  private runningCount = 0;
  private fatalError: CrawlerError | undefined;

  constructor(
    private readonly config: CrawlConfig,
    private readonly deps: EngineDependencies,
  ) {
    this.limiter = pLimit(this.config.concurrency);
    this.logger = getLogger().child({ component: 'crawler' });
  }

  async run(): Promise<CrawlSummary> {
    this.state = 'running';
    this.startTime = Date.now();
    this.logger.info(
      {
        urlPrefix: this.config.urlPrefix,
        matchPattern: this.config.matchPattern.source,
        maxPages: this.config.maxPages === 0 ? 'unbounded' : this.config.maxPages,
        timeoutMs: this.config.requestTimeoutMs,
        concurrency: this.config.concurrency,
      },
      'Crawler started',
    );

    if (this.openWriter()) {
      this.seed();
      this.pump();
    }

    while (this.activePromises.size > 0) {
      await Promise.allSettled([...this.activePromises]);
    }

    const status = this.finish();

    return buildCrawlSummary({
      status,
      stats: this.stats,
      frontier: this.frontier,
      failures: this.failures,
      startTime: this.startTime,
      fatalError: this.fatalError,
    });
  }

  private openWriter(): boolean {
    try {
      this.deps.writer.loadClaims();
      return true;
    } catch (error) {
      this.abort(ensureCrawlerError(error, { kind: 'persistence', severity: 'fatal' }));
      return false;
    }
  }

  private seed(): void {
    const seed = normalizeUrl(this.config.urlPrefix);
    if (!seed || !this.frontier.push(seed)) {
      this.abort(
        createConfigurationError('Unable to seed the frontier from the URL prefix.', {
          urlPrefix: this.config.urlPrefix,
        }),
      );
      return;
    }

    this.stats.peakQueueSize = this.frontier.pending;
  }

  private finish(): TerminalState {
    const status: TerminalState = this.state === 'aborted' ? 'aborted' : 'completed';
    this.state = status;

    if (status === 'completed' && this.boundReached() && !this.frontier.isEmpty()) {
      this.logger.info(
        { maxPages: this.config.maxPages, frontierRemaining: this.frontier.pending },
        'Stopped because the page limit was reached',
      );
    }

    return status;
  }

  private boundReached(): boolean {
    return this.config.maxPages > 0 && this.scheduledCount >= this.config.maxPages;
  }

  private pump(): void {
    while (
      this.state === 'running' &&
      this.activeCount < this.config.concurrency &&
      !this.boundReached()
    ) {
      const next = this.frontier.pop();
      if (!next) {
        break;
      }

      this.schedule(next);
    }
  }

  private schedule(entry: FrontierEntry): void {
    // Counted before the task starts so concurrent workers can never overshoot maxPages.
    this.scheduledCount += 1;
    this.activeCount += 1;

    const task = this.limiter(async () => {
      this.runningCount += 1;
      this.stats.actualMaxConcurrency = Math.max(
        this.stats.actualMaxConcurrency,
        this.runningCount,
      );
      try {
        await this.handleEntry(entry);
      } finally {
        this.runningCount -= 1;
      }
    })
      .catch((error: unknown) => {
        this.abort(
          ensureCrawlerError(error, {
            kind: 'internal',
            severity: 'fatal',
            details: { url: entry.url, depth: entry.depth },
          }),
          entry,
        );
      })
      .finally(() => {
        this.activeCount -= 1;
        this.activePromises.delete(task);
        this.pump();
      });

    this.activePromises.add(task);
  }

  private async handleEntry(entry: FrontierEntry): Promise<void> {
    if (this.state !== 'running') {
      return;
    }

    this.stats.pagesFetched += 1;
    this.logger.debug({ url: entry.url, sequence: entry.sequence }, 'Fetching page');

    const pageResult: PageResult = {
      url: entry.url,
      depth: entry.depth,
      sequence: entry.sequence,
      links: [],
      matched: false,
    };

    let page: FetchedPage;
    try {
      page = await this.deps.fetcher(entry.url, { timeoutMs: this.config.requestTimeoutMs });
    } catch (error) {
      this.handleFetchFailure(entry, pageResult, error);
      return;
    }

    const fetchedAt = this.deps.clock();

    if (this.state !== 'running') {
      return;
    }

    pageResult.status = page.status;
    pageResult.contentType = page.contentType;

    if (isMatch(entry.url, this.config.matchPattern)) {
      try {
        pageResult.savedPath = this.persistMatch(entry, page, fetchedAt);
      } catch (error) {
        this.abort(ensureCrawlerError(error, { kind: 'persistence', severity: 'fatal' }), entry);
        return;
      }
      pageResult.matched = pageResult.savedPath !== undefined;
    }

    if (page.contentKind === 'html') {
      pageResult.links = this.discoverLinks(entry, page);
    }

    recordPageMetrics(this.stats, pageResult, true, page.status, undefined);
    this.deps.handlers.onPage(pageResult);
  }

  private persistMatch(entry: FrontierEntry, page: FetchedPage, fetchedAt: Date): string | undefined {
    if (page.body.byteLength === 0) {
      this.logger.debug({ url: entry.url }, 'Matched page has an empty body; nothing saved');
      return undefined;
    }

    const host = new URL(entry.url).hostname;
    const savedPath = this.deps.writer.save(host, entry.url, page.body);
    const record: MatchRecord = {
      url: entry.url,
      host,
      fetchedAt: fetchedAt.toISOString(),
      httpStatus: page.status,
      contentLength: page.body.byteLength,
      savedPath,
      matches: findMatches(entry.url, this.config.matchPattern),
    };

    this.deps.writer.appendRecord(record);
    this.logger.info(
      { url: entry.url, savedPath, matches: record.matches.length },
      'Saved matched page',
    );

    return savedPath;
  }

  private discoverLinks(entry: FrontierEntry, page: FetchedPage): string[] {
    const inScopeLinks = new Set<string>();

    for (const link of extractLinks(page.body.toString('utf8'), page.url)) {
      this.stats.totalLinksExtracted += 1;
      if (this.config.logDiscovered) {
        this.logger.debug({ url: link, foundOn: entry.url }, 'Discovered link');
      }

      const normalized = normalizeUrl(link);
      if (!normalized || !inScope(normalized, this.config.urlPrefix)) {
        this.stats.pagesSkipped += 1;
        continue;
      }

      inScopeLinks.add(normalized);

      if (this.boundReached()) {
        continue;
      }

      if (this.frontier.push(normalized, entry.depth + 1)) {
        this.stats.peakQueueSize = Math.max(this.stats.peakQueueSize, this.frontier.pending);
      } else {
        this.stats.duplicatesFiltered += 1;
      }
    }

    return [...inScopeLinks];
  }

  private handleFetchFailure(entry: FrontierEntry, pageResult: PageResult, error: unknown): void {
    const crawlerError = ensureCrawlerError(error, { kind: 'fetch', severity: 'recoverable' });

    pageResult.error = crawlerError.message;
    if (isFetchError(crawlerError) && crawlerError.status !== undefined) {
      pageResult.status = crawlerError.status;
    }

    reportCrawlerError(
      crawlerError,
      { stage: 'fetch', url: entry.url, depth: entry.depth },
      { throwOnFatal: false },
    );

    this.failures.record(entry, crawlerError);
    recordPageMetrics(this.stats, pageResult, false, pageResult.status, crawlerError.message);
    this.deps.handlers.onError?.(crawlerError, { url: entry.url, depth: entry.depth });
    this.deps.handlers.onPage(pageResult);
  }

  private abort(error: CrawlerError, entry?: FrontierEntry): void {
    const context = { url: entry?.url ?? this.config.urlPrefix, depth: entry?.depth ?? 0 };

    reportCrawlerError(error, { stage: 'crawl', ...context }, { throwOnFatal: false });

    if (this.state !== 'running') {
      return;
    }

    this.state = 'aborted';
    this.fatalError = error;
    this.deps.handlers.onError?.(error, context);
  }
}

/**
 * Runs one crawl to a terminal state. Fetch failures never reject; a persistence failure
 * ends the run as `aborted` and is reported in the summary rather than thrown.
 */
export async function crawl(config: CrawlConfig, runtime: CrawlRuntimeOptions = {}): Promise<CrawlSummary> {
  const handlers: CrawlHandlers = {
    ...createDefaultHandlers(),
    ...(runtime.handlers ?? {}),
  };

  setOutputConfig({ quiet: runtime.quiet ?? false, format: runtime.format ?? 'text' });

  try {
    const engine = new CrawlerEngine(config, {
      handlers,
      fetcher: runtime.fetcher ?? fetchPage,
      writer: runtime.writer ?? new PageWriter(config.outputDir),
      clock: runtime.clock ?? (() => new Date()),
    });
    const summary = await engine.run();

    getLogger().info(
      {
        status: summary.status,
        pagesFetched: summary.pagesFetched,
        pagesMatched: summary.pagesMatched,
        fetchErrors: summary.fetchErrors,
        durationMs: summary.durationMs,
      },
      'Crawl finished',
    );

    if (handlers.onComplete) {
      handlers.onComplete(summary);
    } else {
      writeSummary(summary);
    }

    return summary;
  } finally {
    resetOutputConfig();
  }
}
