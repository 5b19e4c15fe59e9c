import { CrawlerError } from '../../errors.js';
import { CrawlSummary, TerminalState } from '../../types.js';
import { FailureTracker } from '../state/failures.js';
import { Frontier } from '../state/frontier.js';
import { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  status: TerminalState;
  stats: CrawlStats;
  frontier: Frontier;
  failures: FailureTracker;
  startTime: number;
  fatalError?: CrawlerError;
  now?: number;
}): CrawlSummary {
  const { status, stats, frontier, failures, startTime, fatalError, now = Date.now() } = options;

  const summary: CrawlSummary = {
    status,
    pagesFetched: stats.pagesFetched,
    pagesSucceeded: stats.pagesSucceeded,
    pagesMatched: stats.pagesMatched,
    pagesSkipped: stats.pagesSkipped,
    fetchErrors: stats.fetchErrors,
    uniqueUrlsDiscovered: frontier.uniqueCount,
    duplicatesFiltered: stats.duplicatesFiltered,
    frontierRemaining: frontier.pending,
    maxDepth: stats.maxDepth,
    totalLinksExtracted: stats.totalLinksExtracted,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].map(([code, count]) => [String(code), count]),
    ),
    failureReasons: Object.fromEntries(stats.failureReasons.entries()),
    durationMs: now - startTime,
    actualMaxConcurrency: stats.actualMaxConcurrency,
    peakQueueSize: stats.peakQueueSize,
    failureLog: failures.list(),
  };

  if (fatalError) {
    summary.fatalError = { kind: fatalError.kind, message: fatalError.message };
  }

  return summary;
}
