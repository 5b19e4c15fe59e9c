import { PageResult } from '../../types.js';

export interface CrawlStats {
  pagesFetched: number;
  pagesSucceeded: number;
  pagesMatched: number;
  pagesSkipped: number;
  fetchErrors: number;
  maxDepth: number;
  totalLinksExtracted: number;
  statusCounts: Map<number, number>;
  actualMaxConcurrency: number;
  peakQueueSize: number;
  duplicatesFiltered: number;
  failureReasons: Map<string, number>;
}

export function initializeStats(initialQueueSize: number): CrawlStats {
  return {
    pagesFetched: 0,
    pagesSucceeded: 0,
    pagesMatched: 0,
    pagesSkipped: 0,
    fetchErrors: 0,
    maxDepth: 0,
    totalLinksExtracted: 0,
    statusCounts: new Map<number, number>(),
    actualMaxConcurrency: 0,
    peakQueueSize: initialQueueSize,
    duplicatesFiltered: 0,
    failureReasons: new Map<string, number>(),
  };
}

/**
 * Called once per fetched page. `pagesFetched` is counted when the fetch starts and
 * `totalLinksExtracted` as links are read, so neither is touched here.
 */
export function recordPageMetrics(
  stats: CrawlStats,
  page: PageResult,
  ok: boolean,
  status: number | undefined,
  failureReason: string | undefined,
): void {
  stats.maxDepth = Math.max(stats.maxDepth, page.depth);

  if (ok) {
    stats.pagesSucceeded += 1;
  } else {
    stats.fetchErrors += 1;
    if (failureReason) {
      const current = stats.failureReasons.get(failureReason) ?? 0;
      stats.failureReasons.set(failureReason, current + 1);
    }
  }

  if (page.matched) {
    stats.pagesMatched += 1;
  }

  if (typeof status === 'number') {
    const current = stats.statusCounts.get(status) ?? 0;
    stats.statusCounts.set(status, current + 1);
  }
}
