import { CrawlSummary, OutputFormat, PageResult } from '../types.js';

let quietMode = false;
let outputFormat: OutputFormat = 'text';

export function setOutputConfig(config: { quiet: boolean; format: OutputFormat }): void {
  quietMode = config.quiet;
  outputFormat = config.format;
}

export function resetOutputConfig(): void {
  setOutputConfig({ quiet: false, format: 'text' });
}

export function writePage(page: PageResult): void {
  if (quietMode) {
    return;
  }

  process.stdout.write(outputFormat === 'json' ? `${JSON.stringify(page)}\n` : renderText(page));
}

export function writeSummary(summary: CrawlSummary): void {
  process.stdout.write(
    outputFormat === 'json' ? `${JSON.stringify(summary)}\n` : renderTextSummary(summary),
  );
}

export function renderText(page: PageResult): string {
  const lines: string[] = [`FETCHED: ${page.url}${page.status ? ` (${page.status})` : ''}`];

  if (page.error) {
    lines.push(`  ! ERROR: ${page.error}`);
  }

  if (page.savedPath) {
    lines.push(`  + SAVED: ${page.savedPath}`);
  }

  for (const link of page.links) {
    lines.push(`  - ${link}`);
  }

  return `${lines.join('\n')}\n`;
}

export function renderTextSummary(summary: CrawlSummary): string {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Status: ${summary.status}`,
    `Pages fetched: ${summary.pagesFetched}`,
    `Successful pages: ${summary.pagesSucceeded}`,
    `Pages matched: ${summary.pagesMatched}`,
    `Links skipped (out of scope): ${summary.pagesSkipped}`,
    `Fetch errors: ${summary.fetchErrors}`,
    `Unique URLs discovered: ${summary.uniqueUrlsDiscovered}`,
    `Duplicates filtered: ${summary.duplicatesFiltered}`,
    `Frontier remaining: ${summary.frontierRemaining}`,
    `Total links extracted: ${summary.totalLinksExtracted}`,
    `Max depth reached: ${summary.maxDepth}`,
    `Duration: ${formatDuration(summary.durationMs)} (${Math.round(summary.durationMs)} ms)`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Peak queue size: ${summary.peakQueueSize}`,
  ];

  const statusEntries = Object.entries(summary.statusCounts).sort(
    ([statusA], [statusB]) => Number(statusA) - Number(statusB),
  );

  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  const failureEntries = Object.entries(summary.failureReasons).sort(
    ([, countA], [, countB]) => countB - countA,
  );

  if (failureEntries.length > 0) {
    lines.push('Failure reasons:');
    for (const [reason, count] of failureEntries) {
      lines.push(`  ${reason}: ${count}`);
    }
  }

  if (summary.failureLog.length > 0) {
    lines.push('Failure log:');
    for (const event of summary.failureLog) {
      lines.push(`  ${event.url} - ${event.errorName}: ${event.reason}`);
    }
  }

  if (summary.fatalError) {
    lines.push(`Aborted by ${summary.fatalError.kind} error: ${summary.fatalError.message}`);
  }

  return `${lines.join('\n')}\n`;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  const seconds = durationMs / 1_000;
  if (seconds < 60) {
    const precision = seconds >= 10 ? 1 : 2;
    return `${seconds.toFixed(precision)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;
  const secondsPart =
    remainingSeconds >= 10 ? remainingSeconds.toFixed(0) : remainingSeconds.toFixed(1);
  return `${minutes}m ${secondsPart}s`;
}
