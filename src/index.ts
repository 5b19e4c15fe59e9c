import { crawl, type CrawlRuntimeOptions } from './crawler/crawl.js';
import { loadConfig, type ConfigEnvironment } from './config.js';
import type { CrawlSummary } from './types.js';

/** Reads the configuration from `env` and runs one crawl with it. */
export async function crawlFromEnvironment(
  env: ConfigEnvironment = process.env,
  runtime: CrawlRuntimeOptions = {},
): Promise<CrawlSummary> {
  const config = loadConfig(env);
  return crawl(config, runtime);
}

export { crawl, loadConfig };
export { ENV_KEYS, compilePattern, parseLogLevel } from './config.js';
export { Frontier } from './crawler/state/frontier.js';
export { fetchPage, detectContentKind } from './crawler/network/fetchPage.js';
export { extractLinks, LinkSequence } from './crawler/parsing/extractLinks.js';
export { inScope, isMatch, findMatches } from './crawler/url/admission.js';
export { normalizeUrl, normalizePrefix } from './crawler/url/normalizeUrl.js';
export { PageWriter, MATCHES_FILE, deriveFileName } from './crawler/persistence/pageWriter.js';
export { CrawlerError, FetchError, isCrawlerError, isFetchError } from './errors.js';
export { configureLogger, getLogger, setLoggerInstance } from './logger.js';

export type { ConfigEnvironment, CrawlRuntimeOptions };
export type { ErrorKind, ErrorSeverity, FetchFailureReason } from './errors.js';
export type { LoggerLike, LoggerConfiguration } from './logger.js';
export type {
  ContentKind,
  CrawlConfig,
  CrawlHandlers,
  CrawlState,
  CrawlSummary,
  FailureEvent,
  FetchedPage,
  FetchPageOptions,
  FrontierEntry,
  LogLevel,
  MatchRecord,
  OutputFormat,
  PageFetcher,
  PageResult,
  TerminalState,
} from './types.js';
