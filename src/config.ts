import { createConfigurationError } from './errors.js';
import { normalizePrefix } from './crawler/url/normalizeUrl.js';
import type { CrawlConfig, LogLevel } from './types.js';

export const ENV_KEYS = {
  urlPrefix: 'CRAWL_URL_PREFIX',
  matchRegex: 'CRAWL_MATCH_REGEX',
  maxPages: 'CRAWL_MAX_PAGES',
  timeout: 'CRAWL_TIMEOUT',
  logLevel: 'CRAWL_LOG_LEVEL',
  outputDir: 'CRAWL_OUTPUT_DIR',
  concurrency: 'CRAWL_CONCURRENCY',
  logDiscovered: 'CRAWL_LOG_DISCOVERED',
} as const;

export type ConfigEnvironment = Partial<Record<string, string | undefined>>;

const DEFAULT_MAX_PAGES = 0;
const DEFAULT_TIMEOUT_SECONDS = 100;
const DEFAULT_LOG_LEVEL: LogLevel = 'info';
const DEFAULT_OUTPUT_DIR = 'out';
const DEFAULT_CONCURRENCY = 1;
// setTimeout takes a signed 32-bit delay in milliseconds.
const MAX_TIMEOUT_SECONDS = Math.floor(0x7fffffff / 1_000);

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];
const LOG_LEVEL_ALIASES: Record<string, LogLevel> = {
  warning: 'warn',
  critical: 'fatal',
};

/**
 * Builds the immutable run configuration from environment-style settings.
 * Every problem is reported as a fatal ConfigError before any request is made.
 */
export function loadConfig(env: ConfigEnvironment = process.env): CrawlConfig {
  const urlPrefix = normalizePrefix(requireSetting(env, ENV_KEYS.urlPrefix));
  const matchPattern = compilePattern(requireSetting(env, ENV_KEYS.matchRegex));

  const maxPages = parseInteger(env, ENV_KEYS.maxPages, DEFAULT_MAX_PAGES, 0);
  const timeoutSeconds = parseInteger(
    env,
    ENV_KEYS.timeout,
    DEFAULT_TIMEOUT_SECONDS,
    1,
    MAX_TIMEOUT_SECONDS,
  );
  const concurrency = parseInteger(env, ENV_KEYS.concurrency, DEFAULT_CONCURRENCY, 1);

  return Object.freeze({
    urlPrefix,
    matchPattern,
    maxPages,
    requestTimeoutMs: timeoutSeconds * 1_000,
    logLevel: parseLogLevel(readSetting(env, ENV_KEYS.logLevel)),
    outputDir: readSetting(env, ENV_KEYS.outputDir) ?? DEFAULT_OUTPUT_DIR,
    concurrency,
    logDiscovered: parseFlag(readSetting(env, ENV_KEYS.logDiscovered)),
  });
}

export function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw createConfigurationError(
      `${ENV_KEYS.matchRegex} is not a valid regular expression: ${reason}`,
      { value: source },
      { cause: error },
    );
  }
}

export function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined) {
    return DEFAULT_LOG_LEVEL;
  }

  const lowered = raw.toLowerCase();
  const level = LOG_LEVEL_ALIASES[lowered] ?? LOG_LEVELS.find((candidate) => candidate === lowered);
  if (!level) {
    throw createConfigurationError(
      `${ENV_KEYS.logLevel} must be one of ${LOG_LEVELS.join(', ')}.`,
      { value: raw },
    );
  }

  return level;
}

function readSetting(env: ConfigEnvironment, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function requireSetting(env: ConfigEnvironment, key: string): string {
  const value = readSetting(env, key);
  if (value === undefined) {
    throw createConfigurationError(`${key} must be set.`, { key });
  }

  return value;
}

function parseInteger(
  env: ConfigEnvironment,
  key: string,
  fallback: number,
  minimum: number,
  maximum = Number.MAX_SAFE_INTEGER,
): number {
  const raw = readSetting(env, key);
  if (raw === undefined) {
    return fallback;
  }

  if (!/^\d+$/.test(raw)) {
    throw createConfigurationError(`${key} must be a whole number.`, { key, value: raw });
  }

  const parsed = Number(raw);
  if (!Number.isSafeInteger(parsed) || parsed < minimum) {
    throw createConfigurationError(`${key} must be at least ${minimum}.`, { key, value: raw });
  }

  if (parsed > maximum) {
    throw createConfigurationError(`${key} must be at most ${maximum}.`, { key, value: raw });
  }

  return parsed;
}

function parseFlag(raw: string | undefined): boolean {
  return raw === '1' || raw?.toLowerCase() === 'true';
}
