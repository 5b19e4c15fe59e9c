import pino, { type DestinationStream, type LoggerOptions } from 'pino';

import type { LogLevel } from './types.js';

export interface LoggerLike {
  info(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  error(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  warn(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  debug(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  trace(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  fatal(objOrMsg: Record<string, unknown> | string, msg?: string): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LogLevel;
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LogLevel = 'silent';
const DEFAULT_BASE = { service: 'prefix-crawler' } as const;

let activeLogger: LoggerLike = createPinoInstance();

/**
 * Replaces the process-wide logger. Without an explicit destination, log lines go to
 * stderr synchronously so they interleave correctly with crawl output on stdout.
 */
export function configureLogger(config: LoggerConfiguration = {}): void {
  const { level = DEFAULT_LEVEL, base = DEFAULT_BASE, destination } = config;
  activeLogger = createPinoInstance(
    { level, base },
    destination ?? pino.destination({ dest: 2, sync: true }),
  );
}

export function setLoggerInstance(logger: LoggerLike): void {
  activeLogger = logger;
}

export function getLogger(): LoggerLike {
  return activeLogger;
}

function createPinoInstance(
  options: Partial<LoggerOptions> = {},
  destination?: DestinationStream,
): LoggerLike {
  const merged: LoggerOptions = {
    level: options.level ?? DEFAULT_LEVEL,
    base: options.base ?? DEFAULT_BASE,
  };

  if (destination) {
    return pino(merged, destination);
  }

  return pino(merged);
}
