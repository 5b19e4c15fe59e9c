import { createRequire } from 'node:module';
import { Command, CommanderError } from 'commander';

import { loadConfig, ENV_KEYS, type ConfigEnvironment } from './config.js';
import { crawl } from './crawler/crawl.js';
import { createConfigurationError, isCrawlerError } from './errors.js';
import { configureLogger } from './logger.js';
import type { OutputFormat } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

export const EXIT_COMPLETED = 0;
export const EXIT_ABORTED = 1;
export const EXIT_CONFIG = 2;

/**
 * Parses `argv` (user arguments only, without the node and script paths), runs one crawl
 * configured from `env` plus the flags, and resolves to the process exit code.
 */
export async function runCli(argv: readonly string[], env: ConfigEnvironment): Promise<number> {
  let exitCode = EXIT_COMPLETED;
  const program = new Command();

  program
    .name('prefix-crawler')
    .description(
      'Crawl every page under a URL prefix and save the pages whose URL matches a pattern.\n' +
        `Configured through ${ENV_KEYS.urlPrefix}, ${ENV_KEYS.matchRegex} and friends; flags override them.`,
    )
    .version(pkg.version ?? '0.0.0')
    .exitOverride()
    .argument('[filters...]', 'Reserved for future filtering (currently ignored).')
    .option('--max-pages <number>', `Maximum number of fetches; 0 is unbounded. (${ENV_KEYS.maxPages})`)
    .option('--timeout <seconds>', `Timeout per request in seconds. (${ENV_KEYS.timeout})`)
    .option('--log-level <level>', `trace|debug|info|warn|error|fatal|silent. (${ENV_KEYS.logLevel})`)
    .option('--out-dir <path>', `Directory for saved pages and matches.jsonl. (${ENV_KEYS.outputDir})`)
    .option('--concurrency <number>', `Parallel fetches. (${ENV_KEYS.concurrency})`)
    .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
    .option('--quiet', 'Suppress per-page output and print only the summary.')
    .action(async (_filters: string[], options: Record<string, unknown>) => {
      try {
        const format = parseFormat(options.format);
        const config = loadConfig(applyOverrides(env, options));
        configureLogger({ level: config.logLevel });

        const summary = await crawl(config, { format, quiet: options.quiet === true });
        exitCode = summary.status === 'completed' ? EXIT_COMPLETED : EXIT_ABORTED;
      } catch (error) {
        exitCode = reportCliError(error);
      }
    });

  try {
    await program.parseAsync([...argv], { from: 'user' });
  } catch (error) {
    // Help and --version exit through here with code 0; usage errors carry commander's code.
    if (error instanceof CommanderError) {
      return error.exitCode === 0 ? EXIT_COMPLETED : EXIT_CONFIG;
    }
    throw error;
  }

  return exitCode;
}

function applyOverrides(env: ConfigEnvironment, options: Record<string, unknown>): ConfigEnvironment {
  const overrides: ConfigEnvironment = { ...env };
  const mapping: Array<[string, string]> = [
    ['maxPages', ENV_KEYS.maxPages],
    ['timeout', ENV_KEYS.timeout],
    ['logLevel', ENV_KEYS.logLevel],
    ['outDir', ENV_KEYS.outputDir],
    ['concurrency', ENV_KEYS.concurrency],
  ];

  for (const [option, key] of mapping) {
    if (options[option] !== undefined) {
      overrides[key] = String(options[option]);
    }
  }

  return overrides;
}

function parseFormat(value: unknown): OutputFormat {
  if (value === undefined) {
    return 'text';
  }

  const format = String(value).toLowerCase();
  if (!isOutputFormat(format)) {
    throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
  }

  return format;
}

function reportCliError(error: unknown): number {
  // Logging may not be configured yet when the configuration itself is broken.
  configureLogger({ level: 'error' });
  const crawlerError = reportCrawlerError(error, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${crawlerError.message}`);
  return isCrawlerError(error) && error.kind === 'config' ? EXIT_CONFIG : EXIT_ABORTED;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
