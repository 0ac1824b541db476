#!/usr/bin/env node
import { createRequire } from 'node:module';
import { Command } from 'commander';

import { crawlWriteups, isLogLevel } from './index.js';
import { createConfigurationError } from './errors.js';
import { createStderrLogger, type LoggerLike } from './logger.js';
import type { CrawlConfig, OutputFormat } from './types.js';
import { reportCrawlerError } from './util/errorHandler.js';

const require = createRequire(import.meta.url);
// eslint-disable-next-line @typescript-eslint/no-var-requires -- package.json access for CLI metadata
const pkg = require('../package.json') as { version?: string };

const program = new Command();

program
  .name('writeup-resolver')
  .description('List CTFtime pwn write-ups and resolve where each one is actually hosted.')
  .version(pkg.version ?? '0.0.0');

program
  .command('crawl', { isDefault: true })
  .description('Fetch the write-ups index and resolve every entry.')
  .option('--base-url <url>', 'Site to crawl. (default: https://ctftime.org)')
  .option('--index-path <path>', 'Path of the index page. (default: /writeups?tags=pwn&hidden-tags=pwn)')
  .option('--concurrency <number>', 'Detail pages fetched in parallel. (default: 7)')
  .option('--max-attempts <number>', 'Attempts per write-up before giving up. (default: 15)')
  .option('--timeout-ms <number>', 'Timeout per request in milliseconds. (default: 10000)')
  .option('--deadline-ms <number>', 'Stop issuing new requests once the run has lasted this long.')
  .option('--user-agent <string>', 'User-Agent header sent with every request.')
  .option('--format <format>', 'Output format to emit (text or json). Defaults to text.')
  .option('--log-level <level>', 'Set log verbosity (pino levels: trace|debug|info|warn|error|fatal|silent).')
  .action(async (options: Record<string, unknown>) => {
    let logger: LoggerLike | undefined;
    try {
      const config = buildConfig(options);
      logger = createStderrLogger(config.logLevel);
      await crawlWriteups({ ...config, logger });
    } catch (error) {
      reportCliError(error, logger ?? createStderrLogger('error'));
    }
  });

await program.parseAsync(process.argv);

function buildConfig(rawOptions: Record<string, unknown>): CrawlConfig {
  const config: CrawlConfig = {};

  if (rawOptions.baseUrl !== undefined) {
    config.baseUrl = String(rawOptions.baseUrl);
  }

  if (rawOptions.indexPath !== undefined) {
    config.indexPath = String(rawOptions.indexPath);
  }

  if (rawOptions.concurrency !== undefined) {
    config.concurrency = asNumber(rawOptions.concurrency, 'concurrency');
  }

  if (rawOptions.maxAttempts !== undefined) {
    config.maxAttempts = asNumber(rawOptions.maxAttempts, 'max-attempts');
  }

  if (rawOptions.timeoutMs !== undefined) {
    config.timeoutMs = asNumber(rawOptions.timeoutMs, 'timeout-ms');
  }

  if (rawOptions.deadlineMs !== undefined) {
    config.deadlineMs = asNumber(rawOptions.deadlineMs, 'deadline-ms');
  }

  if (rawOptions.userAgent !== undefined) {
    config.userAgent = String(rawOptions.userAgent);
  }

  if (rawOptions.format !== undefined) {
    const format = String(rawOptions.format).toLowerCase();
    if (!isOutputFormat(format)) {
      throw createConfigurationError(`Unsupported format: ${format}`, { value: format });
    }
    config.format = format;
  }

  const logLevel = rawOptions.logLevel === undefined ? 'info' : String(rawOptions.logLevel).toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${logLevel}`, { value: logLevel });
  }
  config.logLevel = logLevel;

  return config;
}

function asNumber(value: unknown, label: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    throw createConfigurationError(`${label} must be a finite number.`, { value });
  }

  return parsed;
}

function reportCliError(error: unknown, logger: LoggerLike): void {
  const crawlerError = reportCrawlerError(error, logger, { stage: 'cli' }, {
    defaultKind: 'internal',
    defaultSeverity: 'fatal',
    throwOnFatal: false,
  });
  console.error(`Error: ${crawlerError.message}`);
  process.exitCode = 1;
}

function isOutputFormat(value: string): value is OutputFormat {
  return value === 'text' || value === 'json';
}
