import { crawl } from './crawler/crawl.js';
import { createDefaultHandlers } from './crawler/handlers/defaultHandlers.js';
import { buildRequestHeaders, DEFAULT_USER_AGENT, fetchPage } from './crawler/network/fetchPage.js';
import { createConfigurationError } from './errors.js';
import { createLogger, LOG_LEVELS } from './logger.js';
import type {
  CrawlConfig,
  CrawlHandlers,
  CrawlOptions,
  CrawlReport,
  LogLevel,
  OutputFormat,
  RunContext,
} from './types.js';
import { delay, MAX_TIMER_MS } from './util/delay.js';

export const DEFAULT_OPTIONS: CrawlOptions = {
  baseUrl: 'https://ctftime.org',
  indexPath: '/writeups?tags=pwn&hidden-tags=pwn',
  concurrency: 7,
  maxAttempts: 15,
  timeoutMs: 10_000,
  deadlineMs: undefined,
  userAgent: DEFAULT_USER_AGENT,
  format: 'text',
  logLevel: 'info',
};

const VALID_FORMATS: OutputFormat[] = ['text', 'json'];

/**
 * Crawls the write-ups index and resolves every row. Resolves with the report
 * even when some rows failed; rejects with `CrawlAborted` or
 * `StructuralExtractionFailure` when the index itself is unusable.
 */
export async function crawlWriteups(config: CrawlConfig = {}): Promise<CrawlReport> {
  const options = resolveOptions(config);
  const context = createRunContext(options, config);
  const handlers: CrawlHandlers = {
    ...createDefaultHandlers(options.format),
    ...(config.handlers ?? {}),
  };

  const report = await crawl({ context, handlers });
  handlers.onComplete?.(report);
  return report;
}

export function createRunContext(options: CrawlOptions, config: CrawlConfig = {}): RunContext {
  const headers = buildRequestHeaders(options.userAgent);

  return {
    options,
    logger: config.logger ?? createLogger({ level: options.logLevel }),
    fetcher: config.fetcher ?? ((url) => fetchPage(url, { headers, timeoutMs: options.timeoutMs })),
    sleep: config.sleep ?? delay,
    random: config.random ?? Math.random,
    signal: config.signal,
  };
}

export function resolveOptions(config: CrawlConfig): CrawlOptions {
  const options: CrawlOptions = {
    baseUrl: validateBaseUrl(config.baseUrl ?? DEFAULT_OPTIONS.baseUrl),
    indexPath: requireNonEmpty(config.indexPath ?? DEFAULT_OPTIONS.indexPath, 'index-path'),
    concurrency: coercePositiveInteger(config.concurrency ?? DEFAULT_OPTIONS.concurrency, 'concurrency'),
    maxAttempts: coercePositiveInteger(config.maxAttempts ?? DEFAULT_OPTIONS.maxAttempts, 'max-attempts'),
    timeoutMs: coerceTimerDuration(config.timeoutMs ?? DEFAULT_OPTIONS.timeoutMs, 'timeout-ms'),
    userAgent: requireNonEmpty(config.userAgent ?? DEFAULT_OPTIONS.userAgent, 'user-agent'),
    format: config.format ?? DEFAULT_OPTIONS.format,
    logLevel: config.logLevel ?? DEFAULT_OPTIONS.logLevel,
  };

  if (config.deadlineMs !== undefined) {
    options.deadlineMs = coerceTimerDuration(config.deadlineMs, 'deadline-ms');
  }

  if (!VALID_FORMATS.includes(options.format)) {
    throw createConfigurationError(`Unsupported format: ${options.format}`, { format: options.format });
  }

  if (!isLogLevel(options.logLevel)) {
    throw createConfigurationError(`Unsupported log level: ${options.logLevel}`, {
      logLevel: options.logLevel,
    });
  }

  return options;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function validateBaseUrl(baseUrl: string): string {
  let url: URL;

  try {
    url = new URL(baseUrl);
  } catch {
    throw createConfigurationError(`Invalid URL: ${baseUrl}`, { baseUrl });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw createConfigurationError('Base URL must use http or https protocol.', {
      protocol: url.protocol,
      baseUrl,
    });
  }

  return baseUrl.replace(/\/+$/, '');
}

function coercePositiveInteger(value: number, field: string): number {
  if (!Number.isFinite(value) || value < 1) {
    throw createConfigurationError(`${field} must be a positive integer.`, { value, field });
  }

  return Math.trunc(value);
}

function coerceTimerDuration(value: number, field: string): number {
  const duration = coercePositiveInteger(value, field);
  if (duration > MAX_TIMER_MS) {
    throw createConfigurationError(`${field} must not exceed ${MAX_TIMER_MS}ms.`, {
      value,
      field,
      max: MAX_TIMER_MS,
    });
  }

  return duration;
}

function requireNonEmpty(value: string, field: string): string {
  if (value.trim().length === 0) {
    throw createConfigurationError(`${field} must not be empty.`, { field });
  }

  return value;
}

export { crawl } from './crawler/crawl.js';
export { extractLinks } from './crawler/parsing/extractLinks.js';
export { extractRows } from './crawler/parsing/extractRows.js';
export { chooseWriteupUrl, resolveRow } from './crawler/resolve/resolveRow.js';
export { CrawlerError, isCrawlerError } from './errors.js';
export type {
  CatalogRow,
  CrawlConfig,
  CrawlHandlers,
  CrawlOptions,
  CrawlReport,
  CrawlSummary,
  FetchOutcome,
  ResolvedRecord,
  RowFailure,
} from './types.js';
