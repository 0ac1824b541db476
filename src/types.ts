import type { CrawlerError } from './errors.js';
import type { LoggerLike } from './logger.js';

export type OutputFormat = 'text' | 'json';

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

/** One entry of the write-ups index table. */
export interface CatalogRow {
  readonly primaryLabel: string;
  readonly secondaryLabel: string;
  readonly detailPath: string;
}

export interface ResolvedRecord {
  readonly primaryLabel: string;
  readonly secondaryLabel: string;
  readonly resolvedUrl: string;
}

/** Which rule of the decision tree produced a resolved URL. */
export type ResolutionSource = 'inline' | 'fallback' | 'detail-page';

export interface RowFailure {
  readonly primaryLabel: string;
  readonly secondaryLabel: string;
  readonly detailUrl: string;
  readonly attempts: number;
  readonly reason: string;
  readonly cancelled: boolean;
}

export type RowOutcome =
  | { ok: true; record: ResolvedRecord; source: ResolutionSource; attempts: number }
  | { ok: false; failure: RowFailure; error: CrawlerError };

export type FetchOutcome =
  | { kind: 'success'; url: string; status: number; html: string }
  | {
      kind: 'transient-failure';
      url: string;
      // null when no HTTP response was received at all
      status: number | null;
      reason: string;
      error?: CrawlerError;
    };

export type Fetcher = (url: string) => Promise<FetchOutcome>;

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface CrawlOptions {
  baseUrl: string;
  indexPath: string;
  concurrency: number;
  maxAttempts: number;
  timeoutMs: number;
  deadlineMs?: number;
  userAgent: string;
  format: OutputFormat;
  logLevel: LogLevel;
}

/**
 * Everything a single run needs. Built once per run by `crawlWriteups` and
 * handed down explicitly; nothing below it reads module-level state.
 */
export interface RunContext {
  options: CrawlOptions;
  logger: LoggerLike;
  fetcher: Fetcher;
  sleep: Sleep;
  random: () => number;
  signal?: AbortSignal;
}

export interface CrawlSummary {
  rowsDiscovered: number;
  rowsResolved: number;
  rowsFailed: number;
  rowsCancelled: number;
  detailFetches: number;
  retryAttempts: number;
  statusCounts: Record<string, number>;
  resolutionSources: Record<ResolutionSource, number>;
  actualMaxConcurrency: number;
  durationMs: number;
  cancelled: boolean;
}

export interface CrawlReport {
  records: ResolvedRecord[];
  failures: RowFailure[];
  summary: CrawlSummary;
}

export interface CrawlHandlers {
  onRecord?(record: ResolvedRecord): void;
  onFailure?(failure: RowFailure): void;
  onComplete?(report: CrawlReport): void;
}

export interface CrawlConfig extends Partial<CrawlOptions> {
  handlers?: CrawlHandlers;
  logger?: LoggerLike;
  fetcher?: Fetcher;
  sleep?: Sleep;
  random?: () => number;
  signal?: AbortSignal;
}
