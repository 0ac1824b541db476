import { createCrawlAbortedError, ensureCrawlerError } from '../errors.js';
import type {
  CatalogRow,
  CrawlHandlers,
  CrawlReport,
  Fetcher,
  ResolvedRecord,
  RowFailure,
  RowOutcome,
  RunContext,
} from '../types.js';
import { reportCrawlerError } from '../util/errorHandler.js';
import { extractRows } from './parsing/extractRows.js';
import { buildCrawlSummary } from './reporting/summary.js';
import { resolveRow } from './resolve/resolveRow.js';
import { initializeStats, recordFetch, recordRowOutcome, type CrawlStats } from './state/stats.js';
import { withWorkerPool } from './state/workerPool.js';
import { joinUrl } from './url/joinUrl.js';

export interface CrawlRuntimeOptions {
  context: RunContext;
  handlers?: CrawlHandlers;
}

/**
 * Runs one crawl: index fetch, row extraction, then every row through the
 * worker pool. Owns the run's abort controller, which SIGINT, the optional
 * deadline and the caller's signal all feed into.
 */
class CrawlerEngine {
  private readonly stats: CrawlStats = initializeStats();
  private readonly controller = new AbortController();
  private readonly startTime = Date.now();
  private readonly sigintHandler = (): void => {
    this.cancel('SIGINT received');
  };
  private readonly externalAbortHandler = (): void => {
    this.cancel('Run cancelled by caller');
  };
  private deadlineTimer: ReturnType<typeof setTimeout> | undefined;
  private sigintAttached = false;
  private inFlightFetches = 0;

  constructor(
    private readonly context: RunContext,
    private readonly handlers: CrawlHandlers,
  ) {}

  async run(): Promise<CrawlReport> {
    this.attachCancellation();
    try {
      const rows = await this.loadIndex();
      const outcomes = await withWorkerPool(this.context.options.concurrency, (pool) =>
        Promise.all(rows.map((row) => pool.run(() => this.resolveOne(row)))),
      );

      const records: ResolvedRecord[] = [];
      const failures: RowFailure[] = [];
      for (const outcome of outcomes) {
        if (outcome.ok) {
          records.push(outcome.record);
        } else {
          failures.push(outcome.failure);
        }
      }

      const summary = buildCrawlSummary({
        stats: this.stats,
        startTime: this.startTime,
        cancelled: this.controller.signal.aborted,
      });
      this.context.logger.info(
        { resolved: summary.rowsResolved, failed: summary.rowsFailed, durationMs: summary.durationMs },
        'Retrieved the information for each challenge.',
      );

      return { records, failures, summary };
    } finally {
      this.detachCancellation();
    }
  }

  private async loadIndex(): Promise<CatalogRow[]> {
    const { options, fetcher, logger } = this.context;
    const indexUrl = joinUrl(options.baseUrl, options.indexPath);
    const outcome = await fetcher(indexUrl);

    if (outcome.kind === 'transient-failure') {
      throw createCrawlAbortedError(
        `Could not fetch the write-ups index: ${outcome.reason}`,
        { url: indexUrl, status: outcome.status },
        { cause: outcome.error },
      );
    }

    const rows = extractRows(outcome.html);
    this.stats.rowsDiscovered = rows.length;
    logger.info({ url: indexUrl, rows: rows.length }, 'Fetched the write-ups list.');
    return rows;
  }

  private async resolveOne(row: CatalogRow): Promise<RowOutcome> {
    const outcome = await resolveRow(
      row,
      { ...this.context, fetcher: this.trackedFetcher },
      this.controller.signal,
    );
    recordRowOutcome(this.stats, outcome);

    if (outcome.ok) {
      this.notify('onRecord', outcome.record.resolvedUrl, () => this.handlers.onRecord?.(outcome.record));
    } else {
      reportCrawlerError(
        outcome.error,
        this.context.logger,
        { stage: 'resolve', url: outcome.failure.detailUrl },
        { throwOnFatal: false },
      );
      this.notify('onFailure', outcome.failure.detailUrl, () => this.handlers.onFailure?.(outcome.failure));
    }

    return outcome;
  }

  // A throwing handler is logged; the row's outcome and its siblings stand.
  private notify(handler: keyof CrawlHandlers, url: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      reportCrawlerError(
        error,
        this.context.logger,
        { stage: 'handler', handler, url },
        { defaultSeverity: 'recoverable', throwOnFatal: false },
      );
    }
  }

  // Detail fetches only; counts them and tracks how many are in flight at once.
  private readonly trackedFetcher: Fetcher = async (url) => {
    this.inFlightFetches += 1;
    this.stats.actualMaxConcurrency = Math.max(this.stats.actualMaxConcurrency, this.inFlightFetches);
    try {
      const outcome = await this.context.fetcher(url);
      recordFetch(this.stats, outcome);
      return outcome;
    } finally {
      this.inFlightFetches -= 1;
    }
  };

  private cancel(reason: string): void {
    if (this.controller.signal.aborted) {
      return;
    }

    this.context.logger.warn({ reason }, 'Cancelling crawl; no new fetches will be issued.');
    this.controller.abort(reason);
  }

  private attachCancellation(): void {
    const { signal, options } = this.context;

    if (signal) {
      if (signal.aborted) {
        this.cancel('Run cancelled by caller');
      } else {
        signal.addEventListener('abort', this.externalAbortHandler, { once: true });
      }
    }

    if (options.deadlineMs !== undefined) {
      const deadlineMs = options.deadlineMs;
      this.deadlineTimer = setTimeout(() => {
        this.cancel(`Deadline of ${deadlineMs}ms reached`);
      }, deadlineMs);
      this.deadlineTimer.unref();
    }

    if (typeof process.once === 'function') {
      process.once('SIGINT', this.sigintHandler);
      this.sigintAttached = true;
    }
  }

  private detachCancellation(): void {
    this.context.signal?.removeEventListener('abort', this.externalAbortHandler);

    if (this.deadlineTimer) {
      clearTimeout(this.deadlineTimer);
      this.deadlineTimer = undefined;
    }

    if (this.sigintAttached) {
      process.removeListener('SIGINT', this.sigintHandler);
      this.sigintAttached = false;
    }
  }
}

export async function crawl({ context, handlers = {} }: CrawlRuntimeOptions): Promise<CrawlReport> {
  const engine = new CrawlerEngine(context, handlers);

  try {
    return await engine.run();
  } catch (error) {
    throw ensureCrawlerError(error, { kind: 'internal', severity: 'fatal' });
  }
}
