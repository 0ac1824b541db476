import type { CrawlSummary } from '../../types.js';
import type { CrawlStats } from '../state/stats.js';

export function buildCrawlSummary(options: {
  stats: CrawlStats;
  startTime: number;
  cancelled: boolean;
  now?: number;
}): CrawlSummary {
  const { stats, startTime, cancelled, now = Date.now() } = options;

  return {
    rowsDiscovered: stats.rowsDiscovered,
    rowsResolved: stats.rowsResolved,
    rowsFailed: stats.rowsFailed,
    rowsCancelled: stats.rowsCancelled,
    detailFetches: stats.detailFetches,
    retryAttempts: stats.retryAttempts,
    statusCounts: Object.fromEntries(
      [...stats.statusCounts.entries()].sort(([a], [b]) => a.localeCompare(b)),
    ),
    resolutionSources: { ...stats.resolutionSources },
    actualMaxConcurrency: stats.actualMaxConcurrency,
    durationMs: now - startTime,
    cancelled,
  };
}
