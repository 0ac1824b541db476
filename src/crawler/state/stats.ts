import type { FetchOutcome, ResolutionSource, RowOutcome } from '../../types.js';

const NETWORK_ERROR_STATUS = 'network-error';

export interface CrawlStats {
  rowsDiscovered: number;
  rowsResolved: number;
  rowsFailed: number;
  rowsCancelled: number;
  detailFetches: number;
  retryAttempts: number;
  statusCounts: Map<string, number>;
  resolutionSources: Record<ResolutionSource, number>;
  actualMaxConcurrency: number;
}

export function initializeStats(): CrawlStats {
  return {
    rowsDiscovered: 0,
    rowsResolved: 0,
    rowsFailed: 0,
    rowsCancelled: 0,
    detailFetches: 0,
    retryAttempts: 0,
    statusCounts: new Map<string, number>(),
    resolutionSources: { inline: 0, fallback: 0, 'detail-page': 0 },
    actualMaxConcurrency: 0,
  };
}

export function recordFetch(stats: CrawlStats, outcome: FetchOutcome): void {
  stats.detailFetches += 1;

  const key = outcome.status === null ? NETWORK_ERROR_STATUS : String(outcome.status);
  stats.statusCounts.set(key, (stats.statusCounts.get(key) ?? 0) + 1);
}

export function recordRowOutcome(stats: CrawlStats, outcome: RowOutcome): void {
  if (outcome.ok) {
    stats.rowsResolved += 1;
    stats.resolutionSources[outcome.source] += 1;
    stats.retryAttempts += outcome.attempts - 1;
    return;
  }

  stats.rowsFailed += 1;
  stats.retryAttempts += Math.max(0, outcome.failure.attempts - 1);
  if (outcome.failure.cancelled) {
    stats.rowsCancelled += 1;
  }
}
