import type { CrawlReport, CrawlSummary, OutputFormat, RowFailure } from '../types.js';

export function writeReport(report: CrawlReport, format: OutputFormat): void {
  process.stdout.write(renderReport(report, format));
}

export function renderReport(report: CrawlReport, format: OutputFormat): string {
  if (format === 'json') {
    return `${JSON.stringify(report, null, 2)}\n`;
  }

  return renderTextReport(report);
}

function renderTextReport(report: CrawlReport): string {
  const lines: string[] = ['='.repeat(100)];

  for (const record of report.records) {
    lines.push(`${record.primaryLabel} | ${record.secondaryLabel} | ${record.resolvedUrl}`);
  }

  if (report.failures.length > 0) {
    lines.push('', 'Failures:');
    for (const failure of report.failures) {
      lines.push(`  ${renderFailure(failure)}`);
    }
  }

  lines.push(...renderTextSummary(report.summary));
  return `${lines.join('\n')}\n`;
}

function renderFailure(failure: RowFailure): string {
  const status = failure.cancelled ? 'cancelled' : `${failure.attempts} attempts`;
  return `${failure.primaryLabel} | ${failure.secondaryLabel} | ${failure.detailUrl} - ${failure.reason} (${status})`;
}

function renderTextSummary(summary: CrawlSummary): string[] {
  const lines: string[] = [
    '',
    '--- Crawl Summary ---',
    `Rows discovered: ${summary.rowsDiscovered}`,
    `Resolved: ${summary.rowsResolved}`,
    `Failed: ${summary.rowsFailed}`,
    `Cancelled rows: ${summary.rowsCancelled}`,
    `Detail fetches: ${summary.detailFetches}`,
    `Retry attempts: ${summary.retryAttempts}`,
    `Actual max concurrency: ${summary.actualMaxConcurrency}`,
    `Duration: ${formatDuration(summary.durationMs)}`,
    `Cancelled: ${summary.cancelled ? 'yes' : 'no'}`,
    'Resolved from:',
    `  description link: ${summary.resolutionSources.inline}`,
    `  original writeup link: ${summary.resolutionSources.fallback}`,
    `  detail page: ${summary.resolutionSources['detail-page']}`,
  ];

  const statusEntries = Object.entries(summary.statusCounts);
  if (statusEntries.length > 0) {
    lines.push('Status codes:');
    for (const [status, count] of statusEntries) {
      lines.push(`  ${status}: ${count}`);
    }
  }

  return lines;
}

export function formatDuration(durationMs: number): string {
  if (!Number.isFinite(durationMs) || durationMs <= 0) {
    return '0ms';
  }

  if (durationMs < 1_000) {
    return `${Math.round(durationMs)}ms`;
  }

  if (durationMs < 60_000) {
    return `${(durationMs / 1_000).toFixed(1)}s`;
  }

  const totalSeconds = Math.round(durationMs / 1_000);
  const seconds = String(totalSeconds % 60).padStart(2, '0');
  return `${Math.floor(totalSeconds / 60)}m ${seconds}s`;
}
