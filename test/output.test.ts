import { afterEach, describe, expect, it, vi } from 'vitest';

import type { CrawlReport } from '../src/types.js';
import { formatDuration, renderReport, writeReport } from '../src/util/output.js';

const report: CrawlReport = {
  records: [
    { primaryLabel: 'CTF1', secondaryLabel: 'pwn200', resolvedUrl: 'https://github.com/a/a' },
    { primaryLabel: 'CTF2', secondaryLabel: 'pwn300', resolvedUrl: 'https://blog.example/b' },
  ],
  failures: [
    {
      primaryLabel: 'CTF3',
      secondaryLabel: 'pwn400',
      detailUrl: 'https://ctf.example/writeup/3',
      attempts: 15,
      reason: 'HTTP 503',
      cancelled: false,
    },
    {
      primaryLabel: 'CTF4',
      secondaryLabel: 'pwn500',
      detailUrl: 'https://ctf.example/writeup/4',
      attempts: 0,
      reason: 'Cancelled (last: no attempt made)',
      cancelled: true,
    },
  ],
  summary: {
    rowsDiscovered: 4,
    rowsResolved: 2,
    rowsFailed: 2,
    rowsCancelled: 1,
    detailFetches: 17,
    retryAttempts: 14,
    statusCounts: { '200': 2, '503': 15 },
    resolutionSources: { inline: 1, fallback: 1, 'detail-page': 0 },
    actualMaxConcurrency: 3,
    durationMs: 1_500,
    cancelled: true,
  },
};

describe('renderReport', () => {
  it('renders records, failures and the summary as text', () => {
    const lines = renderReport(report, 'text').split('\n');

    expect(lines.slice(0, 6)).toEqual([
      '='.repeat(100),
      'CTF1 | pwn200 | https://github.com/a/a',
      'CTF2 | pwn300 | https://blog.example/b',
      '',
      'Failures:',
      '  CTF3 | pwn400 | https://ctf.example/writeup/3 - HTTP 503 (15 attempts)',
    ]);
    expect(lines[6]).toBe(
      '  CTF4 | pwn500 | https://ctf.example/writeup/4 - Cancelled (last: no attempt made) (cancelled)',
    );
    expect(lines).toContain('--- Crawl Summary ---');
    expect(lines).toContain('Duration: 1.5s');
    expect(lines).toContain('Cancelled: yes');
    expect(lines).toContain('  original writeup link: 1');
    expect(lines.slice(-4)).toEqual(['Status codes:', '  200: 2', '  503: 15', '']);
  });

  it('omits the failures section when every row resolved', () => {
    const lines = renderReport({ ...report, failures: [] }, 'text').split('\n');
    expect(lines).not.toContain('Failures:');
  });

  it('renders the whole report as JSON', () => {
    expect(JSON.parse(renderReport(report, 'json'))).toEqual(report);
  });
});

describe('writeReport', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('writes the rendered report to stdout', () => {
    const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);

    writeReport(report, 'json');

    expect(stdoutSpy).toHaveBeenCalledTimes(1);
    expect(stdoutSpy).toHaveBeenCalledWith(`${JSON.stringify(report, null, 2)}\n`);
  });
});

describe('formatDuration', () => {
  it('picks a unit that fits the duration', () => {
    expect(formatDuration(0)).toBe('0ms');
    expect(formatDuration(250)).toBe('250ms');
    expect(formatDuration(1_500)).toBe('1.5s');
    expect(formatDuration(12_340)).toBe('12.3s');
    expect(formatDuration(125_000)).toBe('2m 05s');
    expect(formatDuration(3_599_600)).toBe('60m 00s');
  });
});
