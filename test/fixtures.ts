import { vi } from 'vitest';

import type { LoggerLike } from '../src/logger.js';
import type { Fetcher, FetchOutcome } from '../src/types.js';

export const BASE_URL = 'https://ctf.example';
export const INDEX_URL = `${BASE_URL}/writeups?tags=pwn&hidden-tags=pwn`;

export type IndexRowFixture = [primary: string, secondary: string, detailPath: string];

export function indexPage(rows: IndexRowFixture[]): string {
  const body = rows
    .map(
      ([primary, secondary, detailPath], idx) => `
        <tr>
          <td><a href="/event/${idx}">${primary}</a></td>
          <td><a href="/task/${idx}">${secondary}</a></td>
          <td><span class="label">pwn</span></td>
          <td><a href="/team/${idx}">team-${idx}</a></td>
          <td><a href="${detailPath}">Read</a></td>
        </tr>`,
    )
    .join('');

  return `<!doctype html>
<html>
  <body>
    <table id="writeups_table" class="table">
      <thead><tr><th>Event</th><th>Task</th><th>Tags</th><th>Author team</th><th>Action</th></tr></thead>
      <tbody>${body}</tbody>
    </table>
  </body>
</html>`;
}

export function detailPage(links: { inline?: string; fallback?: string } = {}): string {
  const description = links.inline
    ? `<p>Solved with a ROP chain, see <a href="${links.inline}">the repo</a>.</p>`
    : '<p>No external links in this one.</p>';
  const original = links.fallback ? `<a href="${links.fallback}">Original writeup</a>` : '';

  return `<!doctype html>
<html>
  <body>
    <div id="id_description">${description}</div>
    <div class="well">${original}</div>
  </body>
</html>`;
}

export type FakeResponse = { html: string } | { status: number } | { networkError: string };

export type FakeFetcher = Fetcher & { calls: string[] };

/**
 * In-memory fetcher. A route given as a list answers with its entries in
 * order and keeps repeating the last one; unknown URLs answer 404.
 */
export function createFakeFetcher(
  routes: Record<string, FakeResponse | FakeResponse[]>,
  options: { latencyMs?: number } = {},
): FakeFetcher {
  const calls: string[] = [];
  const served = new Map<string, number>();

  const fetcher = async (url: string): Promise<FetchOutcome> => {
    calls.push(url);
    if (options.latencyMs !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, options.latencyMs));
    }

    const route = routes[url];
    if (route === undefined) {
      return { kind: 'transient-failure', url, status: 404, reason: 'HTTP 404' };
    }

    const sequence = Array.isArray(route) ? route : [route];
    const count = served.get(url) ?? 0;
    served.set(url, count + 1);
    const response = sequence[Math.min(count, sequence.length - 1)];

    if ('html' in response) {
      return { kind: 'success', url, status: 200, html: response.html };
    }

    if ('status' in response) {
      return { kind: 'transient-failure', url, status: response.status, reason: `HTTP ${response.status}` };
    }

    return { kind: 'transient-failure', url, status: null, reason: response.networkError };
  };

  return Object.assign(fetcher, { calls });
}

export function createRecordingLogger() {
  const logger = {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    fatal: vi.fn(),
    child: (): LoggerLike => logger,
  };
  return logger;
}
