import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createServer, type IncomingMessage, type ServerResponse } from 'node:http';

import { DEFAULT_USER_AGENT } from '../src/crawler/network/fetchPage.js';
import { crawlWriteups } from '../src/index.js';
import { createLogger } from '../src/logger.js';
import type { CrawlReport } from '../src/types.js';
import { detailPage, indexPage } from './fixtures.js';

const siteMap: Record<string, string> = {
  '/writeups': indexPage([
    ['CTF1', 'pwn200', '/writeup/1'],
    ['CTF2', 'pwn300', '/writeup/2'],
    ['CTF3', 'pwn400', '/writeup/3'],
    ['CTF4', 'pwn500', '/writeup/4'],
  ]),
  '/writeup/1': detailPage({ inline: 'https://github.com/a/a' }),
  '/writeup/2': detailPage({ fallback: 'https://blog.example/b' }),
  '/writeup/3': detailPage(),
};

let baseUrl: string;
let serverClose: (() => Promise<void>) | undefined;
const userAgents = new Set<string>();
const hits = new Map<string, number>();

beforeAll(async () => {
  const server = createServer((req: IncomingMessage, res: ServerResponse) => {
    const url = new URL(req.url ?? '/', `http://${req.headers.host ?? ''}`);
    userAgents.add(req.headers['user-agent'] ?? '');
    hits.set(url.pathname, (hits.get(url.pathname) ?? 0) + 1);

    if (url.pathname === '/writeup/4') {
      res.statusCode = 503;
      res.end('Service Unavailable');
      return;
    }

    const html = siteMap[url.pathname];
    if (!html) {
      res.statusCode = 404;
      res.end('Not found');
      return;
    }

    res.setHeader('Content-Type', 'text/html; charset=utf-8');
    res.end(html);
  });

  await new Promise<void>((resolve) => {
    server.listen(0, '127.0.0.1', () => resolve());
  });

  const address = server.address();
  if (typeof address === 'object' && address && typeof address.port === 'number') {
    baseUrl = `http://127.0.0.1:${address.port}`;
  } else {
    throw new Error('Unable to determine server address for tests.');
  }

  serverClose = () =>
    new Promise<void>((resolve, reject) => {
      server.close((error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
});

afterAll(async () => {
  if (serverClose) {
    await serverClose();
  }
});

describe('crawlWriteups smoke test', () => {
  it('resolves write-ups served over HTTP', async () => {
    let completed: CrawlReport | undefined;

    const report = await crawlWriteups({
      baseUrl,
      concurrency: 2,
      maxAttempts: 3,
      timeoutMs: 5_000,
      logger: createLogger({ level: 'silent' }),
      handlers: {
        onComplete: (result) => {
          completed = result;
        },
      },
    });

    expect(completed).toBe(report);
    expect(report.records).toEqual([
      { primaryLabel: 'CTF1', secondaryLabel: 'pwn200', resolvedUrl: 'https://github.com/a/a' },
      { primaryLabel: 'CTF2', secondaryLabel: 'pwn300', resolvedUrl: 'https://blog.example/b' },
      { primaryLabel: 'CTF3', secondaryLabel: 'pwn400', resolvedUrl: `${baseUrl}/writeup/3` },
    ]);
    expect(report.failures).toEqual([
      {
        primaryLabel: 'CTF4',
        secondaryLabel: 'pwn500',
        detailUrl: `${baseUrl}/writeup/4`,
        attempts: 3,
        reason: 'HTTP 503',
        cancelled: false,
      },
    ]);

    expect(hits.get('/writeups')).toBe(1);
    expect(hits.get('/writeup/4')).toBe(3);
    expect([...userAgents]).toEqual([DEFAULT_USER_AGENT]);
    expect(report.summary.actualMaxConcurrency).toBeLessThanOrEqual(2);
    expect(report.summary.statusCounts).toEqual({ '200': 3, '503': 3 });
  });
});
