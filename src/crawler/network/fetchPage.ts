import { createFetchError, isCrawlerError, type CrawlerError } from '../../errors.js';
import type { FetchOutcome } from '../../types.js';

export interface FetchPageOptions {
  timeoutMs: number;
  headers: Record<string, string>;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/71.0.3578.98 Safari/537.36';

export function buildRequestHeaders(userAgent: string): Record<string, string> {
  return {
    'user-agent': userAgent,
    accept: 'text/html,application/xhtml+xml,*/*;q=0.9',
  };
}

/**
 * Single GET. Anything but a 200 comes back as a transient failure; the
 * caller decides whether to try again.
 */
export async function fetchPage(url: string, options: FetchPageOptions): Promise<FetchOutcome> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), options.timeoutMs);

  try {
    const response = await fetch(url, {
      method: 'GET',
      redirect: 'follow',
      signal: controller.signal,
      headers: options.headers,
    });

    if (response.status !== 200) {
      // drain so the connection can be reused
      await response.body?.cancel();
      return {
        kind: 'transient-failure',
        url,
        status: response.status,
        reason: `HTTP ${response.status}`,
      };
    }

    const html = await response.text();
    return { kind: 'success', url, status: response.status, html };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    const timedOut = controller.signal.aborted && err.name === 'AbortError';
    const code = extractErrorCode(err);
    const message = timedOut
      ? `Request timed out after ${options.timeoutMs}ms`
      : err.message || 'Request failed';

    return {
      kind: 'transient-failure',
      url,
      status: null,
      reason: message,
      error: createFetchError(
        message,
        {
          url,
          timeoutMs: options.timeoutMs,
          ...(typeof code === 'string' ? { code } : {}),
        },
        { cause: err },
      ),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

function extractErrorCode(error: Error | CrawlerError): string | undefined {
  if (isCrawlerError(error)) {
    const detailsCode = error.details?.code;
    if (typeof detailsCode === 'string') {
      return detailsCode;
    }
  }

  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }

  const cause = error.cause;
  if (cause instanceof Error) {
    return extractErrorCode(cause);
  }

  return undefined;
}
