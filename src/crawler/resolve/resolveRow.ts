import { createResolutionFailedError } from '../../errors.js';
import type {
  CatalogRow,
  Fetcher,
  ResolutionSource,
  RowOutcome,
  RunContext,
} from '../../types.js';
import { extractLinks, type DetailLinks } from '../parsing/extractLinks.js';
import { joinUrl } from '../url/joinUrl.js';
import { computeBackoffMs } from './backoff.js';

type AttemptOutcome =
  | { kind: 'resolved'; url: string; source: ResolutionSource }
  | { kind: 'transient-failure'; status: number | null; reason: string };

export function chooseWriteupUrl(
  links: DetailLinks,
  detailUrl: string,
): { url: string; source: ResolutionSource } {
  if (links.inlineLink) {
    return { url: links.inlineLink, source: 'inline' };
  }

  if (links.fallbackLink) {
    return { url: links.fallbackLink, source: 'fallback' };
  }

  return { url: detailUrl, source: 'detail-page' };
}

async function attemptResolution(detailUrl: string, fetcher: Fetcher): Promise<AttemptOutcome> {
  const outcome = await fetcher(detailUrl);

  if (outcome.kind === 'transient-failure') {
    return { kind: 'transient-failure', status: outcome.status, reason: outcome.reason };
  }

  return { kind: 'resolved', ...chooseWriteupUrl(extractLinks(outcome.html), detailUrl) };
}

/**
 * Resolves the write-up URL of one index row, retrying the detail fetch with
 * exponential backoff up to `maxAttempts` times. Never throws for fetch
 * problems: exhaustion and cancellation come back as a failed outcome.
 */
export async function resolveRow(
  row: CatalogRow,
  context: RunContext,
  signal: AbortSignal,
): Promise<RowOutcome> {
  const { options, fetcher, sleep, random } = context;
  const logger = context.logger.child({ ctf: row.primaryLabel, challenge: row.secondaryLabel });
  const detailUrl = joinUrl(options.baseUrl, row.detailPath);
  let lastReason = 'no attempt made';

  for (let attemptIndex = 0; attemptIndex < options.maxAttempts; attemptIndex += 1) {
    if (signal.aborted) {
      return failed(row, detailUrl, attemptIndex, `Cancelled (last: ${lastReason})`, true);
    }

    const outcome = await attemptResolution(detailUrl, fetcher);

    switch (outcome.kind) {
      case 'resolved':
        logger.debug({ source: outcome.source, attempts: attemptIndex + 1 }, 'Fetched write-up info.');
        return {
          ok: true,
          record: {
            primaryLabel: row.primaryLabel,
            secondaryLabel: row.secondaryLabel,
            resolvedUrl: outcome.url,
          },
          source: outcome.source,
          attempts: attemptIndex + 1,
        };

      case 'transient-failure': {
        lastReason = outcome.reason;
        if (attemptIndex + 1 >= options.maxAttempts) {
          break;
        }

        const delayMs = computeBackoffMs(attemptIndex, random);
        logger.debug(
          { attempt: attemptIndex + 1, status: outcome.status, reason: outcome.reason },
          `Failed to fetch the write-up page. Retrying in ${Math.round(delayMs)}ms.`,
        );
        await sleep(delayMs, signal);
        break;
      }
    }
  }

  return failed(row, detailUrl, options.maxAttempts, lastReason, false);
}

function failed(
  row: CatalogRow,
  detailUrl: string,
  attempts: number,
  reason: string,
  cancelled: boolean,
): RowOutcome {
  return {
    ok: false,
    failure: {
      primaryLabel: row.primaryLabel,
      secondaryLabel: row.secondaryLabel,
      detailUrl,
      attempts,
      reason,
      cancelled,
    },
    error: createResolutionFailedError(row.primaryLabel, row.secondaryLabel, attempts, {
      url: detailUrl,
      reason,
      cancelled,
    }),
  };
}
