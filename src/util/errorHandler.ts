import {
  CrawlerError,
  ensureCrawlerError,
  type ErrorKind,
  type ErrorSeverity,
} from '../errors.js';
import type { LoggerLike } from '../logger.js';

export interface ErrorContext extends Record<string, unknown> {
  stage?: string;
  url?: string;
  attempt?: number;
}

export interface ErrorHandlingOptions {
  defaultKind?: ErrorKind;
  defaultSeverity?: ErrorSeverity;
  throwOnFatal?: boolean;
}

export function reportCrawlerError(
  error: unknown,
  logger: LoggerLike,
  context: ErrorContext = {},
  options: ErrorHandlingOptions = {},
): CrawlerError {
  const crawlerError = ensureCrawlerError(error, {
    kind: options.defaultKind ?? 'internal',
    severity: options.defaultSeverity,
    details: context,
  });

  const mergedDetails: Record<string, unknown> = {
    ...(crawlerError.details ?? {}),
    ...context,
  };

  const message = buildLogMessage(crawlerError, mergedDetails);
  const shouldThrow = options.throwOnFatal ?? true;

  if (crawlerError.severity === 'fatal') {
    logger.error(message);
    if (shouldThrow) {
      throw crawlerError;
    }
  } else {
    logger.warn(message);
  }

  return crawlerError;
}

function buildLogMessage(error: CrawlerError, details: Record<string, unknown>): string {
  const parts = [`[${error.kind}/${error.severity}]`, error.message];
  const contextSuffix = serialiseDetails(details);

  if (contextSuffix) {
    parts.push(`(${contextSuffix})`);
  }

  return parts.join(' ');
}

function serialiseDetails(details: Record<string, unknown>): string | undefined {
  const entries = Object.entries(details).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return undefined;
  }

  entries.sort(([a], [b]) => a.localeCompare(b));
  return entries
    .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
    .join(' ');
}
