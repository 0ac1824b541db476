export type ErrorKind =
  | 'fetch'
  | 'extract'
  | 'resolve'
  | 'abort'
  | 'config'
  | 'internal';

export type ErrorSeverity = 'recoverable' | 'fatal';

const ERROR_NAMES: Record<ErrorKind, string> = {
  fetch: 'TransientFetchFailure',
  extract: 'StructuralExtractionFailure',
  resolve: 'ResolutionFailed',
  abort: 'CrawlAborted',
  config: 'ConfigurationError',
  internal: 'InternalError',
};

export interface CrawlerErrorProps {
  message: string;
  kind: ErrorKind;
  severity?: ErrorSeverity;
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class CrawlerError extends Error {
  readonly kind: ErrorKind;
  readonly severity: ErrorSeverity;
  readonly details?: Record<string, unknown>;

  constructor({ message, kind, severity = 'recoverable', details, cause }: CrawlerErrorProps) {
    super(message, cause ? { cause } : undefined);
    this.name = ERROR_NAMES[kind];
    this.kind = kind;
    this.severity = severity;
    this.details = details;
  }
}

export function isCrawlerError(value: unknown): value is CrawlerError {
  return value instanceof CrawlerError;
}

export function ensureCrawlerError(
  error: unknown,
  fallback: Partial<CrawlerErrorProps> & Pick<CrawlerErrorProps, 'kind'> = { kind: 'internal' },
): CrawlerError {
  if (isCrawlerError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  return new CrawlerError({
    message,
    kind: fallback.kind,
    severity: fallback.severity ?? 'fatal',
    details: fallback.details,
    cause: error instanceof Error ? error : undefined,
  });
}

export function createFetchError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'fetch',
    severity: 'recoverable',
    details,
    cause: options.cause,
  });
}

/**
 * The markup of the index page no longer matches the expected shape.
 * Always fatal.
 */
export function createExtractionError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'extract',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createResolutionFailedError(
  primaryLabel: string,
  secondaryLabel: string,
  attempts: number,
  details: Record<string, unknown> = {},
): CrawlerError {
  return new CrawlerError({
    message: `Could not fetch write-up URL (${primaryLabel} - ${secondaryLabel}) after ${attempts} attempts.`,
    kind: 'resolve',
    severity: 'recoverable',
    details: { primaryLabel, secondaryLabel, attempts, ...details },
  });
}

export function createCrawlAbortedError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'abort',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createConfigurationError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'config',
    severity: 'fatal',
    details,
    cause: options.cause,
  });
}

export function createInternalError(
  message: string,
  details: Record<string, unknown> = {},
  options: { cause?: unknown; severity?: ErrorSeverity } = {},
): CrawlerError {
  return new CrawlerError({
    message,
    kind: 'internal',
    severity: options.severity ?? 'fatal',
    details,
    cause: options.cause,
  });
}
