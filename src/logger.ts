import pino, { type DestinationStream, type LoggerOptions } from 'pino';

export interface LoggerLike {
  info(...args: unknown[]): void;
  error(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  debug(...args: unknown[]): void;
  trace(...args: unknown[]): void;
  fatal(...args: unknown[]): void;
  child(bindings: Record<string, unknown>): LoggerLike;
}

export interface LoggerConfiguration {
  level?: LoggerOptions['level'];
  base?: LoggerOptions['base'];
  destination?: DestinationStream;
}

const DEFAULT_LEVEL: LoggerOptions['level'] = 'silent';
const DEFAULT_BASE = { service: 'writeup-resolver' } as const;

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Builds a run-scoped pino logger. Callers own the instance and pass it down;
 * there is no process-wide logger to configure.
 */
export function createLogger(config: LoggerConfiguration = {}): LoggerLike {
  const merged: LoggerOptions = {
    level: config.level ?? DEFAULT_LEVEL,
    base: config.base ?? DEFAULT_BASE,
  };

  if (config.destination) {
    return pino(merged, config.destination);
  }

  return pino(merged);
}

/** stderr keeps stdout free for the report itself. */
export function createStderrLogger(level: LoggerOptions['level']): LoggerLike {
  return createLogger({ level, destination: pino.destination(2) });
}
