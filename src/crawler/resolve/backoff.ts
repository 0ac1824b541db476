import { MAX_TIMER_MS } from '../../util/delay.js';

/**
 * Exponential backoff with jitter: 2^(attemptIndex + u) milliseconds for a
 * fresh u in [0, 1) per call, capped at the longest delay a timer can hold.
 */
export function computeBackoffMs(attemptIndex: number, random: () => number = Math.random): number {
  return Math.min(2 ** (attemptIndex + random()), MAX_TIMER_MS);
}
