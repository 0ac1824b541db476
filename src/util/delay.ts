import type { Sleep } from '../types.js';

/** Longest delay `setTimeout` honours; larger values fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timeoutId);
      resolve();
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
