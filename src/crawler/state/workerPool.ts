import pLimit from 'p-limit';

import { createInternalError } from '../../errors.js';

/**
 * Fixed-width pool of concurrent tasks. Only `withWorkerPool` hands one out,
 * so it is always closed when the caller's work ends, error paths included.
 */
export class WorkerPool {
  private readonly limiter: ReturnType<typeof pLimit>;
  private closed = false;

  constructor(readonly width: number) {
    this.limiter = pLimit(width);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(
        createInternalError('Worker pool is closed; no new tasks can be submitted.', {
          width: this.width,
        }),
      );
    }

    return this.limiter(task);
  }

  get active(): number {
    return this.limiter.activeCount;
  }

  get pending(): number {
    return this.limiter.pendingCount;
  }

  close(): void {
    this.closed = true;
    this.limiter.clearQueue();
  }
}

export async function withWorkerPool<T>(
  width: number,
  body: (pool: WorkerPool) => Promise<T>,
): Promise<T> {
  const pool = new WorkerPool(width);
  try {
    return await body(pool);
  } finally {
    pool.close();
  }
}
