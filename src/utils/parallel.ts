/**
 * Parallel Processing Utilities
 *
 * Provides helpers for running async operations in parallel with concurrency limits.
 */

export interface ParallelOptions {
  /** Maximum number of concurrent operations (default: 5) */
  concurrency?: number;
  /** Whether to stop on first error (default: false - collect all results) */
  stopOnError?: boolean;
}

export interface ParallelResult<T> {
  /** Results in same order as input items */
  results: (T | Error)[];
  /** Number of successful operations */
  successCount: number;
  /** Number of failed operations */
  errorCount: number;
}

/**
 * Run async operations in parallel with concurrency limit
 *
 * @param items - Array of items to process
 * @param fn - Async function to apply to each item
 * @param options - Concurrency and error handling options
 * @returns Results array in same order as input, with errors captured
 *
 * @example
 * const results = await parallelMap(images, async (image, index) => {
 *   return await block.run({ image });
 * }, { concurrency: 5 });
 */
export async function parallelMap<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelResult<R>> {
  const { concurrency = 5, stopOnError = false } = options;

  const results: (R | Error)[] = new Array(items.length);
  let successCount = 0;
  let errorCount = 0;
  let stopped = false;

  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!stopped) {
      // Capture index before any async work
      const index = nextIndex;
      if (index >= items.length) {
        break;
      }
      nextIndex++;

      try {
        results[index] = await fn(items[index], index);
        successCount++;
      } catch (error) {
        results[index] = error instanceof Error ? error : new Error(String(error));
        errorCount++;

        if (stopOnError) {
          stopped = true;
        }
      }
    }
  };

  const workers: Promise<void>[] = [];
  const workerCount = Math.min(concurrency, items.length);

  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);

  return { results, successCount, errorCount };
}

/**
 * Check if a result from parallelMap is an error
 */
export function isParallelError<T>(result: T | Error): result is Error {
  return result instanceof Error;
}

/**
 * Shared concurrency gate.
 *
 * Unlike parallelMap, which bounds one list of items, a limiter bounds every
 * task submitted to it, so nested fan-outs (steps of a level, items of a step)
 * share a single budget.
 */
export class ConcurrencyLimiter {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency <= 0) {
      throw new Error('Concurrency must be a positive integer');
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  /**
   * Run a task once a slot is free
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active >= this.concurrency) {
      // The releasing task hands its slot over, so active is not incremented here
      await new Promise<void>((resolve) => this.queue.push(resolve));
    } else {
      this.active++;
    }
    try {
      return await task();
    } finally {
      const next = this.queue.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
