/**
 * ListingSync: Concurrency Control
 *
 * Counting semaphore plus a task group that runs a batch of async
 * tasks under a concurrency cap and joins on all of them.
 */

// ============================================================
// SEMAPHORE
// ============================================================

/**
 * Counting semaphore. Waiters are woken in FIFO order.
 * A semaphore of size 1 is used as a mutex for cache writes.
 */
export class Semaphore {
  private readonly max: number;
  private current = 0;
  private readonly queue: Array<() => void> = [];

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new Error(`Semaphore max must be an integer >= 1, got ${maxConcurrent}`);
    }
    this.max = maxConcurrent;
  }

  get activeCount(): number {
    return this.current;
  }

  get waitingCount(): number {
    return this.queue.length;
  }

  async acquire(): Promise<void> {
    if (this.current < this.max) {
      this.current++;
      return;
    }

    return new Promise<void>(resolve => {
      this.queue.push(resolve);
    });
  }

  release(): void {
    const next = this.queue.shift();
    if (next) {
      // Slot passes straight to the waiter; current is unchanged
      next();
    } else if (this.current > 0) {
      this.current--;
    }
  }

  /**
   * Run fn while holding a slot.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// ============================================================
// TASK GROUP
// ============================================================

export interface TaskFailure<K> {
  key: K;
  error: unknown;
}

export interface TaskGroupResult<K, T> {
  /** Successful results in completion order */
  results: Array<{ key: K; value: T }>;
  failures: Array<TaskFailure<K>>;
}

/**
 * Run one task per key with at most `concurrency` in flight.
 * Every dispatched task is awaited; a failing task never cancels the others.
 */
export async function runTaskGroup<K, T>(
  keys: readonly K[],
  concurrency: number,
  task: (key: K) => Promise<T>
): Promise<TaskGroupResult<K, T>> {
  const semaphore = new Semaphore(concurrency);
  const results: TaskGroupResult<K, T>['results'] = [];
  const failures: TaskGroupResult<K, T>['failures'] = [];

  await Promise.all(
    keys.map(key =>
      semaphore.run(async () => {
        try {
          results.push({ key, value: await task(key) });
        } catch (error) {
          failures.push({ key, error });
        }
      })
    )
  );

  return { results, failures };
}
