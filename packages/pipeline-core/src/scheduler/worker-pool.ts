/**
 * FILE PURPOSE: Bounded worker pool with explicit completion tracking
 *
 * WHY: Fire-and-forget batch dispatch can let a run finish while work is
 *      still pending. Here `concurrency` workers pull from a shared cursor
 *      and the pool resolves only after every worker has returned, so each
 *      started item has a recorded result.
 *
 * HOW: Workers share one iterator over the input. The cursor and counters
 *      are only touched between awaits, so no lock is held across the
 *      worker's I/O. A worker that throws stops its own loop; the others
 *      finish before the error is rethrown. When the signal aborts, workers
 *      stop pulling new items; indices never started land in `notStarted`.
 */

export interface PoolOptions {
  signal?: AbortSignal;
}

export interface PoolResult<R> {
  /** Indexed like the input; undefined for items that never started. */
  results: Array<R | undefined>;
  notStarted: number[];
  /** Highest number of workers observed inside `worker()` at once. */
  peakInFlight: number;
}

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions = {},
): Promise<PoolResult<R>> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const started = new Array<boolean>(items.length).fill(false);
  const cursor = items.entries();
  let inFlight = 0;
  let peakInFlight = 0;

  async function drain(): Promise<void> {
    while (!options.signal?.aborted) {
      const next = cursor.next();
      if (next.done) return;

      const [index, item] = next.value;
      started[index] = true;
      inFlight++;
      peakInFlight = Math.max(peakInFlight, inFlight);
      try {
        results[index] = await worker(item, index);
      } finally {
        inFlight--;
      }
    }
  }

  const workers = Array.from({ length: Math.min(concurrency, items.length) }, () => drain());
  const settled = await Promise.allSettled(workers);
  const crashed = settled.find((outcome) => outcome.status === 'rejected');
  if (crashed && crashed.status === 'rejected') {
    throw crashed.reason;
  }

  const notStarted: number[] = [];
  started.forEach((wasStarted, index) => {
    if (!wasStarted) notStarted.push(index);
  });

  return { results, notStarted, peakInFlight };
}
