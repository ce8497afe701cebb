import { logger } from '../utils';

export interface WorkerPoolOptions {
  concurrency: number;
  /** Epoch ms after which no new item is started. */
  deadline?: number | null;
  now?: () => number;
}

export type WorkerResult<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; error: unknown };

export interface WorkerPoolResult<T, R> {
  /** Settled results in input order. */
  results: Array<WorkerResult<T, R>>;
  /** Items never started because the deadline passed. */
  notStarted: T[];
  timedOut: boolean;
}

/**
 * Runs `worker` over `items` with at most `concurrency` in flight. A rejected
 * item never stops its siblings. Once the deadline passes, workers stop
 * taking items; in-flight items finish.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: WorkerPoolOptions
): Promise<WorkerPoolResult<T, R>> {
  const now = options.now ?? Date.now;
  const deadline = options.deadline ?? null;
  const concurrency = Math.max(1, Math.min(options.concurrency, items.length || 1));

  const settled = new Map<number, WorkerResult<T, R>>();
  let next = 0;
  let timedOut = false;

  const loop = async (workerId: number): Promise<void> => {
    while (next < items.length) {
      if (deadline !== null && now() >= deadline) {
        timedOut = true;
        return;
      }

      const index = next++;
      const item = items[index];
      try {
        const value = await worker(item, index);
        settled.set(index, { item, status: 'fulfilled', value });
      } catch (error) {
        settled.set(index, { item, status: 'rejected', error });
        logger.debug('WorkerPool', `Worker ${workerId} item ${index} rejected`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < concurrency; i++) {
    workers.push(loop(i));
  }
  await Promise.all(workers);

  const results: Array<WorkerResult<T, R>> = [];
  const notStarted: T[] = [];
  items.forEach((item, index) => {
    const result = settled.get(index);
    if (result) {
      results.push(result);
    } else {
      notStarted.push(item);
    }
  });

  return { results, notStarted, timedOut };
}
