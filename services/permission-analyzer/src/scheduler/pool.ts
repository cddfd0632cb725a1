import { createAsyncQueue } from "./queue";

export const DEFAULT_WORKER_COUNT = 10;
export const DEFAULT_STALL_TIMEOUT_MS = 5 * 60 * 1000;

export type PoolEntry<I, R> =
  | { item: I; status: "fulfilled"; value: R }
  | { item: I; status: "rejected"; reason: string };

export interface PoolOptions {
  workerCount?: number;
  /** Give up when no result arrives for this long. */
  stallTimeoutMs?: number;
}

export interface PoolResult<I, R> {
  /** In completion order. */
  results: PoolEntry<I, R>[];
  submitted: number;
  completed: number;
  timedOut: boolean;
}

/**
 * Run `worker` over `items` with at most `workerCount` in flight.
 *
 * Workers take items off a shared list and push one entry per item onto a
 * results queue. The coordinator drains that queue until every item has
 * reported or no result arrives within `stallTimeoutMs`; in the latter case
 * it returns what it has with `timedOut` set, and workers take no new items.
 * Calls already in flight are not cancelled.
 */
export async function runBounded<I, R>(
  items: I[],
  worker: (item: I) => Promise<R>,
  options: PoolOptions = {},
): Promise<PoolResult<I, R>> {
  const workerCount = Math.max(1, options.workerCount ?? DEFAULT_WORKER_COUNT);
  const stallTimeoutMs = options.stallTimeoutMs ?? DEFAULT_STALL_TIMEOUT_MS;

  const queue = createAsyncQueue<PoolEntry<I, R>>();
  let next = 0;
  let closed = false;

  async function runWorker(): Promise<void> {
    while (!closed && next < items.length) {
      const item = items[next++];
      try {
        const value = await worker(item);
        queue.push({ item, status: "fulfilled", value });
      } catch (err) {
        queue.push({
          item,
          status: "rejected",
          reason: err instanceof Error ? err.message : String(err),
        });
      }
    }
  }

  const workers = Array.from(
    { length: Math.min(workerCount, items.length) },
    () => runWorker(),
  );

  const results: PoolEntry<I, R>[] = [];
  let timedOut = false;

  while (results.length < items.length) {
    const entry = await queue.pop(stallTimeoutMs);
    if (entry === undefined) {
      timedOut = true;
      break;
    }
    results.push(entry);
  }

  closed = true;

  if (timedOut) {
    console.warn(
      `No result within ${stallTimeoutMs}ms, returning ${results.length}/${items.length} results`,
    );
    Promise.all(workers).catch((err) => {
      console.error("Worker failed after stall timeout:", err);
    });
  } else {
    await Promise.all(workers);
  }

  return {
    results,
    submitted: items.length,
    completed: results.length,
    timedOut,
  };
}
