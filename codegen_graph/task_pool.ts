// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type TaskPoolOptions<T, R> = {
  /** Max tasks in flight at once, regardless of how many are queued. */
  maxConcurrency: number;
  /** Once aborted, queued tasks are no longer started; running ones finish. */
  signal?: AbortSignal;
  run: (item: T) => Promise<R>;
  /** Result recorded for a task that was never started because of `signal`. */
  onCancelled: (item: T) => R;
  /** Result recorded when `run` rejects. */
  onError: (item: T, error: unknown) => R;
  onTaskStart?: (item: T) => void;
  onTaskComplete?: (item: T, result: R) => void;
};

type QueueEntry<T> = {
  index: number;
  item: T;
};

// ---------------------------------------------------------------------------
// Pool – N async workers draining one shared queue
// ---------------------------------------------------------------------------

/**
 * Runs `items` with bounded parallelism. Results come back in input order,
 * whatever order the tasks finished in.
 */
export async function processTasksInParallel<T, R>(
  items: readonly T[],
  options: TaskPoolOptions<T, R>,
): Promise<R[]> {
  const { signal, run, onCancelled, onError, onTaskStart, onTaskComplete } = options;

  if (items.length === 0) {
    return [];
  }

  const queue: QueueEntry<T>[] = items.map((item, index) => ({ index, item }));
  const results = new Array<R>(items.length);
  const workerCount = Math.min(Math.max(1, Math.floor(options.maxConcurrency)), queue.length);

  function record(entry: QueueEntry<T>, result: R): void {
    results[entry.index] = result;
    onTaskComplete?.(entry.item, result);
  }

  async function worker(): Promise<void> {
    for (let entry = queue.shift(); entry !== undefined; entry = queue.shift()) {
      if (signal?.aborted) {
        record(entry, onCancelled(entry.item));
        continue;
      }

      onTaskStart?.(entry.item);
      let result: R;
      try {
        result = await run(entry.item);
      } catch (error) {
        result = onError(entry.item, error);
      }
      record(entry, result);
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
