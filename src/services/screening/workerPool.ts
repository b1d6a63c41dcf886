export type PoolCompletion<T, R> =
  | { item: T; ok: true; value: R }
  | { item: T; ok: false; error: unknown };

export const MAX_POOL_SIZE = 16;

/**
 * Runs `task` over `items` with at most `concurrency` in flight. Each settled
 * task is handed to `collect` as it finishes, in completion order; `collect` is
 * the only consumer of results. Resolves once every item has settled, and never
 * rejects because of a task failure.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  collect: (completion: PoolCompletion<T, R>, settled: number) => void,
): Promise<void> {
  if (items.length === 0) {
    return;
  }

  const limit = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let nextIndex = 0;
  let settled = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const item = items[nextIndex++];
      let completion: PoolCompletion<T, R>;
      try {
        completion = { item, ok: true, value: await task(item) };
      } catch (error) {
        completion = { item, ok: false, error };
      }
      settled++;
      collect(completion, settled);
    }
  };

  await Promise.all(Array.from({ length: limit }, () => worker()));
}

export function poolSize(maxWorkers: number, itemCount: number): number {
  return Math.max(1, Math.min(maxWorkers, itemCount));
}
