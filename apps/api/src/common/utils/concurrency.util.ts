/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 *
 * Once `signal` is aborted no further item is started; tasks already running
 * finish normally. The result holds one settled entry per started item, in
 * start order.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  signal?: AbortSignal,
): Promise<PromiseSettledResult<R>[]> {
  const limit = Math.max(1, Math.floor(concurrency) || 1);
  const results: Promise<PromiseSettledResult<R>>[] = [];
  let nextIndex = 0;

  const startNext = (): Promise<void> | undefined => {
    if (nextIndex >= items.length || signal?.aborted) {
      return undefined;
    }

    const item = items[nextIndex++];
    const settled = task(item).then(
      (value): PromiseSettledResult<R> => ({ status: 'fulfilled', value }),
      (reason: unknown): PromiseSettledResult<R> => ({ status: 'rejected', reason }),
    );
    results.push(settled);

    return settled.then(() => startNext());
  };

  const lanes: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    const lane = startNext();
    if (!lane) break;
    lanes.push(lane);
  }

  await Promise.all(lanes);
  return Promise.all(results);
}
