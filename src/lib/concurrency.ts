/**
 * Runs `task` over `items` with at most `limit` tasks in flight.
 * After the first failure no new task starts; in-flight tasks are awaited
 * before that first error is rethrown.
 */
export async function forEachWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<void>,
): Promise<void> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`Concurrency limit must be a positive integer, received ${limit}`);
  }

  let nextIndex = 0;
  const state: { failure?: { error: unknown } } = {};

  async function worker(): Promise<void> {
    while (!state.failure && nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        await task(items[index], index);
      } catch (error) {
        state.failure ??= { error };
      }
    }
  }

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (state.failure) {
    throw state.failure.error;
  }
}
