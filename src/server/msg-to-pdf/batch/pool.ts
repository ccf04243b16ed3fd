/**
 * Runs `task` over `items` with at most `workerCount` in flight. Each worker
 * takes the next unclaimed index once its current task settles; results land
 * at their item's index, whatever order tasks finish in.
 */
export async function runPool<T, R>(
  items: readonly T[],
  workerCount: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  };

  const size = Math.min(workerCount, items.length);
  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}
