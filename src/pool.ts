/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Results keep the
 * order of `items`. After the first failure no new item is started; the failure is
 * rethrown once the in-flight workers have settled.
 */
export const runPool = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  let next = 0;
  const failures: unknown[] = [];

  const lane = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (e) {
        failures.push(e);
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, lane));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
};
