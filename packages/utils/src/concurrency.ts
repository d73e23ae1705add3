/**
 * Bounded Concurrency
 *
 * Runs an async mapper over a list with at most `limit` calls in flight.
 * After the first failure no new items are started; in-flight calls are
 * awaited and the first error is rethrown.
 */

export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  let failed = false;
  let firstError: unknown;

  const worker = async (): Promise<void> => {
    let task = queue.shift();
    while (!failed && task) {
      const { item, index } = task;
      try {
        results[index] = await fn(item, index);
      } catch (error) {
        if (!failed) {
          failed = true;
          firstError = error;
        }
      }
      task = queue.shift();
    }
  };

  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failed) {
    throw firstError;
  }
  return results;
}
