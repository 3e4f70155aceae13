/**
 * Bounded-concurrency map. Results keep input order.
 *
 * The first rejection rejects the whole map and stops the other workers
 * from picking up further items.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const workerCount = Math.max(1, Math.min(Math.floor(limit), items.length));
  let next = 0;
  let stopped = false;

  async function worker(): Promise<void> {
    while (!stopped && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (err) {
        stopped = true;
        throw err;
      }
    }
  }

  const workers: Promise<void>[] = [];
  for (let i = 0; i < workerCount && items.length > 0; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);
  return results;
}
