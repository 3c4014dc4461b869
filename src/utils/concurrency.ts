/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order. The first rejection rejects the whole
 * call; workers already running are left to settle but no new item starts.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  const runners = Array.from(
    { length: Math.min(Math.max(1, limit), items.length) },
    async () => {
      while (!failed && next < items.length) {
        const index = next++;
        try {
          results[index] = await worker(items[index], index);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    },
  );

  await Promise.all(runners);
  return results;
}
