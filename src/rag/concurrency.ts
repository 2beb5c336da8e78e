/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight. Results
 * keep the order of `items`. After the first rejection no new items start, and
 * the call rejects with that error once in-flight work has settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.entries();
  let failed = false;

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), items.length) },
    async () => {
      for (let next = queue.next(); !next.done && !failed; next = queue.next()) {
        const [index, item] = next.value;
        try {
          results[index] = await fn(item, index);
        } catch (error) {
          failed = true;
          throw error;
        }
      }
    },
  );

  const settled = await Promise.allSettled(workers);
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
