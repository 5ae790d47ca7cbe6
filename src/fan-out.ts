/**
 * Bounded concurrent map
 *
 * Runs `fn` over `items` in batches of at most `limit` tasks. Results keep
 * the input order. A failure in a batch rejects the whole call with the first
 * failing task's error once that batch has settled; later batches are not
 * started.
 */

export async function mapBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results: R[] = [];

  for (let start = 0; start < items.length; start += limit) {
    const batch = items.slice(start, start + limit);
    const settled = await Promise.allSettled(batch.map((item, offset) => fn(item, start + offset)));

    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason;
      }
      results.push(outcome.value);
    }
  }

  return results;
}
