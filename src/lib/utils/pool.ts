/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 * Results keep the input order. A rejection from `fn` rejects the whole
 * call, so callers that must not abort catch inside `fn`.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const current = next++;
      results[current] = await fn(items[current], current);
    }
  }

  const width = Math.max(1, Math.min(limit, items.length));
  const workers = Array.from({ length: width }, () => worker());
  await Promise.all(workers);
  return results;
}
