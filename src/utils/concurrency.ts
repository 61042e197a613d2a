/**
 * Map `items` through `mapper` with at most `limit` calls in flight.
 * Results keep input order. The first rejection stops new work from
 * starting and is what the returned promise rejects with.
 */
export async function runWithConcurrency<T, U>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<U>,
): Promise<U[]> {
  if (limit <= 1) {
    const results: U[] = [];
    for (let i = 0; i < items.length; i++) {
      results.push(await mapper(items[i], i));
    }
    return results;
  }

  const results = new Array<U>(items.length);
  let nextIndex = 0;
  let failed = false;

  const workers = new Array(Math.min(limit, items.length)).fill(0).map(async () => {
    while (!failed && nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = await mapper(items[index], index);
      } catch (err) {
        failed = true;
        throw err;
      }
    }
  });

  await Promise.all(workers);
  return results;
}
