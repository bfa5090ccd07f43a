/**
 * Run `fn` over `items` with at most `concurrency` calls in flight and collect every
 * outcome, like Promise.allSettled. Results keep input order regardless of which call
 * finishes first. `Infinity` starts everything at once.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  if (!(concurrency >= 1)) {
    throw new RangeError(`concurrency must be >= 1 (got ${concurrency})`);
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const i = next++;
      try {
        results[i] = { status: "fulfilled", value: await fn(items[i], i) };
      } catch (reason) {
        results[i] = { status: "rejected", reason };
      }
    }
  }

  const workers = Math.min(items.length, Number.isFinite(concurrency) ? Math.floor(concurrency) : items.length);
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
