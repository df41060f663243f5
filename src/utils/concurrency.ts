/**
 * Bounded-concurrency helpers
 */

/**
 * Outcome of one item processed by mapWithConcurrency
 */
export type SettledResult<T> =
  | { status: 'fulfilled'; value: T }
  | { status: 'rejected'; reason: unknown };

/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Results keep input order. A rejection never stops the other items; each
 * outcome is reported like Promise.allSettled.
 *
 * @example
 * ```typescript
 * const results = await mapWithConcurrency(ids, 4, (id) => reconcile(id));
 * const failed = results.filter((r) => r.status === 'rejected');
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<SettledResult<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new Error(`Invalid concurrency limit: ${limit}. Must be a positive integer.`);
  }

  const results: SettledResult<R>[] = new Array(items.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = { status: 'fulfilled', value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  return results;
}
