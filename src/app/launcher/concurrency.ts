/**
 * Bounded parallel map. Results keep the input order; at most `limit` calls are in flight.
 * Items not yet started when the signal aborts are passed to `onSkipped` instead of `fn`.
 */

export type ConcurrencyOptions<T, R> = {
  limit: number;
  signal?: AbortSignal;
  onSkipped?: (item: T, index: number) => R;
};

export async function mapWithConcurrencyLimit<T, R>(
  items: T[],
  fn: (item: T, index: number) => Promise<R>,
  opts: ConcurrencyOptions<T, R>,
): Promise<{ results: R[]; aborted: boolean }> {
  const limit = Math.max(1, Math.floor(opts.limit));
  const results = new Array<R>(items.length);
  let next = 0;
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;

      if (opts.signal?.aborted && opts.onSkipped) {
        aborted = true;
        results[index] = opts.onSkipped(item, index);
        continue;
      }

      results[index] = await fn(item, index);
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  return { results, aborted: aborted || (opts.signal?.aborted ?? false) };
}
