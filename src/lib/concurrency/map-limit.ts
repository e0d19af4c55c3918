export type MapLimitOptions = {
  limit: number;
  signal?: AbortSignal;
};

export type MapLimitResult<R> = { status: 'done'; value: R } | { status: 'cancelled' };

/**
 * Runs `fn` over `items` with at most `limit` in flight. Results keep input order.
 * Items not yet started when `signal` aborts resolve as `cancelled`; `fn` must not throw.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  opts: MapLimitOptions,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Array<MapLimitResult<R>>> {
  const safeLimit = Math.max(1, Math.floor(Number.isFinite(opts.limit) ? opts.limit : 1));
  const results: Array<MapLimitResult<R>> = items.map(() => ({ status: 'cancelled' }));
  let idx = 0;

  const workers = new Array(Math.min(safeLimit, items.length)).fill(null).map(async () => {
    while (true) {
      if (opts.signal?.aborted) return;
      const current = idx++;
      if (current >= items.length) return;
      results[current] = { status: 'done', value: await fn(items[current], current) };
    }
  });

  await Promise.all(workers);
  return results;
}
