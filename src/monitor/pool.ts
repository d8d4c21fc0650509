export type PoolOutcome<R> =
  | { ok: true; results: R[] }
  | { ok: false; results: R[]; error: unknown };

/**
 * Runs `fn` over `items` with at most `limit` in flight. The first error stops
 * new work from starting; work already in flight finishes, and results of
 * everything that completed are returned alongside the error.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<PoolOutcome<R>> {
  const results: R[] = [];
  let next = 0;
  let failed = false;
  let firstError: unknown;

  async function worker() {
    while (!failed && next < items.length) {
      const i = next++;
      const item = items[i];
      if (item === undefined) continue;
      try {
        results.push(await fn(item, i));
      } catch (e) {
        if (!failed) { failed = true; firstError = e; }
      }
    }
  }

  const n = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: n }, () => worker()));
  return failed ? { ok: false, results, error: firstError } : { ok: true, results };
}
