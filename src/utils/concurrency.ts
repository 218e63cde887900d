export const DEFAULT_FILE_CONCURRENCY = 5;

export function resolveConcurrency(value?: number): number {
  if (value === undefined || !Number.isFinite(value) || !value) return DEFAULT_FILE_CONCURRENCY;
  return Math.max(1, Math.floor(value));
}

/** Runs `worker` over `items` with at most `limit` calls in flight. */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  if (items.length === 0) return;
  const safeLimit = resolveConcurrency(limit);
  let nextIndex = 0;
  const runners = Array.from({ length: Math.min(safeLimit, items.length) }, async () => {
    while (true) {
      const current = nextIndex;
      nextIndex += 1;
      if (current >= items.length) break;
      await worker(items[current], current);
    }
  });
  await Promise.all(runners);
}

export type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

/**
 * Maps every item through `task` under the concurrency limit and keeps each
 * outcome at its input index. A failing task never stops its siblings.
 */
export async function settleAllWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<R>
): Promise<Settled<R>[]> {
  const results = new Array<Settled<R>>(items.length);
  await runWithConcurrency(items, limit, async (item, index) => {
    try {
      results[index] = { ok: true, value: await task(item, index) };
    } catch (error) {
      results[index] = { ok: false, error };
    }
  });
  return results;
}
