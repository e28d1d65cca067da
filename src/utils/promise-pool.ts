/**
 * Map over items with a concurrency limit, keeping results in input order.
 *
 * Outcomes may complete in any order; callers that aggregate results get them
 * back in work-list order, which keeps the written file deterministic.
 */

export async function mapPromisePool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency))
  const results = new Array<R>(items.length)
  const running = new Set<Promise<void>>()

  for (const [i, item] of items.entries()) {
    const p: Promise<void> = worker(item, i)
      .then((r) => {
        results[i] = r
      })
      .finally(() => running.delete(p))
    running.add(p)
    if (running.size >= limit) {
      await Promise.race(running)
    }
  }

  await Promise.all(running)
  return results
}
