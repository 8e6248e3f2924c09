/**
 * Run tasks with a concurrency limit.
 *
 * Items are pulled in order by `limit` lanes; a lane picks up the next item as
 * soon as its current one settles. The worker is expected not to throw.
 */
export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>
): Promise<void> {
  let next = 0;
  const lanes = Array.from({ length: Math.min(Math.max(1, limit), items.length) }, async () => {
    while (next < items.length) {
      const index = next;
      next += 1;
      await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
}
