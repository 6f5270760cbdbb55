/**
 * Run async work over a list with at most `limit` tasks in flight.
 * Results are placed at their input index, not in completion order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  run: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const count = items.length;
  if (count === 0) return [];
  const cap = Math.max(1, Math.min(Math.floor(limit) || 1, count));

  const results = new Array<R>(count);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < count) {
      const i = next++;
      results[i] = await run(items[i], i);
    }
  };

  await Promise.all(Array.from({ length: cap }, () => worker()));
  return results;
}
