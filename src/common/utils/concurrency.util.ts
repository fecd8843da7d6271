/**
 * Runs tasks in slices of `limit`, waiting for each slice to settle.
 * Results keep the order of `tasks`.
 */
export async function executeConcurrently<T>(
  tasks: Array<() => Promise<T>>,
  limit: number,
): Promise<PromiseSettledResult<T>[]> {
  const sliceSize = Math.max(1, Math.floor(limit));
  const results: PromiseSettledResult<T>[] = [];
  let currentIndex = 0;
  while (currentIndex < tasks.length) {
    const slice = tasks.slice(currentIndex, currentIndex + sliceSize).map((fn) => fn());
    const settled = await Promise.allSettled(slice);
    results.push(...settled);
    currentIndex += slice.length;
  }
  return results;
}
