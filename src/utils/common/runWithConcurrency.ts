/**
 * @notice Runs `task` over `items` with at most `concurrency` tasks in flight
 * @dev Workers pull the next item as soon as they finish one. Results are collected in completion
 * order, not item order.
 * @param items The inputs to process
 * @param concurrency Worker budget, at least 1
 * @param task Work for one item
 * @returns Every task result, in the order the tasks completed
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = [];
  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const item = items[next];
      next += 1;
      results.push(await task(item));
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, worker);
  await Promise.all(workers);
  return results;
}
