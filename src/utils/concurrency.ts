/**
 * Runs `task` over `items` with at most `limit` in flight. Every item settles;
 * results keep the input order.
 */
export async function settleWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  task: (item: T) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length)
  let nextIndex = 0

  const runner = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex
      nextIndex += 1
      const item = items[index]
      try {
        results[index] = { status: 'fulfilled', value: await task(item) }
      }
      catch (reason) {
        results[index] = { status: 'rejected', reason }
      }
    }
  }

  const runnerCount = Math.min(Math.max(1, limit), items.length)
  await Promise.all(Array.from({ length: runnerCount }, () => runner()))
  return results
}
