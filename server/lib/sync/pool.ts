/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Lanes stop
 * picking up new items once the signal aborts or any worker rejects; the
 * first rejection is rethrown after in-flight items settle.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  let next = 0;
  let failed = false;
  const lanes = Math.max(1, Math.min(concurrency, items.length));

  const lane = async () => {
    while (next < items.length && !failed && !signal?.aborted) {
      const index = next++;
      try {
        await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const results = await Promise.allSettled(Array.from({ length: lanes }, lane));
  const rejected = results.find((r): r is PromiseRejectedResult => r.status === "rejected");
  if (rejected) throw rejected.reason;
}
