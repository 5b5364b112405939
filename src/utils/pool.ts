/**
 * Runs `worker` over `items` with at most `concurrency` in flight. Workers pull
 * from one shared index, so every item is handed out exactly once.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T) => Promise<void>
): Promise<void> {
  let next = 0;
  const lanes = Math.max(1, Math.min(concurrency, items.length));
  const runLane = async () => {
    while (next < items.length) {
      const item = items[next++];
      await worker(item);
    }
  };
  const results = await Promise.allSettled(Array.from({ length: lanes }, () => runLane()));
  for (const r of results) {
    if (r.status === "rejected") throw r.reason;
  }
}
