import { throwIfAborted } from './retry.js';

/**
 * Maps `items` through `fn` with at most `limit` calls in flight. Results keep
 * the input order; the first rejection rejects the whole run.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const slots: { value: R }[] = [];
  const queue = items.map((item, index) => ({ item, index }));
  const worker = async (): Promise<void> => {
    for (;;) {
      throwIfAborted(signal, 'pooled work');
      const job = queue.shift();
      if (!job) return;
      slots[job.index] = { value: await fn(job.item, job.index) };
    }
  };
  const workers = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return slots.map((slot) => slot.value);
}
