import { UpstreamError, UpstreamTimeoutError, type UpstreamService } from './errors';

/**
 * Run one collaborator call under a deadline. Rejections are normalised to
 * UpstreamError so callers only need one catch shape.
 */
export async function withTimeout<T>(service: UpstreamService, timeoutMs: number, fn: () => Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new UpstreamTimeoutError(service, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), deadline]);
  } catch (e) {
    if (e instanceof UpstreamError) throw e;
    throw new UpstreamError(service, e instanceof Error ? e.message : String(e), { cause: e });
  } finally {
    if (timer) clearTimeout(timer);
  }
}

/**
 * Map over items with at most `concurrency` tasks in flight. Results keep the
 * input order regardless of completion order.
 */
export async function mapBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const active = new Set<Promise<void>>();

  const scheduleNext = (): void => {
    while (active.size < limit && queue.length > 0) {
      const next = queue.shift();
      if (!next) break;
      const task: Promise<void> = fn(next.item, next.index).then((value) => {
        results[next.index] = value;
      }).finally(() => {
        active.delete(task);
      });
      active.add(task);
    }
  };

  scheduleNext();
  while (active.size > 0) {
    await Promise.race(active);
    scheduleNext();
  }
  return results;
}
