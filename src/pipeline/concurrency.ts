import { toError } from '../errors.js';

export type Settled<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error };

export const DEFAULT_CONCURRENCY = 8;

/**
 * Map `items` through an async worker with at most `limit` calls in flight.
 * Results come back in input order; a failed item yields its Error instead
 * of rejecting the whole batch.
 */
export async function mapWithConcurrency<I, T>(
  items: readonly I[],
  worker: (item: I, index: number) => Promise<T>,
  limit: number = DEFAULT_CONCURRENCY,
): Promise<Array<Settled<T>>> {
  const results: Array<Settled<T>> = new Array(items.length);
  let nextIndex = 0;

  async function runNext(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (err) {
        results[index] = { ok: false, error: toError(err) };
      }
    }
  }

  const requested = Number.isFinite(limit) ? Math.floor(limit) : DEFAULT_CONCURRENCY;
  const lanes = Math.max(1, Math.min(requested, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runNext()));
  return results;
}
