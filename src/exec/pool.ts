/**
 * Bounded fan-out
 *
 * runPool keeps at most `limit` workers busy and hands the next item to
 * whichever worker frees up first, so one slow host never stalls a whole
 * batch. Results come back in input order; onSettled sees them in
 * completion order.
 */

import { invalidArgumentsError } from '../cli/errors.js';

export type PoolOutcome<R> =
  | { ok: true; value: R }
  | { ok: false; error: Error };

export interface PoolOptions<T, R> {
  /** Called as each item finishes, in completion order */
  onSettled?: (outcome: PoolOutcome<R>, item: T, index: number, completed: number) => void;
  /** Minimum gap between two starts */
  delayMs?: number;
  /** Stop handing out new items once this returns true */
  shouldStop?: () => boolean;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions<T, R> = {}
): Promise<PoolOutcome<R>[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw invalidArgumentsError(`Concurrency must be a positive integer (got ${limit})`);
  }

  const outcomes: PoolOutcome<R>[] = new Array(items.length);
  let next = 0;
  let completed = 0;
  let lastStart = 0;

  const claim = async (): Promise<number | null> => {
    if (options.shouldStop?.() || next >= items.length) {
      return null;
    }
    const index = next++;
    if (options.delayMs && options.delayMs > 0) {
      const wait = lastStart + options.delayMs - Date.now();
      lastStart = Math.max(Date.now(), lastStart + options.delayMs);
      if (wait > 0) {
        await sleep(wait);
      }
    }
    return index;
  };

  const runWorker = async (): Promise<void> => {
    for (let index = await claim(); index !== null; index = await claim()) {
      const item = items[index];
      let outcome: PoolOutcome<R>;
      try {
        outcome = { ok: true, value: await worker(item, index) };
      } catch (error) {
        outcome = { ok: false, error: toError(error) };
      }
      outcomes[index] = outcome;
      completed++;
      options.onSettled?.(outcome, item, index, completed);
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => runWorker());
  await Promise.all(workers);

  // Items never started because shouldStop fired are left out
  return outcomes.filter((o): o is PoolOutcome<R> => o !== undefined);
}

/**
 * Values of the successful outcomes
 */
export function poolValues<R>(outcomes: PoolOutcome<R>[]): R[] {
  return outcomes.flatMap((o) => (o.ok ? [o.value] : []));
}
