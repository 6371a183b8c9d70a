/**
 * Island Warden — src/lib/concurrency.ts
 * WHAT: Bounded worker pool for fan-out over a list of items.
 * WHY: Probing every island at once would hammer the Discord API; probing
 *      them one by one lets a single slow island delay the rest.
 * FLOWS: runWithConcurrency(items, limit, worker) → N workers pull from a shared cursor → settled results
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import type { Result } from "./result.js";

export type Settled<T> = Result<T, unknown>;

/**
 * Run worker over items with at most `limit` in flight.
 * A rejected worker never stops the others; results keep input order.
 */
export async function runWithConcurrency<I, O>(
  items: readonly I[],
  limit: number,
  worker: (item: I, index: number) => Promise<O>
): Promise<Settled<O>[]> {
  const results: Settled<O>[] = new Array(items.length);
  let cursor = 0;

  async function drain(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error) {
        results[index] = { ok: false, error };
      }
    }
  }

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => drain()));
  return results;
}
