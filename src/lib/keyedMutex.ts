/**
 * Island Warden — src/lib/keyedMutex.ts
 * WHAT: Per-key async mutual exclusion.
 * WHY: Arrivals for one traveler and decisions on one alert must not interleave
 *      across awaits, while unrelated keys proceed in parallel. No global lock.
 * FLOWS: runExclusive(key, fn) → chain fn behind the previous holder of key → release
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  /**
   * Run fn once every earlier caller for the same key has settled.
   * Callers for a key run in call order (FIFO).
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      // Last holder cleans up so the map does not grow with every traveler ever seen
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  isLocked(key: string): boolean {
    return this.tails.has(key);
  }
}
