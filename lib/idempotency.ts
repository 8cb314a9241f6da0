/**
 * Update de-duplication: a tiny in-memory LRU set.
 *
 * Telegram redelivers a webhook update it thinks failed, and a polling
 * restart can replay the last batch. Remembering recent update_ids is enough
 * to answer each one once.
 *
 *     const seen = new LRUSet<number>(1000);
 *     if (!seen.remember(update.update_id)) return; // duplicate
 */

/**
 * A minimal LRU Set implementation using Map to preserve insertion order.
 * - add() refreshes recency if key already exists
 * - when size exceeds capacity, evicts the oldest key
 */
export class LRUSet<T> {
  private readonly max: number;
  private readonly map = new Map<T, true>();

  constructor(max = 1000) {
    if (max <= 0 || !Number.isFinite(max)) {
      throw new Error("LRUSet: max must be a positive finite number");
    }
    this.max = max;
  }

  has(key: T): boolean {
    return this.map.has(key);
  }

  add(key: T): void {
    if (this.map.has(key)) {
      // Refresh recency by re-inserting
      this.map.delete(key);
    }
    this.map.set(key, true);
    if (this.map.size > this.max) {
      const oldest = this.map.keys().next();
      if (!oldest.done) this.map.delete(oldest.value);
    }
  }

  /**
   * Returns true the first time a key is seen, false while it is remembered.
   */
  remember(key: T): boolean {
    if (this.map.has(key)) return false;
    this.add(key);
    return true;
  }

  get size(): number {
    return this.map.size;
  }
}
