/**
 * Bounded least-recently-used map for folded stream states.
 *
 * Purely an optimisation: a miss only means folding from further back.
 */
export class FoldCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(private readonly maxSize: number) {
    if (!Number.isInteger(maxSize) || maxSize < 0) {
      throw new Error('FoldCache maxSize must be a non-negative integer');
    }
  }

  get(key: string): V | undefined {
    const value = this.entries.get(key);
    if (value === undefined) return undefined;

    // Re-insert to mark as most recently used
    this.entries.delete(key);
    this.entries.set(key, value);
    return value;
  }

  set(key: string, value: V): void {
    if (this.maxSize === 0) return;

    this.entries.delete(key);
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done !== true) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}
