/** Bounded memo: once full, the earliest inserted entry goes first. */
export class FifoCache<K, V> {
  private readonly entries = new Map<K, V>();

  constructor(private readonly volume: number) {}

  get(key: K) {
    return this.entries.get(key);
  }

  has(key: K) {
    return this.entries.has(key);
  }

  set(key: K, value: V) {
    if (!this.entries.has(key) && this.entries.size >= this.volume) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, value);
  }

  get size() {
    return this.entries.size;
  }

  clear() {
    this.entries.clear();
  }
}
