/**
 * In-memory TTL cache owned by a single provider instance.
 * Entries keep their insertion time; the TTL is given by the caller on read.
 */

interface CacheEntry<T> {
  value: T;
  storedAt: number;
}

export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  get(key: string, ttlSeconds: number): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.now() - entry.storedAt > ttlSeconds * 1000) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    this.entries.set(key, { value, storedAt: this.now() });
  }

  /**
   * Returns the cached value or runs the loader; null results are not stored.
   */
  async getOrLoad(key: string, ttlSeconds: number, loader: () => Promise<T | null>): Promise<T | null> {
    const cached = this.get(key, ttlSeconds);
    if (cached !== undefined) return cached;

    const value = await loader();
    if (value !== null) {
      this.set(key, value);
    }
    return value;
  }

  delete(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
