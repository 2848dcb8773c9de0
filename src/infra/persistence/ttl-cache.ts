/**
 * TtlCache - keyed in-memory cache with per-entry expiry
 *
 * Provides:
 * - Per-entry TTL (set at write time, so different results can live for different periods)
 * - Expired entries are dropped on read and never returned
 */

interface CacheEntry<V> {
  value: V;
  createdAt: number;
  expiresAt: number;
}

export interface TtlCacheEntry<K, V> {
  key: K;
  value: V;
  createdAt: number;
  expiresAt: number;
}

export class TtlCache<K extends string, V> {
  private readonly store = new Map<K, CacheEntry<V>>();

  constructor(
    private readonly defaultTtlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: K): V | undefined {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (this.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V, ttlMs: number = this.defaultTtlMs): TtlCacheEntry<K, V> {
    const createdAt = this.now();
    const entry = { value, createdAt, expiresAt: createdAt + ttlMs };
    this.store.set(key, entry);
    return { key, ...entry };
  }

  delete(key: K): boolean {
    return this.store.delete(key);
  }

  clear(): void {
    this.store.clear();
  }

  /**
   * Fresh entries only; expired ones are pruned as a side effect
   */
  entries(): Array<TtlCacheEntry<K, V>> {
    const current = this.now();
    const result: Array<TtlCacheEntry<K, V>> = [];
    for (const [key, entry] of this.store) {
      if (current >= entry.expiresAt) {
        this.store.delete(key);
        continue;
      }
      result.push({ key, ...entry });
    }
    return result;
  }
}
