import { LRUCache } from 'lru-cache';

export interface CacheEntry<TValue> {
  readonly value: TValue;
  readonly createdAt: number;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly size: number;
}

/** LRU with a per-entry TTL; counts lookups so callers can log hit rates. */
export class MemoryCache<TValue> {
  private readonly cache: LRUCache<string, CacheEntry<TValue>>;

  private hits = 0;

  private misses = 0;

  public constructor(options: { maxEntries: number; ttlMs: number }) {
    this.cache = new LRUCache<string, CacheEntry<TValue>>({
      max: options.maxEntries,
      ttl: options.ttlMs,
    });
  }

  public get(key: string): CacheEntry<TValue> | undefined {
    const entry = this.cache.get(key);
    if (entry) {
      this.hits += 1;
    } else {
      this.misses += 1;
    }
    return entry;
  }

  public set(key: string, value: TValue): void {
    this.cache.set(key, { value, createdAt: Date.now() });
  }

  public clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  public stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }
}
