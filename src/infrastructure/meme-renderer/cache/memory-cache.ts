import { LRUCache } from 'lru-cache';

export interface CacheEntry<TValue> {
  readonly value: TValue;
  readonly createdAt: number;
}

export class MemoryCache<TValue> {
  private readonly cache: LRUCache<string, CacheEntry<TValue>>;

  public constructor(options: { maxEntries: number; ttlMs?: number }) {
    this.cache = new LRUCache<string, CacheEntry<TValue>>({
      max: options.maxEntries,
      ...(options.ttlMs === undefined ? {} : { ttl: options.ttlMs }),
    });
  }

  public get(key: string): CacheEntry<TValue> | undefined {
    return this.cache.get(key);
  }

  public set(key: string, value: TValue): void {
    this.cache.set(key, { value, createdAt: Date.now() });
  }

  public getOrCompute(key: string, compute: () => TValue): TValue {
    const cached = this.cache.get(key);
    if (cached) {
      return cached.value;
    }

    const value = compute();
    this.set(key, value);
    return value;
  }

  public get size(): number {
    return this.cache.size;
  }
}
