interface SimpleCacheItem<T> {
  expirationTimestamp: number; // in ms
  cachedItem: T;
}

const allCaches = new Set<SimpleCacheService<unknown>>();

/**
 * Response cache of the api, one instance per response type. Every instance is
 * cleared when the ledger commits, so an entry never outlives the state it was
 * computed from.
 */
export default class SimpleCacheService<T> {
  private readonly cache = new Map<string, SimpleCacheItem<T>>();

  constructor() {
    allCaches.add(this);
  }

  Get(key: string): T | null {
    const item = this.cache.get(key);
    if (item && item.expirationTimestamp > Date.now()) {
      return item.cachedItem;
    } else {
      return null;
    }
  }

  Set(key: string, item: T, cacheDurationMs: number) {
    this.cache.set(key, {
      cachedItem: item,
      expirationTimestamp: Date.now() + cacheDurationMs
    });
  }

  // get the data from cache, using the function in parameter to get the data if not in cache
  GetAndCache(key: string, fct: () => T, cacheDurationMs: number): T {
    let cached = this.Get(key);
    if (cached === null) {
      cached = fct();
      this.Set(key, cached, cacheDurationMs);
    }
    return cached;
  }

  Invalidate(key: string) {
    this.cache.delete(key);
  }

  Clear() {
    this.cache.clear();
  }

  static ClearAll() {
    for (const cache of allCaches) {
      cache.Clear();
    }
  }
}
