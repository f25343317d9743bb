import QuickLRU from "quick-lru";

export interface LRUCacheOptions<T> {
  /** Upper bound on stored entries, least recently used is dropped first */
  maxSize: number;
  /** Entry lifetime in milliseconds, omitted or 0 keeps entries until evicted */
  ttlMs?: number;
  onEviction?: (key: string, value: T) => void;
}

/**
 * Process-local LRU cache on top of QuickLRU.
 *
 * Concurrent `getOrSet` calls for one key share a single computation.
 */
export class LRUCacheManager<T> {
  private readonly store: QuickLRU<string, T>;
  private readonly inFlight = new Map<string, Promise<T>>();

  constructor(options: LRUCacheOptions<T>) {
    this.store = new QuickLRU<string, T>({
      maxSize: options.maxSize,
      maxAge: options.ttlMs ? options.ttlMs : undefined,
      onEviction: options.onEviction,
    });
  }

  get(key: string): T | undefined {
    return this.store.get(key);
  }

  set(key: string, value: T): void {
    this.store.set(key, value);
  }

  /**
   * Cached value for `key`, computing and storing it on a miss.
   * Rejections are handed to every waiting caller and never stored.
   */
  async getOrSet(key: string, compute: () => Promise<T>): Promise<T> {
    const cached = this.store.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      return pending;
    }

    const computation = compute()
      .then((value) => {
        this.store.set(key, value);
        return value;
      })
      .finally(() => {
        this.inFlight.delete(key);
      });
    this.inFlight.set(key, computation);
    return computation;
  }

  delete(key: string): boolean {
    return this.store.delete(key);
  }

  get size(): number {
    return this.store.size;
  }

  clear(): void {
    this.store.clear();
    this.inFlight.clear();
  }
}
