/**
 * Minimal TTL cache capability. Implementations may be synchronous or async;
 * callers always await.
 */
export interface CacheStore<T> {
  get(key: string): Promise<T | undefined> | T | undefined;
  set(key: string, value: T, ttlSeconds?: number): Promise<void> | void;
  delete(key: string): Promise<void> | void;
  clear(): Promise<void> | void;
}

interface InternalRecord<T> {
  value: T;
  expiresAt?: number;
}

export class InMemoryCacheStore<T> implements CacheStore<T> {
  private readonly store = new Map<string, InternalRecord<T>>();

  constructor(private readonly now: () => number = Date.now) {}

  async get(key: string): Promise<T | undefined> {
    const entry = this.store.get(key);
    if (!entry) {
      return undefined;
    }
    if (entry.expiresAt !== undefined && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  async set(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds ? this.now() + ttlSeconds * 1000 : undefined;
    this.store.set(key, { value, expiresAt });
  }

  async delete(key: string): Promise<void> {
    this.store.delete(key);
  }

  async clear(): Promise<void> {
    this.store.clear();
  }

  get size(): number {
    return this.store.size;
  }
}
