/**
 * In-memory TTL cache.
 *
 * A TTL of 0 disables the cache: `get` always misses and `set` stores nothing.
 * Expired entries are dropped when read, and swept as a whole on every `set`,
 * so no timer is needed to keep the map bounded.
 */
export class TtlCache<T> {
  private readonly store = new Map<string, { value: T; expiresAt: number }>();

  constructor(private readonly ttlMs: number) {}

  get enabled(): boolean {
    return this.ttlMs > 0;
  }

  /** Returns the value while it is fresh, undefined otherwise. */
  get(key: string): T | undefined {
    if (!this.enabled) return undefined;
    const entry = this.store.get(key);
    if (!entry) return undefined;
    if (Date.now() >= entry.expiresAt) {
      this.store.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: T): void {
    if (!this.enabled) return;
    const now = Date.now();
    for (const [k, entry] of this.store) {
      if (now >= entry.expiresAt) {
        this.store.delete(k);
      }
    }
    this.store.set(key, { value, expiresAt: now + this.ttlMs });
  }

  /** Remove every entry whose key starts with `prefix`. Returns how many were removed. */
  invalidatePrefix(prefix: string): number {
    let removed = 0;
    for (const key of this.store.keys()) {
      if (key.startsWith(prefix)) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.store.clear();
  }

  /** Number of stored entries, expired ones included until they are swept. */
  get size(): number {
    return this.store.size;
  }
}
