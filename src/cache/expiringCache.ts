export type CacheEntry<V> = {
  value: V;
  expiresAt: number;
};

/**
 * Key/value store with one TTL per instance. Expired entries read as absent but stay in the
 * map until the same key is written again; nothing sweeps them, so the map grows with the
 * number of distinct keys ever written.
 *
 * `get` and `set` are synchronous, so a read or write always completes before another task
 * touches the map.
 */
export class ExpiringCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry || this.now() >= entry.expiresAt) return undefined;
    return entry.value;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  /** Entries held in storage, expired ones included. */
  get storedSize(): number {
    return this.entries.size;
  }
}
