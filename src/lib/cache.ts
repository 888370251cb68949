type Entry<V> = { expiresAt: number; value: Promise<V> };

/**
 * Expiring key → value memo. Loads are shared while in flight; a rejected load
 * is forgotten so the next call goes back to the source. Expired entries are
 * dropped whenever a new one is stored.
 */
export class TtlCache<V> {
  private readonly entries = new Map<string, Entry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get size(): number {
    return this.entries.size;
  }

  getOrLoad(key: string, load: () => Promise<V>): Promise<V> {
    const t = this.now();
    const hit = this.entries.get(key);
    if (hit && hit.expiresAt > t) return hit.value;

    this.evictExpired(t);
    const pending = load().catch((err: unknown) => {
      if (this.entries.get(key)?.value === pending) this.entries.delete(key);
      throw err;
    });
    this.entries.set(key, { expiresAt: t + this.ttlMs, value: pending });
    return pending;
  }

  private evictExpired(t: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt <= t) this.entries.delete(key);
    }
  }
}
