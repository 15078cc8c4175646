/**
 * In-memory read-through cache with per-entry expiry.
 *
 * Entries are soft-expired: an expired entry is treated as a miss and
 * replaced on the next successful load. Failed loads (loader returns null or
 * throws) are not cached.
 */

import { formatErrorMessage } from "../net-errors.js";

interface Entry<V> {
  value: V;
  expiresAt: number;
}

export class TtlCache<K, V> {
  private readonly entries = new Map<K, Entry<V>>();
  private readonly inflight = new Map<K, Promise<V | null>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now,
  ) {}

  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: K, value: V, ttlMs = this.ttlMs): void {
    this.entries.set(key, { value, expiresAt: this.now() + ttlMs });
  }

  delete(key: K): void {
    this.entries.delete(key);
  }

  /**
   * Return the cached value or load it. Concurrent callers for the same key
   * share one load. A loader failure resolves to null.
   */
  async getOrLoad(key: K, loader: () => Promise<V | null>): Promise<V | null> {
    const cached = this.get(key);
    if (cached !== undefined) return cached;

    const pending = this.inflight.get(key);
    if (pending) return pending;

    const load = (async (): Promise<V | null> => {
      try {
        const value = await loader();
        if (value !== null) this.set(key, value);
        return value;
      } catch (err) {
        console.warn("[cache] Loader failed:", formatErrorMessage(err));
        return null;
      } finally {
        this.inflight.delete(key);
      }
    })();
    this.inflight.set(key, load);
    return load;
  }

  get size(): number {
    return this.entries.size;
  }
}
