// ─── Condition Cache ───────────────────────────────────────────────
// Memoizes expensive condition and count results per joker instance.
// An entry is keyed by (slot, key) and remembers the fingerprint of the
// inputs and the epoch it was computed in; a lookup hits only when both
// match. The epoch bumps at every round start, so nothing is scanned to
// invalidate. One cache per run; runs never share one.

export type CachedValue = number | boolean | string;

interface CacheEntry {
  readonly fingerprint: string;
  readonly epoch: number;
  readonly value: CachedValue;
}

export interface CacheStats {
  readonly hits: number;
  readonly misses: number;
  readonly entries: number;
  readonly epoch: number;
}

export class ConditionCache {
  private readonly entries = new Map<string, CacheEntry>();
  private epochValue = 0;
  private hits = 0;
  private misses = 0;

  constructor(private readonly enabled = true) {}

  get epoch(): number {
    return this.epochValue;
  }

  /** Invalidates every entry at once. */
  bumpEpoch(): void {
    this.epochValue++;
  }

  lookup(slot: number, key: string, fingerprint: string): CachedValue | undefined {
    if (!this.enabled) {
      this.misses++;
      return undefined;
    }
    const entry = this.entries.get(`${slot}:${key}`);
    if (entry && entry.epoch === this.epochValue && entry.fingerprint === fingerprint) {
      this.hits++;
      return entry.value;
    }
    this.misses++;
    return undefined;
  }

  store(slot: number, key: string, fingerprint: string, value: CachedValue): void {
    if (!this.enabled) return;
    this.entries.set(`${slot}:${key}`, { fingerprint, epoch: this.epochValue, value });
  }

  /** Drops every entry of one instance (on sell or destroy). */
  forget(slot: number): void {
    const prefix = `${slot}:`;
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) this.entries.delete(key);
    }
  }

  stats(): CacheStats {
    return {
      hits: this.hits,
      misses: this.misses,
      entries: this.entries.size,
      epoch: this.epochValue,
    };
  }

  hitRate(): number {
    const total = this.hits + this.misses;
    return total === 0 ? 0 : this.hits / total;
  }
}
