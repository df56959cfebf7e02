/**
 * Bounded least-recently-used cache in front of a slow async loader.
 *
 * Storage is a fixed array of `capacity` slots. Every successful get()
 * stamps the touched slot with the next value of a monotonic counter; a miss
 * replaces the slot with the smallest stamp (lowest slot index on ties).
 * The loader runs at most once per resident key, and a failed load leaves
 * every slot untouched.
 *
 * Optional onEvict callback for resource cleanup of replaced values.
 */

export type CacheLoader<V> = (key: number) => Promise<V>;

interface CacheEntry<V> {
  key: number;
  value: V;
}

export class LRUCache<V> {
  private readonly entries: (CacheEntry<V> | null)[];
  private readonly useRanks: number[];
  private readonly loader: CacheLoader<V>;
  private readonly onEvict?: (key: number, value: V) => void;
  private readonly pending = new Map<number, Promise<V>>();
  private useCounter = 0;
  private loadCount = 0;

  constructor(loader: CacheLoader<V>, capacity: number = 1, onEvict?: (key: number, value: V) => void) {
    const size = Number.isFinite(capacity) ? Math.max(1, Math.floor(capacity)) : 1;
    this.loader = loader;
    this.onEvict = onEvict;
    this.entries = new Array<CacheEntry<V> | null>(size).fill(null);
    this.useRanks = new Array<number>(size).fill(0);
  }

  async get(key: number): Promise<V> {
    const hitSlot = this.findSlot(key);
    const hit = hitSlot === -1 ? null : this.entries[hitSlot];
    if (hit) {
      this.useRanks[hitSlot] = ++this.useCounter;
      return hit.value;
    }

    const inFlight = this.pending.get(key);
    if (inFlight) {
      await inFlight;
      return this.get(key);
    }

    const load = this.loader(key);
    this.pending.set(key, load);
    let value: V;
    try {
      value = await load;
    } finally {
      this.pending.delete(key);
    }
    this.loadCount++;

    // The victim is chosen only once the load has succeeded
    const slot = this.leastRecentlyUsedSlot();
    const previous = this.entries[slot];
    this.entries[slot] = { key, value };
    this.useRanks[slot] = ++this.useCounter;
    if (previous) {
      this.onEvict?.(previous.key, previous.value);
    }
    return value;
  }

  /**
   * Return the cached value WITHOUT refreshing its recency and without
   * invoking the loader on a miss.
   */
  peek(key: number): V | undefined {
    const slot = this.findSlot(key);
    return slot === -1 ? undefined : this.entries[slot]?.value;
  }

  has(key: number): boolean {
    return this.findSlot(key) !== -1;
  }

  /** Drop every cached value, reporting each one to onEvict. */
  clear(): void {
    for (let i = 0; i < this.entries.length; i++) {
      const entry = this.entries[i];
      this.entries[i] = null;
      this.useRanks[i] = 0;
      if (entry) {
        this.onEvict?.(entry.key, entry.value);
      }
    }
  }

  /** Resident keys, most recently used first. */
  keys(): number[] {
    const resident: { key: number; rank: number }[] = [];
    this.entries.forEach((entry, slot) => {
      if (entry) resident.push({ key: entry.key, rank: this.useRanks[slot] ?? 0 });
    });
    return resident.sort((a, b) => b.rank - a.rank).map(item => item.key);
  }

  get size(): number {
    return this.entries.reduce((count, entry) => (entry ? count + 1 : count), 0);
  }

  get capacity(): number {
    return this.entries.length;
  }

  /** Number of loader calls that completed since construction. */
  get loads(): number {
    return this.loadCount;
  }

  private findSlot(key: number): number {
    return this.entries.findIndex(entry => entry?.key === key);
  }

  private leastRecentlyUsedSlot(): number {
    let oldest = 0;
    for (let slot = 1; slot < this.useRanks.length; slot++) {
      if ((this.useRanks[slot] ?? 0) < (this.useRanks[oldest] ?? 0)) {
        oldest = slot;
      }
    }
    return oldest;
  }
}
