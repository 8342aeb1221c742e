export interface MemoryCacheOptions {
  ttlMs: number;
  maxEntries: number;
}

interface Slot<T> {
  value: T;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * In-process map with a per-entry expiry timer and an LRU size bound.
 * Timers are unref'd so a pending expiry never keeps the process alive.
 */
export class MemoryCache<T> {
  private readonly slots = new Map<string, Slot<T>>();

  constructor(private readonly options: MemoryCacheOptions) {}

  get size(): number {
    return this.slots.size;
  }

  get(key: string): T | undefined {
    const slot = this.slots.get(key);
    if (!slot) return undefined;
    // Re-insert to mark as most recently used
    this.slots.delete(key);
    this.slots.set(key, slot);
    return slot.value;
  }

  has(key: string): boolean {
    return this.slots.has(key);
  }

  set(key: string, value: T): void {
    this.delete(key);

    while (this.slots.size >= this.options.maxEntries) {
      const oldest = this.slots.keys().next();
      if (oldest.done) break;
      this.delete(oldest.value);
    }

    const timer = setTimeout(() => {
      this.slots.delete(key);
    }, this.options.ttlMs);
    timer.unref();
    this.slots.set(key, { value, timer });
  }

  delete(key: string): boolean {
    const slot = this.slots.get(key);
    if (!slot) return false;
    clearTimeout(slot.timer);
    return this.slots.delete(key);
  }

  /** Remove every entry matching `predicate`; returns how many went. */
  deleteWhere(predicate: (value: T, key: string) => boolean): number {
    let removed = 0;
    for (const [key, slot] of [...this.slots]) {
      if (predicate(slot.value, key)) {
        this.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    for (const slot of this.slots.values()) {
      clearTimeout(slot.timer);
    }
    this.slots.clear();
  }
}
