export interface CacheOptions {
  /** Maximum entries; 0 or undefined keeps the cache unbounded */
  capacity?: number;
}

/**
 * Keyed cache of loaded values. Unbounded unless a capacity is given, in
 * which case the least recently used entry is evicted. Concurrent loads of a
 * missing key share a single loader call; rejected loads are not stored.
 */
export class DatasetCache<T> {
  private entries: Map<string, T>;
  private inFlight: Map<string, Promise<T>>;
  private capacity: number;

  constructor(options: CacheOptions = {}) {
    this.entries = new Map();
    this.inFlight = new Map();
    this.capacity = options.capacity ?? 0;
  }

  public static key(name: string, subset?: string | null): string {
    return `${name}::${subset || ''}`;
  }

  public get size(): number {
    return this.entries.size;
  }

  public has(key: string): boolean {
    return this.entries.has(key);
  }

  public get(key: string): T | undefined {
    const value = this.entries.get(key);
    if (value !== undefined) {
      // Re-insert to mark as most recently used
      this.entries.delete(key);
      this.entries.set(key, value);
    }
    return value;
  }

  public set(key: string, value: T): void {
    this.entries.delete(key);
    this.entries.set(key, value);

    if (this.capacity > 0) {
      while (this.entries.size > this.capacity) {
        const oldest = this.entries.keys().next();
        if (oldest.done) break;
        this.entries.delete(oldest.value);
      }
    }
  }

  public keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /** Returns the cached value, or runs the loader once per key and stores its result. */
  public async getOrLoad(key: string, loader: () => Promise<T>): Promise<{ value: T; cached: boolean }> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return { value: cached, cached: true };
    }

    let pending = this.inFlight.get(key);
    if (!pending) {
      pending = loader()
        .then((value) => {
          this.set(key, value);
          return value;
        })
        .finally(() => {
          this.inFlight.delete(key);
        });
      this.inFlight.set(key, pending);
    }

    const value = await pending;
    return { value, cached: false };
  }
}
