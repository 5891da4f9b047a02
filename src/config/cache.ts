interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

/**
 * In-memory TTL cache pro načtené konfigurace.
 * Čas se bere z injektovaných hodin, aby šla expirace testovat.
 */
export class TtlCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly clock: () => number;
  private hits = 0;
  private misses = 0;

  constructor(clock: () => number = Date.now) {
    this.clock = clock;
  }

  /** Vrací cachovanou hodnotu nebo `undefined` pokud záznam expiroval či neexistuje. */
  get(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }

    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }

    this.hits++;
    return entry.value;
  }

  /** Uloží hodnotu s daným TTL v milisekundách. */
  set(key: string, value: T, ttlMs: number): void {
    this.entries.set(key, {
      value,
      expiresAt: this.clock() + ttlMs,
    });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Odstraní všechny expirované záznamy. */
  cleanup(): void {
    const now = this.clock();
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
      }
    }
  }

  /** Smaže všechny záznamy a resetuje statistiky. */
  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): { size: number; hitRate: number } {
    const total = this.hits + this.misses;
    return {
      size: this.entries.size,
      hitRate: total === 0 ? 0 : this.hits / total,
    };
  }
}
