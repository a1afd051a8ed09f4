/**
 * BoundedMap - A map with TTL expiry and a hard size cap.
 *
 * Used for:
 * - The authenticator's replay-detection set
 * - Completed idempotency records
 *
 * TTL is measured from insertion and is never refreshed by reads. A live
 * entry is never evicted to make room: when the map is full of live entries,
 * set() refuses the new key and returns false.
 * All time-dependent methods take `now` so callers and tests control the clock.
 */

interface BoundedEntry<V> {
  value: V;
  insertedAt: number;
  expiresAt: number;
}

export interface BoundedMapConfig {
  /** Maximum number of entries (0 = unlimited) */
  maxSize?: number;
  /** Time-to-live in milliseconds (0 = no TTL) */
  ttlMs?: number;
  /** Cleanup interval in milliseconds (default: 60000) */
  cleanupIntervalMs?: number;
}

export interface BoundedMapStats {
  size: number;
  maxSize: number;
  ttlMs: number;
  /** Entries evicted because their TTL elapsed */
  ttlEvictions: number;
  /** Inserts refused because every entry was still live */
  rejectedWhenFull: number;
  deletions: number;
}

/**
 * @example
 * ```typescript
 * const seen = new BoundedMap<string, number>({ ttlMs: 600_000, maxSize: 100_000 });
 * if (!seen.set(messageId, Date.now())) {
 *   // full of live ids; refuse the message
 * }
 * seen.has(messageId); // true until the TTL elapses
 * ```
 */
export class BoundedMap<K, V> {
  private readonly map = new Map<K, BoundedEntry<V>>();
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly cleanupIntervalMs: number;

  private ttlEvictions = 0;
  private rejectedWhenFull = 0;
  private deletions = 0;
  private cleanupTimer: NodeJS.Timeout | null = null;

  constructor(config: BoundedMapConfig = {}) {
    this.maxSize = config.maxSize ?? 0;
    this.ttlMs = config.ttlMs ?? 0;
    this.cleanupIntervalMs = config.cleanupIntervalMs ?? 60000;
  }

  /**
   * Get a value. Returns undefined if missing or expired.
   */
  get(key: K, now = Date.now()): V | undefined {
    return this.getEntry(key, now)?.value;
  }

  /**
   * Get a value with its insertion time.
   */
  getEntry(key: K, now = Date.now()): { value: V; insertedAt: number } | undefined {
    const entry = this.map.get(key);
    if (!entry) return undefined;

    if (this.isExpired(entry, now)) {
      this.map.delete(key);
      this.ttlEvictions++;
      return undefined;
    }

    return { value: entry.value, insertedAt: entry.insertedAt };
  }

  /**
   * Insert or replace a value. Returns false, leaving the map unchanged, when
   * the key is new and every slot holds a live entry.
   *
   * @param ttlMs - lifetime of this entry (default: the map's TTL)
   */
  set(key: K, value: V, now = Date.now(), ttlMs = this.ttlMs): boolean {
    if (this.map.has(key)) {
      this.map.delete(key);
    } else if (!this.hasRoom(now)) {
      this.rejectedWhenFull++;
      return false;
    }

    this.map.set(key, { value, insertedAt: now, expiresAt: ttlMs > 0 ? now + ttlMs : Number.POSITIVE_INFINITY });
    return true;
  }

  /**
   * True if `reserved + 1` more keys fit. Expired entries are swept first.
   */
  hasRoom(now = Date.now(), reserved = 0): boolean {
    if (this.maxSize === 0) return true;
    if (this.map.size + reserved < this.maxSize) return true;
    this.evictExpired(now);
    return this.map.size + reserved < this.maxSize;
  }

  /**
   * Earliest time at which an entry expires, or undefined if none will.
   */
  nextExpiry(): number | undefined {
    let earliest = Number.POSITIVE_INFINITY;
    for (const entry of this.map.values()) {
      earliest = Math.min(earliest, entry.expiresAt);
    }
    return Number.isFinite(earliest) ? earliest : undefined;
  }

  has(key: K, now = Date.now()): boolean {
    return this.getEntry(key, now) !== undefined;
  }

  delete(key: K): boolean {
    const deleted = this.map.delete(key);
    if (deleted) {
      this.deletions++;
    }
    return deleted;
  }

  clear(): void {
    this.map.clear();
  }

  /**
   * Current size (includes expired entries until they are swept).
   */
  get size(): number {
    return this.map.size;
  }

  getStats(): BoundedMapStats {
    return {
      size: this.map.size,
      maxSize: this.maxSize,
      ttlMs: this.ttlMs,
      ttlEvictions: this.ttlEvictions,
      rejectedWhenFull: this.rejectedWhenFull,
      deletions: this.deletions,
    };
  }

  /**
   * Remove expired entries. Returns the count removed.
   */
  cleanup(now = Date.now()): number {
    return this.evictExpired(now);
  }

  startPeriodicCleanup(): void {
    if (this.cleanupTimer) return;

    this.cleanupTimer = setInterval(() => {
      this.cleanup();
    }, this.cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  stopPeriodicCleanup(): void {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
  }

  // ==========================================================================
  // PRIVATE
  // ==========================================================================

  private isExpired(entry: BoundedEntry<V>, now: number): boolean {
    return now >= entry.expiresAt;
  }

  private evictExpired(now: number): number {
    let evicted = 0;
    for (const [key, entry] of this.map) {
      if (this.isExpired(entry, now)) {
        this.map.delete(key);
        evicted++;
      }
    }

    this.ttlEvictions += evicted;
    return evicted;
  }
}
