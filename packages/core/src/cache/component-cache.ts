import { Logger, Telemetry, type EngineLogger } from "sdui-kernel";
import { parseCacheOptions, type CacheOptionsInput } from "../config";

interface CacheEntry<V> {
  view: V;
  createdAt: number;
  lastAccessedAt: number;
}

export interface CacheEntryInfo {
  signature: string;
  createdAt: number;
  lastAccessedAt: number;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}

export interface ComponentCacheOptions extends CacheOptionsInput {
  /** Clock in milliseconds (default: `Date.now`) */
  now?: () => number;
  logger?: EngineLogger;
}

/**
 * Memoises rendered subtrees by signature.
 *
 * Bounded by `capacity`: inserting into a full cache evicts the entry accessed
 * least recently. Entries also expire `maxAgeMs` after creation; an expired
 * entry is a miss on lookup, and `sweepExpired()` drops them in bulk. The
 * engine owns no timer: the host calls `sweepExpired()` periodically.
 *
 * @example
 * ```typescript
 * const cache = new ComponentCache<View>({ capacity: 200 });
 * const timer = setInterval(() => cache.sweepExpired(), DEFAULT_CACHE_SWEEP_INTERVAL_MS);
 * ```
 */
export class ComponentCache<V> {
  readonly capacity: number;
  readonly maxAgeMs: number;

  // Map iteration order is access order: least recent first.
  private entries = new Map<string, CacheEntry<V>>();
  private readonly now: () => number;
  private readonly logger: EngineLogger | undefined;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(options: ComponentCacheOptions = {}) {
    const { now, logger, ...limits } = options;
    const parsed = parseCacheOptions(limits);
    this.capacity = parsed.capacity;
    this.maxAgeMs = parsed.maxAgeMs;
    this.now = now ?? Date.now;
    this.logger = logger;
  }

  private get log(): EngineLogger {
    return this.logger ?? Logger.for("ComponentCache");
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Look up a view. A hit marks the entry most recently used.
   */
  get(signature: string): V | undefined {
    const entry = this.entries.get(signature);
    const now = this.now();
    if (!entry || this.isExpired(entry, now)) {
      if (entry) {
        this.entries.delete(signature);
      }
      this.misses++;
      Telemetry.getCounter("sdui.cache.misses", "count", "Component cache misses").add(1);
      return undefined;
    }
    entry.lastAccessedAt = now;
    this.entries.delete(signature);
    this.entries.set(signature, entry);
    this.hits++;
    Telemetry.getCounter("sdui.cache.hits", "count", "Component cache hits").add(1);
    return entry.view;
  }

  /**
   * Presence check without touching recency or counters.
   */
  has(signature: string): boolean {
    const entry = this.entries.get(signature);
    return entry !== undefined && !this.isExpired(entry, this.now());
  }

  set(signature: string, view: V): void {
    const now = this.now();
    if (this.entries.has(signature)) {
      this.entries.delete(signature);
    } else if (this.entries.size >= this.capacity) {
      this.evictLeastRecentlyUsed();
    }
    this.entries.set(signature, { view, createdAt: now, lastAccessedAt: now });
  }

  /**
   * Drop entries older than `maxAgeMs`. Returns how many were dropped.
   */
  sweepExpired(): number {
    const now = this.now();
    return this.expire((entry) => now - entry.createdAt >= this.maxAgeMs);
  }

  /**
   * Drop every entry matching `predicate`. Returns how many were dropped.
   */
  expire(predicate: (entry: CacheEntryInfo) => boolean): number {
    let dropped = 0;
    for (const [signature, entry] of this.entries) {
      if (
        predicate({ signature, createdAt: entry.createdAt, lastAccessedAt: entry.lastAccessedAt })
      ) {
        this.entries.delete(signature);
        dropped++;
      }
    }
    if (dropped > 0) {
      this.log.debug({ dropped, size: this.entries.size }, "Expired cache entries");
    }
    return dropped;
  }

  /**
   * Drop everything. Counters are kept; safe to call repeatedly.
   */
  clearCache(): void {
    this.entries.clear();
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
    this.evictions = 0;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
    };
  }

  private isExpired(entry: CacheEntry<V>, now: number): boolean {
    return now - entry.createdAt >= this.maxAgeMs;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (oldest.done) {
      return;
    }
    this.entries.delete(oldest.value);
    this.evictions++;
  }
}
