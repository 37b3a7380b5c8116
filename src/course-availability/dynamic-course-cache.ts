import { TelemetrySink } from '../common/types';

interface CacheItem<T> {
  data: T;
  timestamp: number;
  accessCount: number;
  lastAccess: number;
}

export interface CacheStats {
  totalRequests: number;
  hits: number;
  misses: number;
  hitRate: number;
  avgRetrievalTimeMs: number;
  activeItems: number;
  memoryEstimateMb: number;
  expiredCleaned: number;
}

export interface CacheTopItem {
  cacheKey: string;
  accessCount: number;
  ageMinutes: number;
  lastAccess: string;
  dataSizeBytes: number;
}

export interface DynamicCacheOptions {
  maxSize?: number;
  ttlMs?: number;
  now?: () => number;
}

type CacheOperation = 'cache_hit' | 'cache_miss' | 'cache_miss_expired' | 'cache_set';

const DEFAULT_MAX_SIZE = 1000;
const DEFAULT_TTL_MS = 30 * 60_000;
const MEMORY_SAMPLE_SIZE = 10;
const ITEM_OVERHEAD_BYTES = 200;

/**
 * In-memory LRU + TTL store for per-skill availability results.
 *
 * All public operations run one at a time through `exclusive()`. Private
 * helpers assume the caller already holds it and never take it again.
 * Values are deep-copied on the way in and on the way out.
 */
export class DynamicCourseCache<T = unknown> {
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  private readonly items = new Map<string, CacheItem<T>>();
  // insertion order is recency order: head = least recent, tail = most recent
  private readonly recency = new Set<string>();
  private queue: Promise<void> = Promise.resolve();
  private stats = DynamicCourseCache.emptyStats();

  constructor(options: DynamicCacheOptions = {}, private readonly telemetry?: TelemetrySink) {
    this.maxSize = options.maxSize && options.maxSize > 0 ? Math.floor(options.maxSize) : DEFAULT_MAX_SIZE;
    this.ttlMs = options.ttlMs && options.ttlMs > 0 ? options.ttlMs : DEFAULT_TTL_MS;
    this.now = options.now || Date.now;
  }

  get size(): number {
    return this.items.size;
  }

  async get(key: string): Promise<T | null> {
    return this.exclusive(() => {
      const started = performance.now();
      this.stats.totalRequests += 1;

      const item = this.items.get(key);
      if (!item) {
        this.stats.misses += 1;
        this.track('cache_miss', started);
        return null;
      }

      if (this.isExpired(item)) {
        this.remove(key);
        this.stats.misses += 1;
        this.track('cache_miss_expired', started);
        return null;
      }

      item.accessCount += 1;
      item.lastAccess = this.now();
      this.touch(key);

      this.stats.hits += 1;
      this.track('cache_hit', started);
      return structuredClone(item.data);
    });
  }

  async set(key: string, data: T): Promise<void> {
    return this.exclusive(() => {
      const started = performance.now();

      if (!this.items.has(key) && this.items.size >= this.maxSize) {
        this.evictLeastRecent();
      }

      const timestamp = this.now();
      this.items.set(key, {
        data: structuredClone(data),
        timestamp,
        accessCount: 1,
        lastAccess: timestamp,
      });
      this.touch(key);

      this.track('cache_set', started);
    });
  }

  async clear(): Promise<void> {
    return this.exclusive(() => {
      const cleared = this.items.size;
      this.items.clear();
      this.recency.clear();
      this.stats = DynamicCourseCache.emptyStats();
      console.log(`[DynamicCourseCache] Cleared ${cleared} items`);
    });
  }

  async cleanupExpired(): Promise<number> {
    return this.exclusive(() => {
      const expired: string[] = [];
      this.items.forEach((item, key) => {
        if (this.isExpired(item)) expired.push(key);
      });

      expired.forEach((key) => this.remove(key));
      this.stats.expiredCleaned += expired.length;

      if (expired.length) {
        console.log(`[DynamicCourseCache] Cleaned ${expired.length} expired items`);
      }
      return expired.length;
    });
  }

  async getStats(): Promise<CacheStats> {
    return this.exclusive(() => ({
      ...this.stats,
      hitRate: this.stats.totalRequests > 0 ? this.stats.hits / this.stats.totalRequests : 0,
      activeItems: this.items.size,
      memoryEstimateMb: this.estimateMemoryMb(),
    }));
  }

  async getTopItems(limit = 10): Promise<CacheTopItem[]> {
    return this.exclusive(() => {
      const now = this.now();
      return [...this.items.entries()]
        .sort((a, b) => b[1].accessCount - a[1].accessCount)
        .slice(0, Math.max(0, limit))
        .map(([cacheKey, item]) => ({
          cacheKey,
          accessCount: item.accessCount,
          ageMinutes: (now - item.timestamp) / 60_000,
          lastAccess: new Date(item.lastAccess).toISOString(),
          dataSizeBytes: serializedLength(item.data),
        }));
    });
  }

  private exclusive<R>(work: () => R): Promise<R> {
    const run = this.queue.then(work);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private isExpired(item: CacheItem<T>): boolean {
    return this.now() - item.timestamp > this.ttlMs;
  }

  private touch(key: string): void {
    this.recency.delete(key);
    this.recency.add(key);
  }

  private evictLeastRecent(): void {
    const oldest = this.recency.values().next();
    if (oldest.done) return;

    this.remove(oldest.value);
  }

  private remove(key: string): void {
    this.items.delete(key);
    this.recency.delete(key);
  }

  // Sampled so stats reads stay cheap on large caches.
  private estimateMemoryMb(): number {
    if (!this.items.size) return 0;

    let sampled = 0;
    let bytes = 0;
    for (const [key, item] of this.items) {
      if (sampled >= MEMORY_SAMPLE_SIZE) break;
      bytes += key.length + serializedLength(item.data) + ITEM_OVERHEAD_BYTES;
      sampled += 1;
    }

    const totalMb = ((bytes / sampled) * this.items.size) / (1024 * 1024);
    return Math.round(totalMb * 100) / 100;
  }

  private track(operation: CacheOperation, started: number): void {
    const durationMs = performance.now() - started;

    if (operation !== 'cache_set') {
      const lookups = this.stats.hits + this.stats.misses;
      this.stats.avgRetrievalTimeMs =
        lookups > 1 ? (this.stats.avgRetrievalTimeMs * (lookups - 1) + durationMs) / lookups : durationMs;
    }

    if (!this.telemetry) return;

    try {
      this.telemetry.record('DynamicCacheOperation', {
        operation,
        duration_ms: Math.round(durationMs * 100) / 100,
        cache_size: this.items.size,
        hit_rate: this.stats.totalRequests > 0 ? this.stats.hits / this.stats.totalRequests : 0,
      });
    } catch (error) {
      console.warn('[DynamicCourseCache] Telemetry error', error);
    }
  }

  private static emptyStats(): CacheStats {
    return {
      totalRequests: 0,
      hits: 0,
      misses: 0,
      hitRate: 0,
      avgRetrievalTimeMs: 0,
      activeItems: 0,
      memoryEstimateMb: 0,
      expiredCleaned: 0,
    };
  }
}

function serializedLength(value: unknown): number {
  return (JSON.stringify(value) ?? '').length;
}
