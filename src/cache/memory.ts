/**
 * In-memory TTL cache for the dataset-level aggregates
 * Keys are grouped per dataset so that a write only drops that dataset's entries.
 */

import { CACHE_CONSTANTS } from "../config/constants.ts";

interface CacheEntry<T> {
  value: T;
  expiresAt: number;
}

export interface MemoryCacheStats {
  hits: number;
  misses: number;
  size: number;
  hitRate: number;
}

/**
 * Prefix shared by every key of one dataset
 */
export function datasetKeyPrefix(dataset: string): string {
  return `${CACHE_CONSTANTS.AGGREGATE_CACHE_KEY}:${dataset}:`;
}

export function datasetKey(dataset: string, endpoint: string): string {
  return `${datasetKeyPrefix(dataset)}${endpoint}`;
}

export class MemoryCache {
  private readonly entries = new Map<string, CacheEntry<unknown>>();
  private readonly defaultTtlMs: number;
  private readonly enabled: boolean;
  private hits = 0;
  private misses = 0;
  private sweepTimer: ReturnType<typeof setInterval> | null = null;

  constructor(defaultTtlMs: number = CACHE_CONSTANTS.DEFAULT_TTL_MS, enabled: boolean = CACHE_CONSTANTS.ENABLE_CACHE) {
    this.defaultTtlMs = defaultTtlMs;
    this.enabled = enabled;
  }

  private live(key: string, now: number = Date.now()): CacheEntry<unknown> | undefined {
    const entry = this.entries.get(key);
    if (entry && now > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  /**
   * Returns the cached value, or computes, stores and returns it. A computation that throws stores nothing.
   */
  getOrCompute<T>(key: string, compute: () => T, ttlMs?: number): T {
    const entry = this.live(key);
    if (entry) {
      this.hits++;
      // Entries under a key are only ever written by getOrCompute with the same T
      return entry.value as T;
    }

    this.misses++;
    const value = compute();
    if (this.enabled) {
      this.set(key, value, ttlMs);
    }
    return value;
  }

  set<T>(key: string, value: T, ttlMs: number = this.defaultTtlMs): void {
    this.entries.set(key, { value, expiresAt: Date.now() + ttlMs });
  }

  has(key: string): boolean {
    return this.live(key) !== undefined;
  }

  invalidate(key: string): void {
    this.entries.delete(key);
  }

  /**
   * Drops every key starting with prefix; returns how many were dropped
   */
  invalidatePrefix(prefix: string): number {
    let dropped = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        dropped++;
      }
    }
    return dropped;
  }

  invalidateDataset(dataset: string): number {
    return this.invalidatePrefix(datasetKeyPrefix(dataset));
  }

  invalidateAll(): void {
    this.entries.clear();
  }

  getStats(): MemoryCacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      size: this.entries.size,
      hitRate: total > 0 ? (this.hits / total) * 100 : 0,
    };
  }

  resetStats(): void {
    this.hits = 0;
    this.misses = 0;
  }

  sweep(): void {
    const now = Date.now();
    for (const key of [...this.entries.keys()]) {
      this.live(key, now);
    }
  }

  startSweeping(intervalMs: number = CACHE_CONSTANTS.CLEANUP_INTERVAL_MS): void {
    if (this.sweepTimer) return;
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweeping(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }
}

export const memoryCache = new MemoryCache();
