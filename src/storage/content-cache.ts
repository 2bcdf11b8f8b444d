import type { CacheStats } from "../types/store.js";

export interface ContentCacheOptions {
  capacity: number;
  ttlMs: number;
}

interface CacheEntry {
  content: string;
  storedAt: number;
  lastAccessAt: number;
}

/**
 * Text content keyed by absolute path. Capacity and TTL are independent:
 * an entry leaves when it is the least recently accessed one at overflow,
 * or once it is `ttlMs` old, whichever comes first.
 */
export class ContentCache {
  readonly capacity: number;
  readonly ttlMs: number;
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(options: ContentCacheOptions) {
    this.capacity = options.capacity;
    this.ttlMs = options.ttlMs;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): string | undefined {
    const entry = this.entries.get(key);
    const now = Date.now();
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (this.isExpired(entry, now)) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    entry.lastAccessAt = now;
    this.hits++;
    return entry.content;
  }

  /** Presence check that neither refreshes the entry nor counts as a lookup. */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry, Date.now());
  }

  put(key: string, content: string): void {
    if (!this.entries.has(key) && this.entries.size >= this.capacity) {
      this.evictLeastRecentlyAccessed();
    }
    const now = Date.now();
    this.entries.set(key, { content, storedAt: now, lastAccessAt: now });
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.storedAt >= this.ttlMs;
  }

  private evictLeastRecentlyAccessed(): void {
    let oldestKey: string | undefined;
    let oldestAccess = Infinity;
    for (const [key, entry] of this.entries) {
      if (entry.lastAccessAt < oldestAccess) {
        oldestAccess = entry.lastAccessAt;
        oldestKey = key;
      }
    }
    if (oldestKey !== undefined) this.entries.delete(oldestKey);
  }
}
