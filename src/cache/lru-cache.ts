import type { ResultCache } from '../types.js';

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = { now: () => new Date() };

export interface LruCacheOptions {
  /** Entries kept before the least recently used one is evicted. Defaults to 100. */
  maxSize?: number;
  clock?: Clock;
}

interface Entry {
  body: string;
  expiresAt: number;
}

/**
 * In-process cache with per-entry TTL and least-recently-used eviction.
 * An entry stored with a TTL of 0 is never served.
 */
export class LruCache implements ResultCache {
  private readonly entries = new Map<string, Entry>();
  private readonly maxSize: number;
  private readonly clock: Clock;

  constructor(options: LruCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 100;
    this.clock = options.clock ?? systemClock;
    if (!Number.isInteger(this.maxSize) || this.maxSize < 1) {
      throw new RangeError(`maxSize must be a positive integer, got ${this.maxSize}`);
    }
  }

  get size(): number {
    return this.entries.size;
  }

  async get(key: string): Promise<string | undefined> {
    const entry = this.entries.get(key);
    if (entry === undefined) return undefined;
    if (entry.expiresAt <= this.clock.now().getTime()) {
      this.entries.delete(key);
      return undefined;
    }
    // Map iteration order doubles as recency order
    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.body;
  }

  async set(key: string, body: string, ttlSeconds: number): Promise<void> {
    this.entries.delete(key);
    this.entries.set(key, { body, expiresAt: this.clock.now().getTime() + ttlSeconds * 1000 });
    while (this.entries.size > this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done === true) break;
      this.entries.delete(oldest.value);
    }
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}
