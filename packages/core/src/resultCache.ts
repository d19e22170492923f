/**
 * ResultCache - TTL-keyed in-memory store for remote call results
 */

import type { CacheEntry, CacheReservation, CacheStats, NowFn } from './types.js';

export interface ResultCacheOptions {
  /** Time source override used in tests. Defaults to `Date.now`. */
  now?: NowFn;
  /** Optional LRU bound. Unset means TTL-only. */
  maxEntries?: number;
}

const defaultNow: NowFn = () => Date.now();

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly inflight = new Map<string, Promise<unknown>>();
  /** Outstanding write claims per key; only present while a computation runs */
  private readonly claims = new Map<string, Set<{ revoked: boolean }>>();
  private readonly now: NowFn;
  private readonly maxEntries: number | undefined;
  private hits = 0;
  private misses = 0;

  constructor(options: ResultCacheOptions = {}) {
    this.now = options.now ?? defaultNow;
    const max = options.maxEntries;
    this.maxEntries = typeof max === 'number' && Number.isFinite(max) && max > 0 ? max : undefined;
  }

  /**
   * Return the stored value if its entry is live; stale entries are purged
   */
  get<T = unknown>(key: string): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (!this.isLive(entry)) {
      this.entries.delete(key);
      this.misses++;
      return undefined;
    }
    if (this.maxEntries !== undefined) {
      // Refresh recency
      this.entries.delete(key);
      this.entries.set(key, entry);
    }
    this.hits++;
    return entry.value as T;
  }

  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && this.isLive(entry);
  }

  /**
   * Insert or replace an entry; overwriting resets `createdAt`
   */
  put<T>(key: string, value: T, ttlMs: number): void {
    if (!(ttlMs > 0)) {
      throw new Error(`ttlMs must be positive, got ${ttlMs}`);
    }
    const entry: CacheEntry<T> = Object.freeze({ key, value, createdAt: this.now(), ttlMs });
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.evictOverflow();
  }

  invalidate(key: string): boolean {
    this.revoke(key);
    this.inflight.delete(key);
    return this.entries.delete(key);
  }

  /**
   * Drop every entry of one operation (keys are `<operation>:<hash>`)
   */
  invalidatePrefix(operation: string): number {
    const prefix = `${operation}:`;
    const keys = new Set<string>();
    for (const key of this.entries.keys()) {
      if (key.startsWith(prefix)) keys.add(key);
    }
    for (const key of this.inflight.keys()) {
      if (key.startsWith(prefix)) keys.add(key);
    }
    for (const key of this.claims.keys()) {
      if (key.startsWith(prefix)) keys.add(key);
    }
    let removed = 0;
    for (const key of keys) {
      if (this.invalidate(key)) removed++;
    }
    return removed;
  }

  invalidateAll(): void {
    for (const key of [...this.claims.keys()]) {
      this.revoke(key);
    }
    this.inflight.clear();
    this.entries.clear();
  }

  /**
   * Remove all expired entries
   * @returns number of removed entries
   */
  prune(): number {
    let removed = 0;
    for (const [key, entry] of this.entries) {
      if (!this.isLive(entry)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Claim the right to store a result under `key` once a computation finishes.
   * Invalidating the key before `commit()` revokes the claim, so a result
   * computed from stale data is dropped instead of written back.
   */
  reserve(key: string): CacheReservation {
    const claim = { revoked: false };
    let claims = this.claims.get(key);
    if (!claims) {
      claims = new Set();
      this.claims.set(key, claims);
    }
    claims.add(claim);

    const release = (): void => {
      const current = this.claims.get(key);
      if (current?.delete(claim) && current.size === 0) {
        this.claims.delete(key);
      }
    };
    return {
      commit: (value, ttlMs) => {
        release();
        if (claim.revoked) return false;
        this.put(key, value, ttlMs);
        return true;
      },
      release,
    };
  }

  /**
   * Run `task` at most once concurrently per key; concurrent callers share its promise
   */
  singleFlight<T>(key: string, task: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) {
      return existing as Promise<T>;
    }
    const flight = task().finally(() => {
      if (this.inflight.get(key) === flight) {
        this.inflight.delete(key);
      }
    });
    this.inflight.set(key, flight);
    return flight;
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses, pendingWrites: this.pendingWrites() };
  }

  private pendingWrites(): number {
    let count = 0;
    for (const claims of this.claims.values()) count += claims.size;
    return count;
  }

  private revoke(key: string): void {
    const claims = this.claims.get(key);
    if (!claims) return;
    for (const claim of claims) claim.revoked = true;
    this.claims.delete(key);
  }

  private isLive(entry: CacheEntry): boolean {
    return this.now() < entry.createdAt + entry.ttlMs;
  }

  private evictOverflow(): void {
    if (this.maxEntries === undefined) return;
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) return;
      this.entries.delete(oldest.value);
    }
  }
}
