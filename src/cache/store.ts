/**
 * Lookup Cache
 *
 * Bounded, time-expiring LRU map from bond identifier (or list key) to the
 * last answer the service gave.
 *
 * Pending markers live in their own namespace: they count towards capacity but
 * are never evicted, invalidated or cleared. Only the lookup coordinator sets
 * and releases them; writing the answer for a pending key takes over the
 * marker's slot.
 *
 * Node runs every method below to completion without interleaving, so each
 * operation is atomic with respect to concurrent callers.
 */

import { type Clock, systemClock } from '../types'
import {
  type CacheEntry,
  type CacheStats,
  type CacheValue,
  DEFAULT_CACHE_MAX_ENTRIES,
  DEFAULT_CACHE_TTL_SECONDS
} from './types'

export interface LookupCacheOptions {
  /** Maximum entries, pending markers included (default 500) */
  readonly maxEntries?: number
  /** TTL applied when put() is called without one (default 300) */
  readonly ttlSeconds?: number
  readonly clock?: Clock
}

export class LookupCache {
  private readonly entries = new Map<string, CacheEntry>()
  private readonly pendingSince = new Map<string, number>()
  private readonly capacity: number
  private readonly ttlSeconds: number
  private readonly clock: Clock
  private hits = 0
  private misses = 0
  private evictions = 0

  constructor(options: LookupCacheOptions = {}) {
    this.capacity = options.maxEntries ?? DEFAULT_CACHE_MAX_ENTRIES
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_CACHE_TTL_SECONDS
    this.clock = options.clock ?? systemClock
    if (!Number.isInteger(this.capacity) || this.capacity < 1) {
      throw new Error(`Cache capacity must be a positive integer, got ${this.capacity}`)
    }
  }

  get size(): number {
    return this.entries.size + this.pendingSince.size
  }

  /**
   * Return the unexpired value for a key and mark it most recently used.
   */
  get(key: string): CacheValue | undefined {
    const entry = this.entries.get(key)
    if (!entry) {
      this.misses++
      return undefined
    }
    if (this.clock() >= entry.expiresAt) {
      this.entries.delete(key)
      this.misses++
      return undefined
    }
    this.entries.delete(key)
    this.entries.set(key, entry)
    this.hits++
    return entry.value
  }

  /**
   * Read an entry without touching counters or recency.
   */
  peek(key: string): CacheEntry | undefined {
    const entry = this.entries.get(key)
    if (!entry || this.clock() >= entry.expiresAt) {
      return undefined
    }
    return entry
  }

  /**
   * Insert or overwrite a value. A pending marker for the same key is
   * replaced in its slot. Returns false when the cache is full of pending
   * markers and nothing could be evicted.
   */
  put(key: string, value: CacheValue, ttlSeconds: number = this.ttlSeconds): boolean {
    const now = this.clock()
    const ownsSlot = this.entries.delete(key) || this.pendingSince.delete(key)
    if (!ownsSlot && !this.makeRoom(now)) {
      return false
    }
    this.entries.set(key, {
      key,
      value,
      insertedAt: now,
      expiresAt: now + ttlSeconds * 1000
    })
    return true
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key)
  }

  /**
   * Remove every entry except pending markers and reset the counters.
   * Returns how many entries were removed.
   */
  clear(): number {
    const count = this.entries.size
    this.entries.clear()
    this.hits = 0
    this.misses = 0
    this.evictions = 0
    return count
  }

  markPending(key: string): boolean {
    if (this.pendingSince.has(key)) {
      return true
    }
    if (!this.makeRoom(this.clock())) {
      return false
    }
    this.pendingSince.set(key, this.clock())
    return true
  }

  releasePending(key: string): void {
    this.pendingSince.delete(key)
  }

  isPending(key: string): boolean {
    return this.pendingSince.has(key)
  }

  /**
   * Drop every expired entry. Returns how many were dropped.
   */
  sweep(): number {
    return this.dropExpired(this.clock())
  }

  stats(): CacheStats {
    const total = this.hits + this.misses
    return {
      size: this.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      pending: this.pendingSince.size,
      hitRate: total > 0 ? this.hits / total : 0,
      ttlSeconds: this.ttlSeconds
    }
  }

  private dropExpired(now: number): number {
    let dropped = 0
    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key)
        dropped++
      }
    }
    return dropped
  }

  /**
   * Ensure one more entry fits: expired entries go first, then the least
   * recently used value. Pending markers are never candidates.
   */
  private makeRoom(now: number): boolean {
    if (this.size < this.capacity) {
      return true
    }
    this.dropExpired(now)
    while (this.size >= this.capacity) {
      const oldest = this.entries.keys().next()
      if (oldest.done) {
        return false
      }
      this.entries.delete(oldest.value)
      this.evictions++
    }
    return true
  }
}
