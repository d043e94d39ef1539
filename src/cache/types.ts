/**
 * Lookup Cache Types
 */

import type { BondRecord } from '../types'

/**
 * Negative entry: the service confirmed absence, or polling ran out of attempts.
 */
export type NegativeSentinel =
  | { readonly kind: 'not_found' }
  | { readonly kind: 'exhausted'; readonly attempts: number }

/**
 * Everything the lookup cache can hold.
 */
export type CacheValue =
  | { readonly kind: 'record'; readonly record: BondRecord }
  | { readonly kind: 'rows'; readonly rows: readonly BondRecord[] }
  | NegativeSentinel

export interface CacheEntry {
  readonly key: string
  readonly value: CacheValue
  readonly insertedAt: number
  readonly expiresAt: number
}

/**
 * Point-in-time snapshot of the cache counters.
 */
export interface CacheStats {
  readonly size: number
  readonly capacity: number
  readonly hits: number
  readonly misses: number
  readonly evictions: number
  readonly pending: number
  readonly hitRate: number
  readonly ttlSeconds: number
}

/**
 * Default TTL for resolved records (5 minutes)
 */
export const DEFAULT_CACHE_TTL_SECONDS = 5 * 60

export const DEFAULT_CACHE_MAX_ENTRIES = 500
