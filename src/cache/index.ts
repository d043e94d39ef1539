/**
 * Cache Module
 *
 * In-memory lookup cache with TTL expiry, LRU eviction and pending markers.
 */

export { generateListCacheKey } from './key'
export { LookupCache, type LookupCacheOptions } from './store'
export type { CacheEntry, CacheStats, CacheValue, NegativeSentinel } from './types'
export { DEFAULT_CACHE_MAX_ENTRIES, DEFAULT_CACHE_TTL_SECONDS } from './types'
