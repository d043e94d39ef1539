/**
 * Cache Key Generation
 *
 * Keys for list results. Bond identifiers are used as keys directly.
 */

/**
 * Sort object keys recursively for deterministic JSON stringification
 */
function sortKeys(obj: unknown): unknown {
  if (obj === null || typeof obj !== 'object') {
    return obj
  }

  if (Array.isArray(obj)) {
    return obj.map(sortKeys)
  }

  const sorted: Record<string, unknown> = {}
  const keys = Object.keys(obj as Record<string, unknown>).sort()
  for (const key of keys) {
    sorted[key] = sortKeys((obj as Record<string, unknown>)[key])
  }
  return sorted
}

/**
 * Generate a deterministic cache key for a list query.
 *
 * Undefined filters are dropped so `{country: 'GB'}` and
 * `{country: 'GB', currency: undefined}` share an entry.
 *
 * @example
 * ```ts
 * generateListCacheKey({ limit: 500, country: 'GB' })
 * // Returns: 'list:{"country":"GB","limit":500}'
 * ```
 */
export function generateListCacheKey(params: Readonly<Record<string, unknown>>): string {
  const defined: Record<string, unknown> = {}
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) defined[key] = value
  }
  return `list:${JSON.stringify(sortKeys(defined))}`
}
