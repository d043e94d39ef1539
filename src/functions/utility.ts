/**
 * Utility functions: connectivity, cache administration, help and ISIN checks.
 */

import { BOND_FIELDS, COUNTRY_CODES, isValidIsin } from '../bonds'
import type { CellResult } from '../types'
import { FUNCTION_REGISTRY } from './registry'
import { invalidArgument, type FunctionDeps, percent } from './shared'

const OVERVIEW: readonly string[] = [
  'bondref - Quick Reference',
  '',
  'GETTING STARTED:',
  '1. Start the bond data service',
  '2. Check connection: =BONDAPI_STATUS()',
  '3. Try: =BONDSTATIC("US912810TM58", "coupon_rate")',
  '',
  'HELP TOPICS:',
  '=BONDHELP("fields")    - Available data fields',
  '=BONDHELP("countries") - Country codes',
  '=BONDHELP("functions") - All functions'
]

export async function apiStatus(deps: FunctionDeps): Promise<string> {
  const response = await deps.context.transport.call('GET', '/health')
  switch (response.kind) {
    case 'found':
      return '✓ Connected'
    case 'transport_failure':
      return `✗ Disconnected: ${response.cause.message}`
    case 'not_found':
      return '✗ Disconnected: HTTP 404'
    case 'in_progress':
      return '✗ Disconnected: service is starting'
  }
}

export function cacheClear(deps: FunctionDeps): string {
  const removed = deps.context.facade.clearCache()
  return `✓ Cleared ${removed} cached entries`
}

export function cacheStats(deps: FunctionDeps): string {
  const stats = deps.context.facade.stats()
  return `Size: ${stats.size}/${stats.capacity} | Hit Rate: ${percent(stats.hitRate)} | TTL: ${Math.round(stats.ttlSeconds)}s`
}

export function help(topic?: string): CellResult {
  const name = topic?.trim().toLowerCase()
  if (!name) {
    return OVERVIEW.map((line) => [line])
  }
  switch (name) {
    case 'fields':
      return [['Field', 'Description'], ...Object.entries(BOND_FIELDS)]
    case 'countries':
      return [['Code', 'Country'], ...Object.entries(COUNTRY_CODES)]
    case 'functions':
      return [
        ['Function', 'Description'],
        ...FUNCTION_REGISTRY.map((descriptor) => [descriptor.name, descriptor.summary])
      ]
    default:
      return invalidArgument(`Unknown topic: ${name}. Try: fields, countries, functions`)
  }
}

export function isinValid(isin: string): boolean {
  return isValidIsin(isin)
}
