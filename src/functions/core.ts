/**
 * Core functions: single values, full rows, lists and counts.
 */

import { COUNTRY_CODES, INFO_COLUMNS, isCountryCode, isSecurityType, normalizeKey, projectField } from '../bonds'
import { renderError } from '../errors'
import type { BondRecord, CellResult, CellValue } from '../types'
import { emptyResult, type FunctionDeps, fetchRecord, invalidArgument, isObject, toNumber } from './shared'
import type { SearchFilter } from './types'

export const DEFAULT_LIST_LIMIT = 500
export const MAX_LIST_LIMIT = 1000
export const MAX_SEARCH_FILTERS = 3

const COUNTRY_LIST = Object.keys(COUNTRY_CODES).join(', ')

function isinColumn(rows: readonly BondRecord[]): CellValue[][] {
  return rows.map((row) => [projectField(row, 'isin')])
}

export async function bondStatic(deps: FunctionDeps, isin: string, field: string): Promise<CellValue> {
  const result = await deps.context.facade.resolve(isin, field, { wait: deps.wait })
  return result.ok ? result.value : renderError(result.error)
}

export async function bondInfo(deps: FunctionDeps, isin: string, withHeaders = false): Promise<CellResult> {
  const result = await fetchRecord(deps, isin)
  if (!result.ok) {
    return renderError(result.error)
  }
  const values = INFO_COLUMNS.map((column) => projectField(result.value, column.field))
  if (withHeaders) {
    return [INFO_COLUMNS.map((column) => column.header), values]
  }
  return [values]
}

export async function bondList(
  deps: FunctionDeps,
  country: string,
  securityType?: string,
  limit: number = DEFAULT_LIST_LIMIT
): Promise<CellResult> {
  const code = normalizeKey(country)
  if (code === '') {
    return invalidArgument(`Country code required (${COUNTRY_LIST})`)
  }
  if (!isCountryCode(code)) {
    return invalidArgument(`Unknown country: ${code}. Use: ${COUNTRY_LIST}`)
  }

  let normalizedType: string | undefined
  if (securityType?.trim()) {
    normalizedType = securityType.trim().toUpperCase()
    if (!isSecurityType(normalizedType)) {
      return invalidArgument('security_type must be NOMINAL or INDEX_LINKED')
    }
  }
  if (!Number.isFinite(limit) || limit < 1) {
    return invalidArgument(`Invalid limit: ${limit}`)
  }

  const result = await deps.context.facade.list({
    country: code,
    security_type: normalizedType,
    limit: Math.min(Math.trunc(limit), MAX_LIST_LIMIT)
  })
  if (!result.ok) {
    return renderError(result.error)
  }
  if (result.value.length === 0) {
    return emptyResult(`No bonds found for ${code}`)
  }
  return isinColumn(result.value)
}

export async function bondSearch(deps: FunctionDeps, filters: readonly SearchFilter[]): Promise<CellResult> {
  const params: Record<string, string | number> = { limit: DEFAULT_LIST_LIMIT }
  let applied = 0
  for (const [field, value] of filters.slice(0, MAX_SEARCH_FILTERS)) {
    const name = field?.trim().toLowerCase()
    if (name && value) {
      params[name] = value
      applied++
    }
  }
  if (applied === 0) {
    return invalidArgument('At least one filter required')
  }

  const result = await deps.context.facade.list(params)
  if (!result.ok) {
    return renderError(result.error)
  }
  if (result.value.length === 0) {
    return emptyResult('No bonds match filters')
  }
  return isinColumn(result.value)
}

export async function bondCount(deps: FunctionDeps, country?: string): Promise<CellValue> {
  const result = await deps.context.facade.fetch('GET', '/stats')
  if (!result.ok) {
    return renderError(result.error)
  }
  const stats = result.value
  if (!isObject(stats)) {
    return 0
  }
  const code = normalizeKey(country)
  if (code) {
    const byCountry = stats['by_country']
    return isObject(byCountry) ? toNumber(byCountry[code]) : 0
  }
  return toNumber(stats['total_bonds'])
}
