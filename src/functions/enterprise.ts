/**
 * Data management and enterprise functions: refresh, lineage, change
 * history and corporate actions. None of these are cached.
 */

import { normalizeFieldName, validateKey } from '../bonds'
import { classify, renderError } from '../errors'
import type { CellResult, CellValue } from '../types'
import { emptyResult, type FunctionDeps, isObject, percent, toCell, toNumber } from './shared'

export const HISTORY_HEADERS = ['Date', 'Type', 'Field', 'Old Value', 'New Value'] as const
export const ACTION_HEADERS = ['ISIN', 'Type', 'Effective Date', 'Notes'] as const

const HISTORY_FIELDS = ['changed_at', 'change_type', 'field_name', 'old_value', 'new_value'] as const
const ACTION_FIELDS = ['isin', 'action_type', 'effective_date', 'notes'] as const
const ACTIONS_LIMIT = 100

function table(
  headers: readonly string[],
  fields: readonly string[],
  items: readonly unknown[]
): CellValue[][] {
  const rows: CellValue[][] = [[...headers]]
  for (const item of items) {
    if (!isObject(item)) continue
    rows.push(fields.map((field) => toCell(item[field])))
  }
  return rows
}

export async function bondRefresh(deps: FunctionDeps, country?: string, apiKey?: string): Promise<CellValue> {
  const key = apiKey?.trim() || deps.context.settings.apiKey
  const code = country?.trim().toUpperCase()
  const result = await deps.context.facade.fetch(
    'POST',
    '/refresh',
    {
      body: code ? { country: code } : { full: true },
      headers: key ? { 'X-API-Key': key } : undefined
    }
  )
  if (!result.ok) {
    return renderError(result.error)
  }

  // Data may be changing underneath the cache.
  deps.context.facade.clearCache()

  const message = isObject(result.value) ? result.value['message'] : undefined
  return typeof message === 'string' ? message : 'Refresh started'
}

export async function bondLineage(deps: FunctionDeps, isin: string, field?: string): Promise<CellValue> {
  const key = validateKey(isin)
  if (!key.ok) {
    return renderError(classify({ source: 'validation', failure: key.error }))
  }
  const result = await deps.context.facade.fetch(
    'GET',
    `/lineage/${encodeURIComponent(key.value)}`,
    {},
    key.value
  )
  if (!result.ok) {
    return renderError(result.error)
  }
  const lineage = result.value
  if (!isObject(lineage)) {
    return emptyResult(`No lineage data for ${key.value}`)
  }

  const name = normalizeFieldName(field)
  if (name) {
    const sources = lineage['field_sources']
    const source = isObject(sources) ? sources[name] : undefined
    if (!isObject(source)) {
      return emptyResult(`No lineage for field: ${name}`)
    }
    const sourceName = typeof source['source_name'] === 'string' ? source['source_name'] : 'Unknown'
    return `${sourceName} (confidence: ${percent(toNumber(source['confidence']))})`
  }

  const contributing = lineage['contributing_sources']
  const names = Array.isArray(contributing) ? contributing.map((source: unknown) => String(source)) : []
  return `Sources: ${names.join(', ')} | Confidence: ${percent(toNumber(lineage['reconciliation_confidence']))}`
}

export async function bondHistory(deps: FunctionDeps, isin: string, limit = 10): Promise<CellResult> {
  const key = validateKey(isin)
  if (!key.ok) {
    return renderError(classify({ source: 'validation', failure: key.error }))
  }
  const result = await deps.context.facade.fetch(
    'GET',
    `/history/${encodeURIComponent(key.value)}`,
    { params: { limit } },
    key.value
  )
  if (!result.ok) {
    return renderError(result.error)
  }
  const history = result.value
  if (!Array.isArray(history) || history.length === 0) {
    return emptyResult(`No history for ${key.value}`)
  }
  return table(HISTORY_HEADERS, HISTORY_FIELDS, history)
}

export async function bondActions(deps: FunctionDeps, actionType?: string, daysAhead = 30): Promise<CellResult> {
  const type = actionType?.trim().toUpperCase()
  const { facade } = deps.context
  const result =
    type === 'MATURED'
      ? await facade.fetch('GET', '/corporate-actions/maturities', { params: { days: daysAhead } })
      : await facade.fetch('GET', '/corporate-actions', {
          params: { limit: ACTIONS_LIMIT, action_type: type || undefined }
        })
  if (!result.ok) {
    return renderError(result.error)
  }
  const actions = result.value
  if (!Array.isArray(actions) || actions.length === 0) {
    return emptyResult('No corporate actions found')
  }
  return table(ACTION_HEADERS, ACTION_FIELDS, actions)
}
