/**
 * Helpers shared by the function implementations.
 */

import type { BondContext } from '../context'
import { classify, ERROR_MARKER, type LookupError, renderError } from '../errors'
import type { BondRecord, CellValue, Clock, Result } from '../types'

export interface FunctionDeps {
  readonly context: BondContext
  readonly clock: Clock
  /** Wait for background resolution instead of reporting progress */
  readonly wait: boolean
}

export function isObject(value: unknown): value is Readonly<Record<string, unknown>> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Any JSON value as a cell: scalars as-is, null and absent as "", anything
 * structured as JSON text.
 */
export function toCell(value: unknown): CellValue {
  if (value === null || value === undefined) return ''
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value
  }
  return JSON.stringify(value)
}

export function toNumber(value: unknown): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : 0
}

export function invalidArgument(detail: string): string {
  return renderError(classify({ source: 'validation', failure: { reason: 'invalid_argument', detail } }))
}

/**
 * A plain message in the error style, for empty results.
 */
export function emptyResult(message: string): string {
  return `${ERROR_MARKER} ${message}`
}

export function fetchRecord(deps: FunctionDeps, isin: string): Promise<Result<BondRecord, LookupError>> {
  return deps.context.facade.resolveRecord(isin, { wait: deps.wait })
}

/**
 * Percentage without decimals, as "87%".
 */
export function percent(ratio: number): string {
  return `${Math.round(ratio * 100)}%`
}
