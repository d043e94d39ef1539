/**
 * Analytics functions computed from a resolved record.
 */

import { normalizeKey, projectField } from '../bonds'
import { renderError } from '../errors'
import type { CellResult, CellValue, FieldValue } from '../types'
import { DEFAULT_LIST_LIMIT } from './core'
import { emptyResult, type FunctionDeps, fetchRecord, invalidArgument } from './shared'

const MS_PER_DAY = 86_400_000
const DAYS_PER_YEAR = 365.25

const FREQUENCY_NAMES: Readonly<Record<number, string>> = {
  1: 'Annual',
  2: 'Semi-annual',
  4: 'Quarterly',
  12: 'Monthly'
}

/**
 * Day number (days since the epoch, UTC) of an ISO date or date-time.
 * Returns null for anything else, impossible dates included.
 */
export function parseIsoDay(value: FieldValue | undefined): number | null {
  if (typeof value !== 'string') {
    return null
  }
  const match = /^(\d{4})-(\d{2})-(\d{2})(?:$|[T ])/.exec(value.trim())
  if (!match) {
    return null
  }
  const [, year, month, day] = match.map(Number)
  if (year === undefined || month === undefined || day === undefined) {
    return null
  }
  const time = Date.UTC(year, month - 1, day)
  const date = new Date(time)
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
    return null
  }
  return time / MS_PER_DAY
}

export function dayOf(epochMs: number): number {
  return Math.floor(epochMs / MS_PER_DAY)
}

/**
 * Years between two days, two decimals; 0 once matured.
 */
export function yearsBetween(fromDay: number, maturityDay: number): number {
  if (maturityDay <= fromDay) {
    return 0
  }
  return Math.round(((maturityDay - fromDay) / DAYS_PER_YEAR) * 100) / 100
}

export function couponFrequencyText(couponRate: FieldValue | undefined, frequency: FieldValue | undefined): string {
  if (couponRate === 0 || couponRate === undefined) {
    return 'Zero coupon'
  }
  const payments = typeof frequency === 'number' ? frequency : 0
  return FREQUENCY_NAMES[payments] ?? `${payments}x per year`
}

export async function bondYearsToMaturity(deps: FunctionDeps, isin: string, asOf?: string): Promise<CellValue> {
  const result = await fetchRecord(deps, isin)
  if (!result.ok) {
    return renderError(result.error)
  }
  const maturity = parseIsoDay(result.value['maturity_date'])
  if (maturity === null) {
    return emptyResult('No maturity date available')
  }

  let from = dayOf(deps.clock())
  if (asOf?.trim()) {
    const parsed = parseIsoDay(asOf)
    if (parsed === null) {
      return invalidArgument(`Invalid date format: ${asOf}`)
    }
    from = parsed
  }
  return yearsBetween(from, maturity)
}

export async function bondMaturityRange(
  deps: FunctionDeps,
  fromDate: string,
  toDate: string,
  country?: string
): Promise<CellResult> {
  if (!fromDate.trim() || !toDate.trim()) {
    return invalidArgument('From and to dates required (YYYY-MM-DD)')
  }
  const code = normalizeKey(country)
  const result = await deps.context.facade.list({
    maturity_from: fromDate.trim(),
    maturity_to: toDate.trim(),
    country: code || undefined,
    limit: DEFAULT_LIST_LIMIT
  })
  if (!result.ok) {
    return renderError(result.error)
  }
  if (result.value.length === 0) {
    return emptyResult('No bonds maturing in range')
  }
  return result.value.map((row) => [projectField(row, 'isin'), projectField(row, 'maturity_date')])
}

export async function bondCouponFrequency(deps: FunctionDeps, isin: string): Promise<CellValue> {
  const result = await fetchRecord(deps, isin)
  if (!result.ok) {
    return renderError(result.error)
  }
  return couponFrequencyText(result.value['coupon_rate'], result.value['coupon_frequency'])
}

export async function bondIsLinker(deps: FunctionDeps, isin: string): Promise<CellValue> {
  const result = await fetchRecord(deps, isin)
  if (!result.ok) {
    return renderError(result.error)
  }
  const type = result.value['security_type']
  return typeof type === 'string' && type.toUpperCase() === 'INDEX_LINKED'
}
