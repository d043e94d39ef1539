/**
 * Parsing of service payloads into bond records, and field projection.
 */

import type { BondRecord, CellValue, FieldValue } from '../types'

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

function isFieldValue(value: unknown): value is FieldValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'boolean' ||
    (typeof value === 'number' && Number.isFinite(value))
  )
}

/**
 * Keep the scalar members of a JSON object. Anything other than an object
 * is not a record.
 */
export function parseBondRecord(body: unknown): BondRecord | null {
  if (!isObject(body)) {
    return null
  }
  const record: Record<string, FieldValue> = {}
  for (const [name, value] of Object.entries(body)) {
    if (isFieldValue(value)) {
      record[name] = value
    }
  }
  return record
}

/**
 * Parse a list payload. Members that are not objects are skipped.
 */
export function parseBondRows(body: unknown): BondRecord[] | null {
  if (!Array.isArray(body)) {
    return null
  }
  const rows: BondRecord[] = []
  for (const item of body) {
    const record = parseBondRecord(item)
    if (record) rows.push(record)
  }
  return rows
}

/**
 * Value of one field as a cell holds it; missing and null become "".
 */
export function projectField(record: BondRecord, field: string): CellValue {
  return record[field] ?? ''
}
