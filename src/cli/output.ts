/**
 * Terminal rendering of function results. Tables print one row per line
 * with tab-separated cells so they paste straight into a sheet.
 */

import type { CellResult, CellValue } from '../types'

export function formatCell(value: CellValue): string {
  if (typeof value === 'boolean') {
    return value ? 'TRUE' : 'FALSE'
  }
  return String(value)
}

export function formatResult(result: CellResult): string {
  if (typeof result !== 'object') {
    return formatCell(result)
  }
  return result.map((row) => row.map(formatCell).join('\t')).join('\n')
}
