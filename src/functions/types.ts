/**
 * Caller-facing function surface. A host (spreadsheet add-in, CLI) registers
 * one entry per method; every method returns a cell or a table, with errors
 * already rendered as text.
 */

import type { CellResult, CellValue } from '../types'

export type SearchFilter = readonly [field: string | undefined, value: string | undefined]

export interface BondFunctions {
  bondStatic(isin: string, field: string): Promise<CellValue>
  bondInfo(isin: string, withHeaders?: boolean): Promise<CellResult>
  bondList(country: string, securityType?: string, limit?: number): Promise<CellResult>
  bondSearch(filters: readonly SearchFilter[]): Promise<CellResult>
  bondCount(country?: string): Promise<CellValue>
  bondYearsToMaturity(isin: string, asOf?: string): Promise<CellValue>
  bondMaturityRange(fromDate: string, toDate: string, country?: string): Promise<CellResult>
  bondCouponFrequency(isin: string): Promise<CellValue>
  bondIsLinker(isin: string): Promise<CellValue>
  bondRefresh(country?: string, apiKey?: string): Promise<CellValue>
  bondLineage(isin: string, field?: string): Promise<CellValue>
  bondHistory(isin: string, limit?: number): Promise<CellResult>
  bondActions(actionType?: string, daysAhead?: number): Promise<CellResult>
  apiStatus(): Promise<string>
  cacheClear(): string
  cacheStats(): string
  help(topic?: string): CellResult
  isinValid(isin: string): boolean
}

export type FunctionName =
  | 'BONDSTATIC'
  | 'BONDINFO'
  | 'BONDLIST'
  | 'BONDSEARCH'
  | 'BONDCOUNT'
  | 'BONDYEARSTOMAT'
  | 'BONDMATURITYRANGE'
  | 'BONDCOUPONFREQ'
  | 'BONDISLINKER'
  | 'BONDREFRESH'
  | 'BONDLINEAGE'
  | 'BONDHISTORY'
  | 'BONDACTIONS'
  | 'BONDAPI_STATUS'
  | 'BONDCACHE_CLEAR'
  | 'BONDCACHE_STATS'
  | 'BONDHELP'
  | 'BONDISVALID'

export type ArgumentKind = 'string' | 'number' | 'boolean'

export interface ArgumentDescriptor {
  readonly name: string
  readonly description: string
  readonly kind: ArgumentKind
  readonly optional?: boolean
  /** Accepts any number of values (filter pairs) */
  readonly variadic?: boolean
}

export interface FunctionDescriptor {
  readonly name: FunctionName
  /** Subcommand name on the command line */
  readonly command: string
  readonly summary: string
  readonly args: readonly ArgumentDescriptor[]
  /** Result can change between calls with the same arguments */
  readonly volatile?: boolean
  /** Goes through the record lookup, so it can wait for background resolution */
  readonly lookup?: boolean
}
