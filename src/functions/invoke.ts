/**
 * Dispatch of a registered function from untyped text arguments, as a
 * command line or a scripting host passes them.
 */

import type { CellResult } from '../types'
import { getFunctionDescriptor } from './registry'
import { invalidArgument } from './shared'
import type { BondFunctions, FunctionName, SearchFilter } from './types'

export type RawArguments = readonly (string | undefined)[]

function optionalText(raw: string | undefined): string | undefined {
  const value = raw?.trim()
  return value ? value : undefined
}

function optionalNumber(raw: string | undefined): number | undefined {
  const value = optionalText(raw)
  return value === undefined ? undefined : Number(value)
}

export function parseBoolean(raw: string | undefined): boolean {
  const value = raw?.trim().toLowerCase()
  return value === 'true' || value === '1' || value === 'yes'
}

export function toSearchFilters(args: RawArguments): SearchFilter[] {
  const filters: SearchFilter[] = []
  for (let i = 0; i < args.length; i += 2) {
    filters.push([args[i], args[i + 1]])
  }
  return filters
}

/**
 * Returns an error cell when a numeric argument is not a number.
 */
function checkNumbers(name: FunctionName, args: RawArguments): string | undefined {
  const descriptor = getFunctionDescriptor(name)
  if (!descriptor) {
    return undefined
  }
  for (const [index, arg] of descriptor.args.entries()) {
    if (arg.kind !== 'number') continue
    const value = optionalNumber(args[index])
    if (value !== undefined && !Number.isFinite(value)) {
      return invalidArgument(`Invalid ${arg.name}: ${args[index] ?? ''}`)
    }
  }
  return undefined
}

export async function invokeFunction(
  functions: BondFunctions,
  name: FunctionName,
  args: RawArguments
): Promise<CellResult> {
  const invalid = checkNumbers(name, args)
  if (invalid !== undefined) {
    return invalid
  }
  const text = (index: number): string => args[index] ?? ''

  switch (name) {
    case 'BONDSTATIC':
      return functions.bondStatic(text(0), text(1))
    case 'BONDINFO':
      return functions.bondInfo(text(0), parseBoolean(args[1]))
    case 'BONDLIST':
      return functions.bondList(text(0), optionalText(args[1]), optionalNumber(args[2]))
    case 'BONDSEARCH':
      return functions.bondSearch(toSearchFilters(args))
    case 'BONDCOUNT':
      return functions.bondCount(optionalText(args[0]))
    case 'BONDYEARSTOMAT':
      return functions.bondYearsToMaturity(text(0), optionalText(args[1]))
    case 'BONDMATURITYRANGE':
      return functions.bondMaturityRange(text(0), text(1), optionalText(args[2]))
    case 'BONDCOUPONFREQ':
      return functions.bondCouponFrequency(text(0))
    case 'BONDISLINKER':
      return functions.bondIsLinker(text(0))
    case 'BONDREFRESH':
      return functions.bondRefresh(optionalText(args[0]), optionalText(args[1]))
    case 'BONDLINEAGE':
      return functions.bondLineage(text(0), optionalText(args[1]))
    case 'BONDHISTORY':
      return functions.bondHistory(text(0), optionalNumber(args[1]))
    case 'BONDACTIONS':
      return functions.bondActions(optionalText(args[0]), optionalNumber(args[1]))
    case 'BONDAPI_STATUS':
      return functions.apiStatus()
    case 'BONDCACHE_CLEAR':
      return functions.cacheClear()
    case 'BONDCACHE_STATS':
      return functions.cacheStats()
    case 'BONDHELP':
      return functions.help(optionalText(args[0]))
    case 'BONDISVALID':
      return functions.isinValid(text(0))
  }
}
