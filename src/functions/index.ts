/**
 * Bond Functions
 *
 * Binds every caller-facing function to one context.
 *
 * @example
 * ```ts
 * const context = BondContext.open({ settings: resolveSettings(settingsFromEnv()) })
 * const functions = createBondFunctions(context)
 * await functions.bondStatic('GB00BYZW3G56', 'coupon')
 * await context.close()
 * ```
 */

import type { BondContext } from '../context'
import { type Clock, systemClock } from '../types'
import {
  bondCouponFrequency,
  bondIsLinker,
  bondMaturityRange,
  bondYearsToMaturity
} from './analytics'
import { bondCount, bondInfo, bondList, bondSearch, bondStatic } from './core'
import { bondActions, bondHistory, bondLineage, bondRefresh } from './enterprise'
import type { FunctionDeps } from './shared'
import type { BondFunctions } from './types'
import { apiStatus, cacheClear, cacheStats, help, isinValid } from './utility'

export interface BondFunctionsOptions {
  /** Wait for background resolution instead of answering with progress */
  readonly wait?: boolean
  /** Source of "today" for maturity calculations */
  readonly clock?: Clock
}

export function createBondFunctions(context: BondContext, options: BondFunctionsOptions = {}): BondFunctions {
  const deps: FunctionDeps = {
    context,
    clock: options.clock ?? systemClock,
    wait: options.wait ?? false
  }

  return {
    bondStatic: (isin, field) => bondStatic(deps, isin, field),
    bondInfo: (isin, withHeaders) => bondInfo(deps, isin, withHeaders),
    bondList: (country, securityType, limit) => bondList(deps, country, securityType, limit),
    bondSearch: (filters) => bondSearch(deps, filters),
    bondCount: (country) => bondCount(deps, country),
    bondYearsToMaturity: (isin, asOf) => bondYearsToMaturity(deps, isin, asOf),
    bondMaturityRange: (fromDate, toDate, country) => bondMaturityRange(deps, fromDate, toDate, country),
    bondCouponFrequency: (isin) => bondCouponFrequency(deps, isin),
    bondIsLinker: (isin) => bondIsLinker(deps, isin),
    bondRefresh: (country, apiKey) => bondRefresh(deps, country, apiKey),
    bondLineage: (isin, field) => bondLineage(deps, isin, field),
    bondHistory: (isin, limit) => bondHistory(deps, isin, limit),
    bondActions: (actionType, daysAhead) => bondActions(deps, actionType, daysAhead),
    apiStatus: () => apiStatus(deps),
    cacheClear: () => cacheClear(deps),
    cacheStats: () => cacheStats(deps),
    help: (topic) => help(topic),
    isinValid: (isin) => isinValid(isin)
  }
}

export { invokeFunction, type RawArguments } from './invoke'
export { FUNCTION_REGISTRY, getFunctionDescriptor } from './registry'
export type {
  ArgumentDescriptor,
  ArgumentKind,
  BondFunctions,
  FunctionDescriptor,
  FunctionName,
  SearchFilter
} from './types'
