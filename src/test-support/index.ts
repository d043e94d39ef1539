/**
 * Test Support Module
 *
 * Builds the lookup stack on a virtual clock and a scripted transport so tests
 * can drive polling step by step.
 */

import { LookupCache } from '../cache'
import { LookupCoordinator } from '../lookup/coordinator'
import { RequestFacade } from '../lookup/facade'
import type { BondRecord } from '../types'
import { ManualScheduler } from './manual-scheduler'
import { ScriptedTransport } from './scripted-transport'

export { ManualScheduler } from './manual-scheduler'
export {
  deferred,
  failure,
  found,
  inProgress,
  notFound,
  type RecordedCall,
  ScriptedTransport
} from './scripted-transport'

export interface TestStackOptions {
  readonly maxAttempts?: number
  readonly cacheMaxEntries?: number
  readonly cacheTtlSeconds?: number
}

export interface TestStack {
  readonly scheduler: ManualScheduler
  readonly transport: ScriptedTransport
  readonly cache: LookupCache
  readonly coordinator: LookupCoordinator
  readonly facade: RequestFacade
}

export function createTestStack(options: TestStackOptions = {}): TestStack {
  const scheduler = new ManualScheduler()
  const transport = new ScriptedTransport()
  const cache = new LookupCache({
    clock: scheduler.now,
    maxEntries: options.cacheMaxEntries ?? 500,
    ttlSeconds: options.cacheTtlSeconds ?? 300
  })
  const coordinator = new LookupCoordinator({
    transport,
    cache,
    scheduler,
    clock: scheduler.now,
    maxAttempts: options.maxAttempts ?? 5,
    backoff: { baseDelayMs: 1000, maxDelayMs: 15_000 },
    recordTtlSeconds: options.cacheTtlSeconds ?? 300,
    notFoundTtlSeconds: 60,
    exhaustedTtlSeconds: 30
  })
  const facade = new RequestFacade({ cache, coordinator, transport })
  return { scheduler, transport, cache, coordinator, facade }
}

/**
 * A UK nominal gilt with every commonly read field filled in.
 */
export function createBond(overrides: Partial<Record<string, string | number | boolean | null>> = {}): BondRecord {
  const base: Record<string, string | number | boolean | null> = {
    isin: 'GB00BYZW3G56',
    cusip: null,
    sedol: 'BYZW3G5',
    name: 'UK Treasury 1.5% 2026',
    country: 'GB',
    issuer: 'United Kingdom',
    security_type: 'NOMINAL',
    currency: 'GBP',
    coupon_rate: 1.5,
    coupon_frequency: 2,
    day_count_convention: 'ACT/ACT',
    maturity_date: '2026-07-22',
    issue_date: '2016-07-22',
    first_coupon_date: '2017-01-22',
    outstanding_amount: 38_000_000_000,
    original_tenor: '10Y'
  }
  for (const [name, value] of Object.entries(overrides)) {
    if (value !== undefined) base[name] = value
  }
  return base
}
