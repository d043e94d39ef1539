/**
 * Request Facade
 *
 * Entry point for every caller-facing lookup. Validates input, answers from
 * the cache when it can, and otherwise hands the key to the coordinator.
 * Nothing here waits on background polls unless a caller asks to wait.
 */

import { normalizeKey, parseBondRows, projectField, resolveFieldName, validateKey } from '../bonds'
import { type CacheStats, generateListCacheKey, type LookupCache } from '../cache'
import { classify, type LookupError } from '../errors'
import { unwrapEnvelope } from '../http'
import { type Logger, silentLogger } from '../logger'
import type { BackendTransport } from '../transport'
import {
  type BondRecord,
  type CallOptions,
  type CellValue,
  err,
  type HttpMethod,
  type ListParams,
  ok,
  type Result
} from '../types'
import type { LookupCoordinator, TerminalOutcome } from './coordinator'

export type LookupResult<T> = Result<T, LookupError>

export interface FacadeConfig {
  readonly cache: LookupCache
  readonly coordinator: LookupCoordinator
  readonly transport: BackendTransport
  readonly logger?: Logger
}

export interface ResolveOptions {
  /** Wait for background polls to settle instead of reporting progress */
  readonly wait?: boolean
}

export const LIST_PATH = '/list'

export class RequestFacade {
  private readonly logger: Logger

  constructor(private readonly config: FacadeConfig) {
    this.logger = config.logger ?? silentLogger
  }

  /**
   * One field of one bond.
   */
  async resolve(
    rawKey: string | undefined,
    rawField: string | undefined,
    options: ResolveOptions = {}
  ): Promise<LookupResult<CellValue>> {
    const key = validateKey(rawKey)
    if (!key.ok) {
      return err(classify({ source: 'validation', failure: key.error }))
    }
    const field = resolveFieldName(rawField)
    if (!field.ok) {
      return err(classify({ source: 'validation', failure: field.error }))
    }

    const record = await this.lookupRecord(key.value, options.wait ?? false)
    return record.ok ? ok(projectField(record.value, field.value)) : record
  }

  /**
   * The whole record of one bond.
   */
  async resolveRecord(
    rawKey: string | undefined,
    options: ResolveOptions = {}
  ): Promise<LookupResult<BondRecord>> {
    const key = validateKey(rawKey)
    if (!key.ok) {
      return err(classify({ source: 'validation', failure: key.error }))
    }
    return this.lookupRecord(key.value, options.wait ?? false)
  }

  /**
   * Filtered bond list, cached under a key built from the filters.
   */
  async list(params: ListParams): Promise<LookupResult<readonly BondRecord[]>> {
    const cacheKey = generateListCacheKey(params)
    const cached = this.config.cache.get(cacheKey)
    if (cached?.kind === 'rows') {
      return ok(cached.rows)
    }

    const response = await this.config.transport.call('GET', LIST_PATH, { params })
    switch (response.kind) {
      case 'found': {
        const rows = parseBondRows(unwrapEnvelope(response.body))
        if (!rows) {
          return err({ kind: 'backend_unavailable', message: 'Invalid bond list from service' })
        }
        this.config.cache.put(cacheKey, { kind: 'rows', rows })
        return ok(rows)
      }
      case 'not_found':
        return ok([])
      default:
        return err(classify({ source: 'backend', key: 'bond list', response }))
    }
  }

  /**
   * Uncached call for administrative and enterprise endpoints. Returns the
   * body with any `{ data }` envelope removed. `subject` names the bond a
   * not-found answer refers to.
   */
  async fetch(
    method: HttpMethod,
    path: string,
    options: CallOptions = {},
    subject?: string
  ): Promise<LookupResult<unknown>> {
    const response = await this.config.transport.call(method, path, options)
    if (response.kind === 'found') {
      return ok(unwrapEnvelope(response.body))
    }
    if (subject === undefined && response.kind === 'not_found') {
      return err({ kind: 'not_found', message: `Not found: ${path}` })
    }
    return err(classify({ source: 'backend', key: subject ?? path, response }))
  }

  invalidate(rawKey: string): boolean {
    return this.config.cache.invalidate(normalizeKey(rawKey))
  }

  clearCache(): number {
    const removed = this.config.cache.clear()
    this.logger.verbose(`Cleared ${removed} cached entries`)
    return removed
  }

  stats(): CacheStats {
    return this.config.cache.stats()
  }

  private async lookupRecord(key: string, wait: boolean): Promise<LookupResult<BondRecord>> {
    const cached = this.config.cache.get(key)
    if (cached) {
      switch (cached.kind) {
        case 'record':
          return ok(cached.record)
        case 'not_found':
        case 'exhausted':
          return err(classify({ source: 'cache', key, sentinel: cached }))
        case 'rows':
          break
      }
    }

    const outcome = await this.config.coordinator.lookup(key)
    if (outcome.state !== 'pending') {
      return this.fromOutcome(key, outcome)
    }
    if (!wait) {
      return err(classify({ source: 'lookup', key, outcome }))
    }
    const settled = await this.config.coordinator.waitFor(key)
    // Settled between the two calls: the answer is in the cache now.
    return settled ? this.fromOutcome(key, settled) : this.lookupRecord(key, wait)
  }

  private fromOutcome(key: string, outcome: TerminalOutcome): LookupResult<BondRecord> {
    if (outcome.state === 'resolved') {
      return ok(outcome.record)
    }
    return err(classify({ source: 'lookup', key, outcome }))
  }
}
