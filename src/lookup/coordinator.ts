/**
 * Lookup Coordinator
 *
 * Turns a cache miss into exactly one backend interaction per key at a time
 * and drives the multi-step resolution when the service answers "still
 * searching".
 *
 * Per key: Idle → Polling → Resolved | Exhausted. The first call for a key is
 * awaited by its caller (and shared with anyone asking meanwhile); follow-up
 * polls run on the scheduler, and callers arriving in between get a pending
 * outcome straight away. Terminal answers are written into the cache before
 * the pending lookup is dropped, so the next caller finds them there.
 */

import type { CacheValue, LookupCache } from '../cache'
import { parseBondRecord } from '../bonds'
import { classifyNetworkError, unwrapEnvelope } from '../http'
import { type Logger, silentLogger } from '../logger'
import type { BackendTransport } from '../transport'
import {
  type BackendResponse,
  type BondRecord,
  type Clock,
  systemClock,
  type TransportFailureCause
} from '../types'
import { type BackoffPolicy, type CancelFn, nextPollDelay, type Scheduler } from './scheduler'

export type LookupOutcome =
  | { readonly state: 'resolved'; readonly record: BondRecord }
  | { readonly state: 'pending'; readonly attempts: number; readonly maxAttempts: number }
  | { readonly state: 'absent' }
  | { readonly state: 'exhausted'; readonly attempts: number }
  | { readonly state: 'unavailable'; readonly cause: TransportFailureCause }

export type TerminalOutcome = Exclude<LookupOutcome, { readonly state: 'pending' }>

/**
 * Read-only view of a key that is being resolved.
 */
export interface PendingLookupView {
  readonly key: string
  readonly startedAt: number
  readonly attempts: number
  readonly nextPollAt: number | undefined
  readonly waiters: number
  readonly inFlight: boolean
}

interface PendingLookup {
  readonly key: string
  readonly startedAt: number
  attempts: number
  nextPollAt: number | undefined
  inFlight: boolean
  firstCall: Promise<LookupOutcome> | null
  cancelPoll: CancelFn | null
  readonly waiters: Array<(outcome: TerminalOutcome) => void>
}

export interface CoordinatorConfig {
  readonly transport: BackendTransport
  readonly cache: LookupCache
  readonly scheduler: Scheduler
  readonly clock?: Clock
  readonly logger?: Logger
  /** "Still searching" answers tolerated before giving up */
  readonly maxAttempts: number
  readonly backoff: BackoffPolicy
  readonly recordTtlSeconds: number
  readonly notFoundTtlSeconds: number
  readonly exhaustedTtlSeconds: number
}

const CLOSED_CAUSE: TransportFailureCause = { type: 'closed', message: 'Lookup context closed' }

export function resolvePath(key: string): string {
  return `/resolve/${encodeURIComponent(key)}`
}

export class LookupCoordinator {
  private readonly lookups = new Map<string, PendingLookup>()
  private readonly clock: Clock
  private readonly logger: Logger
  private closed = false

  constructor(private readonly config: CoordinatorConfig) {
    if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
      throw new Error(`maxAttempts must be a positive integer, got ${config.maxAttempts}`)
    }
    this.clock = config.clock ?? systemClock
    this.logger = config.logger ?? silentLogger
  }

  /**
   * Start or join the resolution of `key`.
   *
   * Resolves after at most one backend call: with a terminal outcome, or
   * with `pending` while follow-up polls run in the background.
   */
  lookup(key: string): Promise<LookupOutcome> {
    if (this.closed) {
      return Promise.resolve({ state: 'unavailable', cause: CLOSED_CAUSE })
    }

    const existing = this.lookups.get(key)
    if (existing) {
      return existing.firstCall ?? Promise.resolve(this.pendingOutcome(existing))
    }

    const entry: PendingLookup = {
      key,
      startedAt: this.clock(),
      attempts: 0,
      nextPollAt: undefined,
      inFlight: true,
      firstCall: null,
      cancelPoll: null,
      waiters: []
    }
    this.lookups.set(key, entry)
    this.config.cache.markPending(key)
    this.logger.verbose(`Resolving ${key}`)
    entry.firstCall = this.runFirstCall(entry)
    return entry.firstCall
  }

  /**
   * Wait for the terminal outcome of a key currently being resolved.
   * Resolves to undefined when nothing is pending for the key.
   */
  waitFor(key: string): Promise<TerminalOutcome | undefined> {
    const entry = this.lookups.get(key)
    if (!entry) {
      return Promise.resolve(undefined)
    }
    return new Promise((resolve) => {
      entry.waiters.push(resolve)
    })
  }

  inspect(key: string): PendingLookupView | undefined {
    const entry = this.lookups.get(key)
    if (!entry) {
      return undefined
    }
    return {
      key: entry.key,
      startedAt: entry.startedAt,
      attempts: entry.attempts,
      nextPollAt: entry.nextPollAt,
      waiters: entry.waiters.length,
      inFlight: entry.inFlight
    }
  }

  get activeLookups(): number {
    return this.lookups.size
  }

  /**
   * Cancel every scheduled poll and settle waiters with a closed failure.
   */
  close(): void {
    this.closed = true
    const entries = [...this.lookups.values()]
    this.lookups.clear()
    for (const entry of entries) {
      entry.cancelPoll?.()
      entry.cancelPoll = null
      this.config.cache.releasePending(entry.key)
      this.notify(entry, { state: 'unavailable', cause: CLOSED_CAUSE })
    }
  }

  private async runFirstCall(entry: PendingLookup): Promise<LookupOutcome> {
    const response = await this.callBackend(entry.key)
    entry.firstCall = null
    entry.inFlight = false
    if (!this.isCurrent(entry)) {
      return { state: 'unavailable', cause: CLOSED_CAUSE }
    }
    return this.advance(entry, response)
  }

  private async runScheduledPoll(entry: PendingLookup): Promise<void> {
    entry.cancelPoll = null
    if (!this.isCurrent(entry)) {
      return
    }
    entry.nextPollAt = undefined
    entry.inFlight = true
    const response = await this.callBackend(entry.key)
    entry.inFlight = false
    if (!this.isCurrent(entry)) {
      return
    }
    this.advance(entry, response)
  }

  private async callBackend(key: string): Promise<BackendResponse> {
    try {
      return await this.config.transport.call('GET', resolvePath(key))
    } catch (error) {
      return classifyNetworkError(error)
    }
  }

  private isCurrent(entry: PendingLookup): boolean {
    return !this.closed && this.lookups.get(entry.key) === entry
  }

  /**
   * Apply one backend answer to a pending lookup.
   */
  private advance(entry: PendingLookup, response: BackendResponse): LookupOutcome {
    switch (response.kind) {
      case 'found': {
        const record = parseBondRecord(unwrapEnvelope(response.body))
        if (!record) {
          return this.settle(entry, {
            state: 'unavailable',
            cause: { type: 'invalid_response', message: 'Invalid bond record from service' }
          })
        }
        this.write(entry.key, { kind: 'record', record }, this.config.recordTtlSeconds)
        return this.settle(entry, { state: 'resolved', record })
      }

      case 'not_found':
        this.write(entry.key, { kind: 'not_found' }, this.config.notFoundTtlSeconds)
        return this.settle(entry, { state: 'absent' })

      case 'in_progress': {
        entry.attempts++
        if (entry.attempts >= this.config.maxAttempts) {
          this.write(
            entry.key,
            { kind: 'exhausted', attempts: entry.attempts },
            this.config.exhaustedTtlSeconds
          )
          return this.settle(entry, { state: 'exhausted', attempts: entry.attempts })
        }
        const delay = nextPollDelay(entry.attempts, this.config.backoff, response.retryAfterMs)
        entry.nextPollAt = this.clock() + delay
        entry.cancelPoll = this.config.scheduler.schedule(delay, () => this.runScheduledPoll(entry))
        this.logger.verbose(
          `${entry.key} still searching (${entry.attempts}/${this.config.maxAttempts}), next poll in ${delay}ms`
        )
        return this.pendingOutcome(entry)
      }

      case 'transport_failure':
        // Also ends a cycle that was mid-poll: the attempt count is dropped with
        // the lookup and nothing is cached, so the next request starts over at
        // attempt one.
        return this.settle(entry, { state: 'unavailable', cause: response.cause })
    }
  }

  private write(key: string, value: CacheValue, ttlSeconds: number): void {
    if (!this.config.cache.put(key, value, ttlSeconds)) {
      this.logger.verbose(`Cache full of pending lookups, ${key} not cached`)
    }
  }

  private settle(entry: PendingLookup, outcome: TerminalOutcome): TerminalOutcome {
    if (this.lookups.get(entry.key) === entry) {
      this.lookups.delete(entry.key)
    }
    entry.cancelPoll?.()
    entry.cancelPoll = null
    entry.nextPollAt = undefined
    this.config.cache.releasePending(entry.key)
    this.logger.verbose(`${entry.key} ${outcome.state} after ${entry.attempts} in-progress answers`)
    this.notify(entry, outcome)
    return outcome
  }

  private notify(entry: PendingLookup, outcome: TerminalOutcome): void {
    const waiters = entry.waiters.splice(0)
    for (const waiter of waiters) {
      waiter(outcome)
    }
  }

  private pendingOutcome(entry: PendingLookup): LookupOutcome {
    return { state: 'pending', attempts: entry.attempts, maxAttempts: this.config.maxAttempts }
  }
}
