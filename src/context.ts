/**
 * Bond Context
 *
 * Owns one lookup stack: transport, cache, coordinator, facade and the
 * periodic sweep of expired entries. Nothing is global; a host creates a
 * context, opens it, and closes it when done.
 */

import { LookupCache } from './cache'
import { type Logger, silentLogger } from './logger'
import {
  type CancelFn,
  createTimerScheduler,
  LookupCoordinator,
  RequestFacade,
  type Scheduler
} from './lookup'
import { resolveSettings, type SettingsLayer } from './settings'
import { type BackendTransport, HttpTransport } from './transport'
import { type ClientSettings, type Clock, systemClock } from './types'

export interface BondContextOptions {
  /** Overrides applied over the defaults */
  readonly settings?: SettingsLayer
  readonly transport?: BackendTransport
  readonly scheduler?: Scheduler
  readonly clock?: Clock
  readonly logger?: Logger
}

type ContextState = 'created' | 'open' | 'closed'

export class BondContext {
  readonly settings: ClientSettings
  readonly cache: LookupCache
  readonly transport: BackendTransport
  private readonly coordinator: LookupCoordinator
  private readonly requestFacade: RequestFacade
  private readonly scheduler: Scheduler
  private readonly logger: Logger
  private state: ContextState = 'created'
  private cancelSweep: CancelFn | null = null

  constructor(options: BondContextOptions = {}) {
    this.settings = resolveSettings(options.settings ?? {})
    this.logger = options.logger ?? silentLogger
    const clock = options.clock ?? systemClock
    this.scheduler = options.scheduler ?? createTimerScheduler(this.logger)
    this.transport =
      options.transport ??
      new HttpTransport({
        baseUrl: this.settings.baseUrl,
        timeoutMs: this.settings.requestTimeoutMs,
        logger: this.logger
      })
    this.cache = new LookupCache({
      maxEntries: this.settings.cacheMaxEntries,
      ttlSeconds: this.settings.cacheTtlSeconds,
      clock
    })
    this.coordinator = new LookupCoordinator({
      transport: this.transport,
      cache: this.cache,
      scheduler: this.scheduler,
      clock,
      logger: this.logger,
      maxAttempts: this.settings.maxPollAttempts,
      backoff: {
        baseDelayMs: this.settings.pollBaseDelayMs,
        maxDelayMs: this.settings.pollMaxDelayMs
      },
      recordTtlSeconds: this.settings.cacheTtlSeconds,
      notFoundTtlSeconds: this.settings.notFoundTtlSeconds,
      exhaustedTtlSeconds: this.settings.exhaustedTtlSeconds
    })
    this.requestFacade = new RequestFacade({
      cache: this.cache,
      coordinator: this.coordinator,
      transport: this.transport,
      logger: this.logger
    })
  }

  static open(options: BondContextOptions = {}): BondContext {
    return new BondContext(options).open()
  }

  get isOpen(): boolean {
    return this.state === 'open'
  }

  get isClosed(): boolean {
    return this.state === 'closed'
  }

  /**
   * Facade of this context. Throws once the context is closed.
   */
  get facade(): RequestFacade {
    this.assertNotClosed()
    return this.requestFacade
  }

  get lookups(): LookupCoordinator {
    this.assertNotClosed()
    return this.coordinator
  }

  /**
   * Start the periodic sweep. Calling it again is a no-op.
   */
  open(): this {
    this.assertNotClosed()
    if (this.state === 'open') {
      return this
    }
    this.state = 'open'
    this.scheduleSweep()
    this.logger.verbose(`Bond context open (service: ${this.settings.baseUrl})`)
    return this
  }

  /**
   * Stop the sweep, settle pending lookups and release the connection pool.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return
    }
    this.state = 'closed'
    this.cancelSweep?.()
    this.cancelSweep = null
    this.coordinator.close()
    await this.transport.close()
    this.logger.verbose('Bond context closed')
  }

  private scheduleSweep(): void {
    this.cancelSweep = this.scheduler.schedule(this.settings.sweepIntervalMs, async () => {
      this.cancelSweep = null
      if (this.state !== 'open') {
        return
      }
      const dropped = this.cache.sweep()
      if (dropped > 0) {
        this.logger.verbose(`Swept ${dropped} expired cache entries`)
      }
      this.scheduleSweep()
    })
  }

  private assertNotClosed(): void {
    if (this.state === 'closed') {
      throw new Error('BondContext is closed')
    }
  }
}
