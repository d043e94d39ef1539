import { describe, expect, it, vi } from 'vitest'
import { renderError } from '../errors'
import { createBond, createTestStack, failure, found, inProgress, notFound } from '../test-support'
import { resolvePath } from './coordinator'
import { LIST_PATH } from './facade'

const KEY = 'AA000000000X'
const MISSING = 'ZZ999999999Z'

describe('RequestFacade', () => {
  describe('resolve', () => {
    it('returns a field of a resolved record and serves repeats from the cache', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), found({ isin: KEY, coupon_rate: 4.625 }))

      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({ ok: true, value: 4.625 })
      expect(await facade.resolve(' aa000000000x ', 'coupon')).toEqual({ ok: true, value: 4.625 })

      expect(transport.callsTo(resolvePath(KEY))).toBe(1)
      expect(facade.stats()).toMatchObject({ hits: 1, misses: 1, size: 1 })
    })

    it('projects null and missing fields to an empty string', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(resolvePath('GB00BYZW3G56'), found(createBond()))

      expect(await facade.resolve('GB00BYZW3G56', 'cusip')).toEqual({ ok: true, value: '' })
      expect(await facade.resolve('GB00BYZW3G56', 'first_coupon_date')).toEqual({
        ok: true,
        value: '2017-01-22'
      })
    })

    it('caches confirmed absence for the not-found TTL', async () => {
      const { scheduler, transport, facade } = createTestStack()
      transport.enqueue(resolvePath(MISSING), notFound())

      const first = await facade.resolve(MISSING, 'coupon_rate')
      expect(first).toEqual({
        ok: false,
        error: { kind: 'not_found', message: 'Bond not found: ZZ999999999Z' }
      })

      await scheduler.advance(59_000)
      expect(await facade.resolve(MISSING, 'coupon_rate')).toEqual(first)
      expect(transport.callsTo(resolvePath(MISSING))).toBe(1)

      await scheduler.advance(1000)
      await facade.resolve(MISSING, 'coupon_rate')
      expect(transport.callsTo(resolvePath(MISSING))).toBe(2)
    })

    it('reports progress while the service searches, then the value', async () => {
      const { scheduler, transport, facade } = createTestStack()
      transport.enqueue(
        resolvePath(KEY),
        inProgress(),
        inProgress(),
        inProgress(),
        found({ isin: KEY, coupon_rate: 4.625 })
      )

      const first = await facade.resolve(KEY, 'coupon_rate')
      expect(first.ok).toBe(false)
      if (!first.ok) {
        expect(first.error).toEqual({
          kind: 'lookup_in_progress',
          message: 'Searching for AA000000000X (attempt 1/5)'
        })
        expect(renderError(first.error)).toBe('⏳ Searching for AA000000000X (attempt 1/5)')
      }

      await scheduler.advance(1000)
      const second = await facade.resolve(KEY, 'coupon_rate')
      expect(second.ok ? undefined : second.error.message).toBe(
        'Searching for AA000000000X (attempt 2/5)'
      )

      await scheduler.runAll()
      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({ ok: true, value: 4.625 })
      expect(transport.callsTo(resolvePath(KEY))).toBe(4)
    })

    it('gives up after the attempt ceiling and remembers it briefly', async () => {
      const { scheduler, transport, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), inProgress())

      await facade.resolve(KEY, 'coupon_rate')
      await scheduler.runAll()

      expect(transport.callsTo(resolvePath(KEY))).toBe(5)
      expect(scheduler.now()).toBe(15_000)

      const exhausted = await facade.resolve(KEY, 'coupon_rate')
      expect(exhausted).toEqual({
        ok: false,
        error: {
          kind: 'not_found',
          message: 'Bond not found: AA000000000X (search gave up after 5 attempts)'
        }
      })
      expect(transport.callsTo(resolvePath(KEY))).toBe(5)

      await scheduler.advance(30_000)
      await facade.resolve(KEY, 'coupon_rate')
      expect(transport.callsTo(resolvePath(KEY))).toBe(6)
    })

    it('rejects malformed keys without touching the cache or the network', async () => {
      const { transport, facade } = createTestStack()

      const result = await facade.resolve('BADKEY', 'coupon_rate')

      expect(result).toEqual({
        ok: false,
        error: { kind: 'validation_error', message: 'Invalid ISIN format: BADKEY' }
      })
      expect(transport.calls).toHaveLength(0)
      expect(facade.stats()).toMatchObject({ hits: 0, misses: 0, size: 0 })
    })

    it('rejects unknown fields before any lookup', async () => {
      const { transport, facade } = createTestStack()

      expect(await facade.resolve(KEY, 'yield')).toEqual({
        ok: false,
        error: { kind: 'field_not_found', message: 'Unknown field: yield' }
      })
      expect(await facade.resolve(KEY, '')).toEqual({
        ok: false,
        error: { kind: 'validation_error', message: 'Field required' }
      })
      expect(transport.calls).toHaveLength(0)
    })

    it('surfaces timeouts without caching them', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), failure(), found({ isin: KEY, coupon_rate: 4.625 }))

      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({
        ok: false,
        error: {
          kind: 'backend_unavailable',
          message: 'Timeout - is the bond data service running?'
        }
      })
      expect(facade.stats().size).toBe(0)

      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({ ok: true, value: 4.625 })
      expect(transport.callsTo(resolvePath(KEY))).toBe(2)
    })
  })

  describe('waiting for resolution', () => {
    it('waits for background polls to settle', async () => {
      const { scheduler, transport, coordinator, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), inProgress(), found({ isin: KEY }))

      const waiting = facade.resolveRecord(KEY, { wait: true })
      await vi.waitFor(() => expect(coordinator.inspect(KEY)?.waiters).toBe(1))
      await scheduler.runAll()

      expect(await waiting).toEqual({ ok: true, value: { isin: KEY } })
    })

    it('waits for a single field too', async () => {
      const { scheduler, transport, coordinator, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), inProgress(), found({ isin: KEY, coupon_rate: 4.625 }))

      const waiting = facade.resolve(KEY, 'coupon', { wait: true })
      await vi.waitFor(() => expect(coordinator.inspect(KEY)?.waiters).toBe(1))
      await scheduler.runAll()

      expect(await waiting).toEqual({ ok: true, value: 4.625 })
    })

    it('returns terminal answers straight away', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(resolvePath(MISSING), notFound())

      const result = await facade.resolveRecord(MISSING, { wait: true })

      expect(result.ok ? undefined : result.error.kind).toBe('not_found')
    })
  })

  describe('list', () => {
    it('caches rows under the filter key', async () => {
      const { transport, cache, facade } = createTestStack()
      transport.enqueue(LIST_PATH, found({ data: [{ isin: 'GB00BYZW3G56' }, { isin: 'GB00B3LZBF68' }] }))

      const first = await facade.list({ country: 'GB', limit: 10 })
      const second = await facade.list({ limit: 10, country: 'GB', currency: undefined })

      expect(first).toEqual({ ok: true, value: [{ isin: 'GB00BYZW3G56' }, { isin: 'GB00B3LZBF68' }] })
      expect(second).toEqual(first)
      expect(transport.callsTo(LIST_PATH)).toBe(1)
      expect(transport.calls[0]?.options.params).toEqual({ country: 'GB', limit: 10 })
      expect(cache.peek('list:{"country":"GB","limit":10}')?.value.kind).toBe('rows')
    })

    it('treats 404 as an empty list', async () => {
      const { facade } = createTestStack()

      expect(await facade.list({ country: 'JP' })).toEqual({ ok: true, value: [] })
    })

    it('reports malformed list bodies', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(LIST_PATH, found({ total: 3 }))

      expect(await facade.list({})).toEqual({
        ok: false,
        error: { kind: 'backend_unavailable', message: 'Invalid bond list from service' }
      })
    })
  })

  describe('fetch', () => {
    it('unwraps enveloped bodies', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue('/lineage/DE0001102580', found({ data: { contributing_sources: ['bund'] } }))

      expect(await facade.fetch('GET', '/lineage/DE0001102580')).toEqual({
        ok: true,
        value: { contributing_sources: ['bund'] }
      })
    })

    it('reports missing endpoints by path', async () => {
      const { facade } = createTestStack()

      expect(await facade.fetch('GET', '/stats')).toEqual({
        ok: false,
        error: { kind: 'not_found', message: 'Not found: /stats' }
      })
    })

    it('names the subject in not-found errors', async () => {
      const { facade } = createTestStack()

      expect(await facade.fetch('GET', '/history/DE0001102580', {}, 'DE0001102580')).toEqual({
        ok: false,
        error: { kind: 'not_found', message: 'Bond not found: DE0001102580' }
      })
    })
  })

  describe('at full capacity', () => {
    const keys = ['AA000000001X', 'AA000000002X', 'AA000000003X', 'AA000000004X']

    it('caches a resolved record in a cache of one slot', async () => {
      const { transport, facade } = createTestStack({ cacheMaxEntries: 1 })
      transport.enqueue(resolvePath(KEY), found({ isin: KEY, coupon_rate: 4.625 }))

      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({ ok: true, value: 4.625 })
      expect(await facade.resolve(KEY, 'coupon_rate')).toEqual({ ok: true, value: 4.625 })

      expect(transport.callsTo(resolvePath(KEY))).toBe(1)
      expect(facade.stats()).toMatchObject({ size: 1, pending: 0, evictions: 0, hits: 1 })
    })

    it('evicts one entry per new key and keeps the newest', async () => {
      const { transport, cache, facade } = createTestStack({ cacheMaxEntries: 3 })
      for (const key of keys) {
        transport.enqueue(resolvePath(key), found({ isin: key }))
        expect(await facade.resolveRecord(key)).toEqual({ ok: true, value: { isin: key } })
      }

      expect(facade.stats()).toMatchObject({ size: 3, evictions: 1, pending: 0 })
      expect(cache.peek('AA000000001X')).toBeUndefined()

      expect(await facade.resolveRecord('AA000000004X')).toEqual({
        ok: true,
        value: { isin: 'AA000000004X' }
      })
      expect(transport.callsTo(resolvePath('AA000000004X'))).toBe(1)
      expect(facade.stats()).toMatchObject({ size: 3, evictions: 1, hits: 1 })
    })
  })

  describe('administration', () => {
    it('invalidates a normalized key', async () => {
      const { transport, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), found({ isin: KEY }))
      await facade.resolveRecord(KEY)

      expect(facade.invalidate(' aa000000000x')).toBe(true)
      expect(facade.invalidate(KEY)).toBe(false)

      await facade.resolveRecord(KEY)
      expect(transport.callsTo(resolvePath(KEY))).toBe(2)
    })

    it('clears every entry but keeps in-flight lookups', async () => {
      const { transport, cache, facade } = createTestStack()
      transport.enqueue(resolvePath(KEY), inProgress())
      transport.enqueue(resolvePath(MISSING), notFound())

      await facade.resolveRecord(KEY)
      await facade.resolveRecord(MISSING)

      expect(facade.clearCache()).toBe(1)
      expect(cache.isPending(KEY)).toBe(true)
      expect(facade.stats()).toMatchObject({ size: 1, pending: 1, hits: 0, misses: 0 })
    })
  })
})
