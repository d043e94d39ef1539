import { describe, expect, it } from 'vitest'
import { DEFAULT_SETTINGS, resolveSettings, settingsFromEnv } from './settings'

describe('settings', () => {
  it('defaults every setting', () => {
    expect(resolveSettings()).toEqual(DEFAULT_SETTINGS)
    expect(DEFAULT_SETTINGS.baseUrl).toBe('http://127.0.0.1:8000')
    expect(DEFAULT_SETTINGS.cacheTtlSeconds).toBe(300)
    expect(DEFAULT_SETTINGS.cacheMaxEntries).toBe(500)
  })

  it('lets later layers win', () => {
    const settings = resolveSettings(
      { baseUrl: 'http://config-file:8000', cacheTtlSeconds: 120 },
      { baseUrl: 'http://flag:8000' }
    )

    expect(settings.baseUrl).toBe('http://flag:8000')
    expect(settings.cacheTtlSeconds).toBe(120)
  })

  it('ignores undefined and invalid values', () => {
    const settings = resolveSettings(
      { maxPollAttempts: 8 },
      { maxPollAttempts: 2.5, cacheMaxEntries: -1, cacheTtlSeconds: Number.NaN, baseUrl: '' },
      { maxPollAttempts: undefined }
    )

    expect(settings.maxPollAttempts).toBe(8)
    expect(settings.cacheMaxEntries).toBe(500)
    expect(settings.cacheTtlSeconds).toBe(300)
    expect(settings.baseUrl).toBe('http://127.0.0.1:8000')
  })

  it('reads BONDREF_* environment variables', () => {
    const layer = settingsFromEnv({
      BONDREF_API_URL: ' http://bonds.internal:9000 ',
      BONDREF_API_KEY: 'test-key',
      BONDREF_CACHE_TTL: '60',
      BONDREF_CACHE_SIZE: '50',
      BONDREF_MAX_POLLS: '3',
      BONDREF_TIMEOUT_MS: 'soon'
    })

    expect(resolveSettings(layer)).toEqual({
      ...DEFAULT_SETTINGS,
      baseUrl: 'http://bonds.internal:9000',
      apiKey: 'test-key',
      cacheTtlSeconds: 60,
      cacheMaxEntries: 50,
      maxPollAttempts: 3
    })
  })

  it('treats empty environment values as unset', () => {
    expect(settingsFromEnv({ BONDREF_API_KEY: '', BONDREF_CACHE_TTL: ' ' })).toEqual({
      baseUrl: undefined,
      apiKey: undefined,
      cacheTtlSeconds: undefined,
      cacheMaxEntries: undefined,
      maxPollAttempts: undefined,
      requestTimeoutMs: undefined
    })
  })
})
