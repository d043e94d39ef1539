/**
 * Client Settings
 *
 * Defaults, environment overrides and layer merging. Later layers win; a
 * number that is not a valid value for its setting is ignored so the layer
 * below shows through.
 */

import type { ClientSettings } from './types'

export const DEFAULT_SETTINGS: ClientSettings = {
  baseUrl: 'http://127.0.0.1:8000',
  apiKey: undefined,
  cacheTtlSeconds: 300,
  notFoundTtlSeconds: 60,
  exhaustedTtlSeconds: 30,
  cacheMaxEntries: 500,
  maxPollAttempts: 5,
  requestTimeoutMs: 10_000,
  pollBaseDelayMs: 1000,
  pollMaxDelayMs: 15_000,
  sweepIntervalMs: 60_000
}

export type SettingsLayer = Partial<ClientSettings>

type NumericSetting = {
  [K in keyof ClientSettings]-?: ClientSettings[K] extends number ? K : never
}[keyof ClientSettings]

const INTEGER_SETTINGS: ReadonlySet<NumericSetting> = new Set<NumericSetting>([
  'cacheMaxEntries',
  'maxPollAttempts'
])

export const ENV_VARS = {
  baseUrl: 'BONDREF_API_URL',
  apiKey: 'BONDREF_API_KEY',
  cacheTtlSeconds: 'BONDREF_CACHE_TTL',
  cacheMaxEntries: 'BONDREF_CACHE_SIZE',
  maxPollAttempts: 'BONDREF_MAX_POLLS',
  requestTimeoutMs: 'BONDREF_TIMEOUT_MS'
} as const

function isValidNumber(key: NumericSetting, value: number): boolean {
  if (!Number.isFinite(value) || value <= 0) {
    return false
  }
  return !INTEGER_SETTINGS.has(key) || Number.isInteger(value)
}

function envNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined
  }
  return Number(raw)
}

function envText(raw: string | undefined): string | undefined {
  const value = raw?.trim()
  return value ? value : undefined
}

/**
 * Settings named by BONDREF_* environment variables.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): SettingsLayer {
  return {
    baseUrl: envText(env[ENV_VARS.baseUrl]),
    apiKey: envText(env[ENV_VARS.apiKey]),
    cacheTtlSeconds: envNumber(env[ENV_VARS.cacheTtlSeconds]),
    cacheMaxEntries: envNumber(env[ENV_VARS.cacheMaxEntries]),
    maxPollAttempts: envNumber(env[ENV_VARS.maxPollAttempts]),
    requestTimeoutMs: envNumber(env[ENV_VARS.requestTimeoutMs])
  }
}

function pickNumber(key: NumericSetting, layers: readonly SettingsLayer[]): number {
  let value = DEFAULT_SETTINGS[key]
  for (const layer of layers) {
    const candidate = layer[key]
    if (candidate !== undefined && isValidNumber(key, candidate)) {
      value = candidate
    }
  }
  return value
}

function pickText(
  key: 'baseUrl' | 'apiKey',
  layers: readonly SettingsLayer[]
): string | undefined {
  let value = DEFAULT_SETTINGS[key]
  for (const layer of layers) {
    const candidate = layer[key]
    if (candidate !== undefined && candidate !== '') {
      value = candidate
    }
  }
  return value
}

/**
 * Merge layers over the defaults, lowest precedence first.
 */
export function resolveSettings(...layers: SettingsLayer[]): ClientSettings {
  return {
    baseUrl: pickText('baseUrl', layers) ?? DEFAULT_SETTINGS.baseUrl,
    apiKey: pickText('apiKey', layers),
    cacheTtlSeconds: pickNumber('cacheTtlSeconds', layers),
    notFoundTtlSeconds: pickNumber('notFoundTtlSeconds', layers),
    exhaustedTtlSeconds: pickNumber('exhaustedTtlSeconds', layers),
    cacheMaxEntries: pickNumber('cacheMaxEntries', layers),
    maxPollAttempts: pickNumber('maxPollAttempts', layers),
    requestTimeoutMs: pickNumber('requestTimeoutMs', layers),
    pollBaseDelayMs: pickNumber('pollBaseDelayMs', layers),
    pollMaxDelayMs: pickNumber('pollMaxDelayMs', layers),
    sweepIntervalMs: pickNumber('sweepIntervalMs', layers)
  }
}
