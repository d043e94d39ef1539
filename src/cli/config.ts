/**
 * CLI Configuration
 *
 * Persistent settings stored in ~/.config/bondref/config.json (XDG standard).
 * A custom location can be given with --config-file or the BONDREF_CONFIG env var.
 */

import { existsSync } from 'node:fs'
import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { homedir } from 'node:os'
import { dirname, join } from 'node:path'
import type { SettingsLayer } from '../settings'
import { err, ok, type Result } from '../types'

export const CONFIG_ENV_VAR = 'BONDREF_CONFIG'

/** Config keys that accept string values */
const STRING_KEYS = ['apiUrl', 'apiKey'] as const
/** Config keys that accept number values */
const NUMBER_KEYS = [
  'cacheTtlSeconds',
  'notFoundTtlSeconds',
  'exhaustedTtlSeconds',
  'cacheMaxEntries',
  'maxPollAttempts',
  'requestTimeoutMs',
  'pollBaseDelayMs',
  'pollMaxDelayMs',
  'sweepIntervalMs'
] as const

type StringConfigKey = (typeof STRING_KEYS)[number]
type NumberConfigKey = (typeof NUMBER_KEYS)[number]

export type ConfigKey = StringConfigKey | NumberConfigKey
export type ConfigValue = string | number

/**
 * All persistable CLI settings.
 */
export type Config = { [K in StringConfigKey]?: string } & {
  [K in NumberConfigKey]?: number
} & {
  /** When settings were last updated */
  updatedAt?: string
}

/** Descriptions for config keys (for help output) */
const CONFIG_DESCRIPTIONS: Record<ConfigKey, string> = {
  apiUrl: 'Base URL of the bond data service (default: http://127.0.0.1:8000)',
  apiKey: 'API key sent with refresh requests',
  cacheTtlSeconds: 'Seconds a resolved bond stays cached (default: 300)',
  notFoundTtlSeconds: 'Seconds a "not found" answer stays cached (default: 60)',
  exhaustedTtlSeconds: 'Seconds an abandoned search stays cached (default: 30)',
  cacheMaxEntries: 'Maximum cached entries (default: 500)',
  maxPollAttempts: '"Still searching" answers tolerated per lookup (default: 5)',
  requestTimeoutMs: 'Timeout of each request in ms (default: 10000)',
  pollBaseDelayMs: 'First poll delay in ms, doubled per attempt (default: 1000)',
  pollMaxDelayMs: 'Longest poll delay in ms (default: 15000)',
  sweepIntervalMs: 'Interval of the expired-entry sweep in ms (default: 60000)'
}

function isStringKey(key: string): key is StringConfigKey {
  return STRING_KEYS.some((k) => k === key)
}

function isNumberKey(key: string): key is NumberConfigKey {
  return NUMBER_KEYS.some((k) => k === key)
}

/**
 * Check if a string is a valid config key.
 */
export function isValidConfigKey(key: string): key is ConfigKey {
  return isStringKey(key) || isNumberKey(key)
}

/**
 * Get all valid config keys (sorted alphabetically).
 */
export function getValidConfigKeys(): ConfigKey[] {
  return [...STRING_KEYS, ...NUMBER_KEYS].sort()
}

export function getConfigType(key: ConfigKey): string {
  return isNumberKey(key) ? 'number' : 'string'
}

export function getConfigDescription(key: ConfigKey): string {
  return CONFIG_DESCRIPTIONS[key]
}

function getDefaultConfigDir(): string {
  return join(homedir(), '.config', 'bondref')
}

/**
 * Get the config file path.
 * Priority: configFile arg > BONDREF_CONFIG env var > default XDG path
 */
export function getConfigPath(configFile?: string): string {
  if (configFile) {
    return configFile
  }
  const fromEnv = process.env[CONFIG_ENV_VAR]
  if (fromEnv) {
    return fromEnv
  }
  return join(getDefaultConfigDir(), 'config.json')
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value)
}

/**
 * Keep only known keys holding a value of the right type.
 */
export function sanitizeConfig(raw: unknown): Config {
  const config: Config = {}
  if (!isObject(raw)) {
    return config
  }
  for (const key of STRING_KEYS) {
    const value = raw[key]
    if (typeof value === 'string') config[key] = value
  }
  for (const key of NUMBER_KEYS) {
    const value = raw[key]
    if (typeof value === 'number' && Number.isFinite(value)) config[key] = value
  }
  if (typeof raw.updatedAt === 'string') {
    config.updatedAt = raw.updatedAt
  }
  return config
}

/**
 * Load config from the config file.
 * Returns null if the file doesn't exist or isn't valid JSON.
 */
export async function loadConfig(configFile?: string): Promise<Config | null> {
  const path = getConfigPath(configFile)
  if (!existsSync(path)) {
    return null
  }
  const content = await readFile(path, 'utf-8')
  try {
    return sanitizeConfig(JSON.parse(content))
  } catch {
    return null
  }
}

/**
 * Save config to the config file, creating parent directories if needed.
 */
export async function saveConfig(config: Config, configFile?: string): Promise<void> {
  const path = getConfigPath(configFile)
  await mkdir(dirname(path), { recursive: true })
  const withTimestamp: Config = {
    ...config,
    updatedAt: new Date().toISOString()
  }
  await writeFile(path, JSON.stringify(withTimestamp, null, 2))
}

/**
 * Parse a command-line value into the type of a config key.
 */
export function parseConfigValue(key: ConfigKey, value: string): Result<ConfigValue, string> {
  if (isStringKey(key)) {
    return ok(value)
  }
  const trimmed = value.trim()
  const parsed = Number(trimmed)
  if (trimmed === '' || !Number.isFinite(parsed) || parsed <= 0) {
    return err(`${key} must be a positive number, got "${value}"`)
  }
  if ((key === 'cacheMaxEntries' || key === 'maxPollAttempts') && !Number.isInteger(parsed)) {
    return err(`${key} must be a whole number, got "${value}"`)
  }
  return ok(parsed)
}

export function formatConfigValue(value: ConfigValue | undefined): string {
  return value === undefined ? '' : String(value)
}

/**
 * Set a single config value and save.
 */
export async function setConfigValue(
  key: ConfigKey,
  value: ConfigValue,
  configFile?: string
): Promise<void> {
  const config: Config = (await loadConfig(configFile)) ?? {}
  if (isStringKey(key) && typeof value === 'string') {
    config[key] = value
  } else if (isNumberKey(key) && typeof value === 'number') {
    config[key] = value
  } else {
    throw new Error(`Wrong value type for ${key}: ${typeof value}`)
  }
  await saveConfig(config, configFile)
}

/**
 * Unset (remove) a config value and save.
 */
export async function unsetConfigValue(key: ConfigKey, configFile?: string): Promise<void> {
  const config = (await loadConfig(configFile)) ?? {}
  delete config[key]
  await saveConfig(config, configFile)
}

/**
 * The persisted values as a settings layer. apiUrl becomes baseUrl; every
 * numeric key shares its name with the setting it configures.
 */
export function configToSettings(config: Config | null): SettingsLayer {
  if (!config) {
    return {}
  }
  const layer: { -readonly [K in keyof SettingsLayer]: SettingsLayer[K] } = {
    baseUrl: config.apiUrl,
    apiKey: config.apiKey
  }
  for (const key of NUMBER_KEYS) {
    layer[key] = config[key]
  }
  return layer
}
