/**
 * bondref Core Library
 *
 * Cached, non-blocking lookups of government bond reference data. A context
 * owns the connection pool, the cache and the background polls; the bond
 * functions are the caller-facing surface a host registers.
 *
 * @license AGPL-3.0
 */

// Bond identifiers, fields and records
export {
  BOND_FIELDS,
  type BondField,
  COUNTRY_CODES,
  type CountryCode,
  FIELD_ALIASES,
  INFO_COLUMNS,
  isValidIsin,
  normalizeKey,
  parseBondRecord,
  projectField,
  resolveFieldName,
  validateKey
} from './bonds'
// Cache module
export {
  type CacheEntry,
  type CacheStats,
  type CacheValue,
  generateListCacheKey,
  LookupCache,
  type LookupCacheOptions
} from './cache'
// Context
export { BondContext, type BondContextOptions } from './context'
// Errors
export {
  classify,
  type ErrorKind,
  isErrorText,
  isTransient,
  type LookupError,
  renderError
} from './errors'
// Caller-facing functions
export {
  type BondFunctions,
  type BondFunctionsOptions,
  createBondFunctions,
  FUNCTION_REGISTRY,
  type FunctionDescriptor,
  type FunctionName,
  getFunctionDescriptor,
  invokeFunction
} from './functions'
// Logging
export { createLogger, type Logger, silentLogger } from './logger'
// Lookup orchestration
export {
  createTimerScheduler,
  type LookupOutcome,
  LookupCoordinator,
  type LookupResult,
  nextPollDelay,
  RequestFacade,
  type Scheduler
} from './lookup'
// Settings
export { DEFAULT_SETTINGS, resolveSettings, type SettingsLayer, settingsFromEnv } from './settings'
// Transport
export { type BackendTransport, HttpTransport, type TransportConfig } from './transport'
// Types
export type {
  BackendResponse,
  BondRecord,
  CellResult,
  CellTable,
  CellValue,
  ClientSettings,
  Clock,
  Result
} from './types'
export { err, ok } from './types'
export { VERSION } from './version'
