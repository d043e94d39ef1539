/**
 * Identifier and field-name validation. Pure; nothing here touches the cache
 * or the network.
 */

import type { ValidationFailure } from '../errors'
import { err, ok, type Result } from '../types'
import { type BondField, EXTRA_ISIN_PREFIXES, FIELD_ALIASES, isBondField, isCountryCode } from './fields'

/**
 * Accepted lookup keys: two letters then ten alphanumerics.
 */
export const KEY_PATTERN = /^[A-Z]{2}[A-Z0-9]{10}$/

/**
 * Strict ISIN shape: two letters, nine alphanumerics, one check digit.
 */
export const ISIN_PATTERN = /^[A-Z]{2}[A-Z0-9]{9}[0-9]$/

export function normalizeKey(raw: string | null | undefined): string {
  return (raw ?? '').trim().toUpperCase()
}

export function normalizeFieldName(raw: string | null | undefined): string {
  return (raw ?? '').trim().toLowerCase()
}

export function validateKey(raw: string | null | undefined): Result<string, ValidationFailure> {
  const key = normalizeKey(raw)
  if (key === '') {
    return err({ reason: 'missing_key' })
  }
  if (!KEY_PATTERN.test(key)) {
    return err({ reason: 'malformed_key', value: key })
  }
  return ok(key)
}

/**
 * Resolve a caller-supplied field name (shorthands included) to a known field.
 */
export function resolveFieldName(raw: string | null | undefined): Result<BondField, ValidationFailure> {
  const name = normalizeFieldName(raw)
  if (name === '') {
    return err({ reason: 'missing_field' })
  }
  const resolved = FIELD_ALIASES[name] ?? name
  if (!isBondField(resolved)) {
    return err({ reason: 'unknown_field', value: resolved })
  }
  return ok(resolved)
}

/**
 * Strict ISIN check: format plus a supported country or Eurobond prefix.
 * The check digit itself is not verified.
 */
export function isValidIsin(raw: string | null | undefined): boolean {
  const isin = normalizeKey(raw)
  if (!ISIN_PATTERN.test(isin)) {
    return false
  }
  const prefix = isin.slice(0, 2)
  return isCountryCode(prefix) || EXTRA_ISIN_PREFIXES.includes(prefix)
}
