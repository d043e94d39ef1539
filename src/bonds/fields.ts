/**
 * Bond Fields
 *
 * Static lookup data: known record fields, caller shorthands, supported
 * countries and the column layout of a full record row.
 */

import type { SecurityType } from '../types'

/**
 * Record fields the service knows about, with a short description for help output.
 */
export const BOND_FIELDS = {
  isin: 'ISIN identifier',
  cusip: 'CUSIP (US bonds)',
  sedol: 'SEDOL (UK bonds)',
  name: 'Bond name',
  country: 'Country code (US, GB, DE...)',
  issuer: 'Issuing entity',
  security_type: 'NOMINAL or INDEX_LINKED',
  currency: 'Currency code (USD, GBP, EUR...)',
  coupon_rate: 'Coupon rate',
  coupon_frequency: 'Payments per year (1=annual, 2=semi)',
  day_count_convention: 'Day count method',
  maturity_date: 'Maturity date',
  issue_date: 'Issue date',
  first_coupon_date: 'First coupon payment date',
  outstanding_amount: 'Amount outstanding',
  original_tenor: 'Original term (e.g., 10Y)'
} as const satisfies Record<string, string>

export type BondField = keyof typeof BOND_FIELDS

export const FIELD_ALIASES: Readonly<Record<string, BondField>> = {
  coupon: 'coupon_rate',
  maturity: 'maturity_date',
  issue: 'issue_date',
  type: 'security_type',
  freq: 'coupon_frequency',
  frequency: 'coupon_frequency'
}

export const COUNTRY_CODES = {
  US: 'United States',
  GB: 'United Kingdom',
  DE: 'Germany',
  FR: 'France',
  IT: 'Italy',
  ES: 'Spain',
  JP: 'Japan',
  NL: 'Netherlands'
} as const satisfies Record<string, string>

export type CountryCode = keyof typeof COUNTRY_CODES

// Supranational and Eurobond prefixes accepted alongside country codes
export const EXTRA_ISIN_PREFIXES: readonly string[] = ['XS', 'EU']

export const SECURITY_TYPES: readonly SecurityType[] = ['NOMINAL', 'INDEX_LINKED']

/**
 * Columns of a full record row, in display order.
 */
export const INFO_COLUMNS: ReadonlyArray<{ readonly field: BondField; readonly header: string }> = [
  { field: 'isin', header: 'ISIN' },
  { field: 'name', header: 'Name' },
  { field: 'country', header: 'Country' },
  { field: 'issuer', header: 'Issuer' },
  { field: 'security_type', header: 'Type' },
  { field: 'currency', header: 'Currency' },
  { field: 'coupon_rate', header: 'Coupon %' },
  { field: 'coupon_frequency', header: 'Frequency' },
  { field: 'maturity_date', header: 'Maturity' },
  { field: 'issue_date', header: 'Issue Date' },
  { field: 'outstanding_amount', header: 'Outstanding' }
]

export function isBondField(name: string): name is BondField {
  return Object.hasOwn(BOND_FIELDS, name)
}

export function isCountryCode(code: string): code is CountryCode {
  return Object.hasOwn(COUNTRY_CODES, code)
}

export function isSecurityType(value: string): value is SecurityType {
  return value === 'NOMINAL' || value === 'INDEX_LINKED'
}
