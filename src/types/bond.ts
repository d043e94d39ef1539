/**
 * Bond Types
 *
 * Reference-data records as returned by the bond data service.
 */

/**
 * Scalar value of a single record field.
 */
export type FieldValue = string | number | boolean | null

/**
 * A resolved bond record: field name to scalar value.
 */
export type BondRecord = Readonly<Record<string, FieldValue>>

export type SecurityType = 'NOMINAL' | 'INDEX_LINKED'

/**
 * Filters accepted by the bond list endpoint, keyed by filter name
 * (country, security_type, currency, maturity_from, maturity_to,
 * min_coupon, max_coupon) plus `limit`.
 */
export type ListParams = Readonly<Record<string, string | number | undefined>>
