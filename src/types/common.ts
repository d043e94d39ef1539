/**
 * Common Types
 *
 * Shared types used across modules: Result, cell values, clock.
 */

// Result Types
export type Result<T, E> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly error: E }

export function ok<T>(value: T): { readonly ok: true; readonly value: T } {
  return { ok: true, value }
}

export function err<E>(error: E): { readonly ok: false; readonly error: E } {
  return { ok: false, error }
}

// Cell Types
/**
 * A single value as a spreadsheet cell would hold it.
 */
export type CellValue = string | number | boolean

/**
 * A rectangular block of cells (rows of columns) that spills across a sheet.
 */
export type CellTable = readonly (readonly CellValue[])[]

export type CellResult = CellValue | CellTable

/**
 * Milliseconds since the epoch. Injected so expiry and polling can be driven by tests.
 */
export type Clock = () => number

export const systemClock: Clock = () => Date.now()
