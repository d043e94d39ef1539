/**
 * Error Classifier
 *
 * Pure mapping from every failure the lookup path can produce into the fixed
 * taxonomy callers see, plus the one-line rendering used in cells and on the
 * command line.
 */

import type { NegativeSentinel } from '../cache/types'
import type { LookupOutcome } from '../lookup/coordinator'
import type { BackendFailureResponse } from '../types'

export type ErrorKind =
  | 'validation_error'
  | 'not_found'
  | 'lookup_in_progress'
  | 'backend_unavailable'
  | 'field_not_found'

export interface LookupError {
  readonly kind: ErrorKind
  readonly message: string
}

export type ValidationReason =
  | 'missing_key'
  | 'malformed_key'
  | 'missing_field'
  | 'unknown_field'
  | 'invalid_argument'

export interface ValidationFailure {
  readonly reason: ValidationReason
  /** The offending input, normalized */
  readonly value?: string | undefined
  /** Complete message for `invalid_argument` failures */
  readonly detail?: string | undefined
}

export type ClassifierInput =
  | { readonly source: 'validation'; readonly failure: ValidationFailure }
  | { readonly source: 'backend'; readonly key: string; readonly response: BackendFailureResponse }
  | { readonly source: 'cache'; readonly key: string; readonly sentinel: NegativeSentinel }
  | {
      readonly source: 'lookup'
      readonly key: string
      readonly outcome: Exclude<LookupOutcome, { readonly state: 'resolved' }>
    }

function validationMessage(failure: ValidationFailure): string {
  switch (failure.reason) {
    case 'missing_key':
      return 'ISIN required'
    case 'malformed_key':
      return `Invalid ISIN format: ${failure.value ?? ''}`
    case 'missing_field':
      return 'Field required'
    case 'unknown_field':
      return `Unknown field: ${failure.value ?? ''}`
    case 'invalid_argument':
      return failure.detail ?? `Invalid argument: ${failure.value ?? ''}`
  }
}

function notFound(key: string): LookupError {
  return { kind: 'not_found', message: `Bond not found: ${key}` }
}

function exhausted(key: string, attempts: number): LookupError {
  return {
    kind: 'not_found',
    message: `Bond not found: ${key} (search gave up after ${attempts} attempts)`
  }
}

function inProgress(key: string, attempts: number, maxAttempts: number): LookupError {
  return {
    kind: 'lookup_in_progress',
    message: `Searching for ${key} (attempt ${attempts}/${maxAttempts})`
  }
}

function fromBackend(key: string, response: BackendFailureResponse): LookupError {
  switch (response.kind) {
    case 'not_found':
      return notFound(key)
    case 'in_progress':
      return { kind: 'lookup_in_progress', message: `Searching for ${key}` }
    case 'transport_failure':
      return { kind: 'backend_unavailable', message: response.cause.message }
  }
}

function fromOutcome(
  key: string,
  outcome: Exclude<LookupOutcome, { readonly state: 'resolved' }>
): LookupError {
  switch (outcome.state) {
    case 'absent':
      return notFound(key)
    case 'exhausted':
      return exhausted(key, outcome.attempts)
    case 'pending':
      return inProgress(key, outcome.attempts, outcome.maxAttempts)
    case 'unavailable':
      return { kind: 'backend_unavailable', message: outcome.cause.message }
  }
}

export function classify(input: ClassifierInput): LookupError {
  switch (input.source) {
    case 'validation':
      return {
        kind: input.failure.reason === 'unknown_field' ? 'field_not_found' : 'validation_error',
        message: validationMessage(input.failure)
      }
    case 'backend':
      return fromBackend(input.key, input.response)
    case 'cache':
      return input.sentinel.kind === 'exhausted'
        ? exhausted(input.key, input.sentinel.attempts)
        : notFound(input.key)
    case 'lookup':
      return fromOutcome(input.key, input.outcome)
  }
}

export const ERROR_MARKER = '⚠️'
export const PENDING_MARKER = '⏳'

/**
 * One short line for a cell or the terminal.
 */
export function renderError(error: LookupError): string {
  const marker = error.kind === 'lookup_in_progress' ? PENDING_MARKER : ERROR_MARKER
  return `${marker} ${error.message}`
}

/**
 * Whether a cell holds a rendered error (the in-progress status is not one).
 */
export function isErrorText(value: unknown): boolean {
  return typeof value === 'string' && value.startsWith(`${ERROR_MARKER} `)
}

/**
 * Whether retrying the same request later may give a different answer.
 */
export function isTransient(error: LookupError): boolean {
  return error.kind === 'lookup_in_progress' || error.kind === 'backend_unavailable'
}
