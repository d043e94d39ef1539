import { describe, expect, it } from 'vitest'
import { classify, isErrorText, isTransient, renderError } from './index'

describe('classify', () => {
  it('maps validation failures', () => {
    expect(classify({ source: 'validation', failure: { reason: 'missing_key' } })).toEqual({
      kind: 'validation_error',
      message: 'ISIN required'
    })
    expect(
      classify({ source: 'validation', failure: { reason: 'malformed_key', value: 'BADKEY' } })
    ).toEqual({ kind: 'validation_error', message: 'Invalid ISIN format: BADKEY' })
    expect(classify({ source: 'validation', failure: { reason: 'missing_field' } })).toEqual({
      kind: 'validation_error',
      message: 'Field required'
    })
    expect(
      classify({
        source: 'validation',
        failure: { reason: 'invalid_argument', detail: 'Unknown country: ZZ' }
      })
    ).toEqual({ kind: 'validation_error', message: 'Unknown country: ZZ' })
  })

  it('maps unknown fields to field_not_found', () => {
    expect(
      classify({ source: 'validation', failure: { reason: 'unknown_field', value: 'yield' } })
    ).toEqual({ kind: 'field_not_found', message: 'Unknown field: yield' })
  })

  it('maps backend responses', () => {
    expect(classify({ source: 'backend', key: 'ZZ999999999Z', response: { kind: 'not_found' } })).toEqual({
      kind: 'not_found',
      message: 'Bond not found: ZZ999999999Z'
    })
    expect(
      classify({
        source: 'backend',
        key: 'AA000000000X',
        response: { kind: 'transport_failure', cause: { type: 'auth', message: 'API key required' } }
      })
    ).toEqual({ kind: 'backend_unavailable', message: 'API key required' })
    expect(
      classify({ source: 'backend', key: 'AA000000000X', response: { kind: 'in_progress' } }).kind
    ).toBe('lookup_in_progress')
  })

  it('maps cached sentinels', () => {
    expect(classify({ source: 'cache', key: 'ZZ999999999Z', sentinel: { kind: 'not_found' } })).toEqual({
      kind: 'not_found',
      message: 'Bond not found: ZZ999999999Z'
    })
    expect(
      classify({ source: 'cache', key: 'AA000000000X', sentinel: { kind: 'exhausted', attempts: 5 } })
    ).toEqual({
      kind: 'not_found',
      message: 'Bond not found: AA000000000X (search gave up after 5 attempts)'
    })
  })

  it('maps coordinator outcomes', () => {
    expect(
      classify({
        source: 'lookup',
        key: 'AA000000000X',
        outcome: { state: 'pending', attempts: 1, maxAttempts: 5 }
      })
    ).toEqual({ kind: 'lookup_in_progress', message: 'Searching for AA000000000X (attempt 1/5)' })
    expect(classify({ source: 'lookup', key: 'AA000000000X', outcome: { state: 'absent' } }).kind).toBe(
      'not_found'
    )
    expect(
      classify({
        source: 'lookup',
        key: 'AA000000000X',
        outcome: { state: 'exhausted', attempts: 3 }
      }).message
    ).toBe('Bond not found: AA000000000X (search gave up after 3 attempts)')
    expect(
      classify({
        source: 'lookup',
        key: 'AA000000000X',
        outcome: {
          state: 'unavailable',
          cause: { type: 'timeout', message: 'Timeout - is the bond data service running?' }
        }
      })
    ).toEqual({
      kind: 'backend_unavailable',
      message: 'Timeout - is the bond data service running?'
    })
  })
})

describe('renderError', () => {
  it('prefixes errors with a warning sign', () => {
    expect(renderError({ kind: 'not_found', message: 'Bond not found: ZZ999999999Z' })).toBe(
      '⚠️ Bond not found: ZZ999999999Z'
    )
  })

  it('marks in-progress lookups with an hourglass', () => {
    expect(
      renderError({ kind: 'lookup_in_progress', message: 'Searching for AA000000000X (attempt 1/5)' })
    ).toBe('⏳ Searching for AA000000000X (attempt 1/5)')
  })
})

describe('isTransient', () => {
  it('treats pending and unavailable as transient', () => {
    expect(isTransient({ kind: 'lookup_in_progress', message: '' })).toBe(true)
    expect(isTransient({ kind: 'backend_unavailable', message: '' })).toBe(true)
    expect(isTransient({ kind: 'not_found', message: '' })).toBe(false)
  })
})

describe('isErrorText', () => {
  it('recognizes rendered errors but not progress or values', () => {
    expect(isErrorText('⚠️ Invalid ISIN format: BADKEY')).toBe(true)
    expect(isErrorText('⏳ Searching for AA000000000X')).toBe(false)
    expect(isErrorText('UK Treasury 1.5% 2026')).toBe(false)
    expect(isErrorText(4.625)).toBe(false)
  })
})
