import { describe, expect, it } from 'vitest'
import { parseBondRecord, parseBondRows, projectField } from './record'

describe('parseBondRecord', () => {
  it('keeps scalar members', () => {
    expect(
      parseBondRecord({
        isin: 'AA000000000X',
        coupon_rate: 4.625,
        callable: false,
        sedol: null,
        sources: ['a', 'b'],
        lineage: { source: 'x' }
      })
    ).toEqual({ isin: 'AA000000000X', coupon_rate: 4.625, callable: false, sedol: null })
  })

  it('rejects non-objects', () => {
    expect(parseBondRecord(null)).toBeNull()
    expect(parseBondRecord([{ isin: 'AA000000000X' }])).toBeNull()
    expect(parseBondRecord('AA000000000X')).toBeNull()
    expect(parseBondRecord(undefined)).toBeNull()
  })

  it('drops non-finite numbers', () => {
    expect(parseBondRecord({ coupon_rate: Number.NaN })).toEqual({})
  })
})

describe('parseBondRows', () => {
  it('parses arrays and skips non-objects', () => {
    expect(parseBondRows([{ isin: 'GB00BYZW3G56' }, 7, null, { isin: 'DE0001102580' }])).toEqual([
      { isin: 'GB00BYZW3G56' },
      { isin: 'DE0001102580' }
    ])
  })

  it('rejects non-arrays', () => {
    expect(parseBondRows({ isin: 'GB00BYZW3G56' })).toBeNull()
  })
})

describe('projectField', () => {
  const record = { coupon_rate: 4.625, sedol: null, name: 'Treasury 4 5/8% 2034' }

  it('returns the stored value', () => {
    expect(projectField(record, 'coupon_rate')).toBe(4.625)
    expect(projectField(record, 'name')).toBe('Treasury 4 5/8% 2034')
  })

  it('projects null and absent values to an empty string', () => {
    expect(projectField(record, 'sedol')).toBe('')
    expect(projectField(record, 'cusip')).toBe('')
  })
})
