import { describe, expect, it } from 'vitest'
import {
  collectFieldNames,
  filterValidFieldNames,
  getIdentity,
  isEmptyValue,
  isValidFieldName,
} from '../fields.js'
import type { FieldValue } from '../types.js'

describe('isValidFieldName', () => {
  it('rejects positional column names and empty names', () => {
    expect(isValidFieldName('column_3')).toBe(false)
    expect(isValidFieldName('column_12')).toBe(false)
    expect(isValidFieldName('')).toBe(false)
  })

  it('accepts regular names, including ones that only resemble positional names', () => {
    expect(isValidFieldName('price')).toBe(true)
    expect(isValidFieldName('column_')).toBe(true)
    expect(isValidFieldName('column_3a')).toBe(true)
  })

  it('filters a name list', () => {
    expect(filterValidFieldNames(['url', 'column_0', 'title', ''])).toEqual(['url', 'title'])
  })
})

describe('isEmptyValue', () => {
  it('treats missing, blank and placeholder values as empty', () => {
    const values: FieldValue[] = [null, undefined, '', '   ', 'None', 'NULL', ' false ', false, []]
    for (const value of values) {
      expect(isEmptyValue(value)).toBe(true)
    }
  })

  it('treats numbers, true, text and filled lists as non-empty', () => {
    const values: FieldValue[] = [0, 'x', true, ['a'], {}, 'nothing']
    for (const value of values) {
      expect(isEmptyValue(value)).toBe(false)
    }
  })
})

describe('collectFieldNames', () => {
  it('returns the sorted union of valid names', () => {
    const names = collectFieldNames(
      [
        { url: 'a', price: 1, column_1: 'x' },
        { title: 't' },
      ],
      ['area', 'column_2']
    )

    expect(names).toEqual(['area', 'price', 'title', 'url'])
  })
})

describe('getIdentity', () => {
  it('returns the trimmed url', () => {
    expect(getIdentity({ url: '  https://example.com/a ' })).toBe('https://example.com/a')
  })

  it('returns null for missing, blank or non-text urls', () => {
    expect(getIdentity({ title: 'x' })).toBeNull()
    expect(getIdentity({ url: '   ' })).toBeNull()
    expect(getIdentity({ url: 42 })).toBeNull()
  })
})
