import { describe, expect, it } from 'vitest'
import { detectHeader, firstLineOf, parseTable, renderRows, renderTable, serializeValue, toRow } from '../codec.js'

describe('serializeValue', () => {
  it('writes empty values as empty cells', () => {
    expect(serializeValue(null)).toBe('')
    expect(serializeValue(undefined)).toBe('')
    expect(serializeValue([])).toBe('')
  })

  it('joins lists with a comma and space', () => {
    expect(serializeValue(['a.jpg', 'b.jpg'])).toBe('a.jpg, b.jpg')
  })

  it('encodes nested maps as compact JSON', () => {
    expect(serializeValue({ rooms: 2, pool: true })).toBe('{"rooms":2,"pool":true}')
    expect(serializeValue([{ a: 1 }, 'x'])).toBe('{"a":1}, x')
  })

  it('stringifies scalars', () => {
    expect(serializeValue(12.5)).toBe('12.5')
    expect(serializeValue(true)).toBe('true')
    expect(serializeValue('R$ 500.000')).toBe('R$ 500.000')
  })
})

describe('toRow', () => {
  it('emits one cell per header column', () => {
    expect(toRow({ url: 'u', price: 100, images: ['a', 'b'] }, ['images', 'price', 'title', 'url'])).toEqual([
      'a, b',
      '100',
      '',
      'u',
    ])
  })
})

describe('renderTable / renderRows', () => {
  it('renders a header and rows', () => {
    expect(renderTable(['price', 'url'], [['100', 'https://x/a']])).toBe('price,url\n100,https://x/a\n')
  })

  it('quotes cells containing the delimiter', () => {
    expect(renderTable(['images'], [['a, b']])).toBe('images\n"a, b"\n')
  })

  it('renders rows without a header', () => {
    expect(renderRows([['1', 'a'], ['2', 'b']])).toBe('1,a\n2,b\n')
    expect(renderRows([])).toBe('')
  })
})

describe('parseTable', () => {
  it('strips the BOM and skips empty lines', () => {
    expect(parseTable('\uFEFFurl,price\n\nhttps://x/a,100\n')).toEqual([
      ['url', 'price'],
      ['https://x/a', '100'],
    ])
  })

  it('tolerates short rows', () => {
    expect(parseTable('url,price\nhttps://x/a\n')).toEqual([['url', 'price'], ['https://x/a']])
  })

  it('reads quoted cells', () => {
    expect(parseTable('images\n"a, b"\n')).toEqual([['images'], ['a, b']])
  })
})

describe('detectHeader', () => {
  it('recognizes a header by known field tokens', () => {
    expect(detectHeader('URL,Price,Title')).toBe(true)
    expect(detectHeader('bedrooms,suites')).toBe(true)
  })

  it('treats a data line as header-less', () => {
    expect(detectHeader('https://www.zapimoveis.com.br/imovel/x-id-9,R$ 500')).toBe(false)
    expect(detectHeader('')).toBe(false)
  })

  it('accepts custom tokens', () => {
    expect(detectHeader('sku,name', ['sku'])).toBe(true)
  })
})

describe('firstLineOf', () => {
  it('returns the trimmed first line without BOM', () => {
    expect(firstLineOf('\uFEFFurl,price\r\n1,2\n')).toBe('url,price')
    expect(firstLineOf('single')).toBe('single')
  })
})
