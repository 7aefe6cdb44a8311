/**
 * CSV codec for the record store.
 *
 * Lists are written as comma-joined text, nested maps as compact JSON and
 * empty values as empty cells. Reading always yields plain strings; typing is
 * not recovered.
 */

import { parse } from 'csv-parse/sync'
import { stringify } from 'csv-stringify/sync'
import type { FieldValue, ListingRecord } from './types.js'

export const DEFAULT_HEADER_TOKENS = [
  'url',
  'price',
  'title',
  'location',
  'area',
  'bedrooms',
  'bathrooms',
] as const

export function serializeValue(value: FieldValue): string {
  if (value === null || value === undefined) return ''
  if (Array.isArray(value)) {
    return value.map(serializeItem).join(', ')
  }
  if (typeof value === 'object') {
    return JSON.stringify(value)
  }
  return String(value)
}

function serializeItem(item: FieldValue): string {
  if (item !== null && typeof item === 'object' && !Array.isArray(item)) {
    return JSON.stringify(item)
  }
  return serializeValue(item)
}

export function toRow(record: ListingRecord, header: readonly string[]): string[] {
  return header.map(field => serializeValue(record[field]))
}

export function renderTable(header: readonly string[], rows: readonly string[][]): string {
  return stringify([[...header], ...rows])
}

export function renderRows(rows: readonly string[][]): string {
  if (rows.length === 0) return ''
  return stringify(rows.map(row => [...row]))
}

export function parseTable(text: string): string[][] {
  const rows: unknown = parse(text, {
    bom: true,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
  })
  if (!Array.isArray(rows)) return []
  return rows.filter(isStringRow)
}

function isStringRow(row: unknown): row is string[] {
  return Array.isArray(row) && row.every(cell => typeof cell === 'string')
}

/**
 * Heuristic: a first line containing any known field token is a header.
 * Files written by older tooling sometimes start straight with data.
 */
export function detectHeader(firstLine: string, tokens: readonly string[] = DEFAULT_HEADER_TOKENS): boolean {
  if (!firstLine) return false
  const lower = firstLine.toLowerCase()
  return tokens.some(token => lower.includes(token))
}

export function firstLineOf(text: string): string {
  const withoutBom = text.charCodeAt(0) === 0xfeff ? text.slice(1) : text
  const end = withoutBom.search(/\r?\n/)
  return (end === -1 ? withoutBom : withoutBom.slice(0, end)).trim()
}
