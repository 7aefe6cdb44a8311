import type { FieldValue, ListingRecord } from './types.js'

/** Positional names produced by header-less legacy files */
const POSITIONAL_FIELD = /^column_\d+$/

const EMPTY_TOKENS = new Set(['none', 'null', 'false'])

export function isValidFieldName(name: unknown): name is string {
  if (typeof name !== 'string' || name === '') return false
  return !POSITIONAL_FIELD.test(name)
}

export function filterValidFieldNames(names: readonly string[]): string[] {
  return names.filter(isValidFieldName)
}

/**
 * A value counts as empty when it carries no information worth keeping:
 * null/undefined, blank text, the none/null/false tokens, false, or [].
 */
export function isEmptyValue(value: FieldValue): boolean {
  if (value === null || value === undefined) return true
  if (typeof value === 'string') {
    const trimmed = value.trim()
    return trimmed === '' || EMPTY_TOKENS.has(trimmed.toLowerCase())
  }
  if (typeof value === 'boolean') return value === false
  if (Array.isArray(value)) return value.length === 0
  return false
}

/**
 * Sorted union of the valid field names across records.
 */
export function collectFieldNames(records: Iterable<ListingRecord>, seed: Iterable<string> = []): string[] {
  const names = new Set<string>()
  for (const name of seed) {
    if (isValidFieldName(name)) names.add(name)
  }
  for (const record of records) {
    for (const key of Object.keys(record)) {
      if (isValidFieldName(key)) names.add(key)
    }
  }
  return [...names].sort(compareText)
}

/**
 * Identity of a record: its trimmed `url` when that is non-empty text.
 */
export function getIdentity(record: ListingRecord): string | null {
  const url = record.url
  if (typeof url !== 'string') return null
  const trimmed = url.trim()
  return trimmed === '' ? null : trimmed
}

/** Code-unit ordering, stable across locales */
export function compareText(a: string, b: string): number {
  if (a < b) return -1
  if (a > b) return 1
  return 0
}
