/**
 * Record Store Types
 *
 * A record is an open, growing map of field name → value keyed by its `url`.
 * Values stay typed in memory and are normalized to text only when written.
 */

import type { ILogger } from '@listingvault/logger'

export type FieldScalar = string | number | boolean | null | undefined

export type FieldValue = FieldScalar | FieldValue[] | { [key: string]: FieldValue }

/**
 * One listing as produced by the extractor or loaded from disk.
 * `url` is the identity; a record without it is never persisted.
 */
export type ListingRecord = Record<string, FieldValue>

/** Outcome of a search page fetch: the listings it discovered */
export type SearchResults = {
  type: 'search_results'
  url: string
  listings: ListingRecord[]
}

/** Anything a run can hand back for persistence */
export type StoredResult = ListingRecord | SearchResults

export interface LoadedStore {
  /** Rows keyed by identity (url, or a synthetic `row_<n>` key when none was found) */
  records: Map<string, ListingRecord>
  /** Valid field names from the header, in file order */
  fields: string[]
  /** True when the file had no header and columns were inferred positionally */
  degraded: boolean
}

export type RejectReason = 'empty' | 'missing_url' | 'technical_failure'

export type SaveOutcome =
  | { status: 'rejected'; reason: RejectReason }
  | { status: 'inserted' | 'updated'; url: string; fieldCount: number; rowCount: number }

export interface PageSaveOutcome {
  pageNumber: number
  appended: number
  fieldCount: number
  /** True when the header had to be widened and the file rewritten */
  headerWidened: boolean
}

export interface BatchSaveOutcome {
  updated: number
  added: number
  skipped: number
  rowCount: number
  fieldCount: number
}

export interface MergeResult {
  record: ListingRecord
  /** Fields that already had a value and received a new non-empty one */
  updatedFields: string[]
  /** Fields that had no value before and received a non-empty one */
  addedFields: string[]
}

export interface RecordStoreOptions {
  /** Directory holding the store file (created if missing) */
  outputDir: string

  /** Store file name (default: scraped_data.csv) */
  filename?: string

  /** Pattern identifying an individual listing URL inside a cell */
  identityPattern?: RegExp

  /** Tokens whose presence in the first line marks it as a header */
  headerTokens?: readonly string[]

  /** Ceiling for the advisory lock wait in ms (default: 10000) */
  lockMaxWaitMs?: number

  /** Poll interval for the advisory lock in ms (default: 100) */
  lockPollMs?: number

  logger?: ILogger
}
