/**
 * Record Store
 *
 * One CSV file holding one row per listing `url`. Every write runs as a
 * load → merge → rewrite cycle under an advisory sentinel lock, and writers
 * inside this process are queued per file before they touch the lock.
 *
 * The header is the sorted union of every valid field ever written and only
 * grows. A non-empty value is never replaced by an empty one.
 */

import { appendFile, mkdir, readFile, rename, unlink, writeFile } from 'node:fs/promises'
import path from 'node:path'
import { randomUUID } from 'node:crypto'
import { createLogger, type ILogger } from '@listingvault/logger'
import {
  DEFAULT_HEADER_TOKENS,
  detectHeader,
  firstLineOf,
  parseTable,
  renderRows,
  renderTable,
  toRow,
} from './codec.js'
import { StoreWriteError } from './errors.js'
import { collectFieldNames, compareText, getIdentity, isValidFieldName } from './fields.js'
import {
  acquireFileLock,
  DEFAULT_LOCK_MAX_WAIT_MS,
  DEFAULT_LOCK_POLL_MS,
  KeyedMutex,
  releaseFileLock,
} from './lock.js'
import { mergeRecords } from './merge.js'
import type {
  BatchSaveOutcome,
  ListingRecord,
  LoadedStore,
  PageSaveOutcome,
  RecordStoreOptions,
  SaveOutcome,
  SearchResults,
  StoredResult,
} from './types.js'

export const DEFAULT_STORE_FILENAME = 'scraped_data.csv'
export const DEFAULT_IDENTITY_PATTERN = /zapimoveis\.com\.br\/imovel/i

/** Rows inspected when looking for the identity column of a header-less file */
const IDENTITY_SCAN_ROWS = 10

const TECHNICAL_ERROR_MARKERS = [
  'browsertype.launch',
  'xserver',
  'display',
  'xvfb',
  'browser has been closed',
  'failed to launch',
  'agent launch',
]

/** "browser launch failed", "could not launch the agent" and similar wording */
const LAUNCH_FAILURE = /\b(browser|agent)\b.*\blaunch|\blaunch.*\b(browser|agent)\b/

const TECHNICAL_ERROR_MAX_LENGTH = 500

const writers = new KeyedMutex()

/**
 * A result whose only fields are `url` and `error`, caused by the fetch
 * infrastructure rather than the source. Never persisted.
 */
export function isTechnicalFailure(record: ListingRecord): boolean {
  const keys = Object.keys(record).sort(compareText)
  if (keys.length !== 2 || keys[0] !== 'error' || keys[1] !== 'url') {
    return false
  }
  const error = String(record.error ?? '')
  if (error.length > TECHNICAL_ERROR_MAX_LENGTH) return true
  const lower = error.toLowerCase()
  return TECHNICAL_ERROR_MARKERS.some(marker => lower.includes(marker)) || LAUNCH_FAILURE.test(lower)
}

export function isSearchResults(result: StoredResult): result is SearchResults {
  return result.type === 'search_results' && Array.isArray(result.listings)
}

function hasCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}

function emptyStore(): LoadedStore {
  return { records: new Map(), fields: [], degraded: false }
}

export class RecordStore {
  readonly filePath: string
  readonly lockPath: string

  private readonly outputDir: string
  private readonly identityPattern: RegExp
  private readonly headerTokens: readonly string[]
  private readonly lockMaxWaitMs: number
  private readonly lockPollMs: number
  private readonly log: ILogger

  constructor(options: RecordStoreOptions) {
    this.outputDir = options.outputDir
    this.filePath = path.join(options.outputDir, options.filename ?? DEFAULT_STORE_FILENAME)
    this.lockPath = `${this.filePath}.lock`
    this.identityPattern = options.identityPattern ?? DEFAULT_IDENTITY_PATTERN
    this.headerTokens = options.headerTokens ?? DEFAULT_HEADER_TOKENS
    this.lockMaxWaitMs = options.lockMaxWaitMs ?? DEFAULT_LOCK_MAX_WAIT_MS
    this.lockPollMs = options.lockPollMs ?? DEFAULT_LOCK_POLL_MS
    this.log = (options.logger ?? createLogger('record-store')).child({
      file: path.basename(this.filePath),
    })
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  /**
   * Load every row keyed by identity. Read or parse errors are logged and
   * yield an empty store.
   */
  async loadAll(): Promise<LoadedStore> {
    try {
      return await this.readStore()
    } catch (error) {
      this.log.error('Failed to load record store, treating as empty', { filePath: this.filePath }, error)
      return emptyStore()
    }
  }

  private async readText(): Promise<string | null> {
    try {
      return await readFile(this.filePath, 'utf8')
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return null
      throw error
    }
  }

  private async readStore(): Promise<LoadedStore> {
    const text = await this.readText()
    if (text === null || text.trim() === '') {
      return emptyStore()
    }

    const rows = parseTable(text)
    if (detectHeader(firstLineOf(text), this.headerTokens)) {
      return this.fromHeaderedRows(rows)
    }
    return this.fromPositionalRows(rows)
  }

  private fromHeaderedRows(rows: string[][]): LoadedStore {
    const [rawHeader = [], ...dataRows] = rows
    const header = rawHeader.map(name => name.trim())
    const fields = [...new Set(header.filter(isValidFieldName))]
    const records = new Map<string, ListingRecord>()

    dataRows.forEach((row, index) => {
      if (isBlankRow(row)) return

      const record: ListingRecord = {}
      header.forEach((field, column) => {
        if (!isValidFieldName(field)) return
        const value = (row[column] ?? '').trim()
        // a repeated header name never clears an earlier cell
        if (value === '' && record[field] !== undefined) return
        record[field] = value === '' ? null : value
      })

      const identity = getIdentity(record) ?? this.findIdentityCell(row)
      if (identity !== null) {
        record.url = identity
      }
      this.putLoaded(records, identity, index, record)
    })

    return { records, fields, degraded: false }
  }

  private fromPositionalRows(rows: string[][]): LoadedStore {
    const identityColumn = this.findIdentityColumn(rows.slice(0, IDENTITY_SCAN_ROWS))
    const records = new Map<string, ListingRecord>()

    this.log.warn('Store file has no header, inferring columns positionally', {
      degraded: true,
      rows: rows.length,
      identityColumn,
    })

    rows.forEach((row, index) => {
      if (isBlankRow(row)) return

      const record: ListingRecord = {}
      row.forEach((cell, column) => {
        const value = cell.trim()
        record[`column_${column}`] = value === '' ? null : value
      })

      const fromColumn = identityColumn === null ? '' : (row[identityColumn] ?? '').trim()
      const identity = this.identityPattern.test(fromColumn) ? fromColumn : this.findIdentityCell(row)
      if (identity !== null) {
        record.url = identity
      }
      this.putLoaded(records, identity, index, record)
    })

    return { records, fields: [], degraded: true }
  }

  private putLoaded(
    records: Map<string, ListingRecord>,
    identity: string | null,
    index: number,
    record: ListingRecord
  ): void {
    let key = identity
    if (key === null) {
      key = `row_${index}`
      this.log.warn('Row has no identity, keeping it under a synthetic key', { key })
    }

    const previous = records.get(key)
    // duplicates: the later row wins wherever it carries a value; an empty later cell never clears a known one
    records.set(key, previous ? mergeRecords(previous, record).record : record)
  }

  private findIdentityCell(row: readonly string[]): string | null {
    for (const cell of row) {
      const value = cell.trim()
      if (this.identityPattern.test(value)) return value
    }
    return null
  }

  private findIdentityColumn(rows: readonly string[][]): number | null {
    for (const row of rows) {
      const column = row.findIndex(cell => this.identityPattern.test(cell.trim()))
      if (column !== -1) return column
    }
    return null
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  /**
   * Merge one record into the row for its identity, inserting when new,
   * and rewrite the file.
   */
  async saveRecord(record: ListingRecord): Promise<SaveOutcome> {
    if (Object.keys(record).length === 0) {
      this.log.debug('Skipping empty record')
      return { status: 'rejected', reason: 'empty' }
    }

    const url = getIdentity(record)
    if (url === null) {
      this.log.warn('Skipping record without url', { fields: Object.keys(record).length })
      return { status: 'rejected', reason: 'missing_url' }
    }

    if (isTechnicalFailure(record)) {
      this.log.warn('Skipping technical failure record', { url })
      return { status: 'rejected', reason: 'technical_failure' }
    }

    return this.withLock('saveRecord', async () => {
      const store = await this.readStore()
      const existing = store.records.get(url)
      const merged = mergeRecords(existing, { ...record, url })
      store.records.set(url, merged.record)

      const fields = await this.writeStore(store)

      this.log.info(existing ? 'Record updated' : 'Record inserted', {
        url,
        updatedFields: merged.updatedFields.length,
        addedFields: merged.addedFields.length,
        fieldCount: fields.length,
        rowCount: store.records.size,
      })

      return {
        status: existing ? 'updated' : 'inserted',
        url,
        fieldCount: fields.length,
        rowCount: store.records.size,
      }
    })
  }

  /**
   * Append one page of fresh search results.
   *
   * The header is widened (never narrowed) when the page brings new fields;
   * existing rows are then re-emitted under the wider header once.
   */
  async savePage(pageNumber: number, records: readonly ListingRecord[]): Promise<PageSaveOutcome> {
    const rows = records.filter(record => getIdentity(record) !== null && !isTechnicalFailure(record))
    if (rows.length === 0) {
      return { pageNumber, appended: 0, fieldCount: 0, headerWidened: false }
    }

    return this.withLock('savePage', async () => {
      const text = await this.readText()

      if (text === null || text.trim() === '') {
        const header = collectFieldNames(rows)
        await this.replaceFile(renderTable(header, rows.map(row => toRow(row, header))))
        this.log.info('Page saved to new store file', { pageNumber, appended: rows.length, fieldCount: header.length })
        return { pageNumber, appended: rows.length, fieldCount: header.length, headerWidened: false }
      }

      const firstLine = firstLineOf(text)
      if (!detectHeader(firstLine, this.headerTokens)) {
        // a header-less file cannot be appended to without misaligning columns
        const store = await this.readStore()
        for (const row of rows) {
          const url = getIdentity(row)
          if (url === null) continue
          store.records.set(url, mergeRecords(store.records.get(url), row).record)
        }
        const fields = await this.writeStore(store)
        this.log.info('Page merged into rewritten store', { pageNumber, appended: rows.length, fieldCount: fields.length })
        return { pageNumber, appended: rows.length, fieldCount: fields.length, headerWidened: true }
      }

      const [existingHeader = []] = parseTable(firstLine)
      const header = existingHeader.map(name => name.trim())
      const known = new Set(header)
      const union = collectFieldNames(rows, header)
      const missing = union.filter(field => !known.has(field))

      if (missing.length === 0) {
        const prefix = text.endsWith('\n') ? '' : '\n'
        await appendFile(this.filePath, prefix + renderRows(rows.map(row => toRow(row, header))), 'utf8')
        this.log.info('Page appended', { pageNumber, appended: rows.length, fieldCount: header.length })
        return { pageNumber, appended: rows.length, fieldCount: header.length, headerWidened: false }
      }

      const store = await this.readStore()
      const widened = collectFieldNames(store.records.values(), union)
      const existingRows = sortedRecords(store.records).map(row => toRow(row, widened))
      const pageRows = rows.map(row => toRow(row, widened))
      await this.replaceFile(renderTable(widened, [...existingRows, ...pageRows]))

      this.log.info('Page saved with widened header', {
        pageNumber,
        appended: rows.length,
        newFields: missing,
        fieldCount: widened.length,
      })
      return { pageNumber, appended: rows.length, fieldCount: widened.length, headerWidened: true }
    })
  }

  /**
   * Merge many records against one snapshot and rewrite once.
   */
  async saveBatch(records: readonly ListingRecord[]): Promise<BatchSaveOutcome> {
    return this.withLock('saveBatch', async () => {
      const store = await this.readStore()
      let updated = 0
      let added = 0
      let skipped = 0

      for (const record of records) {
        const url = getIdentity(record)
        if (url === null || isTechnicalFailure(record)) {
          skipped++
          continue
        }
        const existing = store.records.get(url)
        store.records.set(url, mergeRecords(existing, { ...record, url }).record)
        if (existing) {
          updated++
        } else {
          added++
        }
      }

      if (updated + added === 0) {
        return { updated, added, skipped, rowCount: store.records.size, fieldCount: store.fields.length }
      }

      const fields = await this.writeStore(store)
      this.log.info('Batch saved', { updated, added, skipped, rowCount: store.records.size, fieldCount: fields.length })
      return { updated, added, skipped, rowCount: store.records.size, fieldCount: fields.length }
    })
  }

  /**
   * Persist a run's results. Search outcomes contribute their listings;
   * existing rows are merged, never truncated.
   */
  async saveResults(results: readonly StoredResult[]): Promise<BatchSaveOutcome> {
    const records = results.flatMap(result => (isSearchResults(result) ? result.listings : [result]))
    return this.saveBatch(records)
  }

  private async withLock<T>(operation: string, task: () => Promise<T>): Promise<T> {
    return writers.runExclusive(this.filePath, async () => {
      try {
        await mkdir(this.outputDir, { recursive: true })
        const handle = await acquireFileLock(this.lockPath, {
          maxWaitMs: this.lockMaxWaitMs,
          pollMs: this.lockPollMs,
          logger: this.log,
        })
        try {
          return await task()
        } finally {
          await releaseFileLock(handle, this.log)
        }
      } catch (error) {
        if (error instanceof StoreWriteError) throw error
        this.log.error('Store write failed', { operation, filePath: this.filePath }, error)
        throw new StoreWriteError(`${operation} failed for ${this.filePath}`, this.filePath, { cause: error })
      }
    })
  }

  /**
   * Rewrite the whole file: sorted field union, one row per identity.
   * Returns the header written.
   */
  private async writeStore(store: LoadedStore): Promise<string[]> {
    const fields = collectFieldNames(store.records.values(), store.fields)
    const rows = sortedRecords(store.records).map(record => toRow(record, fields))
    await this.replaceFile(renderTable(fields, rows))
    store.fields = fields
    return fields
  }

  private async replaceFile(content: string): Promise<void> {
    const tempPath = `${this.filePath}.${randomUUID()}.tmp`
    try {
      await writeFile(tempPath, content, 'utf8')
      await rename(tempPath, this.filePath)
    } catch (error) {
      await unlink(tempPath).catch((cleanupError: unknown) => {
        if (!hasCode(cleanupError, 'ENOENT')) {
          this.log.warn('Failed to remove temp file', { tempPath }, cleanupError)
        }
      })
      throw error
    }
  }
}

function isBlankRow(row: readonly string[]): boolean {
  return row.every(cell => cell.trim() === '')
}

/** Rows with a url first, ordered by url; synthetic keys after, ordered by key */
function sortedRecords(records: Map<string, ListingRecord>): ListingRecord[] {
  return [...records.entries()]
    .sort(([keyA, a], [keyB, b]) => {
      const urlA = getIdentity(a)
      const urlB = getIdentity(b)
      if (urlA !== null && urlB !== null) return compareText(urlA, urlB)
      if (urlA !== null) return -1
      if (urlB !== null) return 1
      return compareText(keyA, keyB)
    })
    .map(([, record]) => record)
}
