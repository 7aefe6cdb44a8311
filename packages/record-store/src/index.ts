/**
 * @listingvault/record-store
 *
 * Non-regressing CSV record store keyed by listing url.
 */

export {
  RecordStore,
  DEFAULT_IDENTITY_PATTERN,
  DEFAULT_STORE_FILENAME,
  isSearchResults,
  isTechnicalFailure,
} from './store.js'
export { mergeRecords } from './merge.js'
export {
  collectFieldNames,
  filterValidFieldNames,
  getIdentity,
  isEmptyValue,
  isValidFieldName,
} from './fields.js'
export {
  DEFAULT_HEADER_TOKENS,
  detectHeader,
  parseTable,
  renderRows,
  renderTable,
  serializeValue,
  toRow,
} from './codec.js'
export {
  acquireFileLock,
  releaseFileLock,
  KeyedMutex,
  DEFAULT_LOCK_MAX_WAIT_MS,
  DEFAULT_LOCK_POLL_MS,
} from './lock.js'
export type { FileLockHandle, FileLockOptions } from './lock.js'
export { StoreWriteError } from './errors.js'
export type {
  BatchSaveOutcome,
  FieldScalar,
  FieldValue,
  ListingRecord,
  LoadedStore,
  MergeResult,
  PageSaveOutcome,
  RecordStoreOptions,
  RejectReason,
  SaveOutcome,
  SearchResults,
  StoredResult,
} from './types.js'
