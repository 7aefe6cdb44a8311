/**
 * Listing Merger
 *
 * Folds freshly fetched listing data into rows that already exist in the
 * store. The store is read once, on first use, into a cache owned by this
 * object; later lookups and page registrations work against that cache.
 * Listings with no matching row are skipped: this path never creates rows.
 */

import type { ILogger } from '@listingvault/logger'
import { getIdentity, mergeRecords, type ListingRecord, type RecordStore } from '@listingvault/record-store'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { normalizeIdentity } from '../utils/url.js'
import type { ImageCollaborator } from './types.js'

export type MergeSource = 'listing' | 'deep'

export interface ListingMergerOptions {
  store: RecordStore
  images?: ImageCollaborator
  logger?: ILogger
}

export class ListingMerger {
  private readonly store: RecordStore
  private readonly images?: ImageCollaborator
  private readonly log: ILogger
  private loading: Promise<Map<string, ListingRecord>> | null = null

  constructor(options: ListingMergerOptions) {
    this.store = options.store
    this.images = options.images
    this.log = options.logger ?? loggers.store.child('merger')
  }

  /**
   * Merge `record` into its stored row and persist it.
   * Returns false when the listing has no url or no stored row.
   */
  async mergeAndPersist(record: ListingRecord, source: MergeSource): Promise<boolean> {
    const url = getIdentity(record)
    if (url === null) {
      this.log.warn('Listing has no url, skipping merge', { source })
      return false
    }

    if (this.images) {
      await this.images.downloadListingImages(record)
    }

    const cache = await this.cache()
    if (cache.size === 0) {
      this.log.warn('Listing cache is empty, nothing to merge into', { ...sanitizeUrl(url), source })
      return false
    }

    const key = this.resolveIdentity(cache, url)
    if (key === null) {
      this.log.warn('Listing not found in store, skipping', {
        ...sanitizeUrl(url),
        source,
        cachedRows: cache.size,
      })
      return false
    }

    cache.set(key, mergeRecords(cache.get(key), record).record)
    await this.store.saveRecord({ ...record, url: key })

    this.log.debug('Listing merged into store', { ...sanitizeUrl(url), source })
    return true
  }

  /**
   * Add rows just written by a page save so later merges can find them.
   * A cache that has not been loaded yet will read them from disk instead.
   */
  async register(records: readonly ListingRecord[]): Promise<void> {
    if (!this.loading) return
    const cache = await this.loading
    for (const record of records) {
      const url = getIdentity(record)
      if (url === null) continue
      cache.set(url, mergeRecords(cache.get(url), { ...record, url }).record)
    }
  }

  /**
   * Cache key for `url`: exact match, then the trailing-slash-normalized
   * form, then a stored url containing it or contained in it.
   */
  resolveIdentity(cache: ReadonlyMap<string, ListingRecord>, url: string): string | null {
    if (cache.has(url)) return url

    const normalized = normalizeIdentity(url)
    if (cache.has(normalized)) return normalized

    for (const [key, row] of cache) {
      if (getIdentity(row) === null) continue
      if (key.includes(url) || url.includes(key)) {
        this.log.debug('Matched listing by containment', { ...sanitizeUrl(url), matched: key })
        return key
      }
    }

    return null
  }

  private cache(): Promise<Map<string, ListingRecord>> {
    if (!this.loading) {
      this.loading = this.store.loadAll().then(loaded => {
        this.log.info('Listing cache loaded', { rows: loaded.records.size })
        return loaded.records
      })
    }
    return this.loading
  }
}
