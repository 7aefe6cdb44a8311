/**
 * Enrichment Target Selection
 *
 * Picks stored listing rows that never received a deep fetch, judged by how
 * many detail-only fields are filled.
 */

import { isEmptyValue, type ListingRecord, type RecordStore } from '@listingvault/record-store'
import { loggers } from '../config/logger.js'
import { DEFAULT_URL_RULES, isListingUrl, type UrlRules } from '../utils/url.js'

/** Fields only a deep fetch fills */
export const ENRICHMENT_INDICATORS = [
  'full_address',
  'full_description',
  'advertiser_name',
  'advertiser_code',
  'zap_code',
  'phone_partial',
  'has_whatsapp',
  'iptu',
  'condo_fee',
  'suites',
  'floor_level',
] as const

/** Rows with fewer filled indicators than this need enrichment */
export const MIN_FILLED_INDICATORS = 2

const log = loggers.enrichment

export function countFilledIndicators(record: ListingRecord): number {
  return ENRICHMENT_INDICATORS.filter(field => !isEmptyValue(record[field])).length
}

export function needsEnrichment(record: ListingRecord): boolean {
  return countFilledIndicators(record) < MIN_FILLED_INDICATORS
}

/**
 * Individual listing URLs from the store that still need a deep fetch,
 * in store order.
 */
export async function selectEnrichmentTargets(
  store: RecordStore,
  rules: UrlRules = DEFAULT_URL_RULES
): Promise<string[]> {
  const { records } = await store.loadAll()
  const targets: string[] = []
  let skippedNonListing = 0

  for (const record of records.values()) {
    const url = typeof record.url === 'string' ? record.url.trim() : ''
    if (!url) continue

    if (!isListingUrl(url, rules)) {
      skippedNonListing++
      continue
    }

    if (needsEnrichment(record)) {
      targets.push(url)
    }
  }

  log.info('Enrichment targets selected', {
    rows: records.size,
    targets: targets.length,
    skippedNonListing,
  })
  return targets
}
