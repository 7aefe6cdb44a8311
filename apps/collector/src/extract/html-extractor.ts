/**
 * HTML Listing Extractor
 *
 * Extraction strategy:
 * 1. Parse JSON-LD schema (most reliable when present)
 * 2. Fall back to Open Graph tags and DOM selectors
 *
 * Search pages yield one shallow record per listing link; detail pages
 * yield the shallow fields plus, when deep, advertiser and cost details.
 */

import * as cheerio from 'cheerio'
import type { ILogger } from '@listingvault/logger'
import { getIdentity, isEmptyValue, mergeRecords } from '@listingvault/record-store'
import type { FieldValue, ListingRecord } from '@listingvault/record-store'
import { BlockedBySourceError, CollectorError, TransientFetchError, isBlockedMessage } from '../collector/errors.js'
import type { AgentPage, BlockedCallback, ListingExtractor, PageCallback, SaveCallback } from '../collector/types.js'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { buildPageUrl, DEFAULT_URL_RULES, isListingUrl, toListingUrl, type UrlRules } from '../utils/url.js'
import { OPEN_GRAPH, SELECTORS } from './selectors.js'

export interface HtmlListingExtractorOptions {
  rules?: UrlRules
  /** Pause between consecutive page loads on one page handle (default: 0) */
  pageDelayMs?: number
  sleep?: (ms: number) => Promise<void>
  logger?: ILogger
}

/** schema.org types that describe a listing */
const LISTING_TYPES = new Set([
  'Product',
  'Offer',
  'RealEstateListing',
  'Residence',
  'Apartment',
  'House',
  'SingleFamilyResidence',
])

export function loadHtml(payload: string): cheerio.CheerioAPI {
  return cheerio.load(payload)
}

export function firstText($: cheerio.CheerioAPI, selector: string): string {
  return cleanText($(selector).first().text())
}

export function firstAttr($: cheerio.CheerioAPI, selector: string, attr: string): string | undefined {
  const value = $(selector).first().attr(attr)?.trim()
  return value || undefined
}

export function cleanText(value: string): string {
  return value.replace(/\s+/g, ' ').trim()
}

/** First integer in a label such as "3 quartos" */
export function parseCount(value: string | undefined): number | undefined {
  const match = value?.match(/\d+/)
  return match ? parseInt(match[0], 10) : undefined
}

interface ListingRead {
  record: ListingRecord
  /** The source refused the page */
  blocked: boolean
}

export class HtmlListingExtractor implements ListingExtractor {
  private readonly rules: UrlRules
  private readonly pageDelayMs: number
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: ILogger

  constructor(options: HtmlListingExtractorOptions = {}) {
    this.rules = options.rules ?? DEFAULT_URL_RULES
    this.pageDelayMs = options.pageDelayMs ?? 0
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
    this.log = options.logger ?? loggers.extract
  }

  async scrapeListing(page: AgentPage, url: string, deep: boolean): Promise<ListingRecord> {
    return (await this.readListing(page, url, deep)).record
  }

  async scrapeSearchResults(
    page: AgentPage,
    url: string,
    maxPages: number,
    onPage?: PageCallback
  ): Promise<ListingRecord[]> {
    const listings: ListingRecord[] = []
    const seen = new Set<string>()

    for (let pageNumber = 1; pageNumber <= maxPages; pageNumber++) {
      const pageUrl = buildPageUrl(url, pageNumber)
      if (pageNumber > 1 && this.pageDelayMs > 0) {
        await this.sleep(this.pageDelayMs)
      }

      const load = await page.load(pageUrl)

      if (load.status !== 'ok' || load.html === undefined) {
        const message = load.error ?? `Page load ${load.status}`
        if (pageNumber === 1) {
          throw load.status === 'blocked'
            ? new BlockedBySourceError(message, pageUrl, load.statusCode)
            : new TransientFetchError(message, pageUrl)
        }
        // keep what earlier pages found
        this.log.warn('Stopping pagination after failed page', {
          ...sanitizeUrl(url),
          pageNumber,
          error: message,
        })
        break
      }

      const records = this.extractCards(loadHtml(load.html), pageUrl, seen)
      if (records.length === 0) {
        this.log.debug('Empty result page, pagination complete', { ...sanitizeUrl(url), pageNumber })
        break
      }

      listings.push(...records)
      if (onPage) {
        await onPage(pageNumber, records, url)
      }
    }

    this.log.info('Search results collected', { ...sanitizeUrl(url), listings: listings.length })
    return listings
  }

  async deepScrapeListings(
    page: AgentPage,
    listings: ListingRecord[],
    onListing?: SaveCallback,
    onBlocked?: BlockedCallback
  ): Promise<ListingRecord[]> {
    const enriched: ListingRecord[] = []

    for (const [index, listing] of listings.entries()) {
      const url = getIdentity(listing)
      if (url === null) {
        enriched.push(listing)
        continue
      }

      if (index > 0 && this.pageDelayMs > 0) {
        await this.sleep(this.pageDelayMs)
      }

      let read: ListingRead
      try {
        read = await this.readListing(page, url, true)
      } catch (error) {
        if (error instanceof CollectorError && error.isRetryable) {
          this.log.warn('Deep fetch failed, keeping shallow listing', { ...sanitizeUrl(url) }, error)
          if (onBlocked && error instanceof BlockedBySourceError) {
            await onBlocked(url, error.message)
          }
          enriched.push(listing)
          continue
        }
        throw error
      }

      const deep = read.record
      if (!isEmptyValue(deep.error)) {
        const message = String(deep.error)
        this.log.warn('Deep fetch returned an error, keeping shallow listing', { ...sanitizeUrl(url), error: message })
        if (onBlocked && (read.blocked || isBlockedMessage(message))) {
          await onBlocked(url, message)
        }
        enriched.push(listing)
        continue
      }

      const merged = mergeRecords(listing, deep).record
      enriched.push(merged)
      if (onListing) {
        await onListing(merged)
      }
    }

    return enriched
  }

  private async readListing(
    page: AgentPage,
    url: string,
    deep: boolean
  ): Promise<ListingRead> {
    const load = await page.load(url)

    if (load.status !== 'ok' || load.html === undefined) {
      this.log.debug('Listing page not readable', { ...sanitizeUrl(url), status: load.status })
      return { record: { url, error: load.error ?? `Page load ${load.status}` }, blocked: load.status === 'blocked' }
    }

    return { record: extractListing(loadHtml(load.html), url, deep), blocked: false }
  }

  private extractCards($: cheerio.CheerioAPI, pageUrl: string, seen: Set<string>): ListingRecord[] {
    const records: ListingRecord[] = []

    $(`a[href*="${this.rules.listingMarker}"]`).each((_, element) => {
      const anchor = $(element)
      const href = anchor.attr('href')
      if (!href) return

      const url = toListingUrl(href, pageUrl)
      if (url === null || !isListingUrl(url, this.rules) || seen.has(url)) return
      seen.add(url)

      const within = (selector: string): string => cleanText(anchor.find(selector).first().text())

      const record: ListingRecord = { url }
      setField(record, 'title', anchor.attr('title')?.trim() || within(SELECTORS.cardTitle))
      setField(record, 'price', within(SELECTORS.price))
      setField(record, 'location', within(SELECTORS.location))
      setField(record, 'area', within(SELECTORS.area))
      setField(record, 'bedrooms', parseCount(within(SELECTORS.bedrooms)))
      setField(record, 'bathrooms', parseCount(within(SELECTORS.bathrooms)))
      setField(record, 'parking_spaces', parseCount(within(SELECTORS.parkingSpaces)))
      records.push(record)
    })

    return records
  }
}

/**
 * Extract a listing from a detail page.
 */
export function extractListing($: cheerio.CheerioAPI, url: string, deep: boolean): ListingRecord {
  const jsonLd = extractJsonLd($)
  const address = jsonLd ? asObject(jsonLd.address) : null
  const offer = jsonLd ? firstOffer(jsonLd.offers) : null

  const record: ListingRecord = { url }

  setField(record, 'title', textOf(jsonLd?.name) ?? firstAttr($, OPEN_GRAPH.title, 'content') ?? firstText($, SELECTORS.title))
  setField(record, 'price', textOf(offer?.price) ?? firstText($, SELECTORS.price))
  setField(record, 'location', joinParts([address?.addressLocality, address?.addressRegion]) ?? firstText($, SELECTORS.location))
  setField(record, 'area', quantityOf(jsonLd?.floorSize) ?? firstText($, SELECTORS.area))
  setField(record, 'bedrooms', numberOf(jsonLd?.numberOfRooms) ?? parseCount(firstText($, SELECTORS.bedrooms)))
  setField(record, 'bathrooms', numberOf(jsonLd?.numberOfBathroomsTotal) ?? parseCount(firstText($, SELECTORS.bathrooms)))
  setField(record, 'parking_spaces', parseCount(firstText($, SELECTORS.parkingSpaces)))
  setField(
    record,
    'description',
    textOf(jsonLd?.description) ?? firstAttr($, OPEN_GRAPH.description, 'content') ?? firstText($, SELECTORS.description)
  )
  setField(record, 'images', extractImages($, jsonLd?.image))

  if (!deep) {
    return record
  }

  setField(
    record,
    'full_address',
    joinParts([address?.streetAddress, address?.addressLocality, address?.addressRegion]) ??
      firstText($, SELECTORS.fullAddress)
  )
  setField(record, 'full_description', firstText($, SELECTORS.fullDescription))
  setField(record, 'advertiser_name', firstText($, SELECTORS.advertiserName))
  setField(record, 'advertiser_code', firstText($, SELECTORS.advertiserCode))
  setField(record, 'zap_code', codeOf(firstText($, SELECTORS.listingCode)) ?? url.match(/id-(\d+)/)?.[1])
  setField(record, 'phone_partial', firstText($, SELECTORS.phone))
  setField(record, 'has_whatsapp', $(SELECTORS.whatsapp).length > 0)
  setField(record, 'iptu', firstText($, SELECTORS.iptu))
  setField(record, 'condo_fee', firstText($, SELECTORS.condoFee))
  setField(record, 'suites', parseCount(firstText($, SELECTORS.suites)))
  setField(record, 'floor_level', parseCount(firstText($, SELECTORS.floorLevel)))
  setField(
    record,
    'amenities',
    $(SELECTORS.amenities)
      .map((_, element) => cleanText($(element).text()))
      .get()
      .filter(text => text !== '')
  )

  return record
}

/**
 * Extract the JSON-LD node describing the listing.
 */
export function extractJsonLd($: cheerio.CheerioAPI): Record<string, unknown> | null {
  const scripts = $(SELECTORS.jsonLd)

  for (let i = 0; i < scripts.length; i++) {
    const content = scripts.eq(i).html()
    if (!content) continue

    let data: unknown
    try {
      data = JSON.parse(content)
    } catch {
      // Invalid JSON, try next script
      continue
    }

    const found = findListingNode(data)
    if (found) return found
  }

  return null
}

function findListingNode(data: unknown): Record<string, unknown> | null {
  if (Array.isArray(data)) {
    for (const item of data) {
      const found = findListingNode(item)
      if (found) return found
    }
    return null
  }

  const node = asObject(data)
  if (!node) return null

  // Handle @graph array
  if (Array.isArray(node['@graph'])) {
    const found = findListingNode(node['@graph'])
    if (found) return found
  }

  const types = Array.isArray(node['@type']) ? node['@type'] : [node['@type']]
  return types.some(type => typeof type === 'string' && LISTING_TYPES.has(type)) ? node : null
}

function extractImages($: cheerio.CheerioAPI, jsonLdImage: unknown): string[] {
  const images: string[] = []
  const add = (value: unknown): void => {
    const src = textOf(value) ?? textOf(asObject(value)?.url)
    if (src && /^https?:\/\//i.test(src) && !images.includes(src)) {
      images.push(src)
    }
  }

  if (Array.isArray(jsonLdImage)) {
    jsonLdImage.forEach(add)
  } else {
    add(jsonLdImage)
  }

  $(SELECTORS.images).each((_, element) => {
    const image = $(element)
    add(image.attr('src') ?? image.attr('data-src'))
  })

  if (images.length === 0) {
    add(firstAttr($, OPEN_GRAPH.image, 'content'))
  }

  return images
}

function setField(record: ListingRecord, field: string, value: FieldValue): void {
  if (!isEmptyValue(value)) {
    record[field] = value
  }
}

function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return null
  return Object.fromEntries(Object.entries(value))
}

function textOf(value: unknown): string | undefined {
  if (typeof value === 'number') return String(value)
  if (typeof value !== 'string') return undefined
  const text = cleanText(value)
  return text || undefined
}

function numberOf(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) return value
  return typeof value === 'string' ? parseCount(value) : undefined
}

/** schema.org QuantitativeValue or a plain value, e.g. "72 m²" */
function quantityOf(value: unknown): string | undefined {
  const quantity = asObject(value)
  if (!quantity) return textOf(value)
  const amount = textOf(quantity.value)
  if (!amount) return undefined
  const unit = textOf(quantity.unitText)
  return unit ? `${amount} ${unit}` : amount
}

function firstOffer(offers: unknown): Record<string, unknown> | null {
  return Array.isArray(offers) ? asObject(offers[0]) : asObject(offers)
}

function joinParts(parts: unknown[]): string | undefined {
  const texts = parts.map(textOf).filter((part): part is string => part !== undefined)
  return texts.length > 0 ? texts.join(', ') : undefined
}

/** "Código do anúncio: 2598765432" → "2598765432" */
function codeOf(text: string): string | undefined {
  return text.match(/([A-Za-z0-9-]+)\s*$/)?.[1]
}
