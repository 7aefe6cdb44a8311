/**
 * Collector Types
 *
 * Contracts between the pipeline core and its collaborators. The core only
 * depends on these interfaces; concrete agents, extractors and policies live
 * under fetch/, extract/ and images/.
 */

import type { ListingRecord, SearchResults } from '@listingvault/record-store'

// ═══════════════════════════════════════════════════════════════════════════════
// Fetch Agent
// ═══════════════════════════════════════════════════════════════════════════════

export type PageLoadStatus = 'ok' | 'blocked' | 'error' | 'timeout' | 'too_large'

export interface PageLoad {
  status: PageLoadStatus
  statusCode?: number
  html?: string
  /** `HTTP <code>: <text>` for HTTP failures */
  error?: string
  durationMs: number
}

export interface AgentPage {
  load(url: string): Promise<PageLoad>
  close(): Promise<void>
}

/**
 * A browsing session with a rotatable identity.
 * Reusable across attempts; one agent per URL in bounded-parallel runs,
 * one shared agent in enrichment-only runs.
 */
export interface FetchAgent {
  initialize(): Promise<void>
  isInitialized(): boolean
  newPage(): Promise<AgentPage>
  /** Report that the current identity fetched successfully */
  markSuccess(): void
  /** Penalize the current identity after a block */
  markFailure(): void
  /** Switch to a different identity before the next attempt */
  rotateIdentity(): Promise<void>
  close(): Promise<void>
}

export type AgentFactory = () => FetchAgent

// ═══════════════════════════════════════════════════════════════════════════════
// Extraction
// ═══════════════════════════════════════════════════════════════════════════════

export type SaveCallback = (record: ListingRecord) => Promise<void>

export type PageCallback = (pageNumber: number, records: ListingRecord[], baseUrl: string) => Promise<void>

/** Told about a listing the source refused (403/429, challenge page) */
export type BlockedCallback = (url: string, error: string) => Promise<void>

export interface ListingExtractor {
  /** Returns the record, or `{ url, error }` when the page could not be read */
  scrapeListing(page: AgentPage, url: string, deep: boolean): Promise<ListingRecord>

  /** Walks result pages in order, calling `onPage` once per non-empty page */
  scrapeSearchResults(
    page: AgentPage,
    url: string,
    maxPages: number,
    onPage?: PageCallback
  ): Promise<ListingRecord[]>

  /**
   * Deep-fetches each listing, calling `onListing` for every enriched one
   * and `onBlocked` for every listing the source refused
   */
  deepScrapeListings(
    page: AgentPage,
    listings: ListingRecord[],
    onListing?: SaveCallback,
    onBlocked?: BlockedCallback
  ): Promise<ListingRecord[]>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Compliance
// ═══════════════════════════════════════════════════════════════════════════════

export interface CompliancePolicy {
  isPublicData(url: string): boolean
  canFetch(url: string, identity: string): Promise<boolean>
  /** Resolves once the rate limiter admits a request for the URL's domain */
  waitForRateLimit(url: string): Promise<void>
}

export interface RobotsPolicy {
  /**
   * Check if URL is allowed by robots.txt for the given agent token.
   * Returns false if disallowed OR unavailable (fail-closed).
   */
  isAllowed(url: string, agentName?: string): Promise<boolean>

  /** Crawl delay in seconds from the robots.txt of the URL's origin */
  getCrawlDelay(url: string): Promise<number | null>
}

export interface RateLimiter {
  /** Blocks until a request to the registrable domain is admitted */
  acquire(urlOrDomain: string): Promise<void>
  getConfig(domain: string): RateLimitConfig
  setConfig(domain: string, config: RateLimitConfig): void
}

export interface RateLimitConfig {
  /** Requests per second (default: 0.5) */
  requestsPerSecond: number

  /** Minimum delay between requests in ms (default: 2000) */
  minDelayMs: number

  /** Requests admitted per window (default: 1) */
  maxConcurrent: number
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  requestsPerSecond: 0.5,
  minDelayMs: 2000,
  maxConcurrent: 1,
}

// ═══════════════════════════════════════════════════════════════════════════════
// Images
// ═══════════════════════════════════════════════════════════════════════════════

export interface ImageCollaborator {
  /** Downloads the record's images and adds local-path fields in place */
  downloadListingImages(record: ListingRecord): Promise<void>
}

// ═══════════════════════════════════════════════════════════════════════════════
// Run
// ═══════════════════════════════════════════════════════════════════════════════

/** A listing record, an error record or a search page outcome */
export type ProcessedResult = ListingRecord | SearchResults

/** null = skipped by the compliance gate */
export type UrlOutcome = ProcessedResult | null

export type RunMode = 'normal' | 'enrich-only'

export interface RunStats {
  total: number
  success: number
  failed: number
  blocked: number
  skipped: number
}

export interface RunSummary {
  runId: string
  results: ProcessedResult[]
  stats: RunStats
  durationMs: number
}
