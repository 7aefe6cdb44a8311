/**
 * URL Processor
 *
 * Takes one URL through the compliance gate and a bounded retry loop:
 *
 *   pending → compliance_check → skipped | fetching
 *   fetching → success | blocked → fetching | failed → fetching | exhausted
 *
 * Per-URL failures come back as `{ url, error }` records. Only failures that
 * another attempt cannot fix (store writes, agent start-up) are thrown.
 */

import type { ILogger } from '@listingvault/logger'
import type { ListingRecord } from '@listingvault/record-store'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { isSearchUrl } from '../utils/url.js'
import {
  BlockedBySourceError,
  errorMessage,
  isBlockedMessage,
  isRetryableError,
  RetriesExhaustedError,
  resultError,
} from './errors.js'
import type {
  AgentFactory,
  CompliancePolicy,
  FetchAgent,
  ListingExtractor,
  PageCallback,
  ProcessedResult,
  SaveCallback,
  UrlOutcome,
} from './types.js'

export type UrlState =
  | 'pending'
  | 'compliance_check'
  | 'skipped'
  | 'fetching'
  | 'success'
  | 'blocked'
  | 'failed'
  | 'exhausted'

export interface ProcessorCallbacks {
  /** Called with every successfully fetched individual listing */
  onListing?: SaveCallback
  /** Called once per non-empty search result page */
  onPage?: PageCallback
  /** Called with every deep-enriched listing found through a search page; falls back to onListing */
  onDeepListing?: SaveCallback
}

export interface UrlProcessorOptions {
  extractor: ListingExtractor
  compliance: CompliancePolicy
  createAgent: AgentFactory
  /** Product token presented to robots.txt */
  identity: string
  /** Retries after the first attempt (default: 3) */
  maxRetries?: number
  /** Base retry delay in ms (default: 2000) */
  baseDelayMs?: number
  /** Backoff multiplier (default: 2) */
  backoffMultiplier?: number
  /** Search pagination ceiling (default: 5) */
  maxPages?: number
  /** Treat every URL as an individual listing (enrichment runs) */
  recordOnly?: boolean
  /** Which URLs are search pages (default: source URL rules) */
  isSearchPage?: (url: string) => boolean
  callbacks?: ProcessorCallbacks
  sleep?: (ms: number) => Promise<void>
  logger?: ILogger
}

export class UrlProcessor {
  private readonly extractor: ListingExtractor
  private readonly compliance: CompliancePolicy
  private readonly agentFactory: AgentFactory
  private readonly identity: string
  private readonly maxRetries: number
  private readonly baseDelayMs: number
  private readonly backoffMultiplier: number
  private readonly maxPages: number
  private readonly recordOnly: boolean
  private readonly isSearchPage: (url: string) => boolean
  private readonly callbacks: ProcessorCallbacks
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: ILogger

  constructor(options: UrlProcessorOptions) {
    this.extractor = options.extractor
    this.compliance = options.compliance
    this.agentFactory = options.createAgent
    this.identity = options.identity
    this.maxRetries = options.maxRetries ?? 3
    this.baseDelayMs = options.baseDelayMs ?? 2000
    this.backoffMultiplier = options.backoffMultiplier ?? 2
    this.maxPages = options.maxPages ?? 5
    this.recordOnly = options.recordOnly ?? false
    this.isSearchPage = options.isSearchPage ?? (url => isSearchUrl(url))
    this.callbacks = options.callbacks ?? {}
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
    this.log = options.logger ?? loggers.processor
  }

  /** A fresh agent from the configured factory */
  createAgent(): FetchAgent {
    return this.agentFactory()
  }

  /**
   * Public-data check, robots.txt check, then wait for the rate limiter.
   * Returns false when the URL must be skipped.
   */
  async checkCompliance(url: string): Promise<boolean> {
    if (!this.compliance.isPublicData(url)) {
      this.log.warn('Skipping potentially private data', { ...sanitizeUrl(url) })
      return false
    }

    if (!(await this.compliance.canFetch(url, this.identity))) {
      this.log.warn('robots.txt disallows URL', { ...sanitizeUrl(url) })
      return false
    }

    await this.compliance.waitForRateLimit(url)
    return true
  }

  isBlockedResult(result: ProcessedResult): boolean {
    const error = resultError(result)
    return error !== null && isBlockedMessage(error)
  }

  retryDelayMs(attempt: number): number {
    return this.baseDelayMs * this.backoffMultiplier ** attempt
  }

  /**
   * One fetch of `url` with `agent`, initializing it on first use.
   */
  async attemptFetch(url: string, agent: FetchAgent): Promise<ProcessedResult> {
    if (!agent.isInitialized()) {
      await agent.initialize()
    }

    const page = await agent.newPage()

    try {
      if (this.recordOnly || !this.isSearchPage(url)) {
        const result = await this.extractor.scrapeListing(page, url, true)
        if (resultError(result) === null) {
          if (this.callbacks.onListing) {
            await this.callbacks.onListing(result)
          }
          agent.markSuccess()
        }
        return result
      }

      let listings: ListingRecord[] = await this.extractor.scrapeSearchResults(
        page,
        url,
        this.maxPages,
        this.callbacks.onPage
      )

      if (listings.length > 0) {
        this.log.info('Search completed, deep fetching listings', {
          ...sanitizeUrl(url),
          listings: listings.length,
        })
        const onDeep = this.callbacks.onDeepListing ?? this.callbacks.onListing
        listings = await this.extractor.deepScrapeListings(page, listings, onDeep, (blockedUrl, error) =>
          this.handleBlocked(blockedUrl, error, agent)
        )
      }

      agent.markSuccess()
      return { type: 'search_results', url, listings }
    } finally {
      try {
        await page.close()
      } catch (error) {
        this.log.debug('Error closing page', { ...sanitizeUrl(url) }, error)
      }
    }
  }

  /**
   * Process one URL. Returns null when the compliance gate skipped it.
   * Uses `sharedAgent` when given; otherwise creates an agent and closes it.
   */
  async processUrl(url: string, sharedAgent?: FetchAgent): Promise<UrlOutcome> {
    this.transition(url, 'pending')
    this.transition(url, 'compliance_check')

    if (!(await this.checkCompliance(url))) {
      this.transition(url, 'skipped')
      return null
    }

    const agent = sharedAgent ?? this.createAgent()
    const ownsAgent = sharedAgent === undefined

    try {
      for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
        this.transition(url, 'fetching', { attempt: attempt + 1 })

        let result: ProcessedResult
        try {
          result = await this.attemptFetch(url, agent)
        } catch (error) {
          if (!isRetryableError(error)) {
            throw error
          }

          const message = errorMessage(error)
          this.log.error(
            'Error processing URL',
            { ...sanitizeUrl(url), attempt: attempt + 1, maxAttempts: this.maxRetries + 1 },
            error
          )

          if (error instanceof BlockedBySourceError || isBlockedMessage(message)) {
            this.transition(url, 'blocked', { attempt: attempt + 1 })
            await this.handleBlocked(url, message, agent)
          }

          if (attempt >= this.maxRetries) {
            this.transition(url, 'failed', { attempt: attempt + 1 })
            return { url, error: message }
          }

          await this.sleep(this.retryDelayMs(attempt))
          continue
        }

        if (resultError(result) === null) {
          this.transition(url, 'success', { attempt: attempt + 1 })
          return result
        }

        if (this.isBlockedResult(result)) {
          this.transition(url, 'blocked', { attempt: attempt + 1 })
          await this.handleBlocked(url, resultError(result) ?? '', agent)
        } else {
          this.transition(url, 'failed', { attempt: attempt + 1 })
        }

        if (attempt < this.maxRetries) {
          await this.sleep(this.retryDelayMs(attempt))
        }
      }

      const exhausted = new RetriesExhaustedError(url, this.maxRetries + 1)
      this.transition(url, 'exhausted', { attempts: exhausted.attempts })
      return { url, error: exhausted.message }
    } finally {
      if (ownsAgent) {
        await agent.close().catch((error: unknown) => {
          this.log.warn('Failed to close agent', { ...sanitizeUrl(url) }, error)
        })
      }
    }
  }

  private async handleBlocked(url: string, error: string, agent: FetchAgent): Promise<void> {
    this.log.warn('Blocked by source, rotating identity', { ...sanitizeUrl(url), error })
    agent.markFailure()
    await agent.rotateIdentity()
  }

  private transition(url: string, state: UrlState, meta: Record<string, unknown> = {}): void {
    this.log.debug('URL state', { ...sanitizeUrl(url), state, ...meta })
  }
}
