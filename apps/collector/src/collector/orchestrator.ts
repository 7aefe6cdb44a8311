/**
 * Pipeline Orchestrator
 *
 * Runs a URL list through the UrlProcessor with one of two strategies:
 *
 * - normal: bounded parallelism, a fresh agent per URL, no ordering
 * - enrich-only: one shared agent, URLs strictly in order
 *
 * Per-URL failures are counted and returned as `{ url, error }` records.
 * A store write failure, or a shared agent that cannot start or restart,
 * ends the run.
 */

import { randomUUID } from 'node:crypto'
import pLimit from 'p-limit'
import type { ILogger } from '@listingvault/logger'
import { StoreWriteError, isSearchResults, type ListingRecord, type RecordStore } from '@listingvault/record-store'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { AgentInitializationError, classifyOutcome, errorMessage } from './errors.js'
import { ListingMerger } from './listing-merger.js'
import { recordRunCompleted } from './metrics.js'
import type {
  FetchAgent,
  ImageCollaborator,
  PageCallback,
  ProcessedResult,
  RunMode,
  RunStats,
  RunSummary,
  SaveCallback,
  UrlOutcome,
} from './types.js'
import { UrlProcessor, type UrlProcessorOptions } from './url-processor.js'

export interface PipelineOrchestratorOptions {
  urls: string[]
  mode?: RunMode
  /** Parallel URL limit in normal mode (default: 3) */
  maxConcurrent?: number
  store: RecordStore
  images?: ImageCollaborator
  processor: Omit<UrlProcessorOptions, 'callbacks' | 'recordOnly'>
  runId?: string
  logger?: ILogger
}

interface StrategyResult {
  results: ProcessedResult[]
  /** Set when the run cannot go on; rethrown after stats are reported */
  fatal: StoreWriteError | AgentInitializationError | null
}

function emptyStats(): RunStats {
  return { total: 0, success: 0, failed: 0, blocked: 0, skipped: 0 }
}

export class PipelineOrchestrator {
  readonly runId: string

  private readonly urls: string[]
  private readonly mode: RunMode
  private readonly maxConcurrent: number
  private readonly store: RecordStore
  private readonly merger: ListingMerger
  private readonly processor: UrlProcessor
  private readonly log: ILogger
  private stats: RunStats = emptyStats()

  constructor(options: PipelineOrchestratorOptions) {
    this.urls = options.urls
    this.mode = options.mode ?? 'normal'
    this.maxConcurrent = Math.max(1, options.maxConcurrent ?? 3)
    this.store = options.store
    this.runId = options.runId ?? randomUUID()
    this.log = (options.logger ?? loggers.orchestrator).child({ runId: this.runId })
    this.merger = new ListingMerger({ store: options.store, images: options.images })

    const enrichOnly = this.mode === 'enrich-only'
    this.processor = new UrlProcessor({
      ...options.processor,
      recordOnly: enrichOnly,
      callbacks: {
        onListing: enrichOnly ? this.saveListing : undefined,
        onPage: this.savePage,
        onDeepListing: enrichOnly ? undefined : this.saveDeepListing,
      },
    })
  }

  async run(): Promise<RunSummary> {
    const startedAt = Date.now()
    this.stats = { ...emptyStats(), total: this.urls.length }

    this.log.info('Starting pipeline', {
      urls: this.urls.length,
      mode: this.mode,
      maxConcurrent: this.maxConcurrent,
    })

    const { results, fatal } =
      this.mode === 'enrich-only' ? await this.runSharedAgent() : await this.runBoundedParallel()

    const durationMs = Date.now() - startedAt
    const stats = this.getStats()

    this.log.info('Pipeline completed', { ...stats, durationMs })
    recordRunCompleted({ runId: this.runId, mode: this.mode, stats, durationMs })

    if (fatal) {
      throw fatal
    }

    return { runId: this.runId, results, stats, durationMs }
  }

  getStats(): RunStats {
    return { ...this.stats }
  }

  /**
   * Count one URL outcome: skipped, blocked (403/429), failed, or
   * successful (one per listing for search results).
   */
  recordOutcome(url: string, outcome: UrlOutcome): void {
    switch (classifyOutcome(outcome)) {
      case 'skipped':
        this.stats.skipped++
        return
      case 'blocked':
        this.stats.blocked++
        return
      case 'failed':
        this.stats.failed++
        return
      case 'success':
        break
    }

    if (outcome !== null && isSearchResults(outcome)) {
      this.stats.success += outcome.listings.length
      this.log.info('Search results collected', { ...sanitizeUrl(url), listings: outcome.listings.length })
    } else {
      this.stats.success++
      this.log.info('Listing collected', { ...sanitizeUrl(url) })
    }
  }

  private async runBoundedParallel(): Promise<StrategyResult> {
    const limit = pLimit(this.maxConcurrent)
    const settled = await Promise.allSettled(this.urls.map(url => limit(() => this.processor.processUrl(url))))

    const results: ProcessedResult[] = []
    let fatal: StoreWriteError | null = null

    for (const [index, outcome] of settled.entries()) {
      const url = this.urls[index]

      if (outcome.status === 'rejected') {
        this.log.error('Exception processing URL', { ...sanitizeUrl(url) }, outcome.reason)
        this.stats.failed++
        results.push({ url, error: errorMessage(outcome.reason) })
        if (outcome.reason instanceof StoreWriteError && fatal === null) {
          fatal = outcome.reason
        }
        continue
      }

      this.recordOutcome(url, outcome.value)
      if (outcome.value !== null) {
        results.push(outcome.value)
      }
    }

    return { results, fatal }
  }

  private async runSharedAgent(): Promise<StrategyResult> {
    const agent = this.processor.createAgent()
    const results: ProcessedResult[] = []

    try {
      await this.initializeSharedAgent(agent)

      for (const [index, url] of this.urls.entries()) {
        this.log.info('Processing listing', { ...sanitizeUrl(url), position: index + 1, of: this.urls.length })

        try {
          const outcome = await this.processor.processUrl(url, agent)
          this.recordOutcome(url, outcome)
          if (outcome !== null) {
            results.push(outcome)
          }
        } catch (error) {
          this.log.error('Error processing listing', { ...sanitizeUrl(url) }, error)
          this.stats.failed++
          results.push({ url, error: errorMessage(error) })
          // a shared agent that cannot restart fails every remaining URL the same way
          if (error instanceof StoreWriteError || error instanceof AgentInitializationError) {
            return { results, fatal: error }
          }
        }
      }

      return { results, fatal: null }
    } finally {
      await agent.close().catch((error: unknown) => {
        this.log.warn('Failed to close shared agent', {}, error)
      })
    }
  }

  private async initializeSharedAgent(agent: FetchAgent): Promise<void> {
    try {
      await agent.initialize()
      this.log.info('Shared agent initialized')
    } catch (error) {
      this.log.error('Failed to initialize shared agent', {}, error)
      throw error instanceof AgentInitializationError
        ? error
        : new AgentInitializationError(`Failed to initialize shared agent: ${errorMessage(error)}`, {
            cause: error,
          })
    }
  }

  // ===========================================================================
  // Callbacks
  // ===========================================================================

  /** Save failures are logged, not propagated: the fetch already succeeded */
  private readonly saveListing: SaveCallback = async (record: ListingRecord) => {
    try {
      await this.merger.mergeAndPersist(record, 'listing')
    } catch (error) {
      this.log.error('Failed to save listing', { ...sanitizeUrl(String(record.url ?? '')) }, error)
    }
  }

  private readonly saveDeepListing: SaveCallback = async (record: ListingRecord) => {
    await this.merger.mergeAndPersist(record, 'deep')
  }

  private readonly savePage: PageCallback = async (pageNumber, records, baseUrl) => {
    const outcome = await this.store.savePage(pageNumber, records)
    await this.merger.register(records)
    this.log.info('Search page saved', {
      ...sanitizeUrl(baseUrl),
      pageNumber,
      appended: outcome.appended,
      headerWidened: outcome.headerWidened,
    })
  }
}
