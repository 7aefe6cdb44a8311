/**
 * @listingvault/collector
 *
 * Listing collection pipeline: URL processing with compliance and retry,
 * bounded-parallel and shared-agent run strategies, and the default
 * HTTP, extraction and image collaborators.
 */

export { PipelineOrchestrator } from './collector/orchestrator.js'
export type { PipelineOrchestratorOptions } from './collector/orchestrator.js'
export { UrlProcessor } from './collector/url-processor.js'
export type { ProcessorCallbacks, UrlProcessorOptions, UrlState } from './collector/url-processor.js'
export { ListingMerger } from './collector/listing-merger.js'
export type { MergeSource } from './collector/listing-merger.js'
export { recordRunCompleted, failureRate } from './collector/metrics.js'
export {
  AgentInitializationError,
  BlockedBySourceError,
  CollectorError,
  ConfigurationError,
  RetriesExhaustedError,
  TransientFetchError,
  classifyOutcome,
  errorMessage,
  isBlockedMessage,
  isRetryableError,
  resultError,
} from './collector/errors.js'
export type { ErrorCategory, OutcomeClass } from './collector/errors.js'
export * from './collector/types.js'
export { loadSettings, getSettings } from './config/settings.js'
export type { Settings } from './config/settings.js'
export { HtmlListingExtractor, extractListing } from './extract/html-extractor.js'
export { ComplianceGate } from './fetch/compliance.js'
export { HttpFetchAgent } from './fetch/http-agent.js'
export { IdentityPool, ProxyPool, defaultProfiles, proxyEndpoints } from './fetch/identity-pool.js'
export type { BrowsingProfile, ProxyEndpoint } from './fetch/identity-pool.js'
export { SlidingWindowRateLimiter } from './fetch/rate-limiter.js'
export { RobotsPolicyImpl } from './fetch/robots.js'
export { ImageDownloader } from './images/image-downloader.js'
export { selectEnrichmentTargets, ENRICHMENT_INDICATORS } from './enrichment/select-targets.js'
export { createRuntime } from './cli/runtime.js'
export type { CollectorRuntime } from './cli/runtime.js'
