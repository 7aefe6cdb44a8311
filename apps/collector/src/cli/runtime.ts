/**
 * Collector Runtime
 *
 * Builds the default collaborators (store, HTTP agent and its pools,
 * compliance gate, extractor, image downloader) from validated settings.
 */

import { RecordStore } from '@listingvault/record-store'
import type { ImageCollaborator } from '../collector/types.js'
import { DEFAULT_RATE_LIMIT } from '../collector/types.js'
import type { UrlProcessorOptions } from '../collector/url-processor.js'
import { loggers } from '../config/logger.js'
import type { Settings } from '../config/settings.js'
import { HtmlListingExtractor } from '../extract/html-extractor.js'
import { ComplianceGate } from '../fetch/compliance.js'
import { HttpFetchAgent } from '../fetch/http-agent.js'
import { defaultProfiles, IdentityPool, ProxyPool, proxyEndpoints } from '../fetch/identity-pool.js'
import { SlidingWindowRateLimiter } from '../fetch/rate-limiter.js'
import { RobotsPolicyImpl } from '../fetch/robots.js'
import { ImageDownloader } from '../images/image-downloader.js'
import { isSearchUrl, rulesForSource, type UrlRules } from '../utils/url.js'

export interface CollectorRuntime {
  settings: Settings
  rules: UrlRules
  store: RecordStore
  images?: ImageCollaborator
  processor: Omit<UrlProcessorOptions, 'callbacks' | 'recordOnly'>
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

/** Matches listing urls when a store file has lost its header */
export function identityPatternFor(rules: UrlRules): RegExp {
  return new RegExp(escapeRegExp(rules.sourceHost + rules.listingMarker.replace(/\/+$/, '')), 'i')
}

export function createRuntime(settings: Settings): CollectorRuntime {
  const rules = rulesForSource(settings.sourceBaseUrl)
  const profiles = defaultProfiles(settings.userAgentToken)

  const store = new RecordStore({
    outputDir: settings.outputDir,
    filename: settings.storeFilename,
    identityPattern: identityPatternFor(rules),
    lockMaxWaitMs: settings.lockMaxWaitMs,
    logger: loggers.store,
  })

  const pool = new IdentityPool(profiles, {
    maxFailures: settings.identityMaxFailures,
    cooldownMs: settings.identityCooldownMs,
  })

  const proxies =
    settings.proxyUrls.length > 0
      ? new ProxyPool(proxyEndpoints(settings.proxyUrls), {
          maxFailures: settings.proxyMaxFailures,
          cooldownMs: settings.proxyCooldownMs,
        })
      : undefined

  const robots = settings.respectRobotsTxt
    ? new RobotsPolicyImpl({
        userAgentName: settings.userAgentToken,
        userAgentHeader: profiles[0].userAgent,
      })
    : undefined

  const compliance = new ComplianceGate({
    rateLimiter: new SlidingWindowRateLimiter({
      defaults: { ...DEFAULT_RATE_LIMIT, minDelayMs: settings.rateLimitMinDelayMs },
    }),
    robots,
    minDelayMs: settings.rateLimitMinDelayMs,
  })

  const images = settings.saveImages
    ? new ImageDownloader({
        outputDir: settings.outputDir,
        maxImages: settings.maxImagesPerListing,
        delayMs: settings.imageDownloadDelayMs,
        userAgent: profiles[0].userAgent,
      })
    : undefined

  return {
    settings,
    rules,
    store,
    images,
    processor: {
      extractor: new HtmlListingExtractor({ rules, pageDelayMs: settings.rateLimitMinDelayMs }),
      compliance,
      createAgent: () => new HttpFetchAgent({ pool, proxies, timeoutMs: settings.fetchTimeoutMs }),
      identity: settings.userAgentToken,
      maxRetries: settings.maxRetries,
      baseDelayMs: settings.retryDelayMs,
      backoffMultiplier: settings.retryBackoff,
      maxPages: settings.maxPages,
      isSearchPage: url => isSearchUrl(url, rules),
    },
  }
}
