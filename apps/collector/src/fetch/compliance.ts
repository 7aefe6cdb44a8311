/**
 * Compliance Gate
 *
 * Decides whether a URL may be fetched at all (public data, robots.txt) and
 * paces requests per registrable domain.
 */

import type { ILogger } from '@listingvault/logger'
import type { CompliancePolicy, RateLimiter, RobotsPolicy } from '../collector/types.js'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import { getRegistrableDomain } from '../utils/url.js'

/** Path markers of account, checkout and back-office pages */
export const PRIVATE_PATH_MARKERS = [
  '/login',
  '/conta',
  '/minha-conta',
  '/account',
  '/perfil',
  '/checkout',
  '/admin',
] as const

export interface ComplianceGateOptions {
  rateLimiter: RateLimiter
  /** Omit to skip robots.txt checks */
  robots?: RobotsPolicy
  /** Minimum spacing between requests to one domain */
  minDelayMs: number
  /** Requests per second before crawl-delay adjustment (default: 0.5) */
  requestsPerSecond?: number
  logger?: ILogger
}

export class ComplianceGate implements CompliancePolicy {
  private readonly rateLimiter: RateLimiter
  private readonly robots?: RobotsPolicy
  private readonly minDelayMs: number
  private readonly requestsPerSecond: number
  private readonly log: ILogger

  constructor(options: ComplianceGateOptions) {
    this.rateLimiter = options.rateLimiter
    this.robots = options.robots
    this.minDelayMs = options.minDelayMs
    this.requestsPerSecond = options.requestsPerSecond ?? 0.5
    this.log = options.logger ?? loggers.compliance
  }

  isPublicData(url: string): boolean {
    let parsed: URL
    try {
      parsed = new URL(url)
    } catch {
      return false
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return false
    }
    const segments = new Set(parsed.pathname.toLowerCase().split('/'))
    return !PRIVATE_PATH_MARKERS.some(marker => segments.has(marker.slice(1)))
  }

  async canFetch(url: string, identity: string): Promise<boolean> {
    if (!this.robots) return true
    const allowed = await this.robots.isAllowed(url, identity)
    if (!allowed) {
      this.log.info('Disallowed by robots.txt', { ...sanitizeUrl(url), identity })
    }
    return allowed
  }

  async waitForRateLimit(url: string): Promise<void> {
    const domain = getRegistrableDomain(url)
    const crawlDelaySeconds = this.robots ? await this.robots.getCrawlDelay(url) : null
    const delayMs = Math.max(this.minDelayMs, (crawlDelaySeconds ?? 0) * 1000)

    const current = this.rateLimiter.getConfig(domain)
    if (current.minDelayMs !== delayMs) {
      this.rateLimiter.setConfig(domain, {
        ...current,
        minDelayMs: delayMs,
        requestsPerSecond: Math.min(this.requestsPerSecond, 1000 / Math.max(delayMs, 1)),
      })
    }

    await this.rateLimiter.acquire(url)
  }
}
