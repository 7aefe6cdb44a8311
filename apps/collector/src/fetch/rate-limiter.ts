/**
 * Sliding Window Rate Limiter
 *
 * Rate limits apply to the registrable domain (eTLD+1), not the full hostname.
 * State lives in this process: the collector runs as a single process, and
 * admission is decided synchronously so concurrent callers cannot both take
 * the last slot of a window.
 */

import type { RateLimiter, RateLimitConfig } from '../collector/types.js'
import { DEFAULT_RATE_LIMIT } from '../collector/types.js'
import { getRegistrableDomain } from '../utils/url.js'

export interface SlidingWindowRateLimiterOptions {
  /** Config used for domains without an override */
  defaults?: RateLimitConfig

  /** Override default rate limits per domain */
  domainOverrides?: Map<string, RateLimitConfig>

  /** Clock and sleep, for tests */
  now?: () => number
  sleep?: (ms: number) => Promise<void>
}

interface WindowState {
  /** Admission timestamps inside the current window */
  admitted: number[]
  lastAdmittedAt: number | null
}

export class SlidingWindowRateLimiter implements RateLimiter {
  private readonly defaults: RateLimitConfig
  private readonly domainOverrides: Map<string, RateLimitConfig>
  private readonly windows = new Map<string, WindowState>()
  private readonly now: () => number
  private readonly sleep: (ms: number) => Promise<void>

  constructor(options: SlidingWindowRateLimiterOptions = {}) {
    this.defaults = options.defaults ?? DEFAULT_RATE_LIMIT
    this.domainOverrides = options.domainOverrides ?? new Map()
    this.now = options.now ?? Date.now
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
  }

  /**
   * Acquire permission to make a request to the given URL's domain.
   * Blocks until rate limit allows.
   */
  async acquire(urlOrDomain: string): Promise<void> {
    // If URL is passed, extract domain
    let domain: string
    try {
      domain = urlOrDomain.includes('://') ? getRegistrableDomain(urlOrDomain) : urlOrDomain
    } catch {
      domain = urlOrDomain
    }

    while (true) {
      const result = this.tryAcquire(domain, this.getConfig(domain))
      if (result.acquired) {
        return
      }
      await this.sleep(result.retryAfterMs)
    }
  }

  /**
   * Get rate limit config for a domain.
   */
  getConfig(domain: string): RateLimitConfig {
    return this.domainOverrides.get(domain) ?? this.defaults
  }

  /**
   * Set custom rate limit for a domain.
   */
  setConfig(domain: string, config: RateLimitConfig): void {
    this.domainOverrides.set(domain, config)
  }

  private tryAcquire(
    domain: string,
    config: RateLimitConfig
  ): { acquired: true } | { acquired: false; retryAfterMs: number } {
    // For 0.5 req/sec, window is 2000ms (2 seconds)
    const windowMs = Math.ceil(1000 / config.requestsPerSecond)
    const now = this.now()

    let state = this.windows.get(domain)
    if (!state) {
      state = { admitted: [], lastAdmittedAt: null }
      this.windows.set(domain, state)
    }

    // Remove expired entries (outside the window)
    const windowStart = now - windowMs
    state.admitted = state.admitted.filter(timestamp => timestamp > windowStart)

    const sinceLast = state.lastAdmittedAt === null ? Infinity : now - state.lastAdmittedAt
    const spacingWaitMs = Math.max(0, config.minDelayMs - sinceLast)

    if (state.admitted.length < config.maxConcurrent && spacingWaitMs === 0) {
      state.admitted.push(now)
      state.lastAdmittedAt = now
      return { acquired: true }
    }

    const windowWaitMs =
      state.admitted.length < config.maxConcurrent ? 0 : state.admitted[0] + windowMs - now

    return { acquired: false, retryAfterMs: Math.max(windowWaitMs, spacingWaitMs, 1) }
  }
}
