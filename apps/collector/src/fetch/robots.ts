/**
 * Robots.txt Policy Implementation
 *
 * Policy rules:
 * 1. Obey Disallow rules for `User-agent: *` and for our product token
 *    (an agent-specific group replaces the global one)
 * 2. Honor Crawl-delay (min 1s, max 60s, default 2s if not specified)
 * 3. If robots.txt is unavailable after 3 attempts: fail closed (block origin)
 * 4. Cache robots.txt for 24 hours, per origin (scheme, host and port)
 */

import type { ILogger } from '@listingvault/logger'
import type { RobotsPolicy } from '../collector/types.js'
import { loggers } from '../config/logger.js'

interface RobotsGroup {
  disallowed: string[]
  crawlDelay: number | null
}

/**
 * Parsed robots.txt for an origin.
 */
interface RobotsRules {
  /** Groups keyed by lower-cased user-agent token ('*' for the global group) */
  groups: Map<string, RobotsGroup>
  /** When this cache entry was created */
  cachedAt: number
  /** Whether robots.txt fetch was successful */
  fetchSucceeded: boolean
}

export interface RobotsPolicyOptions {
  /** Cache TTL in ms (default: 24 hours) */
  cacheTtlMs?: number
  /** Number of fetch attempts (default: 3) */
  fetchRetries?: number
  /** Request timeout in ms (default: 10000) */
  fetchTimeoutMs?: number
  /** Delay unit between attempts in ms (default: 1000) */
  retryDelayMs?: number
  /** Our product token for matching agent-specific groups */
  userAgentName?: string
  /** User-Agent header sent when fetching robots.txt */
  userAgentHeader?: string
  /** Default crawl delay in seconds if not specified (default: 2) */
  defaultCrawlDelay?: number
  /** Min crawl delay in seconds (default: 1) */
  minCrawlDelay?: number
  /** Max crawl delay in seconds (default: 60) */
  maxCrawlDelay?: number
  logger?: ILogger
}

type ResolvedOptions = Required<Omit<RobotsPolicyOptions, 'logger'>>

const DEFAULT_OPTIONS: ResolvedOptions = {
  cacheTtlMs: 24 * 60 * 60 * 1000, // 24 hours
  fetchRetries: 3,
  fetchTimeoutMs: 10000,
  retryDelayMs: 1000,
  userAgentName: 'listingvault',
  userAgentHeader: 'Mozilla/5.0 (compatible; listingvault/1.0)',
  defaultCrawlDelay: 2,
  minCrawlDelay: 1,
  maxCrawlDelay: 60,
}

/**
 * Robots.txt policy with caching.
 * Fail-closed: if we can't fetch robots.txt, block the origin.
 */
export class RobotsPolicyImpl implements RobotsPolicy {
  private readonly options: ResolvedOptions
  private readonly log: ILogger
  private readonly cache = new Map<string, RobotsRules>()

  constructor(options: RobotsPolicyOptions = {}) {
    const { logger, ...rest } = options
    this.options = { ...DEFAULT_OPTIONS, ...rest }
    this.log = logger ?? loggers.compliance.child('robots')
  }

  /**
   * Check if URL is allowed by robots.txt.
   * Returns false if disallowed OR unavailable (fail-closed).
   */
  async isAllowed(url: string, agentName: string = this.options.userAgentName): Promise<boolean> {
    const urlObj = new URL(url)
    const rules = await this.getRules(urlObj.origin)

    if (!rules.fetchSucceeded) {
      return false
    }

    const path = urlObj.pathname + urlObj.search
    const group = this.selectGroup(rules, agentName)

    return !group || !matchesAnyRule(path, group.disallowed)
  }

  /**
   * Get crawl delay (seconds) from the robots.txt of the URL's origin,
   * clamped to the configured range.
   */
  async getCrawlDelay(url: string): Promise<number | null> {
    const rules = await this.getRules(new URL(url).origin)
    const group = this.selectGroup(rules, this.options.userAgentName)

    if (group && group.crawlDelay !== null) {
      return Math.max(
        this.options.minCrawlDelay,
        Math.min(this.options.maxCrawlDelay, group.crawlDelay)
      )
    }

    return this.options.defaultCrawlDelay
  }

  /**
   * Clear the cache (for testing).
   */
  clearCache(): void {
    this.cache.clear()
  }

  private selectGroup(rules: RobotsRules, agentName: string): RobotsGroup | undefined {
    return rules.groups.get(agentName.toLowerCase()) ?? rules.groups.get('*')
  }

  private async getRules(origin: string): Promise<RobotsRules> {
    const cached = this.cache.get(origin)
    const now = Date.now()

    if (cached && now - cached.cachedAt < this.options.cacheTtlMs) {
      return cached
    }

    const rules = await this.fetchAndParseRobots(origin)
    this.cache.set(origin, rules)
    return rules
  }

  private async fetchAndParseRobots(origin: string): Promise<RobotsRules> {
    const robotsUrl = `${origin}/robots.txt`
    let text: string | null = null

    for (let attempt = 1; attempt <= this.options.fetchRetries; attempt++) {
      const controller = new AbortController()
      const timeoutId = setTimeout(() => controller.abort(), this.options.fetchTimeoutMs)

      try {
        const response = await fetch(robotsUrl, {
          method: 'GET',
          headers: { 'User-Agent': this.options.userAgentHeader },
          signal: controller.signal,
        })

        // 404 = no robots.txt = allow all
        if (response.status === 404) {
          return { groups: new Map(), cachedAt: Date.now(), fetchSucceeded: true }
        }

        if (response.ok) {
          text = await response.text()
          break
        }

        this.log.debug('robots.txt fetch returned non-OK status', {
          origin,
          attempt,
          statusCode: response.status,
        })
      } catch (error) {
        this.log.debug('robots.txt fetch failed', { origin, attempt }, error)
      } finally {
        clearTimeout(timeoutId)
      }

      if (attempt < this.options.fetchRetries) {
        await sleep(this.options.retryDelayMs * attempt)
      }
    }

    if (text === null) {
      this.log.warn('robots.txt unavailable, blocking origin', { origin })
      return { groups: new Map(), cachedAt: Date.now(), fetchSucceeded: false }
    }

    return { groups: parseRobotsTxt(text), cachedAt: Date.now(), fetchSucceeded: true }
  }
}

/**
 * Parse robots.txt into user-agent groups. Consecutive User-agent lines
 * share the rules that follow them.
 */
export function parseRobotsTxt(text: string): Map<string, RobotsGroup> {
  const groups = new Map<string, RobotsGroup>()
  let currentAgents: string[] = []
  let collectingAgents = false

  const groupFor = (agent: string): RobotsGroup => {
    let group = groups.get(agent)
    if (!group) {
      group = { disallowed: [], crawlDelay: null }
      groups.set(agent, group)
    }
    return group
  }

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.replace(/#.*$/, '').trim()
    if (!line) continue

    const colonIndex = line.indexOf(':')
    if (colonIndex === -1) continue

    const directive = line.slice(0, colonIndex).trim().toLowerCase()
    const value = line.slice(colonIndex + 1).trim()

    if (directive === 'user-agent') {
      const agent = value.toLowerCase()
      currentAgents = collectingAgents ? [...currentAgents, agent] : [agent]
      collectingAgents = true
      groupFor(agent)
      continue
    }

    collectingAgents = false

    if (directive === 'disallow') {
      if (!value) continue // Empty disallow = allow all
      for (const agent of currentAgents) {
        groupFor(agent).disallowed.push(value)
      }
    } else if (directive === 'crawl-delay') {
      const delay = parseFloat(value)
      if (!isNaN(delay) && delay > 0) {
        for (const agent of currentAgents) {
          groupFor(agent).crawlDelay = delay
        }
      }
    }
  }

  return groups
}

/**
 * Prefix matching with `*` wildcards and a `$` end anchor.
 */
export function matchesAnyRule(path: string, rules: string[]): boolean {
  return rules.some(rule => {
    if (rule === '*' || rule === '/') return true
    if (!rule.includes('*') && !rule.endsWith('$')) {
      return path.startsWith(rule)
    }
    const anchored = rule.endsWith('$')
    const body = anchored ? rule.slice(0, -1) : rule
    const pattern = body
      .split('*')
      .map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&'))
      .join('.*')
    return new RegExp(`^${pattern}${anchored ? '$' : ''}`).test(path)
  })
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms))
}
