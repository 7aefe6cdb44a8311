/**
 * Identity and Proxy Pools
 *
 * Request header profiles and outbound proxies the fetch agent rotates
 * through. An entry that keeps getting blocked is benched for a cooldown
 * period before it is handed out again. Every profile announces the
 * collector's product token.
 */

import type { ILogger } from '@listingvault/logger'
import { loggers } from '../config/logger.js'

export interface BrowsingProfile {
  id: string
  userAgent: string
  acceptLanguage: string
}

export interface ProxyEndpoint {
  /** host:port, safe to log */
  id: string
  /** Full proxy URL, credentials included */
  url: string
}

export interface IdentityPoolOptions {
  /** Consecutive failures before an entry is benched (default: 3) */
  maxFailures?: number
  /** How long a benched entry stays out of rotation (default: 5 min) */
  cooldownMs?: number
  /** Clock, for tests */
  now?: () => number
}

interface EntryState {
  failures: number
  benchedUntil: number
}

export function defaultProfiles(token: string): BrowsingProfile[] {
  const agent = `Mozilla/5.0 (compatible; ${token}/1.0)`
  return [
    { id: 'pt-br', userAgent: agent, acceptLanguage: 'pt-BR,pt;q=0.9,en;q=0.6' },
    { id: 'pt-br-en', userAgent: agent, acceptLanguage: 'pt-BR,en-US;q=0.8,en;q=0.7' },
    { id: 'en-us', userAgent: agent, acceptLanguage: 'en-US,en;q=0.9,pt-BR;q=0.5' },
  ]
}

/**
 * Proxy endpoints from their URLs. The id drops credentials.
 * Throws on a URL that does not parse.
 */
export function proxyEndpoints(urls: string[]): ProxyEndpoint[] {
  return urls.map(url => ({ id: new URL(url).host, url }))
}

/** Round-robin over entries, skipping benched ones */
class RotationPool<T extends { id: string }> {
  private readonly entries: T[]
  private readonly state = new Map<string, EntryState>()
  private readonly maxFailures: number
  private readonly cooldownMs: number
  private readonly now: () => number
  private readonly log: ILogger
  private cursor = 0

  constructor(kind: string, entries: T[], options: IdentityPoolOptions) {
    this.entries = entries
    this.maxFailures = options.maxFailures ?? 3
    this.cooldownMs = options.cooldownMs ?? 5 * 60 * 1000
    this.now = options.now ?? Date.now
    this.log = loggers.fetch.child(kind)
    for (const entry of entries) {
      this.state.set(entry.id, { failures: 0, benchedUntil: 0 })
    }
  }

  /**
   * The entry at the cursor, or the next one that is not benched.
   * Returns null when every entry is benched.
   */
  current(): T | null {
    return this.findAvailable(this.cursor)
  }

  /**
   * Advance to the next available entry.
   */
  rotate(): T | null {
    const next = this.findAvailable(this.cursor + 1)
    if (next) {
      this.log.debug('Rotated', { entry: next.id })
    } else {
      this.log.warn('Nothing available after rotation', { entries: this.entries.length })
    }
    return next
  }

  markSuccess(id: string): void {
    const state = this.state.get(id)
    if (state) {
      state.failures = 0
    }
  }

  markFailure(id: string): void {
    const state = this.state.get(id)
    if (!state) return

    state.failures++
    if (state.failures >= this.maxFailures) {
      state.failures = 0
      state.benchedUntil = this.now() + this.cooldownMs
      this.log.warn('Benched after repeated failures', { entry: id, cooldownMs: this.cooldownMs })
    }
  }

  availableCount(): number {
    return this.entries.filter(entry => this.isAvailable(entry)).length
  }

  private isAvailable(entry: T): boolean {
    const state = this.state.get(entry.id)
    return !state || state.benchedUntil <= this.now()
  }

  private findAvailable(start: number): T | null {
    for (let offset = 0; offset < this.entries.length; offset++) {
      const index = (start + offset) % this.entries.length
      const entry = this.entries[index]
      if (this.isAvailable(entry)) {
        this.cursor = index
        return entry
      }
    }
    return null
  }
}

export class IdentityPool extends RotationPool<BrowsingProfile> {
  constructor(profiles: BrowsingProfile[], options: IdentityPoolOptions = {}) {
    if (profiles.length === 0) {
      throw new Error('IdentityPool needs at least one profile')
    }
    super('identity', profiles, options)
  }
}

export class ProxyPool extends RotationPool<ProxyEndpoint> {
  constructor(proxies: ProxyEndpoint[], options: IdentityPoolOptions = {}) {
    if (proxies.length === 0) {
      throw new Error('ProxyPool needs at least one proxy')
    }
    super('proxy', proxies, options)
  }
}
