/**
 * HTTP Fetch Agent
 *
 * Default FetchAgent on native fetch. Each page load carries its own
 * timeout and size limit; the identity is the header profile currently
 * handed out by the IdentityPool, routed through the current proxy when
 * a ProxyPool is configured. Pages read both at request time, so a
 * rotation takes effect on pages that are already open.
 */

import type { ILogger } from '@listingvault/logger'
import { ProxyAgent } from 'undici'
import { AgentInitializationError, TransientFetchError, errorMessage } from '../collector/errors.js'
import type { AgentPage, FetchAgent, PageLoad } from '../collector/types.js'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'
import type { BrowsingProfile, IdentityPool, ProxyEndpoint, ProxyPool } from './identity-pool.js'

export interface HttpFetchAgentOptions {
  pool: IdentityPool

  /** Outbound proxies; requests go direct when absent */
  proxies?: ProxyPool

  /** Request timeout in ms (default: 30000) */
  timeoutMs?: number

  /** Maximum response size in bytes (default: 10MB) */
  maxSizeBytes?: number

  logger?: ILogger
}

const DEFAULT_TIMEOUT_MS = 30000
const DEFAULT_MAX_SIZE_BYTES = 10 * 1024 * 1024

const BLOCK_INDICATORS = [
  'captcha',
  'recaptcha',
  'hcaptcha',
  'challenge-form',
  'challenge-running',
  'cf-browser-verification',
  'please verify you are a human',
  'access denied',
  'blocked',
  'bot detection',
  'rate limit',
]

interface ActiveProxy {
  endpoint: ProxyEndpoint
  dispatcher: ProxyAgent
}

export class HttpFetchAgent implements FetchAgent {
  private readonly pool: IdentityPool
  private readonly proxies: ProxyPool | null
  private readonly timeoutMs: number
  private readonly maxSizeBytes: number
  private readonly log: ILogger
  private readonly pages = new Set<HttpAgentPage>()
  private profile: BrowsingProfile | null = null
  private proxy: ActiveProxy | null = null

  constructor(options: HttpFetchAgentOptions) {
    this.pool = options.pool
    this.proxies = options.proxies ?? null
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS
    this.maxSizeBytes = options.maxSizeBytes ?? DEFAULT_MAX_SIZE_BYTES
    this.log = options.logger ?? loggers.fetch
  }

  async initialize(): Promise<void> {
    const profile = this.pool.current()
    if (!profile) {
      throw new AgentInitializationError('No browsing identity available (all profiles benched)')
    }
    if (this.proxies) {
      const endpoint = this.proxies.current()
      if (!endpoint) {
        throw new AgentInitializationError('No proxy available (all proxies benched)')
      }
      await this.useProxy(endpoint)
    }
    this.profile = profile
    this.log.debug('Agent initialized', { profile: profile.id, proxy: this.proxy?.endpoint.id ?? null })
  }

  isInitialized(): boolean {
    return this.profile !== null && (this.proxies === null || this.proxy !== null)
  }

  async newPage(): Promise<AgentPage> {
    if (!this.isInitialized()) {
      throw new AgentInitializationError('Agent used before initialize()')
    }
    const page = new HttpAgentPage(
      () => this.requestInit(),
      this.timeoutMs,
      this.maxSizeBytes,
      () => this.pages.delete(page)
    )
    this.pages.add(page)
    return page
  }

  markSuccess(): void {
    if (this.profile) {
      this.pool.markSuccess(this.profile.id)
    }
    if (this.proxy) {
      this.proxies?.markSuccess(this.proxy.endpoint.id)
    }
  }

  markFailure(): void {
    if (this.profile) {
      this.pool.markFailure(this.profile.id)
    }
    if (this.proxy) {
      this.proxies?.markFailure(this.proxy.endpoint.id)
    }
  }

  async rotateIdentity(): Promise<void> {
    const previous = { profile: this.profile?.id ?? null, proxy: this.proxy?.endpoint.id ?? null }
    // null leaves the agent uninitialized; the next attempt re-initializes
    this.profile = this.pool.rotate()
    if (this.proxies) {
      const endpoint = this.proxies.rotate()
      if (endpoint) {
        await this.useProxy(endpoint)
      } else {
        await this.dropProxy()
      }
    }
    this.log.info('Identity rotated', {
      from: previous,
      to: { profile: this.profile?.id ?? null, proxy: this.proxy?.endpoint.id ?? null },
    })
  }

  async close(): Promise<void> {
    const open = [...this.pages]
    await Promise.all(open.map(page => page.close()))
    await this.dropProxy()
    this.profile = null
  }

  /** Headers and dispatcher for the identity in use right now */
  private requestInit(): RequestInit {
    if (!this.profile || (this.proxies && !this.proxy)) {
      throw new AgentInitializationError('No browsing identity in use (rotation found none available)')
    }
    const init: RequestInit = {
      method: 'GET',
      headers: {
        'User-Agent': this.profile.userAgent,
        Accept: 'text/html,application/xhtml+xml',
        'Accept-Language': this.profile.acceptLanguage,
      },
      redirect: 'follow',
    }
    if (this.proxy) {
      init.dispatcher = this.proxy.dispatcher
    }
    return init
  }

  private async useProxy(endpoint: ProxyEndpoint): Promise<void> {
    if (this.proxy?.endpoint.id === endpoint.id) return
    await this.dropProxy()
    this.proxy = { endpoint, dispatcher: new ProxyAgent(endpoint.url) }
  }

  private async dropProxy(): Promise<void> {
    const active = this.proxy
    this.proxy = null
    if (active) {
      await active.dispatcher.close()
    }
  }
}

class HttpAgentPage implements AgentPage {
  private controller: AbortController | null = null

  constructor(
    private readonly requestInit: () => RequestInit,
    private readonly timeoutMs: number,
    private readonly maxSizeBytes: number,
    private readonly onClose: () => void
  ) {}

  async load(url: string): Promise<PageLoad> {
    const init = this.requestInit()
    const startTime = Date.now()
    const controller = new AbortController()
    this.controller = controller
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(url, { ...init, signal: controller.signal })

      // Check for blocked responses (403, 503 with captcha indicators)
      if (response.status === 403 || response.status === 503) {
        const text = await response.text()
        if (looksLikeBlockedPage(text)) {
          return {
            status: 'blocked',
            statusCode: response.status,
            durationMs: Date.now() - startTime,
            error: `HTTP ${response.status}: Request blocked (captcha or access denied)`,
          }
        }
      }

      if (!response.ok) {
        return {
          status: response.status === 429 ? 'blocked' : 'error',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `HTTP ${response.status}: ${response.statusText}`,
        }
      }

      const contentLength = response.headers.get('content-length')
      if (contentLength && parseInt(contentLength, 10) > this.maxSizeBytes) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: `Response too large: ${contentLength} bytes`,
        }
      }

      const html = await readBodyWithLimit(response, this.maxSizeBytes)
      if (html === null) {
        return {
          status: 'too_large',
          statusCode: response.status,
          durationMs: Date.now() - startTime,
          error: 'Response exceeded size limit',
        }
      }

      return {
        status: 'ok',
        statusCode: response.status,
        html,
        durationMs: Date.now() - startTime,
      }
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        return {
          status: 'timeout',
          durationMs: Date.now() - startTime,
          error: `Request timed out after ${this.timeoutMs}ms`,
        }
      }

      loggers.fetch.debug('Request failed', { ...sanitizeUrl(url) }, error)
      throw new TransientFetchError(`Request failed: ${errorMessage(error)}`, url, { cause: error })
    } finally {
      clearTimeout(timeoutId)
      this.controller = null
    }
  }

  async close(): Promise<void> {
    this.controller?.abort()
    this.onClose()
  }
}

/**
 * Read response body with size limit.
 * Returns null if size exceeds limit.
 */
async function readBodyWithLimit(response: Response, maxBytes: number): Promise<string | null> {
  const reader = response.body?.getReader()
  if (!reader) {
    return ''
  }

  const chunks: Uint8Array[] = []
  let totalSize = 0

  try {
    while (true) {
      const { done, value } = await reader.read()
      if (done) break

      totalSize += value.length
      if (totalSize > maxBytes) {
        await reader.cancel()
        return null
      }

      chunks.push(value)
    }

    return new TextDecoder('utf-8').decode(Buffer.concat(chunks))
  } finally {
    reader.releaseLock()
  }
}

/**
 * Heuristic check for blocked/captcha pages.
 */
export function looksLikeBlockedPage(html: string): boolean {
  const lowerHtml = html.toLowerCase()
  return BLOCK_INDICATORS.some(indicator => lowerHtml.includes(indicator))
}
