import { describe, expect, it, vi } from 'vitest'
import type { RateLimitConfig, RateLimiter, RobotsPolicy } from '../../collector/types.js'
import { ComplianceGate } from '../compliance.js'
import { createTestLogger } from '../../collector/__tests__/fakes.js'

const LISTING = 'https://www.zapimoveis.com.br/imovel/venda-apartamento-id-1/'

function fakeLimiter(initial: RateLimitConfig = { requestsPerSecond: 0.5, minDelayMs: 2000, maxConcurrent: 1 }) {
  const configs = new Map<string, RateLimitConfig>()
  const limiter = {
    acquire: vi.fn(async (_url: string) => undefined),
    getConfig: (domain: string) => configs.get(domain) ?? initial,
    setConfig: vi.fn((domain: string, config: RateLimitConfig) => {
      configs.set(domain, config)
    }),
  } satisfies RateLimiter
  return limiter
}

function fakeRobots(allowed: boolean, crawlDelay: number | null): RobotsPolicy {
  return {
    isAllowed: async () => allowed,
    getCrawlDelay: async () => crawlDelay,
  }
}

describe('ComplianceGate', () => {
  const gate = (robots?: RobotsPolicy, limiter = fakeLimiter()) =>
    new ComplianceGate({ rateLimiter: limiter, robots, minDelayMs: 2000, logger: createTestLogger() })

  it('treats account and checkout paths as private', () => {
    const compliance = gate()

    expect(compliance.isPublicData(LISTING)).toBe(true)
    expect(compliance.isPublicData('https://www.zapimoveis.com.br/minha-conta/favoritos')).toBe(false)
    expect(compliance.isPublicData('https://www.zapimoveis.com.br/LOGIN')).toBe(false)
    expect(compliance.isPublicData('https://www.zapimoveis.com.br/contato/')).toBe(true)
    expect(compliance.isPublicData('ftp://www.zapimoveis.com.br/imovel/1')).toBe(false)
    expect(compliance.isPublicData('not a url')).toBe(false)
  })

  it('defers to robots.txt when configured', async () => {
    await expect(gate().canFetch(LISTING, 'listingvault')).resolves.toBe(true)
    await expect(gate(fakeRobots(false, null)).canFetch(LISTING, 'listingvault')).resolves.toBe(false)
  })

  it('stretches the domain spacing to the crawl delay', async () => {
    const limiter = fakeLimiter()

    await gate(fakeRobots(true, 5), limiter).waitForRateLimit(LISTING)

    expect(limiter.setConfig).toHaveBeenCalledWith('zapimoveis.com.br', {
      requestsPerSecond: 0.2,
      minDelayMs: 5000,
      maxConcurrent: 1,
    })
    expect(limiter.acquire).toHaveBeenCalledWith(LISTING)
  })

  it('asks robots.txt for the crawl delay of the URL being fetched', async () => {
    const robots = fakeRobots(true, null)
    const getCrawlDelay = vi.spyOn(robots, 'getCrawlDelay')

    await gate(robots).waitForRateLimit(LISTING)

    expect(getCrawlDelay).toHaveBeenCalledWith(LISTING)
  })

  it('keeps the configured spacing when it already applies', async () => {
    const limiter = fakeLimiter()

    await gate(undefined, limiter).waitForRateLimit(LISTING)

    expect(limiter.setConfig).not.toHaveBeenCalled()
    expect(limiter.acquire).toHaveBeenCalledTimes(1)
  })
})
