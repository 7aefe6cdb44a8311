/**
 * Collector Settings
 *
 * Validated view of the environment. Invalid values fail fast with the
 * offending keys listed.
 */

import path from 'node:path'
import { z } from 'zod'
import { ConfigurationError } from '../collector/errors.js'

const flag = (fallback: 'true' | 'false') =>
  z
    .enum(['true', 'false'])
    .default(fallback)
    .transform(value => value === 'true')

const count = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback)

const settingsSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  OUTPUT_DIR: z.string().min(1).default('./data'),
  LISTINGS_CSV_FILENAME: z.string().min(1).default('scraped_data.csv'),
  MAX_CONCURRENT: count(3, 1),
  MAX_RETRIES: count(3),
  RETRY_DELAY_MS: count(2000),
  RETRY_BACKOFF: z.coerce.number().min(1).default(2),
  MAX_PAGES: count(5, 1),
  FETCH_TIMEOUT_MS: count(30000, 1000),
  SAVE_IMAGES: flag('false'),
  MAX_IMAGES_PER_LISTING: count(20),
  IMAGE_DOWNLOAD_DELAY_MS: count(500),
  RESPECT_ROBOTS_TXT: flag('true'),
  RATE_LIMIT_MIN_DELAY_MS: count(2000),
  LOCK_MAX_WAIT_MS: count(10000),
  IDENTITY_MAX_FAILURES: count(3, 1),
  IDENTITY_COOLDOWN_MS: count(300000),
  PROXY_URLS: z
    .string()
    .optional()
    .refine(value => (parseUrlList(value) ?? []).every(isProxyUrl), 'must list http(s) proxy URLs'),
  PROXY_MAX_FAILURES: count(3, 1),
  PROXY_COOLDOWN_MS: count(300000),
  SOURCE_BASE_URL: z.string().url().default('https://www.zapimoveis.com.br'),
  SEARCH_URLS: z.string().optional(),
  USER_AGENT_TOKEN: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, 'must be a single product token')
    .default('listingvault'),
})

export interface Settings {
  nodeEnv: 'development' | 'test' | 'production'
  outputDir: string
  storeFilename: string
  maxConcurrent: number
  maxRetries: number
  retryDelayMs: number
  retryBackoff: number
  maxPages: number
  fetchTimeoutMs: number
  saveImages: boolean
  maxImagesPerListing: number
  imageDownloadDelayMs: number
  respectRobotsTxt: boolean
  rateLimitMinDelayMs: number
  lockMaxWaitMs: number
  identityMaxFailures: number
  identityCooldownMs: number
  /** Empty when requests go direct */
  proxyUrls: string[]
  proxyMaxFailures: number
  proxyCooldownMs: number
  sourceBaseUrl: string
  searchUrls: string[]
  userAgentToken: string
}

/**
 * Parse settings from an environment map.
 * Blank values count as unset.
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const provided: Record<string, string> = {}
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      provided[key] = value.trim()
    }
  }

  const parsed = settingsSchema.safeParse(provided)
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    throw new ConfigurationError(`Invalid collector configuration (${issues.join('; ')})`, issues)
  }

  const data = parsed.data
  const sourceBaseUrl = data.SOURCE_BASE_URL.replace(/\/+$/, '')

  return {
    nodeEnv: data.NODE_ENV,
    outputDir: path.resolve(data.OUTPUT_DIR),
    storeFilename: data.LISTINGS_CSV_FILENAME,
    maxConcurrent: data.MAX_CONCURRENT,
    maxRetries: data.MAX_RETRIES,
    retryDelayMs: data.RETRY_DELAY_MS,
    retryBackoff: data.RETRY_BACKOFF,
    maxPages: data.MAX_PAGES,
    fetchTimeoutMs: data.FETCH_TIMEOUT_MS,
    saveImages: data.SAVE_IMAGES,
    maxImagesPerListing: data.MAX_IMAGES_PER_LISTING,
    imageDownloadDelayMs: data.IMAGE_DOWNLOAD_DELAY_MS,
    respectRobotsTxt: data.RESPECT_ROBOTS_TXT,
    rateLimitMinDelayMs: data.RATE_LIMIT_MIN_DELAY_MS,
    lockMaxWaitMs: data.LOCK_MAX_WAIT_MS,
    identityMaxFailures: data.IDENTITY_MAX_FAILURES,
    identityCooldownMs: data.IDENTITY_COOLDOWN_MS,
    proxyUrls: parseUrlList(data.PROXY_URLS) ?? [],
    proxyMaxFailures: data.PROXY_MAX_FAILURES,
    proxyCooldownMs: data.PROXY_COOLDOWN_MS,
    sourceBaseUrl,
    searchUrls: parseUrlList(data.SEARCH_URLS) ?? [`${sourceBaseUrl}/venda/`],
    userAgentToken: data.USER_AGENT_TOKEN,
  }
}

/** Comma or whitespace separated list; null when nothing usable is given */
export function parseUrlList(value: string | undefined): string[] | null {
  if (!value) return null
  const urls = value
    .split(/[\s,]+/)
    .map(url => url.trim())
    .filter(url => url !== '')
  return urls.length > 0 ? urls : null
}

function isProxyUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value)
    return protocol === 'http:' || protocol === 'https:'
  } catch {
    return false
  }
}

let cached: Settings | null = null

export function getSettings(): Settings {
  if (!cached) {
    cached = loadSettings()
  }
  return cached
}
