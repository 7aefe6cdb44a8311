/**
 * URL Classification Utilities
 *
 * The source has two URL shapes: search result pages and individual listing
 * pages. Identities are compared after trimming and dropping trailing slashes.
 */

import psl from 'psl'

export interface UrlRules {
  /** Registrable domain of the source (e.g. "zapimoveis.com.br") */
  sourceHost: string
  /** Path marker of an individual listing */
  listingMarker: string
  /** Path markers of search and navigation pages */
  searchMarkers: readonly string[]
}

export const DEFAULT_URL_RULES: UrlRules = {
  sourceHost: 'zapimoveis.com.br',
  listingMarker: '/imovel/',
  searchMarkers: ['/venda/', '/aluguel/', '/busca', '/pesquisa'],
}

/** Query parameter carrying the result page number */
export const PAGE_PARAM = 'pagina'

/**
 * Rules for a configured source base URL.
 */
export function rulesForSource(baseUrl: string, base: UrlRules = DEFAULT_URL_RULES): UrlRules {
  return { ...base, sourceHost: getRegistrableDomain(baseUrl) }
}

/**
 * Individual listing: on the source host, carries the listing marker and
 * none of the search markers.
 */
export function isListingUrl(url: string, rules: UrlRules = DEFAULT_URL_RULES): boolean {
  const lower = url.toLowerCase()
  if (!lower.includes(rules.sourceHost) || !lower.includes(rules.listingMarker)) {
    return false
  }
  return !rules.searchMarkers.some(marker => lower.includes(marker))
}

export function isSearchUrl(url: string, rules: UrlRules = DEFAULT_URL_RULES): boolean {
  const lower = url.toLowerCase()
  return lower.includes(rules.sourceHost) && rules.searchMarkers.some(marker => lower.includes(marker))
}

export function normalizeIdentity(url: string): string {
  return url.trim().replace(/\/+$/, '')
}

/**
 * Extract the registrable domain (eTLD+1) from a URL.
 * Rate limiting is scoped by registrable domain.
 *
 * Uses the Public Suffix List (psl) so multi-part TLDs like .com.br resolve
 * to "example.com.br" rather than "com.br".
 */
export function getRegistrableDomain(url: string): string {
  const parsed = new URL(url)
  const hostname = parsed.hostname.toLowerCase()

  const parsedDomain = psl.parse(hostname)

  if (parsedDomain.error) {
    return hostname
  }

  return parsedDomain.domain || hostname
}

/**
 * URL of result page `pageNumber`; page 1 is the base URL itself.
 */
export function buildPageUrl(baseUrl: string, pageNumber: number): string {
  if (pageNumber <= 1) return baseUrl
  const parsed = new URL(baseUrl)
  parsed.searchParams.set(PAGE_PARAM, String(pageNumber))
  return parsed.toString()
}

/**
 * Absolute listing URL without query string or fragment.
 */
export function toListingUrl(href: string, pageUrl: string): string | null {
  try {
    const parsed = new URL(href, pageUrl)
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return null
    parsed.search = ''
    parsed.hash = ''
    return parsed.toString()
  } catch {
    return null
  }
}

export function isHttpUrl(value: string): boolean {
  try {
    const parsed = new URL(value)
    return parsed.protocol === 'http:' || parsed.protocol === 'https:'
  } catch {
    return false
  }
}
