/**
 * Log fields for URLs.
 *
 * Query strings and fragments are dropped before a URL reaches the log
 * stream; a short digest of host and path keeps entries joinable.
 */

import { createHash } from 'node:crypto'

export interface UrlLogFields {
  urlHost?: string
  urlPath?: string
  urlHash?: string
  /** Numeric listing id, when the path carries one */
  listingId?: string
}

export function sanitizeUrl(url?: string | null): UrlLogFields {
  if (!url) return {}

  let parsed: URL
  try {
    parsed = new URL(url)
  } catch {
    return { urlHash: shortDigest(url) }
  }

  const fields: UrlLogFields = {
    urlHost: parsed.host,
    urlPath: parsed.pathname,
    urlHash: shortDigest(parsed.host + parsed.pathname),
  }
  const listingId = parsed.pathname.match(/id-(\d+)/)?.[1]
  if (listingId) {
    fields.listingId = listingId
  }
  return fields
}

function shortDigest(value: string): string {
  return createHash('sha256').update(value).digest('hex').slice(0, 16)
}
