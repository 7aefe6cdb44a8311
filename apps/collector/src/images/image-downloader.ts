/**
 * Image Downloader
 *
 * Saves a listing's photos under `<output>/images/<listing-id>/` and records
 * their relative paths on the listing. One failed image never fails the
 * listing.
 */

import { mkdir, writeFile } from 'node:fs/promises'
import path from 'node:path'
import type { ILogger } from '@listingvault/logger'
import type { FieldValue, ListingRecord } from '@listingvault/record-store'
import type { ImageCollaborator } from '../collector/types.js'
import { loggers } from '../config/logger.js'
import { sanitizeUrl } from '../config/structured-log.js'

const IMAGE_EXTENSIONS = new Set(['jpg', 'jpeg', 'png', 'gif', 'webp'])

export interface ImageDownloaderOptions {
  outputDir: string
  /** Maximum images saved per listing (default: 20) */
  maxImages?: number
  /** Pause between two downloads in ms (default: 500) */
  delayMs?: number
  /** Per-image timeout in ms (default: 30000) */
  timeoutMs?: number
  /** Sent as User-Agent on image requests */
  userAgent?: string
  sleep?: (ms: number) => Promise<void>
  logger?: ILogger
}

export class ImageDownloader implements ImageCollaborator {
  private readonly outputDir: string
  private readonly imagesDir: string
  private readonly maxImages: number
  private readonly delayMs: number
  private readonly timeoutMs: number
  private readonly userAgent?: string
  private readonly sleep: (ms: number) => Promise<void>
  private readonly log: ILogger

  constructor(options: ImageDownloaderOptions) {
    this.outputDir = options.outputDir
    this.imagesDir = path.join(options.outputDir, 'images')
    this.maxImages = options.maxImages ?? 20
    this.delayMs = options.delayMs ?? 500
    this.timeoutMs = options.timeoutMs ?? 30000
    this.userAgent = options.userAgent
    this.sleep = options.sleep ?? (ms => new Promise(resolve => setTimeout(resolve, ms)))
    this.log = options.logger ?? loggers.images
  }

  async downloadListingImages(record: ListingRecord): Promise<void> {
    const images = normalizeImageList(record.images).slice(0, this.maxImages)
    if (images.length === 0) {
      this.log.debug('No images found in listing')
      return
    }

    const listingId = listingIdFromUrl(typeof record.url === 'string' ? record.url : '')
    const imageDir = path.join(this.imagesDir, listingId)
    await mkdir(imageDir, { recursive: true })

    const saved: string[] = []
    for (const [index, imageUrl] of images.entries()) {
      const relativePath = await this.downloadOne(imageUrl, index, imageDir)
      if (relativePath) {
        saved.push(relativePath)
      }
      if (index < images.length - 1 && this.delayMs > 0) {
        await this.sleep(this.delayMs)
      }
    }

    if (saved.length === 0) {
      this.log.debug('No images were downloaded', { listingId })
      return
    }

    record.images_local = saved
    record.images_local_count = saved.length
    this.log.info('Images downloaded', { listingId, count: saved.length })
  }

  private async downloadOne(imageUrl: string, index: number, imageDir: string): Promise<string | null> {
    try {
      const response = await fetch(imageUrl, {
        headers: this.userAgent ? { 'User-Agent': this.userAgent } : {},
        signal: AbortSignal.timeout(this.timeoutMs),
      })
      if (response.status !== 200) {
        this.log.debug('Image download failed', { ...sanitizeUrl(imageUrl), statusCode: response.status })
        return null
      }

      const filename = `image_${String(index + 1).padStart(3, '0')}.${extensionOf(imageUrl)}`
      const filePath = path.join(imageDir, filename)
      await writeFile(filePath, Buffer.from(await response.arrayBuffer()))

      return path.relative(this.outputDir, filePath).split(path.sep).join('/')
    } catch (error) {
      this.log.debug('Image download failed', { ...sanitizeUrl(imageUrl) }, error)
      return null
    }
  }
}

/**
 * Folder name for a listing: `listing_<digits>` from an `id-<digits>` URL,
 * else the sanitized last path segment.
 */
export function listingIdFromUrl(url: string): string {
  if (!url) return 'unknown'

  const idMatch = url.match(/id-(\d+)/)
  if (idMatch) return `listing_${idMatch[1]}`

  const lastPart = url.replace(/\/+$/, '').split('/').pop()?.split('?')[0] ?? ''
  const safeName = lastPart.replace(/[^\w.-]/g, '_').slice(0, 50)
  return safeName || 'unknown'
}

export function extensionOf(imageUrl: string): string {
  const lastSegment = imageUrl.split('?')[0].split('/').pop() ?? ''
  if (!lastSegment.includes('.')) return 'jpg'
  const ext = lastSegment.split('.').pop()?.toLowerCase() ?? ''
  return IMAGE_EXTENSIONS.has(ext) ? ext : 'jpg'
}

/** Image URLs from a list or from comma-joined text read back from the store */
export function normalizeImageList(images: FieldValue): string[] {
  if (typeof images === 'string') {
    return images
      .split(',')
      .map(image => image.trim())
      .filter(image => image !== '')
  }
  if (Array.isArray(images)) {
    return images
      .filter(image => image !== null && image !== undefined && image !== '')
      .map(image => String(image).trim())
  }
  return []
}
