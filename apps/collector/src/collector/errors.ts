/**
 * Collector Error Taxonomy
 *
 * Errors carry a category for logging and statistics, and whether another
 * attempt can succeed. A compliance rejection is not an error: it is the
 * `skipped` outcome.
 */

import { isSearchResults, StoreWriteError } from '@listingvault/record-store'
import type { UrlOutcome } from './types.js'

export type ErrorCategory = 'blocked' | 'transient' | 'exhausted' | 'infrastructure' | 'configuration'

export abstract class CollectorError extends Error {
  abstract readonly category: ErrorCategory
  abstract readonly isRetryable: boolean

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/** The source answered 403/429 or served a challenge page */
export class BlockedBySourceError extends CollectorError {
  readonly category = 'blocked'
  readonly isRetryable = true

  constructor(
    message: string,
    readonly url: string,
    readonly statusCode?: number
  ) {
    super(message)
  }
}

/** Network failure, timeout or unexpected status during a fetch */
export class TransientFetchError extends CollectorError {
  readonly category = 'transient'
  readonly isRetryable = true

  constructor(
    message: string,
    readonly url: string,
    options?: { cause?: unknown }
  ) {
    super(message, options)
  }
}

/** Surfaced as `{ url, error }`, never thrown out of the processor */
export class RetriesExhaustedError extends CollectorError {
  readonly category = 'exhausted'
  readonly isRetryable = false

  constructor(
    readonly url: string,
    readonly attempts: number
  ) {
    super('Max retries exceeded')
  }
}

/** The fetch agent could not start a session */
export class AgentInitializationError extends CollectorError {
  readonly category = 'infrastructure'
  readonly isRetryable = false
}

export class ConfigurationError extends CollectorError {
  readonly category = 'configuration'
  readonly isRetryable = false

  constructor(
    message: string,
    readonly issues: string[]
  ) {
    super(message)
  }
}

export type OutcomeClass = 'success' | 'skipped' | 'blocked' | 'failed'

const BLOCK_MARKERS = ['403', '429']

export function isBlockedMessage(message: string): boolean {
  return BLOCK_MARKERS.some(marker => message.includes(marker))
}

/** The `error` text of a result, or null when it succeeded */
export function resultError(outcome: UrlOutcome): string | null {
  if (outcome === null || isSearchResults(outcome)) return null
  const error = outcome.error
  if (error === undefined || error === null || error === '') return null
  return String(error)
}

export function classifyOutcome(outcome: UrlOutcome): OutcomeClass {
  if (outcome === null) return 'skipped'
  const error = resultError(outcome)
  if (error === null) return 'success'
  return isBlockedMessage(error) ? 'blocked' : 'failed'
}

/**
 * Whether another attempt could change the result. Store failures and agent
 * start-up failures cannot be fixed by retrying the same URL.
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof CollectorError || error instanceof StoreWriteError) {
    return error.isRetryable
  }
  return true
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message
  if (typeof error === 'string') return error
  return String(error)
}
