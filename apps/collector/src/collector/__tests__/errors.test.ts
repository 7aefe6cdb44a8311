import { describe, expect, it } from 'vitest'
import { StoreWriteError } from '@listingvault/record-store'
import {
  AgentInitializationError,
  BlockedBySourceError,
  RetriesExhaustedError,
  TransientFetchError,
  classifyOutcome,
  errorMessage,
  isRetryableError,
  resultError,
} from '../errors.js'
import { listingUrl, SEARCH_URL } from './fakes.js'

describe('collector errors', () => {
  it('names errors after their class', () => {
    expect(new BlockedBySourceError('HTTP 403: Forbidden', listingUrl(1), 403).name).toBe('BlockedBySourceError')
    expect(new AgentInitializationError('no identity').name).toBe('AgentInitializationError')
  })

  it('carries category and retryability', () => {
    const blocked = new BlockedBySourceError('HTTP 429', listingUrl(1))
    const transient = new TransientFetchError('socket hang up', listingUrl(1))
    const exhausted = new RetriesExhaustedError(listingUrl(1), 4)

    expect([blocked.category, blocked.isRetryable]).toEqual(['blocked', true])
    expect([transient.category, transient.isRetryable]).toEqual(['transient', true])
    expect([exhausted.category, exhausted.isRetryable, exhausted.message]).toEqual([
      'exhausted',
      false,
      'Max retries exceeded',
    ])
  })

  it('treats store and agent start-up failures as not retryable', () => {
    expect(isRetryableError(new StoreWriteError('write failed', '/tmp/x.csv'))).toBe(false)
    expect(isRetryableError(new AgentInitializationError('no identity'))).toBe(false)
    expect(isRetryableError(new TransientFetchError('timeout', listingUrl(1)))).toBe(true)
    expect(isRetryableError(new Error('boom'))).toBe(true)
  })

  it('classifies outcomes', () => {
    expect(classifyOutcome(null)).toBe('skipped')
    expect(classifyOutcome({ url: listingUrl(1), title: 'ok' })).toBe('success')
    expect(classifyOutcome({ type: 'search_results', url: SEARCH_URL, listings: [] })).toBe('success')
    expect(classifyOutcome({ url: listingUrl(1), error: 'HTTP 403: Forbidden' })).toBe('blocked')
    expect(classifyOutcome({ url: listingUrl(1), error: 'HTTP 429: Too Many Requests' })).toBe('blocked')
    expect(classifyOutcome({ url: listingUrl(1), error: 'Max retries exceeded' })).toBe('failed')
  })

  it('ignores empty error fields', () => {
    expect(resultError({ url: listingUrl(1), error: '' })).toBeNull()
    expect(resultError({ url: listingUrl(1), error: null })).toBeNull()
    expect(resultError({ url: listingUrl(1), error: 'boom' })).toBe('boom')
  })

  it('normalizes thrown values to messages', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom')
    expect(errorMessage('plain')).toBe('plain')
    expect(errorMessage(42)).toBe('42')
  })
})
