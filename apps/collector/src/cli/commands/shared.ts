import type { RecordStore } from '@listingvault/record-store'
import { ConfigurationError, resultError } from '../../collector/errors.js'
import type { ProcessedResult } from '../../collector/types.js'
import { loggers } from '../../config/logger.js'
import { getSettings } from '../../config/settings.js'
import { createRuntime, type CollectorRuntime } from '../runtime.js'

const log = loggers.cli

/**
 * The given runtime, or one built from the environment.
 * Returns null when the environment is invalid.
 */
export function resolveRuntime(runtime?: CollectorRuntime): CollectorRuntime | null {
  if (runtime) return runtime
  try {
    return createRuntime(getSettings())
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message)
      return null
    }
    throw error
  }
}

/**
 * Merge every successful result into the store. Listings already saved
 * through callbacks merge to the same values; direct listing URLs are inserted.
 */
export async function persistResults(store: RecordStore, results: ProcessedResult[]): Promise<void> {
  const successful = results.filter(result => resultError(result) === null)
  const outcome = await store.saveResults(successful)
  log.info('Results persisted', { ...outcome })
}
