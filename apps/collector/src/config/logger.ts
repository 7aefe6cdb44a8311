/**
 * Collector Logger Configuration
 *
 * Pre-configured loggers for collector components
 */

import { createLogger } from '@listingvault/logger'

// Root logger for the collector service
export const logger = createLogger('collector')

export const loggers = {
  orchestrator: logger.child('orchestrator'),
  processor: logger.child('processor'),
  store: logger.child('store'),
  fetch: logger.child('fetch'),
  compliance: logger.child('compliance'),
  extract: logger.child('extract'),
  images: logger.child('images'),
  enrichment: logger.child('enrichment'),
  metrics: logger.child('metrics'),
  cli: logger.child('cli'),
}
