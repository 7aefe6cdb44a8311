/**
 * Collector Metrics
 *
 * No metrics backend: runs are reported as structured log events.
 */

import { loggers } from '../config/logger.js'
import type { RunMode, RunStats } from './types.js'

const log = loggers.metrics

const FAILURE_RATE_ALERT_THRESHOLD = 0.5
const MIN_URLS_FOR_ALERT = 20

export interface RunCompletedPayload {
  runId: string
  mode: RunMode
  stats: RunStats
  durationMs: number
}

/** Share of attempted URLs that failed or were blocked; skipped URLs were never attempted */
export function failureRate(stats: RunStats): number {
  const attempted = stats.total - stats.skipped
  if (attempted <= 0) return 0
  return (stats.failed + stats.blocked) / attempted
}

export function recordRunCompleted(payload: RunCompletedPayload): void {
  const urlsAttempted = payload.stats.total - payload.stats.skipped
  const rate = failureRate(payload.stats)

  log.info('COLLECTOR_RUN_COMPLETED', {
    event_name: 'COLLECTOR_RUN_COMPLETED',
    runId: payload.runId,
    mode: payload.mode,
    ...payload.stats,
    urlsAttempted,
    failureRate: rate,
    durationMs: payload.durationMs,
  })

  if (urlsAttempted >= MIN_URLS_FOR_ALERT && rate > FAILURE_RATE_ALERT_THRESHOLD) {
    log.warn('COLLECTOR_ALERT_HIGH_FAILURE_RATE', {
      event_name: 'COLLECTOR_ALERT_HIGH_FAILURE_RATE',
      runId: payload.runId,
      mode: payload.mode,
      failureRate: rate,
      urlsAttempted,
    })
  }
}
