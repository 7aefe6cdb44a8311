import { PipelineOrchestrator } from '../../collector/orchestrator.js'
import { loggers } from '../../config/logger.js'
import { selectEnrichmentTargets } from '../../enrichment/select-targets.js'
import type { CollectorRuntime } from '../runtime.js'
import { persistResults, resolveRuntime } from './shared.js'

const log = loggers.cli

export async function runEnrichCommand(runtime?: CollectorRuntime): Promise<number> {
  const resolved = resolveRuntime(runtime)
  if (!resolved) {
    return 2
  }

  try {
    const targets = await selectEnrichmentTargets(resolved.store, resolved.rules)
    if (targets.length === 0) {
      log.warn('No stored listings need enrichment', { store: resolved.store.filePath })
      return 1
    }

    const orchestrator = new PipelineOrchestrator({
      urls: targets,
      mode: 'enrich-only',
      store: resolved.store,
      images: resolved.images,
      processor: resolved.processor,
    })

    const summary = await orchestrator.run()
    await persistResults(resolved.store, summary.results)

    log.info('Enrichment finished', { runId: summary.runId, ...summary.stats, durationMs: summary.durationMs })
    return 0
  } catch (error) {
    log.error('Enrichment failed', {}, error)
    return 1
  }
}
