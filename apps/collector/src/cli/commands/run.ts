import { PipelineOrchestrator } from '../../collector/orchestrator.js'
import { loggers } from '../../config/logger.js'
import { parseUrlList } from '../../config/settings.js'
import { isHttpUrl } from '../../utils/url.js'
import type { CollectorRuntime } from '../runtime.js'
import { persistResults, resolveRuntime } from './shared.js'

export interface RunCommandArgs {
  /** Seed URLs, comma or space separated; defaults to SEARCH_URLS */
  urls: string
}

const log = loggers.cli

export async function runCollectCommand(args: RunCommandArgs, runtime?: CollectorRuntime): Promise<number> {
  const resolved = resolveRuntime(runtime)
  if (!resolved) {
    return 2
  }

  const urls = parseUrlList(args.urls) ?? resolved.settings.searchUrls
  const invalid = urls.filter(url => !isHttpUrl(url))
  if (invalid.length > 0) {
    console.error(`Invalid URL: ${invalid.join(', ')}`)
    return 2
  }

  try {
    const orchestrator = new PipelineOrchestrator({
      urls,
      mode: 'normal',
      maxConcurrent: resolved.settings.maxConcurrent,
      store: resolved.store,
      images: resolved.images,
      processor: resolved.processor,
    })

    const summary = await orchestrator.run()
    await persistResults(resolved.store, summary.results)

    log.info('Collection finished', { runId: summary.runId, ...summary.stats, durationMs: summary.durationMs })
    return 0
  } catch (error) {
    log.error('Collection failed', {}, error)
    return 1
  }
}
