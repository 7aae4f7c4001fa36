/**
 * Experiment Driver
 *
 * Owns the ResultTable for a run. The baseline pass runs every cell to
 * completion before the preload pass starts: both passes write to and clean
 * the same target directory.
 */

import type { Logger } from '../utils/logger'
import { createBackends, type BackendConfig } from './backends'
import type { SweepConfig } from './params'
import { renderReport } from './report'
import { ResultTable } from './results'
import { runBackend, defaultBenchDeps, type BenchDeps } from './runner'

export interface ExperimentConfig extends SweepConfig {
  /** Storage library preloaded in the second pass */
  library: string
  baselineName: string
  preloadName: string
}

export interface ExperimentResult {
  backends: readonly BackendConfig[]
  results: ResultTable
  /** Rendered comparison tables */
  report: string
}

export async function runExperiment(
  config: ExperimentConfig,
  logger: Logger,
  deps: BenchDeps = defaultBenchDeps
): Promise<ExperimentResult> {
  const results = new ResultTable()
  const backends = createBackends({
    library: config.library,
    baselineName: config.baselineName,
    preloadName: config.preloadName,
  })

  for (const backend of backends) {
    logger.log(`\n${backend.name} --`)
    await runBackend({ sweep: config, backend, results, deps, logger })
  }

  // preloaded library first, baseline second
  const report = renderReport(results, [config.preloadName, config.baselineName])
  return { backends, results, report }
}
