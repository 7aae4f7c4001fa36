/**
 * Backend Runner
 *
 * Walks the full workload x value-size sweep for one backend. Each cell gets
 * one untimed load trial, then `iterations` timed run trials with the page
 * cache dropped before each. The mean throughput goes into the shared
 * ResultTable and the target directory is emptied before the next cell.
 */

import type { Logger } from '../utils/logger'
import { buildEnvironment, type BackendConfig } from './backends'
import { dropPageCache } from './cache'
import { clearDirectory } from './cleanup'
import { executeTrial } from './executor'
import { mean, throughputKops } from './metrics'
import { cells, type Phase, type SweepConfig } from './params'
import { parseClientOutput, type TrialResult } from './parser'
import type { ResultTable } from './results'
import { buildTrial, type TrialDescriptor } from './trial'

// ============================================================================
// Types
// ============================================================================

/**
 * Side-effecting collaborators of a run (injectable for tests)
 */
export interface BenchDeps {
  /** Run one trial and resolve its stdout */
  execute: (trial: TrialDescriptor) => Promise<string>
  /** Drop the OS page cache; failures are the callee's to report */
  dropCaches: (logger: Logger) => Promise<unknown>
  /** Remove everything inside the target directory */
  clearDirectory: (dir: string) => Promise<void>
  /** Environment the backend overrides are applied to */
  baseEnv: NodeJS.ProcessEnv
}

export const defaultBenchDeps: BenchDeps = {
  execute: (trial) => executeTrial(trial),
  dropCaches: (logger) => dropPageCache(logger),
  clearDirectory,
  baseEnv: process.env,
}

export interface BackendRunOptions {
  sweep: SweepConfig
  backend: BackendConfig
  results: ResultTable
  deps: BenchDeps
  logger: Logger
}

// ============================================================================
// Progress Output
// ============================================================================

/**
 * One progress line per timed trial, e.g. ` a     10x1000  52341.000`
 */
export function formatProgressLine(workload: string, valueSize: number, result: TrialResult): string {
  return ` ${workload.padEnd(1)} ${String(valueSize).padStart(6)}x${String(result.requests).padEnd(5)} ${result.elapsedUs.toFixed(3)}`
}

// ============================================================================
// Runner
// ============================================================================

export async function runBackend(options: BackendRunOptions): Promise<void> {
  const { sweep, backend, results, deps, logger } = options
  const env = buildEnvironment(deps.baseEnv, backend.env)
  const log = logger.child(backend.name)

  const trialFor = (workload: string, valueSize: number, phase: Phase): TrialDescriptor =>
    buildTrial({
      client: sweep.client,
      traceDir: sweep.traceDir,
      dbDir: sweep.dbDir,
      workload,
      valueSize,
      phase,
      env,
    })

  for (const { workload, valueSize } of cells(sweep)) {
    log.debug(`Loading workload ${workload} with value size ${valueSize}`)
    await deps.execute(trialFor(workload, valueSize, 'load'))

    const samples: number[] = []
    for (let i = 0; i < sweep.iterations; i++) {
      if (sweep.dropCaches) {
        await deps.dropCaches(log)
      }

      const stdout = await deps.execute(trialFor(workload, valueSize, 'run'))
      const result = parseClientOutput(stdout)
      logger.log(formatProgressLine(workload, valueSize, result))
      samples.push(throughputKops(result.requests, result.elapsedUs))
    }

    const kops = mean(samples)
    results.record(valueSize, workload, backend.name, kops)
    log.debug(`Recorded ${kops.toFixed(3)} kops/sec`, { workload, valueSize })

    await deps.clearDirectory(sweep.dbDir)
  }
}
