/**
 * YCSB Command
 *
 * Benchmarks the workload client against the baseline filesystem and then
 * with the storage library preloaded, and prints one comparison table per
 * value size.
 *
 * Usage:
 *   preload-bench ycsb <db-dir> <library>
 *   preload-bench ycsb /mnt/pmem/db ./libstore.so -w a,c -s 100,1000
 *   preload-bench ycsb /mnt/pmem/db ./libstore.so -i 3 --no-drop-caches -f json
 */

import { Command } from 'commander'
import { runExperiment, type ExperimentResult } from '../bench/experiment'
import { DEFAULT_CLIENT_PATH, DEFAULT_TRACE_DIR } from '../bench/params'
import { renderJson } from '../bench/report'
import { defaultBenchDeps, type BenchDeps } from '../bench/runner'
import { resolveConfig } from '../utils/config'
import { withErrorHandling } from '../utils/errors'
import { createLogger, type Logger } from '../utils/logger'
import { checkPreconditions, parseIntegerList, parseList, parsePositiveInt } from '../utils/validation'

// ============================================================================
// Types
// ============================================================================

export interface YcsbOptions {
  client: string
  traces: string
  iterations?: string
  workloads?: string
  valueSizes?: string
  baselineLabel: string
  preloadLabel: string
  dropCaches: boolean
  format: string
}

/**
 * Dependencies for runYcsb (for testing)
 */
export interface YcsbDeps {
  bench: BenchDeps
  checkPreconditions: typeof checkPreconditions
  logger: Logger
}

// ============================================================================
// Runner
// ============================================================================

export async function runYcsb(
  dbDir: string,
  library: string,
  options: YcsbOptions,
  deps: Partial<YcsbDeps> = {}
): Promise<ExperimentResult> {
  const logger = deps.logger ?? createLogger('ycsb')

  const config = resolveConfig({
    dbDir,
    library,
    client: options.client,
    traceDir: options.traces,
    iterations: options.iterations !== undefined ? parsePositiveInt(options.iterations, '--iterations') : undefined,
    workloads: options.workloads !== undefined ? parseList(options.workloads, '--workloads') : undefined,
    valueSizes: options.valueSizes !== undefined ? parseIntegerList(options.valueSizes, '--value-sizes') : undefined,
    dropCaches: options.dropCaches,
    baselineName: options.baselineLabel,
    preloadName: options.preloadLabel,
    format: options.format,
  })

  const check = deps.checkPreconditions ?? checkPreconditions
  check(config)
  logger.debug('Resolved configuration', { ...config })

  // in json mode stdout carries only the results document
  const progress = config.format === 'json' ? logger.withSink((line) => console.error(line)) : logger

  progress.log('\nBenchmarking YCSB workloads...')
  const result = await runExperiment(config, progress, deps.bench ?? defaultBenchDeps)

  if (config.format === 'json') {
    logger.log(renderJson(result.results))
  } else {
    logger.log(`\n${result.report}`)
  }

  return result
}

// ============================================================================
// Command
// ============================================================================

export const ycsbCommand = new Command('ycsb')
  .description('Compare client throughput on the baseline filesystem and with a preloaded storage library')
  .argument('<db-dir>', 'Existing directory the client stores its data in')
  .argument('<library>', 'Storage library to preload in the second pass')
  .option('--client <path>', 'Workload client binary', DEFAULT_CLIENT_PATH)
  .option('--traces <dir>', 'Directory holding <workload>-<load|run>.txt traces', DEFAULT_TRACE_DIR)
  .option('-i, --iterations <n>', 'Timed run trials per cell (default: 5)')
  .option('-w, --workloads <list>', 'Comma-separated workloads (default: a,b,c,d,e,f)')
  .option('-s, --value-sizes <list>', 'Comma-separated value sizes in bytes (default: 10,100,1000,10000,100000)')
  .option('--baseline-label <name>', 'Column label for the baseline pass', 'baseline')
  .option('--preload-label <name>', 'Column label for the preload pass', 'preload')
  .option('--no-drop-caches', 'Skip dropping the page cache before each timed trial')
  .option('-f, --format <format>', 'Output format (table/json)', 'table')
  .action(
    withErrorHandling(
      async (dbDir: string, library: string, options: YcsbOptions) => {
        await runYcsb(dbDir, library, options)
      },
      (_dbDir, _library, options) => ({ json: options.format === 'json' })
    )
  )
