/**
 * Parameter Space
 *
 * The fixed sweep the harness walks for every backend: workload outer,
 * value size inner, each cell timed NUM_ITERS times.
 */

export const WORKLOADS = ['a', 'b', 'c', 'd', 'e', 'f'] as const

export const VALUE_SIZES = [10, 100, 1000, 10000, 100000] as const

export const NUM_ITERS = 5

/** Environment variable the dynamic loader reads for preloaded libraries */
export const PRELOAD_ENV_VAR = 'LD_PRELOAD'

export const DEFAULT_CLIENT_PATH = './ycsbcli'

export const DEFAULT_TRACE_DIR = 'ycsb-traces'

export type Phase = 'load' | 'run'

export const PHASES: readonly Phase[] = ['load', 'run']

/**
 * Resolved sweep for one run. Frozen once built.
 */
export interface SweepConfig {
  /** Path to the workload client binary */
  client: string
  /** Directory holding `<workload>-<phase>.txt` trace files */
  traceDir: string
  /** Target directory the client reads and writes */
  dbDir: string
  workloads: readonly string[]
  valueSizes: readonly number[]
  iterations: number
  dropCaches: boolean
}

/**
 * Enumerate the (workload, value size) cells in sweep order.
 */
export function* cells(sweep: Pick<SweepConfig, 'workloads' | 'valueSizes'>): Generator<{ workload: string; valueSize: number }> {
  for (const workload of sweep.workloads) {
    for (const valueSize of sweep.valueSizes) {
      yield { workload, valueSize }
    }
  }
}
