/**
 * preload-bench
 *
 * Public API for driving the benchmark programmatically.
 */

export { runExperiment } from './bench/experiment'
export type { ExperimentConfig, ExperimentResult } from './bench/experiment'
export { runBackend, defaultBenchDeps, formatProgressLine } from './bench/runner'
export type { BenchDeps, BackendRunOptions } from './bench/runner'
export { createBackends, buildEnvironment } from './bench/backends'
export type { BackendConfig } from './bench/backends'
export { buildTrial, tracePath } from './bench/trial'
export type { TrialDescriptor } from './bench/trial'
export { executeTrial, runCommand } from './bench/executor'
export type { ExecutorDeps, CommandResult } from './bench/executor'
export { parseClientOutput } from './bench/parser'
export type { TrialResult } from './bench/parser'
export { throughputKops, mean } from './bench/metrics'
export { ResultTable } from './bench/results'
export { renderReport, renderJson } from './bench/report'
export { dropPageCache } from './bench/cache'
export { clearDirectory } from './bench/cleanup'
export { WORKLOADS, VALUE_SIZES, NUM_ITERS, PRELOAD_ENV_VAR } from './bench/params'
export type { SweepConfig, Phase } from './bench/params'
export { resolveConfig, BenchConfigSchema } from './utils/config'
export type { BenchConfig } from './utils/config'
export * from './utils/errors'
export { runYcsb, ycsbCommand } from './commands/ycsb'
