/**
 * Trial Descriptor Builder
 *
 * Turns one (workload, value size, phase) point into the exact client
 * invocation. Pure: nothing here touches the filesystem.
 */

import * as path from 'path'
import type { Phase } from './params'

export interface TrialDescriptor {
  command: string
  args: string[]
  env: NodeJS.ProcessEnv
  workload: string
  valueSize: number
  phase: Phase
}

export interface TrialInput {
  client: string
  traceDir: string
  dbDir: string
  workload: string
  valueSize: number
  phase: Phase
  env: NodeJS.ProcessEnv
}

/**
 * Path of the trace file for a workload phase, e.g. `ycsb-traces/a-load.txt`
 */
export function tracePath(traceDir: string, workload: string, phase: Phase): string {
  return path.join(traceDir, `${workload}-${phase}.txt`)
}

export function buildTrial(input: TrialInput): TrialDescriptor {
  return {
    command: input.client,
    args: [
      '-f', tracePath(input.traceDir, input.workload, input.phase),
      '-v', String(input.valueSize),
      '-d', input.dbDir,
    ],
    env: input.env,
    workload: input.workload,
    valueSize: input.valueSize,
    phase: input.phase,
  }
}
