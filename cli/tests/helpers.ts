/**
 * Test Helpers
 *
 * In-process stand-ins for the workload client, a capturing logger and
 * temporary directory management.
 */

import { EventEmitter } from 'events'
import * as fs from 'fs'
import * as os from 'os'
import * as path from 'path'
import { Logger } from '../utils/logger'
import type { BenchDeps } from '../bench/runner'
import type { TrialDescriptor } from '../bench/trial'

// ============================================================================
// Fake Child Process
// ============================================================================

/**
 * Child process double: emit output and close on demand.
 */
export class FakeProcess extends EventEmitter {
  readonly stdout = new EventEmitter()
  readonly stderr = new EventEmitter()

  finish(
    code: number | null,
    output: { stdout?: string | string[]; stderr?: string } = {},
    signal: NodeJS.Signals | null = null
  ): void {
    const chunks = typeof output.stdout === 'string' ? [output.stdout] : output.stdout ?? []
    for (const chunk of chunks) {
      this.stdout.emit('data', Buffer.from(chunk))
    }
    if (output.stderr) {
      this.stderr.emit('data', Buffer.from(output.stderr))
    }
    this.emit('close', code, signal)
  }
}

// ============================================================================
// Client Output
// ============================================================================

/**
 * Summary output in the format the workload client prints.
 */
export function clientOutput(requests: number, elapsedUs: string): string {
  return `Running workload...\nFinished ${requests} requests\nTime elapsed: ${elapsedUs} us\n`
}

// ============================================================================
// Bench Dependencies
// ============================================================================

export interface FakeBench {
  deps: BenchDeps
  /** Every trial the runner asked for, in order */
  trials: TrialDescriptor[]
  /** Side effects in order: `load a 10`, `run a 10`, `drop`, `clear <dir>` */
  events: string[]
}

/**
 * Bench deps whose client answers with `respond(trial)`.
 */
export function createFakeBench(
  respond: (trial: TrialDescriptor) => string | Promise<string>,
  baseEnv: NodeJS.ProcessEnv = { PATH: '/usr/bin' }
): FakeBench {
  const trials: TrialDescriptor[] = []
  const events: string[] = []

  const deps: BenchDeps = {
    execute: async (trial) => {
      trials.push(trial)
      events.push(`${trial.phase} ${trial.workload} ${trial.valueSize}`)
      return respond(trial)
    },
    dropCaches: async () => {
      events.push('drop')
      return true
    },
    clearDirectory: async (dir) => {
      events.push(`clear ${dir}`)
    },
    baseEnv,
  }

  return { deps, trials, events }
}

// ============================================================================
// Logger
// ============================================================================

/**
 * Logger that collects plain output lines and drops levelled messages below error.
 */
export function createCapturingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const logger = new Logger({ level: 'error', colors: false, write: (line) => lines.push(line) })
  return { logger, lines }
}

// ============================================================================
// Temporary Directories
// ============================================================================

export function makeTempDir(prefix = 'preload-bench-test-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix))
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true })
}
