/**
 * Process Executor
 *
 * Runs the workload client (or any helper command) as a child process and
 * buffers both output streams until it exits. There is no timeout: a hung
 * client hangs the run.
 */

import { spawn, type SpawnOptions } from 'child_process'
import { ExternalProcessError } from '../utils/errors'
import type { TrialDescriptor } from './trial'

// ============================================================================
// Types
// ============================================================================

export interface ClientOutputStream {
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown
}

/**
 * The slice of ChildProcess the executor relies on.
 */
export interface ClientProcess {
  readonly stdout: ClientOutputStream | null
  readonly stderr: ClientOutputStream | null
  once(event: 'error', listener: (error: Error) => void): unknown
  once(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown
}

export type SpawnClient = (command: string, args: string[], options: SpawnOptions) => ClientProcess

/**
 * Dependencies for the executor (for testing)
 */
export interface ExecutorDeps {
  spawn: SpawnClient
}

export interface CommandResult {
  code: number | null
  signal: NodeJS.Signals | null
  stdout: string
  stderr: string
}

export const defaultExecutorDeps: ExecutorDeps = {
  spawn: (command, args, options) => spawn(command, args, options),
}

// ============================================================================
// Execution
// ============================================================================

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === 'string' ? Buffer.from(chunk) : chunk
}

/**
 * Run a command to completion and capture its output.
 * Rejects only when the process cannot be started.
 */
export function runCommand(
  command: string,
  args: string[],
  env: NodeJS.ProcessEnv,
  deps: ExecutorDeps = defaultExecutorDeps
): Promise<CommandResult> {
  return new Promise((resolve, reject) => {
    let proc: ClientProcess
    try {
      proc = deps.spawn(command, args, {
        env,
        stdio: ['ignore', 'pipe', 'pipe'],
      })
    } catch (error) {
      reject(ExternalProcessError.spawnFailed(command, error instanceof Error ? error : undefined))
      return
    }

    // decoded on close: a multi-byte character may span two chunks
    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    proc.stdout?.on('data', (data) => {
      stdout.push(toBuffer(data))
    })
    proc.stderr?.on('data', (data) => {
      stderr.push(toBuffer(data))
    })

    proc.once('error', (error) => {
      reject(ExternalProcessError.spawnFailed(command, error))
    })
    proc.once('close', (code, signal) => {
      resolve({
        code,
        signal,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
      })
    })
  })
}

/**
 * Run one trial and return the client's stdout.
 * A non-zero exit, or death by signal, rejects with both captured streams.
 */
export async function executeTrial(trial: TrialDescriptor, deps: ExecutorDeps = defaultExecutorDeps): Promise<string> {
  const result = await runCommand(trial.command, trial.args, trial.env, deps)
  if (result.code !== 0) {
    throw ExternalProcessError.failed(trial.command, trial.args, result)
  }
  return result.stdout
}
