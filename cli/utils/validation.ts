/**
 * Validation Utilities
 *
 * Option parsers for the CLI and the path checks that run before any
 * benchmarking starts.
 */

import * as fs from 'fs'
import { PHASES } from '../bench/params'
import { tracePath } from '../bench/trial'
import { PreconditionError, ValidationError } from './errors'

/**
 * Parse a strictly positive integer option.
 *
 * @example
 * parsePositiveInt('5', '--iterations')   // Returns 5
 * parsePositiveInt('0', '--iterations')   // Throws: ValidationError
 * parsePositiveInt('2x', '--iterations')  // Throws: ValidationError
 */
export function parsePositiveInt(value: string, option: string): number {
  if (!/^\d+$/.test(value)) {
    throw ValidationError.invalidOption(option, 'a positive integer', value)
  }
  const parsed = parseInt(value, 10)
  if (parsed < 1) {
    throw ValidationError.invalidOption(option, 'a positive integer', value)
  }
  return parsed
}

/**
 * Split a comma-separated option into trimmed, non-empty items.
 */
export function parseList(value: string, option: string): string[] {
  const items = value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
  if (items.length === 0) {
    throw ValidationError.invalidOption(option, 'a comma-separated list', value)
  }
  return items
}

/**
 * Comma-separated list of positive integers, e.g. `10,1000`.
 */
export function parseIntegerList(value: string, option: string): number[] {
  return parseList(value, option).map((item) => parsePositiveInt(item, option))
}

export interface PreconditionInput {
  dbDir: string
  library: string
  client: string
  traceDir: string
  workloads: readonly string[]
}

/**
 * Fail fast, before the first trial, when a required path is absent.
 */
export function checkPreconditions(input: PreconditionInput): void {
  if (!fs.existsSync(input.dbDir)) {
    throw PreconditionError.pathNotFound('Target directory', input.dbDir)
  }
  if (!fs.statSync(input.dbDir).isDirectory()) {
    throw PreconditionError.notADirectory('Target directory', input.dbDir)
  }
  if (!fs.existsSync(input.library)) {
    throw PreconditionError.pathNotFound('Preload library', input.library)
  }
  if (!fs.existsSync(input.client)) {
    throw PreconditionError.pathNotFound('Workload client', input.client)
  }
  for (const workload of input.workloads) {
    for (const phase of PHASES) {
      const trace = tracePath(input.traceDir, workload, phase)
      if (!fs.existsSync(trace)) {
        throw PreconditionError.pathNotFound('Trace file', trace)
      }
    }
  }
}
