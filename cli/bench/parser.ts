/**
 * Client Output Parser
 *
 * Extracts the request count and elapsed time from the workload client's
 * summary output, e.g.
 *
 * ```
 * Finished 100000 requests
 * Time elapsed: 1523421.250 us
 * ```
 *
 * Anything that does not match exactly is rejected rather than defaulted.
 */

import { MalformedOutputError } from '../utils/errors'

export interface TrialResult {
  /** Requests the client completed */
  requests: number
  /** Wall-clock time of the run in microseconds, always > 0 */
  elapsedUs: number
}

export const REQUESTS_MARKER = 'Finished '
export const REQUESTS_SUFFIX = ' requests'
export const ELAPSED_MARKER = 'Time elapsed: '
export const ELAPSED_SUFFIX = ' us'

const INTEGER_PATTERN = /^\d+$/
const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/

/**
 * Text between `marker` and the first `suffix` that follows it.
 */
function extractBetween(output: string, marker: string, suffix: string): string {
  const start = output.indexOf(marker)
  if (start === -1) {
    throw MalformedOutputError.markerNotFound(marker, output)
  }
  const valueStart = start + marker.length
  const end = output.indexOf(suffix, valueStart)
  if (end === -1) {
    throw MalformedOutputError.markerNotFound(suffix, output)
  }
  return output.slice(valueStart, end)
}

export function parseClientOutput(output: string): TrialResult {
  const requestsText = extractBetween(output, REQUESTS_MARKER, REQUESTS_SUFFIX)
  if (!INTEGER_PATTERN.test(requestsText)) {
    throw MalformedOutputError.invalidNumber('request count', requestsText, output)
  }
  const requests = Number.parseInt(requestsText, 10)
  if (!Number.isSafeInteger(requests)) {
    throw MalformedOutputError.invalidNumber('request count', requestsText, output)
  }

  const elapsedText = extractBetween(output, ELAPSED_MARKER, ELAPSED_SUFFIX)
  if (!DECIMAL_PATTERN.test(elapsedText)) {
    throw MalformedOutputError.invalidNumber('elapsed time', elapsedText, output)
  }
  const elapsedUs = Number.parseFloat(elapsedText)
  // zero or negative time would turn into an infinite or negative throughput
  if (!Number.isFinite(elapsedUs) || elapsedUs <= 0) {
    throw MalformedOutputError.invalidNumber('elapsed time', elapsedText, output)
  }

  return { requests, elapsedUs }
}
