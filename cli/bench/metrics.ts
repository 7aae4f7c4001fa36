/**
 * Throughput Metrics
 */

/**
 * Thousands of operations per second for one run-phase trial.
 *
 * @example
 * throughputKops(100, 50000) // 2
 */
export function throughputKops(requests: number, elapsedUs: number): number {
  return (requests * 1000) / elapsedUs
}

/**
 * Unweighted arithmetic mean.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) {
    throw new RangeError('Cannot average an empty list of values')
  }
  const sum = values.reduce((a, b) => a + b, 0)
  return sum / values.length
}
