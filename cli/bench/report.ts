/**
 * Report Renderer
 *
 * Pivots the ResultTable into one table per value size with each backend's
 * throughput side by side.
 */

import { MissingResultError } from '../utils/errors'
import { formatSectionHeader, formatTable } from '../utils/output'
import type { ResultTable } from './results'

const WORKLOAD_COLUMN_WIDTH = 8
const VALUE_COLUMN_WIDTH = 10

/**
 * Render the comparison tables. Every cell must carry a figure for every
 * backend in `backendNames`; a gap raises MissingResultError.
 */
export function renderReport(results: ResultTable, backendNames: readonly string[]): string {
  const headers = ['Workload', ...backendNames]
  const widths = [WORKLOAD_COLUMN_WIDTH, ...backendNames.map((name) => Math.max(VALUE_COLUMN_WIDTH, name.length))]

  const sections = results.valueSizes().map((valueSize) => {
    const rows = results.workloads(valueSize).map((workload) => [
      workload,
      ...backendNames.map((backend) => {
        const kops = results.get(valueSize, workload, backend)
        if (kops === undefined) {
          throw new MissingResultError(valueSize, workload, backend)
        }
        return kops.toFixed(3)
      }),
    ])

    return `${formatSectionHeader(`Throughput (kops/sec) - Value size ${valueSize}`)}\n${formatTable(headers, rows, widths)}`
  })

  return `Result tables--\n${sections.join('\n')}\n`
}

/**
 * Results as JSON, in the order they were recorded.
 */
export function renderJson(results: ResultTable): string {
  return JSON.stringify(results.toJSON(), null, 2)
}
