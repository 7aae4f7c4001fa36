/**
 * Output Formatting Tests
 */

import { describe, it, expect } from 'vitest'
import { formatRow, formatSectionHeader, formatTable } from '../utils/output'

describe('formatSectionHeader', () => {
  it('puts a blank line and a leading space before the title', () => {
    expect(formatSectionHeader('Throughput')).toBe('\n Throughput')
  })
})

describe('formatRow', () => {
  it('right-aligns cells to their widths with two-space gaps', () => {
    expect(formatRow(['a', '1.000'], [3, 6])).toBe('   a   1.000')
  })

  it('does not cut a cell wider than its column', () => {
    expect(formatRow(['workload', 'x'], [4, 1])).toBe(' workload  x')
  })
})

describe('formatTable', () => {
  it('right-aligns the header row with the data rows', () => {
    expect(formatTable(['Workload', 'ext4'], [['a', '2.000']], [8, 10])).toBe(
      ' Workload        ext4\n        a       2.000'
    )
  })

  it('pads short cells to their column width', () => {
    expect(formatTable(['W', 'X'], [['a', 'b']], [2, 2])).toBe('  W   X\n  a   b')
  })

  it('returns an empty string without headers', () => {
    expect(formatTable([], [], [])).toBe('')
  })
})
