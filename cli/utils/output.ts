/**
 * Output Formatting Utilities
 *
 * Shared helpers for the fixed-width console tables the harness prints.
 */

/**
 * Format a section header: blank line, then the indented title
 * @param title - The section title
 */
export function formatSectionHeader(title: string): string {
  return `\n ${title}`
}

/**
 * Format one table row: a leading space, cells right-aligned to their
 * column width, two spaces between columns
 * @param cells - Cell values for the row
 * @param widths - Column widths (a cell longer than its width is not cut)
 */
export function formatRow(cells: string[], widths: number[]): string {
  return ' ' + cells.map((cell, i) => cell.padStart(widths[i] ?? cell.length)).join('  ')
}

/**
 * Format tabular data with a header row and right-aligned columns
 * @param headers - Column header names
 * @param rows - Array of row data (each row is an array of cell values)
 * @param columnWidths - Width of each column
 */
export function formatTable(headers: string[], rows: string[][], columnWidths: number[]): string {
  if (headers.length === 0) return ''

  return [headers, ...rows].map((row) => formatRow(row, columnWidths)).join('\n')
}
