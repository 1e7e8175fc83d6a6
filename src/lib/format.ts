/**
 * Output formatting for the command line
 * Column tables, key/value listings and YAML dumps, with optional ANSI styling
 */

import * as yaml from 'js-yaml'

const ANSI = {
  bold: '\u001B[1m',
  red: '\u001B[31m',
  reset: '\u001B[0m',
}

/** Cells wider than this are truncated with an ellipsis */
export const MAX_COLUMN_WIDTH = 30

type StyleFn = (text: string) => string

interface Styles {
  error: StyleFn
  header: StyleFn
}

export interface FormatOptions {
  styled?: boolean
}

function createStyles(useColors: boolean): Styles {
  if (!useColors) {
    const identity: StyleFn = (text) => text
    return { error: identity, header: identity }
  }

  return {
    error: (text) => `${ANSI.red}${text}${ANSI.reset}`,
    header: (text) => `${ANSI.bold}${text}${ANSI.reset}`,
  }
}

/**
 * Plain text of a table cell: empty for null, JSON for objects
 */
export function cellText(value: unknown): string {
  if (value === null || value === undefined) return ''
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}

function fit(text: string, width: number): string {
  const cell = text.length > width ? text.slice(0, width - 1) + '…' : text
  return cell.padEnd(width)
}

/**
 * Render rows under a header line and a dashed rule
 */
export function formatTable(columns: string[], rows: unknown[][], options: FormatOptions = {}): string {
  const styles = createStyles(options.styled ?? false)
  const cells = rows.map(row => columns.map((_, i) => cellText(row[i])))
  const widths = columns.map((col, i) =>
    Math.min(Math.max(col.length, ...cells.map(row => row[i].length)), MAX_COLUMN_WIDTH)
  )

  const lines = [
    styles.header(columns.map((col, i) => fit(col, widths[i])).join('  ').trimEnd()),
    widths.map(w => '-'.repeat(w)).join('  '),
  ]
  for (const row of cells) {
    lines.push(row.map((cell, i) => fit(cell, widths[i])).join('  ').trimEnd())
  }

  return lines.join('\n')
}

/**
 * Two-column listing, one `key  value` line per pair
 */
export function formatKeyValue(pairs: Array<[string, unknown]>, options: FormatOptions = {}): string {
  const styles = createStyles(options.styled ?? false)
  const width = Math.max(0, ...pairs.map(([key]) => key.length))
  return pairs.map(([key, value]) => `${styles.header(key.padEnd(width))}  ${cellText(value)}`.trimEnd()).join('\n')
}

/**
 * Nested data as YAML
 */
export function formatYaml(data: unknown): string {
  return yaml
    .dump(data, {
      indent: 2,
      lineWidth: -1,
      noRefs: true,
      skipInvalid: true,
    })
    .trimEnd()
}

/**
 * One-line report of a bad status and the service's error body
 */
export function formatErrorResponse(status: number, payload: unknown, options: FormatOptions = {}): string {
  const styles = createStyles(options.styled ?? false)
  const detail = typeof payload === 'string' ? payload : JSON.stringify(payload)
  return `${styles.error('Error!')} Status: ${status} ${detail}`.trimEnd()
}
