/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): tables and colors on stderr
 * - Pipe: data only, on stdout
 */

import { Table, renderToString } from 'tuiuiu.js'

export const isTTY = process.stdout.isTTY ?? false

/**
 * Output data to stdout. The only function that writes data.
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Log message to stderr (only in TTY mode)
 */
export function log(message: string): void {
  if (isTTY) {
    console.error(message)
  }
}

/**
 * Print a styled header (only in TTY mode)
 */
export function header(text: string): void {
  if (isTTY) {
    console.error(`\n${text}\n${'─'.repeat(text.length)}`)
  }
}

export interface TableColumn {
  key: string
  header: string
  align?: 'left' | 'center' | 'right'
}

/**
 * Format rows as a table; tab-separated when not on a TTY
 */
export function formatTable(columns: TableColumn[], data: Array<Record<string, string>>): string {
  if (!isTTY) {
    const headers = columns.map(col => col.header).join('\t')
    const rows = data.map(row => columns.map(col => row[col.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(col => ({
      key: col.key,
      header: col.header,
      align: col.align || 'left'
    })),
    data,
    borderStyle: 'round',
    showHeader: true
  })

  return renderToString(table)
}
