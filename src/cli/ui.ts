/**
 * CLI UI utilities - TTY-aware output
 *
 * - TTY (interactive): Pretty UI with tables, colors
 * - Pipe: Clean output, no UI elements, data only to stdout
 */

import { Table, renderToString } from 'tuiuiu.js'

// Detect if running in interactive terminal
export const isTTY = process.stdout.isTTY ?? false

let quiet = false

/**
 * Suppress informational stderr output (errors and warnings still shown)
 */
export function setQuiet(value: boolean): void {
  quiet = value
}

export function isQuiet(): boolean {
  return quiet
}

/**
 * Output data to stdout (for pipes)
 * This is the ONLY function that should write to stdout for data
 */
export function output(data: string): void {
  process.stdout.write(data + '\n')
}

/**
 * Output raw data without newline
 */
export function outputRaw(data: string): void {
  process.stdout.write(data)
}

/**
 * Output a value as pretty JSON on stdout
 */
export function outputJson(data: unknown): void {
  output(JSON.stringify(data, null, 2))
}

/**
 * Log message to stderr (doesn't interfere with pipes)
 */
export function log(message: string): void {
  if (isTTY && !quiet) {
    console.error(message)
  }
}

/**
 * Log verbose message (only with verbose flag)
 */
export function verbose(message: string, enabled: boolean): void {
  if (enabled && !quiet) {
    console.error(`[devtwin] ${message}`)
  }
}

/**
 * Log error to stderr (always shown)
 */
export function error(message: string): void {
  console.error(`Error: ${message}`)
}

/**
 * Log success message (only in TTY mode)
 */
export function success(message: string): void {
  if (isTTY && !quiet) {
    console.error(`✓ ${message}`)
  }
}

/**
 * Log warning message (always shown)
 */
export function warn(message: string): void {
  console.error(`Warning: ${message}`)
}

/**
 * Format data as a table using tuiuiu.js
 */
export function formatTable(
  columns: Array<{ key: string; header: string; align?: 'left' | 'center' | 'right' }>,
  data: Array<Record<string, string>>,
  options: { borderStyle?: 'single' | 'round' | 'ascii' | 'none' } = {}
): string {
  if (!isTTY) {
    // Simple tab-separated output for pipes
    const headers = columns.map(c => c.header).join('\t')
    const rows = data.map(row => columns.map(c => row[c.key] ?? '').join('\t'))
    return [headers, ...rows].join('\n')
  }

  const table = Table({
    columns: columns.map(c => ({
      key: c.key,
      header: c.header,
      align: c.align || 'left'
    })),
    data,
    borderStyle: options.borderStyle || 'round',
    showHeader: true
  })

  return renderToString(table)
}

/**
 * Format key-value pairs
 */
export function formatKeyValue(pairs: Array<[string, string]>, separator = '='): string {
  if (!isTTY) {
    return pairs.map(([k, v]) => `${k}${separator}${v}`).join('\n')
  }

  const maxKeyLen = Math.max(...pairs.map(([k]) => k.length))
  return pairs
    .map(([k, v]) => `${k.padEnd(maxKeyLen)} ${separator} ${v}`)
    .join('\n')
}

/**
 * Print a styled header (only in TTY mode)
 */
export function header(text: string): void {
  if (isTTY && !quiet) {
    console.error(`\n${text}\n${'─'.repeat(text.length)}`)
  }
}
