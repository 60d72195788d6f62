/**
 * CLI output formatting utilities
 */

/**
 * Wrapper for machine-consumable JSON responses.
 */
export interface CLIJsonOutput<T> {
  /** ISO timestamp of when the command was executed */
  timestamp: string
  version: string
  /** The CLI command that was executed */
  command: string
  data: T
}

export function buildJsonOutput<T>(command: string, data: T, version: string): CLIJsonOutput<T> {
  return {
    timestamp: new Date().toISOString(),
    version,
    command,
    data,
  }
}

export function writeJson<T>(command: string, data: T, version: string): void {
  process.stdout.write(JSON.stringify(buildJsonOutput(command, data, version), null, 2) + '\n')
}

/**
 * Format rows as an aligned table: columns separated by ` | `, with a
 * dashed separator under the header.
 *
 * @param keys - Row keys to read, in the same order as `headers`
 */
export function formatTable(
  headers: string[],
  rows: Record<string, string>[],
  keys: string[]
): string {
  const widths = headers.map((header, i) => {
    const key = keys[i] ?? header
    const dataMax = rows.reduce((max, row) => Math.max(max, (row[key] ?? '').length), 0)
    return Math.max(header.length, dataMax)
  })

  const separator = widths.map((w) => '-'.repeat(w)).join('-+-')
  const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? h.length)).join(' | ')
  const dataRows = rows.map((row) =>
    keys
      .map((key, i) => {
        const val = row[key] ?? ''
        return val.padEnd(widths[i] ?? val.length)
      })
      .join(' | ')
  )

  return [headerRow, separator, ...dataRows].join('\n')
}

/** `-` for absent values */
export function orDash(value: string | number | null | undefined): string {
  if (value === null || value === undefined || value === '') return '-'
  return String(value)
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`
}
