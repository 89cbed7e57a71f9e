/**
 * In-memory table shape shared by the report readers and the domain modules.
 * Cells are strings (as read with raw: false) or null for blanks.
 */

export type CellValue = string | null

export type TableRow = Record<string, CellValue>

export interface Table {
  headers: string[]
  rows: TableRow[]
}

/** Trimmed cell text; empty string for blanks and absent columns. */
export function cellText(row: TableRow, column: string | null | undefined): string {
  if (!column) return ''
  const v = row[column]
  return v == null ? '' : String(v).trim()
}

/**
 * First header matching an accepted name: exact match in alias order, then
 * case- and space-insensitive. Null when none match.
 */
export function resolveColumn(headers: readonly string[], accepted: readonly string[]): string | null {
  for (const name of accepted) {
    if (headers.includes(name)) return name
  }
  const key = (s: string) => s.trim().toLowerCase().replace(/\s+/g, ' ')
  for (const name of accepted) {
    const found = headers.find((h) => key(h) === key(name))
    if (found !== undefined) return found
  }
  return null
}
