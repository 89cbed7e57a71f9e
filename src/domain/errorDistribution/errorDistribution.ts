/**
 * Share of ad calls per error status, per website.
 */

import { logger } from '../../../lib/logger.js'
import { MissingColumnError } from '../errors.js'
import { cellText, type Table, type TableRow } from '../table.js'

export const ERROR_COLUMNS = {
  website: 'Website/App Name',
  error: 'CSM Error',
  type: 'Type',
  reason: 'Website Ads Txt Reason',
  adCalls: 'Ad Calls',
} as const

export const DISTRIBUTION_COLUMN = 'Error Distribution'

export type ErrorDistributionRow = TableRow & { [DISTRIBUTION_COLUMN]: string }

export interface WebsiteErrorSummary {
  website: string
  /** CSM Error of the row with the most ad calls. */
  status: string
  percentage: string
  type: string
}

export function formatPercentage(value: number): string {
  return `${value.toFixed(2)}%`
}

function adCallsOf(row: TableRow): number {
  const text = cellText(row, ERROR_COLUMNS.adCalls).replace(/,/g, '')
  if (!text) return 0
  const n = Number(text)
  return Number.isFinite(n) ? n : 0
}

export function assertErrorColumns(headers: readonly string[]): void {
  const required = Object.values(ERROR_COLUMNS)
  const missing = required.filter((c) => !headers.includes(c))
  if (missing.length > 0) {
    throw new MissingColumnError('error distribution', missing.join(', '), required, headers)
  }
}

/** Each row's ad calls as a percentage of its website's total ("0.00%" when the total is 0). */
export function calculateErrorDistribution(table: Table): ErrorDistributionRow[] {
  assertErrorColumns(table.headers)

  const totals = new Map<string, number>()
  let unparsed = 0
  for (const row of table.rows) {
    const raw = cellText(row, ERROR_COLUMNS.adCalls)
    if (raw && adCallsOf(row) === 0 && !/^[0.,\s]+$/.test(raw)) unparsed++
    const website = cellText(row, ERROR_COLUMNS.website)
    totals.set(website, (totals.get(website) ?? 0) + adCallsOf(row))
  }
  if (unparsed > 0) logger.warn('errors', `${unparsed} Ad Calls value(s) were not numeric and count as 0`)

  const rows = table.rows.map((row): ErrorDistributionRow => {
    const total = totals.get(cellText(row, ERROR_COLUMNS.website)) ?? 0
    const share = total > 0 ? (adCallsOf(row) / total) * 100 : 0
    return { ...row, [DISTRIBUTION_COLUMN]: formatPercentage(share) }
  })
  logger.info('errors', 'Error distribution calculated', { rows: rows.length, websites: totals.size })
  return rows
}

/** Per website (sorted by name), the row with the most ad calls; the first one wins ties. */
export function summarizeErrorDistribution(rows: readonly ErrorDistributionRow[]): WebsiteErrorSummary[] {
  const best = new Map<string, { row: ErrorDistributionRow; calls: number }>()
  for (const row of rows) {
    const website = cellText(row, ERROR_COLUMNS.website)
    const calls = adCallsOf(row)
    const current = best.get(website)
    if (!current || calls > current.calls) best.set(website, { row, calls })
  }
  return [...best.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([website, { row }]) => ({
      website,
      status: cellText(row, ERROR_COLUMNS.error),
      percentage: row[DISTRIBUTION_COLUMN],
      type: cellText(row, ERROR_COLUMNS.type),
    }))
}
