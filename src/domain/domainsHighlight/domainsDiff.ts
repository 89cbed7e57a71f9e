/**
 * Compare two domain performance exports (latest vs oldest) keyed by website name.
 */

import { logger } from '../../../lib/logger.js'
import { MissingColumnError } from '../errors.js'
import type { Table, TableRow } from '../table.js'
import { assignPriority, type HighlightRuleSet, type MetricRow, type MetricValue, type Priority } from './highlightRules.js'

export const WEBSITE_COLUMN = 'Website/App Name'
export const STATUS_COLUMN = 'New and Deprecated'
export const PRIORITY_COLUMN = 'Priority'

export const DEFAULT_METRICS = [
  'Revenue',
  'Ad Requests',
  'RPB',
  'CPM',
  'Bid Rate',
  'Win Rate',
  'Fill Rate',
  'Impressions',
  'Viewability',
] as const

export type DomainStatus = 'Present in both' | 'New' | 'Deprecated'

export interface DiffOptions {
  metrics?: readonly string[]
}

export interface DomainsDiff {
  /** Output column order. */
  columns: string[]
  rows: MetricRow[]
}

export function diffColumn(metricName: string): string {
  return `${metricName} % Diff`
}

function parseNumber(value: string | null | undefined): number | null {
  if (value == null) return null
  const text = value.trim()
  if (!text) return null
  const n = Number(text)
  return Number.isFinite(n) ? n : null
}

/** Numeric cells become numbers; anything else stays as text. */
function metricValue(value: string | null | undefined): MetricValue {
  if (value == null || !value.trim()) return null
  return parseNumber(value) ?? value
}

export function percentDiff(latest: number | null, oldest: number | null): number | null {
  if (latest === null || oldest === null || oldest === 0) return null
  return ((latest - oldest) / oldest) * 100
}

function byName(table: Table, label: string): Map<string, TableRow> {
  const out = new Map<string, TableRow>()
  for (const row of table.rows) {
    const name = row[WEBSITE_COLUMN]?.trim()
    if (!name) continue
    if (out.has(name)) {
      logger.warn('highlight', `Duplicate website in ${label} report; keeping the first row`, { name })
      continue
    }
    out.set(name, row)
  }
  return out
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Outer join on the website column, sorted by name. Each metric present in the latest report
 * gets its value and a `% Diff` column; new domains keep values with empty diffs, deprecated
 * ones have neither. Other columns follow, then the status column.
 */
export function diffDomainReports(latest: Table, oldest: Table, options: DiffOptions = {}): DomainsDiff {
  if (!latest.headers.includes(WEBSITE_COLUMN)) {
    throw new MissingColumnError('latest', WEBSITE_COLUMN, [WEBSITE_COLUMN], latest.headers)
  }
  if (!oldest.headers.includes(WEBSITE_COLUMN)) {
    throw new MissingColumnError('oldest', WEBSITE_COLUMN, [WEBSITE_COLUMN], oldest.headers)
  }

  const metrics = (options.metrics ?? DEFAULT_METRICS).filter((m) => latest.headers.includes(m))
  const handled = new Set<string>([WEBSITE_COLUMN, ...metrics])
  const latestExtra = latest.headers.filter((h) => !handled.has(h))
  const oldestExtra = oldest.headers.filter((h) => !handled.has(h) && !latest.headers.includes(h))

  const latestRows = byName(latest, 'latest')
  const oldestRows = byName(oldest, 'oldest')
  const names = [...new Set([...latestRows.keys(), ...oldestRows.keys()])].sort(compareNames)

  const rows = names.map((name): MetricRow => {
    const current = latestRows.get(name)
    const previous = oldestRows.get(name)
    const status: DomainStatus = current && previous ? 'Present in both' : current ? 'New' : 'Deprecated'
    const row: MetricRow = { [WEBSITE_COLUMN]: name }

    for (const m of metrics) {
      row[m] = current ? metricValue(current[m]) : null
      row[diffColumn(m)] =
        current && previous && oldest.headers.includes(m)
          ? percentDiff(parseNumber(current[m]), parseNumber(previous[m]))
          : null
    }
    for (const h of latestExtra) row[h] = current ? metricValue(current[h]) : null
    for (const h of oldestExtra) row[h] = previous ? metricValue(previous[h]) : null
    row[STATUS_COLUMN] = status
    return row
  })

  const columns = [
    WEBSITE_COLUMN,
    ...metrics.flatMap((m) => [m, diffColumn(m)]),
    ...latestExtra,
    ...oldestExtra,
    STATUS_COLUMN,
  ]
  logger.info('highlight', 'Domain reports compared', {
    domains: rows.length,
    metrics: metrics.length,
    new: rows.filter((r) => r[STATUS_COLUMN] === 'New').length,
    deprecated: rows.filter((r) => r[STATUS_COLUMN] === 'Deprecated').length,
  })
  return { columns, rows }
}

export interface HighlightedDomain {
  name: string
  priority: Priority | null
  row: MetricRow
}

export function highlightDomains(rows: readonly MetricRow[], ruleSet: HighlightRuleSet): HighlightedDomain[] {
  return rows.map((row) => ({
    name: String(row[WEBSITE_COLUMN] ?? ''),
    priority: assignPriority(row, ruleSet),
    row,
  }))
}

/** Rows with a trailing Priority column, for writing without styling. */
export function withPriorityColumn(highlighted: readonly HighlightedDomain[]): MetricRow[] {
  return highlighted.map((h) => ({ ...h.row, [PRIORITY_COLUMN]: h.priority ?? '' }))
}
