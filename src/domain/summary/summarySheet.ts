/**
 * Summary sheet of the combined domains workbook: each domain's headline metrics next to its
 * supply-chain result, joined on website name (domain export) = Name (reconciliation output).
 */

import { logger } from '../../../lib/logger.js'
import { WEBSITE_COLUMN } from '../domainsHighlight/domainsDiff.js'
import type { MetricRow, MetricValue } from '../domainsHighlight/highlightRules.js'
import type { WebsiteErrorSummary } from '../errorDistribution/errorDistribution.js'
import type { ResultRow } from '../supplyChain/schema.js'

export const SUMMARY_METRICS = ['Ad Requests', 'Revenue', 'RPB', 'Bid Rate', 'Win Rate'] as const

export const SUMMARY_SUPPLY_COLUMNS = ['Primary Missing', 'Secondary Missing', 'Status', 'Missing Primary Bidders'] as const

export const SUMMARY_ERROR_COLUMNS = ['Most Adcalls status', 'Most Ad Calls %'] as const

export const SUMMARY_COLUMNS = [WEBSITE_COLUMN, ...SUMMARY_METRICS, ...SUMMARY_SUPPLY_COLUMNS] as const

export interface SummarySheet {
  columns: string[]
  rows: MetricRow[]
  matched: number
  unmatched: number
}

interface SupplyChainFacts {
  primaryMissing: number
  secondaryMissing: number
  status: string
  bidders: string
}

export function joinKey(name: string): string {
  return name.trim().toLowerCase()
}

function count(value: string | number): number {
  const n = typeof value === 'number' ? value : Number(value)
  return Number.isInteger(n) ? n : 0
}

/** Later rows overwrite earlier ones with the same name. */
function indexResults(resultRows: readonly ResultRow[]): Map<string, SupplyChainFacts> {
  const out = new Map<string, SupplyChainFacts>()
  for (const row of resultRows) {
    const key = joinKey(String(row.Name))
    if (!key) continue
    out.set(key, {
      primaryMissing: count(row['Primary Missing']),
      secondaryMissing: count(row['Secondary Missing']),
      status: String(row.Status),
      bidders: String(row['Missing Primary Bidders']),
    })
  }
  return out
}

function revenueOf(row: MetricRow): number | null {
  const value: MetricValue | undefined = row.Revenue
  if (typeof value === 'number') return value
  if (typeof value !== 'string') return null
  const n = Number(value.replace(/,/g, '').trim())
  return value.trim() && Number.isFinite(n) ? n : null
}

/** Revenue descending; rows without a numeric revenue go last, in input order. */
function byRevenue(a: MetricRow, b: MetricRow): number {
  const ra = revenueOf(a)
  const rb = revenueOf(b)
  if (ra === null || rb === null) return ra === null ? (rb === null ? 0 : 1) : -1
  return rb - ra
}

/**
 * One row per domain with a non-empty website name. Unmatched domains get zero counts and
 * empty text. With an error summary, the dominant status and its share are appended,
 * matched on the exact website name.
 */
export function buildSummarySheet(
  domainRows: readonly MetricRow[],
  resultRows: readonly ResultRow[],
  errorSummary?: readonly WebsiteErrorSummary[]
): SummarySheet {
  const supply = indexResults(resultRows)
  const errors = errorSummary ? new Map(errorSummary.map((s) => [s.website, s])) : null
  let matched = 0

  const rows: MetricRow[] = []
  for (const domain of domainRows) {
    const website = domain[WEBSITE_COLUMN]
    if (typeof website !== 'string' || !website) continue

    const row: MetricRow = { [WEBSITE_COLUMN]: website }
    for (const m of SUMMARY_METRICS) row[m] = domain[m] ?? null

    const facts = supply.get(joinKey(website))
    if (facts) matched++
    row['Primary Missing'] = facts?.primaryMissing ?? 0
    row['Secondary Missing'] = facts?.secondaryMissing ?? 0
    row.Status = facts?.status ?? ''
    row['Missing Primary Bidders'] = facts?.bidders ?? ''

    if (errors) {
      const e = errors.get(website)
      row['Most Adcalls status'] = e?.status ?? null
      row['Most Ad Calls %'] = e?.percentage ?? null
    }
    rows.push(row)
  }
  rows.sort(byRevenue)

  const unmatched = rows.length - matched
  logger.info('report', 'Summary sheet built', { domains: rows.length, matched, unmatched })
  return {
    columns: errors ? [...SUMMARY_COLUMNS, ...SUMMARY_ERROR_COLUMNS] : [...SUMMARY_COLUMNS],
    rows,
    matched,
    unmatched,
  }
}
