/**
 * Fold per-row classifications into one summary per (domain, name).
 * Repeated keys add counts and append lines and bidders; first appearance fixes the order.
 */

import { bidderPrefix, normalizeLine, stripDomainSuffix } from './normalizeLine.js'
import {
  NO_MISSING_BIDDERS,
  type CandidateLine,
  type ClassificationResult,
  type DomainSummary,
  type ResultRow,
} from './schema.js'

export interface RowContext {
  domain: string
  name: string
  status: string
  /** Dedicated bidder column value, when the report has that column. */
  bidder: string | null
  hasBidderColumn: boolean
}

export interface RowTally {
  master: CandidateLine[]
  primary: CandidateLine[]
  secondary: CandidateLine[]
  unknown: CandidateLine[]
}

export function summaryKey(domain: string, name: string): string {
  return `${domain}_${name}`
}

export function tallyResults(results: readonly ClassificationResult[]): RowTally {
  const tally: RowTally = { master: [], primary: [], secondary: [], unknown: [] }
  for (const r of results) {
    if (r.category === 'Master') tally.master.push(r.line)
    else if (r.category === 'Primary') tally.primary.push(r.line)
    else if (r.category === 'Secondary') tally.secondary.push(r.line)
    else tally.unknown.push(r.line)
  }
  return tally
}

/** Bidder names from primary lines: vendor before the first comma, domain suffix removed. */
export function biddersFromLines(lines: readonly CandidateLine[]): string[] {
  const out: string[] = []
  for (const line of lines) {
    const vendor = bidderPrefix(normalizeLine(line))
    if (!vendor) continue
    const bidder = stripDomainSuffix(vendor)
    if (bidder) out.push(bidder)
  }
  return out
}

/**
 * Primary bidders for one row. The bidder column wins when the report has one; either way
 * a row without primary lines contributes no bidders.
 */
export function rowPrimaryBidders(row: RowContext, primaryLines: readonly CandidateLine[]): string[] {
  if (primaryLines.length === 0) return []
  if (row.hasBidderColumn) {
    const bidder = row.bidder?.trim()
    return bidder ? [bidder] : []
  }
  return biddersFromLines(primaryLines)
}

export function formatBidders(bidders: readonly string[]): string {
  if (bidders.length === 0) return NO_MISSING_BIDDERS
  return bidders.map((b) => `${b} `).join('; ')
}

export function totalMissing(s: DomainSummary): number {
  return s.masterMissing + s.primaryMissing + s.secondaryMissing
}

function emptySummary(row: RowContext): DomainSummary {
  return {
    domain: row.domain,
    name: row.name,
    status: row.status,
    masterMissing: 0,
    primaryMissing: 0,
    secondaryMissing: 0,
    unknownMissing: 0,
    primaryBidders: [],
    masterLines: [],
    primaryLines: [],
    secondaryLines: [],
    unknownLines: [],
  }
}

export class DomainAggregator {
  private readonly byKey = new Map<string, DomainSummary>()

  has(domain: string, name: string): boolean {
    return this.byKey.has(summaryKey(domain, name))
  }

  get size(): number {
    return this.byKey.size
  }

  /** Add one row's tally, creating the summary on first sight of its key. */
  add(row: RowContext, tally: RowTally): DomainSummary {
    const key = summaryKey(row.domain, row.name)
    const summary = this.byKey.get(key) ?? emptySummary(row)
    summary.masterMissing += tally.master.length
    summary.primaryMissing += tally.primary.length
    summary.secondaryMissing += tally.secondary.length
    summary.unknownMissing += tally.unknown.length
    summary.masterLines.push(...tally.master)
    summary.primaryLines.push(...tally.primary)
    summary.secondaryLines.push(...tally.secondary)
    summary.unknownLines.push(...tally.unknown)
    summary.primaryBidders.push(...rowPrimaryBidders(row, tally.primary))
    this.byKey.set(key, summary)
    return summary
  }

  /** Zero-count summary for a row that could not be processed; no-op when the key exists. */
  addEmpty(row: RowContext): DomainSummary | null {
    const key = summaryKey(row.domain, row.name)
    if (this.byKey.has(key) || !row.domain || !row.name) return null
    const summary = emptySummary(row)
    this.byKey.set(key, summary)
    return summary
  }

  summaries(): DomainSummary[] {
    return [...this.byKey.values()]
  }
}

export function toResultRow(s: DomainSummary): ResultRow {
  return {
    Domain: s.domain,
    Name: s.name,
    Status: s.status,
    'Master Missing': s.masterMissing,
    'Primary Missing': s.primaryMissing,
    'Secondary Missing': s.secondaryMissing,
    'Total Missing': totalMissing(s),
    'Unknown Lines': s.unknownMissing,
    'Master Lines': s.masterLines.join(', '),
    'Primary Lines': s.primaryLines.join(', '),
    'Secondary Lines': s.secondaryLines.join(', '),
    'Unknown Lines Text': s.unknownLines.join(', '),
    'Missing Primary Bidders': formatBidders(s.primaryBidders),
  }
}

export function toResultRows(summaries: readonly DomainSummary[]): ResultRow[] {
  return summaries.map(toResultRow)
}
