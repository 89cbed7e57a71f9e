/**
 * Supply-chain domain: report rows, reference entries, classification results, domain summaries.
 */

/** Category as stored in the reference table, after synonym normalization. */
export type Category = 'Primary' | 'Secondary' | 'Master' | 'Other'

/** Category assigned to a candidate line. */
export type LineCategory = 'Primary' | 'Secondary' | 'Master' | 'Unknown'

export const MATCH_TYPES = [
  'exact',
  'vendor_id',
  'adagio_special_case',
  'vendor_category',
  'vendor_most_common',
  'bidder',
  'prefix',
  'none',
] as const

export type MatchType = (typeof MATCH_TYPES)[number]

/** One record of the supply-chain validation report. */
export interface RawReportRow {
  rowIndex: number
  status: string
  platform: string
  /** Publisher name. */
  name: string
  domain: string
  statusCode: string
  missingLinesText: string | null
  /** Value of a dedicated bidder column, when the report has one. */
  bidder: string | null
}

/** One row of the canonical ads.txt lines table. */
export interface ReferenceEntry {
  rawLine: string
  /** Raw category text, e.g. "Main", "SECONDARY". */
  category: string
  status: string
}

/** Lowercased, whitespace-collapsed, punctuation-stripped line. */
export type NormalizedLine = string

/** Raw text fragment extracted from a missing-lines cell. */
export type CandidateLine = string

export interface ClassificationResult {
  line: CandidateLine
  normalized: NormalizedLine
  category: LineCategory
  matchType: MatchType
  /** Reference line that decided the category, when a single one did. */
  matchedLine?: NormalizedLine
  /** Prefix similarity for bidder matches. */
  score?: number
}

/** Aggregate per (domain, name) key. */
export interface DomainSummary {
  domain: string
  name: string
  status: string
  masterMissing: number
  primaryMissing: number
  secondaryMissing: number
  unknownMissing: number
  /** Append-only, repeats preserved. */
  primaryBidders: string[]
  masterLines: CandidateLine[]
  primaryLines: CandidateLine[]
  secondaryLines: CandidateLine[]
  unknownLines: CandidateLine[]
}

export const NO_MISSING_BIDDERS = 'No missing bidders'

export const RESULT_COLUMNS = [
  'Domain',
  'Name',
  'Status',
  'Master Missing',
  'Primary Missing',
  'Secondary Missing',
  'Total Missing',
  'Unknown Lines',
  'Master Lines',
  'Primary Lines',
  'Secondary Lines',
  'Unknown Lines Text',
  'Missing Primary Bidders',
] as const

export type ResultColumn = (typeof RESULT_COLUMNS)[number]

export type ResultRow = Record<ResultColumn, string | number>
