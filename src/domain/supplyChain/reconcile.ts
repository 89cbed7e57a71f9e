/**
 * Supply-chain reconciliation: report rows -> candidate lines -> categories -> domain summaries.
 * Synchronous and pure over (rows, index); match decisions go to an injected observer.
 */

import { logger, type Logger } from '../../../lib/logger.js'
import { classifyLine, type ClassifyOptions } from './lineClassifier.js'
import { parseMissingLinesDetailed, type ParsedCell } from './missingLines.js'
import { DomainAggregator, summaryKey, tallyResults, type RowContext } from './domainAggregator.js'
import type { ReferenceIndex } from './referenceIndex.js'
import type {
  ClassificationResult,
  DomainSummary,
  LineCategory,
  MatchType,
  RawReportRow,
} from './schema.js'

export type SkipReason = 'missing_domain' | 'missing_domain_and_name'

/** Hooks for auditing a run. Every callback is optional. */
export interface ReconcileObserver {
  onRowStart?(row: RawReportRow, key: string): void
  onRowParsed?(row: RawReportRow, parsed: ParsedCell): void
  onLineClassified?(row: RawReportRow, result: ClassificationResult): void
  onRowSkipped?(row: RawReportRow, reason: SkipReason): void
  onRowFailed?(row: RawReportRow, error: unknown): void
}

export interface ReconcileOptions extends ClassifyOptions {
  observer?: ReconcileObserver
  /** The report has a dedicated bidder column; its value replaces bidders taken from lines. */
  hasBidderColumn?: boolean
}

export interface ReconcileStats {
  rows: number
  skipped: number
  failed: number
  lines: number
  byCategory: Record<LineCategory, number>
  byMatchType: Record<MatchType, number>
}

export interface ReconcileResult {
  summaries: DomainSummary[]
  stats: ReconcileStats
}

/** Observer that writes decisions to the logger: lines at debug, problems at warn/error. */
export function createLoggingObserver(log: Logger = logger): ReconcileObserver {
  return {
    onRowParsed(row, parsed) {
      log.debug('parse', `Row ${row.rowIndex}: ${parsed.lines.length} candidate line(s)`, {
        domain: row.domain,
        shape: parsed.shape,
        dropped: parsed.dropped.length,
      })
    },
    onLineClassified(row, result) {
      log.debug('classify', `${result.matchType} -> ${result.category}`, {
        rowIndex: row.rowIndex,
        line: result.line,
        matchedLine: result.matchedLine,
        score: result.score,
      })
    },
    onRowSkipped(row, reason) {
      log.warn('reconcile', `Row ${row.rowIndex} skipped: ${reason}`, { name: row.name })
    },
    onRowFailed(row, error) {
      log.error('reconcile', `Row ${row.rowIndex} failed`, error, { domain: row.domain, name: row.name })
    },
  }
}

export interface AuditRecord {
  rowIndex: number
  domain: string
  name: string
  result: ClassificationResult
}

/** Observer that keeps every classification in memory. */
export function createAuditTrail(): { observer: ReconcileObserver; records: AuditRecord[] } {
  const records: AuditRecord[] = []
  return {
    records,
    observer: {
      onLineClassified(row, result) {
        records.push({ rowIndex: row.rowIndex, domain: row.domain, name: row.name, result })
      },
    },
  }
}

/** Call every observer in order. */
export function combineObservers(...observers: ReconcileObserver[]): ReconcileObserver {
  return {
    onRowStart: (row, key) => observers.forEach((o) => o.onRowStart?.(row, key)),
    onRowParsed: (row, parsed) => observers.forEach((o) => o.onRowParsed?.(row, parsed)),
    onLineClassified: (row, result) => observers.forEach((o) => o.onLineClassified?.(row, result)),
    onRowSkipped: (row, reason) => observers.forEach((o) => o.onRowSkipped?.(row, reason)),
    onRowFailed: (row, error) => observers.forEach((o) => o.onRowFailed?.(row, error)),
  }
}

function emptyStats(): ReconcileStats {
  const byMatchType: Record<MatchType, number> = {
    exact: 0,
    vendor_id: 0,
    adagio_special_case: 0,
    vendor_category: 0,
    vendor_most_common: 0,
    bidder: 0,
    prefix: 0,
    none: 0,
  }
  return {
    rows: 0,
    skipped: 0,
    failed: 0,
    lines: 0,
    byCategory: { Primary: 0, Secondary: 0, Master: 0, Unknown: 0 },
    byMatchType,
  }
}

/** Hooks called outside the row's try block: a throwing hook is logged and the run goes on. */
function notify(hook: keyof ReconcileObserver, row: RawReportRow, call: () => void): void {
  try {
    call()
  } catch (err) {
    logger.error('reconcile', `Observer ${hook} threw`, err, { rowIndex: row.rowIndex })
  }
}

export function reconcileSupplyChain(
  rows: Iterable<RawReportRow>,
  index: ReferenceIndex,
  options: ReconcileOptions = {}
): ReconcileResult {
  const observer = options.observer ?? createLoggingObserver()
  const aggregator = new DomainAggregator()
  const stats = emptyStats()
  const timer = logger.time('reconcile', 'Supply chain reconciliation finished')

  for (const row of rows) {
    stats.rows++
    const domain = row.domain.trim()
    if (!domain) {
      stats.skipped++
      const reason: SkipReason = row.name.trim() ? 'missing_domain' : 'missing_domain_and_name'
      notify('onRowSkipped', row, () => observer.onRowSkipped?.(row, reason))
      continue
    }
    const context: RowContext = {
      domain,
      name: row.name.trim() || domain,
      status: row.status,
      bidder: row.bidder,
      hasBidderColumn: options.hasBidderColumn ?? false,
    }

    try {
      observer.onRowStart?.(row, summaryKey(context.domain, context.name))
      const parsed = parseMissingLinesDetailed(row.missingLinesText)
      observer.onRowParsed?.(row, parsed)
      const results: ClassificationResult[] = []
      for (const line of parsed.lines) {
        const result = classifyLine(line, index, options)
        if (!result.normalized) continue
        observer.onLineClassified?.(row, result)
        results.push(result)
      }
      aggregator.add(context, tallyResults(results))
      for (const r of results) {
        stats.lines++
        stats.byCategory[r.category]++
        stats.byMatchType[r.matchType]++
      }
    } catch (err) {
      stats.failed++
      notify('onRowFailed', row, () => observer.onRowFailed?.(row, err))
      aggregator.addEmpty(context)
    }
  }

  const summaries = aggregator.summaries()
  timer.done({ rows: stats.rows, summaries: summaries.length, skipped: stats.skipped, failed: stats.failed })
  return { summaries, stats }
}
