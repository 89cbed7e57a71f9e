/**
 * File-level entry point: load the report and the reference table, reconcile, return output rows.
 * Rules come from the caller, else from SUPPLY_CHAIN_OPERATOR_RULES, else the defaults;
 * SUPPLY_CHAIN_FUZZY_THRESHOLD overrides the threshold of whichever set is used.
 */

import { logger } from '../../lib/logger.js'
import { getEnv, getFuzzyThresholdFromEnv } from '../config/env.js'
import { readTable } from '../integrations/spreadsheet/tables.js'
import { referenceEntriesFromTable, reportRowsFromTable, type ReportColumns } from '../domain/supplyChain/columns.js'
import { toResultRows } from '../domain/supplyChain/domainAggregator.js'
import {
  defaultOperatorRules,
  loadOperatorRules,
  parseOperatorRules,
  type OperatorRules,
} from '../domain/supplyChain/operatorRules.js'
import { buildReferenceIndex, type ReferenceIndexStats } from '../domain/supplyChain/referenceIndex.js'
import {
  reconcileSupplyChain,
  type ReconcileOptions,
  type ReconcileStats,
} from '../domain/supplyChain/reconcile.js'
import type { DomainSummary, ResultRow } from '../domain/supplyChain/schema.js'

export interface RunReconciliationInput extends Omit<ReconcileOptions, 'hasBidderColumn'> {
  reportPath: string
  referencePath: string
}

export interface RunReconciliationResult {
  rows: ResultRow[]
  summaries: DomainSummary[]
  stats: ReconcileStats
  referenceStats: ReferenceIndexStats
  reportColumns: ReportColumns
}

export function resolveOperatorRules(explicit?: OperatorRules): OperatorRules {
  let rules = explicit
  if (!rules) {
    const path = getEnv().SUPPLY_CHAIN_OPERATOR_RULES
    rules = path ? loadOperatorRules(path) : defaultOperatorRules
    if (path) logger.info('reconcile', 'Operator rules loaded', { path })
  }
  const threshold = getFuzzyThresholdFromEnv()
  return threshold === undefined ? rules : parseOperatorRules({ fuzzyThreshold: threshold }, rules)
}

export async function runSupplyChainReconciliation(input: RunReconciliationInput): Promise<RunReconciliationResult> {
  const { reportPath, referencePath, ...options } = input
  const [reportTable, referenceTable] = await Promise.all([readTable(reportPath), readTable(referencePath)])

  // Column problems are fatal and surface before any row is processed.
  const report = reportRowsFromTable(reportTable)
  const index = buildReferenceIndex(referenceEntriesFromTable(referenceTable))
  logger.info('reconcile', 'Inputs loaded', {
    reportRows: report.rows.length,
    missingLinesColumn: report.columns.missingLines,
    bidderColumn: report.columns.bidder,
    referenceLines: index.stats.distinctLines,
  })

  const { summaries, stats } = reconcileSupplyChain(report.rows, index, {
    ...options,
    rules: resolveOperatorRules(options.rules),
    hasBidderColumn: report.columns.bidder !== null,
  })
  return {
    rows: toResultRows(summaries),
    summaries,
    stats,
    referenceStats: index.stats,
    reportColumns: report.columns,
  }
}
