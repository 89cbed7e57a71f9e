/**
 * ads.txt supply-chain reconciliation and domain reporting.
 */

export { normalizeLine, bidderPrefix, stripDomainSuffix } from './domain/supplyChain/normalizeLine.js'
export { parseMissingLines, parseMissingLinesDetailed, describeCellShape } from './domain/supplyChain/missingLines.js'
export type { CellShape, ParsedCell } from './domain/supplyChain/missingLines.js'
export { buildReferenceIndex, normalizeCategory } from './domain/supplyChain/referenceIndex.js'
export type { ReferenceIndex, ReferenceIndexStats } from './domain/supplyChain/referenceIndex.js'
export { classifyLine } from './domain/supplyChain/lineClassifier.js'
export type { ClassifierStage, ClassifyOptions } from './domain/supplyChain/lineClassifier.js'
export {
  defaultOperatorRules,
  mergeOperatorRules,
  parseOperatorRules,
  loadOperatorRules,
} from './domain/supplyChain/operatorRules.js'
export type { OperatorRules, OperatorRulesOverride } from './domain/supplyChain/operatorRules.js'
export { DomainAggregator, toResultRows } from './domain/supplyChain/domainAggregator.js'
export {
  reconcileSupplyChain,
  createLoggingObserver,
  createAuditTrail,
  combineObservers,
} from './domain/supplyChain/reconcile.js'
export type {
  ReconcileObserver,
  ReconcileOptions,
  ReconcileResult,
  ReconcileStats,
  AuditRecord,
} from './domain/supplyChain/reconcile.js'
export { reportRowsFromTable, referenceEntriesFromTable } from './domain/supplyChain/columns.js'
export { RESULT_COLUMNS, NO_MISSING_BIDDERS } from './domain/supplyChain/schema.js'
export type {
  Category,
  LineCategory,
  MatchType,
  RawReportRow,
  ReferenceEntry,
  ClassificationResult,
  DomainSummary,
  ResultRow,
} from './domain/supplyChain/schema.js'
export { MissingColumnError, InputFileError, InvalidRuleError } from './domain/errors.js'
export type { Table, TableRow } from './domain/table.js'
export {
  createHighlightRule,
  parseRuleSet,
  evaluateRule,
  assignPriority,
  resolveMetricValue,
} from './domain/domainsHighlight/highlightRules.js'
export type { HighlightRule, HighlightRuleSet, Priority } from './domain/domainsHighlight/highlightRules.js'
export { diffDomainReports, highlightDomains } from './domain/domainsHighlight/domainsDiff.js'
export type { DomainsDiff, HighlightedDomain } from './domain/domainsHighlight/domainsDiff.js'
export {
  calculateErrorDistribution,
  summarizeErrorDistribution,
} from './domain/errorDistribution/errorDistribution.js'
export type { ErrorDistributionRow, WebsiteErrorSummary } from './domain/errorDistribution/errorDistribution.js'
export { buildSummarySheet, SUMMARY_COLUMNS } from './domain/summary/summarySheet.js'
export type { SummarySheet } from './domain/summary/summarySheet.js'
export { readTable, writeTables, writeWorkbook, writeCsv } from './integrations/spreadsheet/tables.js'
export { runSupplyChainReconciliation } from './orchestration/runSupplyChainReconciliation.js'
export type { RunReconciliationInput, RunReconciliationResult } from './orchestration/runSupplyChainReconciliation.js'
export { buildDomainsReport, writeDomainsReport } from './orchestration/buildDomainsReport.js'
export type { DomainsReport, DomainsReportInput } from './orchestration/buildDomainsReport.js'
export { getEnv } from './config/env.js'
export type { Env } from './config/env.js'
