/**
 * Combined domains workbook: Domains Highlight, then Supply Chain Validation and
 * Error Distribution when their inputs are given, then a Summary joining the domains to the
 * supply-chain results. Without supply-chain inputs there is nothing to join and no Summary.
 */

import { logger } from '../../lib/logger.js'
import { readTable, writeWorkbook, type SheetSpec } from '../integrations/spreadsheet/tables.js'
import {
  PRIORITY_COLUMN,
  diffDomainReports,
  highlightDomains,
  withPriorityColumn,
} from '../domain/domainsHighlight/domainsDiff.js'
import type { HighlightRuleSet } from '../domain/domainsHighlight/highlightRules.js'
import {
  DISTRIBUTION_COLUMN,
  calculateErrorDistribution,
  summarizeErrorDistribution,
  type WebsiteErrorSummary,
} from '../domain/errorDistribution/errorDistribution.js'
import { RESULT_COLUMNS } from '../domain/supplyChain/schema.js'
import { buildSummarySheet, type SummarySheet } from '../domain/summary/summarySheet.js'
import {
  runSupplyChainReconciliation,
  type RunReconciliationInput,
  type RunReconciliationResult,
} from './runSupplyChainReconciliation.js'

export const SHEET_NAMES = {
  domains: 'Domains Highlight',
  supplyChain: 'Supply Chain Validation',
  errors: 'Error Distribution',
  summary: 'Summary',
} as const

export interface DomainsReportInput {
  latestPath: string
  oldestPath: string
  ruleSet: HighlightRuleSet
  supplyChain?: RunReconciliationInput
  errorsPath?: string
}

export interface DomainsReport {
  sheets: SheetSpec[]
  supplyChain: RunReconciliationResult | null
  errorSummary: WebsiteErrorSummary[] | null
  summary: SummarySheet | null
}

export async function buildDomainsReport(input: DomainsReportInput): Promise<DomainsReport> {
  const [latest, oldest] = await Promise.all([readTable(input.latestPath), readTable(input.oldestPath)])
  const diff = diffDomainReports(latest, oldest)
  const domainRows = withPriorityColumn(highlightDomains(diff.rows, input.ruleSet))
  const sheets: SheetSpec[] = [
    { name: SHEET_NAMES.domains, columns: [...diff.columns, PRIORITY_COLUMN], rows: domainRows },
  ]

  const supplyChain = input.supplyChain ? await runSupplyChainReconciliation(input.supplyChain) : null
  if (supplyChain) sheets.push({ name: SHEET_NAMES.supplyChain, columns: RESULT_COLUMNS, rows: supplyChain.rows })

  let errorSummary: WebsiteErrorSummary[] | null = null
  if (input.errorsPath) {
    const table = await readTable(input.errorsPath)
    const rows = calculateErrorDistribution(table)
    errorSummary = summarizeErrorDistribution(rows)
    sheets.push({ name: SHEET_NAMES.errors, columns: [...table.headers, DISTRIBUTION_COLUMN], rows })
  }

  const summary = supplyChain ? buildSummarySheet(domainRows, supplyChain.rows, errorSummary ?? undefined) : null
  if (summary) sheets.push({ name: SHEET_NAMES.summary, columns: summary.columns, rows: summary.rows })
  else logger.warn('report', 'No supply-chain inputs; the Summary sheet is left out')

  return { sheets, supplyChain, errorSummary, summary }
}

export async function writeDomainsReport(outPath: string, input: DomainsReportInput): Promise<DomainsReport> {
  const report = await buildDomainsReport(input)
  await writeWorkbook(outPath, report.sheets)
  return report
}
