#!/usr/bin/env node
/**
 * Reconcile a supply-chain validation report against the reference ads.txt lines.
 *
 * Usage:
 *   npx tsx src/scripts/reconcile-supply-chain.ts <report.xlsx|csv> <reference.xlsx|csv> [--out result.xlsx] [--audit]
 *     [--disable vendorId,vendorConsensus,bidderFuzzy,prefix]
 *
 * Env: SUPPLY_CHAIN_LOG_LEVEL, SUPPLY_CHAIN_FUZZY_THRESHOLD, SUPPLY_CHAIN_OPERATOR_RULES, SUPPLY_CHAIN_AUDIT
 */

import 'dotenv/config'
import { logger } from '../../lib/logger.js'
import { isAuditEnabled } from '../config/env.js'
import { writeTables, type SheetSpec } from '../integrations/spreadsheet/tables.js'
import type { ClassifierStage } from '../domain/supplyChain/lineClassifier.js'
import { combineObservers, createAuditTrail, createLoggingObserver, type AuditRecord } from '../domain/supplyChain/reconcile.js'
import { RESULT_COLUMNS } from '../domain/supplyChain/schema.js'
import { runSupplyChainReconciliation } from '../orchestration/runSupplyChainReconciliation.js'
import { initScriptLogging, parseCliArgs, runScript, stringOption, usage } from './cli.js'

const STAGES: readonly ClassifierStage[] = ['vendorId', 'vendorConsensus', 'bidderFuzzy', 'prefix']

function isStage(value: string): value is ClassifierStage {
  return STAGES.some((s) => s === value)
}

function parseStages(value: string | undefined): ClassifierStage[] {
  if (!value) return []
  const names = value.split(',').map((s) => s.trim()).filter(Boolean)
  const unknown = names.filter((n) => !isStage(n))
  if (unknown.length > 0) usage([`Unknown stage(s): ${unknown.join(', ')}`, `Stages: ${STAGES.join(', ')}`])
  return names.filter(isStage)
}

function auditSheet(records: readonly AuditRecord[]): SheetSpec {
  return {
    name: 'Audit',
    columns: ['Row', 'Domain', 'Name', 'Line', 'Normalized', 'Category', 'Match Type', 'Matched Line', 'Score'],
    rows: records.map((r) => ({
      Row: r.rowIndex + 2,
      Domain: r.domain,
      Name: r.name,
      Line: r.result.line,
      Normalized: r.result.normalized,
      Category: r.result.category,
      'Match Type': r.result.matchType,
      'Matched Line': r.result.matchedLine ?? null,
      Score: r.result.score ?? null,
    })),
  }
}

async function main() {
  initScriptLogging()
  const args = parseCliArgs(process.argv.slice(2), ['out', 'disable'])
  const [reportPath, referencePath] = args.positionals
  if (!reportPath || !referencePath) {
    usage([
      'Usage: reconcile-supply-chain <report.xlsx|csv> <reference.xlsx|csv> [--out result.xlsx] [--audit]',
      '       [--disable vendorId,vendorConsensus,bidderFuzzy,prefix]',
    ])
  }
  const outPath = stringOption(args, 'out') ?? 'supply_chain_result.xlsx'
  const audit = args.options.has('audit') || isAuditEnabled() ? createAuditTrail() : null

  const result = await runSupplyChainReconciliation({
    reportPath,
    referencePath,
    disabledStages: parseStages(stringOption(args, 'disable')),
    observer: audit ? combineObservers(createLoggingObserver(), audit.observer) : createLoggingObserver(),
  })

  const sheets: SheetSpec[] = [{ name: 'Supply Chain', columns: RESULT_COLUMNS, rows: result.rows }]
  if (audit) sheets.push(auditSheet(audit.records))
  await writeTables(outPath, sheets)

  logger.info('script', 'Reconciliation complete', {
    output: outPath,
    domains: result.rows.length,
    rows: result.stats.rows,
    skipped: result.stats.skipped,
    failed: result.stats.failed,
    byCategory: result.stats.byCategory,
    byMatchType: result.stats.byMatchType,
  })
}

runScript('reconcile-supply-chain', main)
