/**
 * Write the combined domains workbook: Domains Highlight, Supply Chain Validation,
 * Error Distribution and a Summary joining domains to their supply-chain results.
 *
 * Usage:
 *   npx tsx src/scripts/domains-report.ts <latest.csv> <oldest.csv> <rules.json>
 *     [--report report.xlsx --reference reference.xlsx] [--errors errors.csv] [--out domains_report.xlsx]
 *
 * Env: SUPPLY_CHAIN_LOG_LEVEL, SUPPLY_CHAIN_FUZZY_THRESHOLD, SUPPLY_CHAIN_OPERATOR_RULES
 */

import 'dotenv/config'
import { readFile } from 'node:fs/promises'
import { logger } from '../../lib/logger.js'
import { parseRuleSet } from '../domain/domainsHighlight/highlightRules.js'
import { createLoggingObserver } from '../domain/supplyChain/reconcile.js'
import { writeDomainsReport } from '../orchestration/buildDomainsReport.js'
import { initScriptLogging, parseCliArgs, runScript, stringOption, usage } from './cli.js'

const USAGE = [
  'Usage: domains-report <latest.csv> <oldest.csv> <rules.json>',
  '       [--report report.xlsx --reference reference.xlsx] [--errors errors.csv] [--out domains_report.xlsx]',
]

async function main() {
  initScriptLogging()
  const args = parseCliArgs(process.argv.slice(2), ['out', 'report', 'reference', 'errors'])
  const [latestPath, oldestPath, rulesPath] = args.positionals
  if (!latestPath || !oldestPath || !rulesPath) usage(USAGE)
  const reportPath = stringOption(args, 'report')
  const referencePath = stringOption(args, 'reference')
  if (Boolean(reportPath) !== Boolean(referencePath)) usage(['--report and --reference go together', ...USAGE])
  const outPath = stringOption(args, 'out') ?? 'domains_report.xlsx'

  const rawRules: unknown = JSON.parse(await readFile(rulesPath, 'utf8'))
  const report = await writeDomainsReport(outPath, {
    latestPath,
    oldestPath,
    ruleSet: parseRuleSet(rawRules),
    supplyChain:
      reportPath && referencePath ? { reportPath, referencePath, observer: createLoggingObserver() } : undefined,
    errorsPath: stringOption(args, 'errors'),
  })

  logger.info('script', 'Domains report complete', {
    output: outPath,
    sheets: report.sheets.map((s) => s.name),
    matched: report.summary?.matched,
    unmatched: report.summary?.unmatched,
  })
}

runScript('domains-report', main)
