/**
 * Compare two domain exports and mark each domain with the priority its rules match.
 *
 * Usage:
 *   npx tsx src/scripts/highlight-domains.ts <latest.csv> <oldest.csv> <rules.json> [--out domains_highlight.xlsx]
 *
 * rules.json: { "High": [{ "metric": "Revenue % Diff", "operator": "LessThan", "value": -20 }], "Medium": [...], "Low": [...] }
 */

import 'dotenv/config'
import { readFile } from 'node:fs/promises'
import { logger } from '../../lib/logger.js'
import { readTable, writeTables } from '../integrations/spreadsheet/tables.js'
import {
  PRIORITY_COLUMN,
  diffDomainReports,
  highlightDomains,
  withPriorityColumn,
} from '../domain/domainsHighlight/domainsDiff.js'
import { PRIORITIES, describeRule, parseRuleSet } from '../domain/domainsHighlight/highlightRules.js'
import { initScriptLogging, parseCliArgs, runScript, stringOption, usage } from './cli.js'

async function main() {
  initScriptLogging()
  const args = parseCliArgs(process.argv.slice(2), ['out'])
  const [latestPath, oldestPath, rulesPath] = args.positionals
  if (!latestPath || !oldestPath || !rulesPath) {
    usage(['Usage: highlight-domains <latest.csv> <oldest.csv> <rules.json> [--out domains_highlight.xlsx]'])
  }
  const outPath = stringOption(args, 'out') ?? 'domains_highlight.xlsx'

  const rawRules: unknown = JSON.parse(await readFile(rulesPath, 'utf8'))
  const ruleSet = parseRuleSet(rawRules)
  for (const priority of PRIORITIES) {
    const rules = ruleSet[priority] ?? []
    logger.info('highlight', `${priority}: ${rules.length} rule(s)`, { rules: rules.map(describeRule) })
  }

  const [latest, oldest] = await Promise.all([readTable(latestPath), readTable(oldestPath)])
  const diff = diffDomainReports(latest, oldest)
  const highlighted = highlightDomains(diff.rows, ruleSet)

  await writeTables(outPath, [
    { name: 'Domains Highlight', columns: [...diff.columns, PRIORITY_COLUMN], rows: withPriorityColumn(highlighted) },
  ])
  logger.info('script', 'Domains highlight complete', {
    output: outPath,
    domains: highlighted.length,
    High: highlighted.filter((h) => h.priority === 'High').length,
    Medium: highlighted.filter((h) => h.priority === 'Medium').length,
    Low: highlighted.filter((h) => h.priority === 'Low').length,
  })
}

runScript('highlight-domains', main)
