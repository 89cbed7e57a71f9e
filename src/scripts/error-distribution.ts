/**
 * Per-website error distribution with a summary of the dominant status.
 *
 * Usage:
 *   npx tsx src/scripts/error-distribution.ts <input.csv> [--out error_distribution.xlsx]
 */

import 'dotenv/config'
import { logger } from '../../lib/logger.js'
import { readTable, writeTables } from '../integrations/spreadsheet/tables.js'
import {
  DISTRIBUTION_COLUMN,
  calculateErrorDistribution,
  summarizeErrorDistribution,
} from '../domain/errorDistribution/errorDistribution.js'
import { initScriptLogging, parseCliArgs, runScript, stringOption, usage } from './cli.js'

async function main() {
  initScriptLogging()
  const args = parseCliArgs(process.argv.slice(2), ['out'])
  const [inputPath] = args.positionals
  if (!inputPath) usage(['Usage: error-distribution <input.csv> [--out error_distribution.xlsx]'])
  const outPath = stringOption(args, 'out') ?? 'error_distribution.xlsx'

  const table = await readTable(inputPath)
  const rows = calculateErrorDistribution(table)
  const summary = summarizeErrorDistribution(rows)

  await writeTables(outPath, [
    { name: 'Error Distribution', columns: [...table.headers, DISTRIBUTION_COLUMN], rows },
    {
      name: 'Summary',
      columns: ['Website/App Name', 'Most Adcalls status', 'Most Ad Calls %', 'Type'],
      rows: summary.map((s) => ({
        'Website/App Name': s.website,
        'Most Adcalls status': s.status,
        'Most Ad Calls %': s.percentage,
        Type: s.type,
      })),
    },
  ])
  logger.info('script', 'Error distribution complete', { output: outPath, rows: rows.length, websites: summary.length })
}

runScript('error-distribution', main)
