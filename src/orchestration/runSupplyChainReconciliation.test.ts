/**
 * Tests for the file-level reconciliation run (temp CSV files only).
 * Run with: node --import tsx --test src/orchestration/runSupplyChainReconciliation.test.ts
 */

import test from 'node:test'
import assert from 'node:assert/strict'
import { mkdtempSync, writeFileSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { setConsoleOutput } from '../../lib/logger.js'
import { resetEnvCache } from '../config/env.js'
import { MissingColumnError } from '../domain/errors.js'
import { defaultOperatorRules } from '../domain/supplyChain/operatorRules.js'
import { resolveOperatorRules, runSupplyChainReconciliation } from './runSupplyChainReconciliation.js'

setConsoleOutput(false)

const dir = mkdtempSync(join(tmpdir(), 'reconcile-run-'))

function clearEnv(): void {
  delete process.env.SUPPLY_CHAIN_OPERATOR_RULES
  delete process.env.SUPPLY_CHAIN_FUZZY_THRESHOLD
  resetEnvCache()
}

function file(name: string, content: string): string {
  const path = join(dir, name)
  writeFileSync(path, content)
  return path
}

const referencePath = file(
  'reference.csv',
  'Line,Line category\n"a.com,123,RESELLER",Main\n"adagio.io, 1039, RESELLER",Master\n'
)

test('reconciles a report file against a reference file', async () => {
  clearEnv()
  const reportPath = file(
    'report.csv',
    'Domain,Publisher Name,Status,Missing Lines\n' +
      'foo.com,Foo,Active,"a.com, 123, RESELLER\nadagio.io, 7, DIRECT"\n' +
      'bar.com,Bar,Paused,\n'
  )
  const { rows, stats, referenceStats, reportColumns } = await runSupplyChainReconciliation({
    reportPath,
    referencePath,
    observer: {},
  })
  assert.equal(reportColumns.name, 'Publisher Name')
  assert.equal(referenceStats.distinctLines, 2)
  assert.equal(stats.lines, 2)
  assert.deepEqual(
    rows.map((r) => [r.Domain, r.Status, r['Master Missing'], r['Primary Missing'], r['Missing Primary Bidders']]),
    [
      ['foo.com', 'Active', 1, 1, 'a '],
      ['bar.com', 'Paused', 0, 0, 'No missing bidders'],
    ]
  )
})

test('a report without a missing-lines column fails before processing', async () => {
  clearEnv()
  const reportPath = file('bad-report.csv', 'Domain,Name\nfoo.com,Foo\n')
  await assert.rejects(runSupplyChainReconciliation({ reportPath, referencePath }), MissingColumnError)
})

test('operator rules come from the environment when not given', () => {
  clearEnv()
  process.env.SUPPLY_CHAIN_OPERATOR_RULES = file(
    'rules.json',
    JSON.stringify({ fuzzyThreshold: 0.8, forcedSecondaryVendors: ['Foo.com'] })
  )
  resetEnvCache()
  const fromFile = resolveOperatorRules()
  assert.equal(fromFile.fuzzyThreshold, 0.8)
  assert.deepEqual(fromFile.forcedSecondaryVendors, ['foo.com'])

  process.env.SUPPLY_CHAIN_FUZZY_THRESHOLD = '0.9'
  resetEnvCache()
  assert.equal(resolveOperatorRules().fuzzyThreshold, 0.9)
  clearEnv()
})

test('an out-of-range env threshold leaves the rules threshold in place', () => {
  const original = console.warn
  console.warn = () => {}
  try {
    for (const value of ['0', '1']) {
      clearEnv()
      process.env.SUPPLY_CHAIN_FUZZY_THRESHOLD = value
      resetEnvCache()
      assert.equal(resolveOperatorRules().fuzzyThreshold, defaultOperatorRules.fuzzyThreshold, value)
      assert.equal(resolveOperatorRules({ ...defaultOperatorRules, fuzzyThreshold: 0.6 }).fuzzyThreshold, 0.6, value)
    }
  } finally {
    console.warn = original
    clearEnv()
  }
})
