/**
 * Tests for the latest/oldest domain report comparison.
 * Run with: node --import tsx --test src/domain/domainsHighlight/domainsDiff.test.ts
 */

import test from 'node:test'
import assert from 'node:assert/strict'
import { setConsoleOutput } from '../../../lib/logger.js'
import { MissingColumnError } from '../errors.js'
import { diffDomainReports, highlightDomains, percentDiff, withPriorityColumn } from './domainsDiff.js'
import { parseRuleSet } from './highlightRules.js'
import type { Table } from '../table.js'

setConsoleOutput(false)

const latest: Table = {
  headers: ['Website/App Name', 'Revenue', 'CPM', 'Platform'],
  rows: [
    { 'Website/App Name': 'zeta.com', Revenue: '150', CPM: '2', Platform: 'Web' },
    { 'Website/App Name': 'alpha.com', Revenue: '50', CPM: 'n/a', Platform: 'App' },
  ],
}

const oldest: Table = {
  headers: ['Website/App Name', 'Revenue', 'CPM', 'Region'],
  rows: [
    { 'Website/App Name': 'zeta.com', Revenue: '100', CPM: '0', Region: 'EU' },
    { 'Website/App Name': 'old.com', Revenue: '10', CPM: '1', Region: 'US' },
  ],
}

test('outer join sorted by name with status and diff columns', () => {
  const { columns, rows } = diffDomainReports(latest, oldest)
  assert.deepEqual(columns, [
    'Website/App Name',
    'Revenue',
    'Revenue % Diff',
    'CPM',
    'CPM % Diff',
    'Platform',
    'Region',
    'New and Deprecated',
  ])
  assert.deepEqual(rows, [
    {
      'Website/App Name': 'alpha.com',
      Revenue: 50,
      'Revenue % Diff': null,
      CPM: 'n/a',
      'CPM % Diff': null,
      Platform: 'App',
      Region: null,
      'New and Deprecated': 'New',
    },
    {
      'Website/App Name': 'old.com',
      Revenue: null,
      'Revenue % Diff': null,
      CPM: null,
      'CPM % Diff': null,
      Platform: null,
      Region: 'US',
      'New and Deprecated': 'Deprecated',
    },
    {
      'Website/App Name': 'zeta.com',
      Revenue: 150,
      'Revenue % Diff': 50,
      CPM: 2,
      'CPM % Diff': null,
      Platform: 'Web',
      Region: 'EU',
      'New and Deprecated': 'Present in both',
    },
  ])
})

test('only requested metrics present in the latest report are compared', () => {
  const { columns } = diffDomainReports(latest, oldest, { metrics: ['CPM', 'Bid Rate'] })
  assert.deepEqual(columns.slice(0, 3), ['Website/App Name', 'CPM', 'CPM % Diff'])
  assert.ok(columns.includes('Revenue'))
  assert.ok(!columns.includes('Bid Rate % Diff'))
})

test('the website column is required in both reports', () => {
  assert.throws(
    () => diffDomainReports(latest, { headers: ['Domain'], rows: [] }),
    (err: unknown) => err instanceof MissingColumnError && err.table === 'oldest'
  )
})

test('percentDiff needs both values and a non-zero base', () => {
  assert.equal(percentDiff(75, 100), -25)
  assert.equal(percentDiff(1, 0), null)
  assert.equal(percentDiff(null, 5), null)
})

test('highlightDomains attaches priorities and a Priority column', () => {
  const { rows } = diffDomainReports(latest, oldest)
  const ruleSet = parseRuleSet({ High: [{ metric: 'Revenue % Diff', operator: '>', value: 20 }] })
  const highlighted = highlightDomains(rows, ruleSet)
  assert.deepEqual(
    highlighted.map((h) => [h.name, h.priority]),
    [
      ['alpha.com', null],
      ['old.com', null],
      ['zeta.com', 'High'],
    ]
  )
  assert.equal(withPriorityColumn(highlighted)[2].Priority, 'High')
  assert.equal(withPriorityColumn(highlighted)[0].Priority, '')
})
