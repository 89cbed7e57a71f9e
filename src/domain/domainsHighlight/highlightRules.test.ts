/**
 * Tests for highlight rule validation and evaluation.
 * Run with: node --import tsx --test src/domain/domainsHighlight/highlightRules.test.ts
 */

import test from 'node:test'
import assert from 'node:assert/strict'
import {
  assignPriority,
  createHighlightRule,
  describeRule,
  evaluateRule,
  parseRuleSet,
  resolveMetricColumn,
  resolveMetricValue,
} from './highlightRules.js'
import { InvalidRuleError } from '../errors.js'

test('legacy operator symbols become tagged rules', () => {
  assert.deepEqual(createHighlightRule({ metric: 'Revenue', operator: '>', value: '5' }), {
    metric: 'Revenue',
    operator: 'GreaterThan',
    value: 5,
  })
  assert.deepEqual(createHighlightRule({ metric: 'CPM', operator: 'Between', value: '1;10' }), {
    metric: 'CPM',
    operator: 'Between',
    range: { min: 1, max: 10 },
  })
  assert.deepEqual(createHighlightRule({ metric: 'Platform', operator: '=', value: 'Web' }), {
    metric: 'Platform',
    operator: 'Equals',
    value: 'Web',
  })
})

test('malformed rules are rejected when built', () => {
  const isInvalid = (err: unknown) => err instanceof InvalidRuleError
  assert.throws(() => createHighlightRule({ metric: 'Revenue', operator: '>', value: 'lots' }), isInvalid)
  assert.throws(() => createHighlightRule({ metric: 'CPM', operator: 'Between', value: '10;1' }), isInvalid)
  assert.throws(() => createHighlightRule({ metric: 'CPM', operator: 'Between', value: '10' }), isInvalid)
  assert.throws(() => createHighlightRule({ metric: '', operator: 'LessThan', value: 1 }), isInvalid)
  assert.throws(() => createHighlightRule({ metric: 'CPM', operator: 'Around', value: 1 }), isInvalid)
  assert.throws(() => createHighlightRule('Revenue > 5'), isInvalid)
})

test('rule sets name the failing priority and reject unknown keys', () => {
  assert.throws(
    () => parseRuleSet({ High: [{ metric: 'Revenue', operator: '>', value: 1 }], Medium: [{ metric: 'CPM' }] }),
    (err: unknown) => err instanceof InvalidRuleError && err.message.startsWith('Invalid Medium rule #1')
  )
  assert.throws(() => parseRuleSet({ Urgent: [] }), InvalidRuleError)
  assert.deepEqual(parseRuleSet({ Low: [] }), { Low: [] })
})

test('evaluateRule compares numbers and ignores percent signs', () => {
  const gt = createHighlightRule({ metric: 'Bid Rate', operator: 'GreaterThan', value: 5 })
  assert.equal(evaluateRule(gt, '12.5%'), true)
  assert.equal(evaluateRule(gt, 5), false)
  assert.equal(evaluateRule(gt, null), false)
  assert.equal(evaluateRule(gt, ''), false)
  assert.equal(evaluateRule(gt, 'n/a'), false)

  const between = createHighlightRule({ metric: 'CPM', operator: 'Between', range: { min: 1, max: 10 } })
  assert.equal(evaluateRule(between, 10), true)
  assert.equal(evaluateRule(between, '1'), true)
  assert.equal(evaluateRule(between, 10.01), false)

  const eq = createHighlightRule({ metric: 'Platform', operator: 'Equals', value: 'Web' })
  assert.equal(evaluateRule(eq, ' web '), true)
  assert.equal(evaluateRule(eq, 'App'), false)
  assert.equal(evaluateRule(createHighlightRule({ metric: 'X', operator: '=', value: '3' }), '3.0'), true)
})

test('metric columns prefer exact names and only use diff columns when asked', () => {
  const columns = ['Website/App Name', 'Total Revenue % Diff', 'Total Revenue', 'Revenue % Diff']
  assert.equal(resolveMetricColumn(columns, 'Revenue'), 'Total Revenue')
  assert.equal(resolveMetricColumn(columns, 'Revenue % Diff'), 'Revenue % Diff')
  assert.equal(resolveMetricColumn(['Total Revenue % Diff'], 'Revenue % Diff'), 'Total Revenue % Diff')
  assert.equal(resolveMetricColumn(['Total Revenue % Diff'], 'Revenue'), null)
  assert.equal(resolveMetricValue({ 'Ad Requests': 10 }, 'Requests'), 10)
})

test('assignPriority returns the first fully matching priority', () => {
  const ruleSet = parseRuleSet({
    High: [
      { metric: 'Revenue', operator: '>', value: 100 },
      { metric: 'Revenue % Diff', operator: '<', value: -20 },
    ],
    Medium: [{ metric: 'Revenue % Diff', operator: '<', value: 0 }],
    Low: [],
  })
  assert.equal(assignPriority({ Revenue: 500, 'Revenue % Diff': -50 }, ruleSet), 'High')
  assert.equal(assignPriority({ Revenue: 50, 'Revenue % Diff': -50 }, ruleSet), 'Medium')
  assert.equal(assignPriority({ Revenue: 50, 'Revenue % Diff': 10 }, ruleSet), null)
  assert.equal(assignPriority({ Revenue: 500, 'Revenue % Diff': null }, ruleSet), null)
})

test('describeRule renders the operator', () => {
  assert.equal(describeRule(createHighlightRule({ metric: 'CPM', operator: '<', value: '2' })), 'CPM < 2')
  assert.equal(
    describeRule(createHighlightRule({ metric: 'CPM', operator: 'Between', value: '1;3' })),
    'CPM between 1 and 3'
  )
})
