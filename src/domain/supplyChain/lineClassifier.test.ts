/**
 * Tests for the classification cascade.
 * Run with: node --import tsx --test src/domain/supplyChain/lineClassifier.test.ts
 */

import test from 'node:test'
import assert from 'node:assert/strict'
import { setConsoleOutput } from '../../../lib/logger.js'
import { classifyLine, prefixSimilarity, resolveMixedVendor, toLineCategory } from './lineClassifier.js'
import { buildReferenceIndex } from './referenceIndex.js'
import { defaultOperatorRules, mergeOperatorRules } from './operatorRules.js'
import type { ReferenceEntry } from './schema.js'

setConsoleOutput(false)

function ref(rawLine: string, category: string): ReferenceEntry {
  return { rawLine, category, status: 'live' }
}

const index = buildReferenceIndex([
  ref('a.com,123,RESELLER', 'Main'),
  ref('openx.com, 100, RESELLER, 6a698e2ec38604c6', 'Secondary'),
  ref('openx.com, 200, DIRECT, 6a698e2ec38604c6', 'Secondary'),
  ref('pubmatic.com, 555, DIRECT, 5d62403b186f2ace', 'Primary'),
  ref('pubmatic.com, 556, RESELLER, 5d62403b186f2ace', 'Primary'),
  ref('pubmatic.com, 557, RESELLER, 5d62403b186f2ace', 'Primary'),
  ref('pubmatic.com, 558, RESELLER, 5d62403b186f2ace', 'Secondary'),
  ref('rubiconproject.com, 1, DIRECT', 'Primary'),
  ref('rubiconproject.com, 2, DIRECT', 'Secondary'),
  ref('appnexus.com, 10, DIRECT', 'Primary'),
  ref('appnexus.com, 11, DIRECT', 'Primary'),
  ref('appnexus.com, 12, DIRECT', 'Primary'),
  ref('appnexus.com, 13, DIRECT', 'Master'),
  ref('triplelift.com, 7, DIRECT', 'Primary'),
  ref('triplelift.com, 8, DIRECT', 'Master'),
  ref('smartadserver.com, 1097, DIRECT', 'Primary'),
  ref('smartadserver.com, 1098, DIRECT', 'Primary'),
  ref('smartadserver.com, 1099, DIRECT', 'Primary'),
  ref('smartadserver.com, 2000, RESELLER', 'Secondary'),
  ref('adagio.io, 1039, RESELLER', 'Master'),
  ref('c.com, 5, DIRECT', 'Reseller only'),
])

test('exact match resolves MAIN to Primary', () => {
  const r = classifyLine('a.com, 123, RESELLER', index)
  assert.equal(r.category, 'Primary')
  assert.equal(r.matchType, 'exact')
  assert.equal(r.normalized, 'a.com,123,reseller')
  assert.equal(r.line, 'a.com, 123, RESELLER')
})

test('exact match on an Other category counts as Secondary', () => {
  const r = classifyLine('C.COM, 5, direct', index)
  assert.equal(r.category, 'Secondary')
  assert.equal(r.matchType, 'exact')
})

test('vendor + seller ID match ignores the relationship field', () => {
  const r = classifyLine('openx.com, 100, DIRECT', index)
  assert.equal(r.category, 'Secondary')
  assert.equal(r.matchType, 'vendor_id')
})

test('adagio.io is Master for any seller ID', () => {
  const r = classifyLine('adagio.io, 99999, DIRECT', index)
  assert.equal(r.category, 'Master')
  assert.equal(r.matchType, 'adagio_special_case')
})

test('vendor consensus when all entries agree', () => {
  const r = classifyLine('openx.com, 999, DIRECT', index)
  assert.equal(r.category, 'Secondary')
  assert.equal(r.matchType, 'vendor_category')
})

test('mixed vendors use the conservative tie-break', () => {
  const pubmatic = classifyLine('pubmatic.com, 1, DIRECT', index)
  assert.equal(pubmatic.category, 'Primary')
  assert.equal(pubmatic.matchType, 'vendor_most_common')

  assert.equal(classifyLine('rubiconproject.com, 9, DIRECT', index).category, 'Secondary')
  assert.equal(classifyLine('appnexus.com, 99, DIRECT', index).category, 'Master')
  assert.equal(classifyLine('triplelift.com, 99, DIRECT', index).category, 'Secondary')
})

test('smartadserver.com resolves to Secondary regardless of counts', () => {
  const r = classifyLine('smartadserver.com, 4242, DIRECT', index)
  assert.equal(r.category, 'Secondary')
  assert.equal(r.matchType, 'vendor_most_common')
})

test('bidder fuzzy match picks the closest reference line', () => {
  const r = classifyLine('pubmatic.com, 555, DIRECT, 5d62403b186f2acf', index, {
    disabledStages: ['vendorId', 'vendorConsensus'],
  })
  assert.equal(r.category, 'Primary')
  assert.equal(r.matchType, 'bidder')
  assert.equal(r.matchedLine, 'pubmatic.com,555,direct,5d62403b186f2ace')
  assert.equal(r.score, 39 / 40)
})

test('fuzzy scores at or under the threshold do not match', () => {
  const r = classifyLine('rubiconproject.com, 77, DIRECT', index, { disabledStages: ['vendorId', 'vendorConsensus'] })
  assert.equal(r.category, 'Unknown')
  assert.equal(r.matchType, 'none')
})

test('known prefixes are the last resort', () => {
  const google = classifyLine('google.com, pub-1234, DIRECT', index)
  assert.equal(google.category, 'Secondary')
  assert.equal(google.matchType, 'prefix')
  assert.equal(classifyLine('Adagio', index).category, 'Master')
})

test('unmatched lines are Unknown', () => {
  const r = classifyLine('unknownvendor.com, 1, DIRECT', index)
  assert.equal(r.category, 'Unknown')
  assert.equal(r.matchType, 'none')
  assert.equal(classifyLine('!!!', index).category, 'Unknown')
})

test('unmatched adagio.io lines are still Master', () => {
  const r = classifyLine('adagio.io, 1, DIRECT', index, {
    disabledStages: ['vendorId', 'vendorConsensus', 'prefix'],
  })
  assert.equal(r.category, 'Master')
  assert.equal(r.matchType, 'none')
})

test('operator rules can add forced vendors and prefixes', () => {
  const rules = mergeOperatorRules({
    forcedMasterVendors: ['Newvendor.com'],
    knownPrefixes: [{ substring: 'Acme', category: 'Primary' }],
  })
  assert.equal(classifyLine('newvendor.com, 1, DIRECT', index, { rules }).matchType, 'adagio_special_case')
  assert.equal(classifyLine('acme-ads.net, 1, DIRECT', index, { rules }).category, 'Primary')
  assert.equal(classifyLine('google.com, 1, DIRECT', index, { rules }).category, 'Unknown')
})

test('prefixSimilarity is the common leading run over the longer length', () => {
  assert.equal(prefixSimilarity('abc', 'abd'), 2 / 3)
  assert.equal(prefixSimilarity('abc', 'abcdef'), 0.5)
  assert.equal(prefixSimilarity('', ''), 0)
})

test('resolveMixedVendor thresholds', () => {
  const e = (category: 'Primary' | 'Secondary' | 'Master' | 'Other') => ({ line: 'x', category })
  const rules = defaultOperatorRules
  assert.equal(resolveMixedVendor([e('Primary'), e('Primary'), e('Primary'), e('Secondary')], rules), 'Primary')
  assert.equal(resolveMixedVendor([e('Primary'), e('Primary'), e('Secondary')], rules), 'Secondary')
  assert.equal(resolveMixedVendor([e('Primary'), e('Primary'), e('Master')], rules), 'Secondary')
  assert.equal(resolveMixedVendor([e('Primary'), e('Primary'), e('Primary'), e('Master')], rules), 'Master')
  assert.equal(resolveMixedVendor([e('Master'), e('Other')], rules), 'Secondary')
  assert.equal(toLineCategory('Other'), 'Secondary')
})
