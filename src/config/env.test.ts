/**
 * Tests for env parsing and defaults.
 * Run with: node --import tsx --test src/config/env.test.ts
 */

import test from 'node:test'
import assert from 'node:assert/strict'
import { getEnv, resetEnvCache, getLogLevelFromEnv, getFuzzyThresholdFromEnv, isAuditEnabled } from './env.js'

const KEYS = ['SUPPLY_CHAIN_LOG_LEVEL', 'SUPPLY_CHAIN_FUZZY_THRESHOLD', 'SUPPLY_CHAIN_OPERATOR_RULES', 'SUPPLY_CHAIN_AUDIT']

function withEnv(values: Record<string, string>, fn: () => void): void {
  const saved = new Map<string, string | undefined>()
  for (const k of KEYS) {
    saved.set(k, process.env[k])
    delete process.env[k]
  }
  Object.assign(process.env, values)
  resetEnvCache()
  try {
    fn()
  } finally {
    for (const [k, v] of saved) {
      if (v === undefined) delete process.env[k]
      else process.env[k] = v
    }
    resetEnvCache()
  }
}

test('defaults when nothing is set', () => {
  withEnv({}, () => {
    assert.equal(getLogLevelFromEnv(), 'info')
    assert.equal(getFuzzyThresholdFromEnv(), undefined)
    assert.equal(isAuditEnabled(), false)
  })
})

test('reads configured values', () => {
  withEnv({ SUPPLY_CHAIN_LOG_LEVEL: 'debug', SUPPLY_CHAIN_FUZZY_THRESHOLD: '0.85', SUPPLY_CHAIN_AUDIT: '1' }, () => {
    assert.equal(getLogLevelFromEnv(), 'debug')
    assert.equal(getFuzzyThresholdFromEnv(), 0.85)
    assert.equal(isAuditEnabled(), true)
  })
})

test('invalid values fall back to an empty env', () => {
  withEnv({ SUPPLY_CHAIN_LOG_LEVEL: 'loud' }, () => {
    const original = console.warn
    console.warn = () => {}
    try {
      assert.deepEqual(getEnv(), {})
    } finally {
      console.warn = original
    }
    assert.equal(getLogLevelFromEnv(), 'info')
  })
})

test('fuzzy threshold must lie strictly between 0 and 1', () => {
  const original = console.warn
  console.warn = () => {}
  try {
    for (const value of ['0', '1', '1.0', 'abc']) {
      withEnv({ SUPPLY_CHAIN_FUZZY_THRESHOLD: value, SUPPLY_CHAIN_LOG_LEVEL: 'debug' }, () => {
        assert.equal(getFuzzyThresholdFromEnv(), undefined, value)
        assert.equal(getLogLevelFromEnv(), 'info', value)
      })
    }
  } finally {
    console.warn = original
  }
  withEnv({ SUPPLY_CHAIN_FUZZY_THRESHOLD: '0.5' }, () => {
    assert.equal(getFuzzyThresholdFromEnv(), 0.5)
  })
})
