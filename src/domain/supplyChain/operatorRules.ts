/**
 * Operator business rules for line classification (ops can adjust without code changes).
 * Loaded from JSON via SUPPLY_CHAIN_OPERATOR_RULES and merged over the defaults.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'

const categorySchema = z.enum(['Primary', 'Secondary', 'Master'])

export const OperatorRulesSchema = z.object({
  /** Vendors always classified Master, whatever the seller ID. */
  forcedMasterVendors: z.array(z.string().min(1)),
  /** Vendors resolved to Secondary by the vendor consensus stage. */
  forcedSecondaryVendors: z.array(z.string().min(1)),
  /** Last-resort substring table, checked in order. */
  knownPrefixes: z.array(z.object({ substring: z.string().min(1), category: categorySchema })),
  consensus: z.object({
    /** Primary wins a mixed vendor when primary >= ratio * secondary. */
    primaryRatio: z.number().positive(),
    /** Primary entries needed when the vendor has no Secondary entries. */
    primaryMinimumWithoutSecondary: z.number().int().min(1),
  }),
  /** Bidder fuzzy matches need a score strictly above this. */
  fuzzyThreshold: z.number().gt(0).lt(1),
})

export type OperatorRules = z.infer<typeof OperatorRulesSchema>

export const defaultOperatorRules: OperatorRules = {
  forcedMasterVendors: ['adagio.io'],
  forcedSecondaryVendors: ['smartadserver.com'],
  knownPrefixes: [
    { substring: 'adagio', category: 'Master' },
    { substring: 'google', category: 'Secondary' },
    { substring: 'doubleclick', category: 'Secondary' },
    { substring: 'freewheel', category: 'Secondary' },
    { substring: 'spotxchange', category: 'Secondary' },
    { substring: 'spotx', category: 'Secondary' },
    { substring: 'adform', category: 'Secondary' },
    { substring: 'media.net', category: 'Secondary' },
    { substring: 'contextweb', category: 'Secondary' },
    { substring: 'taboola', category: 'Secondary' },
    { substring: 'outbrain', category: 'Secondary' },
    { substring: 'vidazoo', category: 'Secondary' },
    { substring: 'smartclip', category: 'Secondary' },
    { substring: 'smaato', category: 'Secondary' },
    { substring: 'rhythmone', category: 'Secondary' },
  ],
  consensus: { primaryRatio: 3, primaryMinimumWithoutSecondary: 3 },
  fuzzyThreshold: 0.7,
}

const OperatorRulesOverrideSchema = OperatorRulesSchema.partial().extend({
  consensus: OperatorRulesSchema.shape.consensus.partial().optional(),
})

export type OperatorRulesOverride = z.infer<typeof OperatorRulesOverrideSchema>

/** Merge a partial override onto a base rule set. Vendor names are lowercased. */
export function mergeOperatorRules(
  override: OperatorRulesOverride,
  base: OperatorRules = defaultOperatorRules
): OperatorRules {
  const merged: OperatorRules = {
    forcedMasterVendors: override.forcedMasterVendors ?? base.forcedMasterVendors,
    forcedSecondaryVendors: override.forcedSecondaryVendors ?? base.forcedSecondaryVendors,
    knownPrefixes: override.knownPrefixes ?? base.knownPrefixes,
    consensus: { ...base.consensus, ...override.consensus },
    fuzzyThreshold: override.fuzzyThreshold ?? base.fuzzyThreshold,
  }
  return {
    ...merged,
    forcedMasterVendors: merged.forcedMasterVendors.map((v) => v.trim().toLowerCase()),
    forcedSecondaryVendors: merged.forcedSecondaryVendors.map((v) => v.trim().toLowerCase()),
    knownPrefixes: merged.knownPrefixes.map((p) => ({ ...p, substring: p.substring.toLowerCase() })),
  }
}

/** Validate an override object; throws a ZodError listing every problem. */
export function parseOperatorRules(input: unknown, base: OperatorRules = defaultOperatorRules): OperatorRules {
  return mergeOperatorRules(OperatorRulesOverrideSchema.parse(input), base)
}

export function loadOperatorRules(path: string): OperatorRules {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf8'))
  return parseOperatorRules(raw)
}
