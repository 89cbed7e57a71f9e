/**
 * Classify one candidate line against the reference index.
 *
 * Cascade, first stage that decides wins:
 *   exact -> vendor+seller ID -> vendor consensus -> bidder fuzzy -> known prefix -> unmatched.
 * Reports carry typos, reordered fields and missing certificate IDs, so everything after
 * the exact stage leans on the vendor name, which is usually legible.
 */

import { bidderPrefix, lineFields, normalizeLine } from './normalizeLine.js'
import { defaultOperatorRules, type OperatorRules } from './operatorRules.js'
import { vendorSellerKey, type BidderEntry, type ReferenceIndex } from './referenceIndex.js'
import type { CandidateLine, Category, ClassificationResult, LineCategory, NormalizedLine } from './schema.js'

export type ClassifierStage = 'vendorId' | 'vendorConsensus' | 'bidderFuzzy' | 'prefix'

export interface ClassifyOptions {
  rules?: OperatorRules
  /** Stages to skip (exact and unmatched always run). */
  disabledStages?: readonly ClassifierStage[]
}

/** Other reference categories count as Secondary. */
export function toLineCategory(category: Category): LineCategory {
  if (category === 'Primary' || category === 'Master') return category
  return 'Secondary'
}

/** Length of the common leading run divided by the longer length. */
export function prefixSimilarity(a: string, b: string): number {
  const longest = Math.max(a.length, b.length)
  if (longest === 0) return 0
  let common = 0
  const n = Math.min(a.length, b.length)
  while (common < n && a[common] === b[common]) common++
  return common / longest
}

/**
 * Category for a vendor whose reference entries disagree. Secondary unless Primary clearly
 * dominates; a dominant Primary gives way to Master when the vendor has any Master entry.
 */
export function resolveMixedVendor(entries: readonly BidderEntry[], rules: OperatorRules): LineCategory {
  let primary = 0
  let secondary = 0
  let master = 0
  for (const e of entries) {
    if (e.category === 'Primary') primary++
    else if (e.category === 'Secondary') secondary++
    else if (e.category === 'Master') master++
  }
  const { primaryRatio, primaryMinimumWithoutSecondary } = rules.consensus
  let usePrimary = false
  if (primary > 0 && secondary > 0) usePrimary = primary >= primaryRatio * secondary
  else if (primary > 0) usePrimary = primary >= primaryMinimumWithoutSecondary
  if (!usePrimary) return 'Secondary'
  return master > 0 ? 'Master' : 'Primary'
}

function bestBidderMatch(
  normalized: NormalizedLine,
  entries: readonly BidderEntry[],
  threshold: number
): { entry: BidderEntry; score: number } | null {
  let best: { entry: BidderEntry; score: number } | null = null
  for (const entry of entries) {
    const score = prefixSimilarity(normalized, entry.line)
    if (score > threshold && (best === null || score > best.score)) best = { entry, score }
  }
  return best
}

export function classifyLine(
  line: CandidateLine,
  index: ReferenceIndex,
  options: ClassifyOptions = {}
): ClassificationResult {
  const rules = options.rules ?? defaultOperatorRules
  const disabled = new Set(options.disabledStages ?? [])
  const normalized = normalizeLine(line)
  const base = { line, normalized }

  if (!normalized) return { ...base, category: 'Unknown', matchType: 'none' }

  const exact = index.exact.get(normalized)
  if (exact) return { ...base, category: toLineCategory(exact), matchType: 'exact', matchedLine: normalized }

  const vendor = bidderPrefix(normalized)
  const fields = vendor === null ? [] : lineFields(normalized)

  if (vendor !== null && fields.length >= 2 && !disabled.has('vendorId')) {
    if (rules.forcedMasterVendors.includes(vendor)) {
      return { ...base, category: 'Master', matchType: 'adagio_special_case' }
    }
    const byId = index.byVendorSeller.get(vendorSellerKey(vendor, fields[1]))
    if (byId) return { ...base, category: toLineCategory(byId), matchType: 'vendor_id' }
  }

  const vendorEntries = vendor === null ? undefined : index.byBidder.get(vendor)

  if (vendor !== null && vendorEntries && vendorEntries.length > 0 && !disabled.has('vendorConsensus')) {
    if (rules.forcedSecondaryVendors.includes(vendor)) {
      return { ...base, category: 'Secondary', matchType: 'vendor_most_common' }
    }
    const first = vendorEntries[0].category
    if (vendorEntries.every((e) => e.category === first)) {
      return { ...base, category: toLineCategory(first), matchType: 'vendor_category' }
    }
    return { ...base, category: resolveMixedVendor(vendorEntries, rules), matchType: 'vendor_most_common' }
  }

  if (vendorEntries && !disabled.has('bidderFuzzy')) {
    const best = bestBidderMatch(normalized, vendorEntries, rules.fuzzyThreshold)
    if (best) {
      return {
        ...base,
        category: toLineCategory(best.entry.category),
        matchType: 'bidder',
        matchedLine: best.entry.line,
        score: best.score,
      }
    }
  }

  if (!disabled.has('prefix')) {
    const known = rules.knownPrefixes.find((p) => normalized.includes(p.substring))
    if (known) return { ...base, category: known.category, matchType: 'prefix' }
  }

  if (vendor !== null && rules.forcedMasterVendors.includes(vendor)) {
    return { ...base, category: 'Master', matchType: 'none' }
  }
  return { ...base, category: 'Unknown', matchType: 'none' }
}
