/**
 * Reference index over the canonical ads.txt lines table.
 * Exact map (normalized line -> category, last write wins) and bidder map
 * (bidder prefix -> entries in load order) for the fallback stages.
 */

import { logger } from '../../../lib/logger.js'
import { bidderPrefix, lineFields, normalizeLine } from './normalizeLine.js'
import type { Category, NormalizedLine, ReferenceEntry } from './schema.js'

export interface BidderEntry {
  line: NormalizedLine
  category: Category
}

export interface ReferenceIndexStats {
  /** Entries accepted into the exact map (before key collisions). */
  entries: number
  /** Entries skipped for a missing line or category. */
  skipped: number
  /** Distinct normalized lines. */
  distinctLines: number
  bidders: number
  byCategory: Record<Category, number>
  /** Raw category text -> normalized category, for every synonym seen. */
  categoryMappings: Record<string, Category>
}

export interface ReferenceIndex {
  exact: ReadonlyMap<NormalizedLine, Category>
  byBidder: ReadonlyMap<string, readonly BidderEntry[]>
  /** vendor + "," + sellerId -> category of the first exact-map key with that pair. */
  byVendorSeller: ReadonlyMap<string, Category>
  stats: ReferenceIndexStats
}

/**
 * Map raw category text to a Category. MAIN/PRIMARY -> Primary, MASTER -> Master,
 * SECONDARY -> Secondary, anything else -> Other. Null for blank input.
 */
export function normalizeCategory(raw: string | null | undefined): Category | null {
  const value = (raw ?? '').trim()
  if (!value) return null
  switch (value.toLowerCase()) {
    case 'main':
    case 'primary':
      return 'Primary'
    case 'master':
      return 'Master'
    case 'secondary':
      return 'Secondary'
    default:
      return 'Other'
  }
}

/** Display form of a category value that is not one of the known ones. */
export function capitalizeCategory(raw: string): string {
  const v = raw.trim().toLowerCase()
  return v.charAt(0).toUpperCase() + v.slice(1)
}

export function vendorSellerKey(vendor: string, sellerId: string): string {
  return `${vendor},${sellerId}`
}

export function buildReferenceIndex(entries: Iterable<ReferenceEntry>): ReferenceIndex {
  const exact = new Map<NormalizedLine, Category>()
  const byBidder = new Map<string, BidderEntry[]>()
  const stats: ReferenceIndexStats = {
    entries: 0,
    skipped: 0,
    distinctLines: 0,
    bidders: 0,
    byCategory: { Primary: 0, Secondary: 0, Master: 0, Other: 0 },
    categoryMappings: {},
  }

  for (const entry of entries) {
    const category = normalizeCategory(entry.category)
    const normalized = normalizeLine(entry.rawLine)
    if (!category || !normalized) {
      stats.skipped++
      continue
    }
    const rawCategory = entry.category.trim()
    if (!(rawCategory in stats.categoryMappings)) {
      stats.categoryMappings[rawCategory] = category
      if (category === 'Other') {
        logger.debug('reference', `Unrecognized category "${capitalizeCategory(rawCategory)}" counted as Other`)
      }
    }

    stats.entries++
    stats.byCategory[category]++
    exact.set(normalized, category)

    const bidder = bidderPrefix(normalized)
    if (bidder !== null) {
      const list = byBidder.get(bidder) ?? []
      list.push({ line: normalized, category })
      byBidder.set(bidder, list)
    }
  }

  const byVendorSeller = new Map<string, Category>()
  for (const [line, category] of exact) {
    const fields = lineFields(line)
    if (fields.length < 2) continue
    const key = vendorSellerKey(fields[0], fields[1])
    if (!byVendorSeller.has(key)) byVendorSeller.set(key, category)
  }

  stats.distinctLines = exact.size
  stats.bidders = byBidder.size
  logger.info('reference', 'Reference index built', {
    entries: stats.entries,
    skipped: stats.skipped,
    distinctLines: stats.distinctLines,
    bidders: stats.bidders,
  })
  return { exact, byBidder, byVendorSeller, stats }
}
