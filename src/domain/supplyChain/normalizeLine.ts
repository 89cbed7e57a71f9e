/**
 * Canonical comparison key for ads.txt lines.
 * Periods survive so vendor domains like openx.com stay intact; spacing around commas
 * is dropped so "a.com, 1" and "a.com,1" compare equal.
 */

import type { NormalizedLine } from './schema.js'

export function normalizeLine(raw: unknown): NormalizedLine {
  if (typeof raw !== 'string' || !raw) return ''
  return raw
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s,.\-]/gu, '')
    .replace(/\s+/g, ' ')
    .replace(/ ?, ?/g, ',')
    .trim()
}

/** Text before the first comma, trimmed; null when the line has no comma. */
export function bidderPrefix(normalized: NormalizedLine): string | null {
  const i = normalized.indexOf(',')
  if (i < 0) return null
  return normalized.slice(0, i).trim()
}

/** Comma-separated fields of a normalized line, trimmed. */
export function lineFields(normalized: NormalizedLine): string[] {
  return normalized.split(',').map((p) => p.trim())
}

/** "openx.com" -> "openx". Only the last dot segment goes. */
export function stripDomainSuffix(bidder: string): string {
  return bidder.replace(/\.\w+$/, '')
}
