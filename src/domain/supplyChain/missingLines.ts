/**
 * Split a free-text "missing ads.txt lines" cell into candidate lines.
 *
 * Cells come from a validation report and mix formats: one entry per line, semicolon lists,
 * several entries run together on one line, or a single comma-separated entry. The first
 * rule that fits the overall shape of the cell decides how it is split:
 *
 *   1. empty / "web"          -> nothing
 *   2. contains a newline     -> one fragment per line (bullets and numbering stripped)
 *   3. contains ";"           -> one fragment per item (numbering stripped)
 *   4. ads.txt entries found  -> each entry verbatim
 *   5. contains ","           -> one entry, or one candidate per non-numeric part
 *   6. anything else          -> the whole text
 *
 * Fragments from 2 and 3 go through {@link acceptFragment}.
 */

import type { CandidateLine } from './schema.js'

export type CellShape = 'empty' | 'multiline' | 'semicolon' | 'pattern' | 'comma' | 'single'

export type FragmentReason = 'ads_txt' | 'domain' | 'keyword' | 'short_text' | 'multi_word'

export interface ParsedCell {
  shape: CellShape
  lines: CandidateLine[]
  /** Fragments dropped by the fragment filter (rules 2 and 3 only). */
  dropped: string[]
}

/** domain, sellerID, RESELLER|DIRECT [, certificateID] */
const ADS_TXT_ENTRY_SOURCE =
  String.raw`([\w.-]+\.\w+)\s*,\s*([\w-]+)\s*,\s*(RESELLER|DIRECT)\b(?:\s*,\s*([\w-]+)(?![\w.]))?`

const ADS_TXT_ENTRY_ANCHORED = new RegExp(`^${ADS_TXT_ENTRY_SOURCE}`, 'i')
const DOMAIN_TOKEN = /[\w-]+\.\w+/
const RELATIONSHIP_WORDS = new Set(['RESELLER', 'DIRECT'])

const BULLET_PREFIX = /^(?:[•·*\-]+\s*|\d+[.)]\s*)+/
const NUMBERING_PREFIX = /^\d+(?:[.)]\s*|\s+)/

/** Only digits, separators and whitespace. */
function isNumericOnly(text: string): boolean {
  return /^[\d\s,.]+$/.test(text)
}

/** Unify newline variants and spacing around newlines and commas. */
export function normalizeCellText(text: string): string {
  return text
    .replace(/\r\n|\r|\\n/g, '\n')
    .replace(/\s*\n\s*/g, '\n')
    .replace(/[^\S\n]*,[^\S\n]*/g, ', ')
    .trim()
}

/**
 * Decide whether a fragment from a newline or semicolon split is a candidate line.
 * Returns the reason it was kept, or null when it is dropped.
 */
export function acceptFragment(fragment: string): FragmentReason | null {
  if (ADS_TXT_ENTRY_ANCHORED.test(fragment)) return 'ads_txt'
  if (isNumericOnly(fragment)) return null
  if (DOMAIN_TOKEN.test(fragment)) return 'domain'
  const words = fragment.split(/\s+/).filter(Boolean)
  if (words.some((w) => RELATIONSHIP_WORDS.has(w.replace(/,$/, '').toUpperCase()))) return 'keyword'
  if (words.length === 0) return null
  if (words.length <= 2) return 'short_text'
  return 'multi_word'
}

/** All ads.txt-shaped entries in the text, in order, without overlap. */
export function findAdsTxtEntries(text: string): string[] {
  const re = new RegExp(ADS_TXT_ENTRY_SOURCE, 'gi')
  const out: string[] = []
  for (const m of text.matchAll(re)) {
    const entry = m[0].trim()
    if (entry) out.push(entry)
  }
  return out
}

function collectFragments(items: string[], prefix: RegExp): { lines: string[]; dropped: string[] } {
  const lines: string[] = []
  const dropped: string[] = []
  for (const item of items) {
    const fragment = item.trim().replace(prefix, '').trim()
    if (!fragment) continue
    if (acceptFragment(fragment)) lines.push(fragment)
    else dropped.push(fragment)
  }
  return { lines, dropped }
}

/** Parse a cell and report which rule decided the split. */
export function parseMissingLinesDetailed(cellText: string | null | undefined): ParsedCell {
  if (typeof cellText !== 'string') return { shape: 'empty', lines: [], dropped: [] }
  const text = normalizeCellText(cellText)
  if (!text || text.toLowerCase() === 'web') return { shape: 'empty', lines: [], dropped: [] }

  if (text.includes('\n')) {
    return { shape: 'multiline', ...collectFragments(text.split('\n'), BULLET_PREFIX) }
  }

  if (text.includes(';')) {
    return { shape: 'semicolon', ...collectFragments(text.split(';'), NUMBERING_PREFIX) }
  }

  const entries = findAdsTxtEntries(text)
  if (entries.length > 0) return { shape: 'pattern', lines: entries, dropped: [] }

  if (text.includes(',')) {
    const parts = text.split(',').map((p) => p.trim())
    const hasRelationship = parts.some((p) => RELATIONSHIP_WORDS.has(p.toUpperCase()))
    if ((parts.length === 3 || parts.length === 4) && hasRelationship) {
      return { shape: 'comma', lines: [text], dropped: [] }
    }
    const lines = parts.filter((p) => p && !isNumericOnly(p))
    return { shape: 'comma', lines, dropped: parts.filter((p) => p && isNumericOnly(p)) }
  }

  return { shape: 'single', lines: [text], dropped: [] }
}

export function parseMissingLines(cellText: string | null | undefined): CandidateLine[] {
  return parseMissingLinesDetailed(cellText).lines
}

/** Which split rule a cell falls under, for audit logs. */
export function describeCellShape(cellText: string | null | undefined): CellShape {
  return parseMissingLinesDetailed(cellText).shape
}
