/**
 * Column resolution for the validation report and the reference lines table.
 * Header names vary between exports; each field accepts a list of names.
 */

import { cellText, resolveColumn, type Table } from '../table.js'
import { MissingColumnError } from '../errors.js'
import type { RawReportRow, ReferenceEntry } from './schema.js'

export const REPORT_COLUMNS = {
  domain: ['Domain'],
  name: ['Publisher Name', 'Name', 'Publisher', 'Site Name'],
  status: ['Status'],
  platform: ['Platform'],
  statusCode: ['Status Code', 'Ads.txt status'],
  missingLines: [
    'Missing Lines Text',
    'Missing Lines',
    'Missing',
    'File 1 Column C',
    'Rows with Missing Participants',
    'Missing ads.txt lines',
  ],
  bidder: ['Bidder', 'Bidder Name', 'Partner', 'Partner Name'],
} as const

export const REFERENCE_COLUMNS = {
  line: ['Line', 'AdsLine', 'Ads.txt Line', 'Line Content'],
  category: ['Category', 'Line category', 'Type', 'Line Type', 'LineType'],
  status: ['Status'],
} as const

export interface ReportColumns {
  domain: string
  name: string | null
  status: string | null
  platform: string | null
  statusCode: string | null
  missingLines: string
  bidder: string | null
}

export interface ReportRows {
  columns: ReportColumns
  rows: RawReportRow[]
}

/** Resolve report headers; throws MissingColumnError for domain or missing-lines. */
export function resolveReportColumns(headers: readonly string[]): ReportColumns {
  const domain = resolveColumn(headers, REPORT_COLUMNS.domain)
  if (!domain) throw new MissingColumnError('report', 'Domain', REPORT_COLUMNS.domain, headers)
  const missingLines =
    resolveColumn(headers, REPORT_COLUMNS.missingLines) ??
    headers.find((h) => /missing|line/i.test(h) && h !== domain) ??
    null
  if (!missingLines) {
    throw new MissingColumnError('report', 'Missing Lines', REPORT_COLUMNS.missingLines, headers)
  }
  return {
    domain,
    name: resolveColumn(headers, REPORT_COLUMNS.name),
    status: resolveColumn(headers, REPORT_COLUMNS.status),
    platform: resolveColumn(headers, REPORT_COLUMNS.platform),
    statusCode: resolveColumn(headers, REPORT_COLUMNS.statusCode),
    missingLines,
    bidder: resolveColumn(headers, REPORT_COLUMNS.bidder),
  }
}

export function reportRowsFromTable(table: Table): ReportRows {
  const columns = resolveReportColumns(table.headers)
  const rows = table.rows.map((row, rowIndex): RawReportRow => {
    const missing = row[columns.missingLines]
    return {
      rowIndex,
      domain: cellText(row, columns.domain),
      name: cellText(row, columns.name),
      status: cellText(row, columns.status),
      platform: cellText(row, columns.platform),
      statusCode: cellText(row, columns.statusCode),
      missingLinesText: missing == null || missing === '' ? null : String(missing),
      bidder: columns.bidder ? cellText(row, columns.bidder) || null : null,
    }
  })
  return { columns, rows }
}

/** Reference rows with blank line or category are kept here and skipped by the index. */
export function referenceEntriesFromTable(table: Table): ReferenceEntry[] {
  const line = resolveColumn(table.headers, REFERENCE_COLUMNS.line)
  if (!line) throw new MissingColumnError('reference', 'Line', REFERENCE_COLUMNS.line, table.headers)
  const category = resolveColumn(table.headers, REFERENCE_COLUMNS.category)
  if (!category) {
    throw new MissingColumnError('reference', 'Line category', REFERENCE_COLUMNS.category, table.headers)
  }
  const status = resolveColumn(table.headers, REFERENCE_COLUMNS.status)
  return table.rows.map((row) => ({
    rawLine: cellText(row, line),
    category: cellText(row, category),
    status: cellText(row, status),
  }))
}
