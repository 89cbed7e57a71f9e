/**
 * Read and write report tables. Workbooks go through xlsx (first sheet, formatted text),
 * CSV through csv-parse. Every cell comes back as trimmed text or null.
 */

import { readFile, writeFile } from 'node:fs/promises'
import { extname } from 'node:path'
import { parse } from 'csv-parse'
import * as XLSX from 'xlsx'
import { logger } from '../../../lib/logger.js'
import { InputFileError } from '../../domain/errors.js'
import type { CellValue, Table, TableRow } from '../../domain/table.js'

export type OutputCell = string | number | null

export interface SheetSpec {
  name: string
  /** Column order; defaults to the keys of the first row. */
  columns?: readonly string[]
  rows: readonly Record<string, OutputCell>[]
}

const WORKBOOK_EXTENSIONS = new Set(['.xlsx', '.xlsm', '.xls'])

function cell(v: unknown): CellValue {
  if (v == null) return null
  const text = String(v).trim()
  return text ? text : null
}

/** Blank headers become "Column N"; repeats get ".1", ".2". */
function uniqueHeaders(raw: readonly unknown[]): string[] {
  const seen = new Map<string, number>()
  return raw.map((h, i) => {
    const base = cell(h) ?? `Column ${i + 1}`
    const n = seen.get(base) ?? 0
    seen.set(base, n + 1)
    return n === 0 ? base : `${base}.${n}`
  })
}

/** First row is the header; blank rows are dropped. */
export function tableFromMatrix(matrix: readonly (readonly unknown[])[]): Table {
  if (matrix.length === 0) return { headers: [], rows: [] }
  const headers = uniqueHeaders(matrix[0])
  const rows: TableRow[] = []
  for (const values of matrix.slice(1)) {
    const row: TableRow = {}
    let blank = true
    headers.forEach((h, i) => {
      const v = cell(values[i])
      if (v !== null) blank = false
      row[h] = v
    })
    if (!blank) rows.push(row)
  }
  return { headers, rows }
}

export function parseWorkbook(buf: Buffer): Table {
  const workbook = XLSX.read(buf, { type: 'buffer' })
  const first = workbook.SheetNames[0]
  const sheet = first === undefined ? undefined : workbook.Sheets[first]
  if (!sheet) return { headers: [], rows: [] }
  const matrix = XLSX.utils.sheet_to_json<unknown[]>(sheet, { header: 1, defval: null, raw: false })
  return tableFromMatrix(matrix)
}

async function readCsv(path: string): Promise<Table> {
  const parser = parse(await readFile(path), {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    bom: true,
  })
  const matrix: unknown[][] = []
  for await (const record of parser) {
    const values: unknown = record
    if (Array.isArray(values)) matrix.push(values)
  }
  return tableFromMatrix(matrix)
}

/** Load a .csv, .xlsx, .xlsm or .xls file. */
export async function readTable(path: string): Promise<Table> {
  const ext = extname(path).toLowerCase()
  let table: Table
  try {
    if (ext === '.csv') {
      table = await readCsv(path)
    } else if (WORKBOOK_EXTENSIONS.has(ext)) {
      table = parseWorkbook(await readFile(path))
    } else {
      throw new InputFileError(path, `unsupported file type "${ext || 'none'}" (expected .csv, .xlsx or .xls)`)
    }
  } catch (err) {
    if (err instanceof InputFileError) throw err
    throw new InputFileError(path, err instanceof Error ? err.message : String(err), { cause: err })
  }
  logger.debug('report', `Read ${path}`, { columns: table.headers.length, rows: table.rows.length })
  return table
}

function toSheet(spec: SheetSpec): XLSX.WorkSheet {
  const header = spec.columns ? [...spec.columns] : Object.keys(spec.rows[0] ?? {})
  const sheet = XLSX.utils.json_to_sheet([...spec.rows], { header })
  // keep the header row for empty tables
  if (spec.rows.length === 0) XLSX.utils.sheet_add_aoa(sheet, [header])
  return sheet
}

/** Sheet names are capped at 31 characters by the file format. */
export function sheetName(name: string): string {
  return name.replace(/[\\/?*[\]:]/g, ' ').slice(0, 31) || 'Sheet1'
}

export async function writeWorkbook(path: string, sheets: readonly SheetSpec[]): Promise<void> {
  const workbook = XLSX.utils.book_new()
  for (const spec of sheets) XLSX.utils.book_append_sheet(workbook, toSheet(spec), sheetName(spec.name))
  const buf: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' })
  if (!Buffer.isBuffer(buf)) throw new Error('xlsx did not return a buffer')
  await writeFile(path, buf)
  logger.info('report', `Wrote ${path}`, { sheets: sheets.map((s) => `${s.name} (${s.rows.length})`) })
}

export async function writeCsv(path: string, spec: SheetSpec): Promise<void> {
  await writeFile(path, XLSX.utils.sheet_to_csv(toSheet(spec)))
  logger.info('report', `Wrote ${path}`, { rows: spec.rows.length })
}

/** .csv paths get CSV (first sheet only); anything else a workbook. */
export async function writeTables(path: string, sheets: readonly SheetSpec[]): Promise<void> {
  if (extname(path).toLowerCase() === '.csv') {
    if (sheets.length > 1) logger.warn('report', 'CSV output keeps only the first sheet', { path })
    const [first] = sheets
    if (first) await writeCsv(path, first)
    return
  }
  await writeWorkbook(path, sheets)
}
