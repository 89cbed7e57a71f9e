/**
 * Priority highlight rules for the domains report.
 *
 * A rule set maps each priority (High, Medium, Low) to a list of rules; a row gets the first
 * priority whose rules all hold. Rules are validated once, when they are built, so evaluation
 * never has to guess at a malformed operator or range.
 */

import { z } from 'zod'
import { InvalidRuleError } from '../errors.js'

export const PRIORITIES = ['High', 'Medium', 'Low'] as const

export type Priority = (typeof PRIORITIES)[number]

export type MetricValue = string | number | null

export type MetricRow = Record<string, MetricValue>

/** Symbols used by older rule files. */
const LEGACY_OPERATORS: Record<string, string> = { '>': 'GreaterThan', '<': 'LessThan', '=': 'Equals' }

function toNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value !== 'string') return null
  const text = value.trim().replace(/%/g, '')
  if (!text) return null
  const n = Number(text)
  return Number.isFinite(n) ? n : null
}

const numericValue = z
  .union([z.number(), z.string()])
  .refine((v) => toNumber(v) !== null, { message: 'value must be numeric' })
  .transform((v) => toNumber(v) ?? 0)

const rangeSchema = z
  .object({ min: numericValue, max: numericValue })
  .refine((r) => r.min <= r.max, { message: 'range min must not exceed max' })

const metric = z.string().trim().min(1)

const HighlightRuleSchema = z.discriminatedUnion('operator', [
  z.object({ metric, operator: z.literal('GreaterThan'), value: numericValue }),
  z.object({ metric, operator: z.literal('LessThan'), value: numericValue }),
  z.object({ metric, operator: z.literal('Equals'), value: z.union([z.number(), z.string().min(1)]) }),
  z.object({ metric, operator: z.literal('Between'), range: rangeSchema }),
])

export type HighlightRule = z.infer<typeof HighlightRuleSchema>

export type HighlightRuleSet = Partial<Record<Priority, HighlightRule[]>>

/** Rewrite `{ operator: '>' }` and `{ operator: 'Between', value: 'min;max' }` into the tagged form. */
function upgradeLegacyRule(input: unknown): unknown {
  if (typeof input !== 'object' || input === null || !('operator' in input)) return input
  const operator = typeof input.operator === 'string' ? (LEGACY_OPERATORS[input.operator] ?? input.operator) : input.operator
  if (operator === 'Between' && !('range' in input) && 'value' in input && typeof input.value === 'string') {
    const parts = input.value.split(';')
    const range = parts.length === 2 ? { min: parts[0], max: parts[1] } : undefined
    return { ...input, operator, range }
  }
  return { ...input, operator }
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
}

export function createHighlightRule(input: unknown): HighlightRule {
  const parsed = HighlightRuleSchema.safeParse(upgradeLegacyRule(input))
  if (!parsed.success) throw new InvalidRuleError('Invalid highlight rule', issuesOf(parsed.error))
  return parsed.data
}

/** Parse a `{ High: [...], Medium: [...], Low: [...] }` object. Unknown priorities are rejected. */
export function parseRuleSet(input: unknown): HighlightRuleSet {
  const shape = z.object({
    High: z.array(z.unknown()).optional(),
    Medium: z.array(z.unknown()).optional(),
    Low: z.array(z.unknown()).optional(),
  })
  const parsed = shape.strict().safeParse(input)
  if (!parsed.success) throw new InvalidRuleError('Invalid rule set', issuesOf(parsed.error))
  const ruleSet: HighlightRuleSet = {}
  for (const priority of PRIORITIES) {
    const rules = parsed.data[priority]
    if (!rules) continue
    ruleSet[priority] = rules.map((rule, i) => {
      try {
        return createHighlightRule(rule)
      } catch (err) {
        if (err instanceof InvalidRuleError) {
          throw new InvalidRuleError(`Invalid ${priority} rule #${i + 1}`, err.issues)
        }
        throw err
      }
    })
  }
  return ruleSet
}

export function describeRule(rule: HighlightRule): string {
  if (rule.operator === 'Between') return `${rule.metric} between ${rule.range.min} and ${rule.range.max}`
  const symbol = rule.operator === 'GreaterThan' ? '>' : rule.operator === 'LessThan' ? '<' : '='
  return `${rule.metric} ${symbol} ${rule.value}`
}

/**
 * Whether a cell satisfies a rule. Blank cells never match; a trailing `%` is ignored.
 * Equals compares text case-insensitively when the cell is not numeric.
 */
export function evaluateRule(rule: HighlightRule, cell: MetricValue | undefined): boolean {
  if (cell === null || cell === undefined) return false
  if (typeof cell === 'string' && !cell.trim()) return false
  const n = toNumber(cell)

  switch (rule.operator) {
    case 'GreaterThan':
      return n !== null && n > rule.value
    case 'LessThan':
      return n !== null && n < rule.value
    case 'Between':
      return n !== null && n >= rule.range.min && n <= rule.range.max
    case 'Equals': {
      if (n === null) return String(cell).trim().toLowerCase() === String(rule.value).trim().toLowerCase()
      const expected = toNumber(rule.value)
      return expected !== null && n === expected
    }
  }
}

/**
 * Column a metric reads from: the exact column, else the first column containing the metric
 * name. `% Diff` columns are only picked when the metric itself names one.
 */
export function resolveMetricColumn(columns: readonly string[], metricName: string): string | null {
  if (columns.includes(metricName)) return metricName
  const wantsDiff = metricName.endsWith(' % Diff')
  for (const column of columns) {
    if (!column.includes(metricName)) continue
    if (column.includes('% Diff') && !wantsDiff) continue
    return column
  }
  return null
}

export function resolveMetricValue(row: MetricRow, metricName: string): MetricValue {
  const column = resolveMetricColumn(Object.keys(row), metricName)
  return column === null ? null : (row[column] ?? null)
}

/** First priority, High to Low, whose non-empty rule list fully matches the row. */
export function assignPriority(row: MetricRow, ruleSet: HighlightRuleSet): Priority | null {
  for (const priority of PRIORITIES) {
    const rules = ruleSet[priority]
    if (!rules || rules.length === 0) continue
    if (rules.every((rule) => evaluateRule(rule, resolveMetricValue(row, rule.metric)))) return priority
  }
  return null
}
