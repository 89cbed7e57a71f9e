/**
 * Environment contract for the reconciliation tools.
 * SUPPLY_CHAIN_* tune logging and matching; all optional.
 */

import { z } from 'zod'

const envSchema = z.object({
  SUPPLY_CHAIN_LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  /** Minimum prefix-similarity score for the bidder fuzzy stage (strictly greater than). */
  SUPPLY_CHAIN_FUZZY_THRESHOLD: z.coerce
    .number()
    .gt(0, 'expected a decimal strictly between 0 and 1')
    .lt(1, 'expected a decimal strictly between 0 and 1')
    .optional(),
  /** Path to a JSON file overriding the operator business rules. */
  SUPPLY_CHAIN_OPERATOR_RULES: z.string().min(1).optional(),
  /** Print every match decision (true/1). */
  SUPPLY_CHAIN_AUDIT: z.enum(['true', 'false', '1', '0', '']).optional(),
})

export type Env = z.infer<typeof envSchema>

let cached: Env | null = null

export function getEnv(): Env {
  if (cached) return cached
  const parsed = envSchema.safeParse(process.env)
  if (!parsed.success) {
    console.warn('[config] Env validation warnings:', parsed.error.flatten().fieldErrors)
  }
  cached = parsed.success ? parsed.data : {}
  return cached
}

export function resetEnvCache(): void {
  cached = null
}

export function getLogLevelFromEnv(): NonNullable<Env['SUPPLY_CHAIN_LOG_LEVEL']> {
  return getEnv().SUPPLY_CHAIN_LOG_LEVEL ?? 'info'
}

export function getFuzzyThresholdFromEnv(): number | undefined {
  return getEnv().SUPPLY_CHAIN_FUZZY_THRESHOLD
}

export function isAuditEnabled(): boolean {
  const v = getEnv().SUPPLY_CHAIN_AUDIT
  return v === 'true' || v === '1'
}
