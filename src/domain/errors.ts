/**
 * Structural and validation errors. Row-level problems are handled in place and never thrown out of a run.
 */

/** A required column is absent from an input table; fatal for the whole run. */
export class MissingColumnError extends Error {
  readonly code = 'MISSING_COLUMN'

  constructor(
    readonly table: string,
    readonly column: string,
    readonly acceptedHeaders: readonly string[],
    readonly foundHeaders: readonly string[]
  ) {
    super(
      `${table}: missing required column "${column}" (accepted: ${acceptedHeaders.join(', ')}; found: ${
        foundHeaders.join(', ') || 'none'
      })`
    )
    this.name = 'MissingColumnError'
  }
}

/** Input file could not be read as a table. */
export class InputFileError extends Error {
  readonly code = 'INPUT_FILE'

  constructor(readonly path: string, message: string, options?: { cause?: unknown }) {
    super(`${path}: ${message}`, options)
    this.name = 'InputFileError'
  }
}

/** A highlight rule or rule set failed validation. */
export class InvalidRuleError extends Error {
  readonly code = 'INVALID_RULE'

  constructor(message: string, readonly issues: readonly string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message)
    this.name = 'InvalidRuleError'
  }
}
