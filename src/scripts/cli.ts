/**
 * Shared argument handling for the command-line scripts.
 */

import { logger, setLogLevel } from '../../lib/logger.js'
import { getLogLevelFromEnv } from '../config/env.js'

export interface CliArgs {
  positionals: string[]
  options: Map<string, string | true>
}

/** `--name value`, `--name=value` and bare `--flag`; everything else is positional. */
export function parseCliArgs(argv: readonly string[], valueOptions: readonly string[] = []): CliArgs {
  const positionals: string[] = []
  const options = new Map<string, string | true>()
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (!arg.startsWith('--')) {
      positionals.push(arg)
      continue
    }
    const eq = arg.indexOf('=')
    if (eq > 0) {
      options.set(arg.slice(2, eq), arg.slice(eq + 1))
      continue
    }
    const name = arg.slice(2)
    const next = argv[i + 1]
    if (valueOptions.includes(name) && next !== undefined && !next.startsWith('--')) {
      options.set(name, next)
      i++
    } else {
      options.set(name, true)
    }
  }
  return { positionals, options }
}

export function stringOption(args: CliArgs, name: string): string | undefined {
  const v = args.options.get(name)
  return typeof v === 'string' ? v : undefined
}

export function usage(lines: readonly string[]): never {
  console.error(lines.join('\n'))
  process.exit(1)
}

/** Apply SUPPLY_CHAIN_LOG_LEVEL before a script starts logging. */
export function initScriptLogging(): void {
  setLogLevel(getLogLevelFromEnv())
}

export function runScript(name: string, main: () => Promise<void>): void {
  main().catch((e: unknown) => {
    logger.error('script', `${name} failed`, e)
    process.exit(1)
  })
}
