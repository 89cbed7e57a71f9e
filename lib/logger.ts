/**
 * Structured logging for the reconciliation tools. Writes to the log store (capped at 500) and console.
 */

import { appendLog, type LogEntry, type LogLevel, type LogCategory } from './logStore.js'

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 }

let minLevel: LogLevel = 'info'
let consoleEnabled = true

export function setLogLevel(level: LogLevel): void {
  minLevel = level
}

export function getLogLevel(): LogLevel {
  return minLevel
}

/** Tests and audit runs turn console output off and read the store instead. */
export function setConsoleOutput(enabled: boolean): void {
  consoleEnabled = enabled
}

function genId(): string {
  return `log_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`
}

function serializeError(err: unknown): LogEntry['error'] {
  if (err instanceof Error) {
    const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined
    return { message: err.message, stack: err.stack, code }
  }
  return { message: String(err) }
}

function write(entry: Omit<LogEntry, 'id' | 'timestamp'>): void {
  if (LEVEL_ORDER[entry.level] < LEVEL_ORDER[minLevel]) return
  const withId: LogEntry = { ...entry, id: genId(), timestamp: new Date().toISOString() }
  if (consoleEnabled) {
    const prefix = `[${withId.category}] ${withId.message}`
    if (withId.level === 'error') {
      console.error(prefix, withId.error ?? withId.context ?? '')
    } else if (withId.level === 'warn') {
      console.warn(prefix, withId.context ?? '')
    } else {
      console.log(prefix, withId.context ?? '')
    }
  }
  appendLog(withId)
}

export const logger = {
  debug(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    write({ level: 'debug', category, message, context })
  },

  info(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    write({ level: 'info', category, message, context })
  },

  warn(category: LogCategory, message: string, context?: Record<string, unknown>): void {
    write({ level: 'warn', category, message, context })
  },

  error(
    category: LogCategory,
    message: string,
    error?: unknown,
    context?: Record<string, unknown>
  ): void {
    write({
      level: 'error',
      category,
      message,
      error: error != null ? serializeError(error) : undefined,
      context,
    })
  },

  time(category: LogCategory, message: string): { done: (context?: Record<string, unknown>) => void } {
    const start = Date.now()
    return {
      done(context?: Record<string, unknown>) {
        write({ level: 'info', category, message, duration: Date.now() - start, context })
      },
    }
  },
}

export type Logger = typeof logger
