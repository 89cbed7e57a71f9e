/**
 * In-memory log store for reconciliation runs.
 * Capped list, newest last; callers read it back for audit output.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export type LogCategory =
  | 'reconcile'
  | 'parse'
  | 'classify'
  | 'reference'
  | 'report'
  | 'highlight'
  | 'errors'
  | 'script'

export interface LogEntry {
  id: string
  timestamp: string
  level: LogLevel
  category: LogCategory
  message: string
  context?: Record<string, unknown>
  error?: { message: string; stack?: string; code?: string }
  /** Milliseconds, set by logger.time(). */
  duration?: number
}

export const LOG_CAP = 500

const entries: LogEntry[] = []

export function appendLog(entry: LogEntry): void {
  entries.push(entry)
  if (entries.length > LOG_CAP) entries.splice(0, entries.length - LOG_CAP)
}

/** Most recent entries, oldest first. Optionally filtered by category. */
export function getRecentLogs(limit = 50, category?: LogCategory): LogEntry[] {
  const list = category ? entries.filter((e) => e.category === category) : entries
  return list.slice(-limit)
}

export function clearLogs(): void {
  entries.length = 0
}
