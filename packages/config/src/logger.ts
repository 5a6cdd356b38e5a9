/**
 * Structured logging.
 *
 * Emits one JSON line per entry with:
 * - ts, level, scope, msg, plus any extra fields passed by the caller
 *
 * Zero external dependencies. Writes to stdout unless a sink is supplied.
 */

import { readLogLevel, type LogLevel } from './env.js'

export type LogFields = Record<string, unknown>

export interface LogEntry extends LogFields {
  ts: string
  level: Exclude<LogLevel, 'silent'>
  scope: string
  msg: string
}

export type LogSink = (line: string) => void

export interface Logger {
  readonly scope: string
  readonly level: LogLevel
  trace(msg: string, fields?: LogFields): void
  debug(msg: string, fields?: LogFields): void
  info(msg: string, fields?: LogFields): void
  warn(msg: string, fields?: LogFields): void
  error(msg: string, fields?: LogFields): void
  /** Same sink and level, nested scope (`parent:child`). */
  child(scope: string): Logger
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
  /** Clock override, mainly for tests. */
  now?: () => Date
}

const SEVERITY: Record<LogLevel, number> = {
  trace: 10,
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
  silent: 100,
}

const stdoutSink: LogSink = (line) => {
  process.stdout.write(line + '\n')
}

export function createLogger(scope: string, options: LoggerOptions = {}): Logger {
  const level = options.level ?? readLogLevel()
  const sink = options.sink ?? stdoutSink
  const now = options.now ?? (() => new Date())
  const threshold = SEVERITY[level]

  const emit = (entryLevel: LogEntry['level'], msg: string, fields?: LogFields): void => {
    if (SEVERITY[entryLevel] < threshold) return
    const entry: LogEntry = {
      ...fields,
      ts: now().toISOString(),
      level: entryLevel,
      scope,
      msg,
    }
    sink(JSON.stringify(entry))
  }

  return {
    scope,
    level,
    trace: (msg, fields) => emit('trace', msg, fields),
    debug: (msg, fields) => emit('debug', msg, fields),
    info: (msg, fields) => emit('info', msg, fields),
    warn: (msg, fields) => emit('warn', msg, fields),
    error: (msg, fields) => emit('error', msg, fields),
    child: (childScope) => createLogger(`${scope}:${childScope}`, { level, sink, now }),
  }
}

/** A logger that drops everything. */
export const silentLogger: Logger = createLogger('silent', { level: 'silent', sink: () => {} })
