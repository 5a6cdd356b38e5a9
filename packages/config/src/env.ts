/**
 * Environment reading. The core takes its configuration as in-memory
 * objects; the environment only tunes ambient behaviour such as log level.
 */

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

function readEnv(key: string): string | undefined {
  if (typeof process !== 'undefined' && process.env) {
    return process.env[key]
  }
  return undefined
}

export function optional(key: string, fallback: string): string {
  return readEnv(key) ?? fallback
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Log level from SCANLINE_LOG_LEVEL, falling back to `info` for unknown values. */
export function readLogLevel(key = 'SCANLINE_LOG_LEVEL'): LogLevel {
  const val = optional(key, 'info').trim().toLowerCase()
  return isLogLevel(val) ? val : 'info'
}
