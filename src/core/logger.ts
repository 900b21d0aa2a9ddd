import pino from 'pino'

export type LogLevel = 'silent' | 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'debug', 'info', 'warn', 'error']

export function isLogLevel(v: unknown): v is LogLevel {
  return LOG_LEVELS.some(l => l === v)
}

/**
 * Diagnostics only: written synchronously to stderr, silent by default. What the
 * user is meant to read goes through `Output` instead.
 */
export function createLogger(level: LogLevel = 'silent'): pino.Logger {
  return pino(
    {
      level,
      formatters: {
        level(label: string) {
          return { level: label }
        },
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  )
}
