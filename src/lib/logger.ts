// Console-backed logger with a level threshold and a scope prefix
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

export interface Logger {
  debug: (message: string, ...args: unknown[]) => void
  info: (message: string, ...args: unknown[]) => void
  warn: (message: string, ...args: unknown[]) => void
  error: (message: string, ...args: unknown[]) => void
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((l) => l === value)
}

export function createLogger(scope: string, level: LogLevel = 'warn'): Logger {
  const threshold = LOG_LEVELS.indexOf(level)
  const enabled = (l: LogLevel) => LOG_LEVELS.indexOf(l) >= threshold
  const prefix = `[${scope}]`

  return {
    debug(message, ...args) {
      if (enabled('debug')) console.debug(prefix, message, ...args)
    },
    info(message, ...args) {
      if (enabled('info')) console.log(prefix, message, ...args)
    },
    warn(message, ...args) {
      if (enabled('warn')) console.warn(prefix, message, ...args)
    },
    error(message, ...args) {
      if (enabled('error')) console.error(prefix, message, ...args)
    },
  }
}
