// src/main/utils/logger.ts
export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export interface Logger {
  debug: (...args: unknown[]) => void
  info: (...args: unknown[]) => void
  warn: (...args: unknown[]) => void
  error: (...args: unknown[]) => void
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(LEVEL_ORDER, value)
}

const envLevel = process.env.CLIPKEEP_LOG_LEVEL
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info'

/**
 * Set the process-wide minimum level for every scoped logger
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export function getLogLevel(): LogLevel {
  return threshold
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold]
}

export function createLogger(scope = 'App'): Logger {
  const prefix = `[${scope}]`
  return {
    debug: (...args) => {
      if (enabled('debug')) console.debug(prefix, ...args)
    },
    info: (...args) => {
      if (enabled('info')) console.info(prefix, ...args)
    },
    warn: (...args) => {
      if (enabled('warn')) console.warn(prefix, ...args)
    },
    error: (...args) => {
      if (enabled('error')) console.error(prefix, ...args)
    },
  }
}
