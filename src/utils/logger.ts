export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
}

let threshold: LogLevel = 'info'

/**
 * Set the minimum level printed by every logger
 */
export function setLogLevel(level: LogLevel): void {
  threshold = level
}

export interface Logger {
  debug(message: string, meta?: unknown): void
  info(message: string, meta?: unknown): void
  warn(message: string, meta?: unknown): void
  error(message: string, meta?: unknown): void
}

/**
 * Console logger prefixed with timestamp, scope and level:
 * `[2024-01-01T00:00:00.000Z] [google] [INFO] message`
 */
export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: unknown) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return

    const line = `[${new Date().toISOString()}] [${scope}] [${level.toUpperCase()}] ${message}`
    const sink = level === 'error' ? console.error : level === 'warn' ? console.warn : console.log
    sink(line, meta ?? '')
  }

  return {
    debug: (message, meta) => write('debug', message, meta),
    info: (message, meta) => write('info', message, meta),
    warn: (message, meta) => write('warn', message, meta),
    error: (message, meta) => write('error', message, meta),
  }
}
