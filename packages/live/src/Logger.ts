export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export interface Logger {
  debug(message: string, detail?: unknown): void
  info(message: string, detail?: unknown): void
  warn(message: string, detail?: unknown): void
  error(message: string, detail?: unknown): void
}

export interface LoggerOptions {
  /** Messages below this level are dropped. Defaults to 'info'. */
  level?: LogLevel
  /** Prepended to every message, e.g. "[live]". */
  prefix?: string
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
}

export function isLogLevel(value: string): value is LogLevel {
  return value in LEVEL_ORDER
}

/**
 * Console-backed logger with a level threshold.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info']
  const prefix = options.prefix ? `${options.prefix} ` : ''

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string, detail: unknown) => {
    if (LEVEL_ORDER[level] < threshold) return
    const line = prefix + message
    if (detail === undefined) {
      console[level](line)
    } else {
      console[level](line, detail)
    }
  }

  return {
    debug: (message, detail) => emit('debug', message, detail),
    info: (message, detail) => emit('info', message, detail),
    warn: (message, detail) => emit('warn', message, detail),
    error: (message, detail) => emit('error', message, detail),
  }
}

export const silentLogger: Logger = createLogger({ level: 'silent' })

export const defaultLogger: Logger = createLogger({ prefix: '[live]' })
