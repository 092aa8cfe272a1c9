/**
 * Logger
 *
 * Leveled console logger shared by the supervisor, the server runtime and the
 * rebuild trigger.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error']

export interface Logger {
  debug(message: string, ...meta: unknown[]): void
  info(message: string, ...meta: unknown[]): void
  warn(message: string, ...meta: unknown[]): void
  error(message: string, ...meta: unknown[]): void
}

export interface LogSink {
  log(...args: unknown[]): void
  warn(...args: unknown[]): void
  error(...args: unknown[]): void
}

export interface LoggerOptions {
  level?: LogLevel
  sink?: LogSink
}

const MARKERS: Record<LogLevel, string> = {
  debug: '🔍',
  info: 'ℹ️ ',
  warn: '⚠️ ',
  error: '❌',
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LOG_LEVELS.indexOf(options.level ?? 'info')
  const sink = options.sink ?? console

  const write = (level: LogLevel, message: string, meta: unknown[]) => {
    if (LOG_LEVELS.indexOf(level) < threshold) return

    const line = `${MARKERS[level]} ${message}`
    if (level === 'error') {
      sink.error(line, ...meta)
    } else if (level === 'warn') {
      sink.warn(line, ...meta)
    } else {
      sink.log(line, ...meta)
    }
  }

  return {
    debug: (message, ...meta) => write('debug', message, meta),
    info: (message, ...meta) => write('info', message, meta),
    warn: (message, ...meta) => write('warn', message, meta),
    error: (message, ...meta) => write('error', message, meta),
  }
}
