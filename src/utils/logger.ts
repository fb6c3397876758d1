export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error',
}

export const LOG_LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR]

export interface Logger {
  debug(message: string, ...args: unknown[]): void
  info(message: string, ...args: unknown[]): void
  warn(message: string, ...args: unknown[]): void
  error(message: string, ...args: unknown[]): void
}

export type LogSink = Pick<Console, 'debug' | 'info' | 'warn' | 'error'>

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value)
}

export function createLogger(currentLevel: LogLevel, sink: LogSink = console): Logger {
  function shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLevel)
  }

  return {
    debug(message, ...args) {
      if (shouldLog(LogLevel.DEBUG)) sink.debug(`[DEBUG] ${message}`, ...args)
    },
    info(message, ...args) {
      if (shouldLog(LogLevel.INFO)) sink.info(`[INFO] ${message}`, ...args)
    },
    warn(message, ...args) {
      if (shouldLog(LogLevel.WARN)) sink.warn(`[WARN] ${message}`, ...args)
    },
    error(message, ...args) {
      if (shouldLog(LogLevel.ERROR)) sink.error(`[ERROR] ${message}`, ...args)
    },
  }
}
