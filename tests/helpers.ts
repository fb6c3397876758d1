import { vi } from 'vitest'
import { createLogger, LogLevel, type LogSink } from '../src/utils/logger.js'

export function makeSink() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies LogSink
}

export function makeLogger(level: LogLevel = LogLevel.DEBUG) {
  const sink = makeSink()
  return { sink, logger: createLogger(level, sink) }
}
