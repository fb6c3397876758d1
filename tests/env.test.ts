import { describe, expect, it } from 'vitest'
import { getBaseEnvironment } from '../src/utils/env.js'
import { LogLevel } from '../src/utils/logger.js'

describe('getBaseEnvironment', () => {
  it('falls back to defaults', () => {
    expect(getBaseEnvironment({})).toEqual({ host: '127.0.0.1', port: 3000, logLevel: LogLevel.DEBUG })
  })

  it('treats blank values as unset', () => {
    expect(getBaseEnvironment({ HOST: '  ', PORT: '' })).toEqual({
      host: '127.0.0.1',
      port: 3000,
      logLevel: LogLevel.DEBUG,
    })
  })

  it('reads overrides', () => {
    expect(getBaseEnvironment({ HOST: '0.0.0.0', PORT: '8080', LOG_LEVEL: 'WARN' })).toEqual({
      host: '0.0.0.0',
      port: 8080,
      logLevel: LogLevel.WARN,
    })
  })

  it.each(['0', '65536', '80.5', 'http'])('rejects PORT=%s', port => {
    expect(() => getBaseEnvironment({ PORT: port })).toThrow(`Invalid PORT value: ${port}`)
  })

  it('rejects unknown log levels', () => {
    expect(() => getBaseEnvironment({ LOG_LEVEL: 'trace' })).toThrow(
      'Invalid LOG_LEVEL value: trace. Expected one of debug, info, warn, error',
    )
  })
})
