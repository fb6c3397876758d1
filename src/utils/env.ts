import { isLogLevel, LOG_LEVELS, LogLevel } from './logger.js'

export interface BaseEnvironment {
  host: string
  port: number
  logLevel: LogLevel
}

const OPTIONAL_ENV_KEYS = ['HOST', 'PORT', 'LOG_LEVEL'] as const

type AllowedEnvKey = (typeof OPTIONAL_ENV_KEYS)[number]

type EnvSource = Partial<Record<string, string>>

const DEFAULT_HOST = '127.0.0.1'
const DEFAULT_PORT = 3000

function readEnv(env: EnvSource, key: AllowedEnvKey): string | undefined {
  const value = env[key]
  if (!value || value.trim() === '') return undefined
  return value.trim()
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) return DEFAULT_PORT
  const port = Number(raw)
  if (!Number.isInteger(port) || port <= 0 || port > 65535) {
    throw new Error(`Invalid PORT value: ${raw}`)
  }
  return port
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined) return LogLevel.DEBUG
  const normalized = raw.toLowerCase()
  if (!isLogLevel(normalized)) {
    throw new Error(`Invalid LOG_LEVEL value: ${raw}. Expected one of ${LOG_LEVELS.join(', ')}`)
  }
  return normalized
}

export function getBaseEnvironment(env: EnvSource = process.env): BaseEnvironment {
  return {
    host: readEnv(env, 'HOST') ?? DEFAULT_HOST,
    port: parsePort(readEnv(env, 'PORT')),
    logLevel: parseLogLevel(readEnv(env, 'LOG_LEVEL')),
  }
}
