import type { InvalidDateError } from './errors.js'

export const INVALID_DATE_MESSAGE = 'Invalid Date'

/** Seconds since the epoch plus the RFC 2822 rendering of the same instant in UTC. */
export type TimestampResult = {
  unix: number
  utc: string
}

export type InvalidDateBody = {
  error: typeof INVALID_DATE_MESSAGE
}

export type ConversionOutcome = { ok: true; value: TimestampResult } | { ok: false; error: InvalidDateError }
