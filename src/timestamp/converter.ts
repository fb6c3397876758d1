import { DateTime } from 'luxon'
import type { Logger } from '../utils/logger.js'
import { toTimestampResult } from '../utils/time.js'
import { InvalidDateError } from './errors.js'
import type { ConversionOutcome } from './models.js'

const INTEGER_PATTERN = /^[+-]?\d+$/
const CALENDAR_DATE_PATTERN = /^(\d{4})-(\d{1,2})-(\d{1,2})$/

const INT64_MIN = -(BigInt(2) ** BigInt(63))
const INT64_MAX = BigInt(2) ** BigInt(63) - BigInt(1)

/**
 * Reads `raw` as a signed 64-bit decimal integer of seconds.
 * Returns null for anything else, including values that overflow 64 bits.
 */
export function parseTimestampSeconds(raw: string): number | null {
  if (!INTEGER_PATTERN.test(raw)) return null
  const value = BigInt(raw)
  if (value < INT64_MIN || value > INT64_MAX) return null
  return Number(value)
}

/**
 * Midnight UTC of the day containing the instant, time of day dropped.
 * Null when the instant is outside what luxon can represent.
 */
export function startOfUtcDay(seconds: number): DateTime<true> | null {
  const instant = DateTime.fromSeconds(seconds, { zone: 'utc' })
  if (!instant.isValid) return null
  return instant.startOf('day')
}

/** Midnight UTC of a strict `YYYY-MM-DD` date, or null. */
export function parseCalendarDate(raw: string): DateTime<true> | null {
  const match = CALENDAR_DATE_PATTERN.exec(raw)
  if (!match) return null

  const [, year, month, day] = match
  const midnight = DateTime.fromObject(
    { year: Number(year), month: Number(month), day: Number(day), hour: 0, minute: 0, second: 0, millisecond: 0 },
    { zone: 'utc' },
  )
  return midnight.isValid ? midnight : null
}

export function convertDate(raw: string, logger: Logger): ConversionOutcome {
  logger.info(`Provided date is ${raw}`)

  let midnight: DateTime<true> | null
  const seconds = parseTimestampSeconds(raw)
  if (seconds !== null) {
    // Timestamps collapse to the start of their UTC day.
    midnight = startOfUtcDay(seconds)
    logger.debug(`Converted timestamp ${raw} to date ${midnight?.toISODate() ?? '<out of range>'}`)
  } else {
    midnight = parseCalendarDate(raw)
  }

  if (!midnight) {
    const error = new InvalidDateError(raw)
    logger.error(`Error while parsing the date: ${JSON.stringify(raw)}`)
    return { ok: false, error }
  }

  const value = toTimestampResult(midnight)
  logger.debug(`Converted date is ${value.utc}`)
  return { ok: true, value }
}
