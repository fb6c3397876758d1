import { DateTime } from 'luxon'
import type { TimestampResult } from '../timestamp/models.js'

export type Clock = () => Date

export const systemClock: Clock = () => new Date()

export function toTimestampResult(instant: DateTime<true>): TimestampResult {
  return {
    unix: instant.toUnixInteger(),
    utc: instant.toUTC().toRFC2822(),
  }
}

export function currentTimestamp(clock: Clock = systemClock): TimestampResult {
  const now = DateTime.fromJSDate(clock(), { zone: 'utc' })
  if (!now.isValid) {
    throw new Error(`Clock returned an invalid date: ${now.invalidReason}`)
  }
  return toTimestampResult(now)
}
