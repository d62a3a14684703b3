import parse from 'parse-duration'
import { TimestampParseError } from './errors'

const HOUR_MS = 3600 * 1000

// RFC 3339 date-time, e.g. 2024-05-01T10:30:00Z or 2024-05-01T10:30:00.123+02:00
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})T(\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|([+-])(\d{2}):(\d{2}))$/

/**
 * Parse a timestamp that carries an explicit timezone offset
 * @throws TimestampParseError if the value is not an ISO-8601 date-time with offset
 */
export function parseTimestamp(value: string): Date {
  const match = TIMESTAMP_PATTERN.exec(value)
  if (!match) {
    throw new TimestampParseError(value)
  }

  const [, year, month, day, hour, minute, second] = match
  if (Number(hour) > 23 || Number(minute) > 59 || Number(second) > 59) {
    throw new TimestampParseError(value)
  }

  const date = new Date(value)
  if (Number.isNaN(date.getTime())) {
    throw new TimestampParseError(value)
  }

  // Date rolls impossible days over (Feb 30 -> Mar 1); compare the calendar
  // fields in the timestamp's own offset
  const offsetMinutes =
    match[8] === 'Z'
      ? 0
      : (match[9] === '-' ? -1 : 1) *
        (Number(match[10]) * 60 + Number(match[11]))
  const local = new Date(date.getTime() + offsetMinutes * 60 * 1000)
  if (
    local.getUTCFullYear() !== Number(year) ||
    local.getUTCMonth() + 1 !== Number(month) ||
    local.getUTCDate() !== Number(day)
  ) {
    throw new TimestampParseError(value)
  }

  return date
}

/**
 * Milliseconds elapsed between `timestamp` and `now`
 */
export function calculateAgeMs(timestamp: Date, now: Date): number {
  return now.getTime() - timestamp.getTime()
}

/**
 * Format age in seconds to human-readable string
 * @param ageSeconds - Age in seconds
 * @returns Formatted age string like '2d 3h' or '5h 30m'
 */
export function formatAge(ageSeconds: number): string {
  const days = Math.floor(ageSeconds / 86400)
  const hours = Math.floor((ageSeconds % 86400) / 3600)
  const minutes = Math.floor((ageSeconds % 3600) / 60)

  if (days > 0) {
    return `${days}d ${hours}h`
  }
  if (hours > 0) {
    return `${hours}h ${minutes}m`
  }
  return `${minutes}m`
}

/**
 * Parse duration string to milliseconds
 * @param duration - Duration string (e.g., '3m', '180s', '1h30m', '7h3m45s')
 * @returns Duration in milliseconds
 * @throws Error if duration format is invalid or negative
 */
export function parseDuration(duration: string): number {
  const result = parse(duration)

  if (result === null || result === undefined) {
    throw new Error(
      `Invalid duration format: ${duration}. Expected format: duration string (e.g., 3m, 180s, 1h30m, 7h3m45s)`
    )
  }

  if (result < 0) {
    throw new Error(
      `Invalid duration: ${duration}. Duration cannot be negative`
    )
  }

  return result
}

/**
 * Parse a max-age setting to milliseconds. A plain number ('72', '1.5') is a
 * number of hours; anything else goes through {@link parseDuration} ('3d', '36h').
 */
export function parseMaxAge(maxAge: string): number {
  const trimmed = maxAge.trim()

  if (/^\d+(\.\d+)?$/.test(trimmed)) {
    return parseFloat(trimmed) * HOUR_MS
  }

  return parseDuration(trimmed)
}

export function hoursToMs(hours: number): number {
  return hours * HOUR_MS
}
