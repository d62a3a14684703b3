import { describe, it, expect } from 'vitest'
import {
  parseTimestamp,
  calculateAgeMs,
  formatAge,
  parseDuration,
  parseMaxAge,
  hoursToMs
} from '../src/time-utils.js'
import { TimestampParseError } from '../src/errors.js'

describe('parseTimestamp', () => {
  it('should parse UTC timestamps', () => {
    expect(parseTimestamp('2024-05-01T10:30:00Z').getTime()).toBe(
      Date.UTC(2024, 4, 1, 10, 30)
    )
  })

  it('should apply numeric offsets', () => {
    expect(parseTimestamp('2024-05-01T12:30:00+02:00').getTime()).toBe(
      Date.UTC(2024, 4, 1, 10, 30)
    )
    expect(parseTimestamp('2024-05-01T05:30:00-05:00').getTime()).toBe(
      Date.UTC(2024, 4, 1, 10, 30)
    )
  })

  it('should accept fractional seconds', () => {
    expect(parseTimestamp('2024-05-01T10:30:00.250Z').getTime()).toBe(
      Date.UTC(2024, 4, 1, 10, 30, 0, 250)
    )
  })

  it('should reject timestamps without an offset', () => {
    expect(() => parseTimestamp('2024-05-01T10:30:00')).toThrow(
      TimestampParseError
    )
  })

  it('should reject the default helm time format', () => {
    expect(() => parseTimestamp('2024-05-01 10:30:00.123 +0000 UTC')).toThrow(
      "Invalid timestamp '2024-05-01 10:30:00.123 +0000 UTC'. Expected an ISO-8601 date-time with a timezone offset"
    )
  })

  it('should reject impossible dates', () => {
    expect(() => parseTimestamp('2024-13-45T10:30:00Z')).toThrow(
      TimestampParseError
    )
  })

  it('should reject days that do not exist in the month', () => {
    expect(() => parseTimestamp('2024-02-30T10:00:00Z')).toThrow(
      TimestampParseError
    )
    expect(() => parseTimestamp('2023-02-29T10:00:00+02:00')).toThrow(
      TimestampParseError
    )
    expect(() => parseTimestamp('2024-04-31T23:30:00-05:00')).toThrow(
      TimestampParseError
    )
  })

  it('should accept leap days and offsets that cross midnight', () => {
    expect(parseTimestamp('2024-02-29T10:00:00Z').getTime()).toBe(
      Date.UTC(2024, 1, 29, 10)
    )
    expect(parseTimestamp('2024-03-01T01:00:00+02:00').getTime()).toBe(
      Date.UTC(2024, 1, 29, 23)
    )
  })

  it('should reject out-of-range times', () => {
    expect(() => parseTimestamp('2024-05-01T24:30:00Z')).toThrow(
      TimestampParseError
    )
  })
})

describe('calculateAgeMs', () => {
  it('should return the elapsed milliseconds', () => {
    const now = new Date('2024-05-04T10:30:00Z')
    expect(calculateAgeMs(new Date('2024-05-01T10:30:00Z'), now)).toBe(
      72 * 3600 * 1000
    )
  })

  it('should be negative for timestamps in the future', () => {
    const now = new Date('2024-05-01T10:30:00Z')
    expect(calculateAgeMs(new Date('2024-05-01T10:31:00Z'), now)).toBe(-60000)
  })
})

describe('formatAge', () => {
  it('should format days and hours', () => {
    expect(formatAge(172800)).toBe('2d 0h')
    expect(formatAge(176400)).toBe('2d 1h')
    expect(formatAge(259200)).toBe('3d 0h')
  })

  it('should format hours and minutes', () => {
    expect(formatAge(3600)).toBe('1h 0m')
    expect(formatAge(3900)).toBe('1h 5m')
  })

  it('should format only minutes when less than an hour', () => {
    expect(formatAge(60)).toBe('1m')
    expect(formatAge(3540)).toBe('59m')
  })

  it('should handle zero', () => {
    expect(formatAge(0)).toBe('0m')
  })
})

describe('parseDuration', () => {
  it('should parse simple durations', () => {
    expect(parseDuration('3m')).toBe(180000)
    expect(parseDuration('1h')).toBe(3600000)
    expect(parseDuration('1d')).toBe(86400000)
  })

  it('should parse complex durations', () => {
    expect(parseDuration('1h30m')).toBe(5400000)
    expect(parseDuration('7h3m45s')).toBe(25425000)
  })

  it('should throw error for invalid format', () => {
    expect(() => parseDuration('invalid')).toThrow('Invalid duration format')
    expect(() => parseDuration('abc')).toThrow('Invalid duration format')
  })

  it('should throw error for negative duration', () => {
    expect(() => parseDuration('-5m')).toThrow('Duration cannot be negative')
  })
})

describe('parseMaxAge', () => {
  it('should treat bare integers as hours', () => {
    expect(parseMaxAge('72')).toBe(259200000)
    expect(parseMaxAge('0')).toBe(0)
    expect(parseMaxAge(' 48 ')).toBe(172800000)
  })

  it('should treat decimal numbers as hours', () => {
    expect(parseMaxAge('1.5')).toBe(5400000)
    expect(parseMaxAge('72.0')).toBe(259200000)
  })

  it('should accept duration strings', () => {
    expect(parseMaxAge('3d')).toBe(259200000)
    expect(parseMaxAge('36h')).toBe(129600000)
  })

  it('should throw for values that are not durations', () => {
    expect(() => parseMaxAge('soon')).toThrow('Invalid duration format: soon')
  })
})

describe('hoursToMs', () => {
  it('should convert hours to milliseconds', () => {
    expect(hoursToMs(72)).toBe(259200000)
  })
})
