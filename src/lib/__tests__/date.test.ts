import { describe, it, expect } from 'vitest'
import { subDays } from 'date-fns'
import {
  diffSummary,
  format,
  getFormatter,
  isToday,
  isYesterday,
  smartDateTime,
  timeAgo,
} from '@/lib/date'
import { InvalidArgumentError } from '@/lib/errors'

// Local-time constructors keep expectations independent of the machine's zone.
const at = (month: number, day: number, hour = 0, minute = 0, second = 0, year = 2025) =>
  new Date(year, month - 1, day, hour, minute, second)

describe('timeAgo', () => {
  const now = at(1, 1, 12, 0)

  it('says just now under a minute', () => {
    expect(timeAgo(at(1, 1, 11, 59, 30), now)).toBe('just now')
    expect(timeAgo(now, now)).toBe('just now')
  })

  it('counts minutes', () => {
    expect(timeAgo(at(1, 1, 11, 45), now)).toBe('15 mins ago')
    expect(timeAgo(at(1, 1, 11, 59), now)).toBe('1 min ago')
  })

  it('counts hours', () => {
    expect(timeAgo(at(1, 1, 11, 0), now)).toBe('1 hour ago')
    expect(timeAgo(at(1, 1, 8, 30), now)).toBe('3 hours ago')
  })

  it('says yesterday for one whole day', () => {
    expect(timeAgo(at(12, 31, 12, 0, 0, 2024), now)).toBe('yesterday')
    expect(timeAgo(at(12, 31, 6, 0, 0, 2024), now)).toBe('yesterday')
  })

  it('counts days within a week', () => {
    expect(timeAgo(at(12, 29, 12, 0, 0, 2024), now)).toBe('3 days ago')
    expect(timeAgo(at(12, 25, 13, 0, 0, 2024), now)).toBe('6 days ago')
  })

  it('falls back to the calendar date of the instant', () => {
    expect(timeAgo(at(12, 25, 12, 0, 0, 2024), now)).toBe('25 Dec 2024')
    expect(timeAgo(at(12, 22, 12, 0, 0, 2024), now)).toBe('22 Dec 2024')
  })

  it('treats future instants as just now', () => {
    expect(timeAgo(at(1, 1, 12, 5), now)).toBe('just now')
    expect(timeAgo(at(1, 9), now)).toBe('just now')
  })

  it('rejects an invalid date', () => {
    expect(() => timeAgo(new Date(NaN), now)).toThrow(InvalidArgumentError)
    expect(() => timeAgo(now, new Date(NaN))).toThrow(InvalidArgumentError)
  })
})

describe('smartDateTime', () => {
  const now = at(1, 1, 10, 0)

  it('labels today, yesterday and tomorrow', () => {
    expect(smartDateTime(at(1, 1, 18, 0), now)).toBe('Today 6:00 PM')
    expect(smartDateTime(at(12, 31, 9, 15, 0, 2024), now)).toBe('Yesterday 9:15 AM')
    expect(smartDateTime(at(1, 2, 0, 5), now)).toBe('Tomorrow 12:05 AM')
  })

  it('uses weekday and date further out', () => {
    expect(smartDateTime(at(1, 10, 8, 5), now)).toBe('Fri, 10 Jan 8:05 AM')
  })

  it('follows calendar days, not elapsed time', () => {
    expect(smartDateTime(at(1, 2, 0, 1), at(1, 1, 23, 59))).toBe('Tomorrow 12:01 AM')
  })

  it('rejects an invalid date', () => {
    expect(() => smartDateTime(new Date(NaN), now)).toThrow(InvalidArgumentError)
  })
})

describe('format', () => {
  const instant = at(1, 3, 15, 10, 5)

  it('uses yyyy-MM-dd HH:mm by default', () => {
    expect(format(instant)).toBe('2025-01-03 15:10')
  })

  it('renders custom patterns', () => {
    expect(format(instant, 'dd/MM/yyyy HH:mm:ss')).toBe('03/01/2025 15:10:05')
    expect(format(instant, 'yyyy')).toBe('2025')
  })

  it('reuses one formatter per pattern', () => {
    const first = getFormatter('HH:mm')
    expect(getFormatter('HH:mm')).toBe(first)
    expect(first(instant)).toBe(format(instant, 'HH:mm'))
  })

  it('rejects patterns with unknown tokens when built', () => {
    expect(() => getFormatter('yyyy foo')).toThrow(InvalidArgumentError)
    expect(() => format(instant, 'yyyy foo')).toThrow(InvalidArgumentError)
  })

  it('rejects an invalid date', () => {
    expect(() => format(new Date(NaN))).toThrow(InvalidArgumentError)
    expect(() => getFormatter('HH:mm')(new Date(NaN))).toThrow(InvalidArgumentError)
  })
})

describe('isToday / isYesterday', () => {
  it('checks against the current day by default', () => {
    expect(isToday(new Date())).toBe(true)
    expect(isYesterday(subDays(new Date(), 1))).toBe(true)
    expect(isYesterday(new Date())).toBe(false)
  })

  it('compares calendar fields, not elapsed time', () => {
    expect(isToday(at(1, 1, 23, 59), at(1, 1, 0, 0))).toBe(true)
    expect(isToday(at(12, 31, 23, 59, 0, 2024), at(1, 1, 0, 1))).toBe(false)
    expect(isYesterday(at(12, 31, 23, 59, 0, 2024), at(1, 1, 0, 1))).toBe(true)
    expect(isYesterday(at(12, 31, 0, 1, 0, 2024), at(1, 1, 23, 59))).toBe(true)
    expect(isYesterday(at(12, 30, 23, 59, 0, 2024), at(1, 1, 0, 1))).toBe(false)
  })
})

describe('diffSummary', () => {
  const start = at(1, 1, 10, 0)
  const end = at(1, 3, 15, 10)

  it('breaks the span into days, hours and minutes', () => {
    expect(diffSummary(start, end)).toBe('2d 5h 10m')
  })

  it('omits zero parts', () => {
    expect(diffSummary(start, at(1, 1, 11, 0))).toBe('1h')
    expect(diffSummary(start, at(1, 2, 10, 5))).toBe('1d 5m')
  })

  it('says 0m when less than a minute passed', () => {
    expect(diffSummary(start, start)).toBe('0m')
    expect(diffSummary(start, at(1, 1, 10, 0, 59))).toBe('0m')
  })

  it('ignores order in absolute mode', () => {
    expect(diffSummary(end, start)).toBe('2d 5h 10m')
    expect(diffSummary(end, start, true)).toBe('2d 5h 10m')
  })

  it('counts nothing for an end before start in non-absolute mode', () => {
    expect(diffSummary(start, end, false)).toBe('2d 5h 10m')
    expect(diffSummary(end, start, false)).toBe('0m')
  })

  it('rejects an invalid date', () => {
    expect(() => diffSummary(start, new Date(NaN))).toThrow(InvalidArgumentError)
  })
})
