/**
 * Human-readable date formatting.
 *
 * Every function takes an optional `reference` instant standing in for
 * "now" so output is deterministic under test. Patterns use date-fns tokens.
 */
import { differenceInCalendarDays, format as formatDate, isSameDay, isValid, subDays } from 'date-fns'
import { InvalidArgumentError, errorMessage } from './errors'

const MINUTE = 60 * 1000
const HOUR = 60 * MINUTE
const DAY = 24 * HOUR

export const DEFAULT_PATTERN = 'yyyy-MM-dd HH:mm'

export type DateFormatter = (date: Date) => string

const formatters = new Map<string, DateFormatter>()

// Fixed probe so an invalid pattern fails when the formatter is built,
// not on first use.
const PROBE = new Date(2000, 0, 1)

function assertValidDate(date: Date, argument = 'date'): void {
  if (!isValid(date)) {
    throw new InvalidArgumentError(argument, date, 'must be a valid date')
  }
}

/**
 * Formatter bound to `pattern`, built once per distinct pattern.
 * Patterns with unknown tokens are rejected here, and formatters reject
 * Invalid Date inputs.
 */
export function getFormatter(pattern: string): DateFormatter {
  const cached = formatters.get(pattern)
  if (cached) return cached

  try {
    formatDate(PROBE, pattern)
  } catch (err) {
    throw new InvalidArgumentError('pattern', pattern, errorMessage(err))
  }
  const formatter: DateFormatter = (date) => {
    assertValidDate(date)
    return formatDate(date, pattern)
  }
  formatters.set(pattern, formatter)
  return formatter
}

export function format(date: Date, pattern: string = DEFAULT_PATTERN): string {
  return getFormatter(pattern)(date)
}

function plural(count: number, unit: string): string {
  return `${count} ${unit}${count === 1 ? '' : 's'}`
}

/**
 * Relative phrase for a past instant: 'just now', '15 mins ago',
 * '3 hours ago', 'yesterday', '4 days ago', then '2 Jan 2025'.
 * Instants after `reference` read as 'just now'.
 */
export function timeAgo(date: Date, reference: Date = new Date()): string {
  assertValidDate(date)
  assertValidDate(reference, 'reference')
  const elapsed = reference.getTime() - date.getTime()

  if (elapsed < MINUTE) return 'just now'
  if (elapsed < HOUR) return `${plural(Math.floor(elapsed / MINUTE), 'min')} ago`
  if (elapsed < DAY) return `${plural(Math.floor(elapsed / HOUR), 'hour')} ago`

  const days = Math.floor(elapsed / DAY)
  if (days === 1) return 'yesterday'
  if (days < 7) return `${days} days ago`

  return format(date, 'd MMM yyyy')
}

/** 'Today 6:00 PM', 'Tomorrow 9:15 AM', 'Fri, 10 Jan 8:05 AM'. */
export function smartDateTime(date: Date, reference: Date = new Date()): string {
  assertValidDate(date)
  assertValidDate(reference, 'reference')
  const dayOffset = differenceInCalendarDays(date, reference)

  let dayLabel: string
  if (dayOffset === 0) {
    dayLabel = 'Today'
  } else if (dayOffset === -1) {
    dayLabel = 'Yesterday'
  } else if (dayOffset === 1) {
    dayLabel = 'Tomorrow'
  } else {
    dayLabel = format(date, 'EEE, d MMM')
  }

  return `${dayLabel} ${format(date, 'h:mm a')}`
}

export function isToday(date: Date, reference: Date = new Date()): boolean {
  return isSameDay(date, reference)
}

export function isYesterday(date: Date, reference: Date = new Date()): boolean {
  return isSameDay(date, subDays(reference, 1))
}

/**
 * Compact elapsed time between two instants: '2d 5h 10m'. Seconds are
 * dropped and zero parts omitted; no elapsed minutes gives '0m'.
 *
 * With `absolute` (the default) the order of `start` and `end` does not
 * matter. Without it, an `end` before `start` counts as nothing elapsed.
 */
export function diffSummary(start: Date, end: Date, absolute = true): string {
  assertValidDate(start, 'start')
  assertValidDate(end, 'end')
  const raw = end.getTime() - start.getTime()
  const elapsed = absolute ? Math.abs(raw) : Math.max(raw, 0)

  const days = Math.floor(elapsed / DAY)
  const hours = Math.floor(elapsed / HOUR) % 24
  const minutes = Math.floor(elapsed / MINUTE) % 60

  const parts: string[] = []
  if (days > 0) parts.push(`${days}d`)
  if (hours > 0) parts.push(`${hours}h`)
  if (minutes > 0) parts.push(`${minutes}m`)

  return parts.length > 0 ? parts.join(' ') : '0m'
}
