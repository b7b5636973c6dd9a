/**
 * String transformation and validation helpers.
 * Every function tolerates null/undefined input.
 */
import { InvalidArgumentError } from './errors'

const NON_SLUG_RUN = /[^a-z0-9]+/g
const EDGE_HYPHEN = /^-|-$/g

const EMAIL_PATTERN =
  /^[a-zA-Z0-9.!#$%&*+/=?^_`{|}~-]+@[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?(?:\.[a-zA-Z0-9](?:[a-zA-Z0-9-]{0,61}[a-zA-Z0-9])?)*$/

const URL_PATTERN =
  /^https?:\/\/(www\.)?[-a-zA-Z0-9@:%._+~#=]{1,256}\.[a-zA-Z0-9()]{1,6}\b([-a-zA-Z0-9()@:%_+.~#?&/=]*)$/

type MaybeString = string | null | undefined

/** Uppercase the first code point: `capitalize('élan')` → `'Élan'`. */
export function capitalize(input: MaybeString): string {
  if (!input) return ''
  const first = String.fromCodePoint(input.codePointAt(0) ?? 0)
  return first.toUpperCase() + input.slice(first.length)
}

/** `slugify('  Hello World! ')` → `'hello-world'` */
export function slugify(input: MaybeString): string {
  if (!input) return ''
  return input
    .toLowerCase()
    .trim()
    .replace(NON_SLUG_RUN, '-')
    .replace(EDGE_HYPHEN, '')
}

/**
 * Clip `input` so the result, suffix included, is exactly `maxLength` long.
 * Strings that already fit come back untouched; a bound too small to hold
 * any content yields the bare suffix.
 */
export function truncate(input: MaybeString, maxLength: number, suffix = '...'): string {
  if (maxLength < 0) {
    throw new InvalidArgumentError('maxLength', maxLength, 'must be non-negative')
  }
  if (input == null) return ''
  if (input.length <= maxLength) return input
  if (maxLength <= suffix.length) return suffix
  return input.slice(0, maxLength - suffix.length) + suffix
}

export function isEmail(input: MaybeString): boolean {
  if (!input) return false
  return EMAIL_PATTERN.test(input.trim())
}

/** Only http and https URLs with a dotted host are accepted. */
export function isUrl(input: MaybeString): boolean {
  if (!input) return false
  return URL_PATTERN.test(input.trim())
}
