import { InvalidArgumentError } from './errors'

export interface CurrencyOptions {
  symbol?: string
  decimals?: number
}

export interface PercentageOptions {
  decimals?: number
}

const COMPACT_UNITS = [
  { value: 1e12, suffix: 'T' },
  { value: 1e9, suffix: 'B' },
  { value: 1e6, suffix: 'M' },
  { value: 1e3, suffix: 'K' },
] as const

function assertDecimals(decimals: number) {
  if (decimals < 0 || !Number.isInteger(decimals)) {
    throw new InvalidArgumentError('decimals', decimals, 'must be a non-negative integer')
  }
}

function scaled(value: number, decimals: number, step: (n: number) => number): number {
  assertDecimals(decimals)
  const factor = 10 ** decimals
  return step(value * factor) / factor
}

/** Half-way values round away from zero: `roundTo(-2.5, 0)` → `-3`. */
export function roundTo(value: number, decimals: number): number {
  return scaled(value, decimals, (n) => Math.sign(n) * Math.round(Math.abs(n)))
}

export function floorTo(value: number, decimals: number): number {
  return scaled(value, decimals, Math.floor)
}

export function ceilTo(value: number, decimals: number): number {
  return scaled(value, decimals, Math.ceil)
}

function groupThousands(digits: string): string {
  return digits.replace(/\B(?=(\d{3})+(?!\d))/g, ',')
}

/**
 * `formatCurrency(1234.56)` → `'$1,234.56'`,
 * `formatCurrency(-1000, { symbol: '£', decimals: 0 })` → `'£-1,000'`.
 */
export function formatCurrency(amount: number, { symbol = '$', decimals = 2 }: CurrencyOptions = {}): string {
  assertDecimals(decimals)
  const fixed = roundTo(amount, decimals).toFixed(decimals)
  const negative = fixed.startsWith('-')
  const [integerPart, decimalPart = ''] = (negative ? fixed.slice(1) : fixed).split('.')
  const sign = negative ? '-' : ''
  const grouped = groupThousands(integerPart)
  return decimalPart ? `${symbol}${sign}${grouped}.${decimalPart}` : `${symbol}${sign}${grouped}`
}

/** `1200` → `'1.2K'`, `2300000000` → `'2.3B'`. */
export function formatCompact(value: number): string {
  const magnitude = Math.abs(value)
  for (const unit of COMPACT_UNITS) {
    if (magnitude >= unit.value) {
      return `${(value / unit.value).toFixed(1)}${unit.suffix}`
    }
  }
  return value.toFixed(Number.isInteger(value) ? 0 : 1)
}

/** `value` is a ratio: `formatPercentage(0.5)` → `'50.0%'`. */
export function formatPercentage(value: number, { decimals = 1 }: PercentageOptions = {}): string {
  assertDecimals(decimals)
  return `${roundTo(value * 100, decimals).toFixed(decimals)}%`
}

/** Random integer in `[min, max]`. */
export function randomInt(min: number, max: number, random: () => number = Math.random): number {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new InvalidArgumentError('range', `${min}..${max}`, 'bounds must be integers')
  }
  if (min > max) {
    throw new InvalidArgumentError('min', min, 'must be less than or equal to max')
  }
  return min + Math.floor(random() * (max - min + 1))
}

/** Random number in `[min, max)`. */
export function randomDouble(min: number, max: number, random: () => number = Math.random): number {
  if (min >= max) {
    throw new InvalidArgumentError('min', min, 'must be less than max')
  }
  return min + random() * (max - min)
}
