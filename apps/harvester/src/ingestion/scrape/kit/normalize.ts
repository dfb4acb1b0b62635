import type { CleanerName, FieldValue } from '../types.js'
import { collapseWhitespace } from './html.js'

/**
 * Parse a number written with locale separators.
 *
 * With both `.` and `,` present the one appearing last is the decimal
 * separator ("1.899,99", "2,499.00"). A lone separator is decimal
 * ("44,39", "959.00") unless it repeats ("1.299.000").
 * Currency symbols, spaces and other text are ignored.
 */
export function parseLocaleNumber(raw: string): number | null {
  const negative = /^\s*[-−–]\s*\d/.test(raw)
  const stripped = raw.replace(/[^\d.,]/g, '')
  if (!/\d/.test(stripped)) {
    return null
  }

  const lastDot = stripped.lastIndexOf('.')
  const lastComma = stripped.lastIndexOf(',')
  let normalized: string

  if (lastDot >= 0 && lastComma >= 0) {
    const decimal = lastDot > lastComma ? '.' : ','
    const thousands = decimal === '.' ? ',' : '.'
    normalized = stripped.split(thousands).join('').replace(decimal, '.')
  } else if (lastDot >= 0 || lastComma >= 0) {
    const separator = lastDot >= 0 ? '.' : ','
    const occurrences = stripped.split(separator).length - 1
    normalized = occurrences > 1 ? stripped.split(separator).join('') : stripped.replace(separator, '.')
  } else {
    normalized = stripped
  }

  // Separators left dangling ("12." or ".5") still parse
  const parsed = Number.parseFloat(normalized)
  if (!Number.isFinite(parsed)) {
    return null
  }
  return negative ? -parsed : parsed
}

function toNumber(value: FieldValue): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null
  if (typeof value === 'string') return parseLocaleNumber(value)
  return null
}

export function cleanPrice(value: FieldValue): number | null {
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? parseLocaleNumber(value.replace(/^\s*[-−–]/, '')) : null
  if (parsed === null || !Number.isFinite(parsed) || parsed < 0) {
    return null
  }
  return parsed
}

/** For sources that only write commas as thousands grouping ("₼ 2,499") */
export function cleanCommaGroupedPrice(value: FieldValue): number | null {
  return cleanPrice(typeof value === 'string' ? value.replace(/,/g, '') : value)
}

export function cleanInteger(value: FieldValue): number | null {
  const parsed = toNumber(value)
  return parsed === null ? null : Math.trunc(parsed)
}

/** "-15%" and "15 %" both give 15 */
export function cleanPercent(value: FieldValue): number | null {
  const parsed = toNumber(value)
  return parsed === null ? null : Math.abs(parsed)
}

const OUT_OF_STOCK_TOKENS = [
  'stokda yoxdur',
  'mövcud deyil',
  'movcud deyil',
  'yoxdur',
  'bitib',
  'satışda yoxdur',
  'нет в наличии',
  'нет',
  'out of stock',
  'sold out',
  'unavailable',
]

const IN_STOCK_TOKENS = [
  'stokda var',
  'mövcuddur',
  'movcuddur',
  'mövcud',
  'anbarda var',
  'satışda',
  'var',
  'в наличии',
  'есть',
  'in stock',
  'available',
]

/** Native-language availability text to true / false / unknown (null) */
export function cleanStock(value: FieldValue): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value > 0
  if (value === null) return null

  // Dotted capital İ lowercases to i plus a combining dot
  const text = collapseWhitespace(value).toLowerCase().replace(/i\u0307/g, 'i')
  if (!text) return null

  const flag = cleanFlag(text)
  if (flag !== null) return flag

  if (OUT_OF_STOCK_TOKENS.some(token => text.includes(token))) return false
  if (IN_STOCK_TOKENS.some(token => text.includes(token))) return true
  return null
}

const TRUE_FLAGS = new Set(['true', '1', 'yes', 'bəli'])
const FALSE_FLAGS = new Set(['false', '0', 'no', 'xeyr'])

export function cleanFlag(value: FieldValue): boolean | null {
  if (typeof value === 'boolean') return value
  if (typeof value === 'number') return value !== 0
  if (value === null) return null
  const text = value.trim().toLowerCase()
  if (TRUE_FLAGS.has(text)) return true
  if (FALSE_FLAGS.has(text)) return false
  return null
}

/** For attributes like data-product-out-of-stock="true" */
export function cleanOutOfStockFlag(value: FieldValue): boolean | null {
  const flag = cleanFlag(value)
  return flag === null ? null : !flag
}

export function cleanText(value: FieldValue): string | null {
  if (value === null) return null
  const text = collapseWhitespace(String(value))
  return text.length > 0 ? text : null
}

export const CLEANERS: Record<CleanerName, (value: FieldValue) => FieldValue> = {
  price: cleanPrice,
  commaGroupedPrice: cleanCommaGroupedPrice,
  number: toNumber,
  integer: cleanInteger,
  percent: cleanPercent,
  stock: cleanStock,
  outOfStockFlag: cleanOutOfStockFlag,
  flag: cleanFlag,
  text: cleanText,
}

export function applyCleaner(name: CleanerName, value: FieldValue): FieldValue {
  return CLEANERS[name](value)
}
