/**
 * @file Type Coercion
 *
 * Converts raw filter values (usually parsed from JSON or a query string)
 * into the canonical representation of a scalar field, so that `"5"` can be
 * compared against an integer column and `"2015-03-11"` against a date.
 *
 * @module mql-compiler/coercion/type-coercion
 */

import { TypeConversionError } from '../errors.js'
import type { CoercedValue, ScalarType, TimeOfDay } from '../types/index.js'

// =============================================================================
// Constants
// =============================================================================

const INTEGER_REGEX = /^\s*[+-]?\d+\s*$/
const FLOAT_REGEX = /^\s*[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?\s*$/
const DATE_REGEX = /^(\d{4})-(\d{2})-(\d{2})$/
const DATETIME_REGEX = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/
const TIME_REGEX = /^(\d{2}):(\d{2}):(\d{2})$/

// =============================================================================
// Guards
// =============================================================================

/**
 * Checks whether a value is a {@link TimeOfDay}.
 */
export function isTimeOfDay(value: unknown): value is TimeOfDay {
  if (
    typeof value !== 'object' ||
    value === null ||
    !('hour' in value) ||
    !('minute' in value) ||
    !('second' in value)
  ) {
    return false
  }
  const { hour, minute, second } = value
  return (
    typeof hour === 'number' &&
    typeof minute === 'number' &&
    typeof second === 'number' &&
    isValidTime(hour, minute, second)
  )
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime())
}

function isValidTime(hour: number, minute: number, second: number): boolean {
  return (
    Number.isInteger(hour) &&
    Number.isInteger(minute) &&
    Number.isInteger(second) &&
    hour >= 0 &&
    hour <= 23 &&
    minute >= 0 &&
    minute <= 59 &&
    second >= 0 &&
    second <= 59
  )
}

function isNullValue(value: unknown): boolean {
  return value === null || value === undefined || (typeof value === 'string' && value.toLowerCase() === 'null')
}

function fail(value: unknown, targetType: string): never {
  throw new TypeConversionError(`Unable to convert value to ${targetType}`, value, targetType)
}

// =============================================================================
// Per-Type Converters
// =============================================================================

function toInt(value: unknown): number {
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return fail(value, 'int')
    }
    return Number.isInteger(value) ? value : Math.trunc(value)
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0
  }
  if (typeof value === 'string' && INTEGER_REGEX.test(value)) {
    const parsed = Number.parseInt(value, 10)
    if (Number.isSafeInteger(parsed)) {
      return parsed
    }
  }
  return fail(value, 'int')
}

function toText(value: unknown): string {
  if (typeof value === 'string') {
    return value
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value)
  }
  if (isValidDate(value)) {
    return value.toISOString()
  }
  return fail(value, 'text')
}

function toBool(value: unknown): boolean {
  if (typeof value === 'boolean') {
    return value
  }
  if (
    (typeof value === 'string' && value.toLowerCase() === 'false') ||
    value === '0' ||
    value === 0
  ) {
    return false
  }
  return true
}

function toFloat(value: unknown): number {
  if (typeof value === 'number') {
    if (Number.isNaN(value)) {
      return fail(value, 'float')
    }
    return value
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0
  }
  if (typeof value === 'string' && FLOAT_REGEX.test(value)) {
    return Number.parseFloat(value)
  }
  return fail(value, 'float')
}

/**
 * Builds a UTC date, rejecting components that roll over (e.g. February 30).
 */
function utcDate(
  value: unknown,
  targetType: string,
  parts: readonly number[]
): Date {
  const [year = 0, month = 1, day = 1, hour = 0, minute = 0, second = 0] = parts
  const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second))
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day ||
    !isValidTime(hour, minute, second)
  ) {
    return fail(value, targetType)
  }
  return date
}

function matchNumbers(regex: RegExp, value: string): number[] | null {
  const match = regex.exec(value)
  return match ? match.slice(1).map((part) => Number(part)) : null
}

function toDate(value: unknown): Date {
  if (isValidDate(value)) {
    return value
  }
  const parts = typeof value === 'string' ? matchNumbers(DATE_REGEX, value) : null
  return parts ? utcDate(value, 'date', parts) : fail(value, 'date')
}

function toDateTime(value: unknown): Date {
  if (isValidDate(value)) {
    return value
  }
  const parts = typeof value === 'string' ? matchNumbers(DATETIME_REGEX, value) : null
  return parts ? utcDate(value, 'datetime', parts) : fail(value, 'datetime')
}

function toTime(value: unknown): TimeOfDay {
  if (isTimeOfDay(value)) {
    return value
  }
  const parts = typeof value === 'string' ? matchNumbers(TIME_REGEX, value) : null
  if (!parts) {
    return fail(value, 'time')
  }
  const [hour = 0, minute = 0, second = 0] = parts
  if (!isValidTime(hour, minute, second)) {
    return fail(value, 'time')
  }
  return { hour, minute, second }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Converts a raw filter value into the representation of `targetType`.
 *
 * `null`, `undefined` and the string `"null"` (any case) always convert to
 * `null`. Dates and datetimes without an explicit zone are read as UTC.
 *
 * @throws TypeConversionError if the value cannot be converted, or if
 *   `targetType` is not a known scalar type
 *
 * @example
 * ```typescript
 * coerceValue('5', 'int')                         // 5
 * coerceValue('FaLSE', 'bool')                    // false
 * coerceValue('2015-03-11 01:45:14', 'datetime')  // Date(2015-03-11T01:45:14.000Z)
 * coerceValue('01:45:14', 'time')                 // { hour: 1, minute: 45, second: 14 }
 * ```
 */
export function coerceValue(value: unknown, targetType: ScalarType): CoercedValue {
  if (isNullValue(value)) {
    return null
  }

  switch (targetType) {
    case 'int':
      return toInt(value)
    case 'text':
      return toText(value)
    case 'bool':
      return toBool(value)
    case 'date':
      return toDate(value)
    case 'datetime':
      return toDateTime(value)
    case 'float':
      return toFloat(value)
    case 'time':
      return toTime(value)
    default: {
      // Reachable from untyped callers only
      const unknownType: never = targetType
      return fail(value, String(unknownType))
    }
  }
}
