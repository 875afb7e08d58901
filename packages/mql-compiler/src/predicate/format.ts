/**
 * @file Predicate Formatting
 *
 * Renders predicate trees as deterministic one-line strings for debug logs,
 * error reports and assertions.
 *
 * @example
 * ```typescript
 * formatPredicate(compileFilter(Playlist, { playlist_id: 1, 'tracks.track_id': 7 }))
 * // '(playlist_id = 1 AND ANY tracks (tracks.track_id = 7))'
 * ```
 *
 * @module mql-compiler/predicate/format
 */

import { isTimeOfDay } from '../coercion/type-coercion.js'
import type { CoercedValue, ComparisonNode, PredicateNode, ValueComparisonOp } from '../types/index.js'
import { isTrue } from './builders.js'

const OPERATOR_SYMBOLS: Record<ValueComparisonOp, string> = {
  eq: '=',
  ne: '!=',
  lt: '<',
  lte: '<=',
  gt: '>',
  gte: '>=',
}

function pad(value: number): string {
  return String(value).padStart(2, '0')
}

/**
 * Formats a single coerced value.
 */
export function formatValue(value: CoercedValue): string {
  if (value === null) {
    return 'NULL'
  }
  if (typeof value === 'string') {
    return JSON.stringify(value)
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value)
  }
  if (value instanceof Date) {
    return value.toISOString()
  }
  if (isTimeOfDay(value)) {
    return `${pad(value.hour)}:${pad(value.minute)}:${pad(value.second)}`
  }
  return String(value)
}

function formatComparison(node: ComparisonNode): string {
  switch (node.op) {
    case 'like':
      return `${node.path} LIKE ${JSON.stringify(node.value)}`
    case 'in':
      return `${node.path} IN (${node.value.map(formatValue).join(', ')})`
    case 'mod':
      return `${node.path} % ${node.value.divisor} = ${node.value.remainder}`
    case 'isNull':
      return `${node.path} IS NULL`
    case 'notNull':
      return `${node.path} IS NOT NULL`
    default:
      return `${node.path} ${OPERATOR_SYMBOLS[node.op]} ${formatValue(node.value)}`
  }
}

/**
 * Formats a predicate tree.
 *
 * Conjunctions and disjunctions are parenthesized, the constant true renders
 * as `TRUE`, and existential scopes render as `ANY <path>` (to-many) or
 * `HAS <path>` (to-one) followed by their inner predicate.
 */
export function formatPredicate(node: PredicateNode): string {
  switch (node.kind) {
    case 'and':
      return node.children.length === 0
        ? 'TRUE'
        : `(${node.children.map(formatPredicate).join(' AND ')})`
    case 'or':
      return node.children.length === 0
        ? 'TRUE'
        : `(${node.children.map(formatPredicate).join(' OR ')})`
    case 'not':
      return `NOT ${formatPredicate(node.child)}`
    case 'exists': {
      const quantifier = node.cardinality === 'many' ? 'ANY' : 'HAS'
      if (isTrue(node.inner)) {
        return `${quantifier} ${node.path}`
      }
      const inner = formatPredicate(node.inner)
      const grouped = node.inner.kind === 'and' || node.inner.kind === 'or' ? inner : `(${inner})`
      return `${quantifier} ${node.path} ${grouped}`
    }
    case 'comparison':
      return formatComparison(node)
  }
}
