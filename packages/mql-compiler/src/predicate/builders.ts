/**
 * @file Predicate Builders
 *
 * Factory functions for predicate nodes. The compiler builds every node
 * through these, and callers use them to author nested conditions.
 *
 * @example
 * ```typescript
 * const notPrivate = not(compare(Playlist.scalar('name'), 'like', '%Private%', 'tracks.playlists.name'))
 * compileFilter(Album, filter, { nestedConditions: { 'tracks.playlists': notPrivate } })
 * ```
 *
 * @module mql-compiler/predicate/builders
 */

import type {
  AndNode,
  CoercedValue,
  ComparisonNode,
  ExistsNode,
  ModOperand,
  NotNode,
  PredicateNode,
  RelationField,
  ScalarField,
  ValueComparisonOp,
} from '../types/index.js'

// =============================================================================
// Constants
// =============================================================================

/**
 * The constant true predicate (an empty conjunction).
 */
export const TRUE: AndNode = { kind: 'and', children: [] }

const PREDICATE_KINDS = new Set(['and', 'or', 'not', 'exists', 'comparison'])

// =============================================================================
// Guards
// =============================================================================

/**
 * Checks whether a value looks like a {@link PredicateNode}.
 *
 * Only the discriminant is inspected; nodes are expected to come from the
 * builders in this module.
 */
export function isPredicateNode(value: unknown): value is PredicateNode {
  return (
    typeof value === 'object' &&
    value !== null &&
    'kind' in value &&
    typeof value.kind === 'string' &&
    PREDICATE_KINDS.has(value.kind)
  )
}

/**
 * Checks whether a predicate is the constant true.
 */
export function isTrue(node: PredicateNode): boolean {
  return node.kind === 'and' && node.children.length === 0
}

// =============================================================================
// Logical Builders
// =============================================================================

/**
 * Conjunction. No children yields {@link TRUE}; one child is returned as is.
 */
export function and(...children: PredicateNode[]): PredicateNode {
  if (children.length === 0) {
    return TRUE
  }
  if (children.length === 1 && children[0]) {
    return children[0]
  }
  return { kind: 'and', children }
}

/**
 * Disjunction. No children yields {@link TRUE}; one child is returned as is.
 */
export function or(...children: PredicateNode[]): PredicateNode {
  if (children.length === 0) {
    return TRUE
  }
  if (children.length === 1 && children[0]) {
    return children[0]
  }
  return { kind: 'or', children }
}

/**
 * Negation.
 */
export function not(child: PredicateNode): NotNode {
  return { kind: 'not', child }
}

/**
 * Existential quantifier over `relation`, honoring its cardinality.
 *
 * @param path - Internal dotted path of the relation from the root model
 */
export function exists(relation: RelationField, inner: PredicateNode, path: string): ExistsNode {
  return {
    kind: 'exists',
    relation,
    cardinality: relation.cardinality,
    path,
    inner,
  }
}

// =============================================================================
// Comparison Builders
// =============================================================================

/**
 * Builds a comparison leaf.
 *
 * @param path - Internal dotted path of the field from the root model
 *
 * @example
 * ```typescript
 * compare(trackId, 'eq', 7, 'tracks.track_id')
 * compare(trackId, 'in', [7, 9], 'tracks.track_id')
 * compare(trackId, 'mod', { divisor: 2, remainder: 0 }, 'tracks.track_id')
 * ```
 */
export function compare(field: ScalarField, op: ValueComparisonOp, value: CoercedValue, path: string): ComparisonNode
export function compare(field: ScalarField, op: 'like', value: string, path: string): ComparisonNode
export function compare(field: ScalarField, op: 'in', value: readonly CoercedValue[], path: string): ComparisonNode
export function compare(field: ScalarField, op: 'mod', value: ModOperand, path: string): ComparisonNode
export function compare(
  field: ScalarField,
  op: ValueComparisonOp | 'like' | 'in' | 'mod',
  value: CoercedValue | readonly CoercedValue[] | ModOperand,
  path: string
): ComparisonNode {
  switch (op) {
    case 'like':
      return { kind: 'comparison', field, path, op, value: String(value) }
    case 'in':
      if (!isValueList(value)) {
        throw new TypeError('in comparisons take a list of values')
      }
      return { kind: 'comparison', field, path, op, value }
    case 'mod':
      if (!isModOperand(value)) {
        throw new TypeError('mod comparisons take a { divisor, remainder } operand')
      }
      return { kind: 'comparison', field, path, op, value }
    default:
      if (isValueList(value) || isModOperand(value)) {
        throw new TypeError(`${op} comparisons take a single value`)
      }
      return { kind: 'comparison', field, path, op, value }
  }
}

/**
 * Null test on a scalar field.
 */
export function isNull(field: ScalarField, path: string): ComparisonNode {
  return { kind: 'comparison', field, path, op: 'isNull', value: null }
}

/**
 * Not-null test on a scalar field.
 */
export function notNull(field: ScalarField, path: string): ComparisonNode {
  return { kind: 'comparison', field, path, op: 'notNull', value: null }
}

function isValueList(value: unknown): value is readonly CoercedValue[] {
  return Array.isArray(value)
}

function isModOperand(value: unknown): value is ModOperand {
  return (
    typeof value === 'object' &&
    value !== null &&
    'divisor' in value &&
    'remainder' in value &&
    typeof value.divisor === 'number' &&
    typeof value.remainder === 'number'
  )
}
