/**
 * @file Query Module Exports
 *
 * Exports the filter compiler and the pieces it is built from.
 *
 * @packageDocumentation
 * @module mql-compiler/query
 */

// Filter compilation
export {
  compileFilter,
  compile,
  applyFilter,
  isFilterMapping,
} from './predicate-compiler.js'

export type { ApplyFilterOptions } from './predicate-compiler.js'

// Operator evaluation
export { FIELD_OPERATORS, isFieldOperator, evaluateOperator } from './operator-evaluator.js'

export type { OperatorContext } from './operator-evaluator.js'

// Path resolution
export { resolvePath, tryResolvePath, relationCrossings, leafField } from './path-resolver.js'

export type { ResolvedSegment, ResolveContext } from './path-resolver.js'

// Field path sanitization
export {
  describeFieldPathProblem,
  validateFieldPath,
  isIndexSegment,
  stripIndexSegments,
} from './field-path-sanitization.js'
