/**
 * mql-compiler
 *
 * Compiles MongoDB-style filter documents into boolean predicate trees over
 * a relational schema. Untrusted JSON filters are checked against a field
 * whitelist, scoped by per-relation mandatory conditions and bounded by a
 * complexity limit before any query engine sees them.
 *
 * @packageDocumentation
 * @module mql-compiler
 */

// ============================================================================
// Type Exports
// ============================================================================

export type {
  // Schema types
  ScalarType,
  Cardinality,
  ScalarField,
  RelationField,
  FieldDescriptor,
  SchemaModel,
  // Filter document types
  LogicalOperator,
  FieldOperator,
  FilterDocument,
  // Values
  TimeOfDay,
  CoercedValue,
  ModOperand,
  // Predicate types
  ValueComparisonOp,
  ComparisonOp,
  ValueComparison,
  LikeComparison,
  InComparison,
  ModComparison,
  NullComparison,
  ComparisonNode,
  AndNode,
  OrNode,
  NotNode,
  ExistsNode,
  PredicateNode,
  // Options
  WhitelistFn,
  NestedConditionsFn,
  KeyTranslator,
  MessageFormatter,
  DebugLogger,
  CompileOptions,
} from './types/index.js'

export { SCALAR_TYPES } from './types/index.js'

// ============================================================================
// Compilation
// ============================================================================

export {
  compileFilter,
  compile,
  applyFilter,
  isFilterMapping,
  FIELD_OPERATORS,
  isFieldOperator,
  evaluateOperator,
  resolvePath,
  tryResolvePath,
  relationCrossings,
  leafField,
  describeFieldPathProblem,
  validateFieldPath,
  isIndexSegment,
  stripIndexSegments,
} from './query/index.js'

export type {
  ApplyFilterOptions,
  OperatorContext,
  ResolvedSegment,
  ResolveContext,
} from './query/index.js'

export { coerceValue, isTimeOfDay } from './coercion/type-coercion.js'

// ============================================================================
// Factory and Options
// ============================================================================

export { createFilterCompiler } from './factory/filter-compiler.js'
export type { FilterCompiler, FilterCompilerConfig } from './factory/filter-compiler.js'

export {
  compileOptionsSchema,
  resolveCompileOptions,
  mergeCompileOptions,
} from './factory/compile-options.js'
export type { ResolvedCompileOptions } from './factory/compile-options.js'

// ============================================================================
// Schema
// ============================================================================

export { defineSchema, DefinedModel, schemaDefinitionSchema } from './schema/define-schema.js'
export type {
  Schema,
  SchemaDefinition,
  ModelDefinition,
  FieldDefinition,
} from './schema/define-schema.js'

// ============================================================================
// Predicates
// ============================================================================

export {
  TRUE,
  isPredicateNode,
  isTrue,
  and,
  or,
  not,
  exists,
  compare,
  isNull,
  notNull,
} from './predicate/builders.js'

export { formatPredicate, formatValue } from './predicate/format.js'

// ============================================================================
// Errors and Messages
// ============================================================================

export {
  InvalidFilterError,
  ComplexityExceededError,
  FieldError,
  FieldPermissionError,
  UnknownFieldError,
  TypeConversionError,
  FilterOptionsError,
  SchemaDefinitionError,
} from './errors.js'
export type { FieldErrorCode, FieldErrorOptions } from './errors.js'

export { MESSAGES, defaultFormatMessage } from './messages.js'
export type { MessageKey } from './messages.js'

export { createDebugLogger, silentLogger } from './logging/debug-logger.js'
