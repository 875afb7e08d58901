/**
 * @file Core Type Definitions
 *
 * Shared types for the filter compiler: the schema collaborator contract
 * (models and their field descriptors), the filter document shape accepted
 * from callers, and the predicate tree produced by a compile.
 *
 * @module mql-compiler/types
 */

// =============================================================================
// Schema Types
// =============================================================================

/**
 * Scalar value types a field can hold.
 */
export const SCALAR_TYPES = ['int', 'text', 'bool', 'date', 'datetime', 'float', 'time'] as const

/**
 * Union of supported scalar value types.
 */
export type ScalarType = (typeof SCALAR_TYPES)[number]

/**
 * Relation cardinality. `one` is a to-one reference, `many` a collection.
 */
export type Cardinality = 'one' | 'many'

/**
 * A field holding a single typed value.
 */
export interface ScalarField {
  readonly kind: 'scalar'
  /** Field name on its owning model */
  readonly name: string
  /** Name of the owning model */
  readonly model: string
  readonly valueType: ScalarType
}

/**
 * A field referencing another model.
 */
export interface RelationField {
  readonly kind: 'relation'
  /** Field name on its owning model */
  readonly name: string
  /** Name of the owning model */
  readonly model: string
  /** The related model */
  readonly target: SchemaModel
  readonly cardinality: Cardinality
}

/**
 * Closed union of everything a model can expose under a field name.
 */
export type FieldDescriptor = ScalarField | RelationField

/**
 * An entity type the compiler can resolve field paths against.
 *
 * Implementations must only report fields that were explicitly declared;
 * inherited object members such as `constructor` must never resolve.
 *
 * @example
 * ```typescript
 * const album: SchemaModel = {
 *   name: 'Album',
 *   getField: (name) => fields.get(name),
 * }
 * ```
 */
export interface SchemaModel {
  readonly name: string
  getField(name: string): FieldDescriptor | undefined
}

// =============================================================================
// Filter Document Types
// =============================================================================

/**
 * Logical operator tokens handled by the traversal itself.
 */
export type LogicalOperator = '$and' | '$or' | '$not' | '$nor' | '$elemMatch'

/**
 * Field-level operator tokens handled by the operator evaluator.
 */
export type FieldOperator =
  | '$eq'
  | '$ne'
  | '$lt'
  | '$lte'
  | '$gt'
  | '$gte'
  | '$in'
  | '$nin'
  | '$mod'
  | '$like'
  | '$exists'

/**
 * A filter document. Keys are field names, dotted field paths or operator
 * tokens; the runtime shape is validated during compilation, so values are
 * deliberately loose here.
 *
 * @example
 * ```typescript
 * const filter: FilterDocument = {
 *   'tracks.playlists.name': { $like: 'Rock' },
 *   $or: [{ title: 'Night Ferry' }, { album_id: { $gt: 100 } }],
 * }
 * ```
 */
export interface FilterDocument {
  [key: string]: unknown
}

// =============================================================================
// Coerced Values
// =============================================================================

/**
 * Time of day without a date component.
 */
export interface TimeOfDay {
  readonly hour: number
  readonly minute: number
  readonly second: number
}

/**
 * A raw filter value converted into a field's canonical representation.
 */
export type CoercedValue = string | number | boolean | Date | TimeOfDay | null

/**
 * Operand of a `$mod` comparison.
 */
export interface ModOperand {
  readonly divisor: number
  readonly remainder: number
}

// =============================================================================
// Predicate Types
// =============================================================================

/**
 * Ordering and equality comparison operators.
 */
export type ValueComparisonOp = 'eq' | 'ne' | 'lt' | 'lte' | 'gt' | 'gte'

/**
 * Every comparison operator a leaf can carry.
 */
export type ComparisonOp = ValueComparisonOp | 'like' | 'in' | 'mod' | 'isNull' | 'notNull'

interface ComparisonBase {
  readonly kind: 'comparison'
  readonly field: ScalarField
  /** Internal dotted path of the field, relative to the root model */
  readonly path: string
}

export interface ValueComparison extends ComparisonBase {
  readonly op: ValueComparisonOp
  readonly value: CoercedValue
}

export interface LikeComparison extends ComparisonBase {
  readonly op: 'like'
  /** Pattern with `%` wildcards on both sides */
  readonly value: string
}

export interface InComparison extends ComparisonBase {
  readonly op: 'in'
  readonly value: readonly CoercedValue[]
}

export interface ModComparison extends ComparisonBase {
  readonly op: 'mod'
  readonly value: ModOperand
}

export interface NullComparison extends ComparisonBase {
  readonly op: 'isNull' | 'notNull'
  readonly value: null
}

/**
 * A primitive predicate over one scalar field.
 */
export type ComparisonNode =
  | ValueComparison
  | LikeComparison
  | InComparison
  | ModComparison
  | NullComparison

export interface AndNode {
  readonly kind: 'and'
  /** An empty list is the constant true */
  readonly children: readonly PredicateNode[]
}

export interface OrNode {
  readonly kind: 'or'
  readonly children: readonly PredicateNode[]
}

export interface NotNode {
  readonly kind: 'not'
  readonly child: PredicateNode
}

/**
 * Existential quantifier over a relation.
 *
 * For `many` relations: at least one related row satisfies `inner`.
 * For `one` relations: the related row is present and satisfies `inner`.
 */
export interface ExistsNode {
  readonly kind: 'exists'
  readonly relation: RelationField
  readonly cardinality: Cardinality
  /** Internal dotted path of the relation, relative to the root model */
  readonly path: string
  readonly inner: PredicateNode
}

/**
 * Boolean predicate tree produced by the compiler.
 */
export type PredicateNode = AndNode | OrNode | NotNode | ExistsNode | ComparisonNode

// =============================================================================
// Option Types
// =============================================================================

/**
 * Decides whether a dotted field path may be filtered on.
 */
export type WhitelistFn = (path: string) => boolean

/**
 * Supplies mandatory predicates for a relation path.
 */
export type NestedConditionsFn = (
  path: string
) => PredicateNode | readonly PredicateNode[] | null | undefined

/**
 * Converts an external dotted key into the model's internal dotted key.
 * Returning `null` or `undefined` marks the key as unknown.
 */
export type KeyTranslator = (path: string) => string | null | undefined

/**
 * Formats a message template with named variables.
 */
export type MessageFormatter = (
  template: string,
  variables?: Readonly<Record<string, string | number>>
) => string

/**
 * Debug logger interface.
 */
export interface DebugLogger {
  /**
   * Log a debug message.
   * @param message - The message to log
   * @param data - Optional data to include
   */
  (message: string, data?: Record<string, unknown>): void
}

/**
 * Options accepted by {@link compileFilter}.
 */
export interface CompileOptions {
  /**
   * Paths that may be filtered on. A list is matched against internal,
   * index-stripped paths of resolvable fields; a function receives the same
   * path. `null` or omitted allows every resolvable path.
   */
  whitelist?: readonly string[] | WhitelistFn | null

  /**
   * Predicates ANDed into every existential scope opened for a relation
   * path (e.g. `tracks.playlists`), whether or not the filter references
   * that relation's fields directly.
   */
  nestedConditions?:
    | Readonly<Record<string, PredicateNode | readonly PredicateNode[]>>
    | NestedConditionsFn
    | null

  /**
   * Converts external key names (e.g. `unitPrice`) to internal field names
   * (e.g. `unit_price`). Identity when omitted.
   */
  keyTranslator?: KeyTranslator | null

  /**
   * Maximum number of pending work items. Guards against overly large or
   * deeply nested documents. `0`, `null` or omitted means no limit.
   */
  complexityLimit?: number | null

  /**
   * Formats error messages, e.g. to plug in a translation catalog.
   */
  formatMessage?: MessageFormatter

  /**
   * Enable debug logging.
   * Can be boolean or a custom logger function.
   * @default false
   */
  debug?: boolean | DebugLogger
}
