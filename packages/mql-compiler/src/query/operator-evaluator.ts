/**
 * @file Operator Evaluator
 *
 * Turns one `(operator, field, value)` triple into a primitive predicate.
 * The operator set is closed; anything outside {@link FIELD_OPERATORS} is
 * rejected with `invalid_op`.
 *
 * @see https://www.mongodb.com/docs/manual/reference/operator/query/
 *
 * @module mql-compiler/query/operator-evaluator
 */

import { coerceValue } from '../coercion/type-coercion.js'
import { FieldError, type FieldErrorCode, TypeConversionError } from '../errors.js'
import { MESSAGES } from '../messages.js'
import { TRUE, compare, exists, isNull, not, notNull } from '../predicate/builders.js'
import type {
  CoercedValue,
  FieldDescriptor,
  FieldOperator,
  MessageFormatter,
  PredicateNode,
  ScalarField,
  ScalarType,
  ValueComparisonOp,
} from '../types/index.js'

// =============================================================================
// Operator Set
// =============================================================================

/**
 * Every field-level operator token.
 */
export const FIELD_OPERATORS = [
  '$eq',
  '$ne',
  '$lt',
  '$lte',
  '$gt',
  '$gte',
  '$in',
  '$nin',
  '$mod',
  '$like',
  '$exists',
] as const satisfies readonly FieldOperator[]

const FIELD_OPERATOR_SET: ReadonlySet<string> = new Set(FIELD_OPERATORS)

const VALUE_COMPARISONS: Record<'$eq' | '$ne' | '$lt' | '$lte' | '$gt' | '$gte', ValueComparisonOp> = {
  $eq: 'eq',
  $ne: 'ne',
  $lt: 'lt',
  $lte: 'lte',
  $gt: 'gt',
  $gte: 'gte',
}

/**
 * Checks whether a token is a field-level operator.
 */
export function isFieldOperator(token: string): token is FieldOperator {
  return FIELD_OPERATOR_SET.has(token)
}

// =============================================================================
// Evaluation
// =============================================================================

/**
 * Where an operator is being applied.
 */
export interface OperatorContext {
  /** User-facing dotted path, reported in errors */
  dataKey: string
  /** Internal dotted path, recorded on the produced nodes */
  path: string
  formatMessage: MessageFormatter
}

class Evaluation {
  constructor(
    private readonly op: string,
    private readonly value: unknown,
    private readonly context: OperatorContext
  ) {}

  error(code: FieldErrorCode, message: string): FieldError {
    return new FieldError(this.context.formatMessage(message), {
      dataKey: this.context.dataKey,
      filter: this.value,
      op: this.op,
      code,
    })
  }

  /**
   * Coerces a value, re-wrapping conversion failures with path context.
   */
  coerce(value: unknown, targetType: ScalarType): CoercedValue {
    try {
      return coerceValue(value, targetType)
    } catch (error) {
      if (error instanceof TypeConversionError) {
        throw this.error('data_conversion_error', MESSAGES.data_conversion_error)
      }
      throw error
    }
  }
}

function evaluateScalar(
  op: FieldOperator,
  field: ScalarField,
  value: unknown,
  evaluation: Evaluation,
  path: string
): PredicateNode {
  switch (op) {
    case '$eq':
    case '$ne':
    case '$lt':
    case '$lte':
    case '$gt':
    case '$gte':
      return compare(field, VALUE_COMPARISONS[op], evaluation.coerce(value, field.valueType), path)

    case '$like': {
      if (
        typeof value !== 'string' &&
        typeof value !== 'number' &&
        typeof value !== 'boolean' &&
        typeof value !== 'bigint'
      ) {
        throw evaluation.error('data_conversion_error', MESSAGES.data_conversion_error)
      }
      return compare(field, 'like', `%${String(value)}%`, path)
    }

    case '$in':
    case '$nin': {
      if (!Array.isArray(value)) {
        throw evaluation.error('invalid_in_comp', MESSAGES.invalid_in_comp)
      }
      const values = value.map((item: unknown) => evaluation.coerce(item, field.valueType))
      const membership = compare(field, 'in', values, path)
      return op === '$nin' ? not(membership) : membership
    }

    case '$mod': {
      if (field.valueType !== 'int') {
        throw evaluation.error('invalid_op', MESSAGES.invalid_mod_field)
      }
      if (!Array.isArray(value) || value.length !== 2) {
        throw evaluation.error('invalid_mod_values', MESSAGES.invalid_mod_values)
      }
      const [divisor, remainder]: unknown[] = value
      if (
        typeof divisor !== 'number' ||
        typeof remainder !== 'number' ||
        !Number.isSafeInteger(divisor) ||
        !Number.isSafeInteger(remainder)
      ) {
        throw evaluation.error('invalid_mod_values', MESSAGES.invalid_mod_values)
      }
      if (divisor === 0) {
        throw evaluation.error('invalid_mod_values', MESSAGES.invalid_mod_divisor)
      }
      return compare(field, 'mod', { divisor, remainder }, path)
    }

    case '$exists':
      return evaluation.coerce(value, 'bool') === true ? notNull(field, path) : isNull(field, path)
  }
}

/**
 * Evaluates a field-level operator into a predicate.
 *
 * Scalar fields accept every operator; relation fields accept only
 * `$exists`, which tests whether any related row is present.
 *
 * @throws FieldError with codes `invalid_op`, `invalid_in_comp`,
 *   `invalid_mod_values`, `invalid_relation_comp` or `data_conversion_error`
 *
 * @example
 * ```typescript
 * evaluateOperator('$gt', trackId, '17', { dataKey: 'trackId', path: 'track_id', formatMessage })
 * // { kind: 'comparison', op: 'gt', value: 17, path: 'track_id', field: trackId }
 * ```
 */
export function evaluateOperator(
  op: string,
  target: FieldDescriptor,
  value: unknown,
  context: OperatorContext
): PredicateNode {
  const evaluation = new Evaluation(op, value, context)

  if (!isFieldOperator(op)) {
    throw evaluation.error('invalid_op', MESSAGES.invalid_op)
  }

  if (target.kind === 'scalar') {
    return evaluateScalar(op, target, value, evaluation, context.path)
  }

  if (op !== '$exists') {
    throw evaluation.error('invalid_relation_comp', MESSAGES.invalid_relation_comp)
  }

  const anyRelated = exists(target, TRUE, context.path)
  return evaluation.coerce(value, 'bool') === true ? anyRelated : not(anyRelated)
}
