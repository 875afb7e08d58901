/**
 * @file Filter Compilation Error Classes
 *
 * Structured errors raised while compiling a filter document. Every
 * rejection of the filter itself extends {@link InvalidFilterError}; errors
 * tied to a specific field carry the dotted data key, the offending filter
 * fragment, the operator and a stable `code` suitable for programmatic
 * handling or localization.
 *
 * @example
 * ```typescript
 * try {
 *   compileFilter(Album, { 'tracks.track_id': { $in: 7 } })
 * } catch (error) {
 *   if (error instanceof FieldError) {
 *     console.log(error.code, error.dataKey) // 'invalid_in_comp' 'tracks.track_id'
 *   }
 * }
 * ```
 */

// =============================================================================
// Error Codes
// =============================================================================

/**
 * Stable codes for field-level errors.
 */
export type FieldErrorCode =
  | 'invalid_op'
  | 'invalid_in_comp'
  | 'invalid_mod_values'
  | 'invalid_relation_comp'
  | 'invalid_attr_comp'
  | 'invalid_empty_comp'
  | 'invalid_elem_match'
  | 'data_conversion_error'
  | 'invalid_logical_comp'
  | 'invalid_field_path'
  | 'unknown_field'
  | 'invalid_whitelist_permission'

// =============================================================================
// Base Error
// =============================================================================

/**
 * Base class for every error caused by an invalid filter document.
 */
export class InvalidFilterError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidFilterError'

    // Maintains proper stack trace for where error was thrown (V8 engines)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target)
    }
  }
}

/**
 * Raised when the pending work exceeds the configured complexity limit.
 * Aborts the whole compile.
 */
export class ComplexityExceededError extends InvalidFilterError {
  readonly code = 'complexity_exceeded'

  /** The limit that was exceeded */
  readonly limit: number

  constructor(message: string, limit: number) {
    super(message)
    this.name = 'ComplexityExceededError'
    this.limit = limit
  }
}

// =============================================================================
// Field Errors
// =============================================================================

/**
 * Context describing where a field error happened.
 */
export interface FieldErrorOptions {
  /** Dotted, user-facing path the error applies to */
  dataKey: string
  /** Filter fragment applied to `dataKey` */
  filter: unknown
  /** Operator being applied, `null` for implicit equality or relation matches */
  op: string | null
  code: FieldErrorCode
  /** Any additional context */
  details?: Record<string, unknown>
}

/**
 * Error related to a specific field of the filter document.
 */
export class FieldError extends InvalidFilterError {
  readonly dataKey: string
  readonly filter: unknown
  readonly op: string | null
  readonly code: FieldErrorCode
  readonly details: Record<string, unknown>

  constructor(message: string, options: FieldErrorOptions) {
    super(message)
    this.name = 'FieldError'
    this.dataKey = options.dataKey
    this.filter = options.filter
    this.op = options.op
    this.code = options.code
    this.details = options.details ?? {}
  }
}

/**
 * Raised when the whitelist rejects a field path.
 */
export class FieldPermissionError extends FieldError {
  constructor(message: string, options: Omit<FieldErrorOptions, 'code'>) {
    super(message, { ...options, code: 'invalid_whitelist_permission' })
    this.name = 'FieldPermissionError'
  }
}

/**
 * Raised when a path segment does not exist on the model it is looked up on.
 */
export class UnknownFieldError extends FieldError {
  constructor(message: string, options: Omit<FieldErrorOptions, 'code'>) {
    super(message, { ...options, code: 'unknown_field' })
    this.name = 'UnknownFieldError'
  }
}

// =============================================================================
// Internal and Configuration Errors
// =============================================================================

/**
 * Raised by value coercion. Carries no path context; the operator evaluator
 * re-wraps it as a `data_conversion_error` {@link FieldError}.
 */
export class TypeConversionError extends Error {
  readonly value: unknown
  readonly targetType: string

  constructor(message: string, value: unknown, targetType: string) {
    super(message)
    this.name = 'TypeConversionError'
    this.value = value
    this.targetType = targetType
  }
}

/**
 * Raised when compile options fail validation.
 */
export class FilterOptionsError extends Error {
  /** Human-readable validation issues */
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(message)
    this.name = 'FilterOptionsError'
    this.issues = issues
  }
}

/**
 * Raised when a schema definition is malformed.
 */
export class SchemaDefinitionError extends Error {
  /** Human-readable validation issues */
  readonly issues: string[]

  constructor(message: string, issues: string[]) {
    super(message)
    this.name = 'SchemaDefinitionError'
    this.issues = issues
  }
}
