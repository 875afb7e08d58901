/**
 * @file Compile Options
 *
 * Validates {@link CompileOptions} and normalizes them into the plain
 * functions the compiler calls during traversal. Also merges per-call
 * overrides over compiler-level defaults.
 *
 * @module mql-compiler/factory/compile-options
 */

import { z } from 'zod'
import { FilterOptionsError } from '../errors.js'
import { createDebugLogger } from '../logging/debug-logger.js'
import { defaultFormatMessage } from '../messages.js'
import { isPredicateNode } from '../predicate/builders.js'
import { tryResolvePath } from '../query/path-resolver.js'
import type {
  CompileOptions,
  DebugLogger,
  KeyTranslator,
  MessageFormatter,
  NestedConditionsFn,
  PredicateNode,
  SchemaModel,
  WhitelistFn,
} from '../types/index.js'

// =============================================================================
// Validation Schema
// =============================================================================

function isFunction(value: unknown): boolean {
  return typeof value === 'function'
}

const predicateSchema = z.custom<PredicateNode>(isPredicateNode, {
  message: 'Expected a predicate node',
})

/**
 * Zod schema for {@link CompileOptions}. Unknown keys are rejected so that
 * misspelled options (e.g. `whiteList`) do not silently disable a policy.
 */
export const compileOptionsSchema = z
  .object({
    whitelist: z
      .union([
        z.array(z.string()),
        z.custom<WhitelistFn>(isFunction, { message: 'Expected a list of paths or a function' }),
      ])
      .nullable()
      .optional(),
    nestedConditions: z
      .union([
        z.record(z.string(), z.union([predicateSchema, z.array(predicateSchema)])),
        z.custom<NestedConditionsFn>(isFunction, { message: 'Expected a map or a function' }),
      ])
      .nullable()
      .optional(),
    keyTranslator: z
      .custom<KeyTranslator>(isFunction, { message: 'Expected a function' })
      .nullable()
      .optional(),
    complexityLimit: z.number().int().nonnegative().nullable().optional(),
    formatMessage: z
      .custom<MessageFormatter>(isFunction, { message: 'Expected a function' })
      .optional(),
    debug: z
      .union([z.boolean(), z.custom<DebugLogger>(isFunction, { message: 'Expected a function' })])
      .optional(),
  })
  .strict()

// =============================================================================
// Resolved Options
// =============================================================================

/**
 * Options normalized into the functions used during a compile.
 */
export interface ResolvedCompileOptions {
  /** Receives an internal, index-stripped dotted path */
  isWhitelisted(path: string): boolean
  /** Receives an internal, index-stripped relation path */
  nestedConditionsFor(path: string): PredicateNode[]
  /** Returns `null` when the key is unknown */
  translateKey(path: string): string | null
  /** `null` when unlimited */
  complexityLimit: number | null
  formatMessage: MessageFormatter
  log: DebugLogger
  /** Whether `log` goes anywhere; guards building expensive log data */
  debugEnabled: boolean
}

function toPredicateList(path: string, value: unknown): PredicateNode[] {
  if (value === null || value === undefined) {
    return []
  }
  const list: unknown[] = Array.isArray(value) ? value : [value]
  return list.map((item) => {
    if (!isPredicateNode(item)) {
      throw new FilterOptionsError(`Invalid nested conditions for '${path}'`, [
        `${path}: Expected a predicate node`,
      ])
    }
    return item
  })
}

/**
 * Validates and normalizes compile options.
 *
 * @param rootModel - Model the whitelist list is checked against
 * @throws FilterOptionsError if an option has the wrong shape
 *
 * @example
 * ```typescript
 * const resolved = resolveCompileOptions(Album, { whitelist: ['tracks.name'] })
 * resolved.isWhitelisted('tracks.name')  // true
 * resolved.isWhitelisted('tracks.bytes') // false
 * ```
 */
export function resolveCompileOptions(
  rootModel: SchemaModel,
  options: CompileOptions = {}
): ResolvedCompileOptions {
  const result = compileOptionsSchema.safeParse(options)
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    )
    throw new FilterOptionsError(`Invalid compile options: ${issues.join('; ')}`, issues)
  }

  const { whitelist, nestedConditions, keyTranslator, complexityLimit } = result.data

  let isWhitelisted: (path: string) => boolean
  if (typeof whitelist === 'function') {
    isWhitelisted = (path) => whitelist(path) === true
  } else if (Array.isArray(whitelist)) {
    const allowed = new Set(whitelist)
    // Listed paths must also resolve, so stale entries grant nothing
    isWhitelisted = (path) => allowed.has(path) && tryResolvePath(rootModel, path) !== null
  } else {
    isWhitelisted = (path) => path !== ''
  }

  let nestedConditionsFor: (path: string) => PredicateNode[]
  if (typeof nestedConditions === 'function') {
    nestedConditionsFor = (path) => toPredicateList(path, nestedConditions(path))
  } else if (nestedConditions) {
    nestedConditionsFor = (path) =>
      toPredicateList(path, Object.hasOwn(nestedConditions, path) ? nestedConditions[path] : undefined)
  } else {
    nestedConditionsFor = () => []
  }

  const translateKey = (path: string): string | null => {
    if (!keyTranslator) {
      return path
    }
    const translated = keyTranslator(path)
    return typeof translated === 'string' ? translated : null
  }

  return {
    isWhitelisted,
    nestedConditionsFor,
    translateKey,
    // 0 means no limit
    complexityLimit: complexityLimit || null,
    formatMessage: result.data.formatMessage ?? defaultFormatMessage,
    log: createDebugLogger(result.data.debug),
    debugEnabled: Boolean(result.data.debug),
  }
}

// =============================================================================
// Merging
// =============================================================================

/**
 * Merges per-call overrides over default options. Override keys whose value
 * is `undefined` keep the default; `null` clears it, which for `whitelist`
 * and `nestedConditions` drops the policy entirely.
 *
 * @example
 * ```typescript
 * mergeCompileOptions({ complexityLimit: 50, debug: true }, { complexityLimit: 10 })
 * // { complexityLimit: 10, debug: true }
 * ```
 */
export function mergeCompileOptions(
  defaults: CompileOptions,
  overrides: CompileOptions = {}
): CompileOptions {
  const merged: CompileOptions = { ...defaults }
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value })
    }
  }
  return merged
}
