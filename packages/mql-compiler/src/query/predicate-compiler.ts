/**
 * @file Filter Document Compiler
 *
 * Compiles a MongoDB-style filter document into a {@link PredicateNode} tree
 * over a relational schema.
 *
 * Traversal is iterative: a work stack holds pending filter fragments and
 * pop sentinels, so the whole compile is bounded by `complexityLimit`
 * regardless of how wide or deep the document is. Alongside it the compiler
 * keeps:
 *
 * - the open path stack (external and translated segments of the keys
 *   currently being processed),
 * - the boundary stack (paths at which an existential scope is open),
 * - the scope frame stack (compound nodes under construction).
 *
 * Dotted keys that cross a relation are rewritten into `$elemMatch` scopes,
 * one relation at a time. Sibling keys never share a scope unless they sit
 * inside an explicit `$elemMatch`, so `{ 'tracks.name': 'A', 'tracks.bytes': 1 }`
 * may be satisfied by two different tracks.
 *
 * @example
 * ```typescript
 * const predicate = compileFilter(Album, {
 *   title: 'Night Ferry',
 *   tracks: { $elemMatch: { name: { $like: 'Harbor' }, milliseconds: { $gt: 200000 } } },
 * })
 * formatPredicate(predicate)
 * // '(title = "Night Ferry" AND ANY tracks (tracks.name LIKE "%Harbor%" AND tracks.milliseconds > 200000))'
 * ```
 *
 * @module mql-compiler/query/predicate-compiler
 */

import { ComplexityExceededError, FieldError, FieldPermissionError, UnknownFieldError } from '../errors.js'
import type { FieldErrorCode } from '../errors.js'
import { resolveCompileOptions } from '../factory/compile-options.js'
import type { ResolvedCompileOptions } from '../factory/compile-options.js'
import { MESSAGES } from '../messages.js'
import { TRUE, and, exists, isTrue, not, or } from '../predicate/builders.js'
import { formatPredicate } from '../predicate/format.js'
import type {
  CompileOptions,
  FilterDocument,
  PredicateNode,
  RelationField,
  SchemaModel,
} from '../types/index.js'
import { stripIndexSegments, validateFieldPath } from './field-path-sanitization.js'
import { evaluateOperator, isFieldOperator } from './operator-evaluator.js'
import { leafField, relationCrossings, resolvePath } from './path-resolver.js'

// =============================================================================
// Traversal State
// =============================================================================

/**
 * One entry of the open path stack.
 */
interface PathEntry {
  /** Segments as written in the filter document */
  readonly external: readonly string[]
  /** Segments after key translation */
  readonly internal: readonly string[]
}

/**
 * A compound node under construction.
 */
type ScopeFrame =
  | {
      readonly combinator: 'and' | 'or' | 'not'
      readonly accumulated: PredicateNode[]
    }
  | {
      readonly combinator: 'exists'
      readonly relation: RelationField
      /** Internal, index-stripped path of the relation */
      readonly path: string
      readonly accumulated: PredicateNode[]
    }

type WorkItem =
  | { readonly type: 'fragment'; readonly fragment: FilterDocument }
  | { readonly type: 'popPath' }
  | { readonly type: 'popBoundary' }
  | { readonly type: 'popFrame' }

const ROOT_ENTRY: PathEntry = { external: [], internal: [] }

const POP_PATH: WorkItem = { type: 'popPath' }
const POP_BOUNDARY: WorkItem = { type: 'popBoundary' }
const POP_FRAME: WorkItem = { type: 'popFrame' }

function fragmentItem(fragment: FilterDocument): WorkItem {
  return { type: 'fragment', fragment }
}

interface ErrorContext {
  dataKey: string
  filter: unknown
  op: string | null
}

// =============================================================================
// Document Shape Helpers
// =============================================================================

/**
 * Checks whether a value is a filter mapping: a plain object, as produced by
 * `JSON.parse` or an object literal. Dates, arrays and class instances are
 * values, not mappings.
 */
export function isFilterMapping(value: unknown): value is FilterDocument {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false
  }
  const prototype: unknown = Object.getPrototypeOf(value)
  return prototype === Object.prototype || prototype === null
}

function isFilterList(value: unknown): value is FilterDocument[] {
  return Array.isArray(value) && value.every(isFilterMapping)
}

function mergeEntries(entries: readonly PathEntry[]): PathEntry {
  return {
    external: entries.flatMap((entry) => entry.external),
    internal: entries.flatMap((entry) => entry.internal),
  }
}

/**
 * Rewrites one sub-key of a mapping compared against a bare relation key.
 */
function relationMatch(subKey: string, value: unknown): FilterDocument {
  if (subKey === '$elemMatch' || subKey === '$exists') {
    return { [subKey]: value }
  }
  return { $elemMatch: { [subKey]: value } }
}

function closeFrame(frame: ScopeFrame): PredicateNode {
  switch (frame.combinator) {
    case 'and':
      return and(...frame.accumulated)
    case 'or':
      return or(...frame.accumulated)
    case 'not':
      return not(frame.accumulated[0] ?? TRUE)
    case 'exists':
      return exists(frame.relation, and(...frame.accumulated), frame.path)
  }
}

// =============================================================================
// Boundary Manager
// =============================================================================

class BoundaryManager {
  private readonly work: WorkItem[] = []
  private readonly paths: PathEntry[] = [ROOT_ENTRY]
  private readonly boundaries: PathEntry[] = [ROOT_ENTRY]
  private readonly frames: ScopeFrame[] = [{ combinator: 'and', accumulated: [] }]

  constructor(
    private readonly rootModel: SchemaModel,
    private readonly options: ResolvedCompileOptions
  ) {}

  run(document: FilterDocument): PredicateNode {
    this.work.push(fragmentItem(document))

    while (this.work.length > 0) {
      this.checkComplexity()
      const item = this.work.pop()
      if (item === undefined) {
        break
      }

      switch (item.type) {
        case 'fragment':
          this.processFragment(item.fragment)
          break
        case 'popPath':
          this.paths.pop()
          break
        case 'popBoundary':
          this.boundaries.pop()
          break
        case 'popFrame':
          this.closeCurrentFrame()
          break
      }
    }

    return and(...this.currentFrame().accumulated)
  }

  // ---------------------------------------------------------------------------
  // Stack Helpers
  // ---------------------------------------------------------------------------

  private checkComplexity(): void {
    const limit = this.options.complexityLimit
    if (limit !== null && this.work.length > limit) {
      throw new ComplexityExceededError(
        this.options.formatMessage(MESSAGES.complexity_exceeded),
        limit
      )
    }
  }

  private currentFrame(): ScopeFrame {
    const frame = this.frames[this.frames.length - 1]
    if (!frame) {
      throw new Error('Scope frame stack is empty')
    }
    return frame
  }

  private openFrame(frame: ScopeFrame): void {
    this.frames.push(frame)
    this.work.push(POP_FRAME)
  }

  private closeCurrentFrame(): void {
    const frame = this.frames.pop()
    if (!frame) {
      throw new Error('Scope frame stack is empty')
    }
    this.currentFrame().accumulated.push(closeFrame(frame))
  }

  /**
   * Pushes fragments so that they are processed in the given order.
   */
  private pushFragments(fragments: readonly FilterDocument[]): void {
    for (let i = fragments.length - 1; i >= 0; i--) {
      const fragment = fragments[i]
      if (fragment) {
        this.work.push(fragmentItem(fragment))
      }
    }
  }

  private openExternal(): string[] {
    return this.paths.flatMap((entry) => entry.external)
  }

  private openInternal(): string[] {
    return this.paths.flatMap((entry) => entry.internal)
  }

  private error(code: FieldErrorCode, template: string, context: ErrorContext, variables?: Record<string, string>): FieldError {
    return new FieldError(this.options.formatMessage(template, variables), { ...context, code })
  }

  // ---------------------------------------------------------------------------
  // Fragment Processing
  // ---------------------------------------------------------------------------

  private processFragment(fragment: FilterDocument): void {
    const [key, ...rest] = Object.keys(fragment)
    if (key === undefined) {
      return
    }

    if (rest.length > 0) {
      this.openFrame({ combinator: 'and', accumulated: [] })
      this.pushFragments([key, ...rest].map((name) => ({ [name]: fragment[name] })))
      return
    }

    const value = fragment[key]
    switch (key) {
      case '$and':
      case '$or':
        this.processLogicalList(key, value)
        return
      case '$nor':
        this.processNor(value)
        return
      case '$not':
        this.processNot(value)
        return
      case '$elemMatch':
        this.processElemMatch(value)
        return
      default:
        if (key.startsWith('$')) {
          this.processOperator(key, value)
        } else {
          this.processField(key, value)
        }
    }
  }

  private expectList(op: string, value: unknown): FilterDocument[] {
    if (!isFilterList(value)) {
      throw this.error(
        'invalid_logical_comp',
        MESSAGES.invalid_logical_list,
        { dataKey: this.openExternal().join('.'), filter: value, op },
        { op }
      )
    }
    return value
  }

  private processLogicalList(op: '$and' | '$or', value: unknown): void {
    const documents = this.expectList(op, value)
    this.openFrame({ combinator: op === '$and' ? 'and' : 'or', accumulated: [] })
    this.pushFragments(documents)
  }

  private processNor(value: unknown): void {
    const documents = this.expectList('$nor', value)
    this.openFrame({ combinator: 'not', accumulated: [] })
    this.work.push(fragmentItem({ $or: documents }))
  }

  private processNot(value: unknown): void {
    if (!isFilterMapping(value)) {
      throw this.error(
        'invalid_logical_comp',
        MESSAGES.invalid_logical_object,
        { dataKey: this.openExternal().join('.'), filter: value, op: '$not' },
        { op: '$not' }
      )
    }
    this.openFrame({ combinator: 'not', accumulated: [] })
    this.work.push(fragmentItem(value))
  }

  /**
   * Opens an existential scope on the relation named by the open path.
   */
  private processElemMatch(value: unknown): void {
    const dataKey = this.openExternal().join('.')
    const context: ErrorContext = { dataKey, filter: value, op: '$elemMatch' }

    if (this.paths.length <= this.boundaries.length || !isFilterMapping(value)) {
      throw this.error('invalid_elem_match', MESSAGES.invalid_elem_match, context)
    }

    const internalPath = this.openInternal().join('.')
    const relation = leafField(
      resolvePath(this.rootModel, internalPath, {
        dataKey,
        formatMessage: this.options.formatMessage,
      })
    )
    if (!relation || relation.kind !== 'relation') {
      throw this.error('invalid_elem_match', MESSAGES.invalid_elem_match, context)
    }

    const path = stripIndexSegments(internalPath)
    const nestedConditions = this.options.nestedConditionsFor(path)
    this.options.log('Opened relation scope', {
      path,
      cardinality: relation.cardinality,
      nestedConditions: nestedConditions.length,
    })

    this.boundaries.push(mergeEntries(this.paths.slice(this.boundaries.length)))
    this.work.push(POP_BOUNDARY)
    this.openFrame({ combinator: 'exists', relation, path, accumulated: [...nestedConditions] })
    this.work.push(fragmentItem(value))
  }

  /**
   * Applies a field-level operator to the open path.
   */
  private processOperator(op: string, value: unknown): void {
    const dataKey = this.openExternal().join('.')
    const context: ErrorContext = { dataKey, filter: value, op }

    if (!isFieldOperator(op)) {
      throw this.error('invalid_op', MESSAGES.invalid_op, context)
    }

    const internalPath = this.openInternal().join('.')
    const target = leafField(
      resolvePath(this.rootModel, internalPath, {
        dataKey,
        formatMessage: this.options.formatMessage,
      })
    )
    if (!target || (target.kind === 'relation' && op !== '$exists')) {
      throw this.error('invalid_relation_comp', MESSAGES.invalid_relation_comp, context)
    }

    this.currentFrame().accumulated.push(
      evaluateOperator(op, target, value, {
        dataKey,
        path: stripIndexSegments(internalPath),
        formatMessage: this.options.formatMessage,
      })
    )
  }

  /**
   * Handles a plain or dotted field key.
   *
   * Keys that stay within the innermost open scope push a path entry and
   * reprocess their value. Keys that cross a further relation are split at
   * the next crossing and rewritten as `$elemMatch` on that relation.
   */
  private processField(key: string, value: unknown): void {
    const { formatMessage } = this.options
    const keySegments = key.split('.')
    const openExternal = this.openExternal()
    const dataKey = [...openExternal, ...keySegments].join('.')

    validateFieldPath(key, dataKey, formatMessage)

    const translated = this.options.translateKey(dataKey)
    const internalKey = translated === null ? [] : translated.split('.').slice(-keySegments.length)
    if (internalKey.length !== keySegments.length) {
      throw new UnknownFieldError(formatMessage(MESSAGES.unknown_field, { field: dataKey }), {
        dataKey,
        filter: value,
        op: null,
        details: { translated },
      })
    }

    const openInternal = this.openInternal()
    const internalPath = [...openInternal, ...internalKey].join('.')

    if (!this.options.isWhitelisted(stripIndexSegments(internalPath))) {
      throw new FieldPermissionError(formatMessage(MESSAGES.invalid_whitelist_permission), {
        dataKey,
        filter: value,
        op: null,
      })
    }

    if (this.paths.length > this.boundaries.length) {
      throw this.error('invalid_attr_comp', MESSAGES.invalid_attr_comp, {
        dataKey: openExternal.join('.'),
        filter: { [key]: value },
        op: '$eq',
      })
    }

    const crossings = relationCrossings(
      resolvePath(this.rootModel, internalPath, { dataKey, formatMessage })
    )
    const nextCrossing = crossings.find((index) => index >= openInternal.length)

    if (nextCrossing === undefined) {
      this.paths.push({ external: keySegments, internal: internalKey })
      this.work.push(POP_PATH)
      this.work.push(fragmentItem(isFilterMapping(value) ? value : { $eq: value }))
      return
    }

    // Open the path up to and including the next relation
    const split = nextCrossing - openInternal.length + 1
    this.paths.push({
      external: keySegments.slice(0, split),
      internal: internalKey.slice(0, split),
    })
    this.work.push(POP_PATH)

    const subAttr = keySegments.slice(split).join('.')
    const isLastCrossing = nextCrossing === crossings[crossings.length - 1]

    if (isLastCrossing && isFilterMapping(value)) {
      if (subAttr !== '') {
        this.work.push(fragmentItem({ $elemMatch: { [subAttr]: value } }))
        return
      }
      const mapping: FilterDocument = value
      const subKeys = Object.keys(mapping)
      if (subKeys.length === 0) {
        throw this.error('invalid_empty_comp', MESSAGES.invalid_empty_comp, {
          dataKey,
          filter: mapping,
          op: null,
        })
      }
      this.openFrame({ combinator: 'and', accumulated: [] })
      this.pushFragments(subKeys.map((subKey) => relationMatch(subKey, mapping[subKey])))
      return
    }

    if (isLastCrossing && subAttr === '') {
      throw this.error('invalid_relation_comp', MESSAGES.invalid_relation_primitive, {
        dataKey,
        filter: value,
        op: null,
      })
    }

    this.work.push(fragmentItem({ $elemMatch: { [subAttr]: value } }))
  }
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Compiles a filter document into a predicate tree.
 *
 * @param rootModel - Model the document's keys are resolved against
 * @param document - Filter document, typically parsed from untrusted JSON
 * @param options - Whitelist, nested conditions, key translation and limits
 * @returns The compiled predicate, or `null` when `document` is absent. An
 *   empty document compiles to {@link TRUE}.
 *
 * @throws FilterOptionsError if `options` are malformed
 * @throws ComplexityExceededError if the pending work exceeds `complexityLimit`
 * @throws FieldError (or a subclass) for any invalid fragment; the first
 *   invalid fragment aborts the whole compile
 *
 * @example
 * ```typescript
 * compileFilter(Album, { 'tracks.playlists.playlist_id': 18 }, {
 *   whitelist: ['tracks.playlists.playlist_id'],
 *   complexityLimit: 50,
 * })
 * ```
 */
export function compileFilter(
  rootModel: SchemaModel,
  document: unknown,
  options: CompileOptions = {}
): PredicateNode | null {
  const resolved = resolveCompileOptions(rootModel, options)
  const { log } = resolved

  if (document === null || document === undefined) {
    log('No filter document supplied', { model: rootModel.name })
    return null
  }

  log('Compiling filter', { model: rootModel.name })

  try {
    if (!isFilterMapping(document)) {
      throw new FieldError(resolved.formatMessage(MESSAGES.invalid_filter_document), {
        dataKey: '',
        filter: document,
        op: null,
        code: 'invalid_logical_comp',
      })
    }

    const predicate = new BoundaryManager(rootModel, resolved).run(document)
    // Formatting recurses over the tree, so only render it for a live logger
    if (resolved.debugEnabled) {
      log('Compiled filter', { model: rootModel.name, predicate: formatPredicate(predicate) })
    }
    return predicate
  } catch (error) {
    if (error instanceof FieldError) {
      log('Rejected filter', { code: error.code, dataKey: error.dataKey })
    } else if (error instanceof ComplexityExceededError) {
      log('Rejected filter', { code: error.code, limit: error.limit })
    }
    throw error
  }
}

/**
 * Alias of {@link compileFilter}.
 */
export const compile = compileFilter

/**
 * Options for {@link applyFilter}.
 */
export interface ApplyFilterOptions extends CompileOptions {
  /** Predicate already constraining the query, e.g. a tenant scope */
  base?: PredicateNode | null
}

/**
 * Compiles a filter document and ANDs it onto an existing predicate.
 *
 * @returns `base` (or {@link TRUE}) when `document` is absent
 *
 * @example
 * ```typescript
 * const scoped = applyFilter(Employee, { title: 'Sound Engineer' }, {
 *   base: compare(Employee.scalar('department_id'), 'eq', 2, 'department_id'),
 * })
 * // (department_id = 2 AND title = "Sound Engineer")
 * ```
 */
export function applyFilter(
  rootModel: SchemaModel,
  document: unknown,
  options: ApplyFilterOptions = {}
): PredicateNode {
  const { base, ...compileOptions } = options
  const compiled = compileFilter(rootModel, document, compileOptions)

  if (!base || isTrue(base)) {
    return compiled ?? TRUE
  }
  return compiled === null ? base : and(base, compiled)
}
