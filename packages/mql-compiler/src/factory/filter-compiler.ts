/**
 * @file Filter Compiler Factory
 *
 * Binds a root model and default {@link CompileOptions} into a reusable
 * compiler, e.g. one per API resource. Per-call overrides are merged over
 * the defaults.
 *
 * @example
 * ```typescript
 * const albums = createFilterCompiler({
 *   model: schema.model('Album'),
 *   whitelist: ['title', 'tracks.name', 'tracks.track_id'],
 *   complexityLimit: 100,
 * })
 *
 * albums.compile(JSON.parse(request.query.filter))
 * albums.apply(filter, tenantScope, { debug: true })
 * ```
 *
 * @module mql-compiler/factory/filter-compiler
 */

import { applyFilter, compileFilter } from '../query/predicate-compiler.js'
import type { CompileOptions, PredicateNode, SchemaModel } from '../types/index.js'
import { mergeCompileOptions, resolveCompileOptions } from './compile-options.js'

/**
 * Configuration for {@link createFilterCompiler}.
 */
export interface FilterCompilerConfig extends CompileOptions {
  /** Root model every filter is resolved against */
  model: SchemaModel
}

/**
 * A compiler bound to one root model.
 */
export interface FilterCompiler {
  readonly model: SchemaModel
  /** Default options, as passed at creation */
  readonly defaults: Readonly<CompileOptions>
  /**
   * Compiles a filter document.
   * @returns `null` when `filter` is absent
   */
  compile(filter: unknown, overrides?: CompileOptions): PredicateNode | null
  /**
   * Compiles a filter document and ANDs it onto `base`.
   */
  apply(filter: unknown, base?: PredicateNode | null, overrides?: CompileOptions): PredicateNode
}

/**
 * Creates a filter compiler.
 *
 * The default options are validated immediately, so a misconfigured compiler
 * fails at startup rather than on its first request.
 *
 * Overrides replace defaults key by key. An override of `null` clears the
 * default, so `{ whitelist: null }` or `{ nestedConditions: null }` removes
 * that policy for the call; pass only trusted overrides.
 *
 * @throws FilterOptionsError if the default options are malformed
 */
export function createFilterCompiler(config: FilterCompilerConfig): FilterCompiler {
  const { model, ...defaults } = config
  resolveCompileOptions(model, defaults)

  return {
    model,
    defaults,
    compile(filter, overrides) {
      return compileFilter(model, filter, mergeCompileOptions(defaults, overrides))
    },
    apply(filter, base, overrides) {
      return applyFilter(model, filter, { ...mergeCompileOptions(defaults, overrides), base })
    },
  }
}
