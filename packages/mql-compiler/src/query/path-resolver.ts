/**
 * @file Path Resolver
 *
 * Resolves dotted attribute paths (e.g. `tracks.playlists.name`) against a
 * root model into the ordered chain of field descriptors they traverse.
 *
 * Crossing a relation moves resolution into the related model. A purely
 * numeric segment directly after a relation (`tracks.0.name`) is a legacy
 * list-index placeholder: it is accepted so that such paths normalize to
 * their index-free form, but it never selects an element.
 *
 * @module mql-compiler/query/path-resolver
 */

import { FieldError, UnknownFieldError } from '../errors.js'
import { defaultFormatMessage, MESSAGES } from '../messages.js'
import type { FieldDescriptor, MessageFormatter, SchemaModel } from '../types/index.js'
import { describeFieldPathProblem, isIndexSegment } from './field-path-sanitization.js'

// =============================================================================
// Types
// =============================================================================

/**
 * One resolved segment of a dotted path.
 */
export interface ResolvedSegment {
  /** The segment as written in the path */
  readonly name: string
  /** The field it resolved to, `null` for an index placeholder */
  readonly field: FieldDescriptor | null
  /** The model the segment was looked up on */
  readonly model: SchemaModel
}

/**
 * Context used when reporting resolution failures.
 */
export interface ResolveContext {
  /** User-facing path reported in errors; defaults to the resolved path */
  dataKey?: string
  formatMessage?: MessageFormatter
}

type WalkResult =
  | { ok: true; segments: ResolvedSegment[] }
  | { ok: false; reason: 'invalid_path'; problem: string }
  | { ok: false; reason: 'unknown_field'; segment: string; model: SchemaModel }

// =============================================================================
// Resolution
// =============================================================================

function walkPath(root: SchemaModel, path: string): WalkResult {
  if (path === '') {
    return { ok: true, segments: [] }
  }

  const problem = describeFieldPathProblem(path)
  if (problem !== null) {
    return { ok: false, reason: 'invalid_path', problem }
  }

  const segments: ResolvedSegment[] = []
  let model = root
  let current: FieldDescriptor | null = null

  for (const name of path.split('.')) {
    // Scalars have no members
    if (current?.kind === 'scalar') {
      return { ok: false, reason: 'unknown_field', segment: name, model }
    }
    if (current?.kind === 'relation') {
      model = current.target
      if (isIndexSegment(name)) {
        segments.push({ name, field: null, model })
        continue
      }
    }

    const field = model.getField(name)
    if (!field) {
      return { ok: false, reason: 'unknown_field', segment: name, model }
    }
    segments.push({ name, field, model })
    current = field
  }

  if (segments[segments.length - 1]?.field === null) {
    return { ok: false, reason: 'invalid_path', problem: 'path ends in a list index' }
  }

  return { ok: true, segments }
}

/**
 * Resolves an internal dotted path against `root`.
 *
 * The empty path resolves to no segments (the root model itself).
 *
 * @throws FieldError with code `invalid_field_path` for malformed paths
 * @throws UnknownFieldError if a segment is not declared on its model
 *
 * @example
 * ```typescript
 * const segments = resolvePath(Album, 'tracks.playlists.playlist_id')
 * segments.map((s) => s.field?.kind) // ['relation', 'relation', 'scalar']
 * ```
 */
export function resolvePath(
  root: SchemaModel,
  path: string,
  context: ResolveContext = {}
): ResolvedSegment[] {
  const result = walkPath(root, path)
  if (result.ok) {
    return result.segments
  }

  const formatMessage = context.formatMessage ?? defaultFormatMessage
  const dataKey = context.dataKey ?? path

  if (result.reason === 'invalid_path') {
    throw new FieldError(formatMessage(MESSAGES.invalid_field_path, { reason: result.problem }), {
      dataKey,
      filter: null,
      op: null,
      code: 'invalid_field_path',
      details: { reason: result.problem },
    })
  }

  throw new UnknownFieldError(formatMessage(MESSAGES.unknown_field, { field: dataKey }), {
    dataKey,
    filter: null,
    op: null,
    details: { segment: result.segment, model: result.model.name },
  })
}

/**
 * Like {@link resolvePath}, but returns `null` when the path does not resolve.
 */
export function tryResolvePath(root: SchemaModel, path: string): ResolvedSegment[] | null {
  const result = walkPath(root, path)
  return result.ok ? result.segments : null
}

// =============================================================================
// Segment Helpers
// =============================================================================

/**
 * Returns the indices of the segments that cross into a related model.
 *
 * @example
 * ```typescript
 * relationCrossings(resolvePath(Album, 'artist.name'))      // [0]
 * relationCrossings(resolvePath(Album, 'tracks.0.bytes'))   // [0]
 * relationCrossings(resolvePath(Album, 'title'))            // []
 * ```
 */
export function relationCrossings(segments: readonly ResolvedSegment[]): number[] {
  const crossings: number[] = []
  segments.forEach((segment, index) => {
    if (segment.field?.kind === 'relation') {
      crossings.push(index)
    }
  })
  return crossings
}

/**
 * Returns the descriptor of the last segment, or `null` for the empty path.
 */
export function leafField(segments: readonly ResolvedSegment[]): FieldDescriptor | null {
  return segments[segments.length - 1]?.field ?? null
}
