/**
 * @file Field Path Sanitization
 *
 * Field paths arrive from untrusted filter documents and are looked up on
 * schema models segment by segment. This module rejects paths that could
 * never name a declared field but could reach something else.
 *
 * Rejected segments:
 * - Empty segments (double dots, leading/trailing dots)
 * - Segments starting with $ (operator tokens are never field names)
 * - __proto__, constructor and prototype (prototype pollution)
 * - Null bytes and other control characters
 *
 * @see https://owasp.org/www-project-web-security-testing-guide/latest/4-Web_Application_Security_Testing/07-Input_Validation_Testing/05.6-Testing_for_NoSQL_Injection
 *
 * @module mql-compiler/query/field-path-sanitization
 */

import { FieldError } from '../errors.js'
import { defaultFormatMessage, MESSAGES } from '../messages.js'
import type { MessageFormatter } from '../types/index.js'

// =============================================================================
// Constants for Validation
// =============================================================================

/**
 * Regex pattern for control characters (ASCII 0-31, including null byte, tab, newline, etc.)
 */
const CONTROL_CHARS_REGEX = /[\x00-\x1F]/

/**
 * List of dangerous prototype pollution property names (case-insensitive)
 */
const DANGEROUS_PROPERTIES = ['__proto__', 'constructor', 'prototype']

/**
 * Purely numeric segments are legacy list-index placeholders.
 */
const INDEX_SEGMENT_REGEX = /^\d+$/

// =============================================================================
// Field Path Validation Functions
// =============================================================================

/**
 * Describes what is wrong with a single path segment, or returns `null`.
 */
function describeSegmentProblem(segment: string): string | null {
  if (segment === '') {
    return 'empty path segment'
  }

  if (segment.startsWith('$')) {
    return `segment '${segment}' starts with '$'`
  }

  if (CONTROL_CHARS_REGEX.test(segment)) {
    return 'contains control characters'
  }

  const lowerSegment = segment.toLowerCase()
  if (DANGEROUS_PROPERTIES.includes(lowerSegment)) {
    return `segment '${segment}' is a reserved property name`
  }

  return null
}

/**
 * Describes what is wrong with a dotted field path, or returns `null` when
 * the path is safe to resolve.
 *
 * @example
 * ```typescript
 * describeFieldPathProblem('tracks.playlists.name') // null
 * describeFieldPathProblem('tracks..name')          // 'empty path segment'
 * describeFieldPathProblem('user.__proto__')        // "segment '__proto__' is a reserved property name"
 * ```
 */
export function describeFieldPathProblem(path: string): string | null {
  for (const segment of path.split('.')) {
    const problem = describeSegmentProblem(segment)
    if (problem !== null) {
      return problem
    }
  }
  return null
}

/**
 * Validates a dotted field path.
 *
 * @param path - Internal dotted path to validate
 * @param dataKey - User-facing path reported in the error
 * @throws FieldError with code `invalid_field_path`
 */
export function validateFieldPath(
  path: string,
  dataKey: string = path,
  formatMessage: MessageFormatter = defaultFormatMessage
): void {
  const problem = describeFieldPathProblem(path)
  if (problem !== null) {
    throw new FieldError(formatMessage(MESSAGES.invalid_field_path, { reason: problem }), {
      dataKey,
      filter: null,
      op: null,
      code: 'invalid_field_path',
      details: { reason: problem },
    })
  }
}

/**
 * Checks whether a segment is a legacy list-index placeholder such as `0`.
 */
export function isIndexSegment(segment: string): boolean {
  return INDEX_SEGMENT_REGEX.test(segment)
}

/**
 * Removes list-index placeholders from a dotted path.
 *
 * @example
 * ```typescript
 * stripIndexSegments('tracks.0.playlists.1.playlist_id') // 'tracks.playlists.playlist_id'
 * ```
 */
export function stripIndexSegments(path: string): string {
  return path
    .split('.')
    .filter((segment) => !isIndexSegment(segment))
    .join('.')
}
