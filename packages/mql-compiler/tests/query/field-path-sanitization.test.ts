/**
 * @file Field Path Sanitization Tests
 *
 * Dotted keys come straight from untrusted filter documents. Paths that could
 * reach operators or prototype members instead of declared fields must be
 * rejected before they are resolved, translated or whitelisted.
 *
 * @see https://owasp.org/www-project-web-security-testing-guide/latest/4-Web_Application_Security_Testing/07-Input_Validation_Testing/05.6-Testing_for_NoSQL_Injection
 */

import { describe, it, expect, vi } from 'vitest'
import { FieldError } from '../../src/errors'
import {
  describeFieldPathProblem,
  isIndexSegment,
  stripIndexSegments,
  validateFieldPath,
} from '../../src/query/field-path-sanitization'
import { compileFilter } from '../../src/query/predicate-compiler'
import { Album } from '../helpers/fixtures'

// =============================================================================
// Test Helpers
// =============================================================================

function fieldPathError(fn: () => unknown): FieldError {
  try {
    fn()
  } catch (error) {
    if (error instanceof FieldError) {
      return error
    }
    throw error
  }
  throw new Error('Expected a FieldError')
}

// =============================================================================
// Dollar Sign Prefix Tests
// =============================================================================

describe('Field Path Sanitization: Dollar Sign Prefix ($)', () => {
  it('should reject a nested segment starting with $', () => {
    expect(describeFieldPathProblem('tracks.$where')).toBe("segment '$where' starts with '$'")
  })

  it('should reject operator injection inside a dotted key', () => {
    const error = fieldPathError(() => compileFilter(Album, { 'tracks.$gt': 5 }))

    expect(error.code).toBe('invalid_field_path')
    expect(error.dataKey).toBe('tracks.$gt')
    expect(error.message).toBe("Invalid field path: segment '$gt' starts with '$'.")
  })
})

// =============================================================================
// Prototype Pollution Tests
// =============================================================================

describe('Field Path Sanitization: Prototype Pollution', () => {
  it.each(['__proto__', 'constructor', 'prototype'])('should reject %s', (segment) => {
    expect(describeFieldPathProblem(`tracks.${segment}`)).toBe(
      `segment '${segment}' is a reserved property name`
    )
  })

  it('should reject reserved names regardless of case', () => {
    expect(describeFieldPathProblem('__PROTO__')).toBe("segment '__PROTO__' is a reserved property name")
    expect(describeFieldPathProblem('Constructor')).toBe("segment 'Constructor' is a reserved property name")
  })

  it('should reject constructor keys before they reach the key translator', () => {
    const keyTranslator = vi.fn((path: string) => path)

    const error = fieldPathError(() =>
      compileFilter(Album, { 'constructor.name': 'x' }, { keyTranslator })
    )

    expect(error.code).toBe('invalid_field_path')
    expect(keyTranslator).not.toHaveBeenCalled()
  })
})

// =============================================================================
// Empty Segments and Control Characters
// =============================================================================

describe('Field Path Sanitization: Malformed Segments', () => {
  it.each(['tracks..name', '.tracks', 'tracks.', ''])('should reject %j as having an empty segment', (path) => {
    expect(describeFieldPathProblem(path)).toBe('empty path segment')
  })

  it.each(['na\x00me', 'name\t', 'na\nme', '\x1b'])('should reject control characters in %j', (path) => {
    expect(describeFieldPathProblem(path)).toBe('contains control characters')
  })

  it('should accept ordinary dotted paths', () => {
    expect(describeFieldPathProblem('tracks.playlists.playlist_id')).toBeNull()
    expect(describeFieldPathProblem('tracks.0.name')).toBeNull()
  })
})

// =============================================================================
// validateFieldPath
// =============================================================================

describe('validateFieldPath', () => {
  it('should report the user-facing data key', () => {
    const error = fieldPathError(() => validateFieldPath('tracks..name', 'Tracks..Name'))

    expect(error.dataKey).toBe('Tracks..Name')
    expect(error.details).toEqual({ reason: 'empty path segment' })
  })

  it('should use the supplied message formatter', () => {
    const error = fieldPathError(() =>
      validateFieldPath('a..b', 'a..b', (template) => `translated: ${template}`)
    )

    expect(error.message).toBe('translated: Invalid field path: {reason}.')
  })

  it('should not throw for valid paths', () => {
    expect(() => validateFieldPath('title')).not.toThrow()
  })
})

// =============================================================================
// Index Segments
// =============================================================================

describe('index segments', () => {
  it('should recognize purely numeric segments', () => {
    expect(isIndexSegment('0')).toBe(true)
    expect(isIndexSegment('12')).toBe(true)
    expect(isIndexSegment('1a')).toBe(false)
    expect(isIndexSegment('-1')).toBe(false)
  })

  it('should strip index segments from a path', () => {
    expect(stripIndexSegments('tracks.0.playlists.1.playlist_id')).toBe('tracks.playlists.playlist_id')
    expect(stripIndexSegments('title')).toBe('title')
  })
})
