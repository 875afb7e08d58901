/**
 * @file Path Resolver Tests
 */

import { describe, it, expect } from 'vitest'
import { FieldError, UnknownFieldError } from '../../src/errors'
import {
  leafField,
  relationCrossings,
  resolvePath,
  tryResolvePath,
} from '../../src/query/path-resolver'
import { Album, Employee } from '../helpers/fixtures'

describe('resolvePath', () => {
  it('should resolve a scalar on the root model', () => {
    const segments = resolvePath(Album, 'title')

    expect(segments).toHaveLength(1)
    expect(segments[0]?.field).toMatchObject({ kind: 'scalar', name: 'title', valueType: 'text' })
    expect(segments[0]?.model.name).toBe('Album')
  })

  it('should advance into related models', () => {
    const segments = resolvePath(Album, 'tracks.playlists.playlist_id')

    expect(segments.map((segment) => segment.field?.kind)).toEqual(['relation', 'relation', 'scalar'])
    expect(segments.map((segment) => segment.model.name)).toEqual(['Album', 'Track', 'Playlist'])
  })

  it('should resolve the empty path to the root itself', () => {
    expect(resolvePath(Album, '')).toEqual([])
  })

  it('should treat numeric segments after a relation as placeholders', () => {
    const segments = resolvePath(Album, 'tracks.0.name')

    expect(segments.map((segment) => segment.name)).toEqual(['tracks', '0', 'name'])
    expect(segments[1]?.field).toBeNull()
    expect(segments[1]?.model.name).toBe('Track')
    expect(segments[2]?.field).toMatchObject({ kind: 'scalar', model: 'Track', name: 'name' })
  })

  it('should follow self-referencing relations', () => {
    const segments = resolvePath(Employee, 'manager.manager.first_name')

    expect(segments.map((segment) => segment.model.name)).toEqual(['Employee', 'Employee', 'Employee'])
    expect(leafField(segments)).toMatchObject({ kind: 'scalar', name: 'first_name' })
  })

  it('should fail with UnknownFieldError for undeclared fields', () => {
    try {
      resolvePath(Album, 'tracks.composer')
      expect.unreachable('resolvePath should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(UnknownFieldError)
      expect(error).toMatchObject({
        code: 'unknown_field',
        dataKey: 'tracks.composer',
        message: 'Unknown field: tracks.composer.',
        details: { segment: 'composer', model: 'Track' },
      })
    }
  })

  it('should report the supplied data key', () => {
    expect(() => resolvePath(Album, 'tracks.composer', { dataKey: 'Tracks.Composer' })).toThrow(
      'Unknown field: Tracks.Composer.'
    )
  })

  it('should not resolve members of a scalar', () => {
    expect(() => resolvePath(Album, 'title.title')).toThrow(UnknownFieldError)
  })

  it('should not resolve a numeric segment on a model', () => {
    expect(() => resolvePath(Album, '0.title')).toThrow(UnknownFieldError)
  })

  it('should reject paths ending in an index placeholder', () => {
    try {
      resolvePath(Album, 'tracks.0')
      expect.unreachable('resolvePath should have thrown')
    } catch (error) {
      expect(error).toBeInstanceOf(FieldError)
      expect(error).toMatchObject({
        code: 'invalid_field_path',
        details: { reason: 'path ends in a list index' },
      })
    }
  })

  it('should never resolve inherited object members', () => {
    expect(() => resolvePath(Album, 'toString')).toThrow(UnknownFieldError)
    expect(() => resolvePath(Album, 'hasOwnProperty')).toThrow(UnknownFieldError)
  })
})

describe('tryResolvePath', () => {
  it('should return null instead of throwing', () => {
    expect(tryResolvePath(Album, 'tracks.composer')).toBeNull()
    expect(tryResolvePath(Album, 'tracks..name')).toBeNull()
  })

  it('should return segments for valid paths', () => {
    expect(tryResolvePath(Album, 'artist.name')?.map((segment) => segment.name)).toEqual(['artist', 'name'])
  })
})

describe('relationCrossings', () => {
  it('should list the indices of relation segments', () => {
    expect(relationCrossings(resolvePath(Album, 'artist.name'))).toEqual([0])
    expect(relationCrossings(resolvePath(Album, 'tracks.playlists.name'))).toEqual([0, 1])
    expect(relationCrossings(resolvePath(Album, 'title'))).toEqual([])
  })

  it('should skip index placeholders', () => {
    expect(relationCrossings(resolvePath(Album, 'tracks.0.playlists.1.name'))).toEqual([0, 2])
  })

  it('should include a trailing relation', () => {
    expect(relationCrossings(resolvePath(Album, 'tracks'))).toEqual([0])
  })
})

describe('leafField', () => {
  it('should return null for the root', () => {
    expect(leafField([])).toBeNull()
  })

  it('should return the last descriptor', () => {
    expect(leafField(resolvePath(Album, 'artist'))).toMatchObject({ kind: 'relation', cardinality: 'one' })
  })
})
