/**
 * @file Filter Semantics Tests
 *
 * Evaluates compiled predicates against an in-memory album catalog to check
 * what filters mean: per-key scopes versus `$elemMatch`, logical identities,
 * operator behavior over relations, and the complexity limit.
 */

import { describe, it, expect } from 'vitest'
import { ComplexityExceededError, FieldError, InvalidFilterError } from '../../src/errors'
import { compileFilter } from '../../src/query/predicate-compiler'
import type { CompileOptions, FilterDocument } from '../../src/types'
import { filterRows, type Row } from '../helpers/evaluate'
import { Album } from '../helpers/fixtures'

// =============================================================================
// Test Data
// =============================================================================

const albums: Row[] = [
  {
    album_id: 1,
    title: 'Night Ferry',
    released: new Date(Date.UTC(2015, 2, 11)),
    artist: { artist_id: 1, name: 'The Lanterns' },
    tracks: [
      {
        track_id: 1,
        name: 'Ember',
        bytes: 100,
        explicit: true,
        playlists: [{ playlist_id: 1, name: 'Road' }],
      },
      { track_id: 2, name: 'Drift', bytes: 900, explicit: false, playlists: [] },
    ],
  },
  {
    album_id: 2,
    title: 'Low Tide',
    released: null,
    artist: null,
    tracks: [
      {
        track_id: 3,
        name: 'Ember',
        bytes: 900,
        explicit: false,
        playlists: [{ playlist_id: 2, name: 'Focus' }],
      },
    ],
  },
  {
    album_id: 3,
    title: 'Quiet Rooms',
    released: new Date(Date.UTC(2020, 0, 1)),
    artist: { artist_id: 2, name: 'Glass Orchard' },
    tracks: [],
  },
]

function ids(filter: unknown, options?: CompileOptions): unknown[] {
  return filterRows(compileFilter(Album, filter, options), albums).map((album) => album.album_id)
}

function permutations<T>(items: readonly T[]): T[][] {
  if (items.length <= 1) {
    return [[...items]]
  }
  return items.flatMap((item, index) =>
    permutations([...items.slice(0, index), ...items.slice(index + 1)]).map((rest) => [item, ...rest])
  )
}

// =============================================================================
// Relation Scopes
// =============================================================================

describe('relation scopes', () => {
  it('should let sibling keys match different related rows', () => {
    expect(ids({ 'tracks.name': 'Ember', 'tracks.bytes': 900 })).toEqual([1, 2])
  })

  it('should require one related row to satisfy a whole $elemMatch', () => {
    expect(ids({ tracks: { $elemMatch: { name: 'Ember', bytes: 900 } } })).toEqual([2])
    expect(ids({ tracks: { $elemMatch: { name: 'Ember', bytes: 100 } } })).toEqual([1])
  })

  it('should quantify across several relations', () => {
    expect(ids({ 'tracks.playlists.name': 'Focus' })).toEqual([2])
  })

  it('should not match to-one relations that are absent', () => {
    expect(ids({ 'artist.name': { $ne: 'The Lanterns' } })).toEqual([3])
  })

  it('should test relations for presence', () => {
    expect(ids({ tracks: { $exists: true } })).toEqual([1, 2])
    expect(ids({ tracks: { $exists: false } })).toEqual([3])
    expect(ids({ artist: { $exists: true } })).toEqual([1, 3])
  })

  it('should combine scopes under $or', () => {
    expect(ids({ $or: [{ 'tracks.playlists.name': 'Focus' }, { 'artist.name': 'Glass Orchard' }] })).toEqual([2, 3])
  })
})

// =============================================================================
// Identities
// =============================================================================

describe('identities', () => {
  it('should not depend on key order', () => {
    const entries: [string, unknown][] = [
      ['title', { $ne: 'Low Tide' }],
      ['tracks.name', 'Ember'],
      ['album_id', { $lt: 3 }],
    ]

    for (const order of permutations(entries)) {
      expect(ids(Object.fromEntries(order))).toEqual([1])
    }
  })

  it('should compile a bare value like $eq', () => {
    expect(compileFilter(Album, { title: 'Night Ferry' })).toEqual(
      compileFilter(Album, { title: { $eq: 'Night Ferry' } })
    )
    expect(compileFilter(Album, { 'tracks.name': 'Ember' })).toEqual(
      compileFilter(Album, { 'tracks.name': { $eq: 'Ember' } })
    )
  })

  it('should cancel double negation', () => {
    expect(ids({ $not: { $not: { title: 'Night Ferry' } } })).toEqual(ids({ title: 'Night Ferry' }))
  })

  it('should compile $nor exactly as $not of $or', () => {
    const documents: FilterDocument[] = [{ title: 'Night Ferry' }, { album_id: 3 }]

    expect(compileFilter(Album, { $nor: documents })).toEqual(compileFilter(Album, { $not: { $or: documents } }))
    expect(ids({ $nor: documents })).toEqual([2])
  })

  it('should match everything for empty or absent documents', () => {
    expect(ids({})).toEqual([1, 2, 3])
    expect(ids(null)).toEqual([1, 2, 3])
  })
})

// =============================================================================
// Operators
// =============================================================================

describe('operators', () => {
  it('should test membership', () => {
    expect(ids({ 'tracks.track_id': { $in: [2, 3] } })).toEqual([1, 2])
    expect(ids({ album_id: { $nin: [1, 2] } })).toEqual([3])
  })

  it('should test moduli', () => {
    expect(ids({ album_id: { $mod: [2, 1] } })).toEqual([1, 3])
  })

  it('should match substrings', () => {
    expect(ids({ 'artist.name': { $like: 'Orch' } })).toEqual([3])
  })

  it('should compare coerced dates', () => {
    expect(ids({ released: { $gte: '2016-01-01' } })).toEqual([3])
    expect(ids({ released: { $exists: false } })).toEqual([2])
  })

  it('should compare coerced booleans', () => {
    expect(ids({ 'tracks.explicit': 'true' })).toEqual([1])
  })

  it.each([[[2.2, 4]], [[2, 4.4]]])('should reject $mod %j', (value) => {
    expect(() => compileFilter(Album, { album_id: { $mod: value } })).toThrow(
      '$mod value must be a list of two integers.'
    )
  })

  it('should reject a non-list $in', () => {
    expect(() => compileFilter(Album, { album_id: { $in: 1 } })).toThrow('$in and $nin values must be a list.')
  })
})

// =============================================================================
// Complexity Limit
// =============================================================================

describe('complexity limit', () => {
  function complexityError(filter: unknown, complexityLimit: number): ComplexityExceededError {
    try {
      compileFilter(Album, filter, { complexityLimit })
    } catch (error) {
      if (error instanceof ComplexityExceededError) {
        return error
      }
      throw error
    }
    throw new Error('Expected a ComplexityExceededError')
  }

  it('should bound the pending work of a compile', () => {
    const filter = { title: 'Night Ferry', album_id: 1 }

    // Peaks at four pending items
    expect(complexityError(filter, 3).limit).toBe(3)
    expect(ids(filter, { complexityLimit: 4 })).toEqual([1])
  })

  it('should reject a two-key document under a limit of one', () => {
    const filter = { title: 'Night Ferry', album_id: 1 }

    expect(complexityError(filter, 1).limit).toBe(1)
    expect(ids(filter, { complexityLimit: 100 })).toEqual([1])
  })

  it('should reject documents that are too wide', () => {
    const filter = { $or: Array.from({ length: 20 }, (_, index) => ({ album_id: index })) }

    expect(complexityError(filter, 10).message).toBe('This query is too complex.')
    expect(ids(filter)).toEqual([1, 2, 3])
  })

  it('should reject documents that are too deep', () => {
    let filter: FilterDocument = { title: 'Night Ferry' }
    for (let depth = 0; depth < 10; depth++) {
      filter = { $not: filter }
    }

    expect(complexityError(filter, 5).code).toBe('complexity_exceeded')
    expect(ids(filter)).toEqual([1])
  })

  it('should compile very deep documents when no limit is set', () => {
    let negated: FilterDocument = { title: 'Night Ferry' }
    let conjoined: FilterDocument = { title: 'Night Ferry' }
    for (let depth = 0; depth < 20000; depth++) {
      negated = { $not: negated }
      conjoined = { $and: [conjoined] }
    }

    expect(compileFilter(Album, negated)?.kind).toBe('not')
    expect(compileFilter(Album, conjoined)?.kind).toBe('comparison')
  })

  it('should treat a limit of zero as no limit', () => {
    const filter = { $or: Array.from({ length: 20 }, (_, index) => ({ album_id: index })) }
    expect(ids(filter, { complexityLimit: 0 })).toEqual([1, 2, 3])
  })

  it('should not be a field error', () => {
    const error = complexityError({ title: 'A', album_id: 1 }, 1)

    expect(error).toBeInstanceOf(InvalidFilterError)
    expect(error).not.toBeInstanceOf(FieldError)
  })
})
