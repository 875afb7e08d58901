/**
 * @file Test Fixtures
 *
 * A small music catalog schema shared by the test suites.
 *
 * Artist 1-* Album 1-* Track *-* Playlist, plus a self-referencing
 * Employee model for to-one chains.
 */

import { defineSchema } from '../../src/schema/define-schema'

export const catalog = defineSchema({
  Artist: {
    fields: {
      artist_id: 'int',
      name: 'text',
      albums: { relation: 'Album', cardinality: 'many' },
    },
  },
  Album: {
    fields: {
      album_id: 'int',
      title: 'text',
      released: 'date',
      artist: { relation: 'Artist', cardinality: 'one' },
      tracks: { relation: 'Track', cardinality: 'many' },
    },
  },
  Track: {
    fields: {
      track_id: 'int',
      name: 'text',
      milliseconds: 'int',
      bytes: 'int',
      unit_price: 'float',
      explicit: 'bool',
      album: { relation: 'Album', cardinality: 'one' },
      playlists: { relation: 'Playlist', cardinality: 'many' },
    },
  },
  Playlist: {
    fields: {
      playlist_id: 'int',
      name: 'text',
      tracks: { relation: 'Track', cardinality: 'many' },
    },
  },
  Employee: {
    fields: {
      employee_id: 'int',
      first_name: 'text',
      title: 'text',
      hired_at: 'datetime',
      shift_start: 'time',
      manager: { relation: 'Employee', cardinality: 'one' },
      reports: { relation: 'Employee', cardinality: 'many' },
    },
  },
})

export const Artist = catalog.model('Artist')
export const Album = catalog.model('Album')
export const Track = catalog.model('Track')
export const Playlist = catalog.model('Playlist')
export const Employee = catalog.model('Employee')
