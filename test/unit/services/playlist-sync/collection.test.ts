import type {
  FingerprintCollection,
  Track,
} from '@root/types/playlist-sync.types.js'
import {
  classify,
  emptyCollection,
  insert,
} from '@services/playlist-sync/fingerprint/index.js'
import { describe, expect, it } from 'vitest'
import { makeTrack } from '../../../fixtures/tracks.js'

const ids = (collection: FingerprintCollection) => ({
  full: collection.full.map((f) => f.sourceTrackId),
  distinct: collection.distinct.map((f) => f.sourceTrackId),
  duplicates: collection.duplicates.map((f) => f.sourceTrackId),
})

const tracks: Track[] = [
  makeTrack('a', { catalogCode: 'C1' }),
  makeTrack('b', { catalogCode: 'C2' }),
  makeTrack('a-remaster', { catalogCode: 'C1', name: 'Other Title' }),
  makeTrack('c', { catalogCode: 'C3' }),
  makeTrack('b-again', { catalogCode: 'C2' }),
  makeTrack('a-third', { catalogCode: 'C1' }),
]

describe('classify', () => {
  it('should return an empty collection for no tracks', () => {
    expect(ids(classify([]))).toEqual({ full: [], distinct: [], duplicates: [] })
  })

  it('should keep first occurrences in order and collect later collisions', () => {
    expect(ids(classify(tracks))).toEqual({
      full: ['a', 'b', 'a-remaster', 'c', 'b-again', 'a-third'],
      distinct: ['a', 'b', 'c'],
      duplicates: ['a-remaster', 'b-again', 'a-third'],
    })
  })

  it('should account for every track exactly once', () => {
    const collection = classify(tracks)

    expect(collection.distinct.length + collection.duplicates.length).toBe(
      collection.full.length,
    )
    expect(collection.identities.size).toBe(collection.distinct.length)
  })

  it('should hold only distinct identities in distinct', () => {
    const keys = classify(tracks).distinct.map((f) => f.identityKey)
    expect(new Set(keys).size).toBe(keys.length)
  })
})

describe('insert', () => {
  it('should report whether the identity was new', () => {
    const first = insert(emptyCollection(), tracks[0])
    const second = insert(first.collection, tracks[2])

    expect(first.wasNew).toBe(true)
    expect(second.wasNew).toBe(false)
  })

  it('should not modify the collection it was given', () => {
    const base = classify(tracks.slice(0, 2))
    const before = ids(base)

    insert(base, tracks[3])
    insert(base, tracks[2])

    expect(ids(base)).toEqual(before)
    expect(base.identities.size).toBe(2)
  })

  it('should match classify when folded over the same tracks', () => {
    const folded = tracks.reduce(
      (collection, track) => insert(collection, track).collection,
      emptyCollection(),
    )
    const batch = classify(tracks)

    expect(ids(folded)).toEqual(ids(batch))
    expect([...folded.identities]).toEqual([...batch.identities])
  })
})
