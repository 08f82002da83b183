import type {
  FingerprintCollection,
  InsertResult,
  Track,
  TrackFingerprint,
} from '@root/types/playlist-sync.types.js'
import { fingerprintOf } from './fingerprint.js'

const EMPTY: FingerprintCollection = Object.freeze({
  full: Object.freeze([]),
  distinct: Object.freeze([]),
  duplicates: Object.freeze([]),
  identities: new Set<string>(),
})

export function emptyCollection(): FingerprintCollection {
  return EMPTY
}

/**
 * Fingerprints every track and splits them into first occurrences and
 * later collisions. `distinct.length + duplicates.length === full.length`.
 */
export function classify(tracks: Iterable<Track>): FingerprintCollection {
  const full: TrackFingerprint[] = []
  const distinct: TrackFingerprint[] = []
  const duplicates: TrackFingerprint[] = []
  const identities = new Set<string>()

  for (const track of tracks) {
    const fingerprint = fingerprintOf(track)
    full.push(fingerprint)
    if (identities.has(fingerprint.identityKey)) {
      duplicates.push(fingerprint)
    } else {
      identities.add(fingerprint.identityKey)
      distinct.push(fingerprint)
    }
  }

  return { full, distinct, duplicates, identities }
}

/**
 * Adds one track without touching the given collection.
 * Folding `insert` over a list yields the same collection as `classify`.
 */
export function insert(
  collection: FingerprintCollection,
  track: Track,
): InsertResult {
  const fingerprint = fingerprintOf(track)
  const full = [...collection.full, fingerprint]

  if (collection.identities.has(fingerprint.identityKey)) {
    return {
      collection: {
        full,
        distinct: collection.distinct,
        duplicates: [...collection.duplicates, fingerprint],
        identities: collection.identities,
      },
      wasNew: false,
    }
  }

  const identities = new Set(collection.identities)
  identities.add(fingerprint.identityKey)
  return {
    collection: {
      full,
      distinct: [...collection.distinct, fingerprint],
      duplicates: collection.duplicates,
      identities,
    },
    wasNew: true,
  }
}
