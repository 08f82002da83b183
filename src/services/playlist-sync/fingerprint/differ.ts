import type {
  FingerprintCollection,
  TrackFingerprint,
} from '@root/types/playlist-sync.types.js'

/**
 * Distinct fingerprints of `reference` that `other` does not hold,
 * in the reference's first-occurrence order
 */
export function missingFrom(
  reference: FingerprintCollection,
  other: FingerprintCollection,
): TrackFingerprint[] {
  return reference.distinct.filter(
    (fingerprint) => !other.identities.has(fingerprint.identityKey),
  )
}
