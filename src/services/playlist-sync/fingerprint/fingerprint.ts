/**
 * Track Fingerprint
 *
 * Derives the content identity of a recording from catalog metadata. Catalog
 * duplicates, remasters and regional variants carry different track IDs (and
 * often cosmetically different titles) but share recording code, credited
 * artists and duration, so those three form the identity.
 *
 * When a track has no recording code the identity falls back to normalized
 * title + artists + duration. Fallback keys live in their own namespace and
 * can only match other fallback keys.
 */

import type { Track, TrackFingerprint } from '@root/types/playlist-sync.types.js'

const FEATURE_CREDIT_BRACKETED =
  /\s*[([]\s*(?:feat\.?|featuring|ft\.)\s[^)\]]*[)\]]/gi
const FEATURE_CREDIT_TRAILING = /\s+(?:feat\.?|featuring|ft\.)\s.*$/i
const EDITION_SUFFIX = /\s+-\s+(?:radio edit|remastered(?:\s+\d{4})?)$/i

/**
 * Lower-cases a title and strips feature credits and edition suffixes
 *
 * @example
 * normalizeTitle('Song (feat. Someone) - Remastered') // 'song'
 */
export function normalizeTitle(title: string): string {
  return title
    .toLowerCase()
    .replace(FEATURE_CREDIT_BRACKETED, '')
    .replace(FEATURE_CREDIT_TRAILING, '')
    .replace(EDITION_SUFFIX, '')
    .replace(/\s+/g, ' ')
    .trim()
}

export function durationBucket(durationMs: number): number {
  return Math.trunc(durationMs / 1000)
}

export function buildIdentityKey(
  catalogCode: string | null,
  normalizedTitle: string,
  baseArtistNames: readonly string[],
  durationBucketSeconds: number,
): string {
  return catalogCode
    ? JSON.stringify(['code', catalogCode, baseArtistNames, durationBucketSeconds])
    : JSON.stringify([
        'title',
        normalizedTitle,
        baseArtistNames,
        durationBucketSeconds,
      ])
}

export function fingerprintOf(track: Track): TrackFingerprint {
  const catalogCode = track.catalogCode?.trim().toUpperCase() || null
  const normalizedTitle = normalizeTitle(track.name)
  const baseArtistNames = track.artists.map((artist) =>
    artist.name.toLowerCase(),
  )
  const durationBucketSeconds = durationBucket(track.durationMs)

  return Object.freeze({
    catalogCode,
    normalizedTitle,
    baseArtistNames: Object.freeze(baseArtistNames),
    durationBucketSeconds,
    sourceTrackId: track.id,
    identityKey: buildIdentityKey(
      catalogCode,
      normalizedTitle,
      baseArtistNames,
      durationBucketSeconds,
    ),
  })
}
