import type { Track, TrackArtist } from '@root/types/playlist-sync.types.js'
import { toSpotifyId } from '@utils/spotify-id.js'

/**
 * Read-only lookup of excluded artists
 */
export interface BlacklistStore {
  contains(artist: TrackArtist): boolean
}

export interface BlacklistEntry {
  id?: string
  name?: string
}

export interface BlacklistResult {
  kept: Track[]
  excluded: Track[]
}

/**
 * Case- and diacritic-insensitive form of an artist name
 *
 * @example
 * normalizeArtistName('Beyoncé') // 'beyonce'
 */
export function normalizeArtistName(name: string): string {
  return name
    .normalize('NFD')
    .replace(/\p{M}/gu, '')
    .toLowerCase()
    .trim()
}

/**
 * Blacklist backed by configured entries. An entry matches an artist by ID
 * (bare ID or `spotify:artist:` URI) or by normalized name.
 */
export class ConfigBlacklistStore implements BlacklistStore {
  private readonly ids: Set<string>
  private readonly names: Set<string>

  constructor(entries: readonly BlacklistEntry[]) {
    this.ids = new Set(
      entries.flatMap((entry) => (entry.id ? [toSpotifyId(entry.id)] : [])),
    )
    this.names = new Set(
      entries.flatMap((entry) =>
        entry.name ? [normalizeArtistName(entry.name)] : [],
      ),
    )
  }

  get size(): number {
    return this.ids.size + this.names.size
  }

  contains(artist: TrackArtist): boolean {
    if (artist.id && this.ids.has(toSpotifyId(artist.id))) {
      return true
    }
    return this.names.has(normalizeArtistName(artist.name))
  }
}

/**
 * Splits tracks by whether their lead (first credited) artist is
 * blacklisted. Featured artists are not checked. Tracks without artists
 * are kept. Order is preserved on both sides.
 */
export function applyBlacklist(
  tracks: readonly Track[],
  store: BlacklistStore,
): BlacklistResult {
  const kept: Track[] = []
  const excluded: Track[] = []

  for (const track of tracks) {
    const lead = track.artists[0]
    if (lead && store.contains(lead)) {
      excluded.push(track)
    } else {
      kept.push(track)
    }
  }

  return { kept, excluded }
}
