import type { Track, TrackAlbum } from '@root/types/playlist-sync.types.js'
import type {
  SpotifyAlbum,
  SpotifySimplifiedTrack,
  SpotifyTrack,
} from '@schemas/spotify/spotify.schema.js'
import type { CatalogAlbum } from '@root/types/spotify.types.js'

/**
 * Maps a Spotify track to the engine's `Track`. Simplified album tracks
 * have no album reference of their own, so the caller supplies it.
 * Local files have no catalog ID and are identified by URI.
 */
export function toTrack(
  raw: SpotifyTrack | SpotifySimplifiedTrack,
  album?: TrackAlbum,
): Track {
  const ownAlbum = 'album' in raw ? raw.album : undefined
  return {
    id: raw.id ?? raw.uri,
    name: raw.name,
    durationMs: raw.duration_ms,
    catalogCode: raw.external_ids?.isrc ?? null,
    artists: raw.artists.map((artist) => ({
      id: artist.id ?? null,
      name: artist.name,
    })),
    album: album ??
      (ownAlbum
        ? { id: ownAlbum.id ?? null, name: ownAlbum.name }
        : { id: null, name: '' }),
    isLocal: raw.is_local ?? raw.id === null,
    linkedFromId: raw.linked_from?.id ?? null,
  }
}

export function toCatalogAlbum(raw: SpotifyAlbum): CatalogAlbum {
  const album = { id: raw.id, name: raw.name }
  return {
    id: raw.id,
    name: raw.name,
    tracks: {
      items: raw.tracks.items.map((track) => toTrack(track, album)),
      next: raw.tracks.next,
    },
  }
}

export function toTrackUri(trackId: string): string {
  return trackId.startsWith('spotify:') ? trackId : `spotify:track:${trackId}`
}
