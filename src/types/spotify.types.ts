import type { Track } from '@root/types/playlist-sync.types.js'

/**
 * One page of a cursor-based listing. `next` is the opaque cursor for the
 * following page, or null once the listing is exhausted.
 */
export interface Page<T> {
  items: T[]
  next: string | null
}

export type PageFetcher<T> = (cursor: string | undefined) => Promise<Page<T>>

export interface CatalogAlbum {
  id: string
  name: string
  /** First page of the album's tracks as embedded in the album response */
  tracks: Page<Track>
}

/**
 * Remote catalog contract consumed by the reconciliation engine.
 *
 * Batch methods must be called with no more identifiers than the matching
 * entry of the batch-limit table allows.
 */
export interface SpotifyCatalog {
  fetchPlaylistTracksPage(
    playlistId: string,
    cursor: string | undefined,
  ): Promise<Page<Track>>
  fetchAlbumTracksPage(
    albumId: string,
    cursor: string | undefined,
  ): Promise<Page<Track>>
  fetchAlbums(albumIds: string[]): Promise<CatalogAlbum[]>
  /**
   * Full tracks aligned with the requested IDs; null where the catalog has
   * no such track. A returned track may carry a relinked ID.
   */
  fetchTracks(trackIds: string[]): Promise<(Track | null)[]>
  containsSavedTracks(trackIds: string[]): Promise<boolean[]>
  updatePlaylistDescription(
    playlistId: string,
    description: string,
  ): Promise<void>
  /** Replaces every item of the playlist; returns the new snapshot ID */
  replacePlaylistItems(playlistId: string, trackIds: string[]): Promise<string>
  addPlaylistItems(playlistId: string, trackIds: string[]): Promise<string>
  removePlaylistItems(playlistId: string, trackIds: string[]): Promise<string>
}

export interface SpotifyClientConfig {
  accessToken: string
  baseUrl: string
  market: string
  timeoutMs: number
  maxRetries: number
}
