import type { Chunk, Track } from '@root/types/playlist-sync.types.js'
import type { CatalogAlbum, SpotifyCatalog } from '@root/types/spotify.types.js'
import type { FastifyBaseLogger } from 'fastify'
import pLimit from 'p-limit'
import { planChunksFor } from '../batching/index.js'
import { throwIfCancelled } from '../errors.js'
import { collectAll, paginate } from '../pagination/index.js'
import { toFetchError } from './remote-errors.js'

export interface AlbumExpansionDeps {
  catalog: SpotifyCatalog
  logger: FastifyBaseLogger
  /** Album batch reads in flight at once */
  concurrency: number
  signal?: AbortSignal
}

export interface AlbumExpansionResult {
  albumIds: string[]
  candidates: Track[]
}

/**
 * Album IDs of the given tracks, first-seen order, local files skipped
 */
export function uniqueAlbumIds(tracks: readonly Track[]): string[] {
  const seen = new Set<string>()
  for (const track of tracks) {
    if (!track.isLocal && track.album.id) {
      seen.add(track.album.id)
    }
  }
  return [...seen]
}

/**
 * Expands each reference track into every track of its album.
 *
 * Albums are read in batches; albums longer than their embedded track page
 * are completed through the album-tracks listing. Album listings omit
 * recording codes, so the result is re-read through the track batch
 * endpoint before it is returned. Album order, then track order, is kept.
 */
export async function expandAlbums(
  referenceTracks: readonly Track[],
  deps: AlbumExpansionDeps,
): Promise<AlbumExpansionResult> {
  const { logger } = deps
  const albumIds = uniqueAlbumIds(referenceTracks)
  const limit = pLimit(Math.max(1, deps.concurrency))
  let failed = false

  // Settle every batch so no read outlives the run; queued batches are
  // skipped once one has failed
  const settled = await Promise.allSettled(
    planChunksFor('album-batch-read', albumIds).map((chunk) =>
      limit(async () => {
        if (failed) return []
        try {
          return await readAlbumBatch(chunk, deps)
        } catch (error) {
          failed = true
          throw error
        }
      }),
    ),
  )

  const rejected = settled.find(
    (result): result is PromiseRejectedResult => result.status === 'rejected',
  )
  if (rejected) {
    throw rejected.reason
  }

  const simplified = settled.flatMap((result) =>
    result.status === 'fulfilled' ? result.value : [],
  )
  logger.debug(
    `Expanded ${albumIds.length} albums into ${simplified.length} tracks`,
  )

  return { albumIds, candidates: await hydrateTracks(simplified, deps) }
}

async function readAlbumBatch(
  chunk: Chunk,
  deps: AlbumExpansionDeps,
): Promise<Track[]> {
  const { catalog, logger, signal } = deps
  throwIfCancelled(signal, 'ExpandingAlbums')
  let albums: CatalogAlbum[]
  try {
    albums = await catalog.fetchAlbums(chunk.ids)
  } catch (error) {
    throw toFetchError(
      error,
      'ExpandingAlbums',
      `albums batch ${chunk.index}`,
      signal,
    )
  }
  if (albums.length < chunk.ids.length) {
    logger.warn(
      `Album batch ${chunk.index} returned ${albums.length} of ${chunk.ids.length} albums`,
    )
  }
  const tracks: Track[] = []
  for (const album of albums) {
    tracks.push(...(await readAlbumTracks(album, deps)))
  }
  return tracks
}

async function readAlbumTracks(
  album: CatalogAlbum,
  deps: AlbumExpansionDeps,
): Promise<Track[]> {
  if (!album.tracks.next) {
    return album.tracks.items
  }

  const { catalog, signal } = deps
  try {
    const albumRef = { id: album.id, name: album.name }
    // The embedded page stands in for the first fetch
    const tracks = await collectAll(
      paginate(
        (cursor) =>
          cursor === undefined
            ? Promise.resolve(album.tracks)
            : catalog.fetchAlbumTracksPage(album.id, cursor),
        { label: `album ${album.id}`, signal },
      ),
    )
    return tracks.map((track) => ({ ...track, album: albumRef }))
  } catch (error) {
    throw toFetchError(error, 'ExpandingAlbums', album.id, signal)
  }
}

/**
 * Replaces simplified tracks with their full catalog records. A track the
 * catalog no longer returns keeps its simplified form.
 */
async function hydrateTracks(
  tracks: Track[],
  deps: AlbumExpansionDeps,
): Promise<Track[]> {
  const { catalog, logger, signal } = deps
  const uniqueIds = [...new Set(tracks.map((track) => track.id))]
  const full = new Map<string, Track>()

  for (const chunk of planChunksFor('track-batch-read', uniqueIds)) {
    throwIfCancelled(signal, 'ExpandingAlbums')
    try {
      const found = await catalog.fetchTracks(chunk.ids)
      chunk.ids.forEach((id, i) => {
        const track = found[i]
        if (track) full.set(id, track)
      })
    } catch (error) {
      throw toFetchError(
        error,
        'ExpandingAlbums',
        `tracks batch ${chunk.index}`,
        signal,
      )
    }
  }

  if (full.size < uniqueIds.length) {
    logger.warn(
      `Track batch read returned ${full.size} of ${uniqueIds.length} tracks`,
    )
  }

  return tracks.map((track) => {
    const hydrated = full.get(track.id)
    return hydrated ?? track
  })
}
