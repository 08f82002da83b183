import type {
  ReconciliationPhase,
  Track,
} from '@root/types/playlist-sync.types.js'
import type { SpotifyCatalog } from '@root/types/spotify.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { collectAll, paginate } from '../pagination/index.js'
import { toFetchError } from './remote-errors.js'

export interface CollectionReaderDeps {
  catalog: SpotifyCatalog
  logger: FastifyBaseLogger
  signal?: AbortSignal
}

/**
 * Reads every track of a playlist, page by page
 */
export async function readCollection(
  playlistId: string,
  phase: ReconciliationPhase,
  deps: CollectionReaderDeps,
): Promise<Track[]> {
  const { catalog, logger, signal } = deps

  try {
    const tracks = await collectAll(
      paginate(
        (cursor) => catalog.fetchPlaylistTracksPage(playlistId, cursor),
        { label: `playlist ${playlistId}`, signal },
      ),
    )
    logger.debug(`Read ${tracks.length} tracks from playlist ${playlistId}`)
    return tracks
  } catch (error) {
    throw toFetchError(error, phase, playlistId, signal)
  }
}
