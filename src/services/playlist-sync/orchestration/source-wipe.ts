import type { Track } from '@root/types/playlist-sync.types.js'
import type { SpotifyCatalog } from '@root/types/spotify.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { planChunksFor } from '../batching/index.js'
import { throwIfCancelled } from '../errors.js'
import { toWriteError } from './remote-errors.js'

export interface SourceWipeDeps {
  catalog: SpotifyCatalog
  logger: FastifyBaseLogger
  isProtected: (playlistId: string) => boolean
  signal?: AbortSignal
}

/**
 * Removes every occurrence of the given tracks from a playlist.
 * Protected playlists are skipped with a warning.
 *
 * @returns Number of distinct tracks removed
 */
export async function wipeCollection(
  playlistId: string,
  tracks: readonly Track[],
  deps: SourceWipeDeps,
): Promise<number> {
  const { catalog, logger, signal } = deps

  if (deps.isProtected(playlistId)) {
    logger.warn(`Skipping wipe of protected playlist ${playlistId}`)
    return 0
  }

  // A relinked track is stored under its original ID
  const ids = [
    ...new Set(
      tracks
        .filter((track) => !track.isLocal)
        .map((track) => track.linkedFromId ?? track.id),
    ),
  ]
  let removed = 0

  for (const chunk of planChunksFor('playlist-item-remove', ids)) {
    throwIfCancelled(signal, 'WipingSource')
    try {
      await catalog.removePlaylistItems(playlistId, chunk.ids)
    } catch (error) {
      throw toWriteError(error, 'WipingSource', playlistId, chunk.index, signal)
    }
    removed += chunk.ids.length
  }

  logger.debug(`Removed ${removed} tracks from playlist ${playlistId}`)
  return removed
}
