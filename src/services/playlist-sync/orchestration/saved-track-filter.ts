import type { Track } from '@root/types/playlist-sync.types.js'
import type { SpotifyCatalog } from '@root/types/spotify.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { planChunksFor } from '../batching/index.js'
import { throwIfCancelled } from '../errors.js'
import { toFetchError } from './remote-errors.js'

export interface SavedTrackFilterDeps {
  catalog: SpotifyCatalog
  logger: FastifyBaseLogger
  signal?: AbortSignal
}

export interface SavedTrackFilterResult {
  kept: Track[]
  removed: Track[]
}

/**
 * Drops tracks already in the user's saved tracks
 */
export async function removeSavedTracks(
  tracks: readonly Track[],
  deps: SavedTrackFilterDeps,
): Promise<SavedTrackFilterResult> {
  const { catalog, logger, signal } = deps
  const saved = new Set<string>()
  const ids = [...new Set(tracks.map((track) => track.id))]

  for (const chunk of planChunksFor('saved-tracks-contains', ids)) {
    throwIfCancelled(signal, 'Filtering')
    let flags: boolean[]
    try {
      flags = await catalog.containsSavedTracks(chunk.ids)
    } catch (error) {
      throw toFetchError(
        error,
        'Filtering',
        `saved tracks batch ${chunk.index}`,
        signal,
      )
    }
    chunk.ids.forEach((id, i) => {
      if (flags[i]) saved.add(id)
    })
  }

  const kept: Track[] = []
  const removed: Track[] = []
  for (const track of tracks) {
    if (saved.has(track.id)) {
      removed.push(track)
    } else {
      kept.push(track)
    }
  }

  logger.debug(`${removed.length} candidate tracks are already saved`)
  return { kept, removed }
}
