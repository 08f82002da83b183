import type { Chunk, ChunkPlan } from '@root/types/playlist-sync.types.js'
import type { SpotifyCatalog } from '@root/types/spotify.types.js'
import { format } from 'date-fns'
import type { FastifyBaseLogger } from 'fastify'
import { planChunksFor } from '../batching/index.js'
import { throwIfCancelled } from '../errors.js'
import { toWriteError } from './remote-errors.js'

export const DESCRIPTION_DATE_TOKEN = '{date}'

export interface ChunkWriterDeps {
  catalog: SpotifyCatalog
  logger: FastifyBaseLogger
  descriptionTemplate: string
  now?: () => Date
  signal?: AbortSignal
}

/**
 * Stamps the run date (MM/dd/yyyy) into every `{date}` token of the template
 */
export function renderDescription(template: string, date: Date): string {
  return template.split(DESCRIPTION_DATE_TOKEN).join(format(date, 'MM/dd/yyyy'))
}

/**
 * Write plan for the target playlist. An empty list still yields one empty
 * first chunk so the target is cleared by the replace.
 */
export function planWrite(trackIds: string[]): ChunkPlan {
  const plan = planChunksFor('playlist-item-write', trackIds)
  return plan.length > 0 ? plan : [{ index: 0, isFirst: true, ids: [] }]
}

/**
 * Regenerates the target playlist from `trackIds`.
 *
 * The first chunk updates the description and replaces the playlist
 * contents; every later chunk is appended, strictly in order. A failed
 * chunk stops the run and leaves the earlier chunks in place.
 *
 * @returns Size of each chunk written, in write order
 */
export async function writeChunks(
  playlistId: string,
  trackIds: string[],
  deps: ChunkWriterDeps,
): Promise<number[]> {
  const { logger, signal } = deps
  const plan = planWrite(trackIds)
  const sizes: number[] = []

  for (const chunk of plan) {
    throwIfCancelled(signal, 'WritingChunks')
    try {
      await writeChunk(playlistId, chunk, deps)
    } catch (error) {
      throw toWriteError(error, 'WritingChunks', playlistId, chunk.index, signal)
    }
    sizes.push(chunk.ids.length)
    logger.debug(
      `${chunk.isFirst ? 'Replaced' : 'Appended'} chunk ${chunk.index + 1}/${plan.length} (${chunk.ids.length} tracks)`,
    )
  }

  return sizes
}

async function writeChunk(
  playlistId: string,
  chunk: Chunk,
  deps: ChunkWriterDeps,
): Promise<void> {
  const { catalog } = deps
  if (!chunk.isFirst) {
    await catalog.addPlaylistItems(playlistId, chunk.ids)
    return
  }

  const now = deps.now?.() ?? new Date()
  await catalog.updatePlaylistDescription(
    playlistId,
    renderDescription(deps.descriptionTemplate, now),
  )
  await catalog.replacePlaylistItems(playlistId, chunk.ids)
}
