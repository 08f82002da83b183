import type { Chunk, ChunkPlan } from '@root/types/playlist-sync.types.js'
import { type BatchOperationKind, limitFor } from './batch-limits.js'

/**
 * Splits `ids` into consecutive chunks of at most `limit` items.
 * The first chunk is tagged `isFirst` so writers can pick replace semantics.
 * An empty input yields an empty plan.
 */
export function planChunks<T>(ids: readonly T[], limit: number): ChunkPlan<T> {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new Error(`Chunk limit must be a positive integer, got ${limit}`)
  }

  const plan: Chunk<T>[] = []
  for (let start = 0; start < ids.length; start += limit) {
    const index = plan.length
    plan.push({
      index,
      isFirst: index === 0,
      ids: ids.slice(start, start + limit),
    })
  }
  return plan
}

/**
 * Builds a chunk plan sized by the batch-limit table entry for `kind`
 */
export function planChunksFor<T>(
  kind: BatchOperationKind,
  ids: readonly T[],
): ChunkPlan<T> {
  return planChunks(ids, limitFor(kind))
}
