import type { ReconciliationPhase } from '@root/types/playlist-sync.types.js'
import {
  ReconciliationCancelledError,
  ReconciliationError,
  RemoteFetchError,
  RemoteWriteError,
} from '../errors.js'

/**
 * Normalizes a failed catalog read. Errors already typed for the run pass
 * through; an abort becomes a cancellation.
 */
export function toFetchError(
  error: unknown,
  phase: ReconciliationPhase,
  resourceId: string,
  signal: AbortSignal | undefined,
): ReconciliationError {
  if (error instanceof ReconciliationError) return error
  if (signal?.aborted) {
    return new ReconciliationCancelledError(phase, { cause: error })
  }
  const reason = error instanceof Error ? error.message : String(error)
  return new RemoteFetchError(
    `Failed to read ${resourceId}: ${reason}`,
    phase,
    resourceId,
    { cause: error },
  )
}

export function toWriteError(
  error: unknown,
  phase: ReconciliationPhase,
  resourceId: string,
  chunkIndex: number,
  signal: AbortSignal | undefined,
): ReconciliationError {
  if (error instanceof ReconciliationError) return error
  if (signal?.aborted) {
    return new ReconciliationCancelledError(phase, { cause: error })
  }
  const reason = error instanceof Error ? error.message : String(error)
  return new RemoteWriteError(
    `Failed to write chunk ${chunkIndex} of ${resourceId}: ${reason}`,
    phase,
    resourceId,
    chunkIndex,
    { cause: error },
  )
}
