import type { Config } from '@root/types/config.types.js'
import type { ReconciliationRequest } from '@root/types/playlist-sync.types.js'

/**
 * Request built from configuration, with per-call overrides
 */
export function configuredRequest(
  config: Config,
  overrides: Partial<ReconciliationRequest> = {},
): ReconciliationRequest {
  return {
    referenceCollectionId: config.referencePlaylistId,
    targetCollectionId: config.targetPlaylistId,
    allowDuplicates: config.allowDuplicates,
    wipeReference: config.wipeReference,
    removeSavedTracks: config.removeSavedTracks,
    ...overrides,
  }
}
