import type {
  PlaylistSyncConfig,
  ReconciliationRequest,
} from '@root/types/playlist-sync.types.js'
import { sameSpotifyId } from '@utils/spotify-id.js'
import { ConfigurationError } from '../errors.js'

/**
 * Rejects a request before any remote call is made.
 *
 * The stock collection is owned by the catalog and must never be written to.
 */
export function assertSafeRequest(
  request: ReconciliationRequest,
  config: PlaylistSyncConfig,
): void {
  if (!request.referenceCollectionId.trim()) {
    throw new ConfigurationError(
      'Reference playlist ID is required',
      'ResolvingCollections',
    )
  }
  if (!request.targetCollectionId.trim()) {
    throw new ConfigurationError(
      'Target playlist ID is required',
      'ResolvingCollections',
    )
  }
  if (isStockCollection(request.targetCollectionId, config)) {
    throw new ConfigurationError(
      `Refusing to write to the stock playlist ${request.targetCollectionId}`,
      'ResolvingCollections',
    )
  }
  if (sameSpotifyId(request.referenceCollectionId, request.targetCollectionId)) {
    throw new ConfigurationError(
      'Reference and target playlists must differ',
      'ResolvingCollections',
    )
  }
}

export function isStockCollection(
  collectionId: string,
  config: PlaylistSyncConfig,
): boolean {
  return (
    config.stockPlaylistId.trim() !== '' &&
    sameSpotifyId(collectionId, config.stockPlaylistId)
  )
}
