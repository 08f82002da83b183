/**
 * Batch Limits
 *
 * Maximum number of identifiers each catalog operation accepts per call.
 * Every chunked read and write in the sync engine sizes its batches from here.
 */

export const BATCH_LIMITS = {
  'album-batch-read': 20,
  'album-tracks-page': 50,
  'track-batch-read': 50,
  'artist-batch-read': 50,
  'playlist-items-page': 50,
  'playlist-item-write': 100,
  'playlist-item-remove': 100,
  'saved-tracks-page': 50,
  'saved-tracks-contains': 50,
  'current-user-paged-listing': 50,
  'followed-artists-page': 50,
  'user-playlists-page': 50,
} as const satisfies Record<string, number>

export type BatchOperationKind = keyof typeof BATCH_LIMITS

export function isBatchOperationKind(
  kind: string,
): kind is BatchOperationKind {
  return Object.hasOwn(BATCH_LIMITS, kind)
}

/**
 * Returns the per-call identifier ceiling for an operation.
 *
 * @throws Error when the kind is not in the table
 */
export function limitFor(kind: BatchOperationKind): number {
  if (!isBatchOperationKind(kind)) {
    throw new Error(`Unknown batch operation kind: "${String(kind)}"`)
  }
  return BATCH_LIMITS[kind]
}

/**
 * Whether a batch of `count` identifiers may be sent in one call.
 * An absent or non-integer count is never valid.
 */
export function isValid(
  kind: BatchOperationKind,
  count: number | null | undefined,
): boolean {
  if (count == null || !Number.isInteger(count) || count < 0) {
    return false
  }
  return count <= limitFor(kind)
}
