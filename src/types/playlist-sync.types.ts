/**
 * Playlist sync domain types
 *
 * Every remote track shape (playlist item, album track, saved track) is
 * normalized into a single `Track` value at the catalog boundary, so the
 * reconciliation engine only ever sees this shape.
 */

export interface TrackArtist {
  /** Catalog artist ID (bare ID, never a URI). Missing for some local files */
  id: string | null
  name: string
}

export interface TrackAlbum {
  id: string | null
  name: string
}

export interface Track {
  id: string
  name: string
  durationMs: number
  /** Industry recording code (ISRC). Absent on simplified album tracks */
  catalogCode: string | null
  /** Credited artists in the order the catalog lists them */
  artists: TrackArtist[]
  album: TrackAlbum
  isLocal: boolean
  /**
   * ID stored in the playlist when the catalog relinked it to `id` for the
   * requested market
   */
  linkedFromId: string | null
}

/**
 * Content identity of a recording.
 *
 * Two fingerprints are equal when their `identityKey` values are equal. The key
 * covers catalog code, artist names and duration bucket only; the title and the
 * source track ID ride along for display and lookup.
 */
export interface TrackFingerprint {
  readonly catalogCode: string | null
  readonly normalizedTitle: string
  readonly baseArtistNames: readonly string[]
  readonly durationBucketSeconds: number
  readonly sourceTrackId: string
  readonly identityKey: string
}

export interface FingerprintCollection {
  /** Every fingerprint in input order, duplicates included */
  readonly full: readonly TrackFingerprint[]
  /** First occurrence of each identity, in first-occurrence order */
  readonly distinct: readonly TrackFingerprint[]
  /** Later occurrences that collided with an earlier identity */
  readonly duplicates: readonly TrackFingerprint[]
  /** Identity keys present in `distinct` */
  readonly identities: ReadonlySet<string>
}

export interface InsertResult {
  collection: FingerprintCollection
  wasNew: boolean
}

export interface ReconciliationRequest {
  referenceCollectionId: string
  targetCollectionId: string
  allowDuplicates?: boolean
  /** Run every read phase and build the chunk plan without writing */
  dryRun?: boolean
  /** Drain the reference collection after a successful write (default true) */
  wipeReference?: boolean
  /** Drop tracks already in the user's saved tracks before writing */
  removeSavedTracks?: boolean
}

export interface ReconcileOptions {
  signal?: AbortSignal
}

export interface Chunk<T = string> {
  index: number
  isFirst: boolean
  ids: T[]
}

export type ChunkPlan<T = string> = Chunk<T>[]

export type ReconciliationPhase =
  | 'ResolvingCollections'
  | 'ExpandingAlbums'
  | 'Filtering'
  | 'Diffing'
  | 'WritingChunks'
  | 'WipingSource'
  | 'Done'
  | 'Failed'

export interface ReconciliationCounts {
  referenceTracks: number
  targetTracks: number
  albums: number
  candidates: number
  blacklisted: number
  duplicates: number
  savedRemoved: number
  /** Retained tracks the target did not already hold (by fingerprint) */
  newToTarget: number
  written: number
  chunks: number
  wiped: number
}

export interface ReconciliationResult {
  runId: string
  referenceCollectionId: string
  targetCollectionId: string
  phase: ReconciliationPhase
  dryRun: boolean
  counts: ReconciliationCounts
  /** Sizes of each write chunk, in write order */
  chunkSizes: number[]
  trackIds: string[]
  startedAt: Date
  finishedAt: Date
  /** Set on failed runs only */
  failure?: {
    phase: ReconciliationPhase
    message: string
  }
}

export interface PlaylistDiff {
  referenceCollectionId: string
  otherCollectionId: string
  missing: TrackFingerprint[]
}

/**
 * Settings the orchestrator reads for each run. Supplied by the configuration
 * collaborator, never read from ambient state.
 */
export interface PlaylistSyncConfig {
  stockPlaylistId: string
  descriptionTemplate: string
  albumReadConcurrency: number
}
