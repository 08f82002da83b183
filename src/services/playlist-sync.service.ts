/**
 * Playlist Sync Service
 *
 * Regenerates a target playlist from the albums behind a reference playlist
 * (typically a weekly release playlist). Every reference track is expanded to
 * its full album; blacklisted lead artists, already saved tracks and
 * duplicate recordings are dropped; the result is written to the target in
 * ordered chunks, and the reference playlist is then drained.
 *
 * Runs move through ResolvingCollections, ExpandingAlbums, Filtering,
 * Diffing, WritingChunks and WipingSource to Done. Any failure ends the run
 * in Failed and is rethrown as a ReconciliationError carrying the phase.
 * Only one run may be active per service instance.
 *
 * @example
 * const result = await fastify.playlistSync.reconcile({
 *   referenceCollectionId: 'reference-id',
 *   targetCollectionId: 'target-id',
 * })
 */

import { randomUUID } from 'node:crypto'
import type {
  PlaylistDiff,
  PlaylistSyncConfig,
  ReconcileOptions,
  ReconciliationCounts,
  ReconciliationPhase,
  ReconciliationRequest,
  ReconciliationResult,
  Track,
} from '@root/types/playlist-sync.types.js'
import type { SpotifyCatalog } from '@root/types/spotify.types.js'
import {
  ReconciliationError,
  ReconciliationInProgressError,
  throwIfCancelled,
} from '@services/playlist-sync/errors.js'
import type { BlacklistStore } from '@services/playlist-sync/filtering/index.js'
import { applyBlacklist } from '@services/playlist-sync/filtering/index.js'
import {
  classify,
  missingFrom,
} from '@services/playlist-sync/fingerprint/index.js'
import {
  expandAlbums,
  planWrite,
  readCollection,
  removeSavedTracks,
  wipeCollection,
  writeChunks,
} from '@services/playlist-sync/orchestration/index.js'
import {
  assertSafeRequest,
  isStockCollection,
} from '@services/playlist-sync/validation/index.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'

export interface PlaylistSyncDeps {
  catalog: SpotifyCatalog
  blacklist: BlacklistStore
  config: PlaylistSyncConfig
  /** Clock used for run timestamps and the description date */
  now?: () => Date
}

function emptyCounts(): ReconciliationCounts {
  return {
    referenceTracks: 0,
    targetTracks: 0,
    albums: 0,
    candidates: 0,
    blacklisted: 0,
    duplicates: 0,
    savedRemoved: 0,
    newToTarget: 0,
    written: 0,
    chunks: 0,
    wiped: 0,
  }
}

export class PlaylistSyncService {
  private readonly log: FastifyBaseLogger

  /**
   * ID of the run in progress, if any
   */
  private activeRunId: string | null = null

  private lastResult: ReconciliationResult | null = null

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly deps: PlaylistSyncDeps,
  ) {
    this.log = createServiceLogger(baseLog, 'PLAYLIST_SYNC')
  }

  private get catalog() {
    return this.deps.catalog
  }

  private get config() {
    return this.deps.config
  }

  private now(): Date {
    return this.deps.now?.() ?? new Date()
  }

  get isRunning(): boolean {
    return this.activeRunId !== null
  }

  get lastRun(): ReconciliationResult | null {
    return this.lastResult
  }

  /**
   * Runs one reconciliation of the target playlist against the reference
   *
   * @throws ConfigurationError before any remote call when the request is unsafe
   * @throws ReconciliationInProgressError when another run is active
   */
  async reconcile(
    request: ReconciliationRequest,
    options: ReconcileOptions = {},
  ): Promise<ReconciliationResult> {
    assertSafeRequest(request, this.config)

    if (this.activeRunId) {
      throw new ReconciliationInProgressError(this.activeRunId)
    }

    const runId = randomUUID()
    this.activeRunId = runId
    try {
      const result = await this.runReconciliation(runId, request, options)
      this.lastResult = result
      return result
    } finally {
      this.activeRunId = null
    }
  }

  /**
   * Reconciliation with every write and the wipe skipped
   */
  preview(
    request: ReconciliationRequest,
    options: ReconcileOptions = {},
  ): Promise<ReconciliationResult> {
    return this.reconcile({ ...request, dryRun: true }, options)
  }

  /**
   * Recordings of the reference playlist that the other playlist lacks
   */
  async diff(
    referenceCollectionId: string,
    otherCollectionId: string,
    options: ReconcileOptions = {},
  ): Promise<PlaylistDiff> {
    const readerDeps = {
      catalog: this.catalog,
      logger: this.log,
      signal: options.signal,
    }
    const [reference, other] = await Promise.all([
      readCollection(referenceCollectionId, 'ResolvingCollections', readerDeps),
      readCollection(otherCollectionId, 'ResolvingCollections', readerDeps),
    ])

    return {
      referenceCollectionId,
      otherCollectionId,
      missing: missingFrom(classify(reference), classify(other)),
    }
  }

  private async runReconciliation(
    runId: string,
    request: ReconciliationRequest,
    { signal }: ReconcileOptions,
  ): Promise<ReconciliationResult> {
    const {
      referenceCollectionId,
      targetCollectionId,
      allowDuplicates = false,
      dryRun = false,
      wipeReference = true,
      removeSavedTracks: dropSaved = false,
    } = request
    const startedAt = this.now()
    const counts = emptyCounts()
    const log = this.log.child({ runId })
    let phase: ReconciliationPhase = 'ResolvingCollections'

    const enter = (next: ReconciliationPhase) => {
      throwIfCancelled(signal, next)
      phase = next
      log.debug(`Entering phase ${next}`)
    }

    log.info(
      `Starting reconciliation ${dryRun ? '(DRY RUN) ' : ''}of ${targetCollectionId} from ${referenceCollectionId}`,
    )

    try {
      enter('ResolvingCollections')
      const readerDeps = { catalog: this.catalog, logger: log, signal }
      const reference = await readCollection(
        referenceCollectionId,
        phase,
        readerDeps,
      )
      const target = await readCollection(targetCollectionId, phase, readerDeps)
      counts.referenceTracks = reference.length
      counts.targetTracks = target.length

      enter('ExpandingAlbums')
      const { albumIds, candidates } = await expandAlbums(reference, {
        catalog: this.catalog,
        logger: log,
        concurrency: this.config.albumReadConcurrency,
        signal,
      })
      counts.albums = albumIds.length
      counts.candidates = candidates.length

      enter('Filtering')
      const { kept, excluded } = applyBlacklist(candidates, this.deps.blacklist)
      counts.blacklisted = excluded.length
      let filtered: Track[] = kept
      if (dropSaved) {
        const saved = await removeSavedTracks(filtered, {
          catalog: this.catalog,
          logger: log,
          signal,
        })
        filtered = saved.kept
        counts.savedRemoved = saved.removed.length
      }

      enter('Diffing')
      const classified = classify(filtered)
      const retainedIds = allowDuplicates
        ? filtered.map((track) => track.id)
        : classified.distinct.map((fingerprint) => fingerprint.sourceTrackId)
      counts.duplicates = allowDuplicates ? 0 : classified.duplicates.length
      counts.newToTarget = missingFrom(classified, classify(target)).length

      let chunkSizes: number[]
      if (dryRun) {
        chunkSizes = planWrite(retainedIds).map((chunk) => chunk.ids.length)
      } else {
        enter('WritingChunks')
        chunkSizes = await writeChunks(targetCollectionId, retainedIds, {
          catalog: this.catalog,
          logger: log,
          descriptionTemplate: this.config.descriptionTemplate,
          now: () => this.now(),
          signal,
        })
        counts.written = retainedIds.length

        if (wipeReference) {
          enter('WipingSource')
          counts.wiped = await wipeCollection(referenceCollectionId, reference, {
            catalog: this.catalog,
            logger: log,
            isProtected: (id) => isStockCollection(id, this.config),
            signal,
          })
        }
      }
      counts.chunks = chunkSizes.length

      phase = 'Done'
      const result: ReconciliationResult = {
        runId,
        referenceCollectionId,
        targetCollectionId,
        phase,
        dryRun,
        counts,
        chunkSizes,
        trackIds: retainedIds,
        startedAt,
        finishedAt: this.now(),
      }

      log.info(
        {
          counts,
          chunkSizes,
        },
        `Reconciliation ${dryRun ? 'preview ' : ''}complete: ${retainedIds.length} tracks from ${albumIds.length} albums`,
      )
      return result
    } catch (error) {
      log.warn(
        {
          error,
          phase,
          counts,
        },
        `Reconciliation failed during ${phase}`,
      )
      const failure =
        error instanceof ReconciliationError
          ? error
          : new ReconciliationError(
              `Reconciliation failed during ${phase}: ${error instanceof Error ? error.message : String(error)}`,
              phase,
              { cause: error },
            )
      this.lastResult = {
        runId,
        referenceCollectionId,
        targetCollectionId,
        phase: 'Failed',
        dryRun,
        counts,
        chunkSizes: [],
        trackIds: [],
        startedAt,
        finishedAt: this.now(),
        failure: { phase: failure.phase, message: failure.message },
      }
      throw failure
    }
  }
}
