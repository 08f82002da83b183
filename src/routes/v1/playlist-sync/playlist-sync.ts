import type { ReconciliationResult } from '@root/types/playlist-sync.types.js'
import {
  type DiffRequestBody,
  DiffRequestSchema,
  type DiffResponse,
  DiffResponseSchema,
  ErrorSchema,
  type ReconcileRequestBody,
  ReconcileRequestSchema,
  type ReconciliationResultResponse,
  ReconciliationResultSchema,
  type SyncStatusResponse,
  SyncStatusResponseSchema,
} from '@schemas/playlist-sync/playlist-sync.schema.js'
import { configuredRequest } from '@services/playlist-sync/request.js'
import type { FastifyPluginAsync } from 'fastify'

export function toResultResponse(
  result: ReconciliationResult,
): ReconciliationResultResponse {
  return {
    ...result,
    startedAt: result.startedAt.toISOString(),
    finishedAt: result.finishedAt.toISOString(),
  }
}

function overridesFrom(body: ReconcileRequestBody) {
  return {
    ...(body.referencePlaylistId && {
      referenceCollectionId: body.referencePlaylistId,
    }),
    ...(body.targetPlaylistId && {
      targetCollectionId: body.targetPlaylistId,
    }),
    ...(body.allowDuplicates !== undefined && {
      allowDuplicates: body.allowDuplicates,
    }),
    ...(body.wipeReference !== undefined && {
      wipeReference: body.wipeReference,
    }),
    ...(body.removeSavedTracks !== undefined && {
      removeSavedTracks: body.removeSavedTracks,
    }),
  }
}

const errorResponses = {
  400: ErrorSchema,
  409: ErrorSchema,
  500: ErrorSchema,
  502: ErrorSchema,
}

const plugin: FastifyPluginAsync = async (fastify) => {
  // Regenerate the target playlist
  fastify.post<{
    Body: ReconcileRequestBody
    Reply: ReconciliationResultResponse
  }>(
    '/reconcile',
    {
      schema: {
        summary: 'Reconcile target playlist',
        operationId: 'reconcilePlaylist',
        description:
          'Expand the reference playlist into full albums, filter and deduplicate the tracks, and rewrite the target playlist',
        body: ReconcileRequestSchema,
        response: {
          200: ReconciliationResultSchema,
          ...errorResponses,
        },
        tags: ['Playlist Sync'],
      },
    },
    async (request) => {
      const syncRequest = configuredRequest(
        fastify.config,
        overridesFrom(request.body),
      )
      // Failures reach the error handler, which logs and maps them
      const result = await fastify.playlistSync.reconcile(syncRequest)
      return toResultResponse(result)
    },
  )

  // Dry run: every read, no writes
  fastify.post<{
    Body: ReconcileRequestBody
    Reply: ReconciliationResultResponse
  }>(
    '/preview',
    {
      schema: {
        summary: 'Preview reconciliation',
        operationId: 'previewReconciliation',
        description:
          'Run the reconciliation without writing to the target or wiping the reference playlist',
        body: ReconcileRequestSchema,
        response: {
          200: ReconciliationResultSchema,
          ...errorResponses,
        },
        tags: ['Playlist Sync'],
      },
    },
    async (request) => {
      const syncRequest = configuredRequest(
        fastify.config,
        overridesFrom(request.body),
      )
      const result = await fastify.playlistSync.preview(syncRequest)
      return toResultResponse(result)
    },
  )

  // Recordings of one playlist missing from another
  fastify.post<{
    Body: DiffRequestBody
    Reply: DiffResponse
  }>(
    '/diff',
    {
      schema: {
        summary: 'Diff two playlists',
        operationId: 'diffPlaylists',
        description:
          'List the recordings of the reference playlist that the other playlist does not contain, compared by fingerprint',
        body: DiffRequestSchema,
        response: {
          200: DiffResponseSchema,
          500: ErrorSchema,
          502: ErrorSchema,
        },
        tags: ['Playlist Sync'],
      },
    },
    async (request) => {
      const { referencePlaylistId, otherPlaylistId } = request.body
      const diff = await fastify.playlistSync.diff(
        referencePlaylistId,
        otherPlaylistId,
      )
      return {
        referencePlaylistId,
        otherPlaylistId,
        missing: diff.missing.map((fingerprint) => ({
          catalogCode: fingerprint.catalogCode,
          normalizedTitle: fingerprint.normalizedTitle,
          baseArtistNames: [...fingerprint.baseArtistNames],
          durationBucketSeconds: fingerprint.durationBucketSeconds,
          sourceTrackId: fingerprint.sourceTrackId,
        })),
      }
    },
  )

  fastify.get<{
    Reply: SyncStatusResponse
  }>(
    '/status',
    {
      schema: {
        summary: 'Playlist sync status',
        operationId: 'getPlaylistSyncStatus',
        description: 'Whether a run is active, and the last run, failed or complete',
        response: {
          200: SyncStatusResponseSchema,
        },
        tags: ['Playlist Sync'],
      },
    },
    async () => {
      const lastRun = fastify.playlistSync.lastRun
      return {
        running: fastify.playlistSync.isRunning,
        lastRun: lastRun ? toResultResponse(lastRun) : null,
      }
    },
  )
}

export default plugin
