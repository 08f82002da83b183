import { z } from 'zod'
import { ErrorSchema } from '@schemas/common/error.schema.js'

export const BlacklistEntrySchema = z
  .object({
    id: z.string().min(1).optional(),
    name: z.string().min(1).optional(),
  })
  .refine((entry) => entry.id !== undefined || entry.name !== undefined, {
    message: 'Blacklist entry needs an id or a name',
  })

export const BlacklistArtistsSchema = z.array(BlacklistEntrySchema)

// Omitted fields fall back to the configured values
export const ReconcileRequestSchema = z.object({
  referencePlaylistId: z.string().min(1).optional(),
  targetPlaylistId: z.string().min(1).optional(),
  allowDuplicates: z.boolean().optional(),
  wipeReference: z.boolean().optional(),
  removeSavedTracks: z.boolean().optional(),
})

export const DiffRequestSchema = z.object({
  referencePlaylistId: z.string().min(1),
  otherPlaylistId: z.string().min(1),
})

const PhaseSchema = z.enum([
  'ResolvingCollections',
  'ExpandingAlbums',
  'Filtering',
  'Diffing',
  'WritingChunks',
  'WipingSource',
  'Done',
  'Failed',
])

export const ReconciliationResultSchema = z.object({
  runId: z.string(),
  referenceCollectionId: z.string(),
  targetCollectionId: z.string(),
  phase: PhaseSchema,
  dryRun: z.boolean(),
  counts: z.object({
    referenceTracks: z.number(),
    targetTracks: z.number(),
    albums: z.number(),
    candidates: z.number(),
    blacklisted: z.number(),
    duplicates: z.number(),
    savedRemoved: z.number(),
    newToTarget: z.number(),
    written: z.number(),
    chunks: z.number(),
    wiped: z.number(),
  }),
  chunkSizes: z.array(z.number()),
  trackIds: z.array(z.string()),
  startedAt: z.string().datetime(),
  finishedAt: z.string().datetime(),
  failure: z
    .object({
      phase: PhaseSchema,
      message: z.string(),
    })
    .optional(),
})

export const FingerprintSchema = z.object({
  catalogCode: z.string().nullable(),
  normalizedTitle: z.string(),
  baseArtistNames: z.array(z.string()),
  durationBucketSeconds: z.number(),
  sourceTrackId: z.string(),
})

export const DiffResponseSchema = z.object({
  referencePlaylistId: z.string(),
  otherPlaylistId: z.string(),
  missing: z.array(FingerprintSchema),
})

export const SyncStatusResponseSchema = z.object({
  running: z.boolean(),
  lastRun: ReconciliationResultSchema.nullable(),
})

export type ReconcileRequestBody = z.infer<typeof ReconcileRequestSchema>
export type DiffRequestBody = z.infer<typeof DiffRequestSchema>
export type DiffResponse = z.infer<typeof DiffResponseSchema>
export type ReconciliationResultResponse = z.infer<
  typeof ReconciliationResultSchema
>
export type SyncStatusResponse = z.infer<typeof SyncStatusResponseSchema>

// Re-export for convenience
export { ErrorSchema }
