import { z } from 'zod'

// Spotify Web API response shapes. Unknown fields are stripped.

export const SpotifyArtistRefSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
})

export const SpotifyAlbumRefSchema = z.object({
  id: z.string().nullable().optional(),
  name: z.string(),
})

export const SpotifySimplifiedTrackSchema = z.object({
  id: z.string().nullable(),
  uri: z.string(),
  name: z.string(),
  duration_ms: z.number(),
  artists: z.array(SpotifyArtistRefSchema),
  is_local: z.boolean().optional(),
  external_ids: z.object({ isrc: z.string().optional() }).optional(),
  // Present when market relinking substituted another track for the stored one
  linked_from: z
    .object({ id: z.string().nullable().optional() })
    .optional(),
})

export const SpotifyTrackSchema = SpotifySimplifiedTrackSchema.extend({
  album: SpotifyAlbumRefSchema,
})

export const SpotifyPlaylistTracksPageSchema = z.object({
  items: z.array(
    z.object({
      // Episodes and unavailable items come back as null
      track: SpotifyTrackSchema.nullable().catch(null),
      is_local: z.boolean().optional(),
    }),
  ),
  next: z.string().nullable(),
})

export const SpotifyAlbumTracksPageSchema = z.object({
  items: z.array(SpotifySimplifiedTrackSchema),
  next: z.string().nullable(),
})

export const SpotifyAlbumSchema = z.object({
  id: z.string(),
  name: z.string(),
  tracks: SpotifyAlbumTracksPageSchema,
})

export const SpotifyAlbumsResponseSchema = z.object({
  albums: z.array(SpotifyAlbumSchema.nullable()),
})

export const SpotifyTracksResponseSchema = z.object({
  tracks: z.array(SpotifyTrackSchema.nullable()),
})

export const SpotifyContainsResponseSchema = z.array(z.boolean())

export const SpotifySnapshotResponseSchema = z.object({
  snapshot_id: z.string(),
})

export const SpotifyErrorResponseSchema = z.object({
  error: z.object({
    status: z.number(),
    message: z.string(),
  }),
})

export type SpotifySimplifiedTrack = z.infer<typeof SpotifySimplifiedTrackSchema>
export type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>
export type SpotifyAlbum = z.infer<typeof SpotifyAlbumSchema>
