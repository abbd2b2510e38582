/**
 * Zod schemas for Spotify Web API responses
 * Only the fields tracktap reads are declared; unknown fields are stripped at the boundary
 */

import {z} from 'zod'

// ===== Core Objects =====

export const SpotifyExternalUrlsSchema = z.object({
  spotify: z.string().optional(),
})

export const SpotifyUserSchema = z.object({
  display_name: z.string().nullable().optional(),
  id: z.string(),
})

export const SpotifyArtistSimpleSchema = z.object({
  id: z.string().nullable(),
  name: z.string(),
})

export const SpotifyArtistFullSchema = z.object({
  genres: z.array(z.string()).default([]),
  id: z.string(),
  name: z.string(),
  popularity: z.number().optional(),
})

export const SpotifyTrackSchema = z.object({
  artists: z.array(SpotifyArtistSimpleSchema).default([]),
  duration_ms: z.number().optional(),
  external_urls: SpotifyExternalUrlsSchema.optional(),
  id: z.string().nullable(),
  is_local: z.boolean().optional(),
  name: z.string(),
  uri: z.string(),
})

// ===== Audio Features =====

const FeatureValueSchema = z.number().nullable().optional()

export const SpotifyAudioFeaturesSchema = z.object({
  acousticness: FeatureValueSchema,
  danceability: FeatureValueSchema,
  energy: FeatureValueSchema,
  id: z.string(),
  instrumentalness: FeatureValueSchema,
  key: z.number().int().nullable().optional(),
  liveness: FeatureValueSchema,
  mode: z.number().int().nullable().optional(),
  speechiness: FeatureValueSchema,
  tempo: FeatureValueSchema,
  valence: FeatureValueSchema,
})

export const SpotifyAudioFeaturesBatchSchema = z.object({
  audio_features: z.array(SpotifyAudioFeaturesSchema.nullable()),
})

// ===== Playlists =====

export const SpotifyPlaylistSimpleSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema.default({}),
  id: z.string(),
  name: z.string(),
  owner: SpotifyUserSchema,
  public: z.boolean().nullable().optional(),
  tracks: z.object({total: z.number()}).optional(),
})

export const SpotifyPlaylistItemSchema = z.object({
  added_at: z.string().nullable().optional(),
  track: SpotifyTrackSchema.nullable(),
})

export const SpotifyCreatePlaylistResponseSchema = z.object({
  external_urls: SpotifyExternalUrlsSchema.optional(),
  id: z.string().optional(),
  name: z.string().optional(),
})

export const SpotifySnapshotResponseSchema = z.object({
  snapshot_id: z.string(),
})

// ===== Listening History =====

export const SpotifyPlayHistorySchema = z.object({
  played_at: z.string(),
  track: SpotifyTrackSchema,
})

export const SpotifyRecommendationsResponseSchema = z.object({
  tracks: z.array(SpotifyTrackSchema),
})

// ===== Pagination =====

/**
 * Offset and cursor paging share the `next` link, which is all the walker needs
 */
export function SpotifyPagingSchema<T extends z.ZodTypeAny>(itemSchema: T) {
  return z.object({
    items: z.array(itemSchema),
    limit: z.number().optional(),
    next: z.string().nullable(),
    offset: z.number().optional(),
    total: z.number().optional(),
  })
}

// ===== Auth & Errors =====

export const SpotifyTokenResponseSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string(),
})

export const SpotifyErrorSchema = z.object({
  error: z.object({
    message: z.string(),
    status: z.number(),
  }),
})

// ===== Types =====

export type SpotifyArtistFull = z.infer<typeof SpotifyArtistFullSchema>
export type SpotifyArtistSimple = z.infer<typeof SpotifyArtistSimpleSchema>
export type SpotifyAudioFeatures = z.infer<typeof SpotifyAudioFeaturesSchema>
export type SpotifyCreatePlaylistResponse = z.infer<typeof SpotifyCreatePlaylistResponseSchema>
export type SpotifyPlayHistory = z.infer<typeof SpotifyPlayHistorySchema>
export type SpotifyPlaylistItem = z.infer<typeof SpotifyPlaylistItemSchema>
export type SpotifyPlaylistSimple = z.infer<typeof SpotifyPlaylistSimpleSchema>
export type SpotifyTokenResponse = z.infer<typeof SpotifyTokenResponseSchema>
export type SpotifyTrack = z.infer<typeof SpotifyTrackSchema>
export type SpotifyUser = z.infer<typeof SpotifyUserSchema>
