/**
 * Zod schemas for playlist analysis, recommendation seeds and mutation reporting
 */

import {z} from 'zod'

// ===== Audio Features =====

export const AUDIO_FEATURE_NAMES = [
  'danceability',
  'energy',
  'valence',
  'instrumentalness',
  'acousticness',
  'speechiness',
  'liveness',
  'tempo',
] as const

export const AudioFeatureNameSchema = z.enum(AUDIO_FEATURE_NAMES)

/** One track's recognized features; a missing or null entry means the catalog gave no value */
export const AudioFeatureRecordSchema = z.record(AudioFeatureNameSchema, z.number().nullable())

export const TrackDetailSchema = z.object({
  audioFeatures: AudioFeatureRecordSchema.nullable(),
  genres: z.array(z.string()),
  trackId: z.string(),
})

// ===== Analysis =====

export const PlaylistAnalysisSchema = z.object({
  featureAverages: AudioFeatureRecordSchema,
  seedTrackIds: z.array(z.string()).max(5),
  topGenres: z.array(z.string()).max(5),
})

// ===== Recommendation Seeds =====

export const RecommendationSeedSetSchema = z
  .object({
    seedArtists: z.array(z.string()),
    seedGenres: z.array(z.string()),
    seedTracks: z.array(z.string()),
  })
  .refine(seeds => seeds.seedArtists.length + seeds.seedGenres.length + seeds.seedTracks.length <= 5, {
    message: 'At most 5 seeds may be requested',
  })

// ===== Mutation Results =====

export const SkipReasonSchema = z.enum(['locked', 'not-found', 'remote-error'])

export const MutationEntrySchema = z.object({
  error: z.string().nullable(),
  reason: SkipReasonSchema.nullable(),
  success: z.boolean(),
  target: z.string(),
})

export const MutationResultSchema = z.array(MutationEntrySchema)

// ===== References =====

export const PlaylistRefSchema = z.object({
  id: z.string(),
  name: z.string(),
})

// ===== Types =====

export type AudioFeatureName = z.infer<typeof AudioFeatureNameSchema>
export type AudioFeatureRecord = z.infer<typeof AudioFeatureRecordSchema>
export type MutationEntry = z.infer<typeof MutationEntrySchema>
export type MutationResult = z.infer<typeof MutationResultSchema>
export type PlaylistAnalysis = z.infer<typeof PlaylistAnalysisSchema>
export type PlaylistRef = z.infer<typeof PlaylistRefSchema>
export type RecommendationSeedSet = z.infer<typeof RecommendationSeedSetSchema>
export type SkipReason = z.infer<typeof SkipReasonSchema>
export type TrackDetail = z.infer<typeof TrackDetailSchema>
/** Opaque catalog track identifier */
export type TrackRef = string
