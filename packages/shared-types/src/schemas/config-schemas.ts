/**
 * Zod schemas for the local configuration file and token cache
 */

import {z} from 'zod'

// ===== Genre Groups =====

export const GenreGroupSchema = z.object({
  playlists: z.array(z.string()).default([]),
  save_to_liked: z.boolean().default(false),
})

// ===== Locks =====

export const LockEntrySchema = z.object({
  id: z.string().min(1),
  name: z.string(),
})

export const LockListSchema = z.array(LockEntrySchema)

// ===== App Config =====

export const AppConfigSchema = z
  .object({
    client_id: z.string().default(''),
    client_secret: z.string().default(''),
    genres: z.record(z.string(), GenreGroupSchema).optional(),
    // Pre-genre configs listed target playlists at the top level
    playlists: z.array(z.string()).optional(),
    locked_playlists: LockListSchema.catch([]).optional(),
    redirect_uri: z.string().default('http://localhost:8080'),
  })
  .passthrough()

// ===== Token Cache =====

export const CachedTokenSchema = z.object({
  access_token: z.string(),
  expires_at: z.number(),
  refresh_token: z.string().nullable(),
  scope: z.string().optional(),
})

// ===== Types =====

export type AppConfig = z.infer<typeof AppConfigSchema>
export type CachedToken = z.infer<typeof CachedTokenSchema>
export type GenreGroup = z.infer<typeof GenreGroupSchema>
export type LockEntry = z.infer<typeof LockEntrySchema>
