/**
 * Genre group resolution over the loaded configuration
 */

import type {AppConfig, GenreGroup} from '@tracktap/shared-types'

import {DEFAULT_GENRE} from '../constants'

export type GenreGroupResolution = {error: string; ok: false} | {group: GenreGroup; name: string; ok: true}

/**
 * Pre-genre configs listed playlists at the top level; they map to a group
 * that never saves to liked songs.
 */
export function resolveGenreGroup(config: AppConfig, genre?: string): GenreGroupResolution {
  if (config.playlists && !config.genres) {
    return {group: {playlists: config.playlists, save_to_liked: false}, name: DEFAULT_GENRE, ok: true}
  }

  const name = genre ?? DEFAULT_GENRE
  const groups = config.genres ?? {}
  const group = groups[name]
  if (!group) {
    const available = Object.keys(groups)
    return {
      error:
        available.length > 0
          ? `genre group "${name}" not found; available: ${available.join(', ')}`
          : `genre group "${name}" not found and no groups are configured`,
      ok: false,
    }
  }
  return {group, name, ok: true}
}

export function upsertGenreGroup(config: AppConfig, name: string, group: GenreGroup): void {
  config.genres = {...config.genres, [name]: group}
}
