/**
 * PlaylistDirectory - lookups over the current identity's playlists
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import type {PlaylistRef, SpotifyPlaylistItem, SpotifyPlaylistSimple} from '@tracktap/shared-types'

import {parsePlaylistReference} from '../lib/identifiers'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import {walkPages, type WalkResult} from './PaginationWalker'

export interface PlaylistTarget {
  /** null when no owned playlist carries the configured name */
  id: null | string
  name: string
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0
}

// ===== Catalog Reads =====

/**
 * Playlists owned by the current identity; followed playlists are excluded
 */
export async function listOwnedPlaylists(catalog: CatalogClient): Promise<WalkResult<SpotifyPlaylistSimple>> {
  let ownerId: string
  try {
    const user = await catalogCall(() => catalog.getCurrentUser(), 'current user')
    ownerId = user.id
  } catch (error) {
    return {complete: false, error, items: [], pages: 0}
  }

  const walk = await walkPages(cursor => catalog.listPlaylistsPage(cursor), {context: 'playlists'})
  return {...walk, items: walk.items.filter(playlist => playlist.owner.id === ownerId)}
}

export async function collectPlaylistItems(
  catalog: CatalogClient,
  playlistId: string,
): Promise<WalkResult<SpotifyPlaylistItem>> {
  return walkPages(cursor => catalog.listPlaylistItemsPage(playlistId, cursor), {context: `playlist ${playlistId}`})
}

// ===== Pure Lookups =====

/**
 * Resolve configured names to playlists, keeping the configured order
 */
export function matchPlaylistNames(
  playlists: readonly SpotifyPlaylistSimple[],
  names: readonly string[],
): PlaylistTarget[] {
  return names.map(name => ({id: playlists.find(playlist => playlist.name === name)?.id ?? null, name}))
}

/**
 * Case-insensitive substring search, sorted by name
 */
export function searchPlaylists(
  playlists: readonly SpotifyPlaylistSimple[],
  term?: string,
): SpotifyPlaylistSimple[] {
  const needle = term?.toLowerCase()
  return playlists
    .filter(playlist => !needle || playlist.name.toLowerCase().includes(needle))
    .sort((a, b) => compareNames(a.name, b.name))
}

/**
 * Exact name first, then a case-insensitive match. Among several
 * case-insensitive matches the alphabetically first name wins.
 */
export function findPlaylistByName(
  playlists: readonly SpotifyPlaylistSimple[],
  name: string,
): null | SpotifyPlaylistSimple {
  const exact = playlists.find(playlist => playlist.name === name)
  if (exact) {
    return exact
  }

  const lowered = name.toLowerCase()
  const matches = playlists
    .filter(playlist => playlist.name.toLowerCase() === lowered)
    .sort((a, b) => compareNames(a.name, b.name))
  const [first] = matches
  if (!first) {
    return null
  }
  if (matches.length > 1) {
    getLogger()?.warn(`Several playlists match "${name}"; using "${first.name}"`, {
      matches: matches.map(playlist => playlist.name),
    })
  }
  return first
}

// ===== Resolution =====

/**
 * Accept a playlist link, URI, bare id or the name of an owned playlist
 */
export async function resolvePlaylist(catalog: CatalogClient, input: string): Promise<null | PlaylistRef> {
  const reference = parsePlaylistReference(input)
  if (reference) {
    try {
      const playlist = await catalogCall(() => catalog.getPlaylist(reference.id), `playlist ${reference.id}`)
      return {id: playlist.id, name: playlist.name}
    } catch {
      getLogger()?.warn(`Playlist ${reference.id} could not be fetched; using its id as the name`)
      return {id: reference.id, name: reference.id}
    }
  }

  const owned = await listOwnedPlaylists(catalog)
  const match = findPlaylistByName(owned.items, input)
  return match ? {id: match.id, name: match.name} : null
}

export async function getPlaylistShareUrl(catalog: CatalogClient, name: string): Promise<null | string> {
  const owned = await listOwnedPlaylists(catalog)
  const match = findPlaylistByName(owned.items, name)
  return match?.external_urls.spotify ?? null
}
