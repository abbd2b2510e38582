/**
 * ListeningHistory - top tracks, recent plays and what fell out of rotation
 */

import type {CatalogClient, TimeRange} from '@tracktap/catalog-client'
import type {SpotifyTrack} from '@tracktap/shared-types'

import {HISTORY} from '../constants'
import {walkPages, type WalkResult} from './PaginationWalker'

export async function topTracks(
  catalog: CatalogClient,
  range: TimeRange,
  limit: number = HISTORY.DEFAULT_LIMIT,
): Promise<WalkResult<SpotifyTrack>> {
  return walkPages(cursor => catalog.listTopTracksPage(range, cursor), {context: `top tracks ${range}`, maxItems: limit})
}

export async function recentlyPlayed(
  catalog: CatalogClient,
  limit: number = HISTORY.DEFAULT_LIMIT,
): Promise<WalkResult<SpotifyTrack>> {
  const walk = await walkPages(cursor => catalog.listRecentlyPlayedPage(cursor), {
    context: 'recently played',
    maxItems: limit,
  })
  return {...walk, items: walk.items.map(play => play.track)}
}

/**
 * Long-term favorites absent from medium-term, short-term and recent listening
 */
export function findOldFavorites(
  longTerm: readonly SpotifyTrack[],
  mediumTerm: readonly SpotifyTrack[],
  shortTerm: readonly SpotifyTrack[],
  recent: readonly SpotifyTrack[],
  count: number = HISTORY.OLD_FAVORITES,
): SpotifyTrack[] {
  const current = new Set<string>()
  for (const track of [...mediumTerm, ...shortTerm, ...recent]) {
    if (track.id) {
      current.add(track.id)
    }
  }
  return longTerm.filter(track => track.id !== null && !current.has(track.id)).slice(0, count)
}

/**
 * Null when any of the four history lists could not be read
 */
export async function collectOldFavorites(
  catalog: CatalogClient,
  count: number = HISTORY.OLD_FAVORITES,
): Promise<null | SpotifyTrack[]> {
  const [longTerm, mediumTerm, shortTerm, recent] = [
    await topTracks(catalog, 'long_term', HISTORY.TRACK_SAMPLE),
    await topTracks(catalog, 'medium_term', HISTORY.TRACK_SAMPLE),
    await topTracks(catalog, 'short_term', HISTORY.TRACK_SAMPLE),
    await recentlyPlayed(catalog, HISTORY.TRACK_SAMPLE),
  ]
  if (!longTerm.complete || !mediumTerm.complete || !shortTerm.complete || !recent.complete) {
    return null
  }
  return findOldFavorites(longTerm.items, mediumTerm.items, shortTerm.items, recent.items, count)
}

/**
 * Genres of the top artists ranked by how many artists carry them
 */
export async function suggestGenres(
  catalog: CatalogClient,
  range: TimeRange,
  limit: number = HISTORY.GENRE_SUGGESTIONS,
): Promise<null | string[]> {
  const artists = await walkPages(cursor => catalog.listTopArtistsPage(range, cursor), {
    context: `top artists ${range}`,
    maxItems: HISTORY.TOP_ARTISTS_SAMPLE,
  })
  if (!artists.complete) {
    return null
  }

  const counts = new Map<string, number>()
  for (const artist of artists.items) {
    for (const genre of artist.genres) {
      counts.set(genre, (counts.get(genre) ?? 0) + 1)
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([genre]) => genre)
}
