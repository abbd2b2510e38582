/**
 * CatalogClient - the remote music catalog as seen by tracktap
 *
 * Paginated reads return one page plus an opaque cursor for the next one.
 * Every call may reject with a CatalogApiError; callers decide whether a failure is fatal.
 */

import type {
  AudioFeatureName,
  SpotifyArtistFull,
  SpotifyAudioFeatures,
  SpotifyPlayHistory,
  SpotifyPlaylistItem,
  SpotifyPlaylistSimple,
  SpotifyTrack,
  SpotifyUser,
} from '@tracktap/shared-types'

/** Opaque continuation token; null requests the first page */
export type PageCursor = null | string

export interface CatalogPage<T> {
  items: T[]
  next: PageCursor
}

export type TimeRange = 'long_term' | 'medium_term' | 'short_term'

export interface RecommendationRequest {
  limit: number
  seedArtists: string[]
  seedGenres: string[]
  /** Track references, either bare ids or `spotify:track:<id>` */
  seedTracks: string[]
  targets: Partial<Record<AudioFeatureName, number>>
}

export interface CatalogClient {
  /** At most 100 item references per call */
  addItems(playlistId: string, itemRefs: string[]): Promise<void>
  /** Resolves to the new playlist id, or null when the service returned none */
  createPlaylist(ownerId: string, name: string, isPublic: boolean): Promise<null | string>
  getArtist(id: string): Promise<SpotifyArtistFull>
  /** At most 100 ids per call; entries are null for tracks without features */
  getAudioFeatures(ids: string[]): Promise<(null | SpotifyAudioFeatures)[]>
  getCurrentUser(): Promise<SpotifyUser>
  getPlaylist(id: string): Promise<SpotifyPlaylistSimple>
  /** At most 5 seeds across tracks, artists and genres */
  getRecommendations(request: RecommendationRequest): Promise<SpotifyTrack[]>
  getTrack(id: string): Promise<SpotifyTrack>
  listPlaylistItemsPage(playlistId: string, cursor: PageCursor): Promise<CatalogPage<SpotifyPlaylistItem>>
  listPlaylistsPage(cursor: PageCursor): Promise<CatalogPage<SpotifyPlaylistSimple>>
  listRecentlyPlayedPage(cursor: PageCursor): Promise<CatalogPage<SpotifyPlayHistory>>
  listTopArtistsPage(range: TimeRange, cursor: PageCursor): Promise<CatalogPage<SpotifyArtistFull>>
  listTopTracksPage(range: TimeRange, cursor: PageCursor): Promise<CatalogPage<SpotifyTrack>>
  saveLiked(trackId: string): Promise<void>
}

/** Supplies a bearer token for each request */
export interface AccessTokenSource {
  getAccessToken(): Promise<string>
}
