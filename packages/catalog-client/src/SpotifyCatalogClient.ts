/**
 * SpotifyCatalogClient - fetch-based CatalogClient for the Spotify Web API
 *
 * Every response body is validated with a zod schema before it reaches the caller.
 */

import {
  formatZodError,
  safeParse,
  SpotifyArtistFullSchema,
  SpotifyAudioFeaturesBatchSchema,
  SpotifyCreatePlaylistResponseSchema,
  SpotifyPagingSchema,
  SpotifyPlayHistorySchema,
  SpotifyPlaylistItemSchema,
  SpotifyPlaylistSimpleSchema,
  SpotifyRecommendationsResponseSchema,
  SpotifySnapshotResponseSchema,
  SpotifyTrackSchema,
  SpotifyUserSchema,
} from '@tracktap/shared-types'
import type {z} from 'zod'

import type {AccessTokenSource, CatalogClient, PageCursor, RecommendationRequest, TimeRange} from './types'

import {CatalogApiError} from './errors'

export const SPOTIFY_API_BASE = 'https://api.spotify.com/v1'

export const SPOTIFY_PAGE_LIMITS = {
  PLAYLIST_ITEMS: 100,
  PLAYLISTS: 50,
  RECENTLY_PLAYED: 50,
  TOP_ITEMS: 50,
} as const

const PlaylistPageSchema = SpotifyPagingSchema(SpotifyPlaylistSimpleSchema)
const PlaylistItemPageSchema = SpotifyPagingSchema(SpotifyPlaylistItemSchema)
const TrackPageSchema = SpotifyPagingSchema(SpotifyTrackSchema)
const ArtistPageSchema = SpotifyPagingSchema(SpotifyArtistFullSchema)
const PlayHistoryPageSchema = SpotifyPagingSchema(SpotifyPlayHistorySchema)

const TRACK_URI_PREFIX = 'spotify:track:'

/**
 * Reduce a `spotify:track:<id>` reference to its id; bare ids pass through
 */
export function toTrackId(ref: string): string {
  return ref.startsWith(TRACK_URI_PREFIX) ? ref.slice(TRACK_URI_PREFIX.length) : ref
}

export class SpotifyCatalogClient implements CatalogClient {
  private baseUrl: string
  private tokens: AccessTokenSource

  constructor(tokens: AccessTokenSource, baseUrl = SPOTIFY_API_BASE) {
    this.tokens = tokens
    this.baseUrl = baseUrl
  }

  async addItems(playlistId: string, itemRefs: string[]): Promise<void> {
    await this.request(`/playlists/${encodeURIComponent(playlistId)}/tracks`, SpotifySnapshotResponseSchema, {
      body: JSON.stringify({uris: itemRefs}),
      method: 'POST',
    })
  }

  async createPlaylist(ownerId: string, name: string, isPublic: boolean): Promise<null | string> {
    const created = await this.request(
      `/users/${encodeURIComponent(ownerId)}/playlists`,
      SpotifyCreatePlaylistResponseSchema,
      {
        body: JSON.stringify({name, public: isPublic}),
        method: 'POST',
      },
    )
    return created.id ?? null
  }

  async getArtist(id: string) {
    return this.request(`/artists/${encodeURIComponent(id)}`, SpotifyArtistFullSchema)
  }

  async getAudioFeatures(ids: string[]) {
    if (ids.length === 0) {
      return []
    }
    const params = new URLSearchParams({ids: ids.join(',')})
    const batch = await this.request(`/audio-features?${params.toString()}`, SpotifyAudioFeaturesBatchSchema)
    return batch.audio_features
  }

  async getCurrentUser() {
    return this.request('/me', SpotifyUserSchema)
  }

  async getPlaylist(id: string) {
    return this.request(`/playlists/${encodeURIComponent(id)}`, SpotifyPlaylistSimpleSchema)
  }

  async getRecommendations(request: RecommendationRequest) {
    const params = new URLSearchParams({limit: String(request.limit)})
    if (request.seedTracks.length > 0) {
      params.set('seed_tracks', request.seedTracks.map(toTrackId).join(','))
    }
    if (request.seedArtists.length > 0) {
      params.set('seed_artists', request.seedArtists.join(','))
    }
    if (request.seedGenres.length > 0) {
      params.set('seed_genres', request.seedGenres.join(','))
    }
    for (const [feature, value] of Object.entries(request.targets)) {
      params.set(`target_${feature}`, String(value))
    }

    const response = await this.request(`/recommendations?${params.toString()}`, SpotifyRecommendationsResponseSchema)
    return response.tracks
  }

  async getTrack(id: string) {
    return this.request(`/tracks/${encodeURIComponent(id)}`, SpotifyTrackSchema)
  }

  async listPlaylistItemsPage(playlistId: string, cursor: PageCursor) {
    const first = `/playlists/${encodeURIComponent(playlistId)}/tracks?limit=${SPOTIFY_PAGE_LIMITS.PLAYLIST_ITEMS}`
    return this.request(cursor ?? first, PlaylistItemPageSchema)
  }

  async listPlaylistsPage(cursor: PageCursor) {
    return this.request(cursor ?? `/me/playlists?limit=${SPOTIFY_PAGE_LIMITS.PLAYLISTS}`, PlaylistPageSchema)
  }

  async listRecentlyPlayedPage(cursor: PageCursor) {
    const first = `/me/player/recently-played?limit=${SPOTIFY_PAGE_LIMITS.RECENTLY_PLAYED}`
    return this.request(cursor ?? first, PlayHistoryPageSchema)
  }

  async listTopArtistsPage(range: TimeRange, cursor: PageCursor) {
    const first = `/me/top/artists?time_range=${range}&limit=${SPOTIFY_PAGE_LIMITS.TOP_ITEMS}`
    return this.request(cursor ?? first, ArtistPageSchema)
  }

  async listTopTracksPage(range: TimeRange, cursor: PageCursor) {
    const first = `/me/top/tracks?time_range=${range}&limit=${SPOTIFY_PAGE_LIMITS.TOP_ITEMS}`
    return this.request(cursor ?? first, TrackPageSchema)
  }

  async saveLiked(trackId: string): Promise<void> {
    await this.send('/me/tracks', {
      body: JSON.stringify({ids: [trackId]}),
      method: 'PUT',
    })
  }

  private async request<T extends z.ZodTypeAny>(
    endpoint: string,
    schema: T,
    options: RequestInit = {},
  ): Promise<z.infer<T>> {
    const response = await this.send(endpoint, options)
    const json: unknown = await response.json().catch(() => null)
    const parsed = safeParse(schema, json)

    if (!parsed.success) {
      throw new CatalogApiError(`Unexpected response from ${endpoint}: ${formatZodError(parsed.error)}`, {
        endpoint,
        kind: 'invalid-response',
        status: response.status,
      })
    }

    return parsed.data
  }

  private async send(endpoint: string, options: RequestInit): Promise<Response> {
    // Cursors are absolute `next` links handed back by the service
    const url = endpoint.startsWith('https://') ? endpoint : `${this.baseUrl}${endpoint}`
    const token = await this.tokens.getAccessToken()
    const headers = new Headers(options.headers)
    headers.set('Authorization', `Bearer ${token}`)
    if (options.body !== undefined) {
      headers.set('Content-Type', 'application/json')
    }

    let response: Response
    try {
      response = await fetch(url, {...options, headers})
    } catch (error) {
      throw new CatalogApiError(`Network error calling ${endpoint}`, {
        cause: error,
        endpoint,
        kind: 'network',
        status: 0,
      })
    }

    if (!response.ok) {
      throw await CatalogApiError.fromResponse(response, endpoint)
    }

    return response
  }
}
