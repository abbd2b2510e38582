/**
 * Test Data Builders
 * Catalog records with sensible defaults
 */

import type {
  AppConfig,
  SpotifyArtistFull,
  SpotifyAudioFeatures,
  SpotifyPlaylistItem,
  SpotifyPlaylistSimple,
  SpotifyTrack,
  TrackDetail,
} from '@tracktap/shared-types'

export function buildTrack(id: string, overrides?: Partial<SpotifyTrack>): SpotifyTrack {
  return {
    artists: [{id: `artist-${id}`, name: `Artist ${id}`}],
    id,
    name: `Track ${id}`,
    uri: `spotify:track:${id}`,
    ...overrides,
  }
}

export function buildArtist(id: string, genres: string[] = []): SpotifyArtistFull {
  return {genres, id, name: `Artist ${id}`}
}

export function buildFeatures(id: string, overrides?: Partial<SpotifyAudioFeatures>): SpotifyAudioFeatures {
  return {
    acousticness: 0.25,
    danceability: 0.5,
    energy: 0.75,
    id,
    instrumentalness: 0,
    key: 0,
    liveness: 0.125,
    mode: 1,
    speechiness: 0.0625,
    tempo: 120,
    valence: 0.5,
    ...overrides,
  }
}

export function buildPlaylist(id: string, name: string, ownerId = 'me'): SpotifyPlaylistSimple {
  return {
    external_urls: {spotify: `https://open.spotify.com/playlist/${id}`},
    id,
    name,
    owner: {id: ownerId},
  }
}

export function buildPlaylistItems(tracks: readonly (null | SpotifyTrack)[]): SpotifyPlaylistItem[] {
  return tracks.map(track => ({track}))
}

export function buildTrackDetail(trackId: string, overrides?: Partial<TrackDetail>): TrackDetail {
  return {
    audioFeatures: null,
    genres: [],
    trackId,
    ...overrides,
  }
}

export function buildConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    client_id: 'test-client',
    client_secret: 'test-secret',
    redirect_uri: 'http://localhost:8080',
    ...overrides,
  }
}
