/**
 * MoodGenreAnalyzer - audio feature averages and genre frequency for a track set
 *
 * Lookups that fail for one track or artist are skipped; the batch is never
 * aborted for a single failure.
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import {
  AUDIO_FEATURE_NAMES,
  type AudioFeatureRecord,
  type PlaylistAnalysis,
  type SpotifyAudioFeatures,
  type SpotifyTrack,
  type TrackDetail,
} from '@tracktap/shared-types'

import {CURATION} from '../constants'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import {fetchAudioFeatureMap} from './AudioFeatureLookup'

// ===== Sentinel =====

export function emptyAnalysis(): PlaylistAnalysis {
  return {featureAverages: {}, seedTrackIds: [], topGenres: []}
}

/**
 * The sentinel produced for an empty input or when no track resolved
 */
export function isAnalysisUnavailable(analysis: PlaylistAnalysis): boolean {
  return (
    analysis.seedTrackIds.length === 0 &&
    analysis.topGenres.length === 0 &&
    Object.keys(analysis.featureAverages).length === 0
  )
}

// ===== Pure Aggregation =====

export function toFeatureRecord(features: SpotifyAudioFeatures): AudioFeatureRecord {
  const record: AudioFeatureRecord = {}
  for (const name of AUDIO_FEATURE_NAMES) {
    record[name] = features[name] ?? null
  }
  return record
}

/**
 * Mean of each feature over the tracks that supplied a value; null when none did
 */
export function averageFeatures(details: readonly TrackDetail[]): AudioFeatureRecord {
  const averages: AudioFeatureRecord = {}
  for (const name of AUDIO_FEATURE_NAMES) {
    let sum = 0
    let count = 0
    for (const detail of details) {
      const value = detail.audioFeatures?.[name]
      if (typeof value === 'number') {
        sum += value
        count++
      }
    }
    averages[name] = count > 0 ? sum / count : null
  }
  return averages
}

/**
 * Most frequent genres; ties keep the order in which genres were first seen
 */
export function rankGenres(details: readonly TrackDetail[], limit: number = CURATION.TOP_GENRES): string[] {
  const counts = new Map<string, number>()
  for (const detail of details) {
    for (const genre of detail.genres) {
      counts.set(genre, (counts.get(genre) ?? 0) + 1)
    }
  }
  return [...counts.entries()]
    .sort((a, b) => b[1] - a[1])
    .slice(0, limit)
    .map(([genre]) => genre)
}

export function aggregateAnalysis(details: readonly TrackDetail[], trackIds: readonly string[]): PlaylistAnalysis {
  if (details.length === 0) {
    return emptyAnalysis()
  }
  return {
    featureAverages: averageFeatures(details),
    seedTrackIds: trackIds.slice(0, CURATION.SEED_TRACKS),
    topGenres: rankGenres(details),
  }
}

// ===== Catalog Lookups =====

async function lookupArtistGenres(
  catalog: CatalogClient,
  artistId: string,
  cache: Map<string, string[]>,
): Promise<string[]> {
  const cached = cache.get(artistId)
  if (cached) {
    return cached
  }
  try {
    const artist = await catalogCall(() => catalog.getArtist(artistId), `artist ${artistId}`)
    cache.set(artistId, artist.genres)
    return artist.genres
  } catch {
    getLogger()?.warn(`No genres for artist ${artistId}; lookup failed`)
    return []
  }
}

/**
 * Per-track features and sorted artist genres. Tracks whose metadata cannot be
 * fetched are left out; tracks without features keep a null record.
 */
export async function fetchTrackDetails(catalog: CatalogClient, trackIds: readonly string[]): Promise<TrackDetail[]> {
  const featuresById = await fetchAudioFeatureMap(catalog, trackIds)
  const genreCache = new Map<string, string[]>()
  const details: TrackDetail[] = []

  for (const trackId of trackIds) {
    let track: SpotifyTrack
    try {
      track = await catalogCall(() => catalog.getTrack(trackId), `track ${trackId}`)
    } catch {
      getLogger()?.warn(`Skipping track ${trackId}; metadata unavailable`)
      continue
    }

    const genres = new Set<string>()
    for (const artist of track.artists) {
      if (!artist.id) {
        continue
      }
      for (const genre of await lookupArtistGenres(catalog, artist.id, genreCache)) {
        genres.add(genre)
      }
    }

    const features = featuresById.get(trackId)
    details.push({
      audioFeatures: features ? toFeatureRecord(features) : null,
      genres: [...genres].sort(),
      trackId,
    })
  }

  return details
}

export async function analyzeTracks(catalog: CatalogClient, trackIds: readonly string[]): Promise<PlaylistAnalysis> {
  if (trackIds.length === 0) {
    return emptyAnalysis()
  }
  const details = await fetchTrackDetails(catalog, trackIds)
  const analysis = aggregateAnalysis(details, trackIds)
  getLogger()?.info(`Analyzed ${details.length}/${trackIds.length} track(s)`, {topGenres: analysis.topGenres})
  return analysis
}
