/**
 * RecommendationService - seed selection and the recommendation request
 *
 * Seeds are allocated under a cap of 5 with priority tracks > artists > genres.
 * Averaged features become `target_*` hints.
 */

import {type CatalogClient, describeRemoteFailure} from '@tracktap/catalog-client'
import {
  AUDIO_FEATURE_NAMES,
  type AudioFeatureName,
  type AudioFeatureRecord,
  type PlaylistAnalysis,
  type RecommendationSeedSet,
} from '@tracktap/shared-types'

import {CURATION, SEED_LIMITS} from '../constants'
import {toTrackUri} from '../lib/identifiers'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'

export type RecommendationFailure = 'empty-result' | 'no-seeds' | 'remote-error'

export interface RecommendationOutcome {
  failure: null | RecommendationFailure
  seeds: RecommendationSeedSet
  /** Recommended track ids in the order the service returned them */
  trackIds: string[]
}

// ===== Pure Allocation =====

/**
 * Fill the seed slots: tracks first, then deduplicated artists, then genres in rank order
 */
export function allocateSeeds(
  trackRefs: readonly string[],
  artistIds: readonly string[],
  genres: readonly string[],
): RecommendationSeedSet {
  const seedTracks = trackRefs.slice(0, SEED_LIMITS.MAX_TRACKS)
  const seedArtists = [...new Set(artistIds)].slice(0, SEED_LIMITS.MAX_TOTAL - seedTracks.length)
  const seedGenres = genres.slice(0, SEED_LIMITS.MAX_TOTAL - seedTracks.length - seedArtists.length)
  return {seedArtists, seedGenres, seedTracks}
}

export function countSeeds(seeds: RecommendationSeedSet): number {
  return seeds.seedArtists.length + seeds.seedGenres.length + seeds.seedTracks.length
}

export function buildTargetFeatures(averages: AudioFeatureRecord): Partial<Record<AudioFeatureName, number>> {
  const targets: Partial<Record<AudioFeatureName, number>> = {}
  for (const name of AUDIO_FEATURE_NAMES) {
    const value = averages[name]
    if (typeof value === 'number') {
      targets[name] = value
    }
  }
  return targets
}

// ===== Catalog Steps =====

async function resolvePrimaryArtist(catalog: CatalogClient, trackId: string): Promise<null | string> {
  try {
    const track = await catalogCall(() => catalog.getTrack(trackId), `seed track ${trackId}`)
    return track.artists[0]?.id ?? null
  } catch {
    getLogger()?.warn(`No artist seed for track ${trackId}; lookup failed`)
    return null
  }
}

export async function selectSeeds(catalog: CatalogClient, analysis: PlaylistAnalysis): Promise<RecommendationSeedSet> {
  const chosenTracks = analysis.seedTrackIds.slice(0, SEED_LIMITS.MAX_TRACKS)
  const artistIds: string[] = []
  for (const trackId of chosenTracks) {
    const artistId = await resolvePrimaryArtist(catalog, trackId)
    if (artistId) {
      artistIds.push(artistId)
    }
  }
  return allocateSeeds(chosenTracks.map(toTrackUri), artistIds, analysis.topGenres)
}

export async function requestRecommendations(
  catalog: CatalogClient,
  analysis: PlaylistAnalysis,
  limit: number = CURATION.RECOMMENDATION_COUNT,
): Promise<RecommendationOutcome> {
  const logger = getLogger()
  const seeds = await selectSeeds(catalog, analysis)

  if (countSeeds(seeds) === 0) {
    logger?.warn('No seeds available; recommendation request skipped')
    return {failure: 'no-seeds', seeds, trackIds: []}
  }

  logger?.info('Requesting recommendations', {...seeds})

  try {
    const tracks = await catalogCall(
      () => catalog.getRecommendations({...seeds, limit, targets: buildTargetFeatures(analysis.featureAverages)}),
      'recommendations',
    )
    const trackIds = tracks.flatMap(track => (track.id ? [track.id] : []))
    if (trackIds.length === 0) {
      logger?.warn('Recommendation request returned no tracks')
      return {failure: 'empty-result', seeds, trackIds}
    }
    return {failure: null, seeds, trackIds}
  } catch (error) {
    const {note, status} = describeRemoteFailure(error)
    if (note === 'bad-request') {
      logger?.warn('Recommendation request rejected as a bad request; check seed genres and targets', {status})
    } else if (note === 'rate-limited') {
      logger?.warn('Recommendation request rate limited; try again later', {status})
    }
    return {failure: 'remote-error', seeds, trackIds: []}
  }
}
