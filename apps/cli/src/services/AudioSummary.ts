/**
 * AudioSummary - tempo and key overview of a playlist
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import type {SpotifyAudioFeatures, SpotifyTrack} from '@tracktap/shared-types'

import {getLogger} from '../utils/LoggerContext'
import {fetchAudioFeatureMap} from './AudioFeatureLookup'
import {keyNameToWheelCode, pitchClassToKeyName, UNKNOWN_KEY} from './AudioKeyCodec'
import {collectPlaylistItems} from './PlaylistDirectory'

export interface TrackAudioSummary {
  artist: string
  camelotKey: string
  id: string
  name: string
  standardKey: string
  tempo: null | number
}

export interface PlaylistAudioSummary {
  averageBpm: null | number
  /** Track count per key name; tracks with an unknown key are not counted */
  keyDistribution: Record<string, number>
  maxBpm: null | number
  minBpm: null | number
  tracks: TrackAudioSummary[]
}

export function summarizeTrack(track: SpotifyTrack & {id: string}, features: SpotifyAudioFeatures | undefined) {
  const standardKey = pitchClassToKeyName(features?.key ?? -1, features?.mode ?? -1)
  const summary: TrackAudioSummary = {
    artist: track.artists.map(artist => artist.name).join(', '),
    camelotKey: keyNameToWheelCode(standardKey),
    id: track.id,
    name: track.name,
    standardKey,
    tempo: features?.tempo ?? null,
  }
  return summary
}

export function summarizeAudio(tracks: readonly TrackAudioSummary[]): PlaylistAudioSummary {
  const tempos = tracks.flatMap(track => (track.tempo === null ? [] : [track.tempo]))
  const keyDistribution: Record<string, number> = {}
  for (const track of tracks) {
    if (track.standardKey !== UNKNOWN_KEY) {
      keyDistribution[track.standardKey] = (keyDistribution[track.standardKey] ?? 0) + 1
    }
  }

  return {
    averageBpm: tempos.length > 0 ? tempos.reduce((sum, tempo) => sum + tempo, 0) / tempos.length : null,
    keyDistribution,
    maxBpm: tempos.length > 0 ? Math.max(...tempos) : null,
    minBpm: tempos.length > 0 ? Math.min(...tempos) : null,
    tracks: [...tracks],
  }
}

/**
 * Null when the playlist's items could not be read
 */
export async function summarizePlaylistAudio(
  catalog: CatalogClient,
  playlistId: string,
): Promise<null | PlaylistAudioSummary> {
  const items = await collectPlaylistItems(catalog, playlistId)
  if (!items.complete) {
    return null
  }

  const tracks = items.items.flatMap(item => {
    const track = item.track
    return track?.id ? [{...track, id: track.id}] : []
  })
  const features = await fetchAudioFeatureMap(
    catalog,
    tracks.map(track => track.id),
  )
  getLogger()?.info(`Audio features found for ${features.size}/${tracks.length} track(s)`)

  return summarizeAudio(tracks.map(track => summarizeTrack(track, features.get(track.id))))
}
