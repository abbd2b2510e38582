/**
 * Audio feature lookup in service-sized chunks
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import type {SpotifyAudioFeatures} from '@tracktap/shared-types'

import {BATCH_LIMITS} from '../constants'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import {chunk} from './BatchWriter'

/**
 * Map of track id to its audio features. Ids in a failed chunk are simply absent.
 */
export async function fetchAudioFeatureMap(
  catalog: CatalogClient,
  trackIds: readonly string[],
): Promise<Map<string, SpotifyAudioFeatures>> {
  const features = new Map<string, SpotifyAudioFeatures>()
  const uniqueIds = [...new Set(trackIds)]

  for (const ids of chunk(uniqueIds, BATCH_LIMITS.AUDIO_FEATURES)) {
    try {
      const batch = await catalogCall(() => catalog.getAudioFeatures(ids), `audio features x${ids.length}`)
      for (const entry of batch) {
        if (entry) {
          features.set(entry.id, entry)
        }
      }
    } catch {
      getLogger()?.warn(`Audio features unavailable for ${ids.length} track(s)`)
    }
  }

  return features
}
