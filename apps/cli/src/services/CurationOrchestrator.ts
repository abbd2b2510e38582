/**
 * CurationOrchestrator - builds a new playlist from recommendations seeded by a source playlist
 *
 * START -> ANALYZE -> RECOMMEND -> NAME -> CREATE -> POPULATE -> DONE
 * Any step may end the run in ABORTED. Every transition emits one progress message.
 */

import type {CatalogClient} from '@tracktap/catalog-client'

import {CURATION} from '../constants'
import {parsePlaylistReference, toPlaylistShareUrl, toTrackUri} from '../lib/identifiers'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import {addItemsInBatches} from './BatchWriter'
import {analyzeTracks, isAnalysisUnavailable} from './MoodGenreAnalyzer'
import {collectPlaylistItems} from './PlaylistDirectory'
import {requestRecommendations} from './RecommendationService'

export type CurationState = 'ABORTED' | 'ANALYZE' | 'CREATE' | 'DONE' | 'NAME' | 'POPULATE' | 'RECOMMEND' | 'START'

export type ProgressSink = (message: string) => void

export interface CurationOptions {
  /** Used verbatim when given */
  newName?: string
  now?: () => Date
  progress?: ProgressSink
  recommendationCount?: number
}

export type CurationResult =
  | {
      name: string
      playlistId: string
      populated: number
      requested: number
      shareUrl: string
      states: CurationState[]
      status: 'done'
    }
  | {
      abortedIn: CurationState
      reason: string
      states: CurationState[]
      status: 'aborted'
    }

// ===== Naming =====

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatIsoDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  return `${date.getFullYear()}-${month}-${day}`
}

/** A missing or empty source name takes the generic fallback */
export function composeCuratedName(sourceName: null | string, date: Date): string {
  const isoDate = formatIsoDate(date)
  return sourceName
    ? `${CURATION.NAME_PREFIX} - ${sourceName} - ${isoDate}`
    : `${CURATION.FALLBACK_NAME} - ${isoDate}`
}

// ===== State Machine =====

class CurationRun {
  current: CurationState = 'START'
  readonly states: CurationState[] = ['START']
  private progress: ProgressSink

  constructor(progress: ProgressSink) {
    this.progress = progress
  }

  abort(reason: string): CurationResult {
    const abortedIn = this.current
    this.enter('ABORTED', `Curation aborted during ${abortedIn}: ${reason}`)
    getLogger()?.warn('Curation aborted', {reason, state: abortedIn})
    return {abortedIn, reason, states: this.states, status: 'aborted'}
  }

  enter(state: CurationState, message: string): void {
    this.current = state
    this.states.push(state)
    this.progress(message)
  }
}

export async function curatePlaylist(
  catalog: CatalogClient,
  source: string,
  options: CurationOptions = {},
): Promise<CurationResult> {
  const run = new CurationRun(options.progress ?? (message => console.log(message)))
  const now = options.now ?? (() => new Date())

  const reference = parsePlaylistReference(source)
  if (!reference) {
    return run.abort(`"${source}" is not a playlist link, URI or id`)
  }
  const sourceId = reference.id

  // ANALYZE
  run.enter('ANALYZE', '1/5 Analyzing source playlist...')
  const items = await collectPlaylistItems(catalog, sourceId)
  if (!items.complete) {
    return run.abort('could not read the source playlist')
  }
  const trackIds = items.items.flatMap(item => (item.track?.id ? [item.track.id] : []))
  const analysis = await analyzeTracks(catalog, trackIds)
  if (isAnalysisUnavailable(analysis)) {
    return run.abort('no analyzable tracks in the source playlist')
  }

  // RECOMMEND
  run.enter('RECOMMEND', `2/5 Requesting recommendations (top genres: ${analysis.topGenres.join(', ') || 'none'})...`)
  const recommendations = await requestRecommendations(
    catalog,
    analysis,
    options.recommendationCount ?? CURATION.RECOMMENDATION_COUNT,
  )
  if (recommendations.failure !== null) {
    return run.abort(`no recommendations (${recommendations.failure})`)
  }

  // NAME
  run.enter('NAME', '3/5 Choosing a name...')
  const name = options.newName ?? composeCuratedName(await fetchPlaylistName(catalog, sourceId), now())

  // CREATE
  run.enter('CREATE', `4/5 Creating playlist "${name}"...`)
  let playlistId: null | string
  try {
    const user = await catalogCall(() => catalog.getCurrentUser(), 'current user')
    playlistId = await catalogCall(() => catalog.createPlaylist(user.id, name, true), `create "${name}"`)
  } catch {
    return run.abort('playlist creation failed')
  }
  if (!playlistId) {
    return run.abort('playlist creation returned no id')
  }

  // POPULATE
  const requested = recommendations.trackIds.length
  run.enter('POPULATE', `5/5 Adding ${requested} track(s)...`)
  const written = await addItemsInBatches(catalog, playlistId, recommendations.trackIds.map(toTrackUri))

  const shareUrl = toPlaylistShareUrl(playlistId)
  run.enter('DONE', `Created "${name}" with ${written.added}/${requested} track(s): ${shareUrl}`)
  return {
    name,
    playlistId,
    populated: written.added,
    requested,
    shareUrl,
    states: run.states,
    status: 'done',
  }
}

async function fetchPlaylistName(catalog: CatalogClient, playlistId: string): Promise<null | string> {
  try {
    const playlist = await catalogCall(() => catalog.getPlaylist(playlistId), `playlist ${playlistId}`)
    return playlist.name || null
  } catch {
    getLogger()?.warn(`Source playlist name unavailable; using "${CURATION.FALLBACK_NAME}"`)
    return null
  }
}
