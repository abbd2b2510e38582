/**
 * TrackAdder - the add-song path across a genre group's targets
 *
 * Targets are attempted in order: liked songs first, then each configured
 * playlist. Locked playlists are skipped before any remote call unless forced.
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import type {AppConfig, MutationEntry, MutationResult} from '@tracktap/shared-types'

import {resolveGenreGroup} from '../config/genre-groups'
import {LIKED_SONGS_TARGET} from '../constants'
import {isShortLink, parseTrackReference, toTrackUri} from '../lib/identifiers'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import type {LockRegistry} from './LockRegistry'
import {listOwnedPlaylists, matchPlaylistNames, type PlaylistTarget} from './PlaylistDirectory'

export interface AddTrackOptions {
  /** Write to locked playlists too */
  force?: boolean
  locks: LockRegistry
  saveToLiked: boolean
}

export interface TrackAddition {
  input: string
  result: MutationResult
  trackId: null | string
}

export type AddSongsOutcome =
  | {error: string; ok: false}
  | {additions: TrackAddition[]; group: string; ok: true; processed: number; total: number}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function hasSuccess(result: MutationResult): boolean {
  return result.some(entry => entry.success)
}

export async function addTrackToTargets(
  catalog: CatalogClient,
  trackId: string,
  targets: readonly PlaylistTarget[],
  options: AddTrackOptions,
): Promise<MutationResult> {
  const result: MutationEntry[] = []

  if (options.saveToLiked) {
    try {
      await catalogCall(() => catalog.saveLiked(trackId), `save ${trackId} to liked songs`)
      result.push({error: null, reason: null, success: true, target: LIKED_SONGS_TARGET})
    } catch (error) {
      result.push({error: describeError(error), reason: 'remote-error', success: false, target: LIKED_SONGS_TARGET})
    }
  }

  for (const target of targets) {
    if (target.id === null) {
      result.push({error: 'playlist not found', reason: 'not-found', success: false, target: target.name})
      continue
    }
    if (!options.force && options.locks.isLocked(target.id)) {
      result.push({error: null, reason: 'locked', success: false, target: target.name})
      continue
    }
    const playlistId = target.id
    try {
      await catalogCall(() => catalog.addItems(playlistId, [toTrackUri(trackId)]), `add ${trackId} to ${target.name}`)
      result.push({error: null, reason: null, success: true, target: target.name})
    } catch (error) {
      result.push({error: describeError(error), reason: 'remote-error', success: false, target: target.name})
    }
  }

  return result
}

/**
 * Add each referenced track to the targets of a genre group
 */
export async function addSongs(
  catalog: CatalogClient,
  config: AppConfig,
  inputs: readonly string[],
  options: {force?: boolean; genre?: string; locks: LockRegistry},
): Promise<AddSongsOutcome> {
  const logger = getLogger()
  const resolved = resolveGenreGroup(config, options.genre)
  if (!resolved.ok) {
    return resolved
  }

  const {group, name} = resolved
  let targets: PlaylistTarget[] = []
  if (group.playlists.length > 0) {
    const owned = await listOwnedPlaylists(catalog)
    if (!owned.complete) {
      return {error: 'could not list your playlists', ok: false}
    }
    targets = matchPlaylistNames(owned.items, group.playlists)
  }
  if (targets.length === 0 && !group.save_to_liked) {
    return {error: `genre group "${name}" has no playlists and does not save to liked songs`, ok: false}
  }

  const additions: TrackAddition[] = []
  for (const input of inputs) {
    const reference = parseTrackReference(input)
    if (!reference) {
      logger?.warn(`Skipping "${input}": not a track link, URI or id`)
      additions.push({input, result: [], trackId: null})
      continue
    }

    const result = await addTrackToTargets(catalog, reference.id, targets, {
      force: options.force,
      locks: options.locks,
      saveToLiked: group.save_to_liked,
    })
    if (!hasSuccess(result) && (reference.kind === 'short-link' || isShortLink(input))) {
      logger?.warn(`"${input}" is a short link, which is not resolved; open it and copy the full track link instead`)
    }
    additions.push({input, result, trackId: reference.id})
  }

  return {
    additions,
    group: name,
    ok: true,
    processed: additions.filter(addition => hasSuccess(addition.result)).length,
    total: inputs.length,
  }
}
