/**
 * PlaylistCopier - duplicates a playlist's items into a new playlist
 */

import type {CatalogClient} from '@tracktap/catalog-client'

import {parsePlaylistReference} from '../lib/identifiers'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'
import {addItemsInBatches, type FailedBatch} from './BatchWriter'
import {collectPlaylistItems} from './PlaylistDirectory'

export type CopyResult =
  | {added: number; failed: FailedBatch[]; playlistId: string; status: 'copied'; total: number}
  | {reason: string; status: 'failed'}

/**
 * An empty source still yields a new, empty playlist
 */
export async function copyPlaylist(catalog: CatalogClient, source: string, newName: string): Promise<CopyResult> {
  const reference = parsePlaylistReference(source)
  if (!reference) {
    return {reason: `"${source}" is not a playlist link, URI or id`, status: 'failed'}
  }

  const items = await collectPlaylistItems(catalog, reference.id)
  if (!items.complete) {
    return {reason: 'could not read the source playlist', status: 'failed'}
  }
  const uris = items.items.flatMap(item => (item.track ? [item.track.uri] : []))
  getLogger()?.info(`Copying ${uris.length} item(s) from ${reference.id}`)

  let playlistId: null | string
  try {
    const user = await catalogCall(() => catalog.getCurrentUser(), 'current user')
    playlistId = await catalogCall(() => catalog.createPlaylist(user.id, newName, true), `create "${newName}"`)
  } catch {
    return {reason: 'playlist creation failed', status: 'failed'}
  }
  if (!playlistId) {
    return {reason: 'playlist creation returned no id', status: 'failed'}
  }

  const written = await addItemsInBatches(catalog, playlistId, uris)
  return {added: written.added, failed: written.failed, playlistId, status: 'copied', total: uris.length}
}
