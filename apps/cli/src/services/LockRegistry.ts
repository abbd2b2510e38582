/**
 * LockRegistry - playlists exempt from automated mutation
 *
 * Reads and writes `locked_playlists` on the configuration object it is given.
 * Saving that object is left to the caller.
 */

import {type LockEntry, LockListSchema} from '@tracktap/shared-types'

/** Any object that may carry a lock list; a malformed list counts as empty */
export interface LockStorage {
  locked_playlists?: unknown
}

export class LockRegistry {
  private storage: LockStorage

  constructor(storage: LockStorage) {
    this.storage = storage
  }

  isLocked(playlistId: string): boolean {
    return this.entries().some(entry => entry.id === playlistId)
  }

  list(): LockEntry[] {
    return this.entries()
  }

  /**
   * Returns false without changes when the playlist is already locked
   */
  lock(playlistId: string, name: string): boolean {
    const entries = this.entries()
    if (entries.some(entry => entry.id === playlistId)) {
      return false
    }
    this.storage.locked_playlists = [...entries, {id: playlistId, name}]
    return true
  }

  /**
   * Returns false when the playlist was not locked
   */
  unlock(playlistId: string): boolean {
    const entries = this.entries()
    const remaining = entries.filter(entry => entry.id !== playlistId)
    if (remaining.length === entries.length) {
      return false
    }
    this.storage.locked_playlists = remaining
    return true
  }

  private entries(): LockEntry[] {
    const parsed = LockListSchema.safeParse(this.storage.locked_playlists)
    return parsed.success ? parsed.data : []
  }
}
