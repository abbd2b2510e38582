/**
 * FileTokenStore - token cache persisted as JSON beside the config
 */

import {readFile, writeFile} from 'node:fs/promises'

import type {TokenStore} from '@tracktap/catalog-client'
import {type CachedToken, CachedTokenSchema} from '@tracktap/shared-types'

import {getLogger} from '../utils/LoggerContext'
import {isMissingFile} from './ConfigStore'

export class FileTokenStore implements TokenStore {
  private path: string

  constructor(path: string) {
    this.path = path
  }

  /**
   * A missing or unreadable cache reads as no token
   */
  async load(): Promise<CachedToken | null> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      if (!isMissingFile(error)) {
        getLogger()?.warn(`Token cache ${this.path} could not be read`, {error: String(error)})
      }
      return null
    }

    try {
      const parsed = CachedTokenSchema.safeParse(JSON.parse(raw))
      if (parsed.success) {
        return parsed.data
      }
    } catch {
      getLogger()?.warn(`Token cache ${this.path} is not valid JSON`)
      return null
    }
    getLogger()?.warn(`Token cache ${this.path} has an unexpected shape`)
    return null
  }

  async save(token: CachedToken): Promise<void> {
    await writeFile(this.path, JSON.stringify(token), {encoding: 'utf8', mode: 0o600})
  }
}
