/**
 * In-memory config and token stores for command tests
 */

import type {TokenStore} from '@tracktap/catalog-client'
import type {AppConfig, CachedToken} from '@tracktap/shared-types'

import type {ConfigRepository} from '../../cli/commands'

export class MemoryConfigStore implements ConfigRepository {
  readonly path = 'memory://config.json'
  saves = 0
  private config: AppConfig | null

  constructor(config: AppConfig | null = null) {
    this.config = config
  }

  async load(): Promise<AppConfig | null> {
    return this.config === null ? null : structuredClone(this.config)
  }

  async save(config: AppConfig): Promise<void> {
    this.saves++
    this.config = structuredClone(config)
  }

  /** Current stored config, for assertions */
  stored(): AppConfig | null {
    return this.config
  }
}

export class MemoryTokenStore implements TokenStore {
  token: CachedToken | null = null

  async load(): Promise<CachedToken | null> {
    return this.token
  }

  async save(token: CachedToken): Promise<void> {
    this.token = token
  }
}
