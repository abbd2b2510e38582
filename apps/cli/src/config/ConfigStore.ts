/**
 * ConfigStore - JSON configuration file with zod validation
 */

import {readFile, writeFile} from 'node:fs/promises'

import {type AppConfig, AppConfigSchema, formatZodError, safeParse} from '@tracktap/shared-types'

export class ConfigError extends Error {
  readonly path: string

  constructor(message: string, path: string) {
    super(message)
    this.name = 'ConfigError'
    this.path = path
  }
}

export function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT'
}

export class ConfigStore {
  readonly path: string

  constructor(path: string) {
    this.path = path
  }

  /**
   * Null when the file does not exist; throws ConfigError when it is unreadable or invalid
   */
  async load(): Promise<AppConfig | null> {
    let raw: string
    try {
      raw = await readFile(this.path, 'utf8')
    } catch (error) {
      if (isMissingFile(error)) {
        return null
      }
      throw new ConfigError(`Cannot read ${this.path}: ${String(error)}`, this.path)
    }

    let json: unknown
    try {
      json = JSON.parse(raw)
    } catch {
      throw new ConfigError(`${this.path} is not valid JSON`, this.path)
    }

    const parsed = safeParse(AppConfigSchema, json)
    if (!parsed.success) {
      throw new ConfigError(`${this.path} is invalid: ${formatZodError(parsed.error)}`, this.path)
    }
    return parsed.data
  }

  async save(config: AppConfig): Promise<void> {
    await writeFile(this.path, `${JSON.stringify(config, null, 2)}\n`, 'utf8')
  }
}

/**
 * Copy of the config safe to print
 */
export function redactConfig(config: AppConfig): AppConfig {
  return {
    ...config,
    client_secret: config.client_secret ? '********' : '',
  }
}
