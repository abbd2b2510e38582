/**
 * ConfigStore Tests
 */

import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import {afterEach, beforeEach, describe, expect, it} from 'vitest'

import {ConfigError, ConfigStore, redactConfig} from '../../config/ConfigStore'
import {buildConfig} from '../fixtures/test-builders'

describe('ConfigStore', () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tracktap-config-'))
    path = join(dir, 'config.json')
  })

  afterEach(async () => {
    await rm(dir, {force: true, recursive: true})
  })

  it('returns null for a missing file', async () => {
    expect(await new ConfigStore(path).load()).toBeNull()
  })

  it('saves pretty JSON and loads it back', async () => {
    const store = new ConfigStore(path)
    const config = buildConfig({
      genres: {rock: {playlists: ['Rock Mix'], save_to_liked: true}},
      locked_playlists: [{id: 'p1', name: 'Rock Mix'}],
    })

    await store.save(config)

    expect(await readFile(path, 'utf8')).toBe(`${JSON.stringify(config, null, 2)}\n`)
    expect(await store.load()).toEqual(config)
  })

  it('fills defaults and keeps unknown keys', async () => {
    await writeFile(path, JSON.stringify({theme: 'dark'}))

    expect(await new ConfigStore(path).load()).toEqual({
      client_id: '',
      client_secret: '',
      redirect_uri: 'http://localhost:8080',
      theme: 'dark',
    })
  })

  it('treats a malformed lock list as empty', async () => {
    await writeFile(path, JSON.stringify({locked_playlists: 'p1'}))

    const config = await new ConfigStore(path).load()

    expect(config?.locked_playlists).toEqual([])
  })

  it('rejects invalid JSON', async () => {
    await writeFile(path, '{not json')

    await expect(new ConfigStore(path).load()).rejects.toThrow(new ConfigError(`${path} is not valid JSON`, path))
  })

  it('rejects a config that does not match the schema', async () => {
    await writeFile(path, JSON.stringify({genres: {rock: {playlists: 'Rock Mix'}}}))

    await expect(new ConfigStore(path).load()).rejects.toBeInstanceOf(ConfigError)
  })
})

describe('redactConfig', () => {
  it('masks the client secret', () => {
    expect(redactConfig(buildConfig()).client_secret).toBe('********')
    expect(redactConfig(buildConfig({client_secret: ''})).client_secret).toBe('')
  })
})
