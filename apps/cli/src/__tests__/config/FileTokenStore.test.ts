/**
 * FileTokenStore Tests
 */

import {mkdtemp, rm, stat, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'

import {afterEach, beforeEach, describe, expect, it} from 'vitest'

import {FileTokenStore} from '../../config/FileTokenStore'

describe('FileTokenStore', () => {
  let dir: string
  let path: string

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'tracktap-token-'))
    path = join(dir, '.cache')
  })

  afterEach(async () => {
    await rm(dir, {force: true, recursive: true})
  })

  it('reads a missing cache as no token', async () => {
    expect(await new FileTokenStore(path).load()).toBeNull()
  })

  it('round-trips a token with owner-only permissions', async () => {
    const store = new FileTokenStore(path)
    const token = {access_token: 'test-access', expires_at: 1_700_000_000_000, refresh_token: 'test-refresh'}

    await store.save(token)

    expect(await store.load()).toEqual(token)
    expect((await stat(path)).mode & 0o777).toBe(0o600)
  })

  it('reads invalid JSON as no token', async () => {
    await writeFile(path, 'not json')

    expect(await new FileTokenStore(path).load()).toBeNull()
  })

  it('reads an unexpected shape as no token', async () => {
    await writeFile(path, JSON.stringify({token: 'test-access'}))

    expect(await new FileTokenStore(path).load()).toBeNull()
  })
})
