/**
 * TrackAdder Tests
 */

import {describe, expect, it, vi} from 'vitest'

import {LockRegistry} from '../../services/LockRegistry'
import {addSongs, addTrackToTargets, hasSuccess} from '../../services/TrackAdder'
import {runWithLogger} from '../../utils/LoggerContext'
import {ServiceLogger} from '../../utils/ServiceLogger'
import {FakeCatalogClient} from '../fixtures/FakeCatalogClient'
import {buildConfig, buildPlaylist} from '../fixtures/test-builders'

const TRACK_ID = '4uLU6hMCjMI75M1A2tKUQC'
const TRACK_LINK = `https://open.spotify.com/track/${TRACK_ID}?si=abc`

const TARGETS = [
  {id: 'p1', name: 'Rock'},
  {id: null, name: 'Missing'},
  {id: 'p2', name: 'Locked'},
  {id: 'p3', name: 'Broken'},
]

function lockedP2(): LockRegistry {
  return new LockRegistry({locked_playlists: [{id: 'p2', name: 'Locked'}]})
}

describe('addTrackToTargets', () => {
  it('reports one entry per target with liked songs first', async () => {
    const catalog = new FakeCatalogClient().failOn('addItems', (_call, args) => args[0] === 'p3')

    const result = await addTrackToTargets(catalog, 't1', TARGETS, {locks: lockedP2(), saveToLiked: true})

    expect(result).toEqual([
      {error: null, reason: null, success: true, target: 'Liked Songs'},
      {error: null, reason: null, success: true, target: 'Rock'},
      {error: 'playlist not found', reason: 'not-found', success: false, target: 'Missing'},
      {error: null, reason: 'locked', success: false, target: 'Locked'},
      {error: 'addItems failed', reason: 'remote-error', success: false, target: 'Broken'},
    ])
    expect(catalog.calls).toEqual(['saveLiked', 'addItems', 'addItems'])
    expect(catalog.addCalls).toEqual([{itemRefs: ['spotify:track:t1'], playlistId: 'p1'}])
  })

  it('writes to locked playlists when forced', async () => {
    const catalog = new FakeCatalogClient()

    const result = await addTrackToTargets(catalog, 't1', [{id: 'p2', name: 'Locked'}], {
      force: true,
      locks: lockedP2(),
      saveToLiked: false,
    })

    expect(result).toEqual([{error: null, reason: null, success: true, target: 'Locked'}])
    expect(catalog.liked).toEqual([])
  })

  it('records a liked-songs failure and still tries playlists', async () => {
    const catalog = new FakeCatalogClient().failOn('saveLiked')

    const result = await addTrackToTargets(catalog, 't1', [{id: 'p1', name: 'Rock'}], {
      locks: new LockRegistry({}),
      saveToLiked: true,
    })

    expect(result.map(entry => entry.success)).toEqual([false, true])
    expect(result[0]).toMatchObject({reason: 'remote-error', target: 'Liked Songs'})
    expect(hasSuccess(result)).toBe(true)
  })
})

describe('addSongs', () => {
  function rockCatalog(): FakeCatalogClient {
    const catalog = new FakeCatalogClient()
    catalog.playlists = [buildPlaylist('theirs', 'Rock Mix', 'someone-else'), buildPlaylist('p1', 'Rock Mix')]
    return catalog
  }

  const config = buildConfig({genres: {rock: {playlists: ['Rock Mix', 'Gone'], save_to_liked: true}}})

  it('adds each parsed track to the group targets', async () => {
    const catalog = rockCatalog()

    const outcome = await addSongs(catalog, config, [TRACK_LINK, 'garbage'], {
      genre: 'rock',
      locks: new LockRegistry(config),
    })

    expect(outcome).toEqual({
      additions: [
        {
          input: TRACK_LINK,
          result: [
            {error: null, reason: null, success: true, target: 'Liked Songs'},
            {error: null, reason: null, success: true, target: 'Rock Mix'},
            {error: 'playlist not found', reason: 'not-found', success: false, target: 'Gone'},
          ],
          trackId: TRACK_ID,
        },
        {input: 'garbage', result: [], trackId: null},
      ],
      group: 'rock',
      ok: true,
      processed: 1,
      total: 2,
    })
    expect(catalog.addCalls).toEqual([{itemRefs: [`spotify:track:${TRACK_ID}`], playlistId: 'p1'}])
  })

  it('rejects an unknown genre group', async () => {
    const outcome = await addSongs(rockCatalog(), config, [TRACK_ID], {genre: 'jazz', locks: new LockRegistry({})})

    expect(outcome).toEqual({error: 'genre group "jazz" not found; available: rock', ok: false})
  })

  it('rejects a group with nowhere to add', async () => {
    const empty = buildConfig({genres: {default: {playlists: [], save_to_liked: false}}})

    const outcome = await addSongs(rockCatalog(), empty, [TRACK_ID], {locks: new LockRegistry({})})

    expect(outcome).toEqual({
      error: 'genre group "default" has no playlists and does not save to liked songs',
      ok: false,
    })
  })

  it('maps a legacy playlist list to a group without liked songs', async () => {
    const catalog = rockCatalog()
    const legacy = buildConfig({playlists: ['Rock Mix']})

    const outcome = await addSongs(catalog, legacy, [TRACK_ID], {locks: new LockRegistry({})})

    expect(outcome).toMatchObject({group: 'default', ok: true, processed: 1})
    expect(catalog.liked).toEqual([])
  })

  it('fails when the playlists cannot be listed', async () => {
    const catalog = rockCatalog().failOn('listPlaylistsPage')

    const outcome = await addSongs(catalog, config, [TRACK_ID], {genre: 'rock', locks: new LockRegistry({})})

    expect(outcome).toEqual({error: 'could not list your playlists', ok: false})
  })

  it('warns about short links that fail everywhere', async () => {
    const catalog = rockCatalog().failOn('addItems').failOn('saveLiked')
    const logger = new ServiceLogger('test')
    const warnSpy = vi.spyOn(logger, 'warn').mockImplementation(() => undefined)
    vi.spyOn(logger, 'error').mockImplementation(() => undefined)

    await runWithLogger(logger, () =>
      addSongs(catalog, config, ['https://spotify.link/abc123'], {genre: 'rock', locks: new LockRegistry({})}),
    )

    expect(warnSpy).toHaveBeenCalledWith(
      '"https://spotify.link/abc123" is a short link, which is not resolved; open it and copy the full track link instead',
    )
  })
})
