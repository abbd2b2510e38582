/**
 * LockRegistry Tests
 */

import {describe, expect, it} from 'vitest'

import {type LockStorage, LockRegistry} from '../../services/LockRegistry'

describe('LockRegistry', () => {
  it('locks a playlist once', () => {
    const storage: LockStorage = {}
    const registry = new LockRegistry(storage)

    expect(registry.lock('p1', 'Rock')).toBe(true)
    expect(registry.lock('p1', 'Rock')).toBe(false)
    expect(storage.locked_playlists).toEqual([{id: 'p1', name: 'Rock'}])
    expect(registry.isLocked('p1')).toBe(true)
  })

  it('unlocks a locked playlist and reports unknown ones', () => {
    const storage: LockStorage = {
      locked_playlists: [
        {id: 'p1', name: 'Rock'},
        {id: 'p2', name: 'Jazz'},
      ],
    }
    const registry = new LockRegistry(storage)

    expect(registry.unlock('p1')).toBe(true)
    expect(registry.unlock('p1')).toBe(false)
    expect(registry.list()).toEqual([{id: 'p2', name: 'Jazz'}])
    expect(registry.isLocked('p1')).toBe(false)
  })

  it('treats a malformed list as empty', () => {
    const storage: LockStorage = {locked_playlists: 'p1'}
    const registry = new LockRegistry(storage)

    expect(registry.isLocked('p1')).toBe(false)
    expect(registry.list()).toEqual([])
    expect(registry.lock('p1', 'Rock')).toBe(true)
    expect(storage.locked_playlists).toEqual([{id: 'p1', name: 'Rock'}])
  })
})
