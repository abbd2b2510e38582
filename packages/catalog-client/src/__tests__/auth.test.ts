/**
 * OAuth helper tests
 */

import {beforeEach, describe, expect, it, vi} from 'vitest'

const fetchMock = vi.hoisted(() => vi.fn<typeof fetch>())
vi.stubGlobal('fetch', fetchMock)

import type {CachedToken} from '@tracktap/shared-types'

import {buildAuthorizeUrl, extractAuthorizationCode, OAuthTokenProvider, type TokenStore} from '../auth'

const credentials = {
  clientId: 'test-client',
  clientSecret: 'test-secret',
  redirectUri: 'http://localhost:8080',
}

class MemoryTokenStore implements TokenStore {
  saved: CachedToken[] = []
  private token: CachedToken | null

  constructor(token: CachedToken | null) {
    this.token = token
  }

  async load() {
    return this.token
  }

  async save(token: CachedToken) {
    this.saved.push(token)
    this.token = token
  }
}

describe('buildAuthorizeUrl', () => {
  it('includes client, redirect and space-separated scopes', () => {
    const url = new URL(buildAuthorizeUrl(credentials, ['user-library-modify', 'playlist-modify-public']))

    expect(url.origin + url.pathname).toBe('https://accounts.spotify.com/authorize')
    expect(url.searchParams.get('client_id')).toBe('test-client')
    expect(url.searchParams.get('response_type')).toBe('code')
    expect(url.searchParams.get('scope')).toBe('user-library-modify playlist-modify-public')
    expect(url.searchParams.has('state')).toBe(false)
  })
})

describe('extractAuthorizationCode', () => {
  it('reads the code from a redirected URL', () => {
    expect(extractAuthorizationCode('http://localhost:8080/?code=abc123&state=x')).toBe('abc123')
  })

  it('accepts a bare code', () => {
    expect(extractAuthorizationCode('  abc123 ')).toBe('abc123')
  })

  it('returns null for empty input or a URL without a code', () => {
    expect(extractAuthorizationCode('')).toBeNull()
    expect(extractAuthorizationCode('http://localhost:8080/?error=access_denied')).toBeNull()
  })
})

describe('OAuthTokenProvider', () => {
  beforeEach(() => {
    fetchMock.mockReset()
  })

  it('serves a cached token that is not near expiry', async () => {
    const store = new MemoryTokenStore({access_token: 'cached', expires_at: 1_000_000, refresh_token: 'r1'})
    const provider = new OAuthTokenProvider(credentials, store, () => 0)

    await expect(provider.getAccessToken()).resolves.toBe('cached')
    expect(fetchMock).not.toHaveBeenCalled()
  })

  it('refreshes within the expiry margin and keeps the old refresh token', async () => {
    const store = new MemoryTokenStore({access_token: 'stale', expires_at: 30_000, refresh_token: 'r1'})
    fetchMock.mockResolvedValueOnce(
      new Response(JSON.stringify({access_token: 'fresh', expires_in: 3600, token_type: 'Bearer'}), {status: 200}),
    )
    const provider = new OAuthTokenProvider(credentials, store, () => 0)

    await expect(provider.getAccessToken()).resolves.toBe('fresh')
    expect(store.saved).toEqual([{access_token: 'fresh', expires_at: 3_600_000, refresh_token: 'r1'}])

    const body = fetchMock.mock.calls[0]?.[1]?.body
    expect(body).toBeInstanceOf(URLSearchParams)
    if (body instanceof URLSearchParams) {
      expect(body.get('grant_type')).toBe('refresh_token')
      expect(body.get('refresh_token')).toBe('r1')
    }
  })

  it('fails when nothing is cached', async () => {
    const provider = new OAuthTokenProvider(credentials, new MemoryTokenStore(null), () => 0)
    await expect(provider.getAccessToken()).rejects.toThrow('Run `tracktap authorize` first')
  })

  it('fails when the token expired without a refresh token', async () => {
    const store = new MemoryTokenStore({access_token: 'stale', expires_at: 0, refresh_token: null})
    const provider = new OAuthTokenProvider(credentials, store, () => 0)
    await expect(provider.getAccessToken()).rejects.toThrow('no refresh token')
  })
})
