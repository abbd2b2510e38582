/**
 * Spotify OAuth helpers - authorization code flow for a single local identity
 */

import {type CachedToken, formatZodError, safeParse, SpotifyTokenResponseSchema} from '@tracktap/shared-types'

import type {AccessTokenSource} from './types'

import {CatalogApiError} from './errors'

export const SPOTIFY_AUTH_URL = 'https://accounts.spotify.com/authorize'
export const SPOTIFY_TOKEN_URL = 'https://accounts.spotify.com/api/token'

/** Tokens are refreshed this long before they expire */
const REFRESH_MARGIN_MS = 60_000

export interface OAuthCredentials {
  clientId: string
  clientSecret: string
  redirectUri: string
}

/** Persists the cached token between runs */
export interface TokenStore {
  load(): Promise<CachedToken | null>
  save(token: CachedToken): Promise<void>
}

export function buildAuthorizeUrl(credentials: OAuthCredentials, scopes: readonly string[], state?: string): string {
  const params = new URLSearchParams({
    client_id: credentials.clientId,
    redirect_uri: credentials.redirectUri,
    response_type: 'code',
    scope: scopes.join(' '),
  })
  if (state) {
    params.set('state', state)
  }
  return `${SPOTIFY_AUTH_URL}?${params.toString()}`
}

/**
 * Accept either the full redirected URL or the bare code the user pasted
 */
export function extractAuthorizationCode(input: string): null | string {
  const trimmed = input.trim()
  if (trimmed.length === 0) {
    return null
  }
  if (!trimmed.includes('://')) {
    return trimmed
  }
  try {
    return new URL(trimmed).searchParams.get('code')
  } catch {
    return null
  }
}

export async function exchangeAuthorizationCode(
  credentials: OAuthCredentials,
  code: string,
  now = Date.now(),
): Promise<CachedToken> {
  return requestToken(
    new URLSearchParams({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      code,
      grant_type: 'authorization_code',
      redirect_uri: credentials.redirectUri,
    }),
    null,
    now,
  )
}

export async function refreshAccessToken(
  credentials: OAuthCredentials,
  refreshToken: string,
  now = Date.now(),
): Promise<CachedToken> {
  return requestToken(
    new URLSearchParams({
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    }),
    refreshToken,
    now,
  )
}

async function requestToken(body: URLSearchParams, previousRefreshToken: null | string, now: number) {
  const response = await fetch(SPOTIFY_TOKEN_URL, {
    body,
    headers: {'Content-Type': 'application/x-www-form-urlencoded'},
    method: 'POST',
  })

  if (!response.ok) {
    throw await CatalogApiError.fromResponse(response, SPOTIFY_TOKEN_URL)
  }

  const parsed = safeParse(SpotifyTokenResponseSchema, await response.json())
  if (!parsed.success) {
    throw new CatalogApiError(`Invalid token response: ${formatZodError(parsed.error)}`, {
      endpoint: SPOTIFY_TOKEN_URL,
      kind: 'invalid-response',
      status: response.status,
    })
  }

  const token: CachedToken = {
    access_token: parsed.data.access_token,
    expires_at: now + parsed.data.expires_in * 1000,
    // Refresh responses may omit the refresh token, in which case the old one stays valid
    refresh_token: parsed.data.refresh_token ?? previousRefreshToken,
  }
  if (parsed.data.scope !== undefined) {
    token.scope = parsed.data.scope
  }
  return token
}

/**
 * OAuthTokenProvider - serves a cached access token, refreshing it near expiry
 */
export class OAuthTokenProvider implements AccessTokenSource {
  private cached: CachedToken | null = null
  private credentials: OAuthCredentials
  private now: () => number
  private store: TokenStore

  constructor(credentials: OAuthCredentials, store: TokenStore, now: () => number = Date.now) {
    this.credentials = credentials
    this.store = store
    this.now = now
  }

  async getAccessToken(): Promise<string> {
    const token = this.cached ?? (await this.store.load())
    if (!token) {
      throw new Error('No cached access token. Run `tracktap authorize` first.')
    }

    if (token.expires_at - REFRESH_MARGIN_MS > this.now()) {
      this.cached = token
      return token.access_token
    }

    if (!token.refresh_token) {
      throw new Error('Access token expired and no refresh token is cached. Run `tracktap authorize` again.')
    }

    const refreshed = await refreshAccessToken(this.credentials, token.refresh_token, this.now())
    await this.store.save(refreshed)
    this.cached = refreshed
    return refreshed.access_token
  }
}
