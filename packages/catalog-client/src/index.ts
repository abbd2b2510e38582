// Remote catalog access for tracktap

export {
  buildAuthorizeUrl,
  exchangeAuthorizationCode,
  extractAuthorizationCode,
  OAuthTokenProvider,
  refreshAccessToken,
  SPOTIFY_AUTH_URL,
  SPOTIFY_TOKEN_URL,
} from './auth'
export type {OAuthCredentials, TokenStore} from './auth'
export {CatalogApiError, describeRemoteFailure, hasStatus, isCatalogApiError} from './errors'
export type {CatalogErrorKind, RemoteFailureNote} from './errors'
export {SPOTIFY_API_BASE, SPOTIFY_PAGE_LIMITS, SpotifyCatalogClient, toTrackId} from './SpotifyCatalogClient'
export type {AccessTokenSource, CatalogClient, CatalogPage, PageCursor, RecommendationRequest, TimeRange} from './types'
