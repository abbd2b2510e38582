/**
 * Catalog error types and classification
 */

import {SpotifyErrorSchema} from '@tracktap/shared-types'
import {z} from 'zod'

export type CatalogErrorKind = 'http' | 'invalid-response' | 'network'

export type RemoteFailureNote =
  | 'bad-request'
  | 'network'
  | 'not-found'
  | 'rate-limited'
  | 'server-error'
  | 'unauthorized'
  | 'unknown'

interface CatalogApiErrorOptions {
  cause?: unknown
  endpoint: string
  kind: CatalogErrorKind
  retryAfter?: null | number
  status: number
}

export class CatalogApiError extends Error {
  readonly endpoint: string
  readonly kind: CatalogErrorKind
  readonly retryAfter: null | number
  readonly status: number

  constructor(message: string, options: CatalogApiErrorOptions) {
    super(message, {cause: options.cause})
    this.name = 'CatalogApiError'
    this.endpoint = options.endpoint
    this.kind = options.kind
    this.retryAfter = options.retryAfter ?? null
    this.status = options.status
  }

  /**
   * Build an error from a non-2xx response, preferring the service's own message
   */
  static async fromResponse(response: Response, endpoint: string): Promise<CatalogApiError> {
    const body = await response.text().catch(() => '')
    const parsed = SpotifyErrorSchema.safeParse(parseJsonBody(body))
    const message = parsed.success ? parsed.data.error.message : response.statusText || `HTTP ${response.status}`

    const retryAfterHeader = response.headers.get('retry-after')
    const retryAfter = retryAfterHeader === null ? null : Number.parseInt(retryAfterHeader, 10)

    return new CatalogApiError(`${endpoint} failed with ${response.status}: ${message}`, {
      endpoint,
      kind: 'http',
      retryAfter: retryAfter === null || Number.isNaN(retryAfter) ? null : retryAfter,
      status: response.status,
    })
  }
}

function parseJsonBody(body: string): unknown {
  try {
    return JSON.parse(body)
  } catch {
    return null
  }
}

// Foreign errors (fetch polyfills, SDKs) sometimes carry a numeric status
const ErrorWithStatusSchema = z.object({status: z.number()})

export function hasStatus(error: unknown): error is {status: number} {
  return ErrorWithStatusSchema.safeParse(error).success
}

export function isCatalogApiError(error: unknown): error is CatalogApiError {
  return error instanceof CatalogApiError
}

/**
 * Classify a thrown value for operator-facing logs
 * A 400 and a 429 are both ordinary failures; only the note differs
 */
export function describeRemoteFailure(error: unknown): {note: RemoteFailureNote; status: null | number} {
  if (isCatalogApiError(error) && error.kind === 'network') {
    return {note: 'network', status: null}
  }

  const status = hasStatus(error) ? error.status : null
  if (status === null) {
    return {note: 'unknown', status}
  }
  if (status === 400) return {note: 'bad-request', status}
  if (status === 401 || status === 403) return {note: 'unauthorized', status}
  if (status === 404) return {note: 'not-found', status}
  if (status === 429) return {note: 'rate-limited', status}
  if (status >= 500) return {note: 'server-error', status}
  return {note: 'unknown', status}
}
