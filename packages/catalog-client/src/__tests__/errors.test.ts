/**
 * Catalog error classification tests
 */

import {describe, expect, it} from 'vitest'

import {CatalogApiError, describeRemoteFailure} from '../errors'

function httpError(status: number) {
  return new CatalogApiError(`failed with ${status}`, {endpoint: '/x', kind: 'http', status})
}

describe('describeRemoteFailure', () => {
  it('distinguishes bad requests from rate limiting', () => {
    expect(describeRemoteFailure(httpError(400))).toEqual({note: 'bad-request', status: 400})
    expect(describeRemoteFailure(httpError(429))).toEqual({note: 'rate-limited', status: 429})
  })

  it('classifies auth, missing and server failures', () => {
    expect(describeRemoteFailure(httpError(401)).note).toBe('unauthorized')
    expect(describeRemoteFailure(httpError(404)).note).toBe('not-found')
    expect(describeRemoteFailure(httpError(503)).note).toBe('server-error')
  })

  it('reads status from foreign error objects', () => {
    expect(describeRemoteFailure({message: 'nope', status: 429})).toEqual({note: 'rate-limited', status: 429})
  })

  it('reports network failures without a status', () => {
    const error = new CatalogApiError('down', {endpoint: '/x', kind: 'network', status: 0})
    expect(describeRemoteFailure(error)).toEqual({note: 'network', status: null})
  })

  it('falls back to unknown', () => {
    expect(describeRemoteFailure(new Error('boom'))).toEqual({note: 'unknown', status: null})
  })
})

describe('CatalogApiError.fromResponse', () => {
  it('uses the status text when the body is not JSON', async () => {
    const response = new Response('upstream broke', {status: 502, statusText: 'Bad Gateway'})
    const error = await CatalogApiError.fromResponse(response, '/me')

    expect(error.message).toBe('/me failed with 502: Bad Gateway')
    expect(error.retryAfter).toBeNull()
  })
})
