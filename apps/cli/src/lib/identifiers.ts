/**
 * Identifier extraction for track and playlist references
 *
 * Accepts web links (`https://host/.../track/<id>?si=...`), URI references
 * (`spotify:playlist:<id>`) and bare 22-character ids. Short links are
 * recognized for tracks, but their token is not a real track id.
 */

import {CATALOG_LINKS} from '../constants'

export type ReferenceKind = 'bare' | 'short-link' | 'uri' | 'web-url'

export type ReferenceType = 'playlist' | 'track'

export interface ParsedReference {
  id: string
  kind: ReferenceKind
}

const BARE_ID_PATTERN = /^[A-Za-z0-9]{22}$/

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
}

const SHORT_LINK_PATTERN = new RegExp(
  `^https?://(?:${CATALOG_LINKS.SHORT_LINK_HOSTS.map(escapeRegExp).join('|')})/([A-Za-z0-9]+)`,
)

const WEB_URL_PATTERNS: Record<ReferenceType, RegExp> = {
  playlist: /^https?:\/\/[^/\s]+\/(?:[^?#\s]*\/)?playlist\/([A-Za-z0-9]+)/,
  track: /^https?:\/\/[^/\s]+\/(?:[^?#\s]*\/)?track\/([A-Za-z0-9]+)/,
}

const URI_PATTERNS: Record<ReferenceType, RegExp> = {
  playlist: /^[A-Za-z][A-Za-z0-9+.-]*:playlist:([A-Za-z0-9]+)/,
  track: /^[A-Za-z][A-Za-z0-9+.-]*:track:([A-Za-z0-9]+)/,
}

function parseReference(input: string, type: ReferenceType): null | ParsedReference {
  const value = input.trim()

  const webMatch = WEB_URL_PATTERNS[type].exec(value)
  if (webMatch?.[1]) {
    return {id: webMatch[1], kind: 'web-url'}
  }

  const uriMatch = URI_PATTERNS[type].exec(value)
  if (uriMatch?.[1]) {
    return {id: uriMatch[1], kind: 'uri'}
  }

  if (type === 'track') {
    const shortMatch = SHORT_LINK_PATTERN.exec(value)
    if (shortMatch?.[1]) {
      return {id: shortMatch[1], kind: 'short-link'}
    }
  }

  if (BARE_ID_PATTERN.test(value)) {
    return {id: value, kind: 'bare'}
  }

  return null
}

export function parseTrackReference(input: string): null | ParsedReference {
  return parseReference(input, 'track')
}

export function parsePlaylistReference(input: string): null | ParsedReference {
  return parseReference(input, 'playlist')
}

export function extractTrackId(input: string): null | string {
  return parseTrackReference(input)?.id ?? null
}

export function extractPlaylistId(input: string): null | string {
  return parsePlaylistReference(input)?.id ?? null
}

/**
 * True when the input points at a short-link host, whether or not it parsed
 */
export function isShortLink(input: string): boolean {
  return CATALOG_LINKS.SHORT_LINK_HOSTS.some(host => input.includes(`${host}/`))
}

export function toTrackUri(trackId: string): string {
  return `${CATALOG_LINKS.TRACK_URI_PREFIX}${trackId}`
}

export function toPlaylistShareUrl(playlistId: string): string {
  return `${CATALOG_LINKS.PLAYLIST_WEB_BASE}${playlistId}`
}
