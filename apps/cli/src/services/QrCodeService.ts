/**
 * QrCodeService - PNG QR codes pointing at a playlist
 */

import type {CatalogClient} from '@tracktap/catalog-client'
import QRCode from 'qrcode'

import {CATALOG_LINKS, DEFAULT_FILES} from '../constants'
import {getLogger} from '../utils/LoggerContext'
import {getPlaylistShareUrl} from './PlaylistDirectory'

export type QrResult = {file: string; status: 'written'; url: string} | {reason: string; status: 'failed'}

/**
 * Links and playlist URIs are encoded as given; anything else is a playlist name
 */
export function isPlaylistLink(input: string): boolean {
  return input.startsWith('http') || input.startsWith(CATALOG_LINKS.PLAYLIST_URI_PREFIX)
}

export async function generatePlaylistQr(
  catalog: CatalogClient,
  input: string,
  outputFile: string = DEFAULT_FILES.QR_IMAGE,
): Promise<QrResult> {
  const url = isPlaylistLink(input) ? input : await getPlaylistShareUrl(catalog, input)
  if (!url) {
    return {reason: `no playlist named "${input}"`, status: 'failed'}
  }

  try {
    await QRCode.toFile(outputFile, url)
  } catch (error) {
    getLogger()?.error('QR code rendering failed', error, {outputFile})
    return {reason: `could not write ${outputFile}`, status: 'failed'}
  }
  return {file: outputFile, status: 'written', url}
}
