/**
 * BatchWriter - chunked writes with per-chunk failure accounting
 *
 * A failed chunk is logged and skipped; later chunks are still written.
 * Nothing is retried or rolled back.
 */

import type {CatalogClient} from '@tracktap/catalog-client'

import {BATCH_LIMITS} from '../constants'
import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'

export interface FailedBatch {
  error: unknown
  /** Zero-based chunk position */
  index: number
  size: number
}

export interface BatchWriteResult {
  added: number
  failed: FailedBatch[]
  submitted: number
}

export interface BatchWriteOptions {
  batchSize?: number
  context?: string
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`)
  }
  const chunks: T[][] = []
  for (let start = 0; start < items.length; start += size) {
    chunks.push(items.slice(start, start + size))
  }
  return chunks
}

export async function writeInBatches<T>(
  items: readonly T[],
  write: (batch: T[]) => Promise<void>,
  options: BatchWriteOptions = {},
): Promise<BatchWriteResult> {
  const logger = getLogger()
  const context = options.context ?? 'batch write'
  const batches = chunk(items, options.batchSize ?? BATCH_LIMITS.PLAYLIST_WRITE)
  const result: BatchWriteResult = {added: 0, failed: [], submitted: items.length}

  for (const [index, batch] of batches.entries()) {
    try {
      await catalogCall(() => write(batch), `${context} ${index + 1}/${batches.length}`)
      result.added += batch.length
    } catch (error) {
      logger?.warn(`Batch ${index + 1}/${batches.length} of ${context} failed; ${batch.length} item(s) not added`)
      result.failed.push({error, index, size: batch.length})
    }
  }

  return result
}

/**
 * Append item references to a playlist in chunks the service accepts
 */
export async function addItemsInBatches(
  catalog: CatalogClient,
  playlistId: string,
  itemRefs: readonly string[],
): Promise<BatchWriteResult> {
  return writeInBatches(itemRefs, batch => catalog.addItems(playlistId, batch), {
    batchSize: BATCH_LIMITS.PLAYLIST_WRITE,
    context: `playlist ${playlistId}`,
  })
}
