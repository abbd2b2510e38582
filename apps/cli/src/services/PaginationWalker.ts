/**
 * PaginationWalker - drains a paginated catalog read
 *
 * Pages are fetched one after another. The first failure stops the walk and
 * the items gathered so far are handed back with the error.
 */

import type {CatalogPage, PageCursor} from '@tracktap/catalog-client'

import {catalogCall} from '../utils/CatalogCall'
import {getLogger} from '../utils/LoggerContext'

export type PageFetcher<T> = (cursor: PageCursor) => Promise<CatalogPage<T>>

export type WalkResult<T> =
  | {complete: false; error: unknown; items: T[]; pages: number}
  | {complete: true; error: null; items: T[]; pages: number}

export interface WalkOptions {
  /** Label used in logs */
  context?: string
  /** Stop once this many items are collected; the excess is dropped */
  maxItems?: number
}

export async function walkPages<T>(fetchPage: PageFetcher<T>, options: WalkOptions = {}): Promise<WalkResult<T>> {
  const context = options.context ?? 'pages'
  const items: T[] = []
  let cursor: PageCursor = null
  let pages = 0

  do {
    const pageCursor = cursor
    let page: CatalogPage<T>
    try {
      page = await catalogCall(() => fetchPage(pageCursor), `${context} page ${pages + 1}`)
    } catch (error) {
      getLogger()?.warn(`Pagination of ${context} stopped after ${pages} page(s)`, {collected: items.length})
      return {complete: false, error, items, pages}
    }

    items.push(...page.items)
    pages++
    cursor = page.next

    if (options.maxItems !== undefined && items.length >= options.maxItems) {
      return {complete: true, error: null, items: items.slice(0, options.maxItems), pages}
    }
  } while (cursor !== null)

  getLogger()?.debug(`Collected ${items.length} item(s) of ${context} in ${pages} page(s)`)
  return {complete: true, error: null, items, pages}
}
