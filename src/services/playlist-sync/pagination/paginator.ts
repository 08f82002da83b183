/**
 * Paginator Adapter
 *
 * Turns a cursor-based page fetch into a lazy async sequence of items.
 * The sequence is finite and single-use: each iteration step advances the
 * remote cursor, so it cannot be replayed. It ends on an empty page or a
 * missing next cursor, and the first failed fetch is rethrown to the caller
 * without retrying.
 */

import type { Page, PageFetcher } from '@root/types/spotify.types.js'

export class PaginationError extends Error {
  constructor(
    message: string,
    public readonly pageIndex: number,
    public readonly cursor: string | undefined,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'PaginationError'
    Object.setPrototypeOf(this, new.target.prototype)
  }
}

export interface PaginateOptions {
  /** Label used in error messages, e.g. "playlist abc123" */
  label?: string
  /** Checked before every page fetch */
  signal?: AbortSignal
}

export function paginate<T>(
  fetchPage: PageFetcher<T>,
  options: PaginateOptions = {},
): AsyncIterable<T> {
  const label = options.label ?? 'listing'
  let started = false

  return {
    [Symbol.asyncIterator]: () => {
      if (started) {
        throw new Error(`Paginator for ${label} has already been consumed`)
      }
      started = true
      return walkPages(fetchPage, label, options.signal)
    },
  }
}

async function* walkPages<T>(
  fetchPage: PageFetcher<T>,
  label: string,
  signal: AbortSignal | undefined,
): AsyncGenerator<T, void, undefined> {
  let cursor: string | undefined
  let pageIndex = 0

  while (true) {
    signal?.throwIfAborted()

    let page: Page<T>
    try {
      page = await fetchPage(cursor)
    } catch (error) {
      throw new PaginationError(
        `Failed to fetch page ${pageIndex} of ${label}`,
        pageIndex,
        cursor,
        { cause: error },
      )
    }

    if (page.items.length === 0) {
      return
    }

    yield* page.items

    if (!page.next) {
      return
    }
    cursor = page.next
    pageIndex++
  }
}

/**
 * Drains an async sequence into an array, preserving order
 */
export async function collectAll<T>(items: AsyncIterable<T>): Promise<T[]> {
  const collected: T[] = []
  for await (const item of items) {
    collected.push(item)
  }
  return collected
}
