/**
 * Lazy query results
 *
 * A `Resultset` fetches a query's results one batch at a time as it is
 * iterated. `Pages` groups the same batches into pages that carry the
 * cursor needed to resume after them.
 *
 * @module query/resultset
 */

import type { Key } from '../key'
import type { EntityData } from '../model/state'
import { logger } from '../utils/logger'
import type { Query } from './query'

export interface ResultsetOptions {
  readonly batchSize: number
  readonly keysOnly: boolean
  /** Resume after this position; the query's offset is then ignored */
  readonly cursor?: string | null | undefined
}

/** Turns one raw result into the value the resultset yields */
export type ResultConverter<T> = (key: Key, data: EntityData | null) => T

// =============================================================================
// Resultset
// =============================================================================

export class Resultset<T> implements AsyncIterable<T> {
  private currentCursor: string | null
  private fetched = 0
  private batches = 0
  private complete = false

  constructor(
    readonly query: Query,
    private readonly options: ResultsetOptions,
    private readonly convert: ResultConverter<T>
  ) {
    this.currentCursor = options.cursor ?? null
  }

  /** Cursor positioned after the last fetched result */
  get cursor(): string | null {
    return this.currentCursor
  }

  /** False once the query is known to have no more results */
  get hasMore(): boolean {
    return !this.complete
  }

  /**
   * Fetch the next batch. Returns an empty array once exhausted.
   */
  async fetchNextBatch(): Promise<T[]> {
    if (this.complete) return []

    const { limit } = this.query
    const remaining = limit === null ? Infinity : limit - this.fetched
    const size = Math.min(remaining, this.options.batchSize)
    if (size <= 0) {
      this.complete = true
      return []
    }

    const firstFetch = this.batches === 0 && this.options.cursor == null
    const adapter = this.query.resolveModel().adapter
    const result = await adapter.query(this.query.prepare(), {
      batchSize: size,
      offset: firstFetch ? this.query.offset : 0,
      cursor: this.currentCursor,
      keysOnly: this.options.keysOnly,
    })

    this.batches++
    this.fetched += result.entities.length
    this.currentCursor = result.cursor
    if (result.entities.length < size || (limit !== null && this.fetched >= limit)) {
      this.complete = true
    }

    logger.debug(`query ${this.query.kind}: batch ${this.batches} returned ${result.entities.length} results`)
    return result.entities.map(([key, data]) => this.convert(key, data))
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (!this.complete) {
      const batch = await this.fetchNextBatch()
      yield* batch
    }
  }

  /**
   * Collect every remaining result
   */
  async toArray(): Promise<T[]> {
    const results: T[] = []
    for await (const item of this) {
      results.push(item)
    }
    return results
  }
}

// =============================================================================
// Pagination
// =============================================================================

/**
 * One page of results
 */
export class Page<T> implements Iterable<T> {
  constructor(
    /** Pass to `paginate` to continue after this page */
    readonly cursor: string | null,
    readonly items: readonly T[]
  ) {}

  get length(): number {
    return this.items.length
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }
}

export class Pages<T> implements AsyncIterable<Page<T>> {
  constructor(private readonly resultset: Resultset<T>) {}

  get hasMore(): boolean {
    return this.resultset.hasMore
  }

  get cursor(): string | null {
    return this.resultset.cursor
  }

  /**
   * Fetch the next page. Returns an empty page once exhausted.
   */
  async fetchNextPage(): Promise<Page<T>> {
    const items = await this.resultset.fetchNextBatch()
    return new Page(this.resultset.cursor, items)
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Page<T>> {
    while (this.hasMore) {
      const page = await this.fetchNextPage()
      if (page.length === 0) return
      yield page
    }
  }
}
