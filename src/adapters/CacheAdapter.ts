/**
 * CacheAdapter - strongly consistent read-through cache over another adapter
 *
 * Entity data is cached by key in a CacheClient (memcached semantics).
 * Writers never let a stale value survive:
 *
 * - Before writing, a writer replaces every affected cache entry with a lock
 *   tagged with a random token, and deletes the entries once the write is done
 * - A reader that misses adds a lock of its own before reading the backing
 *   store, and only caches what it read if its own lock is still in place
 *   (compare-and-swap); any other lock, or no entry at all, means a writer
 *   got in between and the reader gives up
 * - Inside a transaction, reads bypass the cache and invalidation is
 *   deferred to the outermost commit
 *
 * Queries are not cached.
 *
 * @module adapters/CacheAdapter
 */

import { createHash } from 'node:crypto'
import type { CacheClient } from '../cache/types'
import { getConfig } from '../config'
import { LOCK_TAG_BYTES } from '../constants'
import { SerializationError } from '../errors'
import type { Key } from '../key'
import type { EntityData } from '../model/state'
import { dumpMsgpack, loadMsgpack } from '../properties/serializers'
import { Propagation, Transaction } from '../transaction/transaction'
import { isPlainObject } from '../utils/comparison'
import { logger } from '../utils/logger'
import { getRandomToken } from '../utils/random'
import { Adapter } from './Adapter'
import type { PutRequest, QueryOptions, QueryResult, QuerySpec } from './Adapter'

// =============================================================================
// Cache Entries
// =============================================================================

/** What a cache entry holds */
type CacheEntry = { readonly type: 'lock'; readonly tag: string } | { readonly type: 'data'; readonly data: EntityData }

function encodeLock(tag: string): Uint8Array {
  return dumpMsgpack({ lock: tag })
}

function encodeData(data: EntityData): Uint8Array {
  return dumpMsgpack({ data })
}

/**
 * Decode a cache entry. Entries that cannot be decoded are treated as
 * misses.
 */
function decodeEntry(bytes: Uint8Array | undefined): CacheEntry | null {
  if (bytes === undefined) return null

  let value: unknown
  try {
    value = loadMsgpack(bytes)
  } catch (error) {
    if (!(error instanceof SerializationError)) throw error
    logger.warn('Ignoring undecodable cache entry', error.message)
    return null
  }

  if (!isPlainObject(value)) return null
  if (typeof value.lock === 'string') return { type: 'lock', tag: value.lock }
  if (isPlainObject(value.data)) return { type: 'data', data: value.data }
  return null
}

// =============================================================================
// Transactions
// =============================================================================

/**
 * Outer transaction of a CacheAdapter. Collects the keys written inside it
 * (including by nested transactions) and invalidates them around the
 * backing commit.
 */
export class CacheTransaction extends Transaction {
  private readonly keys: Key[] = []

  constructor(
    private readonly adapter: CacheAdapter,
    /** The transaction on the backing adapter */
    readonly backing: Transaction
  ) {
    super()
  }

  /** Keys to invalidate on commit */
  get pendingKeys(): readonly Key[] {
    return this.keys
  }

  pushKeys(keys: readonly Key[]): void {
    this.keys.push(...keys)
  }

  protected async onBegin(): Promise<void> {
    await this.backing.begin()
  }

  protected async onCommit(): Promise<void> {
    await this.adapter.bust(this.keys, () => this.backing.commit())
  }

  protected async onRollback(): Promise<void> {
    await this.backing.rollback()
  }

  protected override async onEnd(): Promise<void> {
    await this.backing.end()
  }
}

// =============================================================================
// CacheAdapter
// =============================================================================

export interface CacheAdapterOptions {
  /** Prefix of every cache key; defaults to the configured one */
  prefix?: string | undefined
  lockTimeoutSeconds?: number | undefined
  itemTimeoutSeconds?: number | undefined
}

export class CacheAdapter extends Adapter {
  readonly prefix: string
  readonly lockTimeoutSeconds: number
  readonly itemTimeoutSeconds: number

  constructor(
    readonly client: CacheClient,
    readonly backing: Adapter,
    options: CacheAdapterOptions = {}
  ) {
    super()
    const { cache } = getConfig()
    this.prefix = options.prefix ?? cache.prefix
    this.lockTimeoutSeconds = options.lockTimeoutSeconds ?? cache.lockTimeoutSeconds
    this.itemTimeoutSeconds = options.itemTimeoutSeconds ?? cache.itemTimeoutSeconds
  }

  /**
   * Cache key of an entity key: the prefix and an MD5 digest of the key's
   * string form
   */
  cacheKey(key: Key): string {
    const digest = createHash('md5').update(key.toString(), 'utf8').digest('hex')
    return `${this.prefix}:${digest}`
  }

  // ===========================================================================
  // Transactions
  // ===========================================================================

  createTransaction(): CacheTransaction {
    return new CacheTransaction(this, this.backing.transaction(Propagation.Independent))
  }

  /**
   * Runs `fn` inside `transaction` on this adapter and inside the matching
   * backing transaction on the backing adapter
   */
  override runInTransaction<T>(transaction: Transaction, fn: () => Promise<T>): Promise<T> {
    const root = transaction.root
    return super.runInTransaction(transaction, () =>
      root instanceof CacheTransaction ? this.backing.runInTransaction(root.backing, fn) : fn()
    )
  }

  private get activeTransaction(): CacheTransaction | null {
    const root = this.currentTransaction?.root
    return root instanceof CacheTransaction ? root : null
  }

  // ===========================================================================
  // Key operations
  // ===========================================================================

  async getMulti(keys: readonly Key[]): Promise<Array<EntityData | null>> {
    if (this.inTransaction) {
      return this.backing.getMulti(keys)
    }

    const cacheKeys = keys.map(key => this.cacheKey(key))
    const cached = await this.client.getMulti(cacheKeys)

    const results: Array<EntityData | null> = keys.map(() => null)
    const missing: number[] = []
    for (let i = 0; i < keys.length; i++) {
      const entry = decodeEntry(cached.get(cacheKeys[i]))
      if (entry?.type === 'data') {
        results[i] = entry.data
      } else {
        missing.push(i)
      }
    }

    logger.debug(`cache: ${keys.length - missing.length} hits, ${missing.length} misses`)
    if (missing.length === 0) return results

    // lock free slots before reading so that a concurrent write is noticed
    const tags = new Map<number, string>()
    for (const i of missing) {
      if (cached.has(cacheKeys[i])) continue
      const tag = getRandomToken(LOCK_TAG_BYTES)
      if (await this.client.add(cacheKeys[i], encodeLock(tag), this.lockTimeoutSeconds)) {
        tags.set(i, tag)
      }
    }

    const fetched = await this.backing.getMulti(missing.map(i => keys[i]))
    for (let j = 0; j < missing.length; j++) {
      const i = missing[j]
      const data = fetched[j] ?? null
      results[i] = data

      const tag = tags.get(i)
      if (data !== null && tag !== undefined) {
        await this.populate(cacheKeys[i], tag, data)
      }
    }
    return results
  }

  /**
   * Cache `data` if the lock tagged `tag` is still in place
   */
  private async populate(cacheKey: string, tag: string, data: EntityData): Promise<void> {
    const current = await this.client.gets(cacheKey)
    if (current === null) {
      logger.debug(`cache: ${cacheKey} was busted while loading`)
      return
    }

    const entry = decodeEntry(current.value)
    if (entry?.type !== 'lock' || entry.tag !== tag) {
      logger.debug(`cache: ${cacheKey} changed while loading`)
      return
    }

    const stored = await this.client.cas(cacheKey, encodeData(data), current.token, this.itemTimeoutSeconds)
    if (!stored) {
      logger.debug(`cache: lost race populating ${cacheKey}`)
    }
  }

  async putMulti(requests: readonly PutRequest[]): Promise<Key[]> {
    // partial keys cannot be cached yet
    const fullKeys = requests.filter(request => !request.key.isPartial).map(request => request.key)

    const transaction = this.activeTransaction
    if (transaction) {
      transaction.pushKeys(fullKeys)
      return this.backing.putMulti(requests)
    }
    return this.bust(fullKeys, () => this.backing.putMulti(requests))
  }

  async deleteMulti(keys: readonly Key[]): Promise<void> {
    const transaction = this.activeTransaction
    if (transaction) {
      transaction.pushKeys(keys)
      return this.backing.deleteMulti(keys)
    }
    return this.bust(keys, () => this.backing.deleteMulti(keys))
  }

  query(query: QuerySpec, options: QueryOptions): Promise<QueryResult> {
    return this.backing.query(query, options)
  }

  /**
   * Lock the cache entries of `keys` for the duration of `write`, then
   * delete them whether or not the write succeeded
   */
  async bust<T>(keys: readonly Key[], write: () => Promise<T>): Promise<T> {
    if (keys.length === 0) return write()

    const cacheKeys = keys.map(key => this.cacheKey(key))
    const lock = encodeLock(getRandomToken(LOCK_TAG_BYTES))
    await this.client.setMulti(new Map(cacheKeys.map(cacheKey => [cacheKey, lock])), this.lockTimeoutSeconds)
    logger.debug(`cache: locked ${cacheKeys.length} keys`)

    try {
      return await write()
    } finally {
      await this.client.deleteMulti(cacheKeys)
      logger.debug(`cache: busted ${cacheKeys.length} keys`)
    }
  }
}
