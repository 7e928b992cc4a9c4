/**
 * Adapter - the contract between models and a backing store
 *
 * Adapters get, put, delete and query raw entity data by key. Each adapter
 * keeps a stack of open transactions per async context: a transaction body
 * runs inside `runInTransaction`, and every storage call made from within
 * that body sees the transaction as current.
 *
 * @module adapters/Adapter
 */

import { AsyncLocalStorage } from 'node:async_hooks'
import { ErrorCode, LookupError } from '../errors'
import type { Key } from '../key'
import type { EntityData } from '../model/state'
import type { PropertyFilter, PropertyOrder } from '../query/filters'
import { NestedTransaction, Propagation } from '../transaction/transaction'
import type { Transaction } from '../transaction/transaction'

// =============================================================================
// Requests and Results
// =============================================================================

/**
 * A request to persist one entity
 */
export interface PutRequest {
  readonly key: Key
  /** Stored field names to exclude from indexes */
  readonly unindexed: readonly string[]
  /** Stored field/value pairs, in property declaration order */
  readonly entries: ReadonlyArray<readonly [string, unknown]>
}

/**
 * The parts of a query an adapter evaluates
 */
export interface QuerySpec {
  readonly kind: string
  readonly ancestor: Key | null
  readonly namespace: string
  readonly projection: readonly string[]
  readonly filters: readonly PropertyFilter[]
  readonly orders: readonly PropertyOrder[]
}

export interface QueryOptions {
  /** Maximum number of results in this batch */
  readonly batchSize: number
  readonly offset?: number | undefined
  readonly limit?: number | null | undefined
  /** Resume after the position this cursor marks */
  readonly cursor?: string | null | undefined
  readonly keysOnly?: boolean | undefined
}

export interface QueryResult {
  /** Keys with their data; data is null for keys-only queries */
  readonly entities: Array<readonly [Key, EntityData | null]>
  /** Cursor positioned after the last returned entity */
  readonly cursor: string | null
}

// =============================================================================
// Adapter
// =============================================================================

/**
 * Abstract base class for adapters
 */
export abstract class Adapter {
  private readonly transactions = new AsyncLocalStorage<readonly Transaction[]>()

  /**
   * Get entity data for each key. Missing entities map to null; results
   * line up with the input keys.
   */
  abstract getMulti(keys: readonly Key[]): Promise<Array<EntityData | null>>

  /**
   * Persist entities, returning their complete keys in request order
   */
  abstract putMulti(requests: readonly PutRequest[]): Promise<Key[]>

  abstract deleteMulti(keys: readonly Key[]): Promise<void>

  /**
   * Run one batch of a query
   */
  abstract query(query: QuerySpec, options: QueryOptions): Promise<QueryResult>

  /**
   * Create a new outer transaction against this adapter's store
   */
  abstract createTransaction(): Transaction

  /**
   * Create a transaction with the given propagation. The transaction takes
   * effect for calls made inside `runInTransaction`.
   */
  transaction(propagation: Propagation = Propagation.Nested): Transaction {
    const current = this.currentTransaction
    if (propagation === Propagation.Nested && current !== null) {
      return new NestedTransaction(current)
    }
    return this.createTransaction()
  }

  /**
   * Run `fn` with `transaction` pushed onto this adapter's stack
   */
  runInTransaction<T>(transaction: Transaction, fn: () => Promise<T>): Promise<T> {
    const stack = this.transactions.getStore() ?? []
    return this.transactions.run([...stack, transaction], fn)
  }

  get inTransaction(): boolean {
    return this.currentTransaction !== null
  }

  /**
   * The innermost transaction still open in the current async context
   */
  get currentTransaction(): Transaction | null {
    const stack = this.transactions.getStore() ?? []
    for (let i = stack.length - 1; i >= 0; i--) {
      if (stack[i].status !== 'ended') return stack[i]
    }
    return null
  }
}

// =============================================================================
// Global Adapter
// =============================================================================

let globalAdapter: Adapter | null = null

/**
 * Set the process-wide default adapter. Models that pin their own adapter
 * are unaffected.
 *
 * @returns the adapter, for chaining
 */
export function setAdapter<A extends Adapter | null>(adapter: A): A {
  globalAdapter = adapter
  return adapter
}

/**
 * The process-wide default adapter.
 *
 * @throws LookupError if no adapter has been set
 */
export function getAdapter(): Adapter {
  if (globalAdapter === null) {
    throw new LookupError('No adapter has been configured. Call setAdapter() first.', ErrorCode.NO_ADAPTER)
  }
  return globalAdapter
}

/**
 * True if a default adapter has been set
 */
export function hasAdapter(): boolean {
  return globalAdapter !== null
}
