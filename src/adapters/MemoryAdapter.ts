/**
 * MemoryAdapter - in-process implementation of Adapter
 *
 * Used for tests and local development. Entities live in a map keyed by
 * namespace and key path; every stored value is deep-copied on the way in
 * and out.
 *
 * Transaction semantics:
 * - Reads within a transaction see committed state plus the transaction's own writes
 * - Writes and deletes are buffered and applied atomically on commit
 * - Commit fails with `TransactionFailed` if any entity the transaction read
 *   or wrote was changed by someone else after the transaction began
 * - Rollback discards all pending changes
 * - Queries always run against committed state
 *
 * @module adapters/MemoryAdapter
 */

import { ErrorCode, ValidationError } from '../errors'
import { Key } from '../key'
import type { EntityData } from '../model/state'
import type { PropertyFilter, PropertyOrder } from '../query/filters'
import { Transaction, TransactionError, TransactionFailed } from '../transaction/transaction'
import { base64ToString, stringToBase64 } from '../utils/base64'
import { cloneValue, compareKeys, compareValues, deepEqual } from '../utils/comparison'
import { logger } from '../utils/logger'
import { Adapter } from './Adapter'
import type { PutRequest, QueryOptions, QueryResult, QuerySpec } from './Adapter'

// =============================================================================
// Stored State
// =============================================================================

/** A committed entity */
interface StoredEntity {
  readonly key: Key
  readonly data: EntityData
  readonly unindexed: ReadonlySet<string>
}

/** A buffered write; `entity` is null for deletes */
interface PendingWrite {
  readonly key: Key
  readonly entity: StoredEntity | null
}

/**
 * Identity of a key inside the store
 */
function storageKey(key: Key): string {
  return JSON.stringify([key.namespace, key.path])
}

function hasAncestor(key: Key, ancestor: Key): boolean {
  for (let current: Key | null = key; current !== null; current = current.parent) {
    if (current.equals(ancestor)) return true
  }
  return false
}

// =============================================================================
// Cursors
// =============================================================================

interface CursorPosition {
  readonly position: number
}

function encodeCursor(position: number): string {
  return stringToBase64(JSON.stringify({ position }))
}

function decodeCursor(cursor: string): number {
  let parsed: unknown
  try {
    parsed = JSON.parse(base64ToString(cursor))
  } catch (error) {
    throw new ValidationError('Invalid query cursor.', ErrorCode.INVALID_VALUE, {}, error instanceof Error ? error : undefined)
  }

  if (!isCursorPosition(parsed)) {
    throw new ValidationError('Invalid query cursor.', ErrorCode.INVALID_VALUE)
  }
  return parsed.position
}

function isCursorPosition(value: unknown): value is CursorPosition {
  return (
    typeof value === 'object' &&
    value !== null &&
    'position' in value &&
    typeof value.position === 'number' &&
    Number.isInteger(value.position) &&
    value.position >= 0
  )
}

// =============================================================================
// Query Evaluation
// =============================================================================

/**
 * The indexed value(s) of a field, or undefined when the entity has no
 * index entry for it
 */
function indexedValues(entity: StoredEntity, name: string): unknown[] | undefined {
  if (entity.unindexed.has(name) || !Object.prototype.hasOwnProperty.call(entity.data, name)) {
    return undefined
  }
  const value = entity.data[name]
  return Array.isArray(value) ? value : [value]
}

function matchesOperator(value: unknown, filter: PropertyFilter): boolean {
  switch (filter.operator) {
    case '=':
      return deepEqual(value, filter.value)
    case '!=':
      return !deepEqual(value, filter.value)
    case '<':
      return compareValues(value, filter.value) < 0
    case '<=':
      return compareValues(value, filter.value) <= 0
    case '>':
      return compareValues(value, filter.value) > 0
    case '>=':
      return compareValues(value, filter.value) >= 0
  }
}

/**
 * An entity matches a filter if any of its indexed values for the field does
 */
function matchesFilter(entity: StoredEntity, filter: PropertyFilter): boolean {
  const values = indexedValues(entity, filter.name)
  return values !== undefined && values.some(value => matchesOperator(value, filter))
}

/**
 * The value a list field sorts by: its smallest element ascending, its
 * largest descending
 */
function sortValue(values: unknown[], order: PropertyOrder): unknown {
  const sorted = [...values].sort(compareValues)
  return order.direction === 'asc' ? sorted[0] : sorted[sorted.length - 1]
}

function compareEntities(a: StoredEntity, b: StoredEntity, orders: readonly PropertyOrder[]): number {
  for (const order of orders) {
    const left = sortValue(indexedValues(a, order.name) ?? [], order)
    const right = sortValue(indexedValues(b, order.name) ?? [], order)
    const diff = compareValues(left, right)
    if (diff !== 0) return order.direction === 'asc' ? diff : -diff
  }
  return compareKeys(a.key, b.key)
}

// =============================================================================
// MemoryTransaction
// =============================================================================

/**
 * Optimistic transaction against a MemoryAdapter
 */
export class MemoryTransaction extends Transaction {
  /** Version of every entity this transaction read, at read time */
  readonly reads = new Map<string, number>()
  readonly writes = new Map<string, PendingWrite>()
  private startVersion = 0

  constructor(private readonly adapter: MemoryAdapter) {
    super()
  }

  protected async onBegin(): Promise<void> {
    this.startVersion = this.adapter.version
  }

  protected async onCommit(): Promise<void> {
    this.adapter.commit(this, this.startVersion)
  }

  protected async onRollback(): Promise<void> {
    this.reads.clear()
    this.writes.clear()
  }
}

// =============================================================================
// MemoryAdapter
// =============================================================================

/**
 * In-memory adapter for testing and development
 */
export class MemoryAdapter extends Adapter {
  /** Committed entities */
  private entities = new Map<string, StoredEntity>()

  /** Version at which each key last changed, deletes included */
  private versions = new Map<string, number>()

  private clock = 0
  private nextId = 1

  /** Current store version; increases with every committed change */
  get version(): number {
    return this.clock
  }

  /** Number of committed entities */
  get size(): number {
    return this.entities.size
  }

  /**
   * Drop every entity
   */
  clear(): void {
    this.entities.clear()
    this.versions.clear()
    this.clock = 0
    this.nextId = 1
  }

  createTransaction(): MemoryTransaction {
    return new MemoryTransaction(this)
  }

  /**
   * The transaction that storage calls apply to, or null outside one.
   *
   * @throws TransactionError when the enclosing transaction is no longer
   * active, e.g. after a joined transaction rolled it back
   */
  private activeTransaction(): MemoryTransaction | null {
    const current = this.currentTransaction
    if (current === null) return null

    const root = current.root
    if (!root.isActive()) {
      throw new TransactionError(`Cannot use transaction in '${root.status}' status`, ErrorCode.TRANSACTION_ERROR, {
        transactionId: root.id,
      })
    }
    return root instanceof MemoryTransaction ? root : null
  }

  // ===========================================================================
  // Key operations
  // ===========================================================================

  async getMulti(keys: readonly Key[]): Promise<Array<EntityData | null>> {
    const transaction = this.activeTransaction()

    return keys.map(key => {
      const id = storageKey(key)
      if (transaction) {
        const pending = transaction.writes.get(id)
        if (pending) return pending.entity ? cloneValue(pending.entity.data) : null
        if (!transaction.reads.has(id)) transaction.reads.set(id, this.versions.get(id) ?? 0)
      }

      const entity = this.entities.get(id)
      return entity ? cloneValue(entity.data) : null
    })
  }

  async putMulti(requests: readonly PutRequest[]): Promise<Key[]> {
    const transaction = this.activeTransaction()
    const pending: PendingWrite[] = requests.map(request => {
      const key = request.key.isPartial ? this.allocateKey(request.key) : request.key
      const data: EntityData = {}
      for (const [name, value] of request.entries) {
        data[name] = cloneValue(value)
      }
      return { key, entity: { key, data, unindexed: new Set(request.unindexed) } }
    })

    if (transaction) {
      for (const write of pending) transaction.writes.set(storageKey(write.key), write)
    } else {
      this.apply(pending)
    }
    return pending.map(write => write.key)
  }

  async deleteMulti(keys: readonly Key[]): Promise<void> {
    const transaction = this.activeTransaction()
    const pending = keys.map(key => ({ key, entity: null }))

    if (transaction) {
      for (const write of pending) transaction.writes.set(storageKey(write.key), write)
    } else {
      this.apply(pending)
    }
  }

  /**
   * Complete a partial key with the next free integer id
   */
  private allocateKey(partial: Key): Key {
    let key = new Key(partial.kind, this.nextId++, partial.parent, partial.namespace)
    while (this.entities.has(storageKey(key))) {
      key = new Key(partial.kind, this.nextId++, partial.parent, partial.namespace)
    }
    return key
  }

  private apply(writes: readonly PendingWrite[]): void {
    if (writes.length === 0) return

    const version = ++this.clock
    for (const write of writes) {
      const id = storageKey(write.key)
      if (write.entity) {
        this.entities.set(id, write.entity)
      } else {
        this.entities.delete(id)
      }
      this.versions.set(id, version)
    }
  }

  /**
   * Validate and apply a transaction's buffered writes.
   *
   * @throws TransactionFailed if an entity it touched changed after it began
   */
  commit(transaction: MemoryTransaction, startVersion: number): void {
    const touched = new Set([...transaction.reads.keys(), ...transaction.writes.keys()])
    for (const id of touched) {
      const changed = this.versions.get(id) ?? 0
      const seen = transaction.reads.get(id)
      if (changed > startVersion || (seen !== undefined && changed !== seen)) {
        logger.debug(`Transaction ${transaction.id} conflicts on ${id}`)
        throw new TransactionFailed('Transaction conflicts with a concurrent write.', undefined, {
          transactionId: transaction.id,
        })
      }
    }

    this.apply([...transaction.writes.values()])
  }

  // ===========================================================================
  // Queries
  // ===========================================================================

  async query(query: QuerySpec, options: QueryOptions): Promise<QueryResult> {
    const { ancestor } = query
    const fields = [...query.filters.map(f => f.name), ...query.orders.map(o => o.name), ...query.projection]

    const matches = [...this.entities.values()]
      .filter(
        entity =>
          entity.key.kind === query.kind &&
          entity.key.namespace === query.namespace &&
          (ancestor === null || hasAncestor(entity.key, ancestor)) &&
          fields.every(name => indexedValues(entity, name) !== undefined) &&
          query.filters.every(filter => matchesFilter(entity, filter))
      )
      .sort((a, b) => compareEntities(a, b, query.orders))

    const start = options.cursor ? decodeCursor(options.cursor) : options.offset ?? 0
    const end = Math.min(
      matches.length,
      start + options.batchSize,
      options.limit === null || options.limit === undefined ? Infinity : start + options.limit
    )
    const batch = matches.slice(start, Math.max(start, end))

    return {
      entities: batch.map(entity => [entity.key, options.keysOnly ? null : this.project(entity, query.projection)]),
      cursor: encodeCursor(start + batch.length),
    }
  }

  private project(entity: StoredEntity, projection: readonly string[]): EntityData {
    if (projection.length === 0) return cloneValue(entity.data)

    const data: EntityData = {}
    for (const name of projection) {
      data[name] = cloneValue(entity.data[name])
    }
    return data
  }
}
