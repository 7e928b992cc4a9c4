/**
 * Query - immutable query value object
 *
 * Every derivation method returns a new query; the receiver never changes.
 *
 * @example
 * ```typescript
 * const recent = Post.query()
 *   .where(Post.properties.published.isTrue)
 *   .orderBy(Post.properties.createdAt.desc)
 *   .withLimit(10)
 *
 * for await (const post of recent.run()) {
 *   console.log(post.title)
 * }
 *
 * const pages = recent.paginate({ pageSize: 5 })
 * const first = await pages.fetchNextPage()
 * const next = recent.paginate({ pageSize: 5, cursor: first.cursor })
 * ```
 *
 * @module query/query
 */

import type { QuerySpec } from '../adapters/Adapter'
import { getConfig } from '../config'
import { HIERARCHY_FIELD } from '../constants'
import type { Key } from '../key'
import type { Model, ModelType } from '../model/model'
import { lookupModelByKind } from '../model/registry'
import { getNamespace } from '../namespaces'
import type { AnyProperty } from '../properties/property'
import { asEntity } from '../types/cast'
import { FieldRef, PropertyFilter, PropertyOrder } from './filters'
import { Pages, Resultset } from './resultset'

/** Anything naming a stored field */
export type FieldLike = string | FieldRef | AnyProperty

/** Anything naming a sort order; strings may start with `-` for descending */
export type OrderLike = string | PropertyOrder

export interface QueryInit {
  readonly ancestor?: Key | null | undefined
  /** Defaults to the current namespace */
  readonly namespace?: string | null | undefined
  readonly projection?: readonly string[] | undefined
  readonly filters?: readonly PropertyFilter[] | undefined
  readonly orders?: readonly PropertyOrder[] | undefined
  readonly offset?: number | undefined
  readonly limit?: number | null | undefined
}

export interface RunOptions {
  /** Yield keys instead of entities */
  readonly keysOnly?: boolean | undefined
  /** Entities fetched per round trip */
  readonly batchSize?: number | undefined
}

export interface PaginateOptions {
  readonly pageSize?: number | undefined
  /** Resume from a cursor returned by an earlier page */
  readonly cursor?: string | null | undefined
}

function fieldName(field: FieldLike): string {
  if (typeof field === 'string') return field
  if (field instanceof FieldRef) return field.name
  return field.nameOnEntity
}

/**
 * A query against one kind
 */
export class Query<E extends Model = Model> implements QuerySpec {
  readonly kind: string
  readonly ancestor: Key | null
  readonly namespace: string
  readonly projection: readonly string[]
  readonly filters: readonly PropertyFilter[]
  readonly orders: readonly PropertyOrder[]
  readonly offset: number
  readonly limit: number | null

  /**
   * @param model - Model class, or a kind name resolved when the query runs
   */
  constructor(
    readonly model: ModelType | string,
    init: QueryInit = {}
  ) {
    this.kind = typeof model === 'string' ? model : model.kind
    this.ancestor = init.ancestor ?? null
    this.namespace = init.namespace ?? getNamespace()
    this.projection = Object.freeze([...(init.projection ?? [])])
    this.filters = Object.freeze([...(init.filters ?? [])])
    this.orders = Object.freeze([...(init.orders ?? [])])
    this.offset = init.offset ?? 0
    this.limit = init.limit ?? null
  }

  // ===========================================================================
  // Derivation
  // ===========================================================================

  private derive(changes: QueryInit): Query<E> {
    return new Query<E>(this.model, {
      ancestor: this.ancestor,
      namespace: this.namespace,
      projection: this.projection,
      filters: this.filters,
      orders: this.orders,
      offset: this.offset,
      limit: this.limit,
      ...changes,
    })
  }

  /**
   * Restrict results to the given fields (a projection query)
   */
  select(...fields: FieldLike[]): Query<E> {
    return this.derive({ projection: fields.map(fieldName) })
  }

  /**
   * Replace this query's filters
   */
  where(...filters: PropertyFilter[]): Query<E> {
    return this.derive({ filters })
  }

  /**
   * Add filters to the existing ones
   */
  andWhere(...filters: PropertyFilter[]): Query<E> {
    return this.derive({ filters: [...this.filters, ...filters] })
  }

  /**
   * Replace this query's sort orders
   */
  orderBy(...orders: OrderLike[]): Query<E> {
    return this.derive({
      orders: orders.map(order => (typeof order === 'string' ? PropertyOrder.parse(order) : order)),
    })
  }

  withAncestor(ancestor: Key | null): Query<E> {
    return this.derive({ ancestor })
  }

  withNamespace(namespace: string): Query<E> {
    return this.derive({ namespace })
  }

  withOffset(offset: number): Query<E> {
    return this.derive({ offset })
  }

  withLimit(limit: number | null): Query<E> {
    return this.derive({ limit })
  }

  // ===========================================================================
  // Execution
  // ===========================================================================

  /**
   * The model that loads results.
   *
   * @throws LookupError if the query was built for an unknown kind
   */
  resolveModel(): ModelType {
    return typeof this.model === 'string' ? lookupModelByKind(this.model) : this.model
  }

  /**
   * The query as sent to the adapter. Queries against a child of a
   * polymorphic hierarchy only match that child and its descendants.
   */
  prepare(): QuerySpec {
    const model = this.resolveModel()
    if (!model.schema.isChild) return this

    return {
      kind: this.kind,
      ancestor: this.ancestor,
      namespace: this.namespace,
      projection: this.projection,
      filters: [...this.filters, new PropertyFilter(HIERARCHY_FIELD, '=', model.schema.kinds[0])],
      orders: this.orders,
    }
  }

  /**
   * Run this query, fetching results lazily in batches
   */
  run(options: RunOptions & { readonly keysOnly: true }): Resultset<Key>
  run(options?: RunOptions): Resultset<E>
  run(options: RunOptions = {}): Resultset<E> | Resultset<Key> {
    const batchSize = options.batchSize ?? getConfig().query.batchSize
    if (options.keysOnly) {
      return new Resultset<Key>(this, { batchSize, keysOnly: true }, key => key)
    }
    return new Resultset<E>(this, { batchSize, keysOnly: false }, (key, data) =>
      asEntity<E>(this.resolveModel().load(key, data ?? {}))
    )
  }

  /**
   * The first result, or null when there is none
   */
  async get(): Promise<E | null> {
    const [first] = await this.withLimit(1).run({ batchSize: 1 }).fetchNextBatch()
    return first ?? null
  }

  /**
   * Split results into pages, optionally resuming from a cursor
   */
  paginate(options: PaginateOptions = {}): Pages<E> {
    const pageSize = options.pageSize ?? getConfig().query.pageSize
    const resultset = new Resultset<E>(this, { batchSize: pageSize, keysOnly: false, cursor: options.cursor ?? null }, (key, data) =>
      asEntity<E>(this.resolveModel().load(key, data ?? {}))
    )
    return new Pages(resultset)
  }
}
