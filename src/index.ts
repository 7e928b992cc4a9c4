/**
 * kindling - typed models over a key/document store
 *
 * @example
 * ```typescript
 * import { MemoryAdapter, model, props, setAdapter } from 'kindling'
 *
 * setAdapter(new MemoryAdapter())
 *
 * const Person = model('Person', {
 *   email: props.string({ indexed: true }),
 *   name: props.string(),
 * })
 *
 * const ada = await new Person({ email: 'ada@example.com', name: 'Ada' }).put()
 * const found = await Person.query().where(Person.properties.email.eq('ada@example.com')).get()
 * ```
 *
 * @packageDocumentation
 */

// =============================================================================
// Keys and Models
// =============================================================================

export { Key } from './key'
export type { IdOrName, KeyJSON, KindLike, PathSegment } from './key'

export { Model, model } from './model/model'
export type {
  Entity,
  EntityInit,
  EntityValues,
  Merge,
  ModelClass,
  ModelHooks,
  ModelOptions,
  ModelSchema,
  ModelType,
  PropertyMap,
} from './model/model'
export { hasModel, lookupModelByKind, registerModel, unregisterModel } from './model/registry'
export type { EntityData } from './model/state'

// =============================================================================
// Properties
// =============================================================================

export * from './properties'
export * as conditions from './conditions'

// =============================================================================
// Batch Operations
// =============================================================================

export { deleteMulti, getMulti, putMulti } from './batch'

// =============================================================================
// Queries
// =============================================================================

export { Query } from './query/query'
export type { FieldLike, OrderLike, PaginateOptions, QueryInit, RunOptions } from './query/query'
export { Page, Pages, Resultset } from './query/resultset'
export { FieldRef, PropertyFilter, PropertyOrder } from './query/filters'
export type { FilterOperator, FilterTarget, SortDirection } from './query/filters'

// =============================================================================
// Transactions
// =============================================================================

export * from './transaction'

// =============================================================================
// Adapters
// =============================================================================

export { Adapter, getAdapter, hasAdapter, setAdapter } from './adapters/Adapter'
export type { PutRequest, QueryOptions, QueryResult, QuerySpec } from './adapters/Adapter'
export { MemoryAdapter, MemoryTransaction } from './adapters/MemoryAdapter'
export { CacheAdapter, CacheTransaction } from './adapters/CacheAdapter'
export type { CacheAdapterOptions } from './adapters/CacheAdapter'
export * from './cache'

// =============================================================================
// Namespaces, Configuration and Logging
// =============================================================================

export { getNamespace, setDefaultNamespace, withNamespace } from './namespaces'
export { configSchema, configure, ENV_VARS, getConfig, loadConfig, parseConfig, resetConfig } from './config'
export type { KindlingConfig, KindlingConfigInput } from './config'
export { consoleLogger, logger, noopLogger, setLogger, withLevel } from './utils/logger'
export type { LogLevel, Logger } from './utils/logger'

// =============================================================================
// Errors
// =============================================================================

export * from './errors'
