/**
 * Models
 *
 * `model()` builds a model class from a map of property descriptors and
 * registers it under its kind. Each property becomes an accessor on the
 * class prototype that validates on assignment; entity data itself lives in
 * a sparse map keyed by stored field name.
 *
 * @example
 * ```typescript
 * const Person = model('Person', {
 *   email: props.string({ indexed: true }),
 *   firstName: props.string(),
 *   lastName: props.string({ optional: true }),
 * })
 *
 * const person = new Person({ email: 'ada@example.com', firstName: 'Ada' })
 * await person.put()
 *
 * const Employee = Person.extend('Employee', { title: props.string() })
 * ```
 *
 * Polymorphic hierarchies share the kind of their root:
 *
 * @example
 * ```typescript
 * const Animal = model('Animal', { name: props.string() }, { poly: true })
 * const Mammal = Animal.extend('Mammal', {})
 * const Cat = Mammal.extend('Cat', {})
 * Cat.kind // 'Animal'
 * Cat.kinds // ['Cat', 'Mammal', 'Animal']
 * ```
 *
 * @module model/model
 */

import { getAdapter } from '../adapters/Adapter'
import type { Adapter } from '../adapters/Adapter'
import { deleteMulti, putMulti } from '../batch'
import { HIERARCHY_FIELD } from '../constants'
import { ConfigurationError, ErrorCode, ValidationError } from '../errors'
import { Key } from '../key'
import type { IdOrName } from '../key'
import type { AnyProperty } from '../properties/property'
import { Query } from '../query/query'
import type { QueryInit } from '../query/query'
import { asModelClass } from '../types/cast'
import { deepEqual } from '../utils/comparison'
import { logger } from '../utils/logger'
import { lookupModelByKind, registerModel } from './registry'
import { ENTITY_DATA } from './state'
import type { EntityData, EntityState } from './state'

// =============================================================================
// Types
// =============================================================================

/** Property descriptors by attribute name */
export type PropertyMap = Record<string, AnyProperty>

/**
 * Lifecycle hooks. Hooks are inherited by subclasses unless overridden.
 * Throwing from a `pre*` hook aborts the whole batch before the store is
 * called. Hooks only run for key-based operations, not for query results.
 */
export interface ModelHooks<E extends Model = Model> {
  preGet?(key: Key): void | Promise<void>
  postGet?(entity: E): void | Promise<void>
  prePut?(entity: E): void | Promise<void>
  postPut?(entity: E): void | Promise<void>
  preDelete?(key: Key): void | Promise<void>
  postDelete?(key: Key): void | Promise<void>
}

export interface ModelOptions<E extends Model = Model> {
  /** Stored kind; defaults to the model name */
  readonly kind?: string | undefined
  /** Mark this model as the root of a polymorphic hierarchy */
  readonly poly?: boolean | undefined
  /** Adapter for this model; defaults to the global adapter */
  readonly adapter?: Adapter | undefined
  readonly hooks?: ModelHooks<E> | undefined
}

/**
 * Everything known about a model class
 */
export interface ModelSchema {
  readonly modelName: string
  /** Stored kind, shared by every model of a polymorphic hierarchy */
  readonly kind: string
  /** Registry names of this model and its ancestors, most specific first */
  readonly kinds: readonly string[]
  /** All properties, inherited ones first, in declaration order */
  readonly properties: ReadonlyMap<string, AnyProperty>
  readonly isRoot: boolean
  readonly isChild: boolean
  readonly isPolymorphic: boolean
  readonly hooks: ModelHooks
  readonly adapter: Adapter | null
}

/**
 * A model class, seen without its property types
 */
export interface ModelType {
  new (...args: never[]): Model
  readonly schema: ModelSchema
  readonly kind: string
  readonly modelName: string
  readonly adapter: Adapter
  load(key: Key, data: EntityData): Model
  query(init?: QueryInit): Query<Model>
}

type ValueOf<Prop> = Prop extends { readonly valueType: infer V } ? V : never

type ReadOnlyKeys<P> = { [K in keyof P]: P[K] extends { readonly readOnly: true } ? K : never }[keyof P]

type WritableKeys<P> = Exclude<keyof P, ReadOnlyKeys<P>>

/** Property values of an entity */
export type EntityValues<P> = { -readonly [K in WritableKeys<P>]: ValueOf<P[K]> } & {
  readonly [K in ReadOnlyKeys<P>]: ValueOf<P[K]>
}

/** An instance of a model with properties `P` */
export type Entity<P> = Model & EntityValues<P>

/** Constructor argument of a model with properties `P` */
export type EntityInit<P> = { [K in WritableKeys<P>]?: ValueOf<P[K]> } & { key?: Key | null | undefined }

/** Properties of a subclass: its own override inherited ones of the same name */
export type Merge<P, Q> = Omit<P, keyof Q> & Q

/**
 * A generated model class
 */
export interface ModelClass<P> extends ModelType {
  new (init?: EntityInit<P>): Entity<P>
  readonly properties: P
  readonly kinds: readonly string[]
  readonly isPolymorphic: boolean
  readonly isRoot: boolean
  readonly isChild: boolean
  load(key: Key, data: EntityData): Entity<P>
  get(idOrName: IdOrName, options?: { parent?: Key | null; namespace?: string | null }): Promise<Entity<P> | null>
  query(init?: QueryInit): Query<Entity<P>>
  extend<Q extends PropertyMap>(
    name: string,
    properties: Q,
    options?: ModelOptions<Entity<Merge<P, Q>>>
  ): ModelClass<Merge<P, Q>>
}

// =============================================================================
// Schema lookup
// =============================================================================

const schemas = new WeakMap<object, ModelSchema>()

/**
 * Find the schema of a model class, walking up user-defined subclasses
 */
function schemaOf(cls: object): ModelSchema {
  let current: unknown = cls
  while (typeof current === 'function') {
    const schema = schemas.get(current)
    if (schema) return schema
    current = Object.getPrototypeOf(current)
  }
  throw new ConfigurationError('Model classes must be created with model().', ErrorCode.INVALID_CONFIG)
}

/**
 * Schema of the class an entity was instantiated from
 */
export function schemaOfEntity(entity: Model): ModelSchema {
  return schemaOf(entity.constructor)
}

// =============================================================================
// Model
// =============================================================================

/**
 * Base class of all entities
 */
export class Model implements EntityState {
  readonly [ENTITY_DATA] = new Map<string, unknown>()

  /** This entity's key; partial until the entity is stored */
  key: Key

  /**
   * @throws ValidationError for unknown properties or invalid values
   */
  constructor(init: Record<string, unknown> = {}) {
    const schema = schemaOf(new.target)
    const { key, ...values } = init

    if (key === undefined || key === null) {
      this.key = new Key(schema.kind)
    } else if (key instanceof Key) {
      this.key = key
    } else {
      throw new ValidationError(`${schema.modelName}() key must be a Key.`, ErrorCode.INVALID_TYPE, {
        property: 'key',
      })
    }

    for (const [name, value] of Object.entries(values)) {
      const prop = schema.properties.get(name)
      if (!prop) {
        throw new ValidationError(`${schema.modelName}() does not take a ${JSON.stringify(name)} parameter.`, ErrorCode.INVALID_TYPE, {
          property: name,
        })
      }
      prop.write(this, value)
    }
  }

  // ===========================================================================
  // Class API
  // ===========================================================================

  static get schema(): ModelSchema {
    return schemaOf(this)
  }

  static get kind(): string {
    return schemaOf(this).kind
  }

  static get modelName(): string {
    return schemaOf(this).modelName
  }

  static get kinds(): readonly string[] {
    return schemaOf(this).kinds
  }

  static get properties(): Record<string, AnyProperty> {
    return Object.fromEntries(schemaOf(this).properties)
  }

  static get isPolymorphic(): boolean {
    return schemaOf(this).isPolymorphic
  }

  static get isRoot(): boolean {
    return schemaOf(this).isRoot
  }

  static get isChild(): boolean {
    return schemaOf(this).isChild
  }

  /**
   * The adapter entities of this model are stored with
   *
   * @throws LookupError if the model has none and no global adapter is set
   */
  static get adapter(): Adapter {
    return schemaOf(this).adapter ?? getAdapter()
  }

  /**
   * Rebuild an entity from stored data. Polymorphic data is loaded into the
   * most specific class recorded in its hierarchy field.
   */
  static load(key: Key, data: EntityData): Model {
    let target: ModelType = this
    if (schemaOf(this).isPolymorphic) {
      const kinds = data[HIERARCHY_FIELD]
      if (Array.isArray(kinds) && typeof kinds[0] === 'string') {
        target = lookupModelByKind(kinds[0])
      }
    }

    const instance = new target()
    instance.key = key
    for (const prop of target.schema.properties.values()) {
      prop.loadInto(instance, data)
    }
    return instance
  }

  /**
   * Get an entity of this model by id or name
   */
  static get(idOrName: IdOrName, options: { parent?: Key | null; namespace?: string | null } = {}): Promise<Model | null> {
    return new Key(schemaOf(this).kind, idOrName, options.parent ?? null, options.namespace).get()
  }

  static query(init: QueryInit = {}): Query<Model> {
    return new Query(this, init)
  }

  /**
   * Build a subclass of this model
   */
  static extend(name: string, properties: PropertyMap, options: ModelOptions = {}): ModelType {
    return defineModel(this, schemaOf(this), name, properties, options)
  }

  // ===========================================================================
  // Instance API
  // ===========================================================================

  private get schema(): ModelSchema {
    return schemaOf(this.constructor)
  }

  /**
   * Stored field names that must not be indexed, evaluated against this
   * entity's current values
   */
  get unindexedProperties(): string[] {
    const names: string[] = []
    for (const prop of this.schema.properties.values()) {
      names.push(...prop.unindexedNames(this))
    }
    return names
  }

  /**
   * Store-prepared field/value pairs, in declaration order. Polymorphic
   * entities also record their class hierarchy.
   *
   * @throws MissingValueError if a required property has no value
   */
  toEntries(): Array<[string, unknown]> {
    const schema = this.schema
    const entries: Array<[string, unknown]> = []
    for (const prop of schema.properties.values()) {
      entries.push(...prop.storeEntries(this))
    }
    if (schema.isPolymorphic) {
      entries.push([HIERARCHY_FIELD, [...schema.kinds]])
    }
    return entries
  }

  /**
   * Persist this entity. Its key is complete afterwards.
   */
  async put(): Promise<this> {
    await putMulti([this])
    return this
  }

  /**
   * Delete this entity.
   *
   * @throws LookupError if the entity was never stored
   */
  async delete(): Promise<void> {
    await deleteMulti([this.key])
  }

  /**
   * Clear a property's value. For computed properties this forces the value
   * to be recomputed on next access.
   */
  unset(name: string): void {
    const prop = this.schema.properties.get(name)
    if (!prop) {
      throw new ValidationError(`${this.schema.modelName} has no property ${JSON.stringify(name)}.`, ErrorCode.INVALID_VALUE, {
        property: name,
      })
    }
    prop.clear(this)
  }

  /**
   * Same concrete class, equal keys and equal property values
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Model)) return false
    if (other === this) return true
    if (Object.getPrototypeOf(other) !== Object.getPrototypeOf(this)) return false
    if (!this.key.equals(other.key)) return false

    for (const prop of this.schema.properties.values()) {
      if (!deepEqual(prop.read(this), prop.read(other))) return false
    }
    return true
  }

  toString(): string {
    const parts = [`key=${this.key.toString()}`]
    for (const [name, prop] of this.schema.properties) {
      parts.push(`${name}=${formatValue(prop.read(this))}`)
    }
    return `${this.schema.modelName}(${parts.join(', ')})`
  }
}

function formatValue(value: unknown): string {
  if (typeof value === 'string') return JSON.stringify(value)
  if (value instanceof Date) return value.toISOString()
  if (Array.isArray(value)) return `[${value.map(formatValue).join(', ')}]`
  return String(value)
}

// =============================================================================
// Model definition
// =============================================================================

function checkPropertyNames(modelName: string, properties: PropertyMap): void {
  for (const [name, prop] of Object.entries(properties)) {
    if (name === 'key' || name in Model.prototype) {
      throw new ConfigurationError(`${modelName} cannot declare a property named ${JSON.stringify(name)}.`, ErrorCode.INVALID_OPTION, {
        property: name,
      })
    }
    if (prop.nameOnEntity === HIERARCHY_FIELD) {
      throw new ConfigurationError(`${HIERARCHY_FIELD} is a reserved field name.`, ErrorCode.INVALID_OPTION, {
        property: name,
      })
    }
  }
}

function defineModel(
  base: ModelType,
  parent: ModelSchema | null,
  name: string,
  properties: PropertyMap,
  options: ModelOptions
): ModelType {
  checkPropertyNames(name, properties)

  const merged = new Map<string, AnyProperty>(parent ? parent.properties : [])
  for (const [attribute, prop] of Object.entries(properties)) {
    merged.set(attribute, prop.bind(attribute))
  }

  const ownKind = options.kind ?? name
  const isChild = parent !== null && parent.isPolymorphic
  const isRoot = !isChild && (options.poly ?? false)

  const schema: ModelSchema = {
    modelName: name,
    kind: isChild ? parent.kind : ownKind,
    kinds: [ownKind, ...(parent ? parent.kinds : [])],
    properties: merged,
    isRoot,
    isChild,
    isPolymorphic: isRoot || isChild,
    hooks: { ...parent?.hooks, ...options.hooks },
    adapter: options.adapter ?? parent?.adapter ?? null,
  }

  const cls = class extends base {}
  Object.defineProperty(cls, 'name', { value: name })

  for (const [attribute, prop] of Object.entries(properties)) {
    Object.defineProperty(cls.prototype, attribute, {
      get(this: Model): unknown {
        return prop.read(this)
      },
      set(this: Model, value: unknown): void {
        prop.write(this, value)
      },
      enumerable: true,
      configurable: true,
    })
  }

  schemas.set(cls, schema)
  registerModel(ownKind, cls)
  logger.debug(`Defined model ${name} with ${merged.size} properties`)
  return cls
}

/**
 * Build and register a model class.
 *
 * @param name - Model name, also the kind unless `options.kind` is set
 * @param properties - Property descriptors by attribute name
 * @throws ConfigurationError for reserved property names
 * @throws RegistryError if a model is already registered for the kind
 */
export function model<P extends PropertyMap>(
  name: string,
  properties: P,
  options: ModelOptions<Entity<P>> = {}
): ModelClass<P> {
  return asModelClass<P>(defineModel(Model, null, name, properties, options))
}
