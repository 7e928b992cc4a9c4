/**
 * Property descriptors
 *
 * A property describes one typed attribute of a model: its stored field
 * name, default, indexing and shape (single, optional or repeated), and the
 * pipeline that converts values between their model and wire forms.
 *
 * Lifecycle:
 * - `validate` runs on every assignment
 * - `prepareToStore` runs once per property when an entity is persisted
 * - `prepareToLoad` runs once per stored field when an entity is rebuilt
 *
 * @module properties/property
 */

import { ConfigurationError, ErrorCode, MissingValueError, ValidationError } from '../errors'
import { ENTITY_DATA } from '../model/state'
import type { EntityData } from '../model/state'
import type { Model } from '../model/model'
import { FieldRef } from '../query/filters'
import type { FilterTarget, PropertyFilter, PropertyOrder } from '../query/filters'
import { cloneValue } from '../utils/comparison'
import { runLoad, runStore } from './pipeline'
import type { WireStep } from './pipeline'

// =============================================================================
// Types
// =============================================================================

/**
 * Returned by `prepareToLoad` when a stored value must not be assigned
 */
export const Skip: unique symbol = Symbol('kindling.skip')
export type Skip = typeof Skip

/** How many values a property holds */
export type FieldShape = 'single' | 'optional' | 'repeated'

export interface ShapeOptions {
  readonly optional?: boolean | undefined
  readonly repeated?: boolean | undefined
}

/**
 * Infer a property's shape from its options literal
 */
export type ShapeOf<O> = O extends { readonly repeated: true }
  ? 'repeated'
  : O extends { readonly optional: true }
    ? 'optional'
    : 'single'

/**
 * The value type a property exposes on model instances
 */
export type FieldValue<T, S extends FieldShape> = S extends 'repeated' ? T[] : S extends 'optional' ? T | null : T

/**
 * Decides, per entity, whether a property is indexed
 */
export type IndexPredicate = (entity: Model, property: AnyProperty, name: string) => boolean

export interface PropertyOptions<T> extends ShapeOptions {
  /** Field name on the stored entity; defaults to the name on the model */
  readonly name?: string | undefined
  readonly default?: T | readonly T[] | null | undefined
  readonly indexed?: boolean | undefined
  /** Index the property only when this returns true */
  readonly indexedIf?: IndexPredicate | null | undefined
}

/** A property of any value type and shape */
export type AnyProperty = Property<unknown, FieldShape>

// =============================================================================
// Base Property
// =============================================================================

export abstract class Property<T = unknown, S extends FieldShape = FieldShape> implements FilterTarget {
  /** Type-level only: the value type seen on model instances */
  declare readonly valueType: FieldValue<T, S>

  /** Name used in error messages */
  abstract readonly typeName: string

  /** True for properties whose values cannot be assigned */
  readonly readOnly: boolean = false

  readonly indexed: boolean
  readonly indexedIf: IndexPredicate | null
  readonly optional: boolean
  readonly repeated: boolean

  /** Wire transformations, in store order */
  protected readonly steps: WireStep[] = []

  private readonly declaredDefault: unknown
  private defaultValue: unknown = null
  private readonly explicitName: string | null
  private boundName: string | null = null

  constructor(options: PropertyOptions<T> = {}) {
    this.indexedIf = options.indexedIf ?? null
    this.indexed = (options.indexed ?? false) || this.indexedIf !== null
    this.optional = options.optional ?? false
    this.repeated = options.repeated ?? false
    this.explicitName = options.name ?? null
    this.declaredDefault = options.default ?? null
  }

  /** Field name on the stored entity */
  get nameOnEntity(): string {
    return this.explicitName ?? this.boundName ?? ''
  }

  /** Attribute name on the model */
  get nameOnModel(): string {
    return this.boundName ?? this.explicitName ?? ''
  }

  /** The validated default, or null */
  get default(): unknown {
    return this.defaultValue
  }

  /**
   * Attach this property to a model attribute. Called once per model that
   * declares or inherits the property; also validates the default.
   *
   * @throws ConfigurationError if already bound under another name
   */
  bind(nameOnModel: string): this {
    if (this.boundName !== null && this.boundName !== nameOnModel) {
      throw new ConfigurationError(
        `${this.typeName} property ${this.boundName} cannot be reused as ${nameOnModel}.`,
        ErrorCode.INVALID_OPTION,
        { property: nameOnModel }
      )
    }

    this.boundName = nameOnModel
    if (this.declaredDefault !== null) {
      this.defaultValue = this.validate(this.declaredDefault)
    }
    return this
  }

  // ===========================================================================
  // Validation
  // ===========================================================================

  /**
   * Check that `value` can be assigned to this property.
   *
   * @returns the value to hold on the entity
   * @throws ValidationError when the value has the wrong type or is invalid
   */
  validate(value: unknown): unknown {
    if (value === null || value === undefined) {
      if (this.optional) return null
      throw this.typeError(value)
    }

    if (this.repeated) {
      if (!Array.isArray(value)) throw this.typeError(value)
      return value.map(element => this.validateElement(element))
    }

    return this.validateElement(value)
  }

  /**
   * Validate a single (non-list) value
   */
  protected abstract validateElement(value: unknown): T

  protected typeError(value: unknown): ValidationError {
    return new ValidationError(
      `Value of type ${describeType(value)} assigned to ${this.typeName} property.`,
      ErrorCode.INVALID_TYPE,
      { property: this.nameOnModel, expectedType: this.typeName, actualType: describeType(value) }
    )
  }

  // ===========================================================================
  // Entity access
  // ===========================================================================

  /**
   * Read this property's value from an entity, falling back to the default.
   * Repeated properties materialize their value so in-place edits stick.
   */
  read(entity: Model): unknown {
    const data = entity[ENTITY_DATA]
    const name = this.nameOnEntity
    if (data.has(name)) return data.get(name)

    if (this.defaultValue !== null) {
      const value = cloneValue(this.defaultValue)
      if (this.repeated) data.set(name, value)
      return value
    }

    if (this.repeated) {
      const empty: unknown[] = []
      data.set(name, empty)
      return empty
    }

    return null
  }

  write(entity: Model, value: unknown): void {
    entity[ENTITY_DATA].set(this.nameOnEntity, this.validate(value))
  }

  clear(entity: Model): void {
    entity[ENTITY_DATA].delete(this.nameOnEntity)
  }

  isSet(entity: Model): boolean {
    return entity[ENTITY_DATA].has(this.nameOnEntity)
  }

  // ===========================================================================
  // Storage
  // ===========================================================================

  /**
   * Convert a model value to its wire form.
   *
   * @throws MissingValueError when a required property has no value
   */
  prepareToStore(_entity: Model, value: unknown): unknown {
    if (value === null || value === undefined) {
      if (!this.optional) throw new MissingValueError(this.nameOnModel)
      return null
    }
    return runStore(this.steps, value, this.repeated)
  }

  /**
   * Convert a wire value back to its model form, or return `Skip`
   */
  prepareToLoad(_entity: Model, value: unknown): unknown {
    if (value === null || value === undefined) return null
    return runLoad(this.steps, value, this.repeated)
  }

  /**
   * Stored field/value pairs for this property on `entity`
   */
  storeEntries(entity: Model): Array<[string, unknown]> {
    return [[this.nameOnEntity, this.prepareToStore(entity, this.read(entity))]]
  }

  /**
   * Assign this property's stored value from `data`, if present
   */
  loadInto(entity: Model, data: EntityData): void {
    const name = this.nameOnEntity
    if (!Object.prototype.hasOwnProperty.call(data, name)) return

    const value = this.prepareToLoad(entity, data[name])
    if (value !== Skip) entity[ENTITY_DATA].set(name, value)
  }

  /**
   * Whether this property is indexed on `entity`
   */
  isIndexedFor(entity: Model): boolean {
    if (!this.indexed) return false
    return this.indexedIf === null || this.indexedIf(entity, this, this.nameOnModel)
  }

  /**
   * Stored field names of this property that are excluded from indexes
   */
  unindexedNames(entity: Model): string[] {
    return this.isIndexedFor(entity) ? [] : [this.nameOnEntity]
  }

  // ===========================================================================
  // Filters and orders
  // ===========================================================================

  /**
   * Validate a comparison operand and convert it to its stored form
   */
  toFilterValue(value: unknown): unknown {
    if (value === null || value === undefined) {
      if (this.optional) return null
      throw this.typeError(value)
    }
    return runStore(this.steps, this.validateElement(value), false)
  }

  nested(name: string): FilterTarget {
    throw new ValidationError(`${this.typeName} property ${this.nameOnModel} has no field ${name}.`, ErrorCode.INVALID_VALUE, {
      property: this.nameOnModel,
    })
  }

  protected get ref(): FieldRef {
    return new FieldRef(this)
  }

  eq(value: unknown): PropertyFilter {
    return this.ref.eq(value)
  }

  ne(value: unknown): PropertyFilter {
    return this.ref.ne(value)
  }

  lt(value: unknown): PropertyFilter {
    return this.ref.lt(value)
  }

  le(value: unknown): PropertyFilter {
    return this.ref.le(value)
  }

  gt(value: unknown): PropertyFilter {
    return this.ref.gt(value)
  }

  ge(value: unknown): PropertyFilter {
    return this.ref.ge(value)
  }

  get isNone(): PropertyFilter {
    return this.ref.isNone
  }

  get asc(): PropertyOrder {
    return this.ref.asc
  }

  get desc(): PropertyOrder {
    return this.ref.desc
  }
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Reject indexing options on blob-like properties
 *
 * @throws ConfigurationError if `indexed` or `indexedIf` is set
 */
export function rejectIndexing(typeName: string, options: PropertyOptions<unknown>): void {
  if (options.indexed || options.indexedIf) {
    throw new ConfigurationError(`${typeName} properties cannot be indexed.`, ErrorCode.INVALID_OPTION, {
      property: options.name,
    })
  }
}

/**
 * Human-readable type of a value for error messages
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null'
  if (value === undefined) return 'undefined'
  if (Array.isArray(value)) return 'Array'
  if (typeof value === 'object') {
    const name: unknown = value.constructor?.name
    return typeof name === 'string' && name !== '' ? name : 'Object'
  }
  return typeof value
}
