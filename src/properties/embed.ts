/**
 * Embedded entities
 *
 * An embed property stores another model's fields inside the owning
 * entity, each under the embed's name followed by a dot. Repeated embeds
 * store one list per field, all of the same length.
 *
 * @example
 * ```typescript
 * const Nested = model('Nested', { y: props.integer(), z: props.integer({ indexed: true }) })
 * const Outer = model('Outer', { x: props.float({ indexed: true }), nested: props.embed({ kind: Nested }) })
 *
 * new Outer({ x: 1, nested: new Nested({ y: 42, z: 43 }) }).toEntries()
 * // [['x', 1], ['nested.y', 42], ['nested.z', 43]]
 *
 * Outer.properties.nested.field('z').ge(10)
 * // PropertyFilter { name: 'nested.z', operator: '>=', value: 10 }
 * ```
 *
 * @module properties/embed
 */

import { ConfigurationError, ErrorCode, IntegrityError, MissingValueError, ValidationError } from '../errors'
import { Key } from '../key'
import type { Model, ModelType } from '../model/model'
import { lookupModelByKind } from '../model/registry'
import { ENTITY_DATA } from '../model/state'
import type { EntityData } from '../model/state'
import type { FieldRef, FilterTarget } from '../query/filters'
import { asEntity } from '../types/cast'
import { Property } from './property'
import type { FieldShape, ShapeOptions } from './property'

export interface EmbedOptions extends ShapeOptions {
  /** The embedded model, or its registered kind */
  readonly kind: ModelType | string
}

/** Options an embed rejects, since its fields carry their own */
const FORBIDDEN_OPTIONS = ['name', 'default', 'indexed', 'indexedIf'] as const

/**
 * Embeds entities of type `E` in the owning entity
 */
export class EmbedProperty<E extends Model = Model, S extends FieldShape = FieldShape> extends Property<E, S> {
  readonly typeName = 'Embed'
  private readonly target: ModelType | string

  constructor(options: EmbedOptions) {
    for (const option of FORBIDDEN_OPTIONS) {
      if (option in options) {
        throw new ConfigurationError('Embed does not support name, default, indexed or indexedIf.', ErrorCode.INVALID_OPTION, {
          option,
        })
      }
    }

    super({ optional: options.optional, repeated: options.repeated })
    this.target = options.kind
  }

  /** The embedded model class */
  get model(): ModelType {
    return typeof this.target === 'string' ? lookupModelByKind(this.target) : this.target
  }

  /** Registered kind of the embedded model */
  get kind(): string {
    return typeof this.target === 'string' ? this.target : this.target.schema.kinds[0]
  }

  protected validateElement(value: unknown): E {
    return asEntity<E>(this.checkChild(value))
  }

  private checkChild(value: unknown): Model {
    const cls = this.model
    if (!(value instanceof cls)) {
      throw new ValidationError(`${this.nameOnModel} properties must be instances of ${this.kind}.`, ErrorCode.INVALID_TYPE, {
        property: this.nameOnModel,
        expectedType: this.kind,
      })
    }
    return value
  }

  // ===========================================================================
  // Storage
  // ===========================================================================

  private prefixed(name: string): string {
    return `${this.nameOnEntity}.${name}`
  }

  override storeEntries(entity: Model): Array<[string, unknown]> {
    const value = this.read(entity)
    if (value === null || value === undefined) {
      if (!this.optional) throw new MissingValueError(this.nameOnModel)
      return []
    }

    if (!Array.isArray(value)) {
      return this.entriesOf(value)
    }

    const columns = new Map<string, unknown[]>()
    for (const element of value) {
      for (const [name, stored] of this.entriesOf(element)) {
        const column = columns.get(name) ?? []
        column.push(stored)
        columns.set(name, column)
      }
    }

    for (const [name, column] of columns) {
      if (column.length !== value.length) {
        throw new IntegrityError(`Repeated properties for ${this.nameOnModel} have different lengths.`, {
          property: this.nameOnModel,
          field: name,
        })
      }
    }
    return [...columns]
  }

  private entriesOf(value: unknown): Array<[string, unknown]> {
    const child = this.checkChild(value)
    return child.toEntries().map(([name, stored]): [string, unknown] => [this.prefixed(name), stored])
  }

  override loadInto(entity: Model, data: EntityData): void {
    const prefix = this.prefixed('')
    const fields: EntityData = {}
    let found = false
    for (const [name, value] of Object.entries(data)) {
      if (name.startsWith(prefix)) {
        fields[name.slice(prefix.length)] = value
        found = true
      }
    }

    if (this.repeated) {
      entity[ENTITY_DATA].set(this.nameOnEntity, this.loadRepeated(fields))
    } else if (found) {
      entity[ENTITY_DATA].set(this.nameOnEntity, this.loadOne(fields))
    }
  }

  private loadOne(fields: EntityData): Model {
    const cls = this.model
    return cls.load(new Key(cls.kind), fields)
  }

  private loadRepeated(fields: EntityData): Model[] {
    const columns = Object.entries(fields)
    if (columns.length === 0) return []

    const [, first] = columns[0]
    const length = Array.isArray(first) ? first.length : -1
    const rows: EntityData[] = Array.from({ length: Math.max(length, 0) }, () => ({}))
    for (const [name, column] of columns) {
      if (!Array.isArray(column) || column.length !== length) {
        throw new IntegrityError(`Repeated properties for ${this.nameOnModel} have different lengths.`, {
          property: this.nameOnModel,
          field: name,
        })
      }
      column.forEach((value, i) => {
        rows[i][name] = value
      })
    }
    return rows.map(row => this.loadOne(row))
  }

  /**
   * Unindexed fields of the embedded entities, under this embed's prefix
   */
  override unindexedNames(entity: Model): string[] {
    const value = this.read(entity)
    const children = Array.isArray(value) ? value : value === null || value === undefined ? [] : [value]

    const names = new Set<string>()
    for (const child of children) {
      for (const name of this.checkChild(child).unindexedProperties) {
        names.add(this.prefixed(name))
      }
    }
    return [...names]
  }

  // ===========================================================================
  // Filters
  // ===========================================================================

  override nested(name: string): FilterTarget {
    const prop = this.model.schema.properties.get(name)
    if (!prop) {
      throw new ValidationError(`${this.kind} has no property ${JSON.stringify(name)}.`, ErrorCode.INVALID_VALUE, {
        property: `${this.nameOnModel}.${name}`,
      })
    }
    return prop
  }

  /**
   * Reference a property of the embedded model for filters and orders
   */
  field(name: string): FieldRef {
    return this.ref.field(name)
  }
}
