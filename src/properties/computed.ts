/**
 * Computed properties
 *
 * Values are computed from the entity the first time they are read, then
 * kept until the entity is reloaded or the property is unset. They are
 * stored like any other value so they can be filtered on, which is why
 * computed properties are indexed and optional unless told otherwise.
 *
 * @example
 * ```typescript
 * const Person = model('Person', {
 *   email: props.string(),
 *   domain: props.computed((p: Model & { email: string }) => p.email.split('@')[1] ?? ''),
 * })
 * ```
 *
 * @module properties/computed
 */

import { ImmutablePropertyError } from '../errors'
import type { Model } from '../model/model'
import { ENTITY_DATA } from '../model/state'
import { asEntity } from '../types/cast'
import { Property, Skip } from './property'
import type { FieldShape, FieldValue, PropertyOptions } from './property'

export type ComputedOptions = PropertyOptions<unknown>

/**
 * Shape of a computed property, which is optional unless `optional: false`
 */
export type ComputedShapeOf<O> = O extends { readonly repeated: true }
  ? 'repeated'
  : O extends { readonly optional: false }
    ? 'single'
    : 'optional'

export class ComputedProperty<T, S extends FieldShape = FieldShape, E extends Model = Model> extends Property<unknown, S> {
  declare readonly valueType: FieldValue<T, S>

  readonly typeName = 'Computed'
  override readonly readOnly = true as const

  constructor(
    private readonly fn: (entity: E) => T,
    options: ComputedOptions = {}
  ) {
    super({ ...options, indexed: options.indexed ?? true, optional: options.optional ?? true })
  }

  protected validateElement(value: unknown): unknown {
    return value
  }

  override read(entity: Model): unknown {
    const data = entity[ENTITY_DATA]
    const name = this.nameOnEntity
    if (data.has(name)) return data.get(name)

    const value = this.validate(this.fn(asEntity<E>(entity)))
    data.set(name, value)
    return value
  }

  /**
   * @throws ImmutablePropertyError always
   */
  override write(_entity: Model, _value: unknown): void {
    throw new ImmutablePropertyError(this.nameOnModel)
  }

  /** Stored values are ignored; the value is recomputed on access */
  override prepareToLoad(_entity: Model, _value: unknown): Skip {
    return Skip
  }
}
