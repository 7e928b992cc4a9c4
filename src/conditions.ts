/**
 * Index conditions
 *
 * Predicates for a property's `indexedIf` option. Each receives the entity,
 * the property and the property's name on the model.
 *
 * @example
 * ```typescript
 * const Task = model('Task', {
 *   done: props.bool({ indexedIf: conditions.isTrue }),
 * })
 * ```
 *
 * @module conditions
 */

import type { Model } from './model/model'
import type { AnyProperty, IndexPredicate } from './properties/property'
import { deepEqual } from './utils/comparison'

/** The property's value equals its default */
export const isDefault: IndexPredicate = (entity: Model, prop: AnyProperty) => deepEqual(prop.read(entity), prop.default)

/** The property's value differs from its default */
export const isNotDefault: IndexPredicate = (entity, prop, name) => !isDefault(entity, prop, name)

/** The property has never been assigned */
export const isEmpty: IndexPredicate = (entity, prop) => !prop.isSet(entity)

/** The property has been assigned */
export const isNotEmpty: IndexPredicate = (entity, prop) => prop.isSet(entity)

/** The property was assigned null */
export const isNone: IndexPredicate = (entity, prop) => prop.isSet(entity) && prop.read(entity) === null

/** The property was assigned a value other than null */
export const isNotNone: IndexPredicate = (entity, prop) => {
  if (!prop.isSet(entity)) return false
  const value = prop.read(entity)
  return value !== null && value !== undefined
}

/** The property was assigned a truthy value */
export const isTrue: IndexPredicate = (entity, prop) => prop.isSet(entity) && Boolean(prop.read(entity))

/** The property was assigned a falsy value */
export const isFalse: IndexPredicate = (entity, prop) => prop.isSet(entity) && !prop.read(entity)
