/**
 * Entity state shared between models and property descriptors.
 *
 * @module model/state
 */

/**
 * Slot holding an entity's sparse field data, keyed by stored field name.
 * A symbol keeps it clear of user-declared property names.
 */
export const ENTITY_DATA: unique symbol = Symbol('kindling.entityData')

/** Stored entity data: field name to stored value */
export type EntityData = Record<string, unknown>

/** Anything carrying entity field data */
export interface EntityState {
  readonly [ENTITY_DATA]: Map<string, unknown>
}
