/**
 * Type Cast Utilities
 *
 * IMPORTANT: These are intentional escape hatches for scenarios where TypeScript's
 * type system cannot express the actual runtime relationship between types.
 * Each function documents why the cast is safe.
 */

import type { Model, ModelClass, ModelType } from '../model/model'

// =============================================================================
// Model classes
// =============================================================================

/**
 * View a generated model class through its typed interface.
 * Use when `model()` or `extend()` returns the class it just built.
 *
 * @remarks Safe because the class defines one accessor per property in `P`,
 * each reading and writing values validated by that property.
 */
export function asModelClass<P>(cls: ModelType): ModelClass<P> {
  return cls as unknown as ModelClass<P>
}

/**
 * Narrow a loaded entity to the entity type of the model that loaded it.
 * Use in queries and batch reads where the model class is known statically.
 *
 * @remarks Safe because entities are only ever instantiated by their own
 * generated class (or, for polymorphic models, a registered subclass).
 */
export function asEntity<E extends Model>(entity: Model): E {
  return entity as E
}
