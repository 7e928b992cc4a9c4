/**
 * Model registry
 *
 * Maps registry names to model classes so that keys and stored hierarchies
 * can be resolved back to the class that loads them. Registration runs to
 * completion synchronously, so no two registrations ever interleave.
 *
 * @module model/registry
 */

import { ErrorCode, LookupError, RegistryError } from '../errors'
import { logger } from '../utils/logger'
import type { ModelType } from './model'

const knownModels = new Map<string, ModelType>()

/**
 * Register a model class under `name`.
 *
 * Plain models and polymorphic roots own their name exclusively; children of
 * a polymorphic hierarchy may replace an earlier registration of the same
 * name (redefining a leaf class).
 *
 * @throws RegistryError if the name is already taken by a non-child model
 */
export function registerModel(name: string, model: ModelType): void {
  if (knownModels.has(name) && !model.schema.isChild) {
    throw new RegistryError(name)
  }

  knownModels.set(name, model)
  logger.debug(`Registered model ${name} (kind ${model.kind})`)
}

/**
 * Look up the model class for a kind or registry name.
 *
 * @throws LookupError if no model has been registered under that name
 */
export function lookupModelByKind(kind: string): ModelType {
  const model = knownModels.get(kind)
  if (model === undefined) {
    throw new LookupError(`Model for kind ${JSON.stringify(kind)} not found.`, ErrorCode.MODEL_NOT_FOUND, { kind })
  }
  return model
}

/**
 * True if a model is registered under `kind`
 */
export function hasModel(kind: string): boolean {
  return knownModels.has(kind)
}

/**
 * Remove a registration. Intended for tests that redefine models.
 */
export function unregisterModel(kind: string): boolean {
  return knownModels.delete(kind)
}
