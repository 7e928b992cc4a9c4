/**
 * Batch operations
 *
 * `getMulti`, `putMulti` and `deleteMulti` are the only entry points that
 * talk to storage by key. Every key or entity in one call must resolve to
 * the same adapter; results line up with the input.
 *
 * @module batch
 */

import type { Adapter, PutRequest } from './adapters/Adapter'
import { ErrorCode, LookupError } from './errors'
import type { Key } from './key'
import { schemaOfEntity } from './model/model'
import type { Model, ModelHooks, ModelType } from './model/model'
import { lookupModelByKind } from './model/registry'
import { logger } from './utils/logger'

/**
 * Resolve the single adapter shared by a batch
 *
 * @throws LookupError if the models use different adapters
 */
function resolveAdapter(models: readonly ModelType[]): Adapter {
  const adapter = models[0].adapter
  for (const model of models) {
    if (model.adapter !== adapter) {
      throw new LookupError(
        `Models ${models[0].modelName} and ${model.modelName} use different adapters.`,
        ErrorCode.ADAPTER_MISMATCH,
        { kinds: [models[0].kind, model.kind] }
      )
    }
  }
  return adapter
}

function requireComplete(key: Key): void {
  if (key.isPartial) {
    throw new LookupError(`Key ${key.toString()} is partial.`, ErrorCode.PARTIAL_KEY, { kind: key.kind })
  }
}

/**
 * Get entities by key. Entities that don't exist map to null.
 *
 * @throws LookupError for partial keys, unknown kinds or mixed adapters
 */
export async function getMulti(keys: readonly Key[]): Promise<Array<Model | null>> {
  if (keys.length === 0) return []

  const models = keys.map(key => {
    requireComplete(key)
    return lookupModelByKind(key.kind)
  })
  const adapter = resolveAdapter(models)

  for (let i = 0; i < keys.length; i++) {
    await models[i].schema.hooks.preGet?.(keys[i])
  }

  logger.debug(`getMulti: ${keys.length} keys`)
  const results = await adapter.getMulti(keys)

  const entities: Array<Model | null> = []
  for (let i = 0; i < keys.length; i++) {
    const data = results[i]
    if (data === null || data === undefined) {
      entities.push(null)
      continue
    }

    const entity = models[i].load(keys[i], data)
    entities.push(entity)
    await lookupHooks(entity).postGet?.(entity)
  }
  return entities
}

/**
 * Persist entities. Each entity's key is replaced by the complete key the
 * adapter assigned.
 *
 * @throws MissingValueError if a required property has no value
 */
export async function putMulti<E extends Model>(entities: readonly E[]): Promise<E[]> {
  if (entities.length === 0) return []

  const adapter = resolveAdapter(entities.map(entity => lookupModelByKind(entity.key.kind)))

  const requests: PutRequest[] = []
  for (const entity of entities) {
    await lookupHooks(entity).prePut?.(entity)
    // entries first: storing may stamp values the index conditions look at
    const entries = entity.toEntries()
    requests.push({ key: entity.key, unindexed: entity.unindexedProperties, entries })
  }

  logger.debug(`putMulti: ${entities.length} entities`)
  const keys = await adapter.putMulti(requests)

  for (let i = 0; i < entities.length; i++) {
    entities[i].key = keys[i]
    await lookupHooks(entities[i]).postPut?.(entities[i])
  }
  return [...entities]
}

/**
 * Delete entities by key.
 *
 * @throws LookupError for partial keys, unknown kinds or mixed adapters
 */
export async function deleteMulti(keys: readonly Key[]): Promise<void> {
  if (keys.length === 0) return

  const models = keys.map(key => {
    requireComplete(key)
    return lookupModelByKind(key.kind)
  })
  const adapter = resolveAdapter(models)

  for (let i = 0; i < keys.length; i++) {
    await models[i].schema.hooks.preDelete?.(keys[i])
  }

  logger.debug(`deleteMulti: ${keys.length} keys`)
  await adapter.deleteMulti(keys)

  for (let i = 0; i < keys.length; i++) {
    await models[i].schema.hooks.postDelete?.(keys[i])
  }
}

/**
 * Hooks of an entity's own class, which may be a subclass of the model
 * registered for its kind
 */
function lookupHooks(entity: Model): ModelHooks {
  return schemaOfEntity(entity).hooks
}
