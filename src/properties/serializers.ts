/**
 * Serialized properties: Json and Msgpack
 *
 * Both accept JSON-like values (null, booleans, numbers, strings, arrays
 * and plain objects) plus byte arrays, dates, keys and entities, at any
 * depth. Entities are stored together with their key and registered kind
 * so they load back into the right class.
 *
 * @module properties/serializers
 */

import { ExtData, ExtensionCodec, decode, encode } from '@msgpack/msgpack'
import { ErrorCode, SerializationError, ValidationError } from '../errors'
import { Key } from '../key'
import type { KeyJSON } from '../key'
import { Model, schemaOfEntity } from '../model/model'
import type { EntityData } from '../model/state'
import { lookupModelByKind } from '../model/registry'
import { decodeBase64, encodeBase64 } from '../utils/base64'
import { isPlainObject } from '../utils/comparison'
import { bytesToText, checkCompressionLevel, compressStep } from './pipeline'
import type { WireStep } from './pipeline'
import { Property, describeType, rejectIndexing } from './property'
import type { FieldShape, PropertyOptions } from './property'
import type { CompressionOptions } from './scalar'

// =============================================================================
// Shared
// =============================================================================

/**
 * An entity as embedded in serialized data
 */
interface EntityRecord {
  key: Key
  /** Registered kind of the entity's class */
  kind: string
  data: EntityData
}

function toRecord(entity: Model): EntityRecord {
  return {
    key: entity.key,
    kind: schemaOfEntity(entity).kinds[0],
    data: Object.fromEntries(entity.toEntries()),
  }
}

function fromRecord(record: unknown): Model {
  if (!isPlainObject(record) || !(record.key instanceof Key) || typeof record.kind !== 'string' || !isPlainObject(record.data)) {
    throw new SerializationError('Invalid serialized entity.')
  }
  return lookupModelByKind(record.kind).load(record.key, record.data)
}

/**
 * Check that `value` can be serialized.
 *
 * @throws ValidationError naming the first unsupported value
 */
export function checkSerializable(value: unknown): void {
  if (
    value === null ||
    typeof value === 'boolean' ||
    typeof value === 'number' ||
    typeof value === 'string' ||
    value instanceof Uint8Array ||
    value instanceof Date ||
    value instanceof Key ||
    value instanceof Model
  ) {
    return
  }

  if (Array.isArray(value)) {
    value.forEach(checkSerializable)
    return
  }

  if (isPlainObject(value)) {
    Object.values(value).forEach(checkSerializable)
    return
  }

  throw new ValidationError(`Value of type ${describeType(value)} cannot be serialized.`, ErrorCode.INVALID_TYPE, {
    actualType: describeType(value),
  })
}

export type SerializerOptions = PropertyOptions<unknown> & CompressionOptions

/**
 * Base class of properties that store values in a serialized form
 */
abstract class SerializerProperty<S extends FieldShape = FieldShape> extends Property<unknown, S> {
  readonly compressed: boolean

  constructor(typeName: string, options: SerializerOptions, step: WireStep) {
    rejectIndexing(typeName, options)
    const level = checkCompressionLevel(options.compressionLevel ?? -1)
    super(options)

    this.compressed = options.compressed ?? false
    this.steps.push(step)
    if (this.compressed) this.steps.push(compressStep(level))
  }

  protected validateElement(value: unknown): unknown {
    checkSerializable(value)
    return value
  }
}

// =============================================================================
// Json
// =============================================================================

/** Field tagging non-JSON values inside JSON documents */
export const JSON_TYPE_FIELD = '$type'

/**
 * JSON.stringify replacer. Reads the raw value from the holder, since
 * dates and keys are already converted by their own toJSON otherwise.
 */
function replacer(this: Record<string, unknown>, name: string, value: unknown): unknown {
  const raw = this[name]
  if (raw instanceof Uint8Array) return { [JSON_TYPE_FIELD]: 'blob', value: encodeBase64(raw) }
  if (raw instanceof Date) return { [JSON_TYPE_FIELD]: 'datetime', value: raw.toISOString() }
  if (raw instanceof Key) return { [JSON_TYPE_FIELD]: 'key', value: raw.toJSON() }
  if (raw instanceof Model) return { [JSON_TYPE_FIELD]: 'model', value: toRecord(raw) }
  return value
}

function isKeyJSON(value: unknown): value is KeyJSON {
  return (
    isPlainObject(value) &&
    typeof value.namespace === 'string' &&
    Array.isArray(value.path) &&
    value.path.every(segment => typeof segment === 'string' || typeof segment === 'number')
  )
}

function reviver(_name: string, value: unknown): unknown {
  if (!isPlainObject(value) || !(JSON_TYPE_FIELD in value)) return value

  const tag = value[JSON_TYPE_FIELD]
  const inner = value.value
  switch (tag) {
    case 'blob':
      if (typeof inner === 'string') return decodeBase64(inner)
      break
    case 'datetime':
      if (typeof inner === 'string') return new Date(inner)
      break
    case 'key':
      if (isKeyJSON(inner)) return Key.fromJSON(inner)
      break
    case 'model':
      return fromRecord(inner)
    default:
      throw new SerializationError(`Invalid type tag ${JSON.stringify(tag)}.`, { tag })
  }
  throw new SerializationError(`Invalid ${String(tag)} value.`, { tag })
}

/**
 * Serialize a value to a JSON document
 */
export function dumpJson(value: unknown): string {
  checkSerializable(value)
  return JSON.stringify(value, replacer)
}

/**
 * Parse a JSON document written by `dumpJson`
 *
 * @throws SerializationError for malformed documents or unknown type tags
 */
export function loadJson(text: string): unknown {
  try {
    return JSON.parse(text, reviver)
  } catch (error) {
    if (error instanceof SerializationError) throw error
    throw new SerializationError('Invalid JSON data.', {}, error instanceof Error ? error : undefined)
  }
}

const jsonStep: WireStep = {
  name: 'serialize',
  elementwise: true,
  store: dumpJson,
  load: value => {
    const text = bytesToText(value)
    return typeof text === 'string' ? loadJson(text) : text
  },
}

/**
 * A property for values stored as JSON text
 */
export class JsonProperty<S extends FieldShape = FieldShape> extends SerializerProperty<S> {
  readonly typeName = 'Json'

  constructor(options: SerializerOptions = {}) {
    super('Json', options, jsonStep)
  }
}

// =============================================================================
// Msgpack
// =============================================================================

/** Msgpack extension types */
export enum MsgpackExtension {
  Model = 0,
  Key = 1,
}

export const extensionCodec = new ExtensionCodec()

extensionCodec.register({
  type: MsgpackExtension.Model,
  encode: (input: unknown) => (input instanceof Model ? encode(toRecord(input), { extensionCodec }) : null),
  decode: (data: Uint8Array) => fromRecord(decode(data, { extensionCodec })),
})

extensionCodec.register({
  type: MsgpackExtension.Key,
  encode: (input: unknown) => (input instanceof Key ? encode(input.toJSON()) : null),
  decode: (data: Uint8Array) => {
    const json = decode(data)
    if (!isKeyJSON(json)) throw new SerializationError('Invalid serialized key.')
    return Key.fromJSON(json)
  },
})

function rejectUnknownExtensions(value: unknown): void {
  if (value instanceof ExtData) {
    throw new SerializationError(`Invalid extension code ${value.type}.`, { extension: value.type })
  }
  if (Array.isArray(value)) {
    value.forEach(rejectUnknownExtensions)
  } else if (isPlainObject(value)) {
    Object.values(value).forEach(rejectUnknownExtensions)
  }
}

/**
 * Serialize a value to msgpack
 */
export function dumpMsgpack(value: unknown): Uint8Array {
  checkSerializable(value)
  return encode(value, { extensionCodec })
}

/**
 * Decode msgpack written by `dumpMsgpack`
 *
 * @throws SerializationError for malformed data or unknown extensions
 */
export function loadMsgpack(data: Uint8Array): unknown {
  let value: unknown
  try {
    value = decode(data, { extensionCodec })
  } catch (error) {
    if (error instanceof SerializationError) throw error
    throw new SerializationError('Invalid msgpack data.', {}, error instanceof Error ? error : undefined)
  }

  rejectUnknownExtensions(value)
  return value
}

const msgpackStep: WireStep = {
  name: 'serialize',
  elementwise: true,
  store: dumpMsgpack,
  load: value => (value instanceof Uint8Array ? loadMsgpack(value) : value),
}

/**
 * A property for values stored as msgpack bytes
 */
export class MsgpackProperty<S extends FieldShape = FieldShape> extends SerializerProperty<S> {
  readonly typeName = 'Msgpack'

  constructor(options: SerializerOptions = {}) {
    super('Msgpack', options, msgpackStep)
  }
}
