/**
 * Property factories
 *
 * Each factory infers the value type a property exposes on entities from
 * its options: `repeated: true` gives `T[]`, `optional: true` gives
 * `T | null`, anything else `T`.
 *
 * @example
 * ```typescript
 * const Person = model('Person', {
 *   email: props.string({ indexed: true }),
 *   nickname: props.string({ optional: true }),   // string | null
 *   tags: props.string({ repeated: true }),       // string[]
 *   createdAt: props.dateTime({ autoNowAdd: true }),
 * })
 * ```
 *
 * @module properties
 */

import type { Entity, Model, ModelClass, ModelType } from '../model/model'
import { ComputedProperty } from './computed'
import type { ComputedOptions, ComputedShapeOf } from './computed'
import { DateTimeProperty } from './datetime'
import type { DateTimeOptions } from './datetime'
import { EmbedProperty } from './embed'
import { KeyProperty } from './key'
import type { KeyOptions } from './key'
import type { PropertyOptions, ShapeOf, ShapeOptions } from './property'
import { BoolProperty, BytesProperty, FloatProperty, IntegerProperty, StringProperty, TextProperty } from './scalar'
import type { BytesOptions, StringOptions, TextOptions } from './scalar'
import { JsonProperty, MsgpackProperty } from './serializers'
import type { SerializerOptions } from './serializers'

export { Property, Skip, describeType } from './property'
export type { AnyProperty, FieldShape, FieldValue, IndexPredicate, PropertyOptions, ShapeOf, ShapeOptions } from './property'
export { BoolProperty, BytesProperty, FloatProperty, IntegerProperty, StringProperty, TextProperty } from './scalar'
export type { BytesOptions, CompressionOptions, EncodingOptions, StringOptions, TextOptions } from './scalar'
export { DateTimeProperty } from './datetime'
export type { DateTimeOptions } from './datetime'
export { KeyProperty } from './key'
export type { KeyOptions } from './key'
export { ComputedProperty } from './computed'
export type { ComputedOptions, ComputedShapeOf } from './computed'
export { EmbedProperty } from './embed'
export type { EmbedOptions } from './embed'
export {
  JsonProperty,
  MsgpackProperty,
  JSON_TYPE_FIELD,
  MsgpackExtension,
  checkSerializable,
  dumpJson,
  dumpMsgpack,
  extensionCodec,
  loadJson,
  loadMsgpack,
} from './serializers'
export type { SerializerOptions } from './serializers'
export type { CompressionLevel, WireStep } from './pipeline'

// =============================================================================
// Factories
// =============================================================================

function bool<const O extends PropertyOptions<boolean> = {}>(options?: O): BoolProperty<ShapeOf<O>> {
  return new BoolProperty<ShapeOf<O>>(options)
}

function integer<const O extends PropertyOptions<number> = {}>(options?: O): IntegerProperty<ShapeOf<O>> {
  return new IntegerProperty<ShapeOf<O>>(options)
}

function float<const O extends PropertyOptions<number> = {}>(options?: O): FloatProperty<ShapeOf<O>> {
  return new FloatProperty<ShapeOf<O>>(options)
}

function string<const O extends StringOptions = {}>(options?: O): StringProperty<ShapeOf<O>> {
  return new StringProperty<ShapeOf<O>>(options)
}

/** Unindexed, optionally compressed strings */
function text<const O extends TextOptions = {}>(options?: O): TextProperty<ShapeOf<O>> {
  return new TextProperty<ShapeOf<O>>(options)
}

/** Unindexed, optionally compressed byte arrays */
function bytes<const O extends BytesOptions = {}>(options?: O): BytesProperty<ShapeOf<O>> {
  return new BytesProperty<ShapeOf<O>>(options)
}

function dateTime<const O extends DateTimeOptions = {}>(options?: O): DateTimeProperty<ShapeOf<O>> {
  return new DateTimeProperty<ShapeOf<O>>(options)
}

function key<const O extends KeyOptions = {}>(options?: O): KeyProperty<ShapeOf<O>> {
  return new KeyProperty<ShapeOf<O>>(options)
}

function json<const O extends SerializerOptions = {}>(options?: O): JsonProperty<ShapeOf<O>> {
  return new JsonProperty<ShapeOf<O>>(options)
}

function msgpack<const O extends SerializerOptions = {}>(options?: O): MsgpackProperty<ShapeOf<O>> {
  return new MsgpackProperty<ShapeOf<O>>(options)
}

/**
 * A value derived from the entity; indexed and optional by default
 */
function computed<T, E extends Model = Model, const O extends ComputedOptions = {}>(
  fn: (entity: E) => T,
  options?: O
): ComputedProperty<T, ComputedShapeOf<O>, E> {
  return new ComputedProperty<T, ComputedShapeOf<O>, E>(fn, options)
}

/**
 * Entities of another model stored inside this one
 */
function embed<P, const O extends ShapeOptions = {}>(
  options: { readonly kind: ModelClass<P> } & O
): EmbedProperty<Entity<P>, ShapeOf<O>>
function embed<const O extends ShapeOptions = {}>(
  options: { readonly kind: ModelType | string } & O
): EmbedProperty<Model, ShapeOf<O>>
function embed(options: { readonly kind: ModelType | string } & ShapeOptions): EmbedProperty {
  return new EmbedProperty(options)
}

export const props = {
  bool,
  integer,
  float,
  string,
  text,
  bytes,
  dateTime,
  key,
  json,
  msgpack,
  computed,
  embed,
} as const
