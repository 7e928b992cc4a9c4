/**
 * Scalar property types: booleans, numbers, strings and bytes
 *
 * @module properties/scalar
 */

import { DEFAULT_ENCODING, MAX_INDEXED_LENGTH } from '../constants'
import { ErrorCode, ValidationError } from '../errors'
import type { PropertyFilter } from '../query/filters'
import { checkCompressionLevel, compressStep, encodeStep } from './pipeline'
import { Property, rejectIndexing } from './property'
import type { FieldShape, PropertyOptions } from './property'

/** Options shared by properties that may compress their wire values */
export interface CompressionOptions {
  readonly compressed?: boolean | undefined
  /** zlib level between -1 (library default) and 9 */
  readonly compressionLevel?: number | undefined
}

export interface EncodingOptions {
  /** Transcode strings to bytes with this encoding before storing */
  readonly encoding?: BufferEncoding | undefined
}

// =============================================================================
// Bool
// =============================================================================

export class BoolProperty<S extends FieldShape = FieldShape> extends Property<boolean, S> {
  readonly typeName = 'Bool'

  protected validateElement(value: unknown): boolean {
    if (typeof value !== 'boolean') throw this.typeError(value)
    return value
  }

  /** A filter matching entities where this value is true */
  get isTrue(): PropertyFilter {
    return this.eq(true)
  }

  /** A filter matching entities where this value is false */
  get isFalse(): PropertyFilter {
    return this.eq(false)
  }
}

// =============================================================================
// Numbers
// =============================================================================

export class IntegerProperty<S extends FieldShape = FieldShape> extends Property<number, S> {
  readonly typeName = 'Integer'

  protected validateElement(value: unknown): number {
    if (typeof value !== 'number') throw this.typeError(value)
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`Integer properties cannot hold ${value}.`, ErrorCode.INVALID_VALUE, {
        property: this.nameOnModel,
      })
    }
    return value
  }
}

export class FloatProperty<S extends FieldShape = FieldShape> extends Property<number, S> {
  readonly typeName = 'Float'

  protected validateElement(value: unknown): number {
    if (typeof value !== 'number') throw this.typeError(value)
    return value
  }
}

// =============================================================================
// Strings
// =============================================================================

export type StringOptions = PropertyOptions<string> & EncodingOptions

/**
 * Indexable strings. Indexed values are limited to 1500 bytes once encoded.
 */
export class StringProperty<S extends FieldShape = FieldShape> extends Property<string, S> {
  readonly typeName = 'String'
  readonly encoding: BufferEncoding | null

  constructor(options: StringOptions = {}) {
    super(options)
    this.encoding = options.encoding ?? null
    if (this.encoding !== null) {
      this.steps.push(encodeStep(this.encoding))
    }
  }

  protected validateElement(value: unknown): string {
    if (typeof value !== 'string') throw this.typeError(value)
    if (this.indexed && Buffer.byteLength(value, this.encoding ?? DEFAULT_ENCODING) > MAX_INDEXED_LENGTH) {
      throw new ValidationError(
        `String value is longer than the maximum allowed length (${MAX_INDEXED_LENGTH}) for indexed properties. ` +
          'Set indexed to false if the value should not be indexed.',
        ErrorCode.VALUE_TOO_LONG,
        { property: this.nameOnModel }
      )
    }
    return value
  }
}

export type TextOptions = PropertyOptions<string> & EncodingOptions & CompressionOptions

/**
 * Long strings that are never indexed
 */
export class TextProperty<S extends FieldShape = FieldShape> extends Property<string, S> {
  readonly typeName = 'Text'
  readonly encoding: BufferEncoding | null
  readonly compressed: boolean

  constructor(options: TextOptions = {}) {
    rejectIndexing('Text', options)
    const level = checkCompressionLevel(options.compressionLevel ?? -1)
    super(options)

    this.compressed = options.compressed ?? false
    // compressed text must become bytes first
    this.encoding = options.encoding ?? (this.compressed ? DEFAULT_ENCODING : null)
    if (this.encoding !== null) this.steps.push(encodeStep(this.encoding))
    if (this.compressed) this.steps.push(compressStep(level))
  }

  protected validateElement(value: unknown): string {
    if (typeof value !== 'string') throw this.typeError(value)
    return value
  }
}

// =============================================================================
// Bytes
// =============================================================================

export type BytesOptions = PropertyOptions<Uint8Array> & CompressionOptions

export class BytesProperty<S extends FieldShape = FieldShape> extends Property<Uint8Array, S> {
  readonly typeName = 'Bytes'
  readonly compressed: boolean

  constructor(options: BytesOptions = {}) {
    rejectIndexing('Bytes', options)
    const level = checkCompressionLevel(options.compressionLevel ?? -1)
    super(options)

    this.compressed = options.compressed ?? false
    if (this.compressed) this.steps.push(compressStep(level))
  }

  protected validateElement(value: unknown): Uint8Array {
    if (!(value instanceof Uint8Array)) throw this.typeError(value)
    return value
  }
}
