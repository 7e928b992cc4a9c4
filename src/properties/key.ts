/**
 * Key properties
 *
 * @module properties/key
 */

import { ErrorCode, ValidationError } from '../errors'
import { Key } from '../key'
import type { KindLike } from '../key'
import { Model } from '../model/model'
import { Property } from './property'
import type { FieldShape, PropertyOptions } from './property'

export interface KeyOptions extends PropertyOptions<Key> {
  /** Only accept keys of this kind */
  readonly kind?: KindLike | undefined
}

/**
 * A reference to another entity. Entities assigned to the property are
 * stored as their key.
 */
export class KeyProperty<S extends FieldShape = FieldShape> extends Property<Key, S> {
  readonly typeName = 'Key'
  readonly kind: string | null

  constructor(options: KeyOptions = {}) {
    super(options)
    const { kind } = options
    this.kind = kind === undefined ? null : typeof kind === 'string' ? kind : kind.kind
  }

  protected validateElement(value: unknown): Key {
    const key = value instanceof Model ? value.key : value
    if (!(key instanceof Key)) throw this.typeError(value)

    if (key.isPartial) {
      throw new ValidationError('Cannot assign partial Keys to Key properties.', ErrorCode.PARTIAL_KEY, {
        property: this.nameOnModel,
        kind: key.kind,
      })
    }

    if (this.kind !== null && this.kind !== key.kind) {
      throw new ValidationError(`Property ${this.nameOnModel} cannot be assigned keys of kind ${key.kind}.`, ErrorCode.KIND_MISMATCH, {
        property: this.nameOnModel,
        kind: key.kind,
      })
    }
    return key
  }
}
