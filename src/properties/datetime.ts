/**
 * DateTime properties
 *
 * @module properties/datetime
 */

import { ConfigurationError, ErrorCode, ValidationError } from '../errors'
import type { Model } from '../model/model'
import { ENTITY_DATA } from '../model/state'
import { Property } from './property'
import type { FieldShape, PropertyOptions } from './property'

export interface DateTimeOptions extends PropertyOptions<Date> {
  /** Set the value to the current time when first stored without one */
  readonly autoNowAdd?: boolean | undefined
  /** Set the value to the current time every time it is stored */
  readonly autoNow?: boolean | undefined
}

/**
 * Microseconds since the epoch, as some stores return projected datetimes
 */
function fromWire(value: unknown): unknown {
  return typeof value === 'number' ? new Date(Math.floor(value / 1000)) : value
}

export class DateTimeProperty<S extends FieldShape = FieldShape> extends Property<Date, S> {
  readonly typeName = 'DateTime'
  readonly autoNowAdd: boolean
  readonly autoNow: boolean

  constructor(options: DateTimeOptions = {}) {
    if (options.repeated && (options.autoNow || options.autoNowAdd)) {
      throw new ConfigurationError('Cannot use autoNow or autoNowAdd with repeated properties.', ErrorCode.INVALID_OPTION, {
        property: options.name,
      })
    }

    super(options)
    this.autoNowAdd = options.autoNowAdd ?? false
    this.autoNow = options.autoNow ?? false
  }

  protected validateElement(value: unknown): Date {
    if (!(value instanceof Date)) throw this.typeError(value)
    if (Number.isNaN(value.getTime())) {
      throw new ValidationError('Invalid Date assigned to DateTime property.', ErrorCode.INVALID_VALUE, {
        property: this.nameOnModel,
      })
    }
    return value
  }

  /**
   * Stamps the current time onto the entity when auto-now applies
   */
  override prepareToStore(entity: Model, value: unknown): unknown {
    let current = value
    if ((this.autoNowAdd && (current === null || current === undefined)) || this.autoNow) {
      current = new Date()
      entity[ENTITY_DATA].set(this.nameOnEntity, current)
    }
    return super.prepareToStore(entity, current)
  }

  override prepareToLoad(entity: Model, value: unknown): unknown {
    const loaded = Array.isArray(value) ? value.map(fromWire) : fromWire(value)
    return super.prepareToLoad(entity, loaded)
  }
}
