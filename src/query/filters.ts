/**
 * Property filters and sort orders
 *
 * Filters and orders are built from property descriptors:
 *
 * @example
 * ```typescript
 * Person.properties.email.eq('a@example.com')
 * // PropertyFilter { name: 'email', operator: '=', value: 'a@example.com' }
 *
 * Outer.properties.nested.field('z').ge(10)
 * // PropertyFilter { name: 'child.z', operator: '>=', value: 10 }
 *
 * Person.properties.createdAt.desc
 * // PropertyOrder { name: 'created_at', direction: 'desc' }
 * ```
 */

import { ErrorCode, ValidationError } from '../errors'

/** Supported comparison operators */
export type FilterOperator = '=' | '!=' | '<' | '<=' | '>' | '>='

/** Sort direction */
export type SortDirection = 'asc' | 'desc'

/**
 * An individual filter on a stored field
 */
export class PropertyFilter {
  constructor(
    readonly name: string,
    readonly operator: FilterOperator,
    readonly value: unknown
  ) {
    Object.freeze(this)
  }
}

/**
 * The order of a stored field within a query
 */
export class PropertyOrder {
  constructor(
    readonly name: string,
    readonly direction: SortDirection = 'asc'
  ) {
    Object.freeze(this)
  }

  /**
   * Parse `'name'` or `'-name'` into an order
   */
  static parse(spec: string): PropertyOrder {
    return spec.startsWith('-') ? new PropertyOrder(spec.slice(1), 'desc') : new PropertyOrder(spec, 'asc')
  }

  toString(): string {
    return this.direction === 'desc' ? `-${this.name}` : this.name
  }
}

/**
 * What a field reference needs from the property behind it
 */
export interface FilterTarget {
  readonly indexed: boolean
  readonly optional: boolean
  readonly nameOnEntity: string
  readonly nameOnModel: string
  /** Validate a comparison operand and convert it to its stored form */
  toFilterValue(value: unknown): unknown
  /** Resolve a property of an embedded model */
  nested(name: string): FilterTarget
}

/**
 * A property reference, possibly reached through embedded models, that
 * builds filters and orders against the stored field name.
 */
export class FieldRef {
  constructor(
    readonly target: FilterTarget,
    readonly name: string = target.nameOnEntity,
    readonly label: string = target.nameOnModel
  ) {}

  eq(value: unknown): PropertyFilter {
    return this.build('=', value)
  }

  ne(value: unknown): PropertyFilter {
    return this.build('!=', value)
  }

  lt(value: unknown): PropertyFilter {
    return this.build('<', value)
  }

  le(value: unknown): PropertyFilter {
    return this.build('<=', value)
  }

  gt(value: unknown): PropertyFilter {
    return this.build('>', value)
  }

  ge(value: unknown): PropertyFilter {
    return this.build('>=', value)
  }

  /** A filter matching entities where this value is null */
  get isNone(): PropertyFilter {
    if (!this.target.optional) {
      throw new ValidationError('Required properties cannot be compared against None.', ErrorCode.INVALID_VALUE, {
        property: this.label,
      })
    }
    return this.build('=', null)
  }

  get asc(): PropertyOrder {
    return new PropertyOrder(this.name, 'asc')
  }

  get desc(): PropertyOrder {
    return new PropertyOrder(this.name, 'desc')
  }

  /**
   * Reference a property of the embedded model behind this reference
   */
  field(name: string): FieldRef {
    const inner = this.target.nested(name)
    return new FieldRef(inner, `${this.name}.${inner.nameOnEntity}`, `${this.label}.${inner.nameOnModel}`)
  }

  private build(operator: FilterOperator, value: unknown): PropertyFilter {
    if (!this.target.indexed) {
      throw new ValidationError(`${this.label} is not indexed.`, ErrorCode.NOT_INDEXED, { property: this.label })
    }
    return new PropertyFilter(this.name, operator, this.target.toFilterValue(value))
  }
}
