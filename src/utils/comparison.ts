/**
 * Shared Comparison and Value Utilities for kindling
 *
 * Canonical implementations of value comparison, equality checking and
 * cloning for property values (primitives, dates, byte arrays, keys,
 * entities, and JSON-like structures).
 */

import { Key } from '../key'

// =============================================================================
// Deep Equality
// =============================================================================

interface Equatable {
  equals(other: unknown): boolean
}

function isEquatable(value: unknown): value is Equatable {
  return typeof value === 'object' && value !== null && 'equals' in value && typeof value.equals === 'function'
}

/**
 * Check if a value is a plain object (not a class instance)
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false
  const proto: unknown = Object.getPrototypeOf(value)
  return proto === Object.prototype || proto === null
}

/**
 * Byte-wise equality of two byte arrays
 */
export function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false
  }
  return true
}

/**
 * Deep equality check for two property values
 *
 * Handles:
 * - Primitives (strict equality)
 * - null/undefined (treated as equal)
 * - Dates (compared by timestamp)
 * - Byte arrays (compared byte-wise)
 * - Keys and entities (compared through their `equals` method)
 * - Arrays (element-wise comparison)
 * - Plain objects (key-value comparison)
 *
 * @example
 * deepEqual({ a: 1 }, { a: 1 }) // true
 * deepEqual(new Uint8Array([1]), new Uint8Array([1])) // true
 * deepEqual(new Key('Person', 1), new Key('Person', 1)) // true
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true
  if (a === null || a === undefined) return b === null || b === undefined
  if (b === null || b === undefined) return false

  if (a instanceof Date && b instanceof Date) {
    return a.getTime() === b.getTime()
  }

  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    return bytesEqual(a, b)
  }

  if (isEquatable(a)) {
    return a.equals(b)
  }

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((v, i) => deepEqual(v, b[i]))
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const aKeys = Object.keys(a)
    const bKeys = Object.keys(b)
    if (aKeys.length !== bKeys.length) return false
    return aKeys.every(k => Object.prototype.hasOwnProperty.call(b, k) && deepEqual(a[k], b[k]))
  }

  return false
}

// =============================================================================
// Value Comparison for Ordering
// =============================================================================

/**
 * Rank of a value's type in the store's cross-type ordering
 */
function typeRank(value: unknown): number {
  if (value === null || value === undefined) return 0
  if (typeof value === 'number') return 1
  if (value instanceof Date) return 2
  if (typeof value === 'boolean') return 3
  if (typeof value === 'string') return 4
  if (value instanceof Uint8Array) return 5
  if (value instanceof Key) return 6
  return 7
}

/**
 * Order keys by path, segment by segment, then by namespace; ids sort
 * before names and parents before their children
 */
export function compareKeys(a: Key, b: Key): number {
  const left = a.path
  const right = b.path
  const length = Math.min(left.length, right.length)
  for (let i = 0; i < length; i++) {
    const diff = compareValues(left[i], right[i])
    if (diff !== 0) return diff
  }
  if (left.length !== right.length) return Math.sign(left.length - right.length)
  return compareValues(a.namespace, b.namespace)
}

/**
 * Compare two values for ordering
 *
 * Values of different types order by type rank: null, numbers, dates,
 * booleans, strings, bytes, keys, then everything else (compared by
 * string form).
 *
 * @returns negative if a < b, 0 if equal, positive if a > b
 *
 * @example
 * compareValues(1, 2) // -1
 * compareValues('b', 'a') // 1
 * compareValues(null, 1) // -1
 */
export function compareValues(a: unknown, b: unknown): number {
  const rankA = typeRank(a)
  const rankB = typeRank(b)
  if (rankA !== rankB) return rankA - rankB

  if (typeof a === 'number' && typeof b === 'number') {
    return a === b ? 0 : a < b ? -1 : 1
  }
  if (typeof a === 'string' && typeof b === 'string') {
    if (a < b) return -1
    if (a > b) return 1
    return 0
  }
  if (a instanceof Date && b instanceof Date) return Math.sign(a.getTime() - b.getTime())
  if (typeof a === 'boolean' && typeof b === 'boolean') return (a ? 1 : 0) - (b ? 1 : 0)
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    const length = Math.min(a.length, b.length)
    for (let i = 0; i < length; i++) {
      const diff = (a[i] ?? 0) - (b[i] ?? 0)
      if (diff !== 0) return Math.sign(diff)
    }
    return Math.sign(a.length - b.length)
  }
  if (a instanceof Key && b instanceof Key) return compareKeys(a, b)
  if (rankA === 0) return 0

  const left = String(a)
  const right = String(b)
  return left < right ? -1 : left > right ? 1 : 0
}

// =============================================================================
// Deep Clone
// =============================================================================

/**
 * Deep clone a stored value
 *
 * Dates, byte arrays, arrays and plain objects are copied; any other
 * object (keys, entities) is immutable from the store's point of view
 * and is shared.
 */
export function cloneValue<T>(value: T): T
export function cloneValue(value: unknown): unknown {
  if (value instanceof Date) return new Date(value.getTime())
  if (value instanceof Uint8Array) return new Uint8Array(value)
  if (Array.isArray(value)) return value.map(v => cloneValue(v))
  if (isPlainObject(value)) {
    const copy: Record<string, unknown> = {}
    for (const [k, v] of Object.entries(value)) {
      copy[k] = cloneValue(v)
    }
    return copy
  }
  return value
}
