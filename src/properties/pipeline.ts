/**
 * Wire transformation pipeline
 *
 * Blob-like properties transform values on their way to and from storage
 * through an ordered list of steps: serialize, then encode, then compress.
 * Storing runs the steps in declared order; loading runs them in reverse.
 *
 * @module properties/pipeline
 */

import { strFromU8, strToU8, unzlibSync, zlibSync } from 'fflate'
import type { ZlibOptions } from 'fflate'
import { ConfigurationError, ErrorCode, ValidationError } from '../errors'

/**
 * A single named transformation
 */
export interface WireStep {
  readonly name: 'serialize' | 'encode' | 'compress'
  /** Whether repeated values are transformed one element at a time */
  readonly elementwise: boolean
  store(value: unknown): unknown
  load(value: unknown): unknown
}

/**
 * Run `steps` over a value being stored
 */
export function runStore(steps: readonly WireStep[], value: unknown, repeated: boolean): unknown {
  let result = value
  for (const step of steps) {
    result = applyStep(step, result, repeated, 'store')
  }
  return result
}

/**
 * Run `steps`, last to first, over a value being loaded
 */
export function runLoad(steps: readonly WireStep[], value: unknown, repeated: boolean): unknown {
  let result = value
  for (let i = steps.length - 1; i >= 0; i--) {
    result = applyStep(steps[i], result, repeated, 'load')
  }
  return result
}

function applyStep(step: WireStep, value: unknown, repeated: boolean, direction: 'store' | 'load'): unknown {
  if (repeated && step.elementwise && Array.isArray(value)) {
    return value.map(v => step[direction](v))
  }
  return step[direction](value)
}

// =============================================================================
// Compression
// =============================================================================

/** Valid zlib compression levels; -1 selects the library default */
export type CompressionLevel = -1 | NonNullable<ZlibOptions['level']>

const ZLIB_LEVELS = [0, 1, 2, 3, 4, 5, 6, 7, 8, 9] as const

/**
 * Check a user-supplied compression level.
 *
 * @throws ConfigurationError unless the level is an integer in [-1, 9]
 */
export function checkCompressionLevel(level: number): CompressionLevel {
  if (level === -1) return -1
  const found = ZLIB_LEVELS.find(candidate => candidate === level)
  if (found === undefined) {
    throw new ConfigurationError('compressionLevel must be an integer between -1 and 9.', ErrorCode.INVALID_OPTION, {
      compressionLevel: level,
    })
  }
  return found
}

function toBytes(value: unknown): Uint8Array {
  if (value instanceof Uint8Array) return value
  if (typeof value === 'string') return strToU8(value)
  throw new ValidationError(`Cannot compress a value of type ${typeof value}.`, ErrorCode.INVALID_TYPE)
}

/**
 * zlib compression of byte (or UTF-8 string) values
 */
export function compressStep(level: CompressionLevel): WireStep {
  const options: ZlibOptions = level === -1 ? {} : { level }
  return {
    name: 'compress',
    elementwise: true,
    store: value => zlibSync(toBytes(value), options),
    load: value => (value instanceof Uint8Array ? unzlibSync(value) : value),
  }
}

// =============================================================================
// Encoding
// =============================================================================

/**
 * Transcoding between strings and bytes with a text encoding
 */
export function encodeStep(encoding: BufferEncoding): WireStep {
  return {
    name: 'encode',
    elementwise: true,
    store: value => (typeof value === 'string' ? new Uint8Array(Buffer.from(value, encoding)) : value),
    load: value => {
      if (!(value instanceof Uint8Array)) return value
      return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString(encoding)
    },
  }
}

/**
 * Decode UTF-8 bytes to a string, passing strings through
 */
export function bytesToText(value: unknown): unknown {
  return value instanceof Uint8Array ? strFromU8(value) : value
}
