/**
 * Base64 encoding utilities
 *
 * Used for query cursors and for byte values inside JSON documents.
 *
 * @module utils/base64
 */

import { SerializationError } from '../errors'

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

/**
 * Encode bytes as standard (padded) base64
 */
export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('base64')
}

/**
 * Decode standard base64.
 *
 * @throws SerializationError if the input is not base64
 */
export function decodeBase64(base64: string): Uint8Array {
  if (base64.length % 4 !== 0 || !BASE64_PATTERN.test(base64)) {
    throw new SerializationError('Invalid base64 data.', { length: base64.length })
  }
  return new Uint8Array(Buffer.from(base64, 'base64'))
}

/**
 * Encode a UTF-8 string to base64
 */
export function stringToBase64(str: string): string {
  return Buffer.from(str, 'utf8').toString('base64')
}

/**
 * Decode base64 to a UTF-8 string
 *
 * @throws SerializationError if the input is not base64
 */
export function base64ToString(base64: string): string {
  return Buffer.from(decodeBase64(base64)).toString('utf8')
}
