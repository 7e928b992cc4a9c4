/**
 * Random tokens
 *
 * @module utils/random
 */

import { randomBytes } from 'node:crypto'

/**
 * A random hex token of `length` bytes, e.g. to tag a lock with its owner
 */
export function getRandomToken(length: number): string {
  return randomBytes(length).toString('hex')
}
