/**
 * Test Helpers Module
 *
 * @example
 * ```typescript
 * import { createMemoryAdapter, createCachedStore } from '../helpers'
 * ```
 */

export { createCachedStore, createMemoryAdapter, type CachedStore } from './adapters'
export { rejection, thrown } from './errors'
