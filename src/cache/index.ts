/**
 * Cache clients
 *
 * @module cache
 */

export type { CacheClient, CasEntry } from './types'
export { MemoryCacheClient } from './MemoryCacheClient'
export type { MemoryCacheClientOptions, MemoryCacheStats } from './MemoryCacheClient'
