/**
 * Adapter fixtures
 *
 * Each factory installs the adapter it builds as the global default.
 */

import { setAdapter } from '../../src/adapters/Adapter'
import { CacheAdapter } from '../../src/adapters/CacheAdapter'
import type { CacheAdapterOptions } from '../../src/adapters/CacheAdapter'
import { MemoryAdapter } from '../../src/adapters/MemoryAdapter'
import { MemoryCacheClient } from '../../src/cache/MemoryCacheClient'

export interface CachedStore {
  adapter: CacheAdapter
  backing: MemoryAdapter
  client: MemoryCacheClient
}

/**
 * A fresh MemoryAdapter, installed as the global adapter
 */
export function createMemoryAdapter(): MemoryAdapter {
  return setAdapter(new MemoryAdapter())
}

/**
 * A CacheAdapter over a fresh MemoryAdapter and MemoryCacheClient,
 * installed as the global adapter
 */
export function createCachedStore(options: CacheAdapterOptions = { prefix: 'test' }): CachedStore {
  const backing = new MemoryAdapter()
  const client = new MemoryCacheClient()
  const adapter = setAdapter(new CacheAdapter(client, backing, options))
  return { adapter, backing, client }
}
