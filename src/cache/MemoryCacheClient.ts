/**
 * MemoryCacheClient - in-process implementation of CacheClient
 *
 * Entries expire after their ttl. Every write issues a new, strictly
 * increasing compare token.
 *
 * @module cache/MemoryCacheClient
 */

import type { CacheClient, CasEntry } from './types'

interface StoredEntry {
  value: Uint8Array
  token: number
  /** Epoch milliseconds */
  expiresAt: number
}

export interface MemoryCacheClientOptions {
  /** Clock in epoch milliseconds; defaults to Date.now */
  now?: (() => number) | undefined
}

/**
 * Cache statistics
 */
export interface MemoryCacheStats {
  hits: number
  misses: number
  size: number
}

export class MemoryCacheClient implements CacheClient {
  private entries = new Map<string, StoredEntry>()
  private lastToken = 0
  private hits = 0
  private misses = 0
  private readonly now: () => number

  constructor(options: MemoryCacheClientOptions = {}) {
    this.now = options.now ?? Date.now
  }

  private lookup(key: string): StoredEntry | undefined {
    const entry = this.entries.get(key)
    if (entry && this.now() >= entry.expiresAt) {
      this.entries.delete(key)
      return undefined
    }
    return entry
  }

  private store(key: string, value: Uint8Array, ttlSeconds: number): void {
    this.entries.set(key, {
      value: new Uint8Array(value),
      token: ++this.lastToken,
      expiresAt: this.now() + ttlSeconds * 1000,
    })
  }

  async getMulti(keys: readonly string[]): Promise<Map<string, Uint8Array>> {
    const found = new Map<string, Uint8Array>()
    for (const key of keys) {
      const entry = this.lookup(key)
      if (entry) {
        this.hits++
        found.set(key, new Uint8Array(entry.value))
      } else {
        this.misses++
      }
    }
    return found
  }

  async setMulti(entries: ReadonlyMap<string, Uint8Array>, ttlSeconds: number): Promise<void> {
    for (const [key, value] of entries) {
      this.store(key, value, ttlSeconds)
    }
  }

  async gets(key: string): Promise<CasEntry | null> {
    const entry = this.lookup(key)
    return entry ? { value: new Uint8Array(entry.value), token: entry.token } : null
  }

  async add(key: string, value: Uint8Array, ttlSeconds: number): Promise<boolean> {
    if (this.lookup(key)) return false
    this.store(key, value, ttlSeconds)
    return true
  }

  async cas(key: string, value: Uint8Array, token: number, ttlSeconds: number): Promise<boolean> {
    const entry = this.lookup(key)
    if (!entry || entry.token !== token) return false
    this.store(key, value, ttlSeconds)
    return true
  }

  async deleteMulti(keys: readonly string[]): Promise<void> {
    for (const key of keys) {
      this.entries.delete(key)
    }
  }

  /**
   * Whether a live entry exists for `key`
   */
  has(key: string): boolean {
    return this.lookup(key) !== undefined
  }

  get stats(): MemoryCacheStats {
    return { hits: this.hits, misses: this.misses, size: this.entries.size }
  }

  /**
   * Drop every entry
   */
  clear(): void {
    this.entries.clear()
  }
}
