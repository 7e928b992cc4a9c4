/**
 * Cache client contract
 *
 * The subset of memcached semantics the cache adapter relies on. Values
 * are opaque bytes; expiry is in seconds.
 *
 * @module cache/types
 */

/** A cached value with the token needed to replace it with `cas` */
export interface CasEntry {
  readonly value: Uint8Array
  readonly token: number
}

export interface CacheClient {
  /** Values of the keys present in the cache */
  getMulti(keys: readonly string[]): Promise<Map<string, Uint8Array>>

  /** Unconditionally store every entry */
  setMulti(entries: ReadonlyMap<string, Uint8Array>, ttlSeconds: number): Promise<void>

  /** Value and compare token of a key, or null when absent */
  gets(key: string): Promise<CasEntry | null>

  /**
   * Store a value only if the key is absent.
   *
   * @returns false if the key was present
   */
  add(key: string, value: Uint8Array, ttlSeconds: number): Promise<boolean>

  /**
   * Store a value only if the key still holds the value `token` was issued
   * for.
   *
   * @returns false if the key changed or vanished since `gets`
   */
  cas(key: string, value: Uint8Array, token: number, ttlSeconds: number): Promise<boolean>

  deleteMulti(keys: readonly string[]): Promise<void>
}
