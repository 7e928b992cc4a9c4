/**
 * Namespace selection
 *
 * A process-wide default namespace plus an async-context scoped override.
 * New keys and queries use the current namespace unless given one.
 *
 * @module namespaces
 */

import { AsyncLocalStorage } from 'node:async_hooks'

let defaultNamespace = ''

const scopedNamespace = new AsyncLocalStorage<string>()

/**
 * Set the process-wide default namespace.
 *
 * @returns the namespace now in effect ("" when cleared)
 */
export function setDefaultNamespace(namespace?: string | null): string {
  defaultNamespace = namespace ?? ''
  return defaultNamespace
}

/**
 * The namespace for the current async context
 */
export function getNamespace(): string {
  return scopedNamespace.getStore() ?? defaultNamespace
}

/**
 * Run `fn` with `namespace` as the current namespace. Scopes stack:
 * leaving a scope restores whatever namespace was current before it.
 *
 * @example
 * ```typescript
 * await withNamespace('tenant-a', async () => {
 *   await withNamespace('tenant-b', async () => {
 *     getNamespace() // 'tenant-b'
 *   })
 *   getNamespace() // 'tenant-a'
 * })
 * ```
 */
export function withNamespace<T>(namespace: string, fn: () => T): T {
  return scopedNamespace.run(namespace, fn)
}
