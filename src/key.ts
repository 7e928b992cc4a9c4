/**
 * Datastore keys
 *
 * A Key is an immutable hierarchical identifier: a kind, an optional id or
 * name, an optional fully-assigned parent and a namespace. Keys without an
 * id are partial and belong to entities that have not been stored yet.
 *
 * @module key
 */

import { ErrorCode, ValidationError } from './errors'
import { getNamespace } from './namespaces'
import { deleteMulti, getMulti } from './batch'
import { lookupModelByKind } from './model/registry'
import type { Model, ModelType } from './model/model'

/** Integer id or string name of a key */
export type IdOrName = number | string

/** A single element of a flattened key path */
export type PathSegment = string | number

/** Anything that names a kind: a string or a model class */
export type KindLike = string | { readonly kind: string }

/** Serialized form of a key */
export interface KeyJSON {
  path: PathSegment[]
  namespace: string
}

function kindOf(kind: KindLike): string {
  return typeof kind === 'string' ? kind : kind.kind
}

/**
 * A datastore key.
 *
 * @example
 * ```typescript
 * const parent = new Key('Person', 1)
 * const key = new Key('Pet', 'rex', parent)
 * key.path // ['Person', 1, 'Pet', 'rex']
 * key.isPartial // false
 * ```
 */
export class Key {
  readonly kind: string
  readonly idOrName: IdOrName | null
  readonly parent: Key | null
  readonly namespace: string

  /**
   * @param kind - Kind name or model class
   * @param idOrName - Integer id or string name; omit for a partial key
   * @param parent - Ancestor key; must not be partial
   * @param namespace - Defaults to the parent's namespace, else the current one
   */
  constructor(kind: KindLike, idOrName: IdOrName | null = null, parent: Key | null = null, namespace?: string | null) {
    if (parent && parent.isPartial) {
      throw new ValidationError('Cannot use partial Keys as parents.', ErrorCode.PARTIAL_KEY, {
        kind: parent.kind,
      })
    }

    this.kind = kindOf(kind)
    this.idOrName = idOrName
    this.parent = parent
    this.namespace = namespace ?? parent?.namespace ?? getNamespace()
    Object.freeze(this)
  }

  /**
   * Build a key chain from a flat list of alternating kind/id segments.
   * The namespace is applied to every key in the chain.
   *
   * @example
   * ```typescript
   * Key.fromPath(['Person', 1, 'Pet', 'rex'])
   * // equals new Key('Pet', 'rex', new Key('Person', 1))
   * ```
   */
  static fromPath(path: readonly PathSegment[], options: { namespace?: string | null } = {}): Key {
    if (path.length === 0) {
      throw new ValidationError('Key paths must contain at least one segment.')
    }

    let key: Key | null = null
    for (let i = 0; i < path.length; i += 2) {
      const kind = path[i]
      if (typeof kind !== 'string') {
        throw new ValidationError(`Key path segment ${i} must be a kind name.`, ErrorCode.INVALID_TYPE, {
          expectedType: 'string',
          actualType: typeof kind,
        })
      }

      const id = i + 1 < path.length ? path[i + 1] : null
      const next: Key = new Key(kind, id, key, options.namespace ?? key?.namespace)
      key = next
    }

    if (key === null) {
      throw new ValidationError('Key paths must contain at least one segment.')
    }
    return key
  }

  /** Rebuild a key from its serialized form */
  static fromJSON(json: KeyJSON): Key {
    return Key.fromPath(json.path, { namespace: json.namespace })
  }

  /** The full path represented by this key */
  get path(): PathSegment[] {
    const prefix = this.parent ? this.parent.path : []
    if (this.idOrName !== null) {
      return [...prefix, this.kind, this.idOrName]
    }
    return [...prefix, this.kind]
  }

  /** True if this key doesn't have an id yet */
  get isPartial(): boolean {
    return this.path.length % 2 !== 0
  }

  /** This key's numeric id, if it has one */
  get intId(): number | null {
    return typeof this.idOrName === 'number' ? this.idOrName : null
  }

  /** This key's string name, if it has one */
  get strId(): string | null {
    return typeof this.idOrName === 'string' ? this.idOrName : null
  }

  /**
   * Structural equality: same path and namespace.
   */
  equals(other: unknown): boolean {
    if (!(other instanceof Key)) return false
    if (other === this) return true
    if (other.namespace !== this.namespace) return false

    const a = this.path
    const b = other.path
    return a.length === b.length && a.every((segment, i) => segment === b[i])
  }

  /**
   * Get the model class registered for this key's kind.
   *
   * @throws LookupError if no model is registered for the kind
   */
  getModel(): ModelType {
    return lookupModelByKind(this.kind)
  }

  /**
   * Get the entity this key represents, or null if it doesn't exist.
   */
  async get(): Promise<Model | null> {
    const [entity] = await getMulti([this])
    return entity ?? null
  }

  /**
   * Delete the entity this key represents.
   */
  async delete(): Promise<void> {
    await deleteMulti([this])
  }

  toJSON(): KeyJSON {
    return { path: this.path, namespace: this.namespace }
  }

  /**
   * Stable string form, used to derive cache keys
   */
  toString(): string {
    const id = this.idOrName === null ? 'null' : JSON.stringify(this.idOrName)
    const parent = this.parent ? this.parent.toString() : 'null'
    return `Key(${JSON.stringify(this.kind)}, ${id}, parent=${parent}, namespace=${JSON.stringify(this.namespace)})`
  }
}
