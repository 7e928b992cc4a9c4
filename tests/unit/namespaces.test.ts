/**
 * Namespace Test Suite
 */

import { describe, it, expect } from 'vitest'
import { configure } from '../../src/config'
import { Key } from '../../src/key'
import { model } from '../../src/model/model'
import { getNamespace, setDefaultNamespace, withNamespace } from '../../src/namespaces'
import { props } from '../../src/properties'
import { createMemoryAdapter } from '../helpers'

const Tenant = model('Tenant', { label: props.string({ indexed: true }) })

describe('namespaces', () => {
  it('should default to the empty namespace', () => {
    expect(getNamespace()).toBe('')
    expect(new Key('Tenant', 1).namespace).toBe('')
  })

  it('should apply the default namespace to new keys and queries', () => {
    expect(setDefaultNamespace('acme')).toBe('acme')

    expect(new Key('Tenant', 1).namespace).toBe('acme')
    expect(Tenant.query().namespace).toBe('acme')
    expect(new Tenant().key.namespace).toBe('acme')
  })

  it('should clear the default namespace', () => {
    setDefaultNamespace('acme')
    expect(setDefaultNamespace(null)).toBe('')
    expect(getNamespace()).toBe('')
  })

  it('should take the default namespace from the configuration', () => {
    configure({ namespace: 'configured' })
    expect(getNamespace()).toBe('configured')
  })

  it('should prefer an explicit namespace, then the parent one', () => {
    const parent = new Key('Tenant', 1, null, 'explicit')

    expect(new Key('Tenant', 2, parent).namespace).toBe('explicit')
    expect(new Key('Tenant', 2, parent, 'other').namespace).toBe('other')
  })

  // ===========================================================================
  // Scopes
  // ===========================================================================

  describe('scopes', () => {
    it('should override the namespace inside a scope and restore it after', async () => {
      setDefaultNamespace('outer')

      const inside = await withNamespace('scoped', async () => {
        await Promise.resolve()
        return getNamespace()
      })

      expect(inside).toBe('scoped')
      expect(getNamespace()).toBe('outer')
    })

    it('should stack nested scopes', () => {
      const seen = withNamespace('a', () => {
        const nested = withNamespace('b', () => getNamespace())
        return [nested, getNamespace()]
      })

      expect(seen).toEqual(['b', 'a'])
    })

    it('should keep concurrent scopes apart', async () => {
      const tick = () => new Promise(resolve => setTimeout(resolve, 1))
      const read = (namespace: string) =>
        withNamespace(namespace, async () => {
          await tick()
          return getNamespace()
        })

      expect(await Promise.all([read('left'), read('right')])).toEqual(['left', 'right'])
    })
  })

  // ===========================================================================
  // Storage
  // ===========================================================================

  it('should keep entities of different namespaces apart', async () => {
    createMemoryAdapter()
    await withNamespace('a', () => new Tenant({ key: new Key('Tenant', 'main'), label: 'in a' }).put())
    await withNamespace('b', () => new Tenant({ key: new Key('Tenant', 'main'), label: 'in b' }).put())

    const fromA = await new Key('Tenant', 'main', null, 'a').get()
    const labels = await withNamespace('b', () => Tenant.query().run().toArray())

    expect(fromA).toMatchObject({ label: 'in a' })
    expect(labels.map(tenant => tenant.label)).toEqual(['in b'])
    expect(await Tenant.get('main')).toBeNull()
  })
})
