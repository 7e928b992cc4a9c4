/**
 * Key Test Suite
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { Key } from '../../src/key'
import { model } from '../../src/model/model'
import { props } from '../../src/properties'
import { ErrorCode, LookupError, ValidationError } from '../../src/errors'
import { createMemoryAdapter, thrown } from '../helpers'

const Person = model('Person', {
  name: props.string(),
})

describe('Key', () => {
  // ===========================================================================
  // Construction
  // ===========================================================================

  describe('construction', () => {
    it('should build a complete key from a kind and id', () => {
      const key = new Key('Person', 1)

      expect(key.kind).toBe('Person')
      expect(key.path).toEqual(['Person', 1])
      expect(key.isPartial).toBe(false)
    })

    it('should build a partial key without an id', () => {
      const key = new Key('Person')

      expect(key.path).toEqual(['Person'])
      expect(key.isPartial).toBe(true)
    })

    it('should accept a model class as the kind', () => {
      expect(new Key(Person, 'ada').kind).toBe('Person')
    })

    it('should prefix the parent path', () => {
      const key = new Key('Pet', 'rex', new Key('Person', 1))

      expect(key.path).toEqual(['Person', 1, 'Pet', 'rex'])
      expect(key.parent?.path).toEqual(['Person', 1])
    })

    it('should reject partial parents', () => {
      const error = thrown(() => new Key('Pet', 'rex', new Key('Person')))

      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({ code: ErrorCode.PARTIAL_KEY })
    })

    it('should be immutable', () => {
      const key = new Key('Person', 1)
      expect(Object.isFrozen(key)).toBe(true)
    })

    it('should expose the id as intId or strId', () => {
      expect(new Key('Person', 1).intId).toBe(1)
      expect(new Key('Person', 1).strId).toBeNull()
      expect(new Key('Person', 'ada').strId).toBe('ada')
      expect(new Key('Person', 'ada').intId).toBeNull()
    })
  })

  // ===========================================================================
  // Namespaces
  // ===========================================================================

  describe('namespaces', () => {
    it('should default to the empty namespace', () => {
      expect(new Key('Person', 1).namespace).toBe('')
    })

    it('should inherit the parent namespace', () => {
      const parent = new Key('Person', 1, null, 'tenant')
      expect(new Key('Pet', 2, parent).namespace).toBe('tenant')
    })

    it('should not equal the same path in another namespace', () => {
      expect(new Key('Person', 1, null, 'a').equals(new Key('Person', 1, null, 'b'))).toBe(false)
    })
  })

  // ===========================================================================
  // Paths
  // ===========================================================================

  describe('fromPath', () => {
    it('should build the key chain', () => {
      const key = Key.fromPath(['Person', 1, 'Pet', 'rex'])
      expect(key.equals(new Key('Pet', 'rex', new Key('Person', 1)))).toBe(true)
    })

    it('should build a partial key from an odd-length path', () => {
      const key = Key.fromPath(['Person', 1, 'Pet'])

      expect(key.isPartial).toBe(true)
      expect(key.parent?.equals(new Key('Person', 1))).toBe(true)
    })

    it('should apply the namespace to every key in the chain', () => {
      const key = Key.fromPath(['Person', 1, 'Pet', 'rex'], { namespace: 'tenant' })

      expect(key.namespace).toBe('tenant')
      expect(key.parent?.namespace).toBe('tenant')
    })

    it('should reject empty paths', () => {
      expect(() => Key.fromPath([])).toThrow(ValidationError)
    })

    it('should reject non-string kinds', () => {
      expect(() => Key.fromPath([1, 2])).toThrow('Key path segment 0 must be a kind name.')
    })
  })

  // ===========================================================================
  // Equality and Serialization
  // ===========================================================================

  describe('equality and serialization', () => {
    it('should compare structurally', () => {
      expect(new Key('Person', 1).equals(new Key('Person', 1))).toBe(true)
      expect(new Key('Person', 1).equals(new Key('Person', 2))).toBe(false)
      expect(new Key('Person', 1).equals(new Key('Person', '1'))).toBe(false)
      expect(new Key('Person', 1).equals(['Person', 1])).toBe(false)
    })

    it('should round-trip through JSON', () => {
      const key = new Key('Pet', 'rex', new Key('Person', 1), 'tenant')
      const json = key.toJSON()

      expect(json).toEqual({ path: ['Person', 1, 'Pet', 'rex'], namespace: 'tenant' })
      expect(Key.fromJSON(json).equals(key)).toBe(true)
    })

    it('should have a stable string form', () => {
      expect(new Key('Person', 1).toString()).toBe('Key("Person", 1, parent=null, namespace="")')
      expect(new Key('Pet', 'rex', new Key('Person', 1)).toString()).toBe(
        'Key("Pet", "rex", parent=Key("Person", 1, parent=null, namespace=""), namespace="")'
      )
    })
  })

  // ===========================================================================
  // Entity Access
  // ===========================================================================

  describe('entity access', () => {
    beforeEach(() => {
      createMemoryAdapter()
    })

    it('should resolve its model', () => {
      expect(new Key('Person', 1).getModel()).toBe(Person)
    })

    it('should fail to resolve unknown kinds', () => {
      expect(() => new Key('Unknown', 1).getModel()).toThrow(LookupError)
    })

    it('should get and delete the entity it names', async () => {
      const person = await new Person({ name: 'Ada' }).put()

      const found = await person.key.get()
      expect(found?.equals(person)).toBe(true)

      await person.key.delete()
      expect(await person.key.get()).toBeNull()
    })

    it('should return null for missing entities', async () => {
      expect(await new Key('Person', 404).get()).toBeNull()
    })
  })
})
