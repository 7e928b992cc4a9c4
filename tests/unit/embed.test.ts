/**
 * Embed Test Suite
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { Key } from '../../src/key'
import { model } from '../../src/model/model'
import { EmbedProperty, props } from '../../src/properties'
import { PropertyFilter } from '../../src/query/filters'
import { ConfigurationError, ErrorCode, IntegrityError, MissingValueError, ValidationError } from '../../src/errors'
import { createMemoryAdapter, thrown } from '../helpers'

const Nested = model('Nested', {
  y: props.integer(),
  z: props.integer({ indexed: true }),
})

const Outer = model('Outer', {
  x: props.float({ indexed: true }),
  nested: props.embed({ kind: Nested }),
})

const Bag = model('Bag', {
  items: props.embed({ kind: Nested, repeated: true }),
  extra: props.embed({ kind: Nested, optional: true }),
  loose: props.embed({ kind: 'Nested', optional: true }),
})

const Other = model('Other', {})

describe('Embed properties', () => {
  // ===========================================================================
  // Options
  // ===========================================================================

  describe('options', () => {
    it('should reject options that belong to the embedded fields', () => {
      const options = { kind: Nested, indexed: true }
      expect(() => new EmbedProperty(options)).toThrow('Embed does not support name, default, indexed or indexedIf.')
      expect(() => new EmbedProperty(options)).toThrow(ConfigurationError)
    })

    it('should resolve the embedded model by kind', () => {
      expect(Bag.properties.loose.model).toBe(Nested)
      expect(Bag.properties.loose.kind).toBe('Nested')
      expect(Outer.properties.nested.kind).toBe('Nested')
    })
  })

  // ===========================================================================
  // Storage
  // ===========================================================================

  describe('storage', () => {
    it('should store embedded fields under a dotted prefix', () => {
      const outer = new Outer({ x: 1, nested: new Nested({ y: 42, z: 43 }) })

      expect(outer.toEntries()).toEqual([
        ['x', 1],
        ['nested.y', 42],
        ['nested.z', 43],
      ])
    })

    it('should report unindexed embedded fields', () => {
      const outer = new Outer({ x: 1, nested: new Nested({ y: 42, z: 43 }) })
      expect(outer.unindexedProperties).toEqual(['nested.y'])
    })

    it('should store repeated embeds as one list per field', () => {
      const bag = new Bag({ items: [new Nested({ y: 1, z: 2 }), new Nested({ y: 3, z: 4 })] })

      expect(bag.toEntries()).toEqual([
        ['items.y', [1, 3]],
        ['items.z', [2, 4]],
      ])
    })

    it('should require a value unless optional', () => {
      expect(() => new Outer({ x: 1 }).toEntries()).toThrow(MissingValueError)
      expect(new Bag().toEntries()).toEqual([])
    })

    it('should only accept instances of the embedded model', () => {
      const error = thrown(() => Reflect.set(new Outer(), 'nested', new Other()))

      expect(error).toBeInstanceOf(ValidationError)
      expect(error).toMatchObject({ code: ErrorCode.INVALID_TYPE, message: 'nested properties must be instances of Nested.' })
    })
  })

  // ===========================================================================
  // Loading
  // ===========================================================================

  describe('loading', () => {
    it('should rebuild embedded entities', () => {
      const outer = Outer.load(new Key('Outer', 1), { x: 1, 'nested.y': 42, 'nested.z': 43 })

      expect(outer.nested).toBeInstanceOf(Nested)
      expect(outer.nested.y).toBe(42)
      expect(outer.nested.z).toBe(43)
    })

    it('should rebuild repeated embeds row by row', () => {
      const bag = Bag.load(new Key('Bag', 1), { 'items.y': [1, 3], 'items.z': [2, 4] })

      expect(bag.items.map(item => [item.y, item.z])).toEqual([
        [1, 2],
        [3, 4],
      ])
    })

    it('should load missing repeated embeds as empty lists', () => {
      const bag = Bag.load(new Key('Bag', 1), {})

      expect(bag.items).toEqual([])
      expect(bag.extra).toBeNull()
    })

    it('should reject columns of different lengths', () => {
      expect(() => Bag.load(new Key('Bag', 1), { 'items.y': [1, 3], 'items.z': [2] })).toThrow(IntegrityError)
    })
  })

  // ===========================================================================
  // Filters
  // ===========================================================================

  describe('filters', () => {
    it('should filter on embedded fields by dotted name', () => {
      expect(Outer.properties.nested.field('z').ge(10)).toEqual(new PropertyFilter('nested.z', '>=', 10))
    })

    it('should only filter on indexed embedded fields', () => {
      expect(thrown(() => Outer.properties.nested.field('y').eq(1))).toMatchObject({
        code: ErrorCode.NOT_INDEXED,
        message: 'nested.y is not indexed.',
      })
    })

    it('should reject unknown embedded fields', () => {
      expect(() => Outer.properties.nested.field('w')).toThrow('Nested has no property "w".')
    })

    it('should find entities by embedded values', async () => {
      createMemoryAdapter()
      await new Outer({ x: 1, nested: new Nested({ y: 1, z: 5 }) }).put()
      await new Outer({ x: 2, nested: new Nested({ y: 2, z: 50 }) }).put()

      const found = await Outer.query().where(Outer.properties.nested.field('z').ge(10)).run().toArray()

      expect(found.map(outer => outer.x)).toEqual([2])
      expect(found[0].nested.z).toBe(50)
    })
  })

  describe('through an adapter', () => {
    beforeEach(() => {
      createMemoryAdapter()
    })

    it('should store and reload repeated embeds', async () => {
      const bag = await new Bag({ items: [new Nested({ y: 1, z: 2 })], extra: new Nested({ y: 7, z: 8 }) }).put()
      const loaded = await Bag.get(bag.key.intId ?? 0)

      expect(loaded?.equals(bag)).toBe(true)
    })
  })
})
