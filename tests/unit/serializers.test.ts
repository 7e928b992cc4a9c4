/**
 * Serializer Test Suite
 *
 * JSON and msgpack encoding of property values, including the tagged
 * types (bytes, dates, keys and entities) both formats carry.
 */

import { describe, it, expect, beforeEach } from 'vitest'
import { ExtData, encode } from '@msgpack/msgpack'
import { Key } from '../../src/key'
import { model } from '../../src/model/model'
import { checkSerializable, dumpJson, dumpMsgpack, loadJson, loadMsgpack, props } from '../../src/properties'
import { SerializationError, ValidationError } from '../../src/errors'
import { createMemoryAdapter } from '../helpers'

const Note = model('Note', {
  text: props.string(),
})

const Doc = model('Doc', {
  meta: props.json({ optional: true }),
  packed: props.msgpack({ compressed: true, optional: true }),
  history: props.json({ repeated: true }),
  archive: props.json({ compressed: true, optional: true }),
})

// =============================================================================
// Serializable Values
// =============================================================================

describe('checkSerializable', () => {
  it('should accept JSON-like values and tagged types at any depth', () => {
    expect(() =>
      checkSerializable({
        a: [1, 'two', null, true],
        when: new Date(0),
        blob: new Uint8Array([1]),
        key: new Key('Note', 1),
        note: new Note({ text: 'hi' }),
      })
    ).not.toThrow()
  })

  it('should name the first unsupported value', () => {
    expect(() => checkSerializable(new Map())).toThrow('Value of type Map cannot be serialized.')
    expect(() => checkSerializable({ a: [new Set()] })).toThrow('Value of type Set cannot be serialized.')
    expect(() => checkSerializable(undefined)).toThrow(ValidationError)
  })
})

// =============================================================================
// JSON
// =============================================================================

describe('JSON', () => {
  it('should tag bytes, dates and keys', () => {
    const text = dumpJson({
      a: 1,
      when: new Date('2020-01-01T00:00:00Z'),
      blob: new Uint8Array([1, 2, 3]),
      key: new Key('Note', 1),
    })

    expect(text).toBe(
      '{"a":1,' +
        '"when":{"$type":"datetime","value":"2020-01-01T00:00:00.000Z"},' +
        '"blob":{"$type":"blob","value":"AQID"},' +
        '"key":{"$type":"key","value":{"path":["Note",1],"namespace":""}}}'
    )
  })

  it('should load tagged values back', () => {
    const value = {
      a: [1, 'two'],
      when: new Date('2020-01-01T00:00:00Z'),
      blob: new Uint8Array([1, 2, 3]),
      key: new Key('Note', 1),
    }

    expect(loadJson(dumpJson(value))).toEqual(value)
  })

  it('should load entities into their registered class', () => {
    const note = new Note({ text: 'hi', key: new Key('Note', 1) })
    const loaded = loadJson(dumpJson({ note }))

    expect(loaded).toMatchObject({ note: expect.any(Note) })
    expect(loaded).toEqual({ note })
  })

  it('should reject unknown type tags', () => {
    expect(() => loadJson('{"$type":"nope","value":1}')).toThrow('Invalid type tag "nope".')
  })

  it('should reject malformed tagged values', () => {
    expect(() => loadJson('{"$type":"blob","value":"@@"}')).toThrow(SerializationError)
    expect(() => loadJson('{"$type":"datetime","value":1}')).toThrow('Invalid datetime value.')
  })

  it('should reject malformed documents', () => {
    expect(() => loadJson('{')).toThrow('Invalid JSON data.')
  })
})

// =============================================================================
// Msgpack
// =============================================================================

describe('msgpack', () => {
  it('should round-trip tagged values', () => {
    const value = {
      a: [1, 'two', null],
      when: new Date('2020-01-01T00:00:00Z'),
      blob: new Uint8Array([1, 2, 3]),
      key: new Key('Pet', 'rex', new Key('Note', 1)),
    }

    expect(loadMsgpack(dumpMsgpack(value))).toEqual(value)
  })

  it('should round-trip entities', () => {
    const note = new Note({ text: 'hi', key: new Key('Note', 1) })
    const loaded = loadMsgpack(dumpMsgpack(note))

    expect(loaded).toBeInstanceOf(Note)
    expect(note.equals(loaded)).toBe(true)
  })

  it('should reject unknown extension codes', () => {
    const data = encode(new ExtData(5, new Uint8Array([1])))
    expect(() => loadMsgpack(data)).toThrow('Invalid extension code 5.')
  })

  it('should reject malformed data', () => {
    expect(() => loadMsgpack(new Uint8Array([0xc1]))).toThrow('Invalid msgpack data.')
  })

  it('should refuse to encode unsupported values', () => {
    expect(() => dumpMsgpack({ a: new Map() })).toThrow(ValidationError)
  })
})

// =============================================================================
// Properties
// =============================================================================

describe('serialized properties', () => {
  it('should store JSON text, one document per repeated element', () => {
    const data = Object.fromEntries(new Doc({ meta: { a: 1 }, history: [{ x: 1 }, { x: 2 }] }).toEntries())

    expect(data.meta).toBe('{"a":1}')
    expect(data.history).toEqual(['{"x":1}', '{"x":2}'])
  })

  it('should load stored values', () => {
    const doc = new Doc({
      meta: { a: 1 },
      packed: { key: new Key('Note', 1), list: [1, 2] },
      history: [{ x: 1 }],
      archive: { long: 'text '.repeat(50) },
    })
    const data = Object.fromEntries(doc.toEntries())

    expect(data.packed).toBeInstanceOf(Uint8Array)
    expect(data.archive).toBeInstanceOf(Uint8Array)

    const loaded = Doc.load(new Key('Doc', 1), data)
    expect(loaded.meta).toEqual({ a: 1 })
    expect(loaded.packed).toEqual({ key: new Key('Note', 1), list: [1, 2] })
    expect(loaded.history).toEqual([{ x: 1 }])
    expect(loaded.archive).toEqual({ long: 'text '.repeat(50) })
  })

  it('should reject values that cannot be serialized', () => {
    expect(() => Reflect.set(new Doc(), 'meta', new Map())).toThrow(ValidationError)
  })

  describe('through an adapter', () => {
    beforeEach(() => {
      createMemoryAdapter()
    })

    it('should store and reload serialized values', async () => {
      const doc = await new Doc({ meta: { when: new Date(0) }, packed: [new Uint8Array([9])] }).put()
      const loaded = await Doc.get(doc.key.intId ?? 0)

      expect(loaded?.meta).toEqual({ when: new Date(0) })
      expect(loaded?.packed).toEqual([new Uint8Array([9])])
    })
  })
})
