/**
 * Property Test Suite
 *
 * Validation, defaults, wire conversion and filter building for the
 * built-in property types.
 */

import { describe, it, expect, afterEach, vi } from 'vitest'
import { Key } from '../../src/key'
import { Model, model } from '../../src/model/model'
import { props } from '../../src/properties'
import { PropertyFilter, PropertyOrder } from '../../src/query/filters'
import { ConfigurationError, ErrorCode, ImmutablePropertyError, ValidationError } from '../../src/errors'
import { thrown } from '../helpers'

const Everything = model('Everything', {
  flag: props.bool({ optional: true }),
  count: props.integer({ default: 5 }),
  ratio: props.float({ optional: true }),
  title: props.string({ indexed: true, optional: true }),
  tags: props.string({ repeated: true }),
  body: props.text({ compressed: true, optional: true }),
  raw: props.bytes({ compressed: true, compressionLevel: 9, optional: true }),
  wide: props.string({ encoding: 'utf16le', optional: true }),
  renamed: props.string({ name: 'r', optional: true }),
  code: props.string({ name: 'c', indexed: true, optional: true }),
})

const Person = model('Person', {
  name: props.string(),
})

// =============================================================================
// Values and Defaults
// =============================================================================

describe('property values', () => {
  it('should read defaults for unset properties', () => {
    const entity = new Everything()

    expect(entity.count).toBe(5)
    expect(entity.flag).toBeNull()
    expect(entity.tags).toEqual([])
  })

  it('should keep in-place edits of repeated values', () => {
    const entity = new Everything()
    entity.tags.push('a')

    expect(entity.tags).toEqual(['a'])
  })

  it('should validate assignments', () => {
    const entity = new Everything()

    expect(() => Reflect.set(entity, 'count', 'five')).toThrow(ValidationError)
    expect(() => Reflect.set(entity, 'flag', 1)).toThrow('Value of type number assigned to Bool property.')
    expect(() => Reflect.set(entity, 'tags', 'a')).toThrow(ValidationError)
    expect(() => Reflect.set(entity, 'raw', 'bytes')).toThrow(ValidationError)
  })

  it('should reject null for required properties', () => {
    expect(() => Reflect.set(new Everything(), 'count', null)).toThrow(ValidationError)
  })

  it('should accept null for optional properties', () => {
    const entity = new Everything({ flag: true })
    entity.flag = null

    expect(entity.flag).toBeNull()
  })

  it('should reject integers outside the safe range', () => {
    const error = thrown(() => {
      new Everything().count = 1.5
    })

    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ code: ErrorCode.INVALID_VALUE })
    expect(thrown(() => props.integer().validate(2 ** 53))).toMatchObject({ code: ErrorCode.INVALID_VALUE })
  })

  it('should flag wrong types as type errors', () => {
    const error = thrown(() => props.integer().validate('1'))

    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ isTypeError: true })
  })

  it('should limit the encoded length of indexed strings', () => {
    const entity = new Everything()

    expect(thrown(() => (entity.title = 'x'.repeat(1501)))).toMatchObject({ code: ErrorCode.VALUE_TOO_LONG })
    entity.title = 'x'.repeat(1500)
    expect(entity.title).toHaveLength(1500)
    expect(thrown(() => (entity.title = 'é'.repeat(751)))).toMatchObject({ code: ErrorCode.VALUE_TOO_LONG })
    entity.title = 'é'.repeat(750)
    entity.renamed = 'x'.repeat(2000)
    expect(entity.renamed).toHaveLength(2000)
  })

  it('should reject unknown constructor parameters', () => {
    const init = { name: 'Ada', nickname: 'A' }
    expect(() => new Person(init)).toThrow('Person() does not take a "nickname" parameter.')
  })

  it('should not allow a property to be shared by two attributes', () => {
    const shared = props.string()
    model('SharedA', { a: shared })

    expect(() => model('SharedB', { b: shared })).toThrow(ConfigurationError)
  })
})

// =============================================================================
// Options
// =============================================================================

describe('property options', () => {
  it('should reject indexing of blob-like properties', () => {
    expect(() => props.text({ indexed: true })).toThrow('Text properties cannot be indexed.')
    expect(() => props.bytes({ indexed: true })).toThrow(ConfigurationError)
    expect(() => props.json({ indexed: true })).toThrow(ConfigurationError)
    expect(() => props.msgpack({ indexed: true })).toThrow(ConfigurationError)
  })

  it('should reject invalid compression levels', () => {
    expect(() => props.bytes({ compressionLevel: 10 })).toThrow('compressionLevel must be an integer between -1 and 9.')
    expect(() => props.text({ compressionLevel: 1.5 })).toThrow(ConfigurationError)
    expect(() => props.text({ compressionLevel: -1 })).not.toThrow()
  })

  it('should reject auto-now on repeated datetimes', () => {
    expect(() => props.dateTime({ repeated: true, autoNow: true })).toThrow(ConfigurationError)
    expect(() => props.dateTime({ repeated: true, autoNowAdd: true })).toThrow(ConfigurationError)
  })
})

// =============================================================================
// Wire Conversion
// =============================================================================

describe('wire conversion', () => {
  it('should store fields in declaration order under their stored names', () => {
    const entity = new Everything({ flag: true, title: 'Hi', tags: ['a', 'b'], renamed: 'x' })
    const entries = entity.toEntries()

    expect(entries.map(([name]) => name)).toEqual(['flag', 'count', 'ratio', 'title', 'tags', 'body', 'raw', 'wide', 'r', 'c'])

    const data = Object.fromEntries(entries)
    expect(data.flag).toBe(true)
    expect(data.count).toBe(5)
    expect(data.ratio).toBeNull()
    expect(data.tags).toEqual(['a', 'b'])
    expect(data.r).toBe('x')
  })

  it('should transcode strings with an encoding', () => {
    const data = Object.fromEntries(new Everything({ wide: 'hi' }).toEntries())
    expect(data.wide).toEqual(new Uint8Array([104, 0, 105, 0]))

    const loaded = Everything.load(new Key('Everything', 1), data)
    expect(loaded.wide).toBe('hi')
  })

  it('should compress and decompress text and bytes', () => {
    const text = 'hello '.repeat(100)
    const data = Object.fromEntries(new Everything({ body: text, raw: new Uint8Array([1, 2, 3]) }).toEntries())

    expect(data.body).toBeInstanceOf(Uint8Array)
    expect(data.raw).toBeInstanceOf(Uint8Array)

    const loaded = Everything.load(new Key('Everything', 1), data)
    expect(loaded.body).toBe(text)
    expect(loaded.raw).toEqual(new Uint8Array([1, 2, 3]))
    expect(loaded.wide).toBeNull()
  })

  it('should list unindexed fields', () => {
    expect(new Everything().unindexedProperties).toEqual(['flag', 'count', 'ratio', 'tags', 'body', 'raw', 'wide', 'r'])
  })
})

// =============================================================================
// DateTime
// =============================================================================

describe('DateTime properties', () => {
  const Event = model('Event', {
    at: props.dateTime({ optional: true }),
    created: props.dateTime({ autoNowAdd: true }),
    updated: props.dateTime({ autoNow: true }),
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  it('should stamp auto-now values onto the entity when stored', () => {
    vi.useFakeTimers()
    vi.setSystemTime(new Date('2024-01-01T00:00:00Z'))

    const event = new Event()
    event.toEntries()
    expect(event.created).toEqual(new Date('2024-01-01T00:00:00Z'))
    expect(event.updated).toEqual(new Date('2024-01-01T00:00:00Z'))

    vi.setSystemTime(new Date('2024-06-01T00:00:00Z'))
    event.toEntries()
    expect(event.created).toEqual(new Date('2024-01-01T00:00:00Z'))
    expect(event.updated).toEqual(new Date('2024-06-01T00:00:00Z'))
  })

  it('should load microsecond timestamps', () => {
    const event = Event.load(new Key('Event', 1), { at: 1_700_000_000_000_000 })
    expect(event.at).toEqual(new Date(1_700_000_000_000))
  })

  it('should reject invalid dates', () => {
    expect(thrown(() => (new Event().at = new Date('nope')))).toMatchObject({ code: ErrorCode.INVALID_VALUE })
  })
})

// =============================================================================
// Key
// =============================================================================

describe('Key properties', () => {
  const Pet = model('Pet', {
    owner: props.key({ kind: Person }),
    friend: props.key({ optional: true }),
  })

  it('should accept complete keys of the right kind', () => {
    const pet = new Pet({ owner: new Key('Person', 1), friend: new Key('Pet', 2) })

    expect(pet.owner.equals(new Key('Person', 1))).toBe(true)
    expect(pet.friend?.equals(new Key('Pet', 2))).toBe(true)
  })

  it('should reject keys of another kind', () => {
    const error = thrown(() => new Pet({ owner: new Key('Pet', 1) }))

    expect(error).toBeInstanceOf(ValidationError)
    expect(error).toMatchObject({ code: ErrorCode.KIND_MISMATCH, message: 'Property owner cannot be assigned keys of kind Pet.' })
  })

  it('should reject partial keys', () => {
    expect(thrown(() => new Pet({ owner: new Key('Person') }))).toMatchObject({ code: ErrorCode.PARTIAL_KEY })
  })

  it('should store an assigned entity as its key', () => {
    const pet = new Pet()
    Reflect.set(pet, 'owner', new Person({ name: 'Ada', key: new Key('Person', 7) }))

    expect(pet.owner).toBeInstanceOf(Key)
    expect(pet.owner.equals(new Key('Person', 7))).toBe(true)
  })
})

// =============================================================================
// Computed
// =============================================================================

describe('Computed properties', () => {
  const Account = model('Account', {
    email: props.string(),
    domain: props.computed((account: Model & { email: string }) => account.email.split('@')[1] ?? ''),
  })

  it('should compute the value on first read and keep it', () => {
    const account = new Account({ email: 'ada@example.com' })
    expect(account.domain).toBe('example.com')

    account.email = 'ada@other.org'
    expect(account.domain).toBe('example.com')

    account.unset('domain')
    expect(account.domain).toBe('other.org')
  })

  it('should refuse assignment', () => {
    const account = new Account({ email: 'ada@example.com' })
    expect(() => Reflect.set(account, 'domain', 'x')).toThrow(ImmutablePropertyError)

    const init = { email: 'ada@example.com', domain: 'x' }
    expect(() => new Account(init)).toThrow("Can't set attribute domain.")
  })

  it('should store the value but recompute it on load', () => {
    const data = Object.fromEntries(new Account({ email: 'ada@example.com' }).toEntries())
    expect(data.domain).toBe('example.com')

    const loaded = Account.load(new Key('Account', 1), { email: 'bob@kindling.dev', domain: 'stale' })
    expect(loaded.domain).toBe('kindling.dev')
  })

  it('should be indexed by default', () => {
    expect(Account.properties.domain.eq('example.com')).toEqual(new PropertyFilter('domain', '=', 'example.com'))
  })
})

// =============================================================================
// Filters and Orders
// =============================================================================

describe('filters and orders', () => {
  it('should build filters against the stored field name', () => {
    expect(Everything.properties.title.eq('Hi')).toEqual(new PropertyFilter('title', '=', 'Hi'))
    expect(Everything.properties.title.ne('Hi').operator).toBe('!=')
    expect(Everything.properties.title.lt('Hi').operator).toBe('<')
    expect(Everything.properties.title.le('Hi').operator).toBe('<=')
    expect(Everything.properties.title.gt('Hi').operator).toBe('>')
    expect(Everything.properties.title.ge('Hi').operator).toBe('>=')
    expect(Everything.properties.code.eq('x')).toEqual(new PropertyFilter('c', '=', 'x'))
  })

  it('should only filter on indexed properties', () => {
    expect(thrown(() => Everything.properties.tags.eq('a'))).toMatchObject({
      code: ErrorCode.NOT_INDEXED,
      message: 'tags is not indexed.',
    })
  })

  it('should validate filter values', () => {
    expect(() => Everything.properties.title.eq(1)).toThrow(ValidationError)
  })

  it('should compare optional properties against null', () => {
    expect(Everything.properties.title.isNone).toEqual(new PropertyFilter('title', '=', null))
    expect(() => Everything.properties.count.isNone).toThrow('Required properties cannot be compared against None.')
  })

  it('should build sort orders', () => {
    expect(Everything.properties.title.asc).toEqual(new PropertyOrder('title', 'asc'))
    expect(Everything.properties.title.desc).toEqual(new PropertyOrder('title', 'desc'))
    expect(PropertyOrder.parse('-title')).toEqual(new PropertyOrder('title', 'desc'))
    expect(new PropertyOrder('title', 'desc').toString()).toBe('-title')
  })
})
