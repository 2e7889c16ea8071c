import { describe, expect, it } from 'vitest'
import { DeserializationError } from './errors'
import { deserializePayload, isCloneable, isJsonValue, serializeValue } from './serialize'

describe('serializeValue', () => {
  it('should embed JSON values directly', () => {
    expect(serializeValue({ a: [1, 'two', null, true] })).toEqual({
      type: 'json',
      value: { a: [1, 'two', null, true] }
    })
    expect(serializeValue('text')).toEqual({ type: 'json', value: 'text' })
    expect(serializeValue(null)).toEqual({ type: 'json', value: null })
  })

  it('should use pickle bytes for values JSON cannot hold', () => {
    for (const value of [undefined, Number.NaN, 10n, new Date(0), new Map([['k', 1]])]) {
      const payload = serializeValue(value)
      expect(payload.type).toBe('pickle')
      expect(payload.value).toMatch(/^[0-9a-f]+$/)
    }
  })

  it('should fall back to a string for functions', () => {
    const payload = serializeValue(function greet() {
      return 'hi'
    })

    expect(payload.type).toBe('string')
    expect(payload.value).toContain('greet')
  })

  it('should fall back to a non-empty string for objects holding functions', () => {
    expect(serializeValue({ run: () => 1 })).toEqual({ type: 'string', value: '[object Object]' })
  })

  it('should fall back to a string for class instances', () => {
    class Point {
      constructor(readonly x: number) {}
      norm(): number {
        return Math.abs(this.x)
      }
    }

    expect(serializeValue(new Point(-3))).toEqual({ type: 'string', value: '[object Object]' })
    expect(serializeValue(new Map([['origin', new Point(0)]]))).toEqual({
      type: 'string',
      value: '[object Map]'
    })
    expect(serializeValue([{ at: new Point(1) }])).toEqual({ type: 'string', value: '[object Object]' })
  })

  it('should fall back for objects without a toString', () => {
    const bare: Record<string, unknown> = Object.create(null)
    bare['fn'] = () => 1

    expect(serializeValue(bare)).toEqual({ type: 'string', value: '[object Object]' })
  })
})

describe('deserializePayload', () => {
  it('should round-trip JSON values', () => {
    const value = { title: 'Portrait', tags: ['a', 'b'], score: 0.5, nested: { ok: true } }
    expect(deserializePayload(serializeValue(value))).toEqual(value)
  })

  it('should round-trip values that need pickle bytes', () => {
    const value = {
      when: new Date('2025-01-15T10:30:00Z'),
      ids: new Set([1, 2, 3]),
      lookup: new Map([['x', 10n]]),
      missing: undefined,
      bytes: new Uint8Array([1, 2, 3]),
      failure: new RangeError('out of range'),
      pattern: /ab+c/gi
    }

    expect(deserializePayload(serializeValue(value))).toEqual(value)
  })

  it('should round-trip cyclic objects', () => {
    const node: { name: string; self?: unknown } = { name: 'root' }
    node.self = node

    const restored = deserializePayload(serializeValue(node))
    expect(restored).toMatchObject({ name: 'root' })
    expect(Reflect.get(Object(restored), 'self')).toBe(restored)
  })

  it('should return the text of a string payload', () => {
    expect(deserializePayload({ type: 'string', value: 'fallback' })).toBe('fallback')
  })

  it('should throw DeserializationError for an unknown tag', () => {
    expect(() => deserializePayload({ type: 'msgpack', value: '80' })).toThrow(DeserializationError)
    expect(() => deserializePayload({ type: 'msgpack', value: '80' })).toThrow(
      'Unknown serialization type: msgpack'
    )
  })

  it('should throw DeserializationError for invalid hex', () => {
    expect(() => deserializePayload({ type: 'pickle', value: 'zz' })).toThrow(
      'pickle payload is not a hex string'
    )
  })

  it('should throw DeserializationError for undecodable bytes', () => {
    expect(() => deserializePayload({ type: 'pickle', value: '' })).toThrow(DeserializationError)
  })

  it('should throw DeserializationError for entries that are not objects', () => {
    expect(() => deserializePayload('json')).toThrow('Cache entry is not an object')
  })
})

describe('isJsonValue', () => {
  it('should accept plain JSON', () => {
    expect(isJsonValue({ a: [1, { b: 'c' }] })).toBe(true)
    expect(isJsonValue(Object.create(null))).toBe(true)
  })

  it('should reject values that do not survive JSON', () => {
    expect(isJsonValue(undefined)).toBe(false)
    expect(isJsonValue(Number.POSITIVE_INFINITY)).toBe(false)
    expect(isJsonValue(-0)).toBe(false)
    expect(isJsonValue(new Date())).toBe(false)
    expect(isJsonValue({ a: undefined })).toBe(false)
    expect(isJsonValue([1, , 3])).toBe(false)
  })

  it('should reject cycles', () => {
    const loop: unknown[] = []
    loop.push(loop)
    expect(isJsonValue(loop)).toBe(false)
  })

  it('should accept shared references', () => {
    const shared = { v: 1 }
    expect(isJsonValue([shared, shared])).toBe(true)
  })
})

describe('isCloneable', () => {
  it('should accept graphs of built-in types', () => {
    const shared = { id: 1 }
    expect(isCloneable([shared, new Set([shared]), new Map([[shared, new Date(0)]])])).toBe(true)
    expect(isCloneable(Object.create(null))).toBe(true)
    expect(isCloneable(Buffer.from('ab'))).toBe(true)
  })

  it('should reject class instances anywhere in the graph', () => {
    class Tagged {
      tag = 'x'
    }

    expect(isCloneable(new Tagged())).toBe(false)
    expect(isCloneable(new Set([new Tagged()]))).toBe(false)
    expect(isCloneable({ nested: { deeper: [new Tagged()] } })).toBe(false)
  })

  it('should reject functions and symbols', () => {
    expect(isCloneable({ run: () => 1 })).toBe(false)
    expect(isCloneable([Symbol('s')])).toBe(false)
  })
})
