/**
 * Payload Serialization
 *
 * Ordered registry of strategies. serializeValue tries each in turn and the
 * first that accepts the value wins; the last one (string) accepts everything.
 */

import { deserialize, serialize } from 'node:v8'
import { DeserializationError } from './errors'
import type { JsonValue, PayloadType, SerializedPayload } from './types'

interface PayloadSerializer {
  readonly type: PayloadType
  /** Null when this strategy cannot hold the value */
  serialize(value: unknown): SerializedPayload | null
  /** Receives the raw `value` field read back from a table */
  deserialize(raw: unknown): unknown
}

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/i

/**
 * True when the value comes back from JSON.parse(JSON.stringify(value))
 * deep-equal and with the same types.
 */
export function isJsonValue(value: unknown, ancestors: Set<object> = new Set()): value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return true
  if (typeof value === 'number') return Number.isFinite(value) && !Object.is(value, -0)
  if (typeof value !== 'object') return false
  if (ancestors.has(value)) return false

  ancestors.add(value)
  try {
    if (Array.isArray(value)) {
      for (let i = 0; i < value.length; i++) {
        if (!(i in value) || !isJsonValue(value[i], ancestors)) return false
      }
      return true
    }

    const proto: unknown = Object.getPrototypeOf(value)
    if (proto !== Object.prototype && proto !== null) return false
    if (Object.getOwnPropertySymbols(value).length > 0) return false
    return Object.keys(value).every((key) => isJsonValue(Reflect.get(value, key), ancestors))
  } finally {
    ancestors.delete(value)
  }
}

function textOf(value: unknown): string {
  let text: string
  try {
    text = String(value)
  } catch {
    // Objects without a callable toString (e.g. null prototype)
    text = ''
  }
  return text.length > 0 ? text : Object.prototype.toString.call(value)
}

const jsonSerializer: PayloadSerializer = {
  type: 'json',
  serialize: (value) => (isJsonValue(value) ? { type: 'json', value } : null),
  deserialize: (raw) => raw
}

const CLONEABLE_PROTOTYPES: ReadonlySet<unknown> = new Set<unknown>([
  null,
  Object.prototype,
  Array.prototype,
  Map.prototype,
  Set.prototype,
  Date.prototype,
  RegExp.prototype,
  ArrayBuffer.prototype,
  DataView.prototype,
  Buffer.prototype,
  Int8Array.prototype,
  Uint8Array.prototype,
  Uint8ClampedArray.prototype,
  Int16Array.prototype,
  Uint16Array.prototype,
  Int32Array.prototype,
  Uint32Array.prototype,
  Float32Array.prototype,
  Float64Array.prototype,
  BigInt64Array.prototype,
  BigUint64Array.prototype,
  Error.prototype,
  EvalError.prototype,
  RangeError.prototype,
  ReferenceError.prototype,
  SyntaxError.prototype,
  TypeError.prototype,
  URIError.prototype
])

/**
 * True when every object in the graph comes back from a structured clone with
 * its prototype intact. Class instances do not: they are rebuilt as plain objects.
 */
export function isCloneable(value: unknown, seen: Set<object> = new Set()): boolean {
  if (typeof value === 'function' || typeof value === 'symbol') return false
  if (typeof value !== 'object' || value === null) return true
  if (seen.has(value)) return true
  seen.add(value)

  if (!CLONEABLE_PROTOTYPES.has(Object.getPrototypeOf(value))) return false
  if (value instanceof Map) {
    return [...value].every(([k, v]) => isCloneable(k, seen) && isCloneable(v, seen))
  }
  if (value instanceof Set) {
    return [...value].every((item) => isCloneable(item, seen))
  }
  if (value instanceof Error || ArrayBuffer.isView(value) || value instanceof ArrayBuffer) {
    return true
  }
  return Object.values(value).every((item) => isCloneable(item, seen))
}

const pickleSerializer: PayloadSerializer = {
  type: 'pickle',
  serialize: (value) => {
    if (!isCloneable(value)) return null
    try {
      return { type: 'pickle', value: serialize(value).toString('hex') }
    } catch {
      // DataCloneError: proxies, throwing getters
      return null
    }
  },
  deserialize: (raw) => {
    if (typeof raw !== 'string' || !HEX_PATTERN.test(raw)) {
      throw new DeserializationError('pickle payload is not a hex string', 'pickle')
    }
    try {
      return deserialize(Buffer.from(raw, 'hex'))
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error)
      throw new DeserializationError(`pickle payload could not be decoded: ${reason}`, 'pickle')
    }
  }
}

const stringSerializer: PayloadSerializer = {
  type: 'string',
  serialize: (value) => ({ type: 'string', value: textOf(value) }),
  deserialize: (raw) => {
    if (typeof raw !== 'string') {
      throw new DeserializationError('string payload is not a string', 'string')
    }
    return raw
  }
}

export const SERIALIZERS: readonly PayloadSerializer[] = [
  jsonSerializer,
  pickleSerializer,
  stringSerializer
]

/**
 * Serialize a value for a cache table. Never throws.
 */
export function serializeValue(value: unknown): SerializedPayload {
  for (const serializer of SERIALIZERS) {
    const payload = serializer.serialize(value)
    if (payload) return payload
  }
  return { type: 'string', value: textOf(value) }
}

/**
 * Rebuild a value from a table entry.
 *
 * @throws DeserializationError for an unknown type tag or an undecodable value
 */
export function deserializePayload(payload: unknown): unknown {
  if (typeof payload !== 'object' || payload === null) {
    throw new DeserializationError('Cache entry is not an object', 'unknown')
  }

  const type: unknown = Reflect.get(payload, 'type')
  const serializer = SERIALIZERS.find((s) => s.type === type)
  if (!serializer) {
    throw new DeserializationError(`Unknown serialization type: ${String(type)}`, String(type))
  }
  return serializer.deserialize(Reflect.get(payload, 'value'))
}
