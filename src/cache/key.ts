/**
 * Cache Key Generation
 *
 * Deterministic MD5 fingerprints of call arguments. Every argument is hashed
 * together with its runtime type name, so `f(1)` and `f('1')` get different keys.
 */

import { createHash } from 'node:crypto'
import type { FingerprintOptions, NamedArgs } from './types'

/**
 * Runtime type name of a value: 'null', the typeof of a primitive, 'Array',
 * or the constructor name of an object ('Object' when it has none).
 */
export function typeName(value: unknown): string {
  if (value === null) return 'null'
  if (typeof value !== 'object') return typeof value
  if (Array.isArray(value)) return 'Array'

  const ctor: unknown = Reflect.get(value, 'constructor')
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name
  }
  return 'Object'
}

/**
 * Whether a leading argument counts as a receiver to drop from the key.
 * Primitives never do.
 */
export function isReceiver(value: unknown): boolean {
  return typeof value === 'object' && value !== null
}

function describeNested(value: unknown, ancestors: Set<object>): string {
  return typeof value === 'string' ? JSON.stringify(value) : describeValue(value, ancestors)
}

function describeObject(value: object, ancestors: Set<object>): string {
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? 'Invalid Date' : value.toISOString()
  }
  if (value instanceof RegExp) {
    return value.toString()
  }
  if (Array.isArray(value)) {
    return `[${value.map((item) => describeNested(item, ancestors)).join(',')}]`
  }
  if (value instanceof Map) {
    const entries = [...value.entries()].map(
      ([k, v]) => `${describeNested(k, ancestors)}=>${describeNested(v, ancestors)}`
    )
    return `Map{${entries.join(',')}}`
  }
  if (value instanceof Set) {
    return `Set{${[...value].map((item) => describeNested(item, ancestors)).join(',')}}`
  }
  if (ArrayBuffer.isView(value)) {
    return `${typeName(value)}<${Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('hex')}>`
  }

  // Plain objects and class instances: own enumerable keys, sorted
  const fields = Object.keys(value)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${describeNested(Reflect.get(value, key), ancestors)}`)
  return `{${fields.join(',')}}`
}

/**
 * Deterministic text form of any value. Only ancestors count as cycles, so a
 * shared (non-cyclic) reference is described in full each time it appears.
 */
export function describeValue(value: unknown, ancestors: Set<object> = new Set()): string {
  if (typeof value === 'string') return value
  if (typeof value === 'number' || typeof value === 'boolean') return String(value)
  if (typeof value === 'bigint') return `${value}n`
  if (typeof value === 'undefined') return 'undefined'
  if (typeof value === 'symbol') return value.toString()
  if (typeof value === 'function') return `[Function ${value.name || 'anonymous'}]`
  if (value === null) return 'null'

  if (ancestors.has(value)) return '[Circular]'
  ancestors.add(value)
  try {
    return describeObject(value, ancestors)
  } finally {
    ancestors.delete(value)
  }
}

/**
 * Generate the cache key for one call.
 *
 * The hashed text is `<positional>:<named>` where positional is the JSON list of
 * [typeName, description] pairs and named is the JSON list of
 * [name, typeName, description] triples sorted by name.
 *
 * @example
 * ```ts
 * fingerprint([1]) !== fingerprint(['1'])
 * fingerprint([], { b: 2, a: 1 }) === fingerprint([], { a: 1, b: 2 })
 * ```
 */
export function fingerprint(
  args: readonly unknown[],
  named: NamedArgs = {},
  options: FingerprintOptions = {}
): string {
  const positional = options.skipReceiver && isReceiver(args[0]) ? args.slice(1) : args

  const positionalText = JSON.stringify(positional.map((arg) => [typeName(arg), describeValue(arg)]))
  const namedText = JSON.stringify(
    Object.keys(named)
      .sort()
      .map((name) => {
        const value = named[name]
        return [name, typeName(value), describeValue(value)]
      })
  )

  return createHash('md5').update(`${positionalText}:${namedText}`).digest('hex')
}
