import murmurhash from 'murmurhash-js'
import type { Logger } from './types.js'

/**
 * A map that returns a default value for keys that are not present.
 */
export class DefaultMap<K, V> extends Map<K, V> {
  constructor(
    private defaultValue: () => V,
    entries?: Iterable<[K, V]>,
  ) {
    super(entries)
  }

  get(key: K): V {
    if (!this.has(key)) {
      this.set(key, this.defaultValue())
    }
    return super.get(key)!
  }

  /**
   * Update the value for a key using a function.
   */
  update(key: K, updater: (value: V) => V): V {
    const value = this.get(key)
    const newValue = updater(value)
    this.set(key, newValue)
    return newValue
  }
}

/**
 * JSON data produced by `toTagged`
 */
export type Tagged =
  | null
  | boolean
  | number
  | string
  | Tagged[]
  | { [key: string]: Tagged }

/**
 * Converts a value to JSON data. Values JSON cannot represent are wrapped in
 * `{ $t: tag, v: data }` objects, and so are plain objects that have a `$t`
 * property of their own, so distinct values never share an encoding.
 * Functions, symbols and class instances are passed to `unsupported`.
 */
export function toTagged(
  value: unknown,
  unsupported: (value: unknown) => Tagged,
): Tagged {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value
    case 'number':
      return Number.isFinite(value) && !Object.is(value, -0)
        ? value
        : { $t: 'number', v: String(value) }
    case 'bigint':
      return { $t: 'bigint', v: value.toString() }
    case 'undefined':
      return { $t: 'undefined' }
    case 'object':
      break
    default:
      return unsupported(value)
  }
  if (typeof value !== 'object' || value === null) return null
  const tag = (item: unknown) => toTagged(item, unsupported)
  if (Array.isArray(value)) return value.map(tag)
  if (value instanceof Date) return { $t: 'date', v: tag(value.getTime()) }
  if (value instanceof Map) {
    return { $t: 'map', v: Array.from(value, ([k, v]) => [tag(k), tag(v)]) }
  }
  if (value instanceof Set) return { $t: 'set', v: Array.from(value, tag) }
  const proto: unknown = Object.getPrototypeOf(value)
  if (proto !== Object.prototype && proto !== null) return unsupported(value)
  const entries: { [key: string]: Tagged } = Object.fromEntries(
    Object.entries(value).map(([k, v]) => [k, tag(v)]),
  )
  return '$t' in value ? { $t: 'object', v: entries } : entries
}

/**
 * Inverse of `toTagged` for parsed JSON data.
 */
export function fromTagged(data: unknown): unknown {
  if (Array.isArray(data)) return data.map(fromTagged)
  if (typeof data !== 'object' || data === null) return data
  if (!('$t' in data)) return untagEntries(data)
  const v = 'v' in data ? data.v : undefined
  switch (data.$t) {
    case 'undefined':
      return undefined
    case 'number':
      return Number(v)
    case 'bigint':
      if (typeof v !== 'string') throw new Error('Malformed bigint')
      return BigInt(v)
    case 'date':
      return new Date(Number(fromTagged(v)))
    case 'map':
      return new Map(
        taggedArray(v).map((entry): [unknown, unknown] => {
          const [key, value] = taggedArray(entry)
          return [fromTagged(key), fromTagged(value)]
        }),
      )
    case 'set':
      return new Set(taggedArray(v).map(fromTagged))
    case 'object':
      if (typeof v !== 'object' || v === null) {
        throw new Error('Malformed object')
      }
      return untagEntries(v)
    default:
      throw new Error(`Unknown tag ${String(data.$t)}`)
  }
}

function untagEntries(data: object): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(data).map(([k, v]) => [k, fromTagged(v)]),
  )
}

function taggedArray(data: unknown): unknown[] {
  if (!Array.isArray(data)) throw new Error('Malformed tagged array')
  return data
}

// Keys may be anything; instances are keyed by their own properties
function tagKeyPart(value: unknown): Tagged {
  if (typeof value === 'object' && value !== null) {
    return { $t: 'instance', v: toTagged({ ...value }, tagKeyPart) }
  }
  return { $t: typeof value, v: String(value) }
}

/**
 * Stable string encoding of a value, used to address keys in maps and in
 * spill storage. Values that encode equal are treated as the same key.
 */
export function encodeKey(value: unknown): string {
  return JSON.stringify(toTagged(value, tagKeyPart))
}

/**
 * Murmur3 hash of the stable encoding of a value
 */
export function hash(data: unknown): number {
  return murmurhash.murmur3(encodeKey(data))
}

/**
 * Compares two numbers, treating the infinities as ordinary bounds.
 */
export function compareNumbers(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0
}

/**
 * Resolves the `debug` option accepted throughout the package into a log
 * function, or undefined when logging is off.
 */
export function resolveLogger(
  debug: boolean | Logger = false,
): Logger | undefined {
  return typeof debug === 'function'
    ? debug
    : debug === true
      ? // eslint-disable-next-line no-console
        console.log
      : undefined
}
