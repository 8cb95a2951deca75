import { fromTagged, toTagged } from '../utils.js'

export interface Serializer<T> {
  serialize(value: T): Uint8Array
  deserialize(bytes: Uint8Array): T
}

/**
 * Creates the serializer for the accumulators of one state store.
 */
export type SerializerFactory = <T>() => Serializer<T>

const encoder = new TextEncoder()
const decoder = new TextDecoder('utf-8', { fatal: true })

/**
 * Serializes accumulators as UTF-8 JSON. Dates, bigints, maps, sets,
 * `undefined` and non-finite numbers are tagged so they come back as they
 * were; functions, symbols and class instances are rejected.
 *
 * `deserialize` trusts the payload to be of type `T`; the state store
 * verifies a checksum before calling it.
 */
export function jsonSerializer<T>(
  revive: (value: unknown) => T = (value) => value as T,
): Serializer<T> {
  return {
    serialize: (value) =>
      encoder.encode(JSON.stringify(toTagged(value, rejectValue))),
    deserialize: (bytes) =>
      revive(fromTagged(JSON.parse(decoder.decode(bytes)))),
  }
}

function rejectValue(value: unknown): never {
  const kind =
    typeof value === 'object' && value !== null
      ? `instance of ${value.constructor?.name ?? 'unknown class'}`
      : typeof value
  throw new TypeError(`Cannot serialize ${kind}`)
}

export function encodeText(text: string): Uint8Array {
  return encoder.encode(text)
}

export function decodeText(bytes: Uint8Array): string {
  return decoder.decode(bytes)
}
