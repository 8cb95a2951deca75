import murmurhash from 'murmurhash-js'
import {
  SpillIOError,
  StateCorruptionError,
  StateSerializationError,
} from '../errors.js'
import type { Logger } from '../types.js'
import { encodeKey, resolveLogger } from '../utils.js'
import type { Window } from '../windowing/window.js'
import { decodeText, encodeText, jsonSerializer, Serializer } from './serializer.js'
import {
  memorySpillStorage,
  SpillStorage,
  SpillStorageFactory,
} from './spill.js'

export interface StateStoreOptions<K, A> {
  /** Names the spill storage, must be unique per executor */
  name: string
  /** Maximum number of resident entries */
  capacity: number
  /** Default accumulator returned by `get` for absent entries */
  create: () => A
  /** Folds an accumulator relocated by a window merge into the target's */
  combine: (target: A, moved: A) => A
  storage?: SpillStorageFactory
  serializer?: Serializer<A>
  keyCodec?: (key: K) => string
  debug?: boolean | Logger
}

type Entry<K, A> =
  | { state: 'resident'; key: K; window: Window; value: A }
  | { state: 'spilled'; key: K; window: Window }

interface SpillRecord {
  address: string
  checksum: number
  payload: string
}

/**
 * Accumulators addressed by (window, key), at most `capacity` of them held in
 * memory. The least recently used entry is written to spill storage when the
 * capacity is exceeded, and read back transparently on its next access.
 */
export class StateStore<K, A> {
  readonly name: string
  readonly capacity: number

  #create: () => A
  #combine: (target: A, moved: A) => A
  #storageFactory: SpillStorageFactory
  #storage: SpillStorage | undefined
  #serializer: Serializer<A>
  #keyCodec: (key: K) => string
  #log: Logger | undefined

  #entries = new Map<string, Entry<K, A>>()
  // Insertion order is recency order, oldest first
  #resident = new Set<string>()
  #byWindow = new Map<string, Set<string>>()
  #windows = new Map<string, Window>()

  constructor(options: StateStoreOptions<K, A>) {
    if (!Number.isInteger(options.capacity) || options.capacity < 1) {
      throw new Error(`Invalid state capacity: ${options.capacity}`)
    }
    this.name = options.name
    this.capacity = options.capacity
    this.#create = options.create
    this.#combine = options.combine
    this.#storageFactory = options.storage ?? memorySpillStorage
    this.#serializer = options.serializer ?? jsonSerializer<A>()
    this.#keyCodec = options.keyCodec ?? encodeKey
    this.#log = resolveLogger(options.debug)
  }

  keyId(key: K): string {
    return this.#keyCodec(key)
  }

  get size(): number {
    return this.#entries.size
  }

  get residentCount(): number {
    return this.#resident.size
  }

  get spilledCount(): number {
    return this.#entries.size - this.#resident.size
  }

  has(key: K, window: Window): boolean {
    return this.#entries.has(this.#address(key, window))
  }

  /**
   * Returns the accumulator for `key` in `window`, restoring it from spill
   * storage if needed. An absent entry yields a fresh default accumulator,
   * which is only stored once `put`.
   *
   * @throws StateCorruptionError if a spilled entry cannot be restored; the
   * entry is dropped
   * @throws SpillIOError if the spill storage fails
   * @throws StateSerializationError if the entry pushed out cannot be
   * serialized
   */
  get(key: K, window: Window): A {
    const address = this.#address(key, window)
    const entry = this.#entries.get(address)
    if (!entry) return this.#create()
    if (entry.state === 'resident') {
      this.#touch(address)
      return entry.value
    }
    const value = this.#restore(address, entry.key, entry.window)
    this.#evict(address)
    return value
  }

  put(key: K, window: Window, value: A): void {
    const address = this.#address(key, window)
    const previous = this.#entries.get(address)
    if (previous?.state === 'spilled') {
      this.#deleteSpilled(address)
    }
    this.#entries.set(address, { state: 'resident', key, window, value })
    this.#touch(address)
    this.#index(address, window)
    this.#evict(address)
  }

  remove(key: K, window: Window): void {
    const address = this.#address(key, window)
    const entry = this.#entries.get(address)
    if (!entry) return
    this.#drop(address, entry.window)
    if (entry.state === 'spilled') {
      this.#deleteSpilled(address)
    }
  }

  /**
   * Returns and removes the accumulator for `key` in `window`.
   */
  take(key: K, window: Window): A | undefined {
    const address = this.#address(key, window)
    const entry = this.#entries.get(address)
    if (!entry) return undefined
    if (entry.state === 'resident') {
      this.#drop(address, entry.window)
      return entry.value
    }
    const value = this.#restore(address, entry.key, entry.window)
    this.#drop(address, entry.window)
    return value
  }

  /**
   * Keys holding state in `window`, resident or spilled.
   */
  keys(window: Window): K[] {
    const addresses = this.#byWindow.get(window.id)
    if (!addresses) return []
    const keys: K[] = []
    for (const address of addresses) {
      const entry = this.#entries.get(address)
      if (entry) keys.push(entry.key)
    }
    return keys
  }

  /**
   * Lazily yields `[key, accumulator]` for every entry in `window`. Entries
   * are read as the sequence advances, so spilled ones are restored one at a
   * time.
   */
  *forEachInWindow(window: Window): Generator<[K, A]> {
    for (const key of this.keys(window)) {
      if (this.has(key, window)) {
        yield [key, this.get(key, window)]
      }
    }
  }

  /**
   * Windows holding any state, in window order.
   */
  windows(): Window[] {
    return [...this.#windows.values()].sort((a, b) => a.compareTo(b))
  }

  /**
   * Moves state under `source` into `target`, combining with state already
   * present there, and removes the source entries. With `key` only that
   * key's entry moves.
   */
  relocate(source: Window, target: Window, key?: K): void {
    if (source.equals(target)) return
    const keys = key === undefined ? this.keys(source) : [key]
    for (const k of keys) {
      const moved = this.take(k, source)
      if (moved === undefined) continue
      this.put(
        k,
        target,
        this.has(k, target) ? this.#combine(this.get(k, target), moved) : moved,
      )
    }
    this.#log?.(`state ${this.name}: relocated ${source.id} -> ${target.id}`)
  }

  clear(): void {
    this.#entries.clear()
    this.#resident.clear()
    this.#byWindow.clear()
    this.#windows.clear()
    if (this.#storage) {
      const storage = this.#storage
      this.#io('clear', undefined, () => storage.clear())
    }
  }

  #address(key: K, window: Window): string {
    return JSON.stringify([window.id, this.#keyCodec(key)])
  }

  #touch(address: string): void {
    this.#resident.delete(address)
    this.#resident.add(address)
  }

  #index(address: string, window: Window): void {
    let addresses = this.#byWindow.get(window.id)
    if (!addresses) {
      addresses = new Set()
      this.#byWindow.set(window.id, addresses)
      this.#windows.set(window.id, window)
    }
    addresses.add(address)
  }

  #drop(address: string, window: Window): void {
    this.#entries.delete(address)
    this.#resident.delete(address)
    const addresses = this.#byWindow.get(window.id)
    if (addresses) {
      addresses.delete(address)
      if (addresses.size === 0) {
        this.#byWindow.delete(window.id)
        this.#windows.delete(window.id)
      }
    }
  }

  #evict(protect: string): void {
    for (const address of this.#resident) {
      if (this.#resident.size <= this.capacity) return
      if (address === protect) continue
      this.#spill(address)
    }
  }

  #spill(address: string): void {
    const entry = this.#entries.get(address)
    if (entry?.state !== 'resident') return

    let serialized: Uint8Array
    try {
      serialized = this.#serializer.serialize(entry.value)
    } catch (error) {
      throw new StateSerializationError(address, error)
    }
    const payload = Buffer.from(serialized).toString('base64')
    const record: SpillRecord = {
      address,
      checksum: murmurhash.murmur3(payload),
      payload,
    }
    const bytes = encodeText(JSON.stringify(record))
    const storage = this.#openStorage()
    this.#io('write', address, () => storage.write(address, bytes))

    this.#resident.delete(address)
    this.#entries.set(address, {
      state: 'spilled',
      key: entry.key,
      window: entry.window,
    })
    this.#log?.(`state ${this.name}: spilled ${address}`)
  }

  #restore(address: string, key: K, window: Window): A {
    const storage = this.#openStorage()
    const bytes = this.#io('read', address, () => storage.read(address))

    let value: A
    try {
      if (bytes === undefined) {
        throw new Error('missing from spill storage')
      }
      value = this.#decode(address, bytes)
    } catch (error) {
      this.#drop(address, window)
      this.#io('delete', address, () => storage.delete(address))
      throw new StateCorruptionError(
        address,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      )
    }

    this.#io('delete', address, () => storage.delete(address))
    this.#entries.set(address, { state: 'resident', key, window, value })
    this.#touch(address)
    this.#log?.(`state ${this.name}: restored ${address}`)
    return value
  }

  #decode(address: string, bytes: Uint8Array): A {
    const record: unknown = JSON.parse(decodeText(bytes))
    if (!isSpillRecord(record)) {
      throw new Error('malformed spill record')
    }
    if (record.address !== address) {
      throw new Error(`record belongs to ${record.address}`)
    }
    if (murmurhash.murmur3(record.payload) !== record.checksum) {
      throw new Error('checksum mismatch')
    }
    return this.#serializer.deserialize(
      new Uint8Array(Buffer.from(record.payload, 'base64')),
    )
  }

  #deleteSpilled(address: string): void {
    const storage = this.#openStorage()
    this.#io('delete', address, () => storage.delete(address))
  }

  #openStorage(): SpillStorage {
    if (!this.#storage) {
      this.#storage = this.#storageFactory(this.name)
    }
    return this.#storage
  }

  #io<R>(
    operation: SpillIOError['operation'],
    address: string | undefined,
    fn: () => R,
  ): R {
    try {
      return fn()
    } catch (error) {
      throw new SpillIOError(operation, address, error)
    }
  }
}

function isSpillRecord(value: unknown): value is SpillRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'address' in value &&
    typeof value.address === 'string' &&
    'checksum' in value &&
    typeof value.checksum === 'number' &&
    'payload' in value &&
    typeof value.payload === 'string'
  )
}
