import { describe, test, expect } from 'vitest'
import {
  SpillIOError,
  StateCorruptionError,
  StateSerializationError,
} from '../../src/errors.js'
import { encodeText, decodeText } from '../../src/state/serializer.js'
import { MemorySpillStorage, SpillStorage } from '../../src/state/spill.js'
import { StateStore } from '../../src/state/state-store.js'
import { TimeInterval } from '../../src/windowing/window.js'

const W1 = new TimeInterval(0, 10)
const W2 = new TimeInterval(5, 20)

function createStore(
  capacity: number,
  storage: SpillStorage = new MemorySpillStorage(),
) {
  return new StateStore<string, number>({
    name: 'test',
    capacity,
    create: () => 0,
    combine: (target, moved) => target + moved,
    storage: () => storage,
  })
}

const address = (key: string, window: TimeInterval) =>
  JSON.stringify([window.id, JSON.stringify(key)])

describe('StateStore', () => {
  test('get returns a fresh default without storing it', () => {
    const store = createStore(2)
    expect(store.get('a', W1)).toBe(0)
    expect(store.size).toBe(0)
    expect(store.has('a', W1)).toBe(false)
  })

  test('spills the least recently used entry beyond capacity', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(2, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.put('c', W1, 3)

    expect(store.size).toBe(3)
    expect(store.residentCount).toBe(2)
    expect(store.spilledCount).toBe(1)
    expect(storage.addresses()).toEqual([address('a', W1)])
  })

  test('restores spilled entries transparently', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(2, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.put('c', W1, 3)

    expect(store.get('a', W1)).toBe(1)
    // restoring 'a' pushes out the now least recent 'b'
    expect(storage.addresses()).toEqual([address('b', W1)])
    expect(store.residentCount).toBe(2)
    expect(store.get('b', W1)).toBe(2)
    expect(store.get('c', W1)).toBe(3)
  })

  test('access refreshes recency', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(2, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.get('a', W1)
    store.put('c', W1, 3)
    expect(storage.addresses()).toEqual([address('b', W1)])
  })

  test('put over a spilled entry discards the spilled copy', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(1, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.put('a', W1, 10)
    expect(store.get('a', W1)).toBe(10)
    expect(storage.addresses()).toEqual([address('b', W1)])
  })

  test('opens spill storage only on first spill', () => {
    let opened = 0
    const store = new StateStore<string, number>({
      name: 'lazy',
      capacity: 1,
      create: () => 0,
      combine: (a, b) => a + b,
      storage: (name) => {
        opened++
        expect(name).toBe('lazy')
        return new MemorySpillStorage()
      },
    })
    store.put('a', W1, 1)
    expect(opened).toBe(0)
    store.put('b', W1, 1)
    expect(opened).toBe(1)
  })

  test('take returns and removes the entry', () => {
    const store = createStore(1)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    expect(store.take('a', W1)).toBe(1)
    expect(store.take('a', W1)).toBeUndefined()
    expect(store.keys(W1)).toEqual(['b'])
  })

  test('remove deletes resident and spilled entries', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(1, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.remove('a', W1)
    store.remove('b', W1)
    expect(store.size).toBe(0)
    expect(storage.size).toBe(0)
    expect(store.windows()).toEqual([])
  })

  test('forEachInWindow yields every entry of the window', () => {
    const store = createStore(1)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.put('a', W2, 3)
    expect([...store.forEachInWindow(W1)]).toEqual([
      ['a', 1],
      ['b', 2],
    ])
    expect([...store.forEachInWindow(new TimeInterval(50, 60))]).toEqual([])
  })

  test('windows are listed in window order', () => {
    const store = createStore(10)
    store.put('a', W2, 1)
    store.put('a', W1, 1)
    expect(store.windows().map((w) => w.id)).toEqual(['[0,10)', '[5,20)'])
  })

  describe('relocate', () => {
    test('moves every key, combining with existing target state', () => {
      const store = createStore(10)
      store.put('a', W1, 1)
      store.put('b', W1, 2)
      store.put('a', W2, 10)
      store.relocate(W1, W2)

      expect(store.keys(W1)).toEqual([])
      expect(store.get('a', W2)).toBe(11)
      expect(store.get('b', W2)).toBe(2)
      expect(store.windows()).toEqual([W2])
    })

    test('moves a single key', () => {
      const store = createStore(10)
      store.put('a', W1, 1)
      store.put('b', W1, 2)
      store.relocate(W1, W2, 'a')
      expect(store.keys(W1)).toEqual(['b'])
      expect(store.keys(W2)).toEqual(['a'])
    })

    test('moves spilled entries', () => {
      const store = createStore(1)
      store.put('a', W1, 1)
      store.put('b', W1, 2)
      store.relocate(W1, W2, 'a')
      expect(store.get('a', W2)).toBe(1)
    })

    test('is a no-op onto the same window', () => {
      const store = createStore(10)
      store.put('a', W1, 1)
      store.relocate(W1, new TimeInterval(0, 10))
      expect(store.get('a', W1)).toBe(1)
    })
  })

  describe('corruption', () => {
    function spilledStore() {
      const storage = new MemorySpillStorage()
      const store = createStore(1, storage)
      store.put('a', W1, 1)
      store.put('b', W1, 2)
      return { storage, store }
    }

    function rewrite(
      storage: MemorySpillStorage,
      at: string,
      change: (record: Record<string, unknown>) => void,
    ) {
      const bytes = storage.read(at)
      if (!bytes) throw new Error(`nothing stored at ${at}`)
      const record: Record<string, unknown> = JSON.parse(decodeText(bytes))
      change(record)
      storage.write(at, encodeText(JSON.stringify(record)))
    }

    test('a checksum mismatch drops the entry', () => {
      const { storage, store } = spilledStore()
      rewrite(storage, address('a', W1), (record) => {
        record.payload = Buffer.from('5').toString('base64')
      })

      expect(() => store.get('a', W1)).toThrow(StateCorruptionError)
      expect(store.has('a', W1)).toBe(false)
      expect(store.size).toBe(1)
      expect(storage.size).toBe(0)
    })

    test('a record stored under another address is rejected', () => {
      const { storage, store } = spilledStore()
      rewrite(storage, address('a', W1), (record) => {
        record.address = address('z', W1)
      })
      expect(() => store.take('a', W1)).toThrow(/record belongs to/)
    })

    test('a missing record is reported as corruption', () => {
      const { storage, store } = spilledStore()
      storage.delete(address('a', W1))
      try {
        store.get('a', W1)
        expect.unreachable()
      } catch (error) {
        expect(error).toBeInstanceOf(StateCorruptionError)
        if (error instanceof StateCorruptionError) {
          expect(error.address).toBe(address('a', W1))
        }
      }
      expect(store.keys(W1)).toEqual(['b'])
    })
  })

  test('restores accumulators holding dates and bigints', () => {
    const store = new StateStore<string, { last: Date; total: bigint }>({
      name: 'typed',
      capacity: 1,
      create: () => ({ last: new Date(0), total: 0n }),
      combine: (target, moved) => ({
        last: moved.last > target.last ? moved.last : target.last,
        total: target.total + moved.total,
      }),
    })
    store.put('a', W1, { last: new Date(5), total: 7n })
    store.put('b', W1, { last: new Date(6), total: 8n })
    expect(store.spilledCount).toBe(1)

    const restored = store.get('a', W1)
    expect(restored.last).toBeInstanceOf(Date)
    expect(restored.last.getTime()).toBe(5)
    expect(restored.total).toBe(7n)
  })

  test('an accumulator that cannot be serialized stays resident', () => {
    const store = new StateStore<string, unknown>({
      name: 'fn',
      capacity: 1,
      create: () => undefined,
      combine: (target) => target,
    })
    const fn = () => 1
    store.put('a', W1, fn)
    try {
      store.put('b', W1, 2)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(StateSerializationError)
      if (error instanceof StateSerializationError) {
        expect(error.address).toBe(address('a', W1))
        expect(error.message).toBe(
          `Cannot spill state ${address('a', W1)}: Cannot serialize function`,
        )
      }
    }
    expect(store.spilledCount).toBe(0)
    expect(store.get('a', W1)).toBe(fn)
  })

  test('storage failures surface as SpillIOError', () => {
    const failing: SpillStorage = {
      write: () => {
        throw new Error('disk full')
      },
      read: () => undefined,
      delete: () => {},
      clear: () => {},
    }
    const store = createStore(1, failing)
    store.put('a', W1, 1)
    try {
      store.put('b', W1, 2)
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(SpillIOError)
      if (error instanceof SpillIOError) {
        expect(error.operation).toBe('write')
        expect(error.address).toBe(address('a', W1))
        expect(error.message).toBe(
          `Spill write failed for ${address('a', W1)}: disk full`,
        )
      }
    }
    expect(store.get('a', W1)).toBe(1)
  })

  test('clear empties memory and storage', () => {
    const storage = new MemorySpillStorage()
    const store = createStore(1, storage)
    store.put('a', W1, 1)
    store.put('b', W1, 2)
    store.clear()
    expect(store.size).toBe(0)
    expect(storage.size).toBe(0)
  })

  test('rejects an invalid capacity', () => {
    expect(() => createStore(0)).toThrow('Invalid state capacity: 0')
  })
})
