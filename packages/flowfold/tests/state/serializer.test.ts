import { describe, test, expect } from 'vitest'
import {
  decodeText,
  jsonSerializer,
} from '../../src/state/serializer.js'

interface Visits {
  first: Date
  total: bigint
  pages: Map<string, number>
}

describe('jsonSerializer', () => {
  test('restores dates, bigints and maps', () => {
    const serializer = jsonSerializer<Visits>()
    const visits: Visits = {
      first: new Date(1000),
      total: 2n ** 64n,
      pages: new Map([['/home', 3]]),
    }

    const restored = serializer.deserialize(serializer.serialize(visits))

    expect(restored.first).toBeInstanceOf(Date)
    expect(restored.first.getTime()).toBe(1000)
    expect(restored.total).toBe(18446744073709551616n)
    expect(restored.pages.get('/home')).toBe(3)
  })

  test('writes plain values as plain JSON', () => {
    const serializer = jsonSerializer<[string, number]>()
    expect(decodeText(serializer.serialize(['a', 1]))).toBe('["a",1]')
  })

  test('rejects values it cannot restore', () => {
    class Counter {
      count = 0
    }
    const serializer = jsonSerializer<unknown>()
    expect(() => serializer.serialize(new Counter())).toThrow(
      'Cannot serialize instance of Counter',
    )
    expect(() => serializer.serialize({ next: () => 1 })).toThrow(
      'Cannot serialize function',
    )
  })

  test('applies the reviver after decoding', () => {
    const serializer = jsonSerializer((value) => Number(value) * 2)
    expect(serializer.deserialize(serializer.serialize(21))).toBe(42)
  })
})
