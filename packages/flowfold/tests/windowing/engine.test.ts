import { describe, test, expect } from 'vitest'
import {
  KeyedStateError,
  MergeConsistencyError,
  StateCorruptionError,
} from '../../src/errors.js'
import { MemorySpillStorage } from '../../src/state/spill.js'
import { reducingState } from '../../src/state/state-spec.js'
import { StateStore } from '../../src/state/state-store.js'
import { GlobalWindow, TimeInterval } from '../../src/windowing/window.js'
import { WindowingEngine } from '../../src/windowing/engine.js'
import {
  GlobalWindowing,
  MergingWindowing,
  SessionWindowing,
  TimeWindowing,
  Windowing,
} from '../../src/windowing/windowing.js'
import type { WindowedElement } from '../../src/types.js'

type Event = [key: string, value: number]

function sumEngine(
  windowing: Windowing<Event>,
  options: {
    capacity?: number
    storage?: MemorySpillStorage
    onError?: (error: KeyedStateError) => void
  } = {},
) {
  const state = reducingState((a: number, b: number) => a + b)
  const storage = options.storage
  const store = new StateStore<string, number[]>({
    name: 'sum',
    capacity: options.capacity ?? 100,
    create: state.create,
    combine: state.combine,
    storage: storage ? () => storage : undefined,
  })
  return new WindowingEngine({
    windowing,
    keyBy: (event: Event) => event[0],
    valueBy: (event: Event) => event[1],
    state,
    store,
    onError: options.onError,
  })
}

function event(
  key: string,
  value: number,
  timestamp: number,
): WindowedElement<Event> {
  return { element: [key, value], timestamp, window: GlobalWindow.INSTANCE }
}

const results = (output: WindowedElement<[string, number]>[]) =>
  output.map(({ element, timestamp, window }) => [
    element,
    timestamp,
    window.id,
  ])

describe('WindowingEngine', () => {
  test('emits fixed windows as the watermark completes them', () => {
    const engine = sumEngine(new TimeWindowing(1000))
    engine.process(event('a', 1, 100))
    engine.process(event('a', 2, 900))
    engine.process(event('b', 5, 1500))

    expect(results(engine.advanceWatermark(1000))).toEqual([
      [['a', 3], 999, '[0,1000)'],
    ])
    expect(engine.watermark).toBe(1000)
    expect(results(engine.flush())).toEqual([[['b', 5], 1999, '[1000,2000)']])
    expect(engine.store.size).toBe(0)
  })

  test('ignores a watermark that does not advance', () => {
    const engine = sumEngine(new TimeWindowing(1000))
    engine.advanceWatermark(1000)
    engine.process(event('a', 1, 1200))
    expect(engine.advanceWatermark(500)).toEqual([])
    expect(engine.watermark).toBe(1000)
  })

  test('drops elements whose windows are already complete', () => {
    const engine = sumEngine(new TimeWindowing(1000))
    engine.advanceWatermark(2000)
    engine.process(event('a', 1, 500))
    expect(engine.lateCount).toBe(1)
    expect(engine.store.size).toBe(0)
    expect(engine.flush()).toEqual([])
  })

  test('the global window fires only at +∞', () => {
    const engine = sumEngine(new GlobalWindowing())
    engine.process(event('a', 1, 0))
    engine.process(event('a', 2, 10_000))
    expect(engine.advanceWatermark(1e12)).toEqual([])
    expect(engine.flush().map(({ element }) => element)).toEqual([['a', 3]])
  })

  test('assign returns every candidate window', () => {
    const engine = sumEngine(new TimeWindowing(1000))
    const assigned = engine.assign(event('a', 1, 1500))
    expect(assigned.windows.map((w) => w.id)).toEqual(['[1000,2000)'])
    expect(assigned.element).toEqual(['a', 1])
  })

  describe('session windows', () => {
    test('merges overlapping sessions of a key', () => {
      const engine = sumEngine(new SessionWindowing(100))
      engine.process(event('k', 1, 0))
      engine.process(event('k', 2, 50))
      engine.process(event('k', 4, 300))

      expect(engine.trackedWindows('k').map((w) => w.id)).toEqual([
        '[0,150)',
        '[300,400)',
      ])
      expect(results(engine.flush())).toEqual([
        [['k', 3], 149, '[0,150)'],
        [['k', 4], 399, '[300,400)'],
      ])
      expect(engine.trackedWindows('k')).toEqual([])
    })

    test('extends a merged session again', () => {
      const engine = sumEngine(new SessionWindowing(100))
      engine.process(event('k', 1, 0))
      engine.process(event('k', 2, 50))
      engine.process(event('k', 4, 120))
      expect(results(engine.flush())).toEqual([[['k', 7], 219, '[0,220)']])
    })

    test('a bridging element merges two sessions', () => {
      const engine = sumEngine(new SessionWindowing(100))
      engine.process(event('k', 1, 0))
      engine.process(event('k', 2, 150))
      engine.process(event('k', 4, 80))
      expect(engine.store.windows().map((w) => w.id)).toEqual(['[0,250)'])
      expect(results(engine.flush())).toEqual([[['k', 7], 249, '[0,250)']])
    })

    test('keys are merged independently', () => {
      const engine = sumEngine(new SessionWindowing(100))
      engine.process(event('u', 1, 0))
      engine.process(event('v', 1, 60))
      engine.process(event('u', 1, 50))
      expect(results(engine.flush())).toEqual([
        [['u', 2], 149, '[0,150)'],
        [['v', 1], 159, '[60,160)'],
      ])
    })
  })

  describe('merge consistency', () => {
    // Reports a merge from a window that was never opened
    const rogue: MergingWindowing<Event, TimeInterval> = {
      merging: true,
      assignWindows: (element) => [
        new TimeInterval(element.timestamp, element.timestamp + 10),
      ],
      mergeWindows: (windows) => [
        {
          sources: [...windows, new TimeInterval(1000, 2000)],
          target: new TimeInterval(0, 2000),
        },
      ],
    }

    test('throws before touching state', () => {
      const engine = sumEngine(rogue)
      expect(() => engine.process(event('a', 1, 0))).toThrow(
        MergeConsistencyError,
      )
      expect(engine.store.size).toBe(0)
      expect(engine.trackedWindows('a')).toEqual([])
    })

    test('reports to the error handler when one is given', () => {
      const errors: KeyedStateError[] = []
      const engine = sumEngine(rogue, { onError: (e) => errors.push(e) })
      engine.process(event('a', 1, 0))
      expect(errors).toHaveLength(1)
      const [error] = errors
      expect(error).toBeInstanceOf(MergeConsistencyError)
      if (error instanceof MergeConsistencyError) {
        expect(error.key).toBe('a')
        expect(error.window.id).toBe('[1000,2000)')
      }
    })
  })

  test('a corrupt spilled entry fails its key only', () => {
    const storage = new MemorySpillStorage()
    const errors: KeyedStateError[] = []
    const engine = sumEngine(new GlobalWindowing(), {
      capacity: 1,
      storage,
      onError: (e) => errors.push(e),
    })
    engine.process(event('a', 1, 0))
    engine.process(event('b', 2, 0))
    expect(storage.size).toBe(1)

    const [address] = storage.addresses()
    storage.write(address, new Uint8Array([1, 2, 3]))

    expect(engine.flush().map(({ element }) => element)).toEqual([['b', 2]])
    expect(errors).toHaveLength(1)
    expect(errors[0]).toBeInstanceOf(StateCorruptionError)
    expect(storage.size).toBe(0)
  })
})
