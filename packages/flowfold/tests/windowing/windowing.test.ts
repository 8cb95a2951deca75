import { describe, test, expect } from 'vitest'
import type { WindowedElement } from '../../src/types.js'
import { GlobalWindow, TimeInterval } from '../../src/windowing/window.js'
import {
  AttachedWindowing,
  GlobalWindowing,
  mergeOverlapping,
  SessionWindowing,
  SlidingTimeWindowing,
  TimeWindowing,
} from '../../src/windowing/windowing.js'

function at(timestamp: number): WindowedElement<string> {
  return { element: 'x', timestamp, window: GlobalWindow.INSTANCE }
}

const ids = (windows: readonly { id: string }[]) => windows.map((w) => w.id)

describe('TimeWindowing', () => {
  test('assigns the aligned window containing the timestamp', () => {
    const windowing = new TimeWindowing(1000)
    expect(ids(windowing.assignWindows(at(1500)))).toEqual(['[1000,2000)'])
    expect(ids(windowing.assignWindows(at(2000)))).toEqual(['[2000,3000)'])
    expect(ids(windowing.assignWindows(at(-1)))).toEqual(['[-1000,0)'])
  })

  test('is deterministic', () => {
    const windowing = new TimeWindowing(1000)
    expect(ids(windowing.assignWindows(at(42)))).toEqual(
      ids(windowing.assignWindows(at(42))),
    )
  })

  test('rejects a non positive duration', () => {
    expect(() => new TimeWindowing(0)).toThrow()
  })
})

describe('SlidingTimeWindowing', () => {
  test('assigns duration / slide windows', () => {
    const windowing = new SlidingTimeWindowing(1000, 500)
    expect(ids(windowing.assignWindows(at(1200)))).toEqual([
      '[500,1500)',
      '[1000,2000)',
    ])
  })

  test('requires the duration to be a multiple of the slide', () => {
    expect(() => new SlidingTimeWindowing(1000, 300)).toThrow()
  })
})

describe('SessionWindowing', () => {
  test('opens a window of the gap at the timestamp', () => {
    const windowing = new SessionWindowing(100)
    expect(windowing.merging).toBe(true)
    expect(ids(windowing.assignWindows(at(5)))).toEqual(['[5,105)'])
  })
})

describe('GlobalWindowing and AttachedWindowing', () => {
  test('global assigns the global window', () => {
    expect(new GlobalWindowing().assignWindows()).toEqual([
      GlobalWindow.INSTANCE,
    ])
  })

  test('attached keeps the element window', () => {
    const window = new TimeInterval(0, 10)
    expect(
      new AttachedWindowing().assignWindows({
        element: 1,
        timestamp: 3,
        window,
      }),
    ).toEqual([window])
  })
})

describe('mergeOverlapping', () => {
  test('merges clusters of overlapping intervals into their span', () => {
    const merges = mergeOverlapping([
      new TimeInterval(20, 30),
      new TimeInterval(0, 10),
      new TimeInterval(50, 60),
      new TimeInterval(29, 40),
      new TimeInterval(5, 15),
    ])
    expect(
      merges.map(({ sources, target }) => [ids(sources), target.id]),
    ).toEqual([
      [['[0,10)', '[5,15)'], '[0,15)'],
      [['[20,30)', '[29,40)'], '[20,40)'],
    ])
  })

  test('merges transitively', () => {
    const merges = mergeOverlapping([
      new TimeInterval(0, 100),
      new TimeInterval(150, 250),
      new TimeInterval(80, 180),
    ])
    expect(merges).toHaveLength(1)
    expect(ids(merges[0].sources)).toEqual(['[0,100)', '[80,180)', '[150,250)'])
    expect(merges[0].target.id).toBe('[0,250)')
  })

  test('does not merge adjacent intervals', () => {
    expect(
      mergeOverlapping([new TimeInterval(0, 10), new TimeInterval(10, 20)]),
    ).toEqual([])
  })
})
