import type { WindowedElement } from '../types.js'
import { GlobalWindow, TimeInterval, Window, WindowMerge } from './window.js'

/**
 * A strategy that assigns each element a statically derivable set of windows.
 */
export interface NonMergingWindowing<T, W extends Window = Window> {
  readonly merging: false
  assignWindows(element: WindowedElement<T>): W[]
}

/**
 * A strategy whose provisional windows may later have to be unified, such as
 * session windows.
 */
export interface MergingWindowing<T, W extends Window = Window> {
  readonly merging: true
  assignWindows(element: WindowedElement<T>): W[]
  /**
   * Inspects the currently open windows of a key and returns the merges to
   * apply. Every source window must be one of `windows`.
   */
  mergeWindows(windows: readonly W[]): WindowMerge<W>[]
}

export type Windowing<T, W extends Window = Window> =
  | NonMergingWindowing<T, W>
  | MergingWindowing<T, W>

/**
 * Places every element into the single global window.
 */
export class GlobalWindowing implements NonMergingWindowing<unknown, GlobalWindow> {
  readonly merging = false

  assignWindows(): GlobalWindow[] {
    return [GlobalWindow.INSTANCE]
  }
}

/**
 * Keeps the window an element was already assigned upstream. Keyed operators
 * without an explicit windowing use this.
 */
export class AttachedWindowing implements NonMergingWindowing<unknown> {
  readonly merging = false

  assignWindows(element: WindowedElement<unknown>): Window[] {
    return [element.window]
  }
}

/**
 * Fixed, non overlapping windows of `duration` aligned to `offset`.
 */
export class TimeWindowing implements NonMergingWindowing<unknown, TimeInterval> {
  readonly merging = false

  constructor(
    readonly duration: number,
    readonly offset = 0,
  ) {
    if (!(duration > 0)) {
      throw new Error(`Window duration must be positive, got ${duration}`)
    }
  }

  assignWindows(element: WindowedElement<unknown>): TimeInterval[] {
    const start = alignedStart(element.timestamp, this.duration, this.offset)
    return [new TimeInterval(start, start + this.duration)]
  }
}

/**
 * Overlapping windows of `duration` starting every `slide`. An element
 * belongs to every window whose interval contains its timestamp.
 */
export class SlidingTimeWindowing
  implements NonMergingWindowing<unknown, TimeInterval>
{
  readonly merging = false

  constructor(
    readonly duration: number,
    readonly slide: number,
  ) {
    if (!(duration > 0) || !(slide > 0)) {
      throw new Error(
        `Sliding window duration and slide must be positive, got ${duration}/${slide}`,
      )
    }
    if (duration % slide !== 0) {
      throw new Error(
        `Sliding window duration ${duration} is not a multiple of slide ${slide}`,
      )
    }
  }

  assignWindows(element: WindowedElement<unknown>): TimeInterval[] {
    const windows: TimeInterval[] = []
    const lastStart = alignedStart(element.timestamp, this.slide, 0)
    for (
      let start = lastStart;
      start > element.timestamp - this.duration;
      start -= this.slide
    ) {
      windows.push(new TimeInterval(start, start + this.duration))
    }
    return windows.reverse()
  }
}

/**
 * Session windows: each element opens `[timestamp, timestamp + gap)` and
 * overlapping sessions of the same key merge into their span.
 */
export class SessionWindowing implements MergingWindowing<unknown, TimeInterval> {
  readonly merging = true

  constructor(readonly gap: number) {
    if (!(gap > 0)) {
      throw new Error(`Session gap must be positive, got ${gap}`)
    }
  }

  assignWindows(element: WindowedElement<unknown>): TimeInterval[] {
    return [new TimeInterval(element.timestamp, element.timestamp + this.gap)]
  }

  mergeWindows(windows: readonly TimeInterval[]): WindowMerge<TimeInterval>[] {
    return mergeOverlapping(windows)
  }
}

/**
 * Groups intervals into clusters of transitively overlapping intervals and
 * returns a merge into the covering span for every cluster of two or more.
 */
export function mergeOverlapping(
  windows: readonly TimeInterval[],
): WindowMerge<TimeInterval>[] {
  const sorted = [...windows].sort((a, b) => a.compareTo(b))
  const merges: WindowMerge<TimeInterval>[] = []

  let cluster: TimeInterval[] = []
  let span: TimeInterval | null = null

  const close = () => {
    if (span && cluster.length > 1) {
      merges.push({ sources: cluster, target: span })
    }
  }

  for (const window of sorted) {
    if (span && span.intersects(window)) {
      cluster.push(window)
      span = span.cover(window)
    } else {
      close()
      cluster = [window]
      span = window
    }
  }
  close()

  return merges
}

export function isMergingWindowing<T, W extends Window>(
  windowing: Windowing<T, W>,
): windowing is MergingWindowing<T, W> {
  return windowing.merging
}

function alignedStart(timestamp: number, size: number, offset: number): number {
  const shifted = timestamp - offset
  return timestamp - (((shifted % size) + size) % size)
}
