import { compareNumbers } from '../utils.js'

/**
 * Identity of a group of elements bounded in time.
 *
 * Two windows with the same `id` are the same window. A window is complete,
 * and may fire, once the watermark has reached its `end`.
 */
export abstract class Window {
  abstract readonly id: string
  abstract readonly start: number
  abstract readonly end: number

  /**
   * Timestamp given to results emitted for this window
   */
  abstract maxTimestamp(): number

  equals(other: Window): boolean {
    return this.id === other.id
  }

  compareTo(other: Window): number {
    return (
      compareNumbers(this.start, other.start) ||
      compareNumbers(this.end, other.end) ||
      (this.id < other.id ? -1 : this.id > other.id ? 1 : 0)
    )
  }

  toString(): string {
    return this.id
  }
}

/**
 * The single window spanning all of time. It only completes at watermark +∞.
 */
export class GlobalWindow extends Window {
  static readonly INSTANCE = new GlobalWindow()

  readonly id = 'global'
  readonly start = -Infinity
  readonly end = Infinity

  private constructor() {
    super()
  }

  maxTimestamp(): number {
    return Number.MAX_SAFE_INTEGER
  }
}

/**
 * A half open time interval `[start, end)`.
 */
export class TimeInterval extends Window {
  readonly id: string

  constructor(
    readonly start: number,
    readonly end: number,
  ) {
    super()
    if (!(end > start)) {
      throw new Error(`Invalid time interval [${start}, ${end})`)
    }
    this.id = `[${start},${end})`
  }

  maxTimestamp(): number {
    return this.end - 1
  }

  get duration(): number {
    return this.end - this.start
  }

  contains(timestamp: number): boolean {
    return timestamp >= this.start && timestamp < this.end
  }

  intersects(other: TimeInterval): boolean {
    return this.start < other.end && other.start < this.end
  }

  /**
   * The smallest interval covering both this and the other interval
   */
  cover(other: TimeInterval): TimeInterval {
    return new TimeInterval(
      Math.min(this.start, other.start),
      Math.max(this.end, other.end),
    )
  }
}

/**
 * Instruction to collapse every source window into the target window.
 * The target may itself be one of the sources.
 */
export interface WindowMerge<W extends Window = Window> {
  readonly sources: readonly W[]
  readonly target: W
}
