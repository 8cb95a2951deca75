import { KeyedStateError, MergeConsistencyError } from '../errors.js'
import type { StateSpec } from '../state/state-spec.js'
import type { StateStore } from '../state/state-store.js'
import type {
  KeyValue,
  Logger,
  MultiWindowedElement,
  UnaryFunction,
  WindowedElement,
} from '../types.js'
import { resolveLogger } from '../utils.js'
import type { Window } from './window.js'
import { isMergingWindowing, Windowing } from './windowing.js'

export interface WindowingEngineOptions<T, K, V, A, O> {
  windowing: Windowing<T>
  keyBy: UnaryFunction<T, K>
  valueBy: UnaryFunction<T, V>
  state: StateSpec<V, A, O>
  store: StateStore<K, A>
  /**
   * Receives errors confined to one key. Without a handler they are thrown.
   */
  onError?: (error: KeyedStateError) => void
  debug?: boolean | Logger
}

/**
 * Assigns elements to windows, resolves window merges per key, folds values
 * into keyed state and emits the results of windows as the watermark
 * completes them.
 */
export class WindowingEngine<T, K, V, A, O> {
  #windowing: Windowing<T>
  #keyBy: UnaryFunction<T, K>
  #valueBy: UnaryFunction<T, V>
  #state: StateSpec<V, A, O>
  #store: StateStore<K, A>
  #onError: ((error: KeyedStateError) => void) | undefined
  #log: Logger | undefined

  // Open windows of each key, merging strategies only
  #tracked = new Map<string, Map<string, Window>>()
  #watermark = -Infinity
  #late = 0

  constructor(options: WindowingEngineOptions<T, K, V, A, O>) {
    this.#windowing = options.windowing
    this.#keyBy = options.keyBy
    this.#valueBy = options.valueBy
    this.#state = options.state
    this.#store = options.store
    this.#onError = options.onError
    this.#log = resolveLogger(options.debug)
  }

  get watermark(): number {
    return this.#watermark
  }

  /** Number of element windows dropped for arriving behind the watermark */
  get lateCount(): number {
    return this.#late
  }

  get store(): StateStore<K, A> {
    return this.#store
  }

  /**
   * Tracked open windows of a key, for merging strategies
   */
  trackedWindows(key: K): Window[] {
    const tracked = this.#tracked.get(this.#store.keyId(key))
    return tracked
      ? [...tracked.values()].sort((a, b) => a.compareTo(b))
      : []
  }

  assign(element: WindowedElement<T>): MultiWindowedElement<T> {
    return {
      element: element.element,
      timestamp: element.timestamp,
      windows: this.#windowing.assignWindows(element),
    }
  }

  process(element: WindowedElement<T>): void {
    const assigned = this.assign(element)
    const windows = assigned.windows.filter((window) => {
      if (window.end <= this.#watermark) {
        this.#late++
        this.#log?.(
          `late element at ${element.timestamp} for ${window.id}, watermark ${this.#watermark}`,
        )
        return false
      }
      return true
    })
    if (windows.length === 0) return

    const key = this.#keyBy(element.element)
    const value = this.#valueBy(element.element)
    try {
      const resolved = isMergingWindowing(this.#windowing)
        ? this.#resolveMerges(key, windows)
        : windows
      this.accumulate(key, resolved, value)
    } catch (error) {
      this.#report(error)
    }
  }

  /**
   * Folds `value` into the state of `key` in every distinct window.
   */
  accumulate(key: K, windows: readonly Window[], value: V): void {
    const seen = new Set<string>()
    for (const window of windows) {
      if (seen.has(window.id)) continue
      seen.add(window.id)
      const accumulator = this.#store.get(key, window)
      this.#store.put(key, window, this.#state.add(accumulator, value))
    }
  }

  /**
   * Raises the watermark and emits the results of every window whose end it
   * has reached, in window order. A watermark that does not advance is
   * ignored.
   */
  advanceWatermark(watermark: number): WindowedElement<KeyValue<K, O>>[] {
    if (!(watermark > this.#watermark)) return []
    this.#watermark = watermark

    const output: WindowedElement<KeyValue<K, O>>[] = []
    for (const window of this.#store.windows()) {
      if (window.end > watermark) continue
      for (const key of this.#store.keys(window)) {
        try {
          const accumulator = this.#store.take(key, window)
          if (accumulator === undefined) continue
          for (const result of this.#state.flush(accumulator)) {
            output.push({
              element: [key, result],
              timestamp: window.maxTimestamp(),
              window,
            })
          }
        } catch (error) {
          this.#report(error)
        }
      }
      this.#log?.(`fired ${window.id}`)
    }

    for (const [keyId, tracked] of this.#tracked) {
      for (const [id, window] of tracked) {
        if (window.end <= watermark) tracked.delete(id)
      }
      if (tracked.size === 0) this.#tracked.delete(keyId)
    }
    return output
  }

  /**
   * Emits every remaining window, as at watermark +∞.
   */
  flush(): WindowedElement<KeyValue<K, O>>[] {
    return this.advanceWatermark(Infinity)
  }

  #resolveMerges(key: K, windows: readonly Window[]): Window[] {
    if (!isMergingWindowing(this.#windowing)) return [...windows]

    const keyId = this.#store.keyId(key)
    const tracked = this.#tracked.get(keyId) ?? new Map<string, Window>()
    const candidates = new Map(tracked)
    for (const window of windows) candidates.set(window.id, window)

    const merges = this.#windowing.mergeWindows([...candidates.values()])
    for (const merge of merges) {
      for (const source of merge.sources) {
        if (!candidates.has(source.id)) {
          throw new MergeConsistencyError(key, source)
        }
      }
    }

    for (const window of windows) tracked.set(window.id, window)
    const resolution = new Map<string, Window>()
    for (const { sources, target } of merges) {
      for (const source of sources) {
        resolution.set(source.id, target)
        if (source.equals(target)) continue
        this.#store.relocate(source, target, key)
        tracked.delete(source.id)
      }
      tracked.set(target.id, target)
    }
    this.#tracked.set(keyId, tracked)

    return windows.map((window) => resolution.get(window.id) ?? window)
  }

  #report(error: unknown): void {
    if (error instanceof KeyedStateError && this.#onError) {
      this.#onError(error)
      return
    }
    throw error
  }
}
