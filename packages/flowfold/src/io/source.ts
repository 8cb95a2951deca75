export type SourceEvent<T> =
  | { type: 'element'; value: T; timestamp?: number }
  | { type: 'watermark'; timestamp: number }

/**
 * Supplies the elements of a flow input. Elements without a timestamp get 0.
 * A bounded source is followed by a final watermark of +∞ once exhausted.
 */
export interface DataSource<T> {
  readonly bounded: boolean
  events(): Iterable<SourceEvent<T>>
  /** Number of elements if known up front */
  size(): number | undefined
}

export class ListDataSource<T> implements DataSource<T> {
  #events: readonly SourceEvent<T>[]
  readonly bounded: boolean

  constructor(events: readonly SourceEvent<T>[], bounded = true) {
    this.#events = events
    this.bounded = bounded
  }

  static bounded<T>(values: Iterable<T>): ListDataSource<T> {
    return new ListDataSource(
      Array.from(values, (value) => ({ type: 'element' as const, value })),
    )
  }

  /**
   * Elements carrying event timestamps. No watermarks are emitted before the
   * final one.
   */
  static timestamped<T>(
    pairs: Iterable<readonly [T, number]>,
  ): ListDataSource<T> {
    const events: SourceEvent<T>[] = []
    for (const [value, timestamp] of pairs) {
      events.push({ type: 'element', value, timestamp })
    }
    return new ListDataSource(events)
  }

  static of<T>(
    events: readonly SourceEvent<T>[],
    options: { bounded?: boolean } = {},
  ): ListDataSource<T> {
    return new ListDataSource(events, options.bounded ?? true)
  }

  *events(): Iterable<SourceEvent<T>> {
    yield* this.#events
  }

  size(): number | undefined {
    return this.#events.filter((event) => event.type === 'element').length
  }
}
