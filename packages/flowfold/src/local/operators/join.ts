import { joinGroups, JoinType } from '../../operators/join.js'
import type {
  BinaryFunction,
  Comparator,
  KeyValue,
  UnaryFunction,
  WindowedElement,
} from '../../types.js'
import { DefaultMap, encodeKey } from '../../utils.js'
import type { Window } from '../../windowing/window.js'
import {
  BinaryOperator,
  MessageType,
  StreamReader,
  StreamWriter,
} from '../graph.js'
import { LocalStream } from '../local-graph.js'

export interface JoinOptions<L, R, K, O> {
  type: JoinType
  leftKey: UnaryFunction<L, K>
  rightKey: UnaryFunction<R, K>
  joiner: BinaryFunction<L | undefined, R | undefined, O>
}

interface WindowBuffer<L, R> {
  window: Window
  left: L[]
  right: R[]
}

/**
 * Buffers both inputs per window and joins a window once the watermark
 * completes it.
 */
abstract class BufferedJoinOperator<L, R, K, O> extends BinaryOperator<
  L,
  R,
  KeyValue<K, O>
> {
  protected options: JoinOptions<L, R, K, O>
  #buffers = new Map<string, WindowBuffer<L, R>>()

  constructor(
    id: string,
    inputA: StreamReader<L>,
    inputB: StreamReader<R>,
    output: StreamWriter<KeyValue<K, O>>,
    options: JoinOptions<L, R, K, O>,
  ) {
    super(id, inputA, inputB, output)
    this.options = options
  }

  protected abstract joinWindow(left: L[], right: R[]): KeyValue<K, O>[]

  run(): void {
    for (const message of this.inputAMessages()) {
      if (message.type === MessageType.DATA) {
        for (const { element, window } of message.data) {
          this.#buffer(window).left.push(element)
        }
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    for (const message of this.inputBMessages()) {
      if (message.type === MessageType.DATA) {
        for (const { element, window } of message.data) {
          this.#buffer(window).right.push(element)
        }
      } else {
        this.setInputWatermark(1, message.data)
      }
    }
    this.forwardWatermark((watermark) => this.#fire(watermark))
  }

  #buffer(window: Window): WindowBuffer<L, R> {
    let buffer = this.#buffers.get(window.id)
    if (!buffer) {
      buffer = { window, left: [], right: [] }
      this.#buffers.set(window.id, buffer)
    }
    return buffer
  }

  #fire(watermark: number): void {
    const complete = [...this.#buffers.values()]
      .filter(({ window }) => window.end <= watermark)
      .sort((a, b) => a.window.compareTo(b.window))
    const batch: WindowedElement<KeyValue<K, O>>[] = []
    for (const { window, left, right } of complete) {
      this.#buffers.delete(window.id)
      for (const element of this.joinWindow(left, right)) {
        batch.push({ element, timestamp: window.maxTimestamp(), window })
      }
    }
    this.output.sendData(batch)
  }
}

/**
 * Joins by grouping both sides of a window in a hash table keyed by the
 * encoded key. Keys are emitted in order of first appearance.
 */
export class HashJoinOperator<L, R, K, O> extends BufferedJoinOperator<
  L,
  R,
  K,
  O
> {
  protected joinWindow(left: L[], right: R[]): KeyValue<K, O>[] {
    const { type, leftKey, rightKey, joiner } = this.options
    const groups = new Map<string, { key: K; left: L[]; right: R[] }>()
    const group = (key: K) => {
      const id = encodeKey(key)
      let found = groups.get(id)
      if (!found) {
        found = { key, left: [], right: [] }
        groups.set(id, found)
      }
      return found
    }
    for (const value of left) group(leftKey(value)).left.push(value)
    for (const value of right) group(rightKey(value)).right.push(value)

    const results: KeyValue<K, O>[] = []
    for (const { key, ...sides } of groups.values()) {
      for (const joined of joinGroups(type, sides, joiner)) {
        results.push([key, joined])
      }
    }
    return results
  }
}

/**
 * Joins by sorting both sides of a window with the key comparator and
 * merging runs of equal keys. Results are ordered by key.
 */
export class SortMergeJoinOperator<L, R, K, O> extends BufferedJoinOperator<
  L,
  R,
  K,
  O
> {
  #compare: Comparator<K>

  constructor(
    id: string,
    inputA: StreamReader<L>,
    inputB: StreamReader<R>,
    output: StreamWriter<KeyValue<K, O>>,
    options: JoinOptions<L, R, K, O>,
    compare: Comparator<K>,
  ) {
    super(id, inputA, inputB, output, options)
    this.#compare = compare
  }

  protected joinWindow(left: L[], right: R[]): KeyValue<K, O>[] {
    const { type, leftKey, rightKey, joiner } = this.options
    const compare = this.#compare
    const sortedLeft = left
      .map((value): [K, L] => [leftKey(value), value])
      .sort((a, b) => compare(a[0], b[0]))
    const sortedRight = right
      .map((value): [K, R] => [rightKey(value), value])
      .sort((a, b) => compare(a[0], b[0]))

    const results: KeyValue<K, O>[] = []
    const emit = (key: K, l: L[], r: R[]) => {
      for (const joined of joinGroups(type, { left: l, right: r }, joiner)) {
        results.push([key, joined])
      }
    }

    let i = 0
    let j = 0
    while (i < sortedLeft.length || j < sortedRight.length) {
      const order =
        i >= sortedLeft.length
          ? 1
          : j >= sortedRight.length
            ? -1
            : compare(sortedLeft[i][0], sortedRight[j][0])
      const key = order <= 0 ? sortedLeft[i][0] : sortedRight[j][0]
      const l: L[] = []
      const r: R[] = []
      if (order <= 0) {
        while (i < sortedLeft.length && compare(sortedLeft[i][0], key) === 0) {
          l.push(sortedLeft[i++][1])
        }
      }
      if (order >= 0) {
        while (j < sortedRight.length && compare(sortedRight[j][0], key) === 0) {
          r.push(sortedRight[j++][1])
        }
      }
      emit(key, l, r)
    }
    return results
  }
}

/**
 * Joins against a small side that is indexed per window. Elements of the
 * other side are held until the small side's watermark completes their
 * window, then probed against the index.
 */
export class BroadcastHashJoinOperator<L, R, K, O> extends BinaryOperator<
  L,
  R,
  KeyValue<K, O>
> {
  #options: JoinOptions<L, R, K, O>
  #small: 'left' | 'right'
  #leftIndex = new DefaultMap<string, Map<string, L[]>>(() => new Map())
  #rightIndex = new DefaultMap<string, Map<string, R[]>>(() => new Map())
  #pendingLeft: WindowedElement<L>[] = []
  #pendingRight: WindowedElement<R>[] = []

  constructor(
    id: string,
    inputA: StreamReader<L>,
    inputB: StreamReader<R>,
    output: StreamWriter<KeyValue<K, O>>,
    options: JoinOptions<L, R, K, O>,
    small: 'left' | 'right',
  ) {
    super(id, inputA, inputB, output)
    this.#options = options
    this.#small = small
  }

  get #smallWatermark(): number {
    return this.inputWatermarks[this.#small === 'left' ? 0 : 1]
  }

  run(): void {
    const { leftKey, rightKey } = this.#options
    for (const message of this.inputAMessages()) {
      if (message.type === MessageType.DATA) {
        if (this.#small === 'left') {
          for (const { element, window } of message.data) {
            const byKey = this.#leftIndex.get(window.id)
            const id = encodeKey(leftKey(element))
            byKey.set(id, [...(byKey.get(id) ?? []), element])
          }
        } else {
          this.#pendingLeft.push(...message.data)
        }
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    for (const message of this.inputBMessages()) {
      if (message.type === MessageType.DATA) {
        if (this.#small === 'right') {
          for (const { element, window } of message.data) {
            const byKey = this.#rightIndex.get(window.id)
            const id = encodeKey(rightKey(element))
            byKey.set(id, [...(byKey.get(id) ?? []), element])
          }
        } else {
          this.#pendingRight.push(...message.data)
        }
      } else {
        this.setInputWatermark(1, message.data)
      }
    }

    this.#probe()
    this.forwardWatermark()
  }

  #takeReady<T>(pending: WindowedElement<T>[]): {
    ready: WindowedElement<T>[]
    held: WindowedElement<T>[]
  } {
    const watermark = this.#smallWatermark
    const ready: WindowedElement<T>[] = []
    const held: WindowedElement<T>[] = []
    for (const element of pending) {
      if (element.window.end <= watermark) ready.push(element)
      else held.push(element)
    }
    return { ready, held }
  }

  #probe(): void {
    const { type, leftKey, rightKey, joiner } = this.#options
    const batch: WindowedElement<KeyValue<K, O>>[] = []
    const push = (key: K, window: Window, joined: O) =>
      batch.push({ element: [key, joined], timestamp: window.maxTimestamp(), window })

    if (this.#small === 'right') {
      const { ready, held } = this.#takeReady(this.#pendingLeft)
      this.#pendingLeft = held
      for (const { element, window } of ready) {
        const key = leftKey(element)
        const matches = this.#rightIndex.get(window.id).get(encodeKey(key))
        if (matches) {
          for (const right of matches) push(key, window, joiner(element, right))
        } else if (type === 'left') {
          push(key, window, joiner(element, undefined))
        }
      }
    } else {
      const { ready, held } = this.#takeReady(this.#pendingRight)
      this.#pendingRight = held
      for (const { element, window } of ready) {
        const key = rightKey(element)
        const matches = this.#leftIndex.get(window.id).get(encodeKey(key))
        if (matches) {
          for (const left of matches) push(key, window, joiner(left, element))
        } else if (type === 'right') {
          push(key, window, joiner(undefined, element))
        }
      }
    }
    if (batch.length > 0) this.output.sendData(batch)
  }
}

function joinOutput<L, R, K, O>(
  left: LocalStream<L>,
  right: LocalStream<R>,
): LocalStream<KeyValue<K, O>> {
  if (left.graph !== right.graph) {
    throw new Error('Cannot join streams from different graphs')
  }
  return new LocalStream<KeyValue<K, O>>(
    left.graph,
    new StreamWriter<KeyValue<K, O>>(),
  )
}

export function hashJoin<L, R, K, O>(
  left: LocalStream<L>,
  right: LocalStream<R>,
  options: JoinOptions<L, R, K, O>,
): LocalStream<KeyValue<K, O>> {
  const output = joinOutput<L, R, K, O>(left, right)
  const operator = new HashJoinOperator<L, R, K, O>(
    left.graph.getNextOperatorId(),
    left.connectReader(),
    right.connectReader(),
    output.writer,
    options,
  )
  left.graph.addOperator(operator)
  return output
}

export function sortMergeJoin<L, R, K, O>(
  left: LocalStream<L>,
  right: LocalStream<R>,
  options: JoinOptions<L, R, K, O>,
  compare: Comparator<K>,
): LocalStream<KeyValue<K, O>> {
  const output = joinOutput<L, R, K, O>(left, right)
  const operator = new SortMergeJoinOperator<L, R, K, O>(
    left.graph.getNextOperatorId(),
    left.connectReader(),
    right.connectReader(),
    output.writer,
    options,
    compare,
  )
  left.graph.addOperator(operator)
  return output
}

export function broadcastHashJoin<L, R, K, O>(
  left: LocalStream<L>,
  right: LocalStream<R>,
  options: JoinOptions<L, R, K, O>,
  small: 'left' | 'right',
): LocalStream<KeyValue<K, O>> {
  const output = joinOutput<L, R, K, O>(left, right)
  const operator = new BroadcastHashJoinOperator<L, R, K, O>(
    left.graph.getNextOperatorId(),
    left.connectReader(),
    right.connectReader(),
    output.writer,
    options,
    small,
  )
  left.graph.addOperator(operator)
  return output
}
