import type {
  BinaryFunction,
  KeyValue,
  UnaryFunction,
  WindowedElement,
} from '../../types.js'
import { encodeKey } from '../../utils.js'
import type { WindowingEngine } from '../../windowing/engine.js'
import type { Window } from '../../windowing/window.js'
import type { NonMergingWindowing } from '../../windowing/windowing.js'
import {
  MessageType,
  StreamReader,
  StreamWriter,
  UnaryOperator,
} from '../graph.js'
import { LocalStream } from '../local-graph.js'

export interface CombiningReduceOptions<T, K, V> {
  windowing: NonMergingWindowing<T>
  keyBy: UnaryFunction<T, K>
  valueBy: UnaryFunction<T, V>
  reducer: BinaryFunction<V, V, V>
  /** Engine over pre-combined `[key, value]` pairs in their final window */
  engine: WindowingEngine<KeyValue<K, V>, K, V, V[], V>
}

interface PartialResult<K, V> {
  key: K
  value: V
  timestamp: number
  window: Window
}

/**
 * Reduce by key for non merging windowing. Each batch is reduced per
 * (key, window) in memory before the partial results reach keyed state.
 */
export class CombiningReduceOperator<T, K, V> extends UnaryOperator<
  T,
  KeyValue<K, V>
> {
  #options: CombiningReduceOptions<T, K, V>

  constructor(
    id: string,
    input: StreamReader<T>,
    output: StreamWriter<KeyValue<K, V>>,
    options: CombiningReduceOptions<T, K, V>,
  ) {
    super(id, input, output)
    this.#options = options
  }

  get engine(): WindowingEngine<KeyValue<K, V>, K, V, V[], V> {
    return this.#options.engine
  }

  run(): void {
    const { engine } = this.#options
    for (const message of this.inputMessages()) {
      if (message.type === MessageType.DATA) {
        for (const partial of this.#combine(message.data)) {
          engine.process({
            element: [partial.key, partial.value],
            timestamp: partial.timestamp,
            window: partial.window,
          })
        }
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    this.forwardWatermark((watermark) => {
      this.output.sendData(engine.advanceWatermark(watermark))
    })
  }

  #combine(batch: readonly WindowedElement<T>[]): Iterable<PartialResult<K, V>> {
    const { windowing, keyBy, valueBy, reducer } = this.#options
    const partials = new Map<string, PartialResult<K, V>>()
    for (const element of batch) {
      const key = keyBy(element.element)
      const value = valueBy(element.element)
      for (const window of windowing.assignWindows(element)) {
        const address = JSON.stringify([window.id, encodeKey(key)])
        const partial = partials.get(address)
        if (partial) {
          partial.value = reducer(partial.value, value)
          partial.timestamp = Math.max(partial.timestamp, element.timestamp)
        } else {
          partials.set(address, {
            key,
            value,
            timestamp: element.timestamp,
            window,
          })
        }
      }
    }
    return partials.values()
  }
}

export function combiningReduce<T, K, V>(
  input: LocalStream<T>,
  options: CombiningReduceOptions<T, K, V>,
): LocalStream<KeyValue<K, V>> {
  const output = new LocalStream<KeyValue<K, V>>(
    input.graph,
    new StreamWriter<KeyValue<K, V>>(),
  )
  const operator = new CombiningReduceOperator<T, K, V>(
    input.graph.getNextOperatorId(),
    input.connectReader(),
    output.writer,
    options,
  )
  input.graph.addOperator(operator)
  return output
}
