import type { KeyValue } from '../../types.js'
import { WindowingEngine } from '../../windowing/engine.js'
import {
  MessageType,
  StreamReader,
  StreamWriter,
  UnaryOperator,
} from '../graph.js'
import { LocalStream } from '../local-graph.js'

/**
 * Operator that feeds its input through a windowing engine and emits the
 * results of every window the watermark completes.
 */
export class ReduceStateOperator<T, K, V, A, O> extends UnaryOperator<
  T,
  KeyValue<K, O>
> {
  #engine: WindowingEngine<T, K, V, A, O>

  constructor(
    id: string,
    input: StreamReader<T>,
    output: StreamWriter<KeyValue<K, O>>,
    engine: WindowingEngine<T, K, V, A, O>,
  ) {
    super(id, input, output)
    this.#engine = engine
  }

  get engine(): WindowingEngine<T, K, V, A, O> {
    return this.#engine
  }

  run(): void {
    for (const message of this.inputMessages()) {
      if (message.type === MessageType.DATA) {
        for (const element of message.data) {
          this.#engine.process(element)
        }
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    this.forwardWatermark((watermark) => {
      this.output.sendData(this.#engine.advanceWatermark(watermark))
    })
  }
}

export function reduceState<T, K, V, A, O>(
  input: LocalStream<T>,
  engine: WindowingEngine<T, K, V, A, O>,
): LocalStream<KeyValue<K, O>> {
  const output = new LocalStream<KeyValue<K, O>>(
    input.graph,
    new StreamWriter<KeyValue<K, O>>(),
  )
  const operator = new ReduceStateOperator<T, K, V, A, O>(
    input.graph.getNextOperatorId(),
    input.connectReader(),
    output.writer,
    engine,
  )
  input.graph.addOperator(operator)
  return output
}
