import type { DataSink } from '../../io/sink.js'
import {
  MessageType,
  StreamReader,
  StreamWriter,
  UnaryOperator,
} from '../graph.js'
import { LocalStream } from '../local-graph.js'

/**
 * Operator that writes the plain values of its input to a sink and commits
 * the sink once the final watermark arrives.
 */
export class SinkOperator<T> extends UnaryOperator<T> {
  #sink: DataSink<T>
  #committed = false

  constructor(
    id: string,
    input: StreamReader<T>,
    output: StreamWriter<T>,
    sink: DataSink<T>,
  ) {
    super(id, input, output)
    this.#sink = sink
  }

  run(): void {
    for (const message of this.inputMessages()) {
      if (message.type === MessageType.DATA) {
        for (const { element } of message.data) {
          this.#sink.write(element)
        }
        this.output.sendData(message.data)
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    this.forwardWatermark((watermark) => {
      if (watermark === Infinity && !this.#committed) {
        this.#committed = true
        this.#sink.commit()
      }
    })
  }
}

export function sink<T>(input: LocalStream<T>, target: DataSink<T>): LocalStream<T> {
  const output = new LocalStream<T>(input.graph, new StreamWriter<T>())
  const operator = new SinkOperator<T>(
    input.graph.getNextOperatorId(),
    input.connectReader(),
    output.writer,
    target,
  )
  input.graph.addOperator(operator)
  return output
}
