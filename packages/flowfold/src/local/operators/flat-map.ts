import type { FlatMapFunction, WindowedElement } from '../../types.js'
import {
  MessageType,
  StreamReader,
  StreamWriter,
  UnaryOperator,
} from '../graph.js'
import { LocalStream } from '../local-graph.js'

/**
 * Operator that applies a flat map function to every element. Outputs keep
 * the window of their input.
 */
export class FlatMapOperator<I, O> extends UnaryOperator<I, O> {
  #fn: FlatMapFunction<I, O>

  constructor(
    id: string,
    input: StreamReader<I>,
    output: StreamWriter<O>,
    fn: FlatMapFunction<I, O>,
  ) {
    super(id, input, output)
    this.#fn = fn
  }

  run(): void {
    for (const message of this.inputMessages()) {
      if (message.type === MessageType.DATA) {
        const batch: WindowedElement<O>[] = []
        for (const { element, timestamp, window } of message.data) {
          this.#fn(element, {
            collect: (value, at) =>
              batch.push({ element: value, timestamp: at ?? timestamp, window }),
          })
        }
        this.output.sendData(batch)
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    this.forwardWatermark()
  }
}

export function flatMap<I, O>(
  input: LocalStream<I>,
  fn: FlatMapFunction<I, O>,
): LocalStream<O> {
  const output = new LocalStream<O>(input.graph, new StreamWriter<O>())
  const operator = new FlatMapOperator<I, O>(
    input.graph.getNextOperatorId(),
    input.connectReader(),
    output.writer,
    fn,
  )
  input.graph.addOperator(operator)
  return output
}
