import { MessageType, Operator, StreamReader, StreamWriter } from '../graph.js'
import { LocalStream } from '../local-graph.js'

/**
 * Operator that forwards the elements of all its inputs
 */
export class UnionOperator<T> extends Operator<T> {
  #inputs: readonly StreamReader<T>[]

  constructor(
    id: string,
    inputs: readonly StreamReader<T>[],
    output: StreamWriter<T>,
  ) {
    super(id, inputs, output)
    this.#inputs = inputs
  }

  run(): void {
    this.#inputs.forEach((input, index) => {
      for (const message of input.drain()) {
        if (message.type === MessageType.DATA) {
          this.output.sendData(message.data)
        } else {
          this.setInputWatermark(index, message.data)
        }
      }
    })
    this.forwardWatermark()
  }
}

export function union<T>(inputs: readonly LocalStream<T>[]): LocalStream<T> {
  const [first] = inputs
  if (!first) {
    throw new Error('Union needs at least one input')
  }
  if (inputs.some((input) => input.graph !== first.graph)) {
    throw new Error('Cannot union streams from different graphs')
  }
  const output = new LocalStream<T>(first.graph, new StreamWriter<T>())
  const operator = new UnionOperator<T>(
    first.graph.getNextOperatorId(),
    inputs.map((input) => input.connectReader()),
    output.writer,
  )
  first.graph.addOperator(operator)
  return output
}
