import type { WindowedElement } from '../../types.js'
import { MessageType, StreamWriter, UnaryOperator } from '../graph.js'
import { LocalStream } from '../local-graph.js'

/**
 * Operator that forwards its input once to every consumer and retains the
 * elements it has seen.
 */
export class CacheOperator<T> extends UnaryOperator<T> {
  #elements: WindowedElement<T>[] = []

  run(): void {
    for (const message of this.inputMessages()) {
      if (message.type === MessageType.DATA) {
        this.#elements.push(...message.data)
        this.output.sendData(message.data)
      } else {
        this.setInputWatermark(0, message.data)
      }
    }
    this.forwardWatermark()
  }

  get elements(): readonly WindowedElement<T>[] {
    return this.#elements
  }
}

export function cache<T>(
  input: LocalStream<T>,
): { stream: LocalStream<T>; operator: CacheOperator<T> } {
  const stream = new LocalStream<T>(input.graph, new StreamWriter<T>())
  const operator = new CacheOperator<T>(
    input.graph.getNextOperatorId(),
    input.connectReader(),
    stream.writer,
  )
  input.graph.addOperator(operator)
  return { stream, operator }
}
