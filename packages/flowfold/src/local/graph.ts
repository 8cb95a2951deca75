/**
 * Edges and operator base classes of the local streaming graph.
 */

import type { WindowedElement } from '../types.js'

export const MessageType = {
  DATA: 1,
  WATERMARK: 2,
} as const

export type MessageType = (typeof MessageType)[keyof typeof MessageType]

export type Message<T> =
  | {
      type: typeof MessageType.DATA
      data: WindowedElement<T>[]
    }
  | {
      type: typeof MessageType.WATERMARK
      data: number
    }

/**
 * A read handle to a graph edge that receives batches and watermarks from a
 * writer.
 */
export class StreamReader<T> {
  #queue: Message<T>[]

  constructor(queue: Message<T>[]) {
    this.#queue = queue
  }

  drain(): Message<T>[] {
    const out = [...this.#queue].reverse()
    this.#queue.length = 0
    return out
  }

  isEmpty(): boolean {
    return this.#queue.length === 0
  }
}

/**
 * A write handle to a graph edge. Every reader receives every message.
 */
export class StreamWriter<T> {
  #queues: Message<T>[][] = []
  watermark = -Infinity

  sendData(batch: WindowedElement<T>[]): void {
    if (batch.length === 0) return
    for (const q of this.#queues) {
      q.unshift({ type: MessageType.DATA, data: batch })
    }
  }

  sendWatermark(watermark: number): void {
    if (watermark < this.watermark) {
      throw new Error('Invalid watermark')
    }
    this.watermark = watermark
    for (const q of this.#queues) {
      q.unshift({ type: MessageType.WATERMARK, data: watermark })
    }
  }

  newReader(): StreamReader<T> {
    const q: Message<T>[] = []
    this.#queues.push(q)
    return new StreamReader(q)
  }
}

/**
 * A graph node with any number of inputs and one output. The output
 * watermark is the minimum of the input watermarks.
 */
export abstract class Operator<O> {
  protected inputWatermarks: number[]
  protected outputWatermark = -Infinity

  constructor(
    public id: string,
    protected readers: readonly { isEmpty(): boolean }[],
    protected output: StreamWriter<O>,
  ) {
    this.inputWatermarks = readers.map(() => -Infinity)
  }

  abstract run(): void

  hasPendingWork(): boolean {
    return this.readers.some((reader) => !reader.isEmpty())
  }

  protected setInputWatermark(index: number, watermark: number): void {
    if (watermark < this.inputWatermarks[index]) {
      throw new Error('Invalid watermark update')
    }
    this.inputWatermarks[index] = watermark
  }

  protected inputWatermark(): number {
    return Math.min(...this.inputWatermarks)
  }

  /**
   * Forwards the input watermark if it advanced. `beforeSend` runs first,
   * so results it emits precede the watermark.
   */
  protected forwardWatermark(beforeSend?: (watermark: number) => void): void {
    const watermark = this.inputWatermark()
    if (watermark > this.outputWatermark) {
      beforeSend?.(watermark)
      this.outputWatermark = watermark
      this.output.sendWatermark(watermark)
    }
  }
}

export abstract class UnaryOperator<I, O = I> extends Operator<O> {
  #input: StreamReader<I>

  constructor(id: string, input: StreamReader<I>, output: StreamWriter<O>) {
    super(id, [input], output)
    this.#input = input
  }

  inputMessages(): Message<I>[] {
    return this.#input.drain()
  }
}

export abstract class BinaryOperator<A, B, O> extends Operator<O> {
  #inputA: StreamReader<A>
  #inputB: StreamReader<B>

  constructor(
    id: string,
    inputA: StreamReader<A>,
    inputB: StreamReader<B>,
    output: StreamWriter<O>,
  ) {
    super(id, [inputA, inputB], output)
    this.#inputA = inputA
    this.#inputB = inputB
  }

  inputAMessages(): Message<A>[] {
    return this.#inputA.drain()
  }

  inputBMessages(): Message<B>[] {
    return this.#inputB.drain()
  }
}
