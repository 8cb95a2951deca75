import type { WindowedElement } from '../types.js'
import { Operator, StreamReader, StreamWriter } from './graph.js'

/**
 * A single process streaming graph. Operators are run in the order they were
 * added until no input queue holds messages.
 */
export class LocalGraph {
  #operators: Operator<unknown>[] = []
  #nextOperatorId = 0
  #finalized = false

  #checkNotFinalized(): void {
    if (this.#finalized) {
      throw new Error('Graph already finalized')
    }
  }

  getNextOperatorId(): string {
    this.#checkNotFinalized()
    return `op${this.#nextOperatorId++}`
  }

  newInput<T>(): LocalInput<T> {
    this.#checkNotFinalized()
    return new LocalInput<T>(this, new StreamWriter<T>())
  }

  addOperator(operator: Operator<unknown>): void {
    this.#checkNotFinalized()
    this.#operators.push(operator)
  }

  get operatorCount(): number {
    return this.#operators.length
  }

  finalize(): void {
    this.#checkNotFinalized()
    this.#finalized = true
  }

  step(): void {
    if (!this.#finalized) {
      throw new Error('Graph not finalized')
    }
    for (const op of this.#operators) {
      op.run()
    }
  }

  pendingWork(): boolean {
    return this.#operators.some((op) => op.hasPendingWork())
  }

  run(): void {
    while (this.pendingWork()) {
      this.step()
    }
  }
}

/**
 * The output edge of a graph node, from which consumers connect readers.
 */
export class LocalStream<T> {
  #graph: LocalGraph
  #writer: StreamWriter<T>

  constructor(graph: LocalGraph, writer: StreamWriter<T>) {
    this.#graph = graph
    this.#writer = writer
  }

  get graph(): LocalGraph {
    return this.#graph
  }

  get writer(): StreamWriter<T> {
    return this.#writer
  }

  connectReader(): StreamReader<T> {
    return this.#writer.newReader()
  }
}

export class LocalInput<T> extends LocalStream<T> {
  sendData(batch: WindowedElement<T>[]): void {
    this.writer.sendData(batch)
  }

  sendWatermark(watermark: number): void {
    this.writer.sendWatermark(watermark)
  }
}
