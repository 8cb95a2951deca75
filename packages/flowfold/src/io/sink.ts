/**
 * Receives the plain result values of a flow leaf. `commit` is called once,
 * after the final watermark has reached the sink.
 */
export interface DataSink<T> {
  write(value: T): void
  commit(): void
}

export class ListDataSink<T> implements DataSink<T> {
  #outputs: T[] = []
  #committed = false

  write(value: T): void {
    if (this.#committed) {
      throw new Error('Sink already committed')
    }
    this.#outputs.push(value)
  }

  commit(): void {
    this.#committed = true
  }

  get committed(): boolean {
    return this.#committed
  }

  getOutputs(): T[] {
    return [...this.#outputs]
  }
}
