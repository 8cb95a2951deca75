import type { DataSink } from './io/sink.js'
import type { DataSource } from './io/source.js'
import { createInput } from './operators/input.js'
import type {
  Operator,
  OperatorHint,
  OperatorOptions,
  OperatorScope,
} from './operators/operator.js'

export type PipedOperator<I, O> = (dataset: Dataset<I>) => Dataset<O>

/**
 * An acyclic graph of operators. Operators are registered in creation order,
 * which is a topological order since an operator only consumes operators that
 * already exist.
 */
export class Flow implements OperatorScope {
  readonly name: string
  #operators: Operator[] = []
  #ids = new Set<string>()
  #nextOperatorId = 0
  #finalized = false

  constructor(name = 'flow') {
    this.name = name
  }

  #checkNotFinalized(): void {
    if (this.#finalized) {
      throw new Error('Flow already finalized')
    }
  }

  nextOperatorId(): string {
    this.#checkNotFinalized()
    return String(this.#nextOperatorId++)
  }

  register(operator: Operator): void {
    this.#checkNotFinalized()
    for (const input of operator.inputs) {
      if (!this.#ids.has(input.id)) {
        throw new Error(
          `Operator ${operator.name} consumes ${input.name} from another flow`,
        )
      }
    }
    this.#ids.add(operator.id)
    this.#operators.push(operator)
  }

  createInput<T>(
    source: DataSource<T>,
    options: OperatorOptions & { estimatedSize?: number } = {},
  ): Dataset<T> {
    const operator = createInput(this, source, options)
    return new Dataset<T>(this, operator)
  }

  operators(): readonly Operator[] {
    return this.#operators
  }

  get finalized(): boolean {
    return this.#finalized
  }

  /**
   * Freezes the flow. Only a finalized flow can be lowered.
   */
  finalize(): this {
    this.#checkNotFinalized()
    this.#finalized = true
    for (const operator of this.#operators) {
      Object.freeze(operator)
    }
    Object.freeze(this.#operators)
    return this
  }

  checkMutable(): void {
    this.#checkNotFinalized()
  }
}

/**
 * Typed handle to the output of an operator.
 */
export class Dataset<T> {
  #flow: Flow
  #producer: Operator

  constructor(flow: Flow, producer: Operator) {
    this.#flow = flow
    this.#producer = producer
  }

  get flow(): Flow {
    return this.#flow
  }

  get producer(): Operator {
    return this.#producer
  }

  /**
   * Wraps a newly registered operator producing elements of type `O`.
   */
  derive<O>(operator: Operator): Dataset<O> {
    return new Dataset<O>(this.#flow, operator)
  }

  pipe<O>(o1: PipedOperator<T, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, T4, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, T4>, o4: PipedOperator<T4, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, T4, T5, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, T4>, o4: PipedOperator<T4, T5>, o5: PipedOperator<T5, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, T4, T5, T6, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, T4>, o4: PipedOperator<T4, T5>, o5: PipedOperator<T5, T6>, o6: PipedOperator<T6, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, T4, T5, T6, T7, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, T4>, o4: PipedOperator<T4, T5>, o5: PipedOperator<T5, T6>, o6: PipedOperator<T6, T7>, o7: PipedOperator<T7, O>): Dataset<O>
  // prettier-ignore
  pipe<T2, T3, T4, T5, T6, T7, T8, O>(o1: PipedOperator<T, T2>, o2: PipedOperator<T2, T3>, o3: PipedOperator<T3, T4>, o4: PipedOperator<T4, T5>, o5: PipedOperator<T5, T6>, o6: PipedOperator<T6, T7>, o7: PipedOperator<T7, T8>, o8: PipedOperator<T8, O>): Dataset<O>

  pipe(...operators: PipedOperator<unknown, unknown>[]): Dataset<unknown> {
    return operators.reduce<Dataset<unknown>>(
      (dataset, operator) => operator(dataset),
      this,
    )
  }

  /**
   * Attaches a sink that receives this dataset's plain values.
   */
  persist(sink: DataSink<T>): this {
    this.#flow.checkMutable()
    this.#producer.sink = sink
    return this
  }

  hint(...hints: OperatorHint[]): this {
    this.#flow.checkMutable()
    for (const hint of hints) this.#producer.hints.add(hint)
    return this
  }

  /**
   * Declares the expected number of elements, used to choose join strategies.
   */
  estimateSize(size: number): this {
    this.#flow.checkMutable()
    this.#producer.estimatedSize = size
    return this
  }
}
