import type { KeyedStateError } from '../errors.js'
import type { ExecutorContext } from '../executor/coordinator.js'
import type { DataSink } from '../io/sink.js'
import type { DagNodeInfo } from '../lowering/dag.js'
import type { AcceptorContext } from '../lowering/rules.js'
import type { InputOperator } from '../operators/input.js'
import type { Operator } from '../operators/operator.js'
import type { Settings } from '../settings.js'
import type { SerializerFactory } from '../state/serializer.js'
import type { SpillStorageFactory } from '../state/spill.js'
import type { StateSpec } from '../state/state-spec.js'
import { StateStore } from '../state/state-store.js'
import type { Logger, UnaryFunction } from '../types.js'
import { WindowingEngine } from '../windowing/engine.js'
import type { Windowing } from '../windowing/windowing.js'
import { LocalGraph, LocalInput, LocalStream } from './local-graph.js'
import { cache, CacheOperator } from './operators/cache.js'
import { sink } from './operators/sink.js'

export interface LocalExecutionContextOptions {
  graph: LocalGraph
  flowName: string
  settings: Settings
  acceptor: AcceptorContext
  spillStorage: SpillStorageFactory
  serializer?: SerializerFactory
  onError: (error: KeyedStateError) => void
  debug?: boolean | Logger
}

export interface EngineOptions<T, K, V, A, O> {
  windowing: Windowing<T>
  keyBy: UnaryFunction<T, K>
  valueBy: UnaryFunction<T, V>
  state: StateSpec<V, A, O>
}

/**
 * Everything local translation rules need while building the graph.
 */
export class LocalExecutionContext
  implements ExecutorContext<LocalStream<unknown>>
{
  readonly graph: LocalGraph
  readonly settings: Settings
  readonly acceptor: AcceptorContext

  #flowName: string
  #spillStorage: SpillStorageFactory
  #serializer: SerializerFactory | undefined
  #onError: (error: KeyedStateError) => void
  #debug: boolean | Logger | undefined
  #inputs = new Map<InputOperator, LocalInput<unknown>>()
  #stores: StateStore<unknown, unknown>[] = []
  #caches = new Map<string, CacheOperator<unknown>>()

  constructor(options: LocalExecutionContextOptions) {
    this.graph = options.graph
    this.settings = options.settings
    this.acceptor = options.acceptor
    this.#flowName = options.flowName
    this.#spillStorage = options.spillStorage
    this.#serializer = options.serializer
    this.#onError = options.onError
    this.#debug = options.debug
  }

  openInput(operator: InputOperator): LocalInput<unknown> {
    const input = this.graph.newInput<unknown>()
    this.#inputs.set(operator, input)
    return input
  }

  inputs(): [InputOperator, LocalInput<unknown>][] {
    return [...this.#inputs]
  }

  /**
   * Creates a windowing engine with its own state store for a keyed operator.
   */
  createEngine<T, K, V, A, O>(
    operator: Operator,
    options: EngineOptions<T, K, V, A, O>,
  ): WindowingEngine<T, K, V, A, O> {
    const store = new StateStore<K, A>({
      name: `${this.#flowName}_${operator.id}`.replace(/[^A-Za-z0-9_]/g, '_'),
      capacity: this.settings.stateCapacity,
      create: () => options.state.create(),
      combine: (target, moved) => options.state.combine(target, moved),
      storage: this.#spillStorage,
      serializer: this.#serializer?.<A>(),
      debug: this.#debug,
    })
    this.#stores.push(store)
    return new WindowingEngine<T, K, V, A, O>({
      ...options,
      store,
      onError: this.#onError,
      debug: this.#debug,
    })
  }

  get stores(): readonly StateStore<unknown, unknown>[] {
    return this.#stores
  }

  /**
   * Elements retained by the cache of a materialized operator
   */
  cached(operatorId: string): CacheOperator<unknown> | undefined {
    return this.#caches.get(operatorId)
  }

  materialize(
    node: DagNodeInfo,
    output: LocalStream<unknown>,
  ): LocalStream<unknown> {
    const { stream, operator } = cache(output)
    this.#caches.set(node.operator.id, operator)
    return stream
  }

  writeToSink(
    _node: DagNodeInfo,
    output: LocalStream<unknown>,
    target: DataSink<unknown>,
  ): void {
    sink(output, target)
  }
}
