import type { KeyedStateError } from '../errors.js'
import { ExecutionCoordinator } from '../executor/coordinator.js'
import type { Flow } from '../flow.js'
import type { DataSink } from '../io/sink.js'
import type { DataSource } from '../io/source.js'
import type { CanonicalDag, DagNode } from '../lowering/dag.js'
import { lower } from '../lowering/lower.js'
import { AcceptorContext } from '../lowering/rules.js'
import {
  resolveSettings,
  RuntimeOptions,
  Settings,
  SettingsInput,
} from '../settings.js'
import { memorySpillStorage } from '../state/spill.js'
import type { Logger, WindowedElement } from '../types.js'
import { resolveLogger } from '../utils.js'
import { GlobalWindow } from '../windowing/window.js'
import { LocalExecutionContext } from './context.js'
import { LocalGraph, LocalInput, LocalStream } from './local-graph.js'
import { localRules } from './rules.js'

export type LocalExecutorOptions = SettingsInput & RuntimeOptions

type LocalNode = DagNode<LocalStream<unknown>, LocalExecutionContext>

export interface LocalExecutionResult {
  dag: CanonicalDag<LocalStream<unknown>, LocalExecutionContext>
  /** Sinks written, in DAG order */
  sinks: DataSink<unknown>[]
  /** Errors confined to single keys; their elements were dropped */
  errors: KeyedStateError[]
  /** Nodes whose output was cached for several consumers */
  materialized: LocalNode[]
  context: LocalExecutionContext
}

/**
 * Runs flows in process: lowers the flow with the local rules, builds a
 * streaming graph from the DAG and pushes every source through it.
 */
export class LocalExecutor {
  readonly settings: Settings
  #options: RuntimeOptions
  #log: Logger | undefined

  constructor(options: LocalExecutorOptions = {}) {
    const { spillStorage, serializer, comparators, onError, debug, ...settings } =
      options
    this.settings = resolveSettings(settings)
    this.#options = { spillStorage, serializer, comparators, onError, debug }
    this.#log = resolveLogger(debug)
  }

  execute(flow: Flow): LocalExecutionResult {
    const { spillStorage, serializer, comparators, onError, debug } =
      this.#options
    const acceptor = new AcceptorContext({
      comparators,
      broadcastJoinThreshold: this.settings.broadcastJoinThreshold,
    })
    const dag = lower(flow, localRules, acceptor, { debug })
    this.#log?.(`flow ${flow.name} lowered to ${dag.nodes.length} nodes`)

    const errors: KeyedStateError[] = []
    const graph = new LocalGraph()
    const context = new LocalExecutionContext({
      graph,
      flowName: flow.name,
      settings: this.settings,
      acceptor,
      spillStorage: spillStorage ?? memorySpillStorage,
      serializer,
      onError: (error) => {
        errors.push(error)
        onError?.(error)
      },
      debug,
    })

    const { sinks, materialized } = new ExecutionCoordinator(dag, context, {
      debug,
    }).execute()
    graph.finalize()

    for (const [operator, input] of context.inputs()) {
      this.#feed(graph, operator.source, input)
      this.#log?.(`source ${operator.name} exhausted`)
    }

    return { dag, sinks, errors, materialized, context }
  }

  #feed(
    graph: LocalGraph,
    source: DataSource<unknown>,
    input: LocalInput<unknown>,
  ): void {
    let batch: WindowedElement<unknown>[] = []
    const flush = () => {
      input.sendData(batch)
      batch = []
      graph.run()
    }

    for (const event of source.events()) {
      if (event.type === 'element') {
        batch.push({
          element: event.value,
          timestamp: event.timestamp ?? 0,
          window: GlobalWindow.INSTANCE,
        })
        if (batch.length >= this.settings.batchSize) flush()
      } else {
        input.sendData(batch)
        batch = []
        input.sendWatermark(event.timestamp)
        graph.run()
      }
    }
    flush()
    if (source.bounded) {
      input.sendWatermark(Infinity)
      graph.run()
    }
  }
}
