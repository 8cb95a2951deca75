import type { DataSink } from '../io/sink.js'
import type { CanonicalDag, DagNode, DagNodeInfo } from '../lowering/dag.js'
import type { Logger } from '../types.js'
import { resolveLogger } from '../utils.js'

/**
 * The backend side of an execution: how outputs are shared and written out.
 */
export interface ExecutorContext<Out> {
  /**
   * Makes `output` safe to consume several times without recomputing it.
   * Returns the output consumers should use instead.
   */
  materialize(node: DagNodeInfo, output: Out): Out
  /**
   * Hands a node's output to its sink, unwrapping windowed envelopes into
   * plain values.
   */
  writeToSink(node: DagNodeInfo, output: Out, sink: DataSink<unknown>): void
}

export interface ExecutionResult<Out, Ctx> {
  outputs: Map<DagNode<Out, Ctx>, Out>
  sinks: DataSink<unknown>[]
  materialized: DagNode<Out, Ctx>[]
}

/**
 * Translates a canonical DAG node by node in topological order, passing each
 * rule the outputs of the node's parents.
 */
export class ExecutionCoordinator<Out, Ctx extends ExecutorContext<Out>> {
  #dag: CanonicalDag<Out, Ctx>
  #context: Ctx
  #log: Logger | undefined

  constructor(
    dag: CanonicalDag<Out, Ctx>,
    context: Ctx,
    options: { debug?: boolean | Logger } = {},
  ) {
    this.#dag = dag
    this.#context = context
    this.#log = resolveLogger(options.debug)
  }

  execute(): ExecutionResult<Out, Ctx> {
    const outputs = new Map<DagNode<Out, Ctx>, Out>()
    const materialized: DagNode<Out, Ctx>[] = []

    for (const node of this.#dag.traverse()) {
      const inputs = node.parents.map((parent) => {
        const output = outputs.get(parent)
        if (output === undefined) {
          throw new Error(
            `Output of ${parent.operator.name} missing when translating ${node.operator.name}`,
          )
        }
        return output
      })

      let output = node.rule.translate(node.operator, inputs, this.#context)
      if (this.#dag.fanOut(node) > 1 && node.hints.has('expensive')) {
        output = this.#context.materialize(node, output)
        materialized.push(node)
        this.#log?.(`materialized ${node.operator.name}`)
      }
      outputs.set(node, output)
    }

    const sinks: DataSink<unknown>[] = []
    for (const node of this.#dag.nodes) {
      if (!node.sink) continue
      const output = outputs.get(node)
      if (output === undefined) continue
      this.#context.writeToSink(node, output, node.sink)
      sinks.push(node.sink)
      this.#log?.(`sink attached to ${node.operator.name}`)
    }

    return { outputs, sinks, materialized }
  }
}
