import type { DataSink } from '../io/sink.js'
import type { Operator, OperatorHint } from '../operators/operator.js'
import type { TranslationRule } from './rules.js'

/**
 * What an execution context gets to know about a node
 */
export interface DagNodeInfo {
  readonly index: number
  readonly operator: Operator
  readonly hints: ReadonlySet<OperatorHint>
  readonly sink?: DataSink<unknown>
}

export interface DagNode<Out, Ctx> extends DagNodeInfo {
  readonly rule: TranslationRule<Out, Ctx>
  readonly parents: readonly DagNode<Out, Ctx>[]
}

/**
 * The lowered form of a flow: nodes in topological order, each bound to the
 * rule that translates it.
 */
export class CanonicalDag<Out, Ctx> {
  readonly nodes: readonly DagNode<Out, Ctx>[]
  #children = new Map<DagNode<Out, Ctx>, DagNode<Out, Ctx>[]>()

  constructor(nodes: readonly DagNode<Out, Ctx>[]) {
    this.nodes = Object.freeze([...nodes])
    for (const node of this.nodes) {
      this.#children.set(node, [])
    }
    for (const node of this.nodes) {
      for (const parent of node.parents) {
        const children = this.#children.get(parent)
        if (!children) {
          throw new Error(
            `Node ${node.operator.name} depends on a node outside the DAG`,
          )
        }
        children.push(node)
      }
    }
  }

  children(node: DagNode<Out, Ctx>): readonly DagNode<Out, Ctx>[] {
    return this.#children.get(node) ?? []
  }

  /**
   * Number of consumers of the node's output
   */
  fanOut(node: DagNode<Out, Ctx>): number {
    return this.children(node).length
  }

  leaves(): DagNode<Out, Ctx>[] {
    return this.nodes.filter((node) => this.fanOut(node) === 0)
  }

  *traverse(): Generator<DagNode<Out, Ctx>> {
    yield* this.nodes
  }

  describe(): string {
    return this.nodes
      .map((node) => {
        const { operator } = node
        const parents = node.parents.map((parent) => parent.index).join(',')
        return `${node.index}: ${operator.name} [${operator.kind}] rule=${node.rule.name} parents=[${parents}]`
      })
      .join('\n')
  }
}
