import { DecompositionCycleError, UnsupportedOperatorError } from '../errors.js'
import type { Flow } from '../flow.js'
import type { Operator, OperatorKind } from '../operators/operator.js'
import type { Logger } from '../types.js'
import { resolveLogger } from '../utils.js'
import { CanonicalDag, DagNode } from './dag.js'
import { decompose as defaultDecompose, Decomposer, Expansion } from './decompose.js'
import type { AcceptorContext, RuleTable } from './rules.js'

export interface LowerOptions {
  decompose?: Decomposer
  debug?: boolean | Logger
}

/**
 * Rewrites a finalized flow into a canonical DAG. Each operator is bound to
 * the first rule of its kind that accepts it; an operator no rule accepts is
 * replaced by its expansion, lowered recursively. The flow is not modified.
 *
 * @throws UnsupportedOperatorError when an operator has neither an accepting
 * rule nor an expansion
 * @throws DecompositionCycleError when an expansion re-enters its own kind
 */
export function lower<Out, Ctx>(
  flow: Flow,
  rules: RuleTable<Out, Ctx>,
  context: AcceptorContext,
  options: LowerOptions = {},
): CanonicalDag<Out, Ctx> {
  if (!flow.finalized) {
    throw new Error('Flow must be finalized before lowering')
  }
  const decompose = options.decompose ?? defaultDecompose
  const log = resolveLogger(options.debug)

  const nodes: DagNode<Out, Ctx>[] = []
  const resolved = new Map<Operator, DagNode<Out, Ctx>>()

  const parentsOf = (operator: Operator): DagNode<Out, Ctx>[] =>
    operator.inputs.map((input) => {
      const parent = resolved.get(input)
      if (!parent) {
        throw new Error(
          `Input ${input.name} of ${operator.name} has not been lowered`,
        )
      }
      return parent
    })

  // `owner` is the flow operator whose sink and hints the output carries
  const lowerOperator = (
    operator: Operator,
    owner: Operator,
    stack: readonly OperatorKind[],
  ): DagNode<Out, Ctx> => {
    const rule = rules.select(operator, context)
    if (rule) {
      const node: DagNode<Out, Ctx> = {
        index: nodes.length,
        operator,
        rule,
        parents: parentsOf(operator),
        hints: new Set(owner.hints),
        sink: owner.sink,
      }
      nodes.push(node)
      resolved.set(operator, node)
      log?.(`lower: ${operator.name} [${operator.kind}] -> ${rule.name}`)
      return node
    }

    if (stack.includes(operator.kind)) {
      throw new DecompositionCycleError([...stack, operator.kind])
    }
    const expansion = new Expansion(operator)
    const output = decompose(operator, expansion)
    if (!output) {
      throw new UnsupportedOperatorError(operator.kind, operator.name)
    }
    log?.(
      `lower: ${operator.name} [${operator.kind}] decomposed into ${expansion.operators.length} operators`,
    )

    const inner = [...stack, operator.kind]
    for (const created of expansion.operators) {
      lowerOperator(created, created === output ? owner : created, inner)
    }
    const node = resolved.get(output)
    if (!node) {
      throw new Error(
        `Expansion of ${operator.name} did not register its output operator`,
      )
    }
    resolved.set(operator, node)
    return node
  }

  for (const operator of flow.operators()) {
    lowerOperator(operator, operator, [])
  }
  return new CanonicalDag(nodes)
}
