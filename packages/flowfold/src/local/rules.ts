import type { Operator, OperatorKind, OperatorOfKind } from '../operators/operator.js'
import type { JoinOperator } from '../operators/join.js'
import {
  AcceptorContext,
  defineRule,
  RuleTable,
  TranslationRule,
} from '../lowering/rules.js'
import { reducingState } from '../state/state-spec.js'
import type { KeyValue } from '../types.js'
import { AttachedWindowing } from '../windowing/windowing.js'
import type { LocalExecutionContext } from './context.js'
import type { LocalStream } from './local-graph.js'
import { flatMap } from './operators/flat-map.js'
import {
  broadcastHashJoin,
  hashJoin,
  JoinOptions,
  sortMergeJoin,
} from './operators/join.js'
import { combiningReduce } from './operators/reduce-by-key.js'
import { reduceState } from './operators/reduce-state.js'
import { union } from './operators/union.js'

type Stream = LocalStream<unknown>

function rule<K extends OperatorKind>(
  kind: K,
  name: string,
  translate: (
    operator: OperatorOfKind<K>,
    inputs: readonly Stream[],
    context: LocalExecutionContext,
  ) => Stream,
  accept?: (operator: OperatorOfKind<K>, context: AcceptorContext) => boolean,
): TranslationRule<Stream, LocalExecutionContext, K> {
  return defineRule(kind, name, translate, accept)
}

/**
 * The side of a join small enough to broadcast, if any. Only the side an
 * outer join does not preserve may be broadcast.
 */
export function broadcastSide(
  operator: JoinOperator,
  context: AcceptorContext,
): 'left' | 'right' | undefined {
  if (operator.windowing) return undefined
  const [left, right] = operator.inputs
  const small = (input: Operator) =>
    input.estimatedSize !== undefined &&
    input.estimatedSize <= context.broadcastJoinThreshold
  if ((operator.type === 'inner' || operator.type === 'left') && small(right)) {
    return 'right'
  }
  if ((operator.type === 'inner' || operator.type === 'right') && small(left)) {
    return 'left'
  }
  return undefined
}

function joinOptions(
  operator: JoinOperator,
): JoinOptions<unknown, unknown, unknown, unknown> {
  const { type, leftKey, rightKey, joiner } = operator
  return { type, leftKey, rightKey, joiner }
}

export const localRules = new RuleTable<Stream, LocalExecutionContext>([
  rule('input', 'local.input', (operator, _inputs, context) =>
    context.openInput(operator),
  ),
  rule('flatMap', 'local.flatMap', (operator, [input]) =>
    flatMap(input, operator.fn),
  ),
  rule('union', 'local.union', (_operator, inputs) => union(inputs)),
  rule(
    'reduceByKey',
    'local.combiningReduceByKey',
    (operator, [input], context) => {
      const windowing = operator.windowing ?? new AttachedWindowing()
      if (windowing.merging) {
        throw new Error(`${operator.name} uses merging windowing`)
      }
      const engine = context.createEngine<
        KeyValue<unknown, unknown>,
        unknown,
        unknown,
        unknown[],
        unknown
      >(operator, {
        windowing: new AttachedWindowing(),
        keyBy: ([key]: KeyValue<unknown, unknown>) => key,
        valueBy: ([, value]: KeyValue<unknown, unknown>) => value,
        state: reducingState(operator.reducer),
      })
      return combiningReduce(input, {
        windowing,
        keyBy: operator.keyBy,
        valueBy: operator.valueBy,
        reducer: operator.reducer,
        engine,
      })
    },
    (operator) => !operator.windowing?.merging,
  ),
  rule(
    'reduceStateByKey',
    'local.reduceStateByKey',
    (operator, [input], context) =>
      reduceState(
        input,
        context.createEngine(operator, {
          windowing: operator.windowing ?? new AttachedWindowing(),
          keyBy: operator.keyBy,
          valueBy: operator.valueBy,
          state: operator.state,
        }),
      ),
  ),
  rule(
    'join',
    'local.broadcastHashJoin',
    (operator, [left, right], context) => {
      const side = broadcastSide(operator, context.acceptor)
      if (!side) {
        throw new Error(`${operator.name} has no side small enough to broadcast`)
      }
      return broadcastHashJoin(left, right, joinOptions(operator), side)
    },
    (operator, context) => broadcastSide(operator, context) !== undefined,
  ),
  rule(
    'join',
    'local.sortMergeJoin',
    (operator, [left, right], context) => {
      const compare = context.acceptor.comparator(operator.keyType)
      if (!compare) {
        throw new Error(`No comparator registered for ${operator.keyType}`)
      }
      return sortMergeJoin(left, right, joinOptions(operator), compare)
    },
    (operator, context) =>
      !operator.windowing && context.hasComparator(operator.keyType),
  ),
  rule(
    'join',
    'local.hashJoin',
    (operator, [left, right]) =>
      hashJoin(left, right, joinOptions(operator)),
    (operator) => !operator.windowing,
  ),
])
