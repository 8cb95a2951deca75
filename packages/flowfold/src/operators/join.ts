import type { Dataset, PipedOperator } from '../flow.js'
import type { StateSpec } from '../state/state-spec.js'
import type { BinaryFunction, KeyValue, UnaryFunction } from '../types.js'
import { createMap } from './map.js'
import {
  ExpansionScope,
  KeyedOperatorOptions,
  Operator,
  operatorBase,
  OperatorBase,
  OperatorScope,
} from './operator.js'
import {
  createReduceStateByKey,
  ReduceStateByKeyOperator,
} from './reduce-state-by-key.js'
import { createUnion } from './union.js'

export type JoinType = 'inner' | 'left' | 'right' | 'full'

export interface JoinOperator extends OperatorBase<'join'> {
  readonly type: JoinType
  readonly leftKey: UnaryFunction<unknown, unknown>
  readonly rightKey: UnaryFunction<unknown, unknown>
  readonly joiner: BinaryFunction<unknown, unknown, unknown>
  readonly keyType?: string
}

export interface JoinGroups<L = unknown, R = unknown> {
  left: L[]
  right: R[]
}

export function createJoin(
  scope: OperatorScope,
  left: Operator,
  right: Operator,
  type: JoinType,
  leftKey: UnaryFunction<unknown, unknown>,
  rightKey: UnaryFunction<unknown, unknown>,
  joiner: BinaryFunction<unknown, unknown, unknown>,
  options: KeyedOperatorOptions<unknown> = {},
): JoinOperator {
  const operator: JoinOperator = {
    ...operatorBase(scope, 'join', [left, right], options),
    type,
    leftKey,
    rightKey,
    joiner,
    keyType: options.keyType,
  }
  scope.register(operator)
  return operator
}

/**
 * Inner join of this dataset with `right` on equal keys, within each window.
 * Emits `[key, joiner(left, right)]` for every matching pair.
 */
export function join<L, R, K, O>(
  right: Dataset<R>,
  leftKey: UnaryFunction<L, K>,
  rightKey: UnaryFunction<R, K>,
  joiner: BinaryFunction<L, R, O>,
  options?: KeyedOperatorOptions<L | R>,
): PipedOperator<L, KeyValue<K, O>> {
  return (dataset) => {
    if (right.flow !== dataset.flow) {
      throw new Error('Cannot join datasets from different flows')
    }
    return dataset.derive<KeyValue<K, O>>(
      createJoin(
        dataset.flow,
        dataset.producer,
        right.producer,
        'inner',
        leftKey,
        rightKey,
        joiner,
        options,
      ),
    )
  }
}

/**
 * Outer join. Keys present on one side only are joined against `undefined`
 * on the other side, where `type` keeps that side.
 */
export function outerJoin<L, R, K, O>(
  right: Dataset<R>,
  type: Exclude<JoinType, 'inner'>,
  leftKey: UnaryFunction<L, K>,
  rightKey: UnaryFunction<R, K>,
  joiner: BinaryFunction<L | undefined, R | undefined, O>,
  options?: KeyedOperatorOptions<L | R>,
): PipedOperator<L, KeyValue<K, O>> {
  return (dataset) => {
    if (right.flow !== dataset.flow) {
      throw new Error('Cannot join datasets from different flows')
    }
    return dataset.derive<KeyValue<K, O>>(
      createJoin(
        dataset.flow,
        dataset.producer,
        right.producer,
        type,
        leftKey,
        rightKey,
        joiner,
        options,
      ),
    )
  }
}

/**
 * Joins the values of one key from both sides
 */
export function joinGroups<L, R, O>(
  type: JoinType,
  groups: JoinGroups<L, R>,
  joiner: BinaryFunction<L | undefined, R | undefined, O>,
): O[] {
  const { left, right } = groups
  const results: O[] = []
  if (left.length > 0 && right.length > 0) {
    for (const l of left) {
      for (const r of right) {
        results.push(joiner(l, r))
      }
    }
  } else if (left.length > 0 && (type === 'left' || type === 'full')) {
    for (const l of left) results.push(joiner(l, undefined))
  } else if (right.length > 0 && (type === 'right' || type === 'full')) {
    for (const r of right) results.push(joiner(undefined, r))
  }
  return results
}

type Tagged = readonly [key: unknown, side: 'left' | 'right', value: unknown]

export function joinState(
  type: JoinType,
  joiner: BinaryFunction<unknown, unknown, unknown>,
): StateSpec<Tagged, JoinGroups, unknown> {
  return {
    create: () => ({ left: [], right: [] }),
    add: (groups, [, side, value]) => ({
      left: side === 'left' ? [...groups.left, value] : groups.left,
      right: side === 'right' ? [...groups.right, value] : groups.right,
    }),
    combine: (a, b) => ({
      left: [...a.left, ...b.left],
      right: [...a.right, ...b.right],
    }),
    flush: (groups) => joinGroups(type, groups, joiner),
  }
}

export function expandJoin(
  operator: JoinOperator,
  scope: ExpansionScope,
): ReduceStateByKeyOperator {
  const [left, right] = operator.inputs
  const { leftKey, rightKey } = operator
  const taggedLeft = createMap(
    scope,
    left,
    (value: unknown): Tagged => [leftKey(value), 'left', value],
    { name: scope.childName('map') },
  )
  const taggedRight = createMap(
    scope,
    right,
    (value: unknown): Tagged => [rightKey(value), 'right', value],
    { name: scope.childName('map') },
  )
  const merged = createUnion(scope, [taggedLeft, taggedRight], {
    name: scope.childName('union'),
  })
  return createReduceStateByKey(
    scope,
    merged,
    (tagged: Tagged) => tagged[0],
    (tagged: Tagged) => tagged,
    joinState(operator.type, operator.joiner),
    {
      name: scope.childName('reduceStateByKey'),
      windowing: operator.windowing,
      keyType: operator.keyType,
    },
  )
}
