import type { PipedOperator } from '../flow.js'
import type { KeyValue, UnaryFunction } from '../types.js'
import {
  ExpansionScope,
  KeyedOperatorOptions,
  Operator,
  operatorBase,
  OperatorBase,
  OperatorScope,
} from './operator.js'
import { createReduceByKey, ReduceByKeyOperator } from './reduce-by-key.js'

export interface CountByKeyOperator extends OperatorBase<'countByKey'> {
  readonly keyBy: UnaryFunction<unknown, unknown>
  readonly keyType?: string
}

export function createCountByKey<T, K>(
  scope: OperatorScope,
  input: Operator,
  keyBy: UnaryFunction<T, K>,
  options: KeyedOperatorOptions<T> = {},
): CountByKeyOperator {
  const operator: CountByKeyOperator = {
    ...operatorBase(scope, 'countByKey', [input], options),
    keyBy,
    keyType: options.keyType,
  }
  scope.register(operator)
  return operator
}

/**
 * Counts the elements of each key and window
 */
export function countByKey<T, K>(
  keyBy: UnaryFunction<T, K>,
  options?: KeyedOperatorOptions<T>,
): PipedOperator<T, KeyValue<K, number>> {
  return (dataset) =>
    dataset.derive<KeyValue<K, number>>(
      createCountByKey(dataset.flow, dataset.producer, keyBy, options),
    )
}

export function expandCountByKey(
  operator: CountByKeyOperator,
  scope: ExpansionScope,
): ReduceByKeyOperator {
  return createReduceByKey<unknown, unknown, number>(
    scope,
    operator.inputs[0],
    operator.keyBy,
    () => 1,
    (a, b) => a + b,
    {
      name: scope.childName('reduceByKey'),
      windowing: operator.windowing,
      keyType: operator.keyType,
    },
  )
}
