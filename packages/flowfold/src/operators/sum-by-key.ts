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

export interface SumByKeyOperator extends OperatorBase<'sumByKey'> {
  readonly keyBy: UnaryFunction<unknown, unknown>
  readonly valueBy: UnaryFunction<unknown, number>
  readonly keyType?: string
}

export function createSumByKey<T, K>(
  scope: OperatorScope,
  input: Operator,
  keyBy: UnaryFunction<T, K>,
  valueBy: UnaryFunction<T, number> = () => 1,
  options: KeyedOperatorOptions<T> = {},
): SumByKeyOperator {
  const operator: SumByKeyOperator = {
    ...operatorBase(scope, 'sumByKey', [input], options),
    keyBy,
    valueBy,
    keyType: options.keyType,
  }
  scope.register(operator)
  return operator
}

/**
 * Sums `valueBy` per key and window. Without `valueBy` every element counts 1.
 */
export function sumByKey<T, K>(
  keyBy: UnaryFunction<T, K>,
  valueBy?: UnaryFunction<T, number>,
  options?: KeyedOperatorOptions<T>,
): PipedOperator<T, KeyValue<K, number>> {
  return (dataset) =>
    dataset.derive<KeyValue<K, number>>(
      createSumByKey(dataset.flow, dataset.producer, keyBy, valueBy, options),
    )
}

export function expandSumByKey(
  operator: SumByKeyOperator,
  scope: ExpansionScope,
): ReduceByKeyOperator {
  return createReduceByKey<unknown, unknown, number>(
    scope,
    operator.inputs[0],
    operator.keyBy,
    operator.valueBy,
    (a, b) => a + b,
    {
      name: scope.childName('reduceByKey'),
      windowing: operator.windowing,
      keyType: operator.keyType,
    },
  )
}
