import type { PipedOperator } from '../flow.js'
import { reducingState } from '../state/state-spec.js'
import type { BinaryFunction, KeyValue, UnaryFunction } from '../types.js'
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

export interface ReduceByKeyOperator extends OperatorBase<'reduceByKey'> {
  readonly keyBy: UnaryFunction<unknown, unknown>
  readonly valueBy: UnaryFunction<unknown, unknown>
  readonly reducer: BinaryFunction<unknown, unknown, unknown>
  readonly keyType?: string
}

export function createReduceByKey<T, K, V>(
  scope: OperatorScope,
  input: Operator,
  keyBy: UnaryFunction<T, K>,
  valueBy: UnaryFunction<T, V>,
  reducer: BinaryFunction<V, V, V>,
  options: KeyedOperatorOptions<T> = {},
): ReduceByKeyOperator {
  const operator: ReduceByKeyOperator = {
    ...operatorBase(scope, 'reduceByKey', [input], options),
    keyBy,
    valueBy,
    reducer,
    keyType: options.keyType,
  }
  scope.register(operator)
  return operator
}

/**
 * Reduces the values of each key and window with an associative,
 * commutative `reducer`.
 */
export function reduceByKey<T, K, V>(
  keyBy: UnaryFunction<T, K>,
  valueBy: UnaryFunction<T, V>,
  reducer: BinaryFunction<V, V, V>,
  options?: KeyedOperatorOptions<T>,
): PipedOperator<T, KeyValue<K, V>> {
  return (dataset) =>
    dataset.derive<KeyValue<K, V>>(
      createReduceByKey(
        dataset.flow,
        dataset.producer,
        keyBy,
        valueBy,
        reducer,
        options,
      ),
    )
}

export function expandReduceByKey(
  operator: ReduceByKeyOperator,
  scope: ExpansionScope,
): ReduceStateByKeyOperator {
  return createReduceStateByKey(
    scope,
    operator.inputs[0],
    operator.keyBy,
    operator.valueBy,
    reducingState(operator.reducer),
    {
      name: scope.childName('reduceStateByKey'),
      windowing: operator.windowing,
      keyType: operator.keyType,
    },
  )
}
