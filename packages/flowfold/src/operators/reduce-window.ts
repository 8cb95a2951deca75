import type { PipedOperator } from '../flow.js'
import type { BinaryFunction, UnaryFunction } from '../types.js'
import { createMap, MapOperator } from './map.js'
import {
  ExpansionScope,
  KeyedOperatorOptions,
  Operator,
  operatorBase,
  OperatorBase,
  OperatorScope,
} from './operator.js'
import { createReduceByKey } from './reduce-by-key.js'

export interface ReduceWindowOperator extends OperatorBase<'reduceWindow'> {
  readonly valueBy: UnaryFunction<unknown, unknown>
  readonly reducer: BinaryFunction<unknown, unknown, unknown>
}

export function createReduceWindow<T, V>(
  scope: OperatorScope,
  input: Operator,
  valueBy: UnaryFunction<T, V>,
  reducer: BinaryFunction<V, V, V>,
  options: KeyedOperatorOptions<T> = {},
): ReduceWindowOperator {
  const operator: ReduceWindowOperator = {
    ...operatorBase(scope, 'reduceWindow', [input], options),
    valueBy,
    reducer,
  }
  scope.register(operator)
  return operator
}

/**
 * Reduces all values of each window into one, regardless of key.
 */
export function reduceWindow<T, V>(
  valueBy: UnaryFunction<T, V>,
  reducer: BinaryFunction<V, V, V>,
  options?: Omit<KeyedOperatorOptions<T>, 'keyType'>,
): PipedOperator<T, V> {
  return (dataset) =>
    dataset.derive<V>(
      createReduceWindow(
        dataset.flow,
        dataset.producer,
        valueBy,
        reducer,
        options,
      ),
    )
}

export function expandReduceWindow(
  operator: ReduceWindowOperator,
  scope: ExpansionScope,
): MapOperator {
  const reduced = createReduceByKey(
    scope,
    operator.inputs[0],
    () => null,
    operator.valueBy,
    operator.reducer,
    { name: scope.childName('reduceByKey'), windowing: operator.windowing },
  )
  return createMap<[null, unknown], unknown>(
    scope,
    reduced,
    ([, value]) => value,
    { name: scope.childName('map') },
  )
}
