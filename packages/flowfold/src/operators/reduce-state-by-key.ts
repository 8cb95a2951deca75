import type { PipedOperator } from '../flow.js'
import type { StateSpec } from '../state/state-spec.js'
import type { KeyValue, UnaryFunction } from '../types.js'
import {
  KeyedOperatorOptions,
  Operator,
  operatorBase,
  OperatorBase,
  OperatorScope,
} from './operator.js'

/**
 * The keyed, windowed primitive every aggregation lowers to: values of each
 * (key, window) are folded into state, and the state is flushed into results
 * once the window completes.
 */
export interface ReduceStateByKeyOperator
  extends OperatorBase<'reduceStateByKey'> {
  readonly keyBy: UnaryFunction<unknown, unknown>
  readonly valueBy: UnaryFunction<unknown, unknown>
  readonly state: StateSpec<unknown, unknown, unknown>
  readonly keyType?: string
}

export function createReduceStateByKey<T, K, V, A, O>(
  scope: OperatorScope,
  input: Operator,
  keyBy: UnaryFunction<T, K>,
  valueBy: UnaryFunction<T, V>,
  state: StateSpec<V, A, O>,
  options: KeyedOperatorOptions<T> = {},
): ReduceStateByKeyOperator {
  const operator: ReduceStateByKeyOperator = {
    ...operatorBase(scope, 'reduceStateByKey', [input], options),
    keyBy,
    valueBy,
    state,
    keyType: options.keyType,
  }
  scope.register(operator)
  return operator
}

export function reduceStateByKey<T, K, V, A, O>(
  keyBy: UnaryFunction<T, K>,
  valueBy: UnaryFunction<T, V>,
  state: StateSpec<V, A, O>,
  options?: KeyedOperatorOptions<T>,
): PipedOperator<T, KeyValue<K, O>> {
  return (dataset) =>
    dataset.derive<KeyValue<K, O>>(
      createReduceStateByKey(
        dataset.flow,
        dataset.producer,
        keyBy,
        valueBy,
        state,
        options,
      ),
    )
}
