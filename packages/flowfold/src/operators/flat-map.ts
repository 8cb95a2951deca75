import type { PipedOperator } from '../flow.js'
import type { FlatMapFunction } from '../types.js'
import {
  Operator,
  operatorBase,
  OperatorBase,
  OperatorOptions,
  OperatorScope,
} from './operator.js'

export interface FlatMapOperator extends OperatorBase<'flatMap'> {
  readonly fn: FlatMapFunction<unknown, unknown>
}

export function createFlatMap<I, O>(
  scope: OperatorScope,
  input: Operator,
  fn: FlatMapFunction<I, O>,
  options?: OperatorOptions,
): FlatMapOperator {
  const operator: FlatMapOperator = {
    ...operatorBase(scope, 'flatMap', [input], options),
    fn,
  }
  scope.register(operator)
  return operator
}

/**
 * Emits zero or more elements for each input element. Elements collected
 * with a timestamp take that timestamp; others keep the input's.
 * @param fn - Receives each element and a collector for the outputs
 */
export function flatMap<I, O>(
  fn: FlatMapFunction<I, O>,
  options?: OperatorOptions,
): PipedOperator<I, O> {
  return (dataset) =>
    dataset.derive<O>(
      createFlatMap(dataset.flow, dataset.producer, fn, options),
    )
}
