import type { PipedOperator } from '../flow.js'
import type { UnaryFunction } from '../types.js'
import { createFlatMap, FlatMapOperator } from './flat-map.js'
import {
  ExpansionScope,
  Operator,
  operatorBase,
  OperatorBase,
  OperatorOptions,
  OperatorScope,
} from './operator.js'

export interface FilterOperator extends OperatorBase<'filter'> {
  readonly predicate: UnaryFunction<unknown, boolean>
}

export function createFilter<T>(
  scope: OperatorScope,
  input: Operator,
  predicate: UnaryFunction<T, boolean>,
  options?: OperatorOptions,
): FilterOperator {
  const operator: FilterOperator = {
    ...operatorBase(scope, 'filter', [input], options),
    predicate,
  }
  scope.register(operator)
  return operator
}

export function filter<T>(
  predicate: UnaryFunction<T, boolean>,
  options?: OperatorOptions,
): PipedOperator<T, T> {
  return (dataset) =>
    dataset.derive<T>(
      createFilter(dataset.flow, dataset.producer, predicate, options),
    )
}

export function expandFilter(
  operator: FilterOperator,
  scope: ExpansionScope,
): FlatMapOperator {
  const { predicate } = operator
  return createFlatMap<unknown, unknown>(
    scope,
    operator.inputs[0],
    (element, collector) => {
      if (predicate(element)) collector.collect(element)
    },
    { name: scope.childName('flatMap') },
  )
}
