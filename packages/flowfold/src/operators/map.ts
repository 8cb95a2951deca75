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

export interface MapOperator extends OperatorBase<'map'> {
  readonly fn: UnaryFunction<unknown, unknown>
}

export function createMap<I, O>(
  scope: OperatorScope,
  input: Operator,
  fn: UnaryFunction<I, O>,
  options?: OperatorOptions,
): MapOperator {
  const operator: MapOperator = {
    ...operatorBase(scope, 'map', [input], options),
    fn,
  }
  scope.register(operator)
  return operator
}

export function map<I, O>(
  fn: UnaryFunction<I, O>,
  options?: OperatorOptions,
): PipedOperator<I, O> {
  return (dataset) =>
    dataset.derive<O>(createMap(dataset.flow, dataset.producer, fn, options))
}

export function expandMap(
  operator: MapOperator,
  scope: ExpansionScope,
): FlatMapOperator {
  const { fn } = operator
  return createFlatMap<unknown, unknown>(
    scope,
    operator.inputs[0],
    (element, collector) => collector.collect(fn(element)),
    { name: scope.childName('flatMap') },
  )
}
