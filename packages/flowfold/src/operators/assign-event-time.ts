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

export interface AssignEventTimeOperator extends OperatorBase<'assignEventTime'> {
  readonly timestampBy: UnaryFunction<unknown, number>
}

export function createAssignEventTime<T>(
  scope: OperatorScope,
  input: Operator,
  timestampBy: UnaryFunction<T, number>,
  options?: OperatorOptions,
): AssignEventTimeOperator {
  const operator: AssignEventTimeOperator = {
    ...operatorBase(scope, 'assignEventTime', [input], options),
    timestampBy,
  }
  scope.register(operator)
  return operator
}

/**
 * Sets each element's event timestamp, which time based windowing of
 * downstream keyed operators uses.
 */
export function assignEventTime<T>(
  timestampBy: UnaryFunction<T, number>,
  options?: OperatorOptions,
): PipedOperator<T, T> {
  return (dataset) =>
    dataset.derive<T>(
      createAssignEventTime(dataset.flow, dataset.producer, timestampBy, options),
    )
}

export function expandAssignEventTime(
  operator: AssignEventTimeOperator,
  scope: ExpansionScope,
): FlatMapOperator {
  const { timestampBy } = operator
  return createFlatMap<unknown, unknown>(
    scope,
    operator.inputs[0],
    (element, collector) => collector.collect(element, timestampBy(element)),
    { name: scope.childName('flatMap') },
  )
}
