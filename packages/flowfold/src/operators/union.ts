import type { Dataset, PipedOperator } from '../flow.js'
import {
  Operator,
  operatorBase,
  OperatorBase,
  OperatorOptions,
  OperatorScope,
} from './operator.js'

export type UnionOperator = OperatorBase<'union'>

export function createUnion(
  scope: OperatorScope,
  inputs: readonly Operator[],
  options?: OperatorOptions,
): UnionOperator {
  if (inputs.length < 2) {
    throw new Error('Union needs at least two inputs')
  }
  const operator: UnionOperator = operatorBase(scope, 'union', inputs, options)
  scope.register(operator)
  return operator
}

/**
 * Merges this dataset with others of the same flow
 * @param others - The datasets to merge with
 */
export function union<T, T2 = T>(
  ...others: Dataset<T2>[]
): PipedOperator<T, T | T2> {
  return (dataset) => {
    for (const other of others) {
      if (other.flow !== dataset.flow) {
        throw new Error('Cannot union datasets from different flows')
      }
    }
    return dataset.derive<T | T2>(
      createUnion(dataset.flow, [
        dataset.producer,
        ...others.map((other) => other.producer),
      ]),
    )
  }
}
