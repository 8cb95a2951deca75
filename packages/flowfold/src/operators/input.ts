import type { DataSource } from '../io/source.js'
import {
  operatorBase,
  OperatorBase,
  OperatorOptions,
  OperatorScope,
} from './operator.js'

export interface InputOperator extends OperatorBase<'input'> {
  readonly source: DataSource<unknown>
}

export function createInput<T>(
  scope: OperatorScope,
  source: DataSource<T>,
  options: OperatorOptions & { estimatedSize?: number } = {},
): InputOperator {
  const operator: InputOperator = {
    ...operatorBase(scope, 'input', [], options),
    source,
    estimatedSize: options.estimatedSize ?? source.size(),
  }
  scope.register(operator)
  return operator
}
