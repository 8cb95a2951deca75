import type { PipedOperator } from '../flow.js'
import type { UnaryFunction } from '../types.js'
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

export interface DistinctOperator extends OperatorBase<'distinct'> {
  readonly mapper: UnaryFunction<unknown, unknown>
}

export function createDistinct<T, U>(
  scope: OperatorScope,
  input: Operator,
  mapper: UnaryFunction<T, U>,
  options: KeyedOperatorOptions<T> = {},
): DistinctOperator {
  const operator: DistinctOperator = {
    ...operatorBase(scope, 'distinct', [input], options),
    mapper,
  }
  scope.register(operator)
  return operator
}

/**
 * Emits each distinct element once per window
 */
export function distinct<T>(
  options?: Omit<KeyedOperatorOptions<T>, 'keyType'>,
): PipedOperator<T, T>
/**
 * Emits each distinct `mapper` result once per window
 */
export function distinct<T, U>(
  mapper: UnaryFunction<T, U>,
  options?: Omit<KeyedOperatorOptions<T>, 'keyType'>,
): PipedOperator<T, U>
export function distinct<T, U>(
  mapperOrOptions?:
    | UnaryFunction<T, U>
    | Omit<KeyedOperatorOptions<T>, 'keyType'>,
  maybeOptions?: Omit<KeyedOperatorOptions<T>, 'keyType'>,
): PipedOperator<T, T | U> {
  const mapper: UnaryFunction<T, T | U> =
    typeof mapperOrOptions === 'function' ? mapperOrOptions : (x: T) => x
  const options =
    typeof mapperOrOptions === 'function' ? maybeOptions : mapperOrOptions
  return (dataset) =>
    dataset.derive<T | U>(
      createDistinct(dataset.flow, dataset.producer, mapper, options),
    )
}

export function expandDistinct(
  operator: DistinctOperator,
  scope: ExpansionScope,
): MapOperator {
  const reduced = createReduceByKey(
    scope,
    operator.inputs[0],
    operator.mapper,
    () => null,
    (a: null) => a,
    { name: scope.childName('reduceByKey'), windowing: operator.windowing },
  )
  return createMap<[unknown, null], unknown>(
    scope,
    reduced,
    ([key]) => key,
    { name: scope.childName('map') },
  )
}
