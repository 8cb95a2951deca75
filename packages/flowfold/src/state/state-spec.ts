import type { BinaryFunction } from '../types.js'

/**
 * Describes how values of one key and window are folded into an accumulator
 * and what the accumulator emits once its window completes.
 *
 * `combine` must agree with `add`: folding two halves of a sequence and
 * combining them gives the same result as folding the whole sequence. It is
 * used when windows merge.
 */
export interface StateSpec<V, A, O> {
  create(): A
  add(accumulator: A, value: V): A
  combine(left: A, right: A): A
  flush(accumulator: A): Iterable<O>
}

/**
 * State holding at most one value, reduced pairwise with `reducer`.
 */
export function reducingState<V>(
  reducer: BinaryFunction<V, V, V>,
): StateSpec<V, V[], V> {
  const merge = (left: V[], right: V[]): V[] => {
    if (left.length === 0) return right
    if (right.length === 0) return left
    return [reducer(left[0], right[0])]
  }
  return {
    create: () => [],
    add: (accumulator, value) => merge(accumulator, [value]),
    combine: merge,
    flush: (accumulator) => accumulator,
  }
}
