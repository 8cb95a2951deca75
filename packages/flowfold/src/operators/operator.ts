import type { DataSink } from '../io/sink.js'
import type { Windowing } from '../windowing/windowing.js'
import type { AssignEventTimeOperator } from './assign-event-time.js'
import type { CountByKeyOperator } from './count-by-key.js'
import type { DistinctOperator } from './distinct.js'
import type { FilterOperator } from './filter.js'
import type { FlatMapOperator } from './flat-map.js'
import type { InputOperator } from './input.js'
import type { JoinOperator } from './join.js'
import type { MapOperator } from './map.js'
import type { ReduceByKeyOperator } from './reduce-by-key.js'
import type { ReduceStateByKeyOperator } from './reduce-state-by-key.js'
import type { ReduceWindowOperator } from './reduce-window.js'
import type { SumByKeyOperator } from './sum-by-key.js'
import type { UnionOperator } from './union.js'

export type OperatorHint = 'expensive'

/**
 * Fields shared by every operator node. Value types of the user functions a
 * node carries are erased; the typed `Dataset` API guarantees they line up.
 */
export interface OperatorBase<K extends string = string> {
  readonly id: string
  readonly kind: K
  readonly name: string
  /** Producing operators, in order */
  readonly inputs: readonly Operator[]
  readonly windowing?: Windowing<unknown>
  readonly hints: Set<OperatorHint>
  estimatedSize?: number
  sink?: DataSink<unknown>
}

export type Operator =
  | InputOperator
  | FlatMapOperator
  | UnionOperator
  | ReduceStateByKeyOperator
  | MapOperator
  | FilterOperator
  | AssignEventTimeOperator
  | ReduceByKeyOperator
  | SumByKeyOperator
  | CountByKeyOperator
  | ReduceWindowOperator
  | DistinctOperator
  | JoinOperator

export type OperatorKind = Operator['kind']

export type OperatorOfKind<K extends OperatorKind> = Extract<Operator, { kind: K }>

/**
 * Allocates operator ids and takes ownership of new operators.
 */
export interface OperatorScope {
  nextOperatorId(): string
  register(operator: Operator): void
}

/**
 * Scope in which a derived operator is expanded into simpler ones.
 */
export interface ExpansionScope extends OperatorScope {
  /** Name for an operator of `kind` created by the expansion */
  childName(kind: OperatorKind): string
}

export interface OperatorOptions {
  name?: string
}

export interface KeyedOperatorOptions<T = unknown> extends OperatorOptions {
  /** Defaults to the windows elements already carry */
  windowing?: Windowing<T>
  /** Names the key type, used to look up a registered key comparator */
  keyType?: string
}

export function operatorBase<K extends OperatorKind>(
  scope: OperatorScope,
  kind: K,
  inputs: readonly Operator[],
  options: OperatorOptions & { windowing?: Windowing<unknown> } = {},
): OperatorBase<K> {
  return {
    id: scope.nextOperatorId(),
    kind,
    name: options.name ?? kind,
    inputs,
    windowing: options.windowing,
    hints: new Set(),
  }
}
