import { expandAssignEventTime } from '../operators/assign-event-time.js'
import { expandCountByKey } from '../operators/count-by-key.js'
import { expandDistinct } from '../operators/distinct.js'
import { expandFilter } from '../operators/filter.js'
import { expandJoin } from '../operators/join.js'
import { expandMap } from '../operators/map.js'
import type {
  ExpansionScope,
  Operator,
  OperatorKind,
} from '../operators/operator.js'
import { expandReduceByKey } from '../operators/reduce-by-key.js'
import { expandReduceWindow } from '../operators/reduce-window.js'
import { expandSumByKey } from '../operators/sum-by-key.js'

/**
 * Expands an operator into simpler ones created in `scope`, returning the
 * operator that produces the expanded operator's output. `undefined` means the kind
 * has no expansion.
 */
export type Decomposer = (
  operator: Operator,
  scope: ExpansionScope,
) => Operator | undefined

export const decompose: Decomposer = (operator, scope) => {
  switch (operator.kind) {
    case 'input':
    case 'flatMap':
    case 'union':
    case 'reduceStateByKey':
      return undefined
    case 'map':
      return expandMap(operator, scope)
    case 'filter':
      return expandFilter(operator, scope)
    case 'assignEventTime':
      return expandAssignEventTime(operator, scope)
    case 'reduceByKey':
      return expandReduceByKey(operator, scope)
    case 'sumByKey':
      return expandSumByKey(operator, scope)
    case 'countByKey':
      return expandCountByKey(operator, scope)
    case 'reduceWindow':
      return expandReduceWindow(operator, scope)
    case 'distinct':
      return expandDistinct(operator, scope)
    case 'join':
      return expandJoin(operator, scope)
  }
}

/**
 * Collects the operators created while expanding `parent`. Their ids are
 * derived from the parent's, so repeated expansions agree.
 */
export class Expansion implements ExpansionScope {
  #parent: Operator
  #nextOperatorId = 0
  #operators: Operator[] = []

  constructor(parent: Operator) {
    this.#parent = parent
  }

  nextOperatorId(): string {
    return `${this.#parent.id}.${this.#nextOperatorId++}`
  }

  register(operator: Operator): void {
    this.#operators.push(operator)
  }

  childName(kind: OperatorKind): string {
    return `${this.#parent.name}/${kind}`
  }

  get operators(): readonly Operator[] {
    return this.#operators
  }
}
