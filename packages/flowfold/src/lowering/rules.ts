import type {
  Operator,
  OperatorKind,
  OperatorOfKind,
} from '../operators/operator.js'
import type { Comparator } from '../types.js'

/**
 * Information shared by every acceptance predicate of a lowering pass.
 */
export class AcceptorContext {
  readonly broadcastJoinThreshold: number
  #comparators: ReadonlyMap<string, Comparator<unknown>>

  constructor(
    options: {
      comparators?: ReadonlyMap<string, Comparator<unknown>>
      broadcastJoinThreshold?: number
    } = {},
  ) {
    this.#comparators = options.comparators ?? new Map()
    this.broadcastJoinThreshold = options.broadcastJoinThreshold ?? 1_000
  }

  hasComparator(keyType: string | undefined): boolean {
    return keyType !== undefined && this.#comparators.has(keyType)
  }

  comparator(keyType: string | undefined): Comparator<unknown> | undefined {
    return keyType === undefined ? undefined : this.#comparators.get(keyType)
  }

  get comparators(): ReadonlyMap<string, Comparator<unknown>> {
    return this.#comparators
  }
}

/**
 * Translates operators of one kind into a backend's output type `Out`.
 *
 * A rule with an `accept` predicate is only selected for operators it
 * accepts; the next rule registered for the kind is tried otherwise.
 */
export interface TranslationRule<
  Out,
  Ctx,
  K extends OperatorKind = OperatorKind,
> {
  readonly kind: K
  readonly name: string
  accept?(operator: OperatorOfKind<K>, context: AcceptorContext): boolean
  translate(
    operator: OperatorOfKind<K>,
    inputs: readonly Out[],
    context: Ctx,
  ): Out
}

export function defineRule<K extends OperatorKind, Out, Ctx>(
  kind: K,
  name: string,
  translate: (
    operator: OperatorOfKind<K>,
    inputs: readonly Out[],
    context: Ctx,
  ) => Out,
  accept?: (operator: OperatorOfKind<K>, context: AcceptorContext) => boolean,
): TranslationRule<Out, Ctx, K> {
  return accept ? { kind, name, translate, accept } : { kind, name, translate }
}

/**
 * An immutable, ordered set of translation rules indexed by operator kind.
 */
export class RuleTable<Out, Ctx> {
  #rules: readonly TranslationRule<Out, Ctx>[]
  #byKind = new Map<OperatorKind, TranslationRule<Out, Ctx>[]>()

  constructor(rules: Iterable<TranslationRule<Out, Ctx>>) {
    this.#rules = Object.freeze([...rules])
    for (const rule of this.#rules) {
      const forKind = this.#byKind.get(rule.kind) ?? []
      forKind.push(rule)
      this.#byKind.set(rule.kind, forKind)
    }
  }

  get rules(): readonly TranslationRule<Out, Ctx>[] {
    return this.#rules
  }

  kinds(): OperatorKind[] {
    return [...this.#byKind.keys()]
  }

  rulesFor(kind: OperatorKind): readonly TranslationRule<Out, Ctx>[] {
    return this.#byKind.get(kind) ?? []
  }

  /**
   * The first rule registered for the operator's kind that accepts it
   */
  select(
    operator: Operator,
    context: AcceptorContext,
  ): TranslationRule<Out, Ctx> | undefined {
    return this.rulesFor(operator.kind).find(
      (rule) => !rule.accept || rule.accept(operator, context),
    )
  }
}
