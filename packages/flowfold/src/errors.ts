import type { Window } from './windowing/window.js'
import { encodeKey } from './utils.js'

/**
 * Base class of every error raised by flowfold.
 */
export class FlowfoldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'FlowfoldError'
  }
}

/**
 * Raised during lowering when an operator is accepted by no rule and has no
 * decomposition. The whole lowering pass is aborted.
 */
export class UnsupportedOperatorError extends FlowfoldError {
  readonly kind: string
  readonly operatorName: string

  constructor(kind: string, operatorName: string) {
    super(`Operator ${operatorName} of kind '${kind}' not supported`)
    this.name = 'UnsupportedOperatorError'
    this.kind = kind
    this.operatorName = operatorName
  }
}

/**
 * Raised when expanding an operator kind leads back into an expansion of the
 * same kind.
 */
export class DecompositionCycleError extends FlowfoldError {
  readonly kinds: readonly string[]

  constructor(kinds: readonly string[]) {
    super(`Decomposition cycle: ${kinds.join(' -> ')}`)
    this.name = 'DecompositionCycleError'
    this.kinds = kinds
  }
}

/**
 * Errors confined to a single key. Processing of other keys continues.
 */
export class KeyedStateError extends FlowfoldError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = 'KeyedStateError'
  }
}

/**
 * A merging windowing strategy reported a merge whose source window is not
 * tracked for the key being processed.
 */
export class MergeConsistencyError extends KeyedStateError {
  readonly key: unknown
  readonly window: Window

  constructor(key: unknown, window: Window) {
    super(
      `Merge references window ${window.id} which is not tracked for key ${encodeKey(key)}`,
    )
    this.name = 'MergeConsistencyError'
    this.key = key
    this.window = window
  }
}

/**
 * A spilled state entry could not be restored. The entry is dropped.
 */
export class StateCorruptionError extends KeyedStateError {
  readonly address: string

  constructor(address: string, reason: string, options?: { cause?: unknown }) {
    super(`Spilled state ${address} is corrupt: ${reason}`, options)
    this.name = 'StateCorruptionError'
    this.address = address
  }
}

/**
 * The spill backing store failed. Never retried.
 */
export class SpillIOError extends FlowfoldError {
  readonly operation: 'write' | 'read' | 'delete' | 'clear'
  readonly address: string | undefined

  constructor(
    operation: 'write' | 'read' | 'delete' | 'clear',
    address: string | undefined,
    cause: unknown,
  ) {
    super(
      `Spill ${operation} failed${address === undefined ? '' : ` for ${address}`}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    )
    this.name = 'SpillIOError'
    this.operation = operation
    this.address = address
  }
}

/**
 * An accumulator could not be serialized for spilling. The entry stays
 * resident and the run is aborted.
 */
export class StateSerializationError extends FlowfoldError {
  readonly address: string

  constructor(address: string, cause: unknown) {
    super(
      `Cannot spill state ${address}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause },
    )
    this.name = 'StateSerializationError'
    this.address = address
  }
}

/**
 * Executor settings failed validation.
 */
export class SettingsError extends FlowfoldError {
  readonly issues: readonly string[]

  constructor(issues: readonly string[]) {
    super(`Invalid settings:\n${issues.map((i) => `  - ${i}`).join('\n')}`)
    this.name = 'SettingsError'
    this.issues = issues
  }
}
