export * from './types.js'
export * from './errors.js'
export * from './settings.js'
export { DefaultMap, encodeKey, hash } from './utils.js'
export * from './flow.js'
export * from './operators/index.js'
export * from './io/source.js'
export * from './io/sink.js'
export * from './windowing/window.js'
export * from './windowing/windowing.js'
export * from './windowing/engine.js'
export * from './state/state-spec.js'
export * from './state/state-store.js'
export * from './state/spill.js'
export * from './state/serializer.js'
export * from './state/sqlite/database.js'
export * from './state/sqlite/spill.js'
export * from './lowering/rules.js'
export * from './lowering/dag.js'
export * from './lowering/decompose.js'
export * from './lowering/lower.js'
export * from './executor/coordinator.js'
export { LocalExecutor } from './local/executor.js'
export type {
  LocalExecutionResult,
  LocalExecutorOptions,
} from './local/executor.js'
export { LocalExecutionContext } from './local/context.js'
export { localRules, broadcastSide } from './local/rules.js'
