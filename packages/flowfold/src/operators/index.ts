export * from './operator.js'
export * from './input.js'
export * from './flat-map.js'
export * from './union.js'
export * from './reduce-state-by-key.js'
export * from './map.js'
export * from './filter.js'
export * from './assign-event-time.js'
export * from './reduce-by-key.js'
export * from './sum-by-key.js'
export * from './count-by-key.js'
export * from './reduce-window.js'
export * from './distinct.js'
export * from './join.js'
