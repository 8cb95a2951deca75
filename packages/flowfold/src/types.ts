import type { Window } from './windowing/window.js'

export type KeyValue<K, V> = [K, V]

/**
 * An element of a dataset together with its event timestamp and the window
 * it currently belongs to.
 */
export interface WindowedElement<T, W extends Window = Window> {
  readonly element: T
  readonly timestamp: number
  readonly window: W
}

/**
 * An element that has been assigned candidate windows but whose final window
 * is not known until merges for its key have been resolved.
 */
export interface MultiWindowedElement<T, W extends Window = Window> {
  readonly element: T
  readonly timestamp: number
  readonly windows: readonly W[]
}

// User functions are declared through method signatures, which are compared
// bivariantly. This lets a typed function such as `(word: string) => number`
// be stored on an operator node whose value types have been erased.
export type UnaryFunction<I, O> = { fn(input: I): O }['fn']
export type BinaryFunction<A, B, O> = { fn(a: A, b: B): O }['fn']
export type Comparator<T> = BinaryFunction<T, T, number>

export interface Collector<T> {
  collect(value: T, timestamp?: number): void
}

export type FlatMapFunction<I, O> = {
  fn(input: I, collector: Collector<O>): void
}['fn']

export type Logger = typeof console.log
