import { describe, test, expect } from 'vitest'
import {
  ExecutionCoordinator,
  ExecutorContext,
} from '../../src/executor/coordinator.js'
import { Flow } from '../../src/flow.js'
import { DataSink, ListDataSink } from '../../src/io/sink.js'
import { ListDataSource } from '../../src/io/source.js'
import type { DagNodeInfo } from '../../src/lowering/dag.js'
import { lower } from '../../src/lowering/lower.js'
import {
  AcceptorContext,
  defineRule,
  RuleTable,
} from '../../src/lowering/rules.js'
import { map } from '../../src/operators/index.js'

// Outputs are the path of operator names that produced them
type Trace = string[]

class RecordingContext implements ExecutorContext<Trace> {
  materialized: string[] = []
  written: [string, Trace][] = []

  materialize(node: DagNodeInfo, output: Trace): Trace {
    this.materialized.push(node.operator.name)
    return [...output, 'cached']
  }

  writeToSink(node: DagNodeInfo, output: Trace, sink: DataSink<unknown>) {
    this.written.push([node.operator.name, output])
    sink.write(output.join(' > '))
  }
}

const rules = new RuleTable<Trace, RecordingContext>([
  defineRule('input', 'input', (op): Trace => [op.name]),
  defineRule('map', 'map', (op, inputs: readonly Trace[]): Trace => [
    ...inputs[0],
    op.name,
  ]),
])

function execute(flow: Flow) {
  const dag = lower(flow.finalize(), rules, new AcceptorContext())
  const context = new RecordingContext()
  const result = new ExecutionCoordinator(dag, context).execute()
  return { dag, context, result }
}

describe('ExecutionCoordinator', () => {
  test('materializes expensive outputs consumed more than once', () => {
    const flow = new Flow()
    const input = flow.createInput(ListDataSource.bounded([1, 2]))
    const doubled = input
      .pipe(map((x: number) => x * 2, { name: 'double' }))
      .hint('expensive')
    const a = new ListDataSink<unknown>()
    const b = new ListDataSink<unknown>()
    doubled.pipe(map((x: number) => x, { name: 'a' })).persist(a)
    doubled.pipe(map((x: number) => x, { name: 'b' })).persist(b)
    input.pipe(map((x: number) => x, { name: 'plain' }))

    const { dag, context, result } = execute(flow)

    expect(context.materialized).toEqual(['double'])
    expect(result.materialized.map((node) => node.operator.name)).toEqual([
      'double',
    ])
    expect(context.written).toEqual([
      ['a', ['input', 'double', 'cached', 'a']],
      ['b', ['input', 'double', 'cached', 'b']],
    ])
    expect(result.sinks).toEqual([a, b])
    expect(a.getOutputs()).toEqual(['input > double > cached > a'])
    expect(result.outputs.get(dag.nodes[4])).toEqual(['input', 'plain'])
  })

  test('does not materialize cheap shared outputs or expensive single ones', () => {
    const flow = new Flow()
    const input = flow.createInput(ListDataSource.bounded([1]))
    input.pipe(map((x: number) => x, { name: 'x' })).hint('expensive')
    input.pipe(map((x: number) => x, { name: 'y' }))

    const { context, result } = execute(flow)
    expect(context.materialized).toEqual([])
    expect(result.materialized).toEqual([])
  })

  test('writes sinks attached to inner nodes', () => {
    const flow = new Flow()
    const sink = new ListDataSink<unknown>()
    flow
      .createInput(ListDataSource.bounded([1]))
      .persist(sink)
      .pipe(map((x: number) => x, { name: 'after' }))

    const { context } = execute(flow)
    expect(context.written).toEqual([['input', ['input']]])
    expect(sink.getOutputs()).toEqual(['input'])
  })
})
