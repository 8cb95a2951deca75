import { describe, test, expect } from 'vitest'
import { MessageType } from '../../src/local/graph.js'
import { LocalGraph } from '../../src/local/local-graph.js'
import { flatMap } from '../../src/local/operators/flat-map.js'
import { union } from '../../src/local/operators/union.js'
import type { WindowedElement } from '../../src/types.js'
import { GlobalWindow } from '../../src/windowing/window.js'

function element(value: number): WindowedElement<number> {
  return { element: value, timestamp: 0, window: GlobalWindow.INSTANCE }
}

function buildGraph() {
  const graph = new LocalGraph()
  const a = graph.newInput<number>()
  const b = graph.newInput<number>()
  const output = flatMap<number, number>(union([a, b]), (x, out) =>
    out.collect(x * 10),
  )
  const reader = output.connectReader()
  graph.finalize()
  return { graph, a, b, reader }
}

describe('LocalGraph', () => {
  test('forwards data and the minimum input watermark', () => {
    const { graph, a, b, reader } = buildGraph()
    a.sendData([element(1)])
    b.sendData([element(2)])
    a.sendWatermark(5)
    b.sendWatermark(3)
    graph.run()

    expect(reader.drain()).toEqual([
      { type: MessageType.DATA, data: [element(10)] },
      { type: MessageType.DATA, data: [element(20)] },
      { type: MessageType.WATERMARK, data: 3 },
    ])
    expect(graph.pendingWork()).toBe(false)
  })

  test('only forwards watermarks that advance', () => {
    const { graph, a, b, reader } = buildGraph()
    a.sendWatermark(3)
    b.sendWatermark(3)
    graph.run()
    a.sendWatermark(7)
    graph.run()
    expect(reader.drain()).toEqual([{ type: MessageType.WATERMARK, data: 3 }])
  })

  test('collected timestamps replace the input timestamp', () => {
    const graph = new LocalGraph()
    const input = graph.newInput<number>()
    const reader = flatMap<number, number>(input, (x, out) =>
      out.collect(x, x * 100),
    ).connectReader()
    graph.finalize()
    input.sendData([element(2)])
    graph.run()
    expect(reader.drain()).toEqual([
      {
        type: MessageType.DATA,
        data: [{ element: 2, timestamp: 200, window: GlobalWindow.INSTANCE }],
      },
    ])
  })

  test('rejects watermarks that move backwards', () => {
    const { a } = buildGraph()
    a.sendWatermark(5)
    expect(() => a.sendWatermark(1)).toThrow('Invalid watermark')
  })

  test('is built before it runs', () => {
    const graph = new LocalGraph()
    expect(() => graph.step()).toThrow('Graph not finalized')
    graph.finalize()
    expect(() => graph.newInput()).toThrow('Graph already finalized')
  })
})
