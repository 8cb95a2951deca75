import { describe, test, expect } from 'vitest'
import { Flow } from '../src/flow.js'
import { ListDataSink } from '../src/io/sink.js'
import { ListDataSource } from '../src/io/source.js'
import { createMap, filter, map, union } from '../src/operators/index.js'

describe('Flow', () => {
  test('registers operators in creation order', () => {
    const flow = new Flow('numbers')
    const input = flow.createInput(ListDataSource.bounded([1, 2, 3]))
    const output = input.pipe(
      map((x: number) => x * 2, { name: 'double' }),
      filter((x: number) => x > 2),
    )

    expect(
      flow.operators().map(({ id, kind, name }) => [id, kind, name]),
    ).toEqual([
      ['0', 'input', 'input'],
      ['1', 'map', 'double'],
      ['2', 'filter', 'filter'],
    ])
    expect(output.producer.inputs[0].id).toBe('1')
  })

  test('inputs take their estimated size from the source', () => {
    const flow = new Flow()
    expect(
      flow.createInput(ListDataSource.bounded(['a', 'b'])).producer
        .estimatedSize,
    ).toBe(2)
    expect(
      flow
        .createInput(ListDataSource.bounded(['a']), { estimatedSize: 50 })
        .producer.estimatedSize,
    ).toBe(50)
  })

  test('hints, sinks and size estimates land on the producer', () => {
    const flow = new Flow()
    const sink = new ListDataSink<number>()
    const doubled = flow
      .createInput(ListDataSource.bounded([1]))
      .pipe(map((x: number) => x * 2))
      .hint('expensive')
      .estimateSize(7)
      .persist(sink)

    expect([...doubled.producer.hints]).toEqual(['expensive'])
    expect(doubled.producer.estimatedSize).toBe(7)
    expect(doubled.producer.sink).toBe(sink)
  })

  test('a finalized flow is frozen', () => {
    const flow = new Flow()
    const input = flow.createInput(ListDataSource.bounded([1]))
    flow.finalize()

    expect(flow.finalized).toBe(true)
    expect(() => flow.createInput(ListDataSource.bounded([2]))).toThrow(
      'Flow already finalized',
    )
    expect(() => input.persist(new ListDataSink())).toThrow(
      'Flow already finalized',
    )
    expect(() => flow.finalize()).toThrow('Flow already finalized')
  })

  test('datasets of different flows cannot be combined', () => {
    const a = new Flow('a').createInput(ListDataSource.bounded([1]))
    const b = new Flow('b').createInput(ListDataSource.bounded([2]))

    expect(() => a.pipe(union(b))).toThrow(
      'Cannot union datasets from different flows',
    )
    expect(() =>
      createMap(b.flow, a.producer, (x: number) => x),
    ).toThrow('Operator map consumes input from another flow')
  })
})
