/**
 * JSON codec: serialization, schema validation, wiring validation.
 */

import { describe, test, expect } from 'vitest'
import { z } from 'zod'
import { atomic, copy, junction } from '../boxes'
import { composeDiagrams, singletonDiagram, tensorDiagrams } from '../builders'
import { WiringDiagram } from '../diagram'
import { INPUT_ID, OUTPUT_ID, wire } from '../ports'
import { parseDiagram, serializeDiagram } from '../serialize'

const f = atomic('f', ['A'], ['B'])

describe('serializeDiagram', () => {
  test('produces plain JSON data', () => {
    const d = composeDiagrams(singletonDiagram(f), singletonDiagram(copy('B')))
    expect(JSON.parse(JSON.stringify(serializeDiagram(d)))).toEqual({
      inputs: ['A'],
      outputs: ['B', 'B'],
      boxes: [
        { id: 1, box: { kind: 'atomic', value: 'f', inputs: ['A'], outputs: ['B'] } },
        { id: 2, box: { kind: 'copy', value: 'B' } },
      ],
      wires: [
        { source: { box: -1, kind: 'output', port: 1 }, target: { box: 1, kind: 'input', port: 1 } },
        { source: { box: 1, kind: 'output', port: 1 }, target: { box: 2, kind: 'input', port: 1 } },
        { source: { box: 2, kind: 'output', port: 1 }, target: { box: -2, kind: 'input', port: 1 } },
        { source: { box: 2, kind: 'output', port: 2 }, target: { box: -2, kind: 'input', port: 2 } },
      ],
    })
  })
})

describe('parseDiagram', () => {
  test('parses a serialized diagram back to an equal one', () => {
    const d = tensorDiagrams(
      composeDiagrams(singletonDiagram(f), singletonDiagram(copy('B'))),
      singletonDiagram(junction('C', 2, 0)),
    )
    const result = parseDiagram(JSON.parse(JSON.stringify(serializeDiagram(d))))
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.equals(d)).toBe(true)
  })

  test('relabels sparse box ids', () => {
    const result = parseDiagram({
      inputs: ['A'],
      outputs: ['B'],
      boxes: [{ id: 40, box: { kind: 'atomic', value: 'f', inputs: ['A'], outputs: ['B'] } }],
      wires: [
        { source: { box: -1, kind: 'output', port: 1 }, target: { box: 40, kind: 'input', port: 1 } },
        { source: { box: 40, kind: 'output', port: 1 }, target: { box: -2, kind: 'input', port: 1 } },
      ],
    })
    expect(result.ok).toBe(true)
    if (result.ok) {
      expect(result.value.boxIds()).toEqual([1])
      expect(result.value.wires()).toEqual([wire([INPUT_ID, 1], [1, 1]), wire([1, 1], [OUTPUT_ID, 1])])
    }
  })

  test('accepts custom value schemas', () => {
    const d = new WiringDiagram<number, { name: string }>([1], [2])
    const id = d.addBox(atomic({ name: 'inc' }, [1], [2]))
    d.addWires([wire([INPUT_ID, 1], [id, 1]), wire([id, 1], [OUTPUT_ID, 1])])
    const result = parseDiagram(serializeDiagram(d), {
      value: z.number(),
      boxValue: z.object({ name: z.string() }),
    })
    expect(result.ok).toBe(true)
    if (result.ok) expect(result.value.equals(d)).toBe(true)
  })

  test('reports schema violations with their paths', () => {
    const result = parseDiagram({
      inputs: ['A', 3],
      outputs: [],
      boxes: [{ id: 1, box: { kind: 'junction', value: 'A', ninputs: -1, noutputs: 0 } }],
      wires: [],
    })
    expect(result.ok).toBe(false)
    if (!result.ok) {
      expect(result.error).toHaveLength(1)
      expect(result.error[0]).toMatch(/^boxes\.0\.box\.ninputs: /)
    }
  })

  test('reports bad port values after the shape checks out', () => {
    const result = parseDiagram({ inputs: ['A', 3], outputs: [], boxes: [], wires: [] })
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error).toEqual(['inputs.1: Expected string, received number'])
  })

  test('reports duplicate ids, unknown ids and wiring errors', () => {
    const box = { kind: 'copy', value: 'A' }
    const duplicate = parseDiagram({ inputs: [], outputs: [], boxes: [{ id: 1, box }, { id: 1, box }], wires: [] })
    expect(duplicate).toEqual({ ok: false, error: ['boxes: duplicate box id 1'] })

    const unknown = parseDiagram({
      inputs: ['A'],
      outputs: [],
      boxes: [],
      wires: [{ source: { box: -1, kind: 'output', port: 1 }, target: { box: 5, kind: 'input', port: 1 } }],
    })
    expect(unknown).toEqual({ ok: false, error: ['wires.0.target: unknown box id 5'] })

    const mismatch = parseDiagram({
      inputs: ['A'],
      outputs: ['B'],
      boxes: [],
      wires: [{ source: { box: -1, kind: 'output', port: 1 }, target: { box: -2, kind: 'input', port: 1 } }],
    })
    expect(mismatch.ok).toBe(false)
    if (!mismatch.ok) expect(mismatch.error[0]).toMatch(/^wires: Port type mismatch/)
  })

  test('rejects input that is not a diagram', () => {
    const result = parseDiagram('not a diagram')
    expect(result.ok).toBe(false)
    if (!result.ok) expect(result.error[0]).toMatch(/^\(root\): /)
  })
})
