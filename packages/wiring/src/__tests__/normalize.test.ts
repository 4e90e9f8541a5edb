/**
 * Copy, delete and cartesian normalization.
 */

import { describe, test, expect } from 'vitest'
import { atomic, copy, create, del, merge } from '../boxes'
import { composeDiagrams, identityDiagram, singletonDiagram, tensorDiagrams } from '../builders'
import { WiringDiagram } from '../diagram'
import { FixpointLimitError, UnsupportedStructureError } from '../errors'
import { addJunctions } from '../junctions'
import { checkDeadCodeComplete, checkIdempotent } from '../laws'
import { normalizeCartesian, normalizeCopy, normalizeDelete } from '../normalize'
import { INPUT_ID, OUTPUT_ID, wire } from '../ports'

const f = atomic('f', ['A'], ['B'])
const g = atomic('g', ['B'], ['C'])
const h = atomic('h', ['C'], ['D'])

const sf = () => singletonDiagram(f)
const sg = () => singletonDiagram(g)

/** copy ; (f ⊗ f) */
const copiedF = () => composeDiagrams(singletonDiagram(copy('A')), tensorDiagrams(sf(), sf()))

// ─── Copy ───────────────────────────────────────────────────────────────────

describe('normalizeCopy', () => {
  test('copy ; (f ⊗ f) becomes f ; copy', () => {
    const d = normalizeCopy(copiedF())
    expect(d.equals(composeDiagrams(sf(), singletonDiagram(copy('B'))))).toBe(true)
  })

  test('pushes a copy through a chain of duplicated boxes', () => {
    const d = normalizeCopy(composeDiagrams(
      sf(),
      singletonDiagram(copy('B')),
      tensorDiagrams(sg(), sg()),
    ))
    expect(d.equals(composeDiagrams(sf(), sg(), singletonDiagram(copy('C'))))).toBe(true)
  })

  test('flattens chained copies into the canonical chain', () => {
    const d = normalizeCopy(composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(singletonDiagram(copy('A')), identityDiagram(['A'])),
    ))
    const canonical = composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(identityDiagram(['A']), singletonDiagram(copy('A'))),
    )
    expect(d.equals(canonical)).toBe(true)
  })

  test('pushes a copy through two layers of duplicated boxes', () => {
    const d = normalizeCopy(composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(sf(), sf()),
      tensorDiagrams(sg(), sg()),
    ))
    expect(d.equals(composeDiagrams(sf(), sg(), singletonDiagram(copy('C'))))).toBe(true)
  })

  test('leaves a create with a dangling output alone', () => {
    const d = new WiringDiagram<string, string>([], [])
    d.addBox(create('A'))
    const before = d.clone()
    normalizeCopy(d)
    expect(d.equals(before)).toBe(true)
    expect(d.boxes().map(([, b]) => b.kind)).toEqual(['create'])
  })

  test('leaves a merge with a dangling output alone', () => {
    const d = new WiringDiagram<string, string>(['A', 'A'], [])
    const id = d.addBox(merge('A'))
    d.addWires([wire([INPUT_ID, 1], [id, 1]), wire([INPUT_ID, 2], [id, 2])])
    const before = d.clone()
    normalizeCopy(d)
    expect(d.equals(before)).toBe(true)
    expect(d.boxes().map(([, b]) => b.kind)).toEqual(['merge'])
  })

  test('merges boxes fed from the same input port', () => {
    const d = new WiringDiagram(['A'], ['B', 'B'])
    const [f1, f2] = d.addBoxes([f, f])
    if (f1 === undefined || f2 === undefined) throw new Error('expected two ids')
    d.addWires([
      wire([INPUT_ID, 1], [f1, 1]),
      wire([INPUT_ID, 1], [f2, 1]),
      wire([f1, 1], [OUTPUT_ID, 1]),
      wire([f2, 1], [OUTPUT_ID, 2]),
    ])
    normalizeCopy(d)
    expect(d.equals(composeDiagrams(sf(), singletonDiagram(copy('B'))))).toBe(true)
  })

  test('mutates and returns the same instance', () => {
    const d = copiedF()
    expect(normalizeCopy(d)).toBe(d)
    expect(d.boxCount).toBe(2)
  })

  test('keeps a diagram given in junction form in junction form', () => {
    const d = normalizeCopy(addJunctions(copiedF()))
    expect(d.boxes().map(([, b]) => b.kind)).toEqual(['atomic', 'junction'])
  })

  test('is idempotent', () => {
    expect(checkIdempotent(normalizeCopy, copiedF())).toBe(true)
    expect(checkIdempotent(normalizeCopy, composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(sf(), singletonDiagram(copy('A'))),
      tensorDiagrams(identityDiagram(['B']), sf(), sf()),
    ))).toBe(true)
  })

  test('gives up after the round bound', () => {
    let thrown: unknown
    try {
      normalizeCopy(copiedF(), { maxRounds: 1 })
    } catch (e) {
      thrown = e
    }
    expect(thrown).toBeInstanceOf(FixpointLimitError)
    if (thrown instanceof FixpointLimitError) {
      expect(thrown.pass).toBe('normalizeCopy')
      expect(thrown.rounds).toBe(1)
    }
    expect(() => normalizeCopy(copiedF(), { maxRounds: 2 })).not.toThrow()
  })
})

// ─── Delete ─────────────────────────────────────────────────────────────────

describe('normalizeDelete', () => {
  test('removes boxes that never reach an output', () => {
    const d = new WiringDiagram(['A'], ['B'])
    const [fId, gId, hId] = d.addBoxes([f, g, h])
    if (fId === undefined || gId === undefined || hId === undefined) throw new Error('expected three ids')
    d.addWires([
      wire([INPUT_ID, 1], [fId, 1]),
      wire([fId, 1], [gId, 1]),
      wire([gId, 1], [hId, 1]),
      wire([fId, 1], [OUTPUT_ID, 1]),
    ])
    normalizeDelete(d)
    expect(d.boxIds()).toEqual([fId])
    expect(d.wires()).toEqual([wire([INPUT_ID, 1], [fId, 1]), wire([fId, 1], [OUTPUT_ID, 1])])
  })

  test('f ; delete leaves nothing', () => {
    const d = normalizeDelete(composeDiagrams(sf(), singletonDiagram(del('B'))))
    expect(d.equals(new WiringDiagram(['A'], []))).toBe(true)
  })

  test('drops a deleted branch of a parallel composition', () => {
    const d = normalizeDelete(composeDiagrams(
      tensorDiagrams(sf(), singletonDiagram(atomic('k', ['A'], ['C']))),
      tensorDiagrams(identityDiagram(['B']), singletonDiagram(del('C'))),
    ))
    const expected = new WiringDiagram(['A', 'A'], ['B'])
    const id = expected.addBox(f)
    expected.addWires([wire([INPUT_ID, 1], [id, 1]), wire([id, 1], [OUTPUT_ID, 1])])
    expect(d.equals(expected)).toBe(true)
  })

  test('removes an unconnected box and keeps pass-through wires', () => {
    const d = identityDiagram<string, string>(['A'])
    d.addBox(f)
    normalizeDelete(d)
    expect(d.boxCount).toBe(0)
    expect(d.wires()).toEqual([wire([INPUT_ID, 1], [OUTPUT_ID, 1])])
  })

  test('removes a copy whose branches are both deleted', () => {
    const d = normalizeDelete(composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(singletonDiagram(del('A')), singletonDiagram(del('A'))),
    ))
    expect(d.boxCount).toBe(0)
    expect(d.wireCount).toBe(0)
  })

  test('leaves every remaining box live', () => {
    expect(checkDeadCodeComplete(composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(sf(), sf()),
      tensorDiagrams(identityDiagram(['B']), singletonDiagram(del('B'))),
    ))).toBe(true)
  })
})

// ─── Cartesian ──────────────────────────────────────────────────────────────

describe('normalizeCartesian', () => {
  test('combines copy and delete normalization', () => {
    const d = normalizeCartesian(composeDiagrams(
      copiedF(),
      tensorDiagrams(identityDiagram(['B']), singletonDiagram(del('B'))),
    ))
    expect(d.equals(sf())).toBe(true)
  })

  test('keeps one of three copied boxes when the third branch is deleted', () => {
    const d = normalizeCartesian(composeDiagrams(
      singletonDiagram(copy('A')),
      tensorDiagrams(identityDiagram(['A']), singletonDiagram(copy('A'))),
      tensorDiagrams(sf(), sf(), sf()),
      tensorDiagrams(identityDiagram(['B']), identityDiagram(['B']), composeDiagrams(sg(), singletonDiagram(del('C')))),
    ))
    expect(d.equals(composeDiagrams(sf(), singletonDiagram(copy('B'))))).toBe(true)
  })

  test('rejects merge structure before touching the diagram', () => {
    const d = composeDiagrams(singletonDiagram(copy('A')), singletonDiagram(merge('A')))
    let thrown: unknown
    try {
      normalizeCartesian(d)
    } catch (e) {
      thrown = e
    }
    expect(thrown).toBeInstanceOf(UnsupportedStructureError)
    if (thrown instanceof UnsupportedStructureError) expect(thrown.boxIds).toEqual([2])
    expect(d.boxes().map(([, b]) => b.kind)).toEqual(['copy', 'merge'])
  })
})
