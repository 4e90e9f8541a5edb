/**
 * Junction insertion and removal.
 *
 * Insertion turns each structural generator into the junction of the same
 * value and arity, so that consumers can treat all fan nodes uniformly:
 *
 *   copy(v)   → junction(v, 1, 2)      merge(v)  → junction(v, 2, 1)
 *   delete(v) → junction(v, 1, 0)      create(v) → junction(v, 0, 1)
 *
 * Removal is the exact inverse. A junction of any other arity is expanded
 * into a canonical tree of binary generators: the inputs are folded by a
 * left-nested chain of merges (a create when there are none), the result is
 * unfolded by a right-nested chain of copies (a delete when there are no
 * outputs). Copy k sends its first output to outer output k and its second
 * to copy k+1.
 */

import { createLogger } from '@wirekit/config'
import type { GeneratorBox, JunctionBox } from './boxes'
import { copy, create, del, isGenerator, junction, merge } from './boxes'
import { singletonDiagram } from './builders'
import { WiringDiagram } from './diagram'
import type { Port } from './ports'
import { INPUT_ID, OUTPUT_ID, inputPort, outputPort } from './ports'

const log = createLogger('wiring:junctions')

/** Replace every copy, merge, delete and create box by a junction. Idempotent. */
export function addJunctions<V, T>(d: WiringDiagram<V, T>): WiringDiagram<V, T> {
  let rewritten = 0
  for (const [id, b] of d.boxes()) {
    if (!isGenerator(b)) continue
    d.substitute(id, singletonDiagram<V, T>(generatorJunction(b)))
    rewritten++
  }
  log.debug('pass complete', { pass: 'addJunctions', rewritten })
  return d
}

/** Expand every junction back into copy, merge, delete and create boxes. */
export function remJunctions<V, T>(d: WiringDiagram<V, T>): WiringDiagram<V, T> {
  let rewritten = 0
  for (const [id, b] of d.boxes()) {
    if (b.kind !== 'junction') continue
    d.substitute(id, junctionExpansion<V, T>(b))
    rewritten++
  }
  log.debug('pass complete', { pass: 'remJunctions', rewritten })
  return d
}

function generatorJunction<V>(b: GeneratorBox<V>): JunctionBox<V> {
  switch (b.kind) {
    case 'copy': return junction(b.value, 1, 2)
    case 'merge': return junction(b.value, 2, 1)
    case 'delete': return junction(b.value, 1, 0)
    case 'create': return junction(b.value, 0, 1)
  }
}

/** The canonical generator diagram realizing a junction. */
export function junctionExpansion<V, T = string>(j: JunctionBox<V>): WiringDiagram<V, T> {
  const { value, ninputs, noutputs } = j
  const d = new WiringDiagram<V, T>(
    Array.from({ length: ninputs }, () => value),
    Array.from({ length: noutputs }, () => value),
  )

  let source: Port
  if (ninputs === 0) {
    source = outputPort(d.addBox(create(value)), 1)
  } else {
    source = outputPort(INPUT_ID, 1)
    for (let i = 2; i <= ninputs; i++) {
      const m = d.addBox(merge(value))
      d.addWires([
        { source, target: inputPort(m, 1) },
        { source: outputPort(INPUT_ID, i), target: inputPort(m, 2) },
      ])
      source = outputPort(m, 1)
    }
  }

  if (noutputs === 0) {
    d.addWire({ source, target: inputPort(d.addBox(del(value)), 1) })
    return d
  }
  for (let k = 1; k < noutputs; k++) {
    const c = d.addBox(copy(value))
    d.addWires([
      { source, target: inputPort(c, 1) },
      { source: outputPort(c, 1), target: inputPort(OUTPUT_ID, k) },
    ])
    source = outputPort(c, 2)
  }
  d.addWire({ source, target: inputPort(OUTPUT_ID, noutputs) })
  return d
}
