/**
 * Diagram builders.
 *
 * Concrete diagrams assembled from boxes by sequential composition (;),
 * parallel composition (⊗) and identities. These work on diagrams, not on
 * symbolic expressions: every call returns a fresh diagram.
 *
 *   compose(f, g):  A --f--> B --g--> C
 *   tensor(f, g):   A ⊗ C --f⊗g--> B ⊗ D
 */

import type { Box } from './boxes'
import { inputPorts, junction, outputPorts, portsEqual } from './boxes'
import { WiringDiagram } from './diagram'
import { PortTypeMismatchError } from './errors'
import type { Port, Wire } from './ports'
import { INPUT_ID, OUTPUT_ID, wire } from './ports'

/** A diagram holding one box, its ports wired straight to the boundary. */
export function singletonDiagram<V, T = string>(box: Box<V, T>): WiringDiagram<V, T> {
  const ins = inputPorts(box)
  const outs = outputPorts(box)
  const d = new WiringDiagram<V, T>(ins, outs)
  const id = d.addBox(box)
  d.addWires([
    ...ins.map((_, i) => wire([INPUT_ID, i + 1], [id, i + 1])),
    ...outs.map((_, j) => wire([id, j + 1], [OUTPUT_ID, j + 1])),
  ])
  return d
}

export function junctionDiagram<V, T = string>(value: V, ninputs: number, noutputs: number): WiringDiagram<V, T> {
  return singletonDiagram<V, T>(junction(value, ninputs, noutputs))
}

/** Identity on `ports`: input i wired to output i. */
export function identityDiagram<V, T = string>(ports: readonly V[]): WiringDiagram<V, T> {
  const d = new WiringDiagram<V, T>(ports, ports)
  d.addWires(ports.map((_, i) => wire([INPUT_ID, i + 1], [OUTPUT_ID, i + 1])))
  return d
}

/** Sequential composition, left to right. */
export function composeDiagrams<V, T>(first: WiringDiagram<V, T>, ...rest: WiringDiagram<V, T>[]): WiringDiagram<V, T> {
  return rest.reduce(compose2, first.clone())
}

/** Parallel composition, left to right. */
export function tensorDiagrams<V, T>(first: WiringDiagram<V, T>, ...rest: WiringDiagram<V, T>[]): WiringDiagram<V, T> {
  return rest.reduce(tensor2, first.clone())
}

function compose2<V, T>(f: WiringDiagram<V, T>, g: WiringDiagram<V, T>): WiringDiagram<V, T> {
  if (!portsEqual(f.outputPorts, g.inputPorts)) {
    throw new PortTypeMismatchError(f.outputPorts, g.inputPorts)
  }
  const d = new WiringDiagram<V, T>(f.inputPorts, g.outputPorts)
  const fMap = copyBoxes(f, d)
  const gMap = copyBoxes(g, d)

  // Sources reaching each of f's outputs, i.e. each of g's inputs.
  const middle: Port[][] = f.outputPorts.map(() => [])
  const wires: Wire[] = []
  for (const w of f.wires()) {
    const source = relabel(w.source, fMap)
    if (w.target.box === OUTPUT_ID) middle[w.target.port - 1]?.push(source)
    else wires.push({ source, target: relabel(w.target, fMap) })
  }
  for (const w of g.wires()) {
    const target = relabel(w.target, gMap)
    if (w.source.box === INPUT_ID) {
      for (const source of middle[w.source.port - 1] ?? []) wires.push({ source, target })
    } else {
      wires.push({ source: relabel(w.source, gMap), target })
    }
  }
  d.addWires(wires)
  return d
}

function tensor2<V, T>(f: WiringDiagram<V, T>, g: WiringDiagram<V, T>): WiringDiagram<V, T> {
  const d = new WiringDiagram<V, T>(
    [...f.inputPorts, ...g.inputPorts],
    [...f.outputPorts, ...g.outputPorts],
  )
  const fMap = copyBoxes(f, d)
  const gMap = copyBoxes(g, d)
  const shift = (p: Port, map: Map<number, number>): Port => {
    if (p.box === INPUT_ID) return { ...p, port: p.port + f.inputPorts.length }
    if (p.box === OUTPUT_ID) return { ...p, port: p.port + f.outputPorts.length }
    return relabel(p, map)
  }
  d.addWires([
    ...f.wires().map((w) => ({ source: relabel(w.source, fMap), target: relabel(w.target, fMap) })),
    ...g.wires().map((w) => ({ source: shift(w.source, gMap), target: shift(w.target, gMap) })),
  ])
  return d
}

function copyBoxes<V, T>(from: WiringDiagram<V, T>, to: WiringDiagram<V, T>): Map<number, number> {
  const map = new Map<number, number>()
  for (const [id, b] of from.boxes()) map.set(id, to.addBox(b))
  return map
}

function relabel(p: Port, map: Map<number, number>): Port {
  const image = map.get(p.box)
  return image === undefined ? p : { ...p, box: image }
}
