/**
 * Local rewrites on diagrams in junction form.
 *
 * Each rewrite scans the diagram, applies itself wherever it matches and
 * reports whether anything changed. Each strictly shrinks the diagram (box
 * count, junction count or junction arity), except fan-out materialization,
 * which only fires on ports carrying more than one wire.
 */

import type { Box, JunctionBox } from './boxes'
import { boxEquals, junction, outputArity, valueEquals } from './boxes'
import { identityDiagram } from './builders'
import type { WiringDiagram } from './diagram'
import type { Port, Wire } from './ports'
import { INPUT_ID, inputPort, outputPort, portKey } from './ports'
import { liveBoxes, topologicalSort } from './traversal'

function isCopyJunction<V, T>(b: Box<V, T>): b is JunctionBox<V> {
  return b.kind === 'junction' && b.ninputs === 1
}

/**
 * Add a junction of `value` wired from `sources` (per input port) and to
 * `targets` (per output port), in place of the boxes in `remove`.
 */
function rebuildJunction<V, T>(
  d: WiringDiagram<V, T>,
  remove: readonly number[],
  value: V,
  sources: readonly (readonly Port[])[],
  targets: readonly (readonly Port[])[],
): number {
  const id = d.addBox(junction(value, sources.length, targets.length))
  d.removeBoxes(remove)
  const wires: Wire[] = [
    ...sources.flatMap((ss, i) => ss.map((source) => ({ source, target: inputPort(id, i + 1) }))),
    ...targets.flatMap((ts, k) => ts.map((target) => ({ source: outputPort(id, k + 1), target }))),
  ]
  d.addWires(wires)
  return id
}

// ─── Copy Junction Fusion ───────────────────────────────────────────────────

/**
 * Fuse a copy junction into the copy junction feeding it, when the feeding
 * port carries no other wire. The fused outputs keep depth-first order.
 */
export function fuseCopyJunctions<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = false
  let fused = true
  while (fused) {
    fused = false
    for (const [id2, lower] of d.boxes()) {
      if (!isCopyJunction(lower)) continue
      const ins = d.inWires(id2, 1)
      const feed = ins[0]
      if (ins.length !== 1 || feed === undefined || feed.source.box === id2 || !d.hasBox(feed.source.box)) continue
      const id1 = feed.source.box
      const upper = d.box(id1)
      if (!isCopyJunction(upper) || !valueEquals(upper.value, lower.value)) continue
      if (d.outWires(id1, feed.source.port).length !== 1) continue

      const targets: Port[][] = []
      for (let q = 1; q <= upper.noutputs; q++) {
        if (q === feed.source.port) {
          for (let r = 1; r <= lower.noutputs; r++) targets.push(d.outWires(id2, r).map((w) => w.target))
        } else {
          targets.push(d.outWires(id1, q).map((w) => w.target))
        }
      }
      const sources = [d.inWires(id1, 1).map((w) => w.source)]
      rebuildJunction(d, [id1, id2], upper.value, sources, targets)
      changed = fused = true
      break
    }
  }
  return changed
}

// ─── Duplicate Elimination ──────────────────────────────────────────────────

/**
 * The port a wire ultimately carries, looking back through copy junctions.
 * All outputs of any other junction carry the same value, so they share a key.
 */
function rootSource<V, T>(d: WiringDiagram<V, T>, port: Port): string {
  let p = port
  const visited = new Set<number>()
  while (d.hasBox(p.box) && !visited.has(p.box)) {
    visited.add(p.box)
    const b = d.box(p.box)
    if (b.kind !== 'junction') break
    if (!isCopyJunction(b)) return `${p.box}:output:*`
    const ins = d.inWires(p.box, 1)
    const feed = ins[0]
    if (ins.length !== 1 || feed === undefined) break
    p = feed.source
  }
  return portKey(p)
}

/** Root source of every input port, or null when a port has other than one wire. */
function inputRoots<V, T>(d: WiringDiagram<V, T>, id: number, arity: number): string | null {
  const roots: string[] = []
  for (let i = 1; i <= arity; i++) {
    const ins = d.inWires(id, i)
    const only = ins[0]
    if (ins.length !== 1 || only === undefined) return null
    roots.push(rootSource(d, only.source))
  }
  return roots.join('|')
}

/**
 * Merge atomic boxes that apply the same morphism to the same values: equal
 * boxes whose inputs trace back to the same ports. The later box in
 * dependency order is dropped and its outgoing wires leave the survivor.
 */
export function mergeDuplicateBoxes<V, T>(d: WiringDiagram<V, T>): boolean {
  const survivors: { id: number; box: Box<V, T>; roots: string }[] = []
  let changed = false
  for (const id of topologicalSort(d)) {
    if (!d.hasBox(id)) continue
    const b = d.box(id)
    if (b.kind !== 'atomic') continue
    const roots = inputRoots(d, id, b.inputs.length)
    if (roots === null) continue
    const survivor = survivors.find((s) => s.roots === roots && boxEquals(s.box, b))
    if (survivor === undefined) {
      survivors.push({ id, box: b, roots })
      continue
    }
    const moved = d.outWires(id).map((w) => ({ source: outputPort(survivor.id, w.source.port), target: w.target }))
    d.removeBox(id)
    d.addWires(moved)
    changed = true
  }
  return changed
}

// ─── Fan-out ────────────────────────────────────────────────────────────────

/**
 * Give every non-junction output port (and every diagram input) that feeds
 * several wires an explicit copy junction, ports in wire order.
 */
export function materializeFanOut<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = false
  const sources: [number, number][] = d.inputPorts.map((_, i): [number, number] => [INPUT_ID, i + 1])
  for (const [id, b] of d.boxes()) {
    if (b.kind === 'junction') continue
    for (let j = 1; j <= outputArity(b); j++) sources.push([id, j])
  }
  for (const [id, port] of sources) {
    const ws = d.outWires(id, port)
    if (ws.length < 2) continue
    const source = outputPort(id, port)
    d.removeWires(ws)
    rebuildJunction(d, [], d.portValue(source), [[source]], ws.map((w) => [w.target]))
    changed = true
  }
  return changed
}

/**
 * Renumber junction outputs so that every output port carries exactly one
 * wire: dangling ports are dropped, ports with several wires are split.
 * A junction with other than one input never drops its last output.
 */
export function compactJunctions<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = false
  for (const [id, b] of d.boxes()) {
    if (b.kind !== 'junction') continue
    const groups = Array.from({ length: b.noutputs }, (_, k) => d.outWires(id, k + 1))
    const wired = groups.flat()
    const keepsOne: boolean = !isCopyJunction(b) && wired.length === 0
    if (groups.every((g) => g.length === 1) || (keepsOne && b.noutputs === 1)) continue
    const sources = Array.from({ length: b.ninputs }, (_, i) => d.inWires(id, i + 1).map((w) => w.source))
    const targets: Port[][] = keepsOne ? [[]] : wired.map((w) => [w.target])
    rebuildJunction(d, [id], b.value, sources, targets)
    changed = true
  }
  return changed
}

/** Splice out pass-through junctions (one input, one output). */
export function bypassPassThroughs<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = false
  for (const [id, b] of d.boxes()) {
    if (b.kind !== 'junction' || b.ninputs !== 1 || b.noutputs !== 1) continue
    if (d.inWires(id, 1).length === 0) continue
    d.substitute(id, identityDiagram<V, T>([b.value]))
    changed = true
  }
  return changed
}

// ─── Dead Code ──────────────────────────────────────────────────────────────

/** Remove every box with no wire path to the output boundary. */
export function removeDeadBoxes<V, T>(d: WiringDiagram<V, T>): boolean {
  const live = liveBoxes(d)
  const dead = d.boxIds().filter((id) => !live.has(id))
  d.removeBoxes(dead)
  return dead.length > 0
}
