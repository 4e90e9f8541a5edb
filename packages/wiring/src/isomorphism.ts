/**
 * Structural equality of wiring diagrams up to box relabeling.
 *
 * Two diagrams are equal when their boundaries match and some bijection of
 * box ids maps boxes onto equal boxes and the wire set onto the wire set.
 * Port order within a box is significant. The search is a backtracking match
 * over candidate boxes with equal value and equal per-port wire degrees,
 * checking wires incrementally as boxes are matched.
 */

import { boxEquals, inputArity, outputArity, portsEqual } from './boxes'
import type { Port, Wire } from './ports'
import { INPUT_ID, OUTPUT_ID } from './ports'
import type { WiringDiagram } from './diagram'

export function isIsomorphic<V, T>(a: WiringDiagram<V, T>, b: WiringDiagram<V, T>): boolean {
  return findIsomorphism(a, b) !== null
}

/**
 * Find a box-id bijection from `a` onto `b` witnessing equality,
 * or null when the diagrams differ.
 */
export function findIsomorphism<V, T>(a: WiringDiagram<V, T>, b: WiringDiagram<V, T>): Map<number, number> | null {
  if (!portsEqual(a.inputPorts, b.inputPorts) || !portsEqual(a.outputPorts, b.outputPorts)) return null
  if (a.boxCount !== b.boxCount || a.wireCount !== b.wireCount) return null

  const bSignatures = new Map<number, string>()
  for (const id of b.boxIds()) bSignatures.set(id, degreeSignature(b, id))

  const candidates = new Map<number, number[]>()
  for (const [aId, aBox] of a.boxes()) {
    const signature = degreeSignature(a, aId)
    const matches = b.boxes()
      .filter(([bId, bBox]) => bSignatures.get(bId) === signature && boxEquals(aBox, bBox))
      .map(([bId]) => bId)
    if (matches.length === 0) return null
    candidates.set(aId, matches)
  }

  // Most constrained boxes first.
  const order = a.boxIds().sort((x, y) => (candidates.get(x)?.length ?? 0) - (candidates.get(y)?.length ?? 0))
  const mapping = new Map<number, number>()
  const used = new Set<number>()

  const mapPort = (p: Port): Port | undefined => {
    if (p.box === INPUT_ID || p.box === OUTPUT_ID) return p
    const image = mapping.get(p.box)
    return image === undefined ? undefined : { ...p, box: image }
  }

  const consistent = (aId: number): boolean => {
    const incident: Wire[] = [...a.inWires(aId), ...a.outWires(aId)]
    return incident.every((w) => {
      const source = mapPort(w.source)
      const target = mapPort(w.target)
      return source === undefined || target === undefined || b.hasWire({ source, target })
    })
  }

  const search = (k: number): boolean => {
    const aId = order[k]
    if (aId === undefined) return true
    for (const bId of candidates.get(aId) ?? []) {
      if (used.has(bId)) continue
      mapping.set(aId, bId)
      used.add(bId)
      if (consistent(aId) && search(k + 1)) return true
      mapping.delete(aId)
      used.delete(bId)
    }
    return false
  }

  if (!search(0)) return null
  // Wires between the boundaries touch no box and are not covered above.
  const passThrough = a.outWires(INPUT_ID).filter((w) => w.target.box === OUTPUT_ID)
  return passThrough.every((w) => b.hasWire(w)) ? mapping : null
}

/** Number of wires on each port of a box, inputs then outputs. */
function degreeSignature<V, T>(d: WiringDiagram<V, T>, id: number): string {
  const b = d.box(id)
  const ins = Array.from({ length: inputArity(b) }, (_, i) => d.inWires(id, i + 1).length)
  const outs = Array.from({ length: outputArity(b) }, (_, j) => d.outWires(id, j + 1).length)
  return `${ins.join(',')}|${outs.join(',')}`
}
