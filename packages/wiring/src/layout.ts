/**
 * Crossing minimization for layered drawings.
 *
 * Barycenter heuristic: each node of the free layer is keyed by the mean
 * coordinate of the ports it is wired to in the fixed layer(s), then the
 * layer is stably sorted by key. Exact on series-parallel layers, a
 * heuristic elsewhere.
 *
 * Port coordinates: the box at position k of a fixed layer spans [k, k + 1);
 * its port i of n sits at k + (i - 1) / n. Junction ports all sit at k.
 */

import type { WiringDiagram } from './diagram'
import { UnknownNodeSetError } from './errors'
import type { PortKind } from './ports'
import { INPUT_ID, OUTPUT_ID, portKey } from './ports'
import { inputArity, outputArity } from './boxes'

export interface LayerOptions {
  /** Fixed upstream layer, in drawing order. */
  sources?: readonly number[]
  /** Fixed downstream layer, in drawing order. */
  targets?: readonly number[]
}

/** Reorder `nodeIds` to reduce crossings against the fixed layer(s). */
export function crossingMinimizationBySort<V, T>(
  d: WiringDiagram<V, T>,
  nodeIds: readonly number[],
  options: LayerOptions = {},
): number[] {
  return sortLayer(d, nodeIds, options).map((e) => e.id)
}

/** Same ordering as {@link crossingMinimizationBySort}, as 0-based indices into `nodeIds`. */
export function crossingMinimizationPermutation<V, T>(
  d: WiringDiagram<V, T>,
  nodeIds: readonly number[],
  options: LayerOptions = {},
): number[] {
  return sortLayer(d, nodeIds, options).map((e) => e.index)
}

interface LayerEntry {
  readonly id: number
  readonly index: number
  readonly key: number
}

function sortLayer<V, T>(d: WiringDiagram<V, T>, nodeIds: readonly number[], options: LayerOptions): LayerEntry[] {
  const sources = options.sources ?? []
  const targets = options.targets ?? []
  for (const layer of [nodeIds, sources, targets]) validateLayer(d, layer)

  const entries = nodeIds.map((id, index) => ({ id, index, key: index }))
  if ((sources.length === 0 && targets.length === 0) || nodeIds.length <= 1) return entries

  const sourceCoords = portCoordinates(d, sources, 'output')
  const targetCoords = portCoordinates(d, targets, 'input')
  const keyed = entries.map((e) => {
    const coords: number[] = []
    for (const w of d.inWires(e.id)) {
      const c = sourceCoords.get(portKey(w.source))
      if (c !== undefined) coords.push(c)
    }
    for (const w of d.outWires(e.id)) {
      const c = targetCoords.get(portKey(w.target))
      if (c !== undefined) coords.push(c)
    }
    return coords.length === 0 ? e : { ...e, key: coords.reduce((a, b) => a + b, 0) / coords.length }
  })
  // Array.prototype.sort is stable: ties keep their original order.
  return keyed.sort((a, b) => a.key - b.key)
}

function validateLayer<V, T>(d: WiringDiagram<V, T>, layer: readonly number[]): void {
  const unknown = layer.filter((id) => id !== INPUT_ID && id !== OUTPUT_ID && !d.hasBox(id))
  if (unknown.length > 0) throw new UnknownNodeSetError(unknown, 'unknown')
  const duplicates = layer.filter((id, i) => layer.indexOf(id) !== i)
  if (duplicates.length > 0) throw new UnknownNodeSetError([...new Set(duplicates)], 'duplicate')
}

function portCoordinates<V, T>(d: WiringDiagram<V, T>, layer: readonly number[], kind: PortKind): Map<string, number> {
  const coords = new Map<string, number>()
  layer.forEach((id, k) => {
    let n: number
    let spread = true
    if (id === INPUT_ID) {
      n = kind === 'output' ? d.inputPorts.length : 0
    } else if (id === OUTPUT_ID) {
      n = kind === 'input' ? d.outputPorts.length : 0
    } else {
      const b = d.box(id)
      n = kind === 'input' ? inputArity(b) : outputArity(b)
      spread = b.kind !== 'junction'
    }
    for (let i = 1; i <= n; i++) {
      coords.set(portKey({ box: id, kind, port: i }), spread ? k + (i - 1) / n : k)
    }
  })
  return coords
}
