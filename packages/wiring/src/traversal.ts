/**
 * Graph traversals over the box-level structure of a diagram.
 */

import type { WiringDiagram } from './diagram'
import { INPUT_ID, OUTPUT_ID } from './ports'

/**
 * Box ids in dependency order: every box comes after the boxes feeding it.
 * Among boxes that are ready at the same time, insertion order wins. Boxes on
 * a cycle are appended in insertion order.
 */
export function topologicalSort<V, T>(d: WiringDiagram<V, T>): number[] {
  const ids = d.boxIds()
  const rank = new Map(ids.map((id, i) => [id, i]))
  const pending = new Map<number, number>()
  for (const id of ids) {
    const preds = new Set(d.inWires(id).map((w) => w.source.box).filter((s) => s !== INPUT_ID))
    pending.set(id, preds.size)
  }

  const sorted: number[] = []
  const ready = ids.filter((id) => pending.get(id) === 0)
  while (ready.length > 0) {
    ready.sort((x, y) => (rank.get(x) ?? 0) - (rank.get(y) ?? 0))
    const id = ready.shift()
    if (id === undefined) break
    sorted.push(id)
    const succs = new Set(d.outWires(id).map((w) => w.target.box).filter((t) => t !== OUTPUT_ID))
    for (const succ of succs) {
      const left = (pending.get(succ) ?? 0) - 1
      pending.set(succ, left)
      if (left === 0) ready.push(succ)
    }
  }

  if (sorted.length < ids.length) {
    const seen = new Set(sorted)
    sorted.push(...ids.filter((id) => !seen.has(id)))
  }
  return sorted
}

/** Boxes with a wire path into the output boundary. */
export function liveBoxes<V, T>(d: WiringDiagram<V, T>): Set<number> {
  const live = new Set<number>()
  const stack = [OUTPUT_ID]
  while (stack.length > 0) {
    const id = stack.pop()
    if (id === undefined) break
    for (const w of d.inWires(id)) {
      const source = w.source.box
      if (source === INPUT_ID || live.has(source)) continue
      live.add(source)
      stack.push(source)
    }
  }
  return live
}
