/**
 * The wiring diagram store: a mutable port graph.
 *
 * Boxes live in an arena indexed by stable integer ids (insertion order is
 * kept for iteration); wires are plain pairs of port references held in a
 * set. Every mutation validates before it changes anything, so a rejected
 * call leaves the diagram as it was.
 */

import type { Box } from './boxes'
import { describeBox, inputPorts, outputPorts, portsEqual, valueEquals } from './boxes'
import type { Port, Wire } from './ports'
import { INPUT_ID, OUTPUT_ID, formatBox, wireKey } from './ports'
import { InvalidPortReferenceError, PortTypeMismatchError } from './errors'
import { isIsomorphic } from './isomorphism'

export class WiringDiagram<V = string, T = string> {
  readonly inputId = INPUT_ID
  readonly outputId = OUTPUT_ID
  readonly inputPorts: readonly V[]
  readonly outputPorts: readonly V[]

  private readonly boxMap = new Map<number, Box<V, T>>()
  private readonly wireMap = new Map<string, Wire>()
  /** Wire keys by target box id and by source box id, in insertion order. */
  private readonly incoming = new Map<number, Set<string>>()
  private readonly outgoing = new Map<number, Set<string>>()
  private nextId = 1

  constructor(inputs: readonly V[], outputs: readonly V[]) {
    this.inputPorts = [...inputs]
    this.outputPorts = [...outputs]
  }

  // ─── Boxes ──────────────────────────────────────────────────────────────

  /** Add a box and return its fresh id. */
  addBox(box: Box<V, T>): number {
    const id = this.nextId++
    this.boxMap.set(id, box)
    return id
  }

  addBoxes(boxes: readonly Box<V, T>[]): number[] {
    return boxes.map((b) => this.addBox(b))
  }

  hasBox(id: number): boolean {
    return this.boxMap.has(id)
  }

  box(id: number): Box<V, T> {
    const b = this.boxMap.get(id)
    if (b === undefined) throw new InvalidPortReferenceError(id, 'no such box')
    return b
  }

  /** Box ids in insertion order. */
  boxIds(): number[] {
    return [...this.boxMap.keys()]
  }

  boxes(): [number, Box<V, T>][] {
    return [...this.boxMap.entries()]
  }

  get boxCount(): number {
    return this.boxMap.size
  }

  /** Remove a box together with every wire touching it. */
  removeBox(id: number): void {
    this.removeBoxes([id])
  }

  removeBoxes(ids: readonly number[]): void {
    for (const id of ids) {
      if (!this.boxMap.has(id)) throw new InvalidPortReferenceError(id, 'no such box')
    }
    for (const id of ids) {
      this.removeWires([...this.inWires(id), ...this.outWires(id)])
      this.boxMap.delete(id)
    }
  }

  // ─── Wires ──────────────────────────────────────────────────────────────

  /** Wires in insertion order. */
  wires(): Wire[] {
    return [...this.wireMap.values()]
  }

  get wireCount(): number {
    return this.wireMap.size
  }

  hasWire(w: Wire): boolean {
    return this.wireMap.has(wireKey(w))
  }

  addWire(w: Wire): void {
    this.addWires([w])
  }

  /** Validate every wire of the batch, then insert them all. Duplicates are no-ops. */
  addWires(wires: readonly Wire[]): void {
    for (const w of wires) this.validateWire(w)
    for (const w of wires) {
      const key = wireKey(w)
      if (this.wireMap.has(key)) continue
      this.wireMap.set(key, { source: { ...w.source }, target: { ...w.target } })
      index(this.incoming, w.target.box).add(key)
      index(this.outgoing, w.source.box).add(key)
    }
  }

  /** Remove a wire; returns false when it was not present. */
  removeWire(w: Wire): boolean {
    const key = wireKey(w)
    if (!this.wireMap.delete(key)) return false
    this.incoming.get(w.target.box)?.delete(key)
    this.outgoing.get(w.source.box)?.delete(key)
    return true
  }

  removeWires(wires: readonly Wire[]): void {
    for (const w of wires) this.removeWire(w)
  }

  /** Wires into box `id`, optionally restricted to one input port. */
  inWires(id: number, port?: number): Wire[] {
    const wires = this.lookup(this.incoming.get(id))
    return port === undefined ? wires : wires.filter((w) => w.target.port === port)
  }

  /** Wires out of box `id`, optionally restricted to one output port. */
  outWires(id: number, port?: number): Wire[] {
    const wires = this.lookup(this.outgoing.get(id))
    return port === undefined ? wires : wires.filter((w) => w.source.port === port)
  }

  private lookup(keys: Set<string> | undefined): Wire[] {
    const wires: Wire[] = []
    for (const key of keys ?? []) {
      const w = this.wireMap.get(key)
      if (w !== undefined) wires.push(w)
    }
    return wires
  }

  // ─── Ports ──────────────────────────────────────────────────────────────

  /** The value tag carried by a port; throws when the reference is invalid. */
  portValue(p: Port): V {
    if (!Number.isInteger(p.port) || p.port < 1) {
      throw new InvalidPortReferenceError(p, 'port indices are 1-based integers')
    }
    let values: readonly V[]
    if (p.box === INPUT_ID) {
      if (p.kind !== 'output') throw new InvalidPortReferenceError(p, 'the input boundary only has output ports')
      values = this.inputPorts
    } else if (p.box === OUTPUT_ID) {
      if (p.kind !== 'input') throw new InvalidPortReferenceError(p, 'the output boundary only has input ports')
      values = this.outputPorts
    } else {
      const b = this.boxMap.get(p.box)
      if (b === undefined) throw new InvalidPortReferenceError(p, 'no such box')
      values = p.kind === 'input' ? inputPorts(b) : outputPorts(b)
    }
    const value = values[p.port - 1]
    if (p.port > values.length || value === undefined) {
      throw new InvalidPortReferenceError(p, `${formatBox(p.box)} has ${values.length} ${p.kind} port(s)`)
    }
    return value
  }

  private validateWire(w: Wire): void {
    if (w.source.kind !== 'output') throw new InvalidPortReferenceError(w.source, 'a wire source must be an output port')
    if (w.target.kind !== 'input') throw new InvalidPortReferenceError(w.target, 'a wire target must be an input port')
    const sourceValue = this.portValue(w.source)
    const targetValue = this.portValue(w.target)
    if (!valueEquals(sourceValue, targetValue)) {
      throw new PortTypeMismatchError(sourceValue, targetValue, w)
    }
  }

  // ─── Substitution ───────────────────────────────────────────────────────

  /**
   * Replace box `id` by the contents of `sub`, whose boundary must carry the
   * box's port values. Wires into the box are spliced onto whatever sub's
   * input boundary feeds, wires out of the box onto whatever feeds sub's
   * output boundary. Returns the ids of the inserted boxes.
   */
  substitute(id: number, sub: WiringDiagram<V, T>): number[] {
    const b = this.box(id)
    if (!portsEqual(sub.inputPorts, inputPorts(b)) || !portsEqual(sub.outputPorts, outputPorts(b))) {
      throw new InvalidPortReferenceError(id, `substituted diagram does not match the ports of ${describeBox(b)}`)
    }

    const incoming = inputPorts(b).map((_, i) => this.inWires(id, i + 1).map((w) => w.source))
    const outgoing = outputPorts(b).map((_, j) => this.outWires(id, j + 1).map((w) => w.target))

    const idMap = new Map<number, number>()
    for (const [subId, subBox] of sub.boxes()) idMap.set(subId, this.addBox(subBox))
    const remap = (p: Port): Port => ({ ...p, box: idMap.get(p.box) ?? p.box })

    const wires: Wire[] = []
    for (const w of sub.wires()) {
      const sources = w.source.box === INPUT_ID ? incoming[w.source.port - 1] ?? [] : [remap(w.source)]
      const targets = w.target.box === OUTPUT_ID ? outgoing[w.target.port - 1] ?? [] : [remap(w.target)]
      for (const source of sources) {
        for (const target of targets) wires.push({ source, target })
      }
    }

    this.removeBox(id)
    this.addWires(wires)
    return [...idMap.values()]
  }

  // ─── Copying and Equality ───────────────────────────────────────────────

  /** A fully independent copy with the same ids. */
  clone(): WiringDiagram<V, T> {
    const d = new WiringDiagram<V, T>(this.inputPorts, this.outputPorts)
    for (const [id, b] of this.boxMap) {
      d.boxMap.set(id, b.kind === 'atomic' ? { ...b, inputs: [...b.inputs], outputs: [...b.outputs] } : { ...b })
    }
    d.nextId = this.nextId
    d.addWires(this.wires())
    return d
  }

  /** Structural equality up to relabeling of box ids. */
  equals(other: WiringDiagram<V, T>): boolean {
    return isIsomorphic(this, other)
  }
}

function index(map: Map<number, Set<string>>, id: number): Set<string> {
  let set = map.get(id)
  if (set === undefined) {
    set = new Set()
    map.set(id, set)
  }
  return set
}
