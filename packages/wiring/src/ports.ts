/**
 * Port references and wires.
 *
 * Ports are addressed by (box id, kind, 1-based index). The input boundary is
 * a pseudo-box whose output ports are the diagram's inputs; the output
 * boundary is one whose input ports are the diagram's outputs.
 */

export type PortKind = 'input' | 'output'

export interface Port {
  readonly box: number
  readonly kind: PortKind
  readonly port: number
}

export interface Wire {
  readonly source: Port
  readonly target: Port
}

/** Sentinel id of the diagram's input boundary. */
export const INPUT_ID = -1

/** Sentinel id of the diagram's output boundary. */
export const OUTPUT_ID = -2

export function inputPort(box: number, port: number): Port {
  return { box, kind: 'input', port }
}

export function outputPort(box: number, port: number): Port {
  return { box, kind: 'output', port }
}

/**
 * Build a wire from `(box, port)` pairs: the source is an output port,
 * the target an input port.
 */
export function wire(source: readonly [number, number], target: readonly [number, number]): Wire {
  return { source: outputPort(source[0], source[1]), target: inputPort(target[0], target[1]) }
}

export function portKey(p: Port): string {
  return `${p.box}:${p.kind}:${p.port}`
}

export function wireKey(w: Wire): string {
  return `${portKey(w.source)}->${portKey(w.target)}`
}

export function formatBox(id: number): string {
  if (id === INPUT_ID) return 'input'
  if (id === OUTPUT_ID) return 'output'
  return `#${id}`
}

export function formatPort(p: Port): string {
  return `(${formatBox(p.box)}, ${p.kind}, ${p.port})`
}

export function formatWire(w: Wire): string {
  return `${formatPort(w.source)} => ${formatPort(w.target)}`
}
