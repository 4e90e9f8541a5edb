/**
 * Errors raised by diagram mutations and rewrite passes.
 */

import type { Port, Wire } from './ports'
import { formatBox, formatPort, formatWire } from './ports'

/** Base class for every error raised by the wiring engine. */
export class WiringDiagramError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'WiringDiagramError'
  }
}

/**
 * A reference names a missing box, the wrong port kind, or an out-of-range
 * index. `ref` is a port, or a bare box id when no port was involved.
 */
export class InvalidPortReferenceError extends WiringDiagramError {
  constructor(
    public readonly ref: Port | number,
    public readonly reason: string,
  ) {
    super(`Invalid reference ${typeof ref === 'number' ? formatBox(ref) : formatPort(ref)}: ${reason}`)
    this.name = 'InvalidPortReferenceError'
  }
}

/**
 * The two ends of a connection carry different value tags. `wire` is absent
 * when the mismatch is between the boundaries of two composed diagrams.
 */
export class PortTypeMismatchError extends WiringDiagramError {
  constructor(
    public readonly sourceValue: unknown,
    public readonly targetValue: unknown,
    public readonly wire?: Wire,
  ) {
    super(
      `Port type mismatch ${wire ? `on wire ${formatWire(wire)}` : 'between composed diagrams'}: ` +
      `source carries ${JSON.stringify(sourceValue)}, target expects ${JSON.stringify(targetValue)}`,
    )
    this.name = 'PortTypeMismatchError'
  }
}

/** A node set passed to the layer orderer names absent or repeated ids. */
export class UnknownNodeSetError extends WiringDiagramError {
  constructor(
    public readonly ids: readonly number[],
    public readonly reason: 'unknown' | 'duplicate',
  ) {
    super(
      reason === 'unknown'
        ? `Node set contains ids absent from the diagram: ${ids.join(', ')}`
        : `Node set contains repeated ids: ${ids.join(', ')}`,
    )
    this.name = 'UnknownNodeSetError'
  }
}

/** A pass was applied to a diagram outside the structure it supports. */
export class UnsupportedStructureError extends WiringDiagramError {
  constructor(
    public readonly pass: string,
    public readonly boxIds: readonly number[],
  ) {
    super(`${pass} does not support boxes ${boxIds.join(', ')} (merge/create structure)`)
    this.name = 'UnsupportedStructureError'
  }
}

/** A fixpoint loop did not settle within its round bound. */
export class FixpointLimitError extends WiringDiagramError {
  constructor(
    public readonly pass: string,
    public readonly rounds: number,
  ) {
    super(`${pass} did not reach a fixpoint within ${rounds} rounds`)
    this.name = 'FixpointLimitError'
  }
}
