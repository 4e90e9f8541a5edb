/**
 * Boxes of a wiring diagram.
 *
 * A box is either an atomic morphism with individually tagged ports, one of
 * the four structural generators of a biproduct category, or a junction:
 *
 *   copy    v → v ⊗ v        (diagonal)
 *   merge   v ⊗ v → v        (codiagonal)
 *   delete  v → I            (counit)
 *   create  I → v            (unit)
 *   junction(v, m, n)        v^⊗m → v^⊗n, all of the above at once
 *
 * Junction ports are untyped-by-index: every port carries the junction's
 * single value, so arities are exposed as plain numbers.
 */

// ─── Box Variants ───────────────────────────────────────────────────────────

export interface AtomicBox<V, T> {
  readonly kind: 'atomic'
  readonly value: T
  readonly inputs: readonly V[]
  readonly outputs: readonly V[]
}

export interface CopyBox<V> {
  readonly kind: 'copy'
  readonly value: V
}

export interface MergeBox<V> {
  readonly kind: 'merge'
  readonly value: V
}

export interface DeleteBox<V> {
  readonly kind: 'delete'
  readonly value: V
}

export interface CreateBox<V> {
  readonly kind: 'create'
  readonly value: V
}

export interface JunctionBox<V> {
  readonly kind: 'junction'
  readonly value: V
  readonly ninputs: number
  readonly noutputs: number
}

export type GeneratorBox<V> = CopyBox<V> | MergeBox<V> | DeleteBox<V> | CreateBox<V>

export type Box<V = string, T = string> = AtomicBox<V, T> | GeneratorBox<V> | JunctionBox<V>

export type BoxKind = Box['kind']

// ─── Constructors ───────────────────────────────────────────────────────────

export function atomic<V, T>(value: T, inputs: readonly V[], outputs: readonly V[]): AtomicBox<V, T> {
  return { kind: 'atomic', value, inputs: [...inputs], outputs: [...outputs] }
}

export function copy<V>(value: V): CopyBox<V> {
  return { kind: 'copy', value }
}

export function merge<V>(value: V): MergeBox<V> {
  return { kind: 'merge', value }
}

export function del<V>(value: V): DeleteBox<V> {
  return { kind: 'delete', value }
}

export function create<V>(value: V): CreateBox<V> {
  return { kind: 'create', value }
}

export function junction<V>(value: V, ninputs: number, noutputs: number): JunctionBox<V> {
  if (!Number.isInteger(ninputs) || ninputs < 0 || !Number.isInteger(noutputs) || noutputs < 0) {
    throw new RangeError(`Junction arities must be non-negative integers, got (${ninputs}, ${noutputs})`)
  }
  return { kind: 'junction', value, ninputs, noutputs }
}

// ─── Ports ──────────────────────────────────────────────────────────────────

export function isGenerator<V, T>(box: Box<V, T>): box is GeneratorBox<V> {
  return box.kind === 'copy' || box.kind === 'merge' || box.kind === 'delete' || box.kind === 'create'
}

export function inputArity<V, T>(box: Box<V, T>): number {
  switch (box.kind) {
    case 'atomic': return box.inputs.length
    case 'copy': return 1
    case 'merge': return 2
    case 'delete': return 1
    case 'create': return 0
    case 'junction': return box.ninputs
  }
}

export function outputArity<V, T>(box: Box<V, T>): number {
  switch (box.kind) {
    case 'atomic': return box.outputs.length
    case 'copy': return 2
    case 'merge': return 1
    case 'delete': return 0
    case 'create': return 1
    case 'junction': return box.noutputs
  }
}

/** Value tags of the input ports, in port order. */
export function inputPorts<V, T>(box: Box<V, T>): readonly V[] {
  if (box.kind === 'atomic') return box.inputs
  const value = box.value
  return Array.from({ length: inputArity(box) }, () => value)
}

/** Value tags of the output ports, in port order. */
export function outputPorts<V, T>(box: Box<V, T>): readonly V[] {
  if (box.kind === 'atomic') return box.outputs
  const value = box.value
  return Array.from({ length: outputArity(box) }, () => value)
}

// ─── Equality ───────────────────────────────────────────────────────────────

/**
 * Equality of opaque port and box values: identity for primitives,
 * structural (JSON) equality for everything else.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false
  return JSON.stringify(a) === JSON.stringify(b)
}

export function portsEqual<V>(a: readonly V[], b: readonly V[]): boolean {
  return a.length === b.length && a.every((v, i) => valueEquals(v, b[i]))
}

export function boxEquals<V, T>(a: Box<V, T>, b: Box<V, T>): boolean {
  if (a.kind !== b.kind || !valueEquals(a.value, b.value)) return false
  if (a.kind === 'atomic' && b.kind === 'atomic') {
    return portsEqual(a.inputs, b.inputs) && portsEqual(a.outputs, b.outputs)
  }
  if (a.kind === 'junction' && b.kind === 'junction') {
    return a.ninputs === b.ninputs && a.noutputs === b.noutputs
  }
  return true
}

/** Short human-readable description, used in logs and error messages. */
export function describeBox<V, T>(box: Box<V, T>): string {
  switch (box.kind) {
    case 'atomic': return `${String(box.value)}: ${box.inputs.length} → ${box.outputs.length}`
    case 'junction': return `junction(${String(box.value)}, ${box.ninputs}, ${box.noutputs})`
    default: return `${box.kind}(${String(box.value)})`
  }
}
