/**
 * JSON codec for wiring diagrams.
 *
 * Guarantees:
 *   parseDiagram(serializeDiagram(d)) ≡ d   (up to box relabeling)
 *
 * The outer structure is checked by a zod schema; port and box values are
 * checked by caller-supplied schemas (strings by default). Parsing never
 * throws on bad input: failures come back as a list of messages.
 */

import { z } from 'zod'
import type { Box } from './boxes'
import { junction } from './boxes'
import { WiringDiagram } from './diagram'
import { WiringDiagramError } from './errors'
import type { Port, Wire } from './ports'
import { INPUT_ID, OUTPUT_ID } from './ports'
import type { Result } from './result'
import { ok, err } from './result'

// ─── Wire Format ────────────────────────────────────────────────────────────

export interface SerializedDiagram<V = string, T = string> {
  readonly inputs: readonly V[]
  readonly outputs: readonly V[]
  readonly boxes: readonly { readonly id: number; readonly box: Box<V, T> }[]
  readonly wires: readonly Wire[]
}

const portSchema = z.object({
  box: z.number().int(),
  kind: z.enum(['input', 'output']),
  port: z.number().int().positive(),
})

const generatorShape = <K extends string>(kind: K) =>
  z.object({ kind: z.literal(kind), value: z.unknown() })

const boxShape = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('atomic'),
    value: z.unknown(),
    inputs: z.array(z.unknown()),
    outputs: z.array(z.unknown()),
  }),
  generatorShape('copy'),
  generatorShape('merge'),
  generatorShape('delete'),
  generatorShape('create'),
  z.object({
    kind: z.literal('junction'),
    value: z.unknown(),
    ninputs: z.number().int().nonnegative(),
    noutputs: z.number().int().nonnegative(),
  }),
])

const diagramShape = z.object({
  inputs: z.array(z.unknown()),
  outputs: z.array(z.unknown()),
  boxes: z.array(z.object({ id: z.number().int().positive(), box: boxShape })),
  wires: z.array(z.object({ source: portSchema, target: portSchema })),
})

/** Schemas for the opaque values carried by ports and atomic boxes. */
export interface ValueSchemas<V, T> {
  value: z.ZodType<V>
  boxValue: z.ZodType<T>
}

// ─── Serialize ──────────────────────────────────────────────────────────────

export function serializeDiagram<V, T>(d: WiringDiagram<V, T>): SerializedDiagram<V, T> {
  return {
    inputs: [...d.inputPorts],
    outputs: [...d.outputPorts],
    boxes: d.boxes().map(([id, box]) => ({ id, box })),
    wires: d.wires(),
  }
}

// ─── Parse ──────────────────────────────────────────────────────────────────

export function parseDiagram(json: unknown): Result<WiringDiagram, string[]>
export function parseDiagram<V, T>(json: unknown, schemas: ValueSchemas<V, T>): Result<WiringDiagram<V, T>, string[]>
export function parseDiagram<V, T>(
  json: unknown,
  schemas?: ValueSchemas<V, T>,
): Result<WiringDiagram<V, T>, string[]> | Result<WiringDiagram, string[]> {
  if (schemas === undefined) return decodeDiagram(json, { value: z.string(), boxValue: z.string() })
  return decodeDiagram(json, schemas)
}

function decodeDiagram<V, T>(json: unknown, schemas: ValueSchemas<V, T>): Result<WiringDiagram<V, T>, string[]> {
  const shape = diagramShape.safeParse(json)
  if (!shape.success) {
    return err(shape.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`))
  }

  const errors: string[] = []
  const decode = <X>(schema: z.ZodType<X>, raw: unknown, path: string): X | undefined => {
    const result = schema.safeParse(raw)
    if (result.success) return result.data
    errors.push(...result.error.issues.map((i) => `${[path, ...i.path].join('.')}: ${i.message}`))
    return undefined
  }
  const decodeAll = <X>(schema: z.ZodType<X>, raws: readonly unknown[], path: string): X[] => {
    const values: X[] = []
    raws.forEach((raw, i) => {
      const v = decode(schema, raw, `${path}.${i}`)
      if (v !== undefined) values.push(v)
    })
    return values
  }

  const inputs = decodeAll(schemas.value, shape.data.inputs, 'inputs')
  const outputs = decodeAll(schemas.value, shape.data.outputs, 'outputs')
  const boxes: [number, Box<V, T>][] = []
  shape.data.boxes.forEach(({ id, box: raw }, k) => {
    const path = `boxes.${k}.box`
    if (raw.kind === 'atomic') {
      const value = decode(schemas.boxValue, raw.value, `${path}.value`)
      const ins = decodeAll(schemas.value, raw.inputs, `${path}.inputs`)
      const outs = decodeAll(schemas.value, raw.outputs, `${path}.outputs`)
      if (value !== undefined) boxes.push([id, { kind: 'atomic', value, inputs: ins, outputs: outs }])
      return
    }
    const value = decode(schemas.value, raw.value, `${path}.value`)
    if (value === undefined) return
    if (raw.kind === 'junction') boxes.push([id, junction(value, raw.ninputs, raw.noutputs)])
    else boxes.push([id, { kind: raw.kind, value }])
  })
  if (errors.length > 0) return err(errors)

  const d = new WiringDiagram<V, T>(inputs, outputs)
  const idMap = new Map<number, number>()
  for (const [id, box] of boxes) {
    if (idMap.has(id)) return err([`boxes: duplicate box id ${id}`])
    idMap.set(id, d.addBox(box))
  }
  const relabel = (p: Port, path: string): Port | undefined => {
    if (p.box === INPUT_ID || p.box === OUTPUT_ID) return p
    const image = idMap.get(p.box)
    if (image === undefined) errors.push(`${path}: unknown box id ${p.box}`)
    return image === undefined ? undefined : { ...p, box: image }
  }
  const wires: Wire[] = []
  shape.data.wires.forEach((w, k) => {
    const source = relabel(w.source, `wires.${k}.source`)
    const target = relabel(w.target, `wires.${k}.target`)
    if (source !== undefined && target !== undefined) wires.push({ source, target })
  })
  if (errors.length > 0) return err(errors)

  try {
    d.addWires(wires)
  } catch (e) {
    if (e instanceof WiringDiagramError) return err([`wires: ${e.message}`])
    throw e
  }
  return ok(d)
}
