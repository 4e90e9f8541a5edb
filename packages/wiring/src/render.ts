/**
 * Draw wiring diagrams (string diagrams) with Graphviz.
 *
 * Boxes become nodes with HTML-like table labels whose cells carry the
 * ports; junctions become small filled circles; the diagram's own inputs and
 * outputs become rows of invisible nodes ranked at the source and sink.
 */

import { z } from 'zod'
import {
  digraph, edge, escapeHtml, html, htmlAttributes, mergeAttributes, node, pprint, subgraph,
} from '@wirekit/graphviz'
import type { Attributes, Graph, Html, NodeId, Statement, Subgraph } from '@wirekit/graphviz'
import type { Box } from './boxes'
import { inputArity, outputArity } from './boxes'
import type { WiringDiagram } from './diagram'
import type { Port, PortKind } from './ports'
import { INPUT_ID, OUTPUT_ID, portKey } from './ports'

// ─── Options ────────────────────────────────────────────────────────────────

const DEFAULT_FONT = 'Serif'

const DEFAULT_GRAPH_ATTRS: Attributes = { fontname: DEFAULT_FONT }
const DEFAULT_NODE_ATTRS: Attributes = {
  fontname: DEFAULT_FONT,
  shape: 'none',
  width: '0',
  height: '0',
  margin: '0',
}
const DEFAULT_EDGE_ATTRS: Attributes = { arrowsize: '0.5', fontname: DEFAULT_FONT }
const DEFAULT_CELL_ATTRS: Attributes = { border: '1', cellpadding: '4' }

/** 24pt, in inches. */
const OUTER_PORT_SIZE = '0.333'

const attrsSchema = z.record(z.string()).default({})

export const renderOptionsSchema = z.object({
  /** Name of the Graphviz digraph. */
  graphName: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'Graph name must be a DOT identifier').default('G'),
  /** Top to bottom (vertical) or left to right (horizontal). */
  direction: z.enum(['vertical', 'horizontal']).default('vertical'),
  nodeLabels: z.boolean().default(true),
  /** Label wires with their port values. */
  labels: z.boolean().default(false),
  labelAttr: z.enum(['label', 'xlabel', 'headlabel', 'taillabel']).default('label'),
  /** Minimum size of ports on boxes, in points. */
  portSize: z.string().default('24'),
  /** Size of junction nodes, in inches. */
  junctionSize: z.string().default('0.05'),
  /** Draw the diagram's own inputs and outputs (and the wires touching them). */
  outerPorts: z.boolean().default(true),
  /** Keep the outer inputs and outputs in port order. */
  anchorOuterPorts: z.boolean().default(true),
  graphAttrs: attrsSchema,
  nodeAttrs: attrsSchema,
  edgeAttrs: attrsSchema,
  cellAttrs: attrsSchema,
})

export type RenderOptions = z.input<typeof renderOptionsSchema>

type ResolvedOptions = z.output<typeof renderOptionsSchema>

interface GraphvizBox {
  readonly stmts: Statement[]
  readonly inputs: NodeId[]
  readonly outputs: NodeId[]
}

// ─── Conversion ─────────────────────────────────────────────────────────────

/** Convert a wiring diagram into a Graphviz digraph. Throws a ZodError on invalid options. */
export function toGraphviz<V, T>(d: WiringDiagram<V, T>, options: RenderOptions = {}): Graph {
  const opts = renderOptionsSchema.parse(options)
  const vertical = opts.direction === 'vertical'

  const stmts: Statement[] = []
  const portMap = new Map<string, NodeId>()
  const register = (box: number, kind: PortKind, ids: readonly NodeId[]): void => {
    ids.forEach((id, i) => portMap.set(portKey({ box, kind, port: i + 1 }), id))
  }

  if (opts.outerPorts) {
    const outer = graphvizOuterBox(d, opts.anchorOuterPorts, vertical)
    stmts.push(...outer.stmts)
    register(INPUT_ID, 'output', outer.inputs)
    register(OUTPUT_ID, 'input', outer.outputs)
  }

  const cellAttrs = mergeAttributes(DEFAULT_CELL_ATTRS, opts.cellAttrs)
  for (const [id, b] of d.boxes()) {
    const gv = b.kind === 'junction'
      ? graphvizJunction(nodeName(id), b.ninputs, b.noutputs, opts.junctionSize)
      : graphvizBox(b, nodeName(id), opts, cellAttrs)
    stmts.push(...gv.stmts)
    register(id, 'input', gv.inputs)
    register(id, 'output', gv.outputs)
  }

  d.wires().forEach((w, i) => {
    const source = portMap.get(portKey(w.source))
    const target = portMap.get(portKey(w.target))
    if (source === undefined || target === undefined) return
    // The source port labels the wire: both ends carry equal values.
    const text = valueLabel(d.portValue(w.source))
    const attrs: Record<string, string> = { id: `e${i + 1}`, comment: text }
    if (opts.labels) attrs[opts.labelAttr] = text
    stmts.push(edge([source, target], attrs))
  })

  return digraph(opts.graphName, stmts, {
    graphAttrs: mergeAttributes(DEFAULT_GRAPH_ATTRS, opts.graphAttrs, { rankdir: vertical ? 'TB' : 'LR' }),
    nodeAttrs: mergeAttributes(DEFAULT_NODE_ATTRS, opts.nodeAttrs),
    edgeAttrs: mergeAttributes(DEFAULT_EDGE_ATTRS, opts.edgeAttrs),
  })
}

/** Render a wiring diagram as DOT source. */
export function renderDot<V, T>(d: WiringDiagram<V, T>, options: RenderOptions = {}): string {
  return pprint(toGraphviz(d, options))
}

// ─── Boxes ──────────────────────────────────────────────────────────────────

function graphvizBox<V, T>(b: Box<V, T>, name: string, opts: ResolvedOptions, cellAttrs: Attributes): GraphvizBox {
  const vertical = opts.direction === 'vertical'
  const nin = inputArity(b)
  const nout = outputArity(b)
  const text = boxLabel(b)
  const label = nodeHtmlLabel(nin, nout, opts.nodeLabels ? text : '', vertical, opts.portSize, cellAttrs)
  // `id` is ignored by Graphviz itself; it is there for downstream consumers of the output.
  const n = node(name, { id: name, comment: text, label })
  const port = (kind: PortKind, i: number): NodeId => ({ name, port: portName(kind, i), anchor: portAnchor(kind, vertical) })
  return {
    stmts: [n],
    inputs: Array.from({ length: nin }, (_, i) => port('input', i + 1)),
    outputs: Array.from({ length: nout }, (_, i) => port('output', i + 1)),
  }
}

function graphvizJunction(name: string, nin: number, nout: number, size: string): GraphvizBox {
  const n = node(name, {
    id: name,
    comment: 'junction',
    label: '',
    shape: 'circle',
    style: 'filled',
    fillcolor: 'black',
    width: size,
    height: size,
  })
  return {
    stmts: [n],
    inputs: Array.from({ length: nin }, () => ({ name })),
    outputs: Array.from({ length: nout }, () => ({ name })),
  }
}

function nodeHtmlLabel(
  nin: number,
  nout: number,
  text: string,
  vertical: boolean,
  portSize: string,
  attrs: Attributes,
): Html {
  const cell = `<TD ${htmlAttributes(attrs)}>${escapeHtml(text)}</TD>`
  if (vertical) {
    return html([
      '<TABLE BORDER="0" CELLPADDING="0" CELLSPACING="0">',
      `<TR><TD>${portsRow('input', nin, portSize)}</TD></TR>`,
      `<TR>${cell}</TR>`,
      `<TR><TD>${portsRow('output', nout, portSize)}</TD></TR>`,
      '</TABLE>',
    ].join('\n'))
  }
  return html([
    '<TABLE BORDER="0" CELLPADDING="0" CELLSPACING="0">',
    '<TR>',
    `<TD>${portsColumn('input', nin, portSize)}</TD>`,
    cell,
    `<TD>${portsColumn('output', nout, portSize)}</TD>`,
    '</TR>',
    '</TABLE>',
  ].join('\n'))
}

/** Ports laid out side by side, for vertical drawings. */
function portsRow(kind: PortKind, nports: number, portSize: string): string {
  const cols = nports > 0
    ? Array.from({ length: nports }, (_, i) => `<TD HEIGHT="0" WIDTH="${portSize}" PORT="${portName(kind, i + 1)}"></TD>`).join('')
    : `<TD HEIGHT="0" WIDTH="${portSize}"></TD>`
  return `<TABLE BORDER="0" CELLPADDING="0" CELLSPACING="0"><TR>${cols}</TR></TABLE>`
}

/** Ports stacked on top of each other, for horizontal drawings. */
function portsColumn(kind: PortKind, nports: number, portSize: string): string {
  const rows = nports > 0
    ? Array.from({ length: nports }, (_, i) => `<TR><TD HEIGHT="${portSize}" WIDTH="0" PORT="${portName(kind, i + 1)}"></TD></TR>`).join('')
    : `<TR><TD HEIGHT="${portSize}" WIDTH="0"></TD></TR>`
  return `<TABLE BORDER="0" CELLPADDING="0" CELLSPACING="0">${rows}</TABLE>`
}

// ─── Outer Box ──────────────────────────────────────────────────────────────

function graphvizOuterBox<V, T>(d: WiringDiagram<V, T>, anchor: boolean, vertical: boolean): GraphvizBox {
  const stmts: Statement[] = []
  const nin = d.inputPorts.length
  const nout = d.outputPorts.length
  if (nin > 0) stmts.push(graphvizOuterPorts(INPUT_ID, 'input', nin, anchor, vertical))
  if (nout > 0) stmts.push(graphvizOuterPorts(OUTPUT_ID, 'output', nout, anchor, vertical))

  const port = (p: Port): NodeId => ({ name: portNodeName(p.box, p.port), anchor: portAnchor(p.kind, vertical) })
  return {
    stmts,
    inputs: Array.from({ length: nin }, (_, i) => port({ box: INPUT_ID, kind: 'output', port: i + 1 })),
    outputs: Array.from({ length: nout }, (_, i) => port({ box: OUTPUT_ID, kind: 'input', port: i + 1 })),
  }
}

/** A rank of invisible nodes standing for the diagram's inputs or outputs. */
function graphvizOuterPorts(id: number, kind: PortKind, nports: number, anchor: boolean, vertical: boolean): Subgraph {
  const dir = vertical ? 'LR' : 'TB'
  const names = Array.from({ length: nports }, (_, i) => portNodeName(id, i + 1))
  const stmts: Statement[] = names.map((name, i) => node(name, { id: portName(kind, i + 1) }))
  if (anchor && names.length > 1) stmts.push(edge(names))
  return subgraph(stmts, {
    graphAttrs: { rank: kind === 'input' ? 'source' : 'sink', rankdir: dir },
    nodeAttrs: {
      style: 'invis',
      shape: 'none',
      label: '',
      width: dir === 'LR' ? OUTER_PORT_SIZE : '0',
      height: dir === 'TB' ? OUTER_PORT_SIZE : '0',
    },
    edgeAttrs: { style: 'invis' },
  })
}

// ─── Names and Labels ───────────────────────────────────────────────────────

function nodeName(id: number): string {
  if (id === INPUT_ID) return 'input'
  if (id === OUTPUT_ID) return 'output'
  return `n${id}`
}

function portNodeName(id: number, port: number): string {
  return `${nodeName(id)}p${port}`
}

function portName(kind: PortKind, port: number): string {
  return kind === 'input' ? `in${port}` : `out${port}`
}

function portAnchor(kind: PortKind, vertical: boolean): string {
  if (vertical) return kind === 'input' ? 'n' : 's'
  return kind === 'input' ? 'w' : 'e'
}

function boxLabel<V, T>(b: Box<V, T>): string {
  return b.kind === 'atomic' ? valueLabel(b.value) : b.kind
}

function valueLabel(value: unknown): string {
  if (typeof value === 'string') return value
  if (value === null || value === undefined) return ''
  if (typeof value === 'object') return JSON.stringify(value)
  return String(value)
}
