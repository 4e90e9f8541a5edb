/**
 * AST for Graphviz's DOT language.
 *
 * Only the subset needed to draw port graphs: graphs, subgraphs, nodes and
 * edge paths with ordered attribute lists. No bindings to Graphviz itself.
 *
 * References:
 *   - DOT grammar: https://graphviz.org/doc/info/lang.html
 */

// ─── Attributes ─────────────────────────────────────────────────────────────

/** Graphviz "HTML-like" label content, kept as an atomic string. */
export interface Html {
  readonly kind: 'html'
  readonly content: string
}

export type AttributeValue = string | Html

/** Attribute list; key order is print order. */
export type Attributes = Readonly<Record<string, AttributeValue>>

export function html(content: string): Html {
  return { kind: 'html', content }
}

export function isHtml(value: AttributeValue): value is Html {
  return typeof value !== 'string'
}

/** Merge attribute lists left to right; later keys win, first position is kept. */
export function mergeAttributes(...lists: Attributes[]): Attributes {
  const merged: Record<string, AttributeValue> = {}
  for (const list of lists) {
    for (const [key, value] of Object.entries(list)) merged[key] = value
  }
  return merged
}

// ─── Statements ─────────────────────────────────────────────────────────────

/** A node reference with optional port and compass anchor, e.g. `n3:out1:s`. */
export interface NodeId {
  readonly name: string
  readonly port?: string
  readonly anchor?: string
}

export interface Node {
  readonly kind: 'node'
  readonly name: string
  readonly attrs: Attributes
}

/** An edge statement; a path of more than two nodes prints as a chain. */
export interface Edge {
  readonly kind: 'edge'
  readonly path: readonly NodeId[]
  readonly attrs: Attributes
}

export interface Subgraph {
  readonly kind: 'subgraph'
  /** Empty for anonymous subgraphs. */
  readonly name: string
  readonly stmts: readonly Statement[]
  readonly graphAttrs: Attributes
  readonly nodeAttrs: Attributes
  readonly edgeAttrs: Attributes
}

export type Statement = Node | Edge | Subgraph

export interface Graph {
  readonly kind: 'graph'
  readonly name: string
  readonly directed: boolean
  readonly stmts: readonly Statement[]
  readonly graphAttrs: Attributes
  readonly nodeAttrs: Attributes
  readonly edgeAttrs: Attributes
}

export type Expression = Graph | Statement

// ─── Constructors ───────────────────────────────────────────────────────────

export interface BodyAttributes {
  graphAttrs?: Attributes
  nodeAttrs?: Attributes
  edgeAttrs?: Attributes
}

export function graph(name: string, stmts: readonly Statement[], attrs: BodyAttributes = {}): Graph {
  return { kind: 'graph', name, directed: false, stmts, ...bodyAttributes(attrs) }
}

export function digraph(name: string, stmts: readonly Statement[], attrs: BodyAttributes = {}): Graph {
  return { kind: 'graph', name, directed: true, stmts, ...bodyAttributes(attrs) }
}

export function subgraph(stmts: readonly Statement[], attrs: BodyAttributes & { name?: string } = {}): Subgraph {
  return { kind: 'subgraph', name: attrs.name ?? '', stmts, ...bodyAttributes(attrs) }
}

export function node(name: string, attrs: Attributes = {}): Node {
  return { kind: 'node', name, attrs }
}

/** Build an edge through `path`, given as node ids or bare node names. */
export function edge(path: readonly (NodeId | string)[], attrs: Attributes = {}): Edge {
  if (path.length < 2) {
    throw new RangeError(`An edge needs at least two nodes, got ${path.length}`)
  }
  return {
    kind: 'edge',
    path: path.map((p) => (typeof p === 'string' ? { name: p } : p)),
    attrs,
  }
}

function bodyAttributes(attrs: BodyAttributes): Required<BodyAttributes> {
  return {
    graphAttrs: attrs.graphAttrs ?? {},
    nodeAttrs: attrs.nodeAttrs ?? {},
    edgeAttrs: attrs.edgeAttrs ?? {},
  }
}
