/**
 * Pretty-printer for the DOT AST.
 *
 * Layout: two-space indentation per nesting level; default attribute
 * statements (graph, node, edge) precede the body; every statement ends in
 * `;` except subgraphs.
 */

import type { Attributes, AttributeValue, Edge, Expression, Graph, Node, NodeId, Subgraph, Statement } from './ast'

export function pprint(expr: Expression): string {
  switch (expr.kind) {
    case 'graph': return printGraph(expr, 0)
    case 'subgraph': return printSubgraph(expr, 0, false)
    case 'node': return printNode(expr, 0)
    case 'edge': return printEdge(expr, 0, false)
  }
}

function printGraph(g: Graph, n: number): string {
  let out = `${indent(n)}${g.directed ? 'digraph' : 'graph'} ${g.name} {\n`
  out += printBody(g, n, g.directed)
  out += `${indent(n)}}\n`
  return out
}

function printSubgraph(s: Subgraph, n: number, directed: boolean): string {
  let out = indent(n) + (s.name === '' ? '{\n' : `subgraph ${s.name} {\n`)
  out += printBody(s, n, directed)
  out += `${indent(n)}}`
  return out
}

function printBody(body: Graph | Subgraph, n: number, directed: boolean): string {
  let out = ''
  out += printDefaults('graph', body.graphAttrs, n + 2)
  out += printDefaults('node', body.nodeAttrs, n + 2)
  out += printDefaults('edge', body.edgeAttrs, n + 2)
  for (const stmt of body.stmts) {
    out += printStatement(stmt, n + 2, directed) + '\n'
  }
  return out
}

function printStatement(stmt: Statement, n: number, directed: boolean): string {
  switch (stmt.kind) {
    case 'subgraph': return printSubgraph(stmt, n, directed)
    case 'node': return printNode(stmt, n)
    case 'edge': return printEdge(stmt, n, directed)
  }
}

function printNode(node: Node, n: number): string {
  return `${indent(n)}${node.name}${printAttrs(node.attrs)};`
}

function printEdge(edge: Edge, n: number, directed: boolean): string {
  const connective = directed ? ' -> ' : ' -- '
  return `${indent(n)}${edge.path.map(printNodeId).join(connective)}${printAttrs(edge.attrs)};`
}

function printNodeId(id: NodeId): string {
  let out = id.name
  if (id.port) out += `:${id.port}`
  if (id.anchor) out += `:${id.anchor}`
  return out
}

function printDefaults(keyword: string, attrs: Attributes, n: number): string {
  if (Object.keys(attrs).length === 0) return ''
  return `${indent(n)}${keyword}${printAttrs(attrs)};\n`
}

function printAttrs(attrs: Attributes): string {
  const entries = Object.entries(attrs)
  if (entries.length === 0) return ''
  return ` [${entries.map(([key, value]) => `${key}=${printValue(value)}`).join(',')}]`
}

function printValue(value: AttributeValue): string {
  if (typeof value === 'string') return `"${value.replace(/"/g, '\\"')}"`
  return `<${value.content}>`
}

function indent(n: number): string {
  return ' '.repeat(n)
}

// ─── HTML labels ────────────────────────────────────────────────────────────

/** Escape `& " ' < >` for text embedded in an HTML-like label. */
export function escapeHtml(s: string): string {
  return s
    .replace(/&/g, '&amp;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
}

/**
 * Encode attributes as `KEY="value"` pairs for an HTML-like table cell.
 * Plain string values are escaped, HTML values are written as given.
 */
export function htmlAttributes(attrs: Attributes): string {
  return Object.entries(attrs)
    .map(([key, value]) => `${key.toUpperCase()}="${typeof value === 'string' ? escapeHtml(value) : value.content}"`)
    .join(' ')
}
