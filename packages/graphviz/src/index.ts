// DOT language AST and pretty-printer.

export {
  type Html, type AttributeValue, type Attributes,
  type NodeId, type Node, type Edge, type Subgraph, type Statement,
  type Graph, type Expression, type BodyAttributes,
  html, isHtml, mergeAttributes,
  graph, digraph, subgraph, node, edge,
} from './ast'

export { pprint, escapeHtml, htmlAttributes } from './pprint'
