/**
 * @wirekit/wiring: wiring diagrams and their rewrites
 *
 * Store:       port-graph diagrams with boxes, wires and boundary ports
 * Junctions:   generator ⇄ junction conversion
 * Normalize:   copy, delete and cartesian normalization to a fixpoint
 * Layout:      barycenter crossing minimization for layered drawings
 * Builders, codec, laws and the Graphviz renderer sit on top.
 */

// ─── Store ──────────────────────────────────────────────────────────────────
export {
  type Box, type BoxKind, type AtomicBox, type GeneratorBox,
  type CopyBox, type MergeBox, type DeleteBox, type CreateBox, type JunctionBox,
  atomic, copy, merge, del, create, junction,
  isGenerator, inputArity, outputArity, inputPorts, outputPorts,
  valueEquals, portsEqual, boxEquals, describeBox,
} from './boxes'
export {
  type PortKind, type Port, type Wire,
  INPUT_ID, OUTPUT_ID, inputPort, outputPort, wire,
  portKey, wireKey, formatBox, formatPort, formatWire,
} from './ports'
export { WiringDiagram } from './diagram'
export { isIsomorphic, findIsomorphism } from './isomorphism'
export { topologicalSort, liveBoxes } from './traversal'
export { type Result, ok, err } from './result'

// ─── Errors ─────────────────────────────────────────────────────────────────
export {
  WiringDiagramError,
  InvalidPortReferenceError,
  PortTypeMismatchError,
  UnknownNodeSetError,
  UnsupportedStructureError,
  FixpointLimitError,
} from './errors'

// ─── Builders ───────────────────────────────────────────────────────────────
export {
  singletonDiagram, junctionDiagram, identityDiagram,
  composeDiagrams, tensorDiagrams,
} from './builders'

// ─── Passes ─────────────────────────────────────────────────────────────────
export { addJunctions, remJunctions, junctionExpansion } from './junctions'
export {
  type NormalizeOptions,
  normalizeCopy, normalizeDelete, normalizeCartesian,
} from './normalize'
export {
  fuseCopyJunctions, mergeDuplicateBoxes, materializeFanOut,
  compactJunctions, bypassPassThroughs, removeDeadBoxes,
} from './rewrites'
export {
  type LayerOptions,
  crossingMinimizationBySort, crossingMinimizationPermutation,
} from './layout'

// ─── Codec ──────────────────────────────────────────────────────────────────
export {
  type SerializedDiagram, type ValueSchemas,
  serializeDiagram, parseDiagram,
} from './serialize'

// ─── Laws ───────────────────────────────────────────────────────────────────
export {
  type DiagramPass,
  checkJunctionRoundTrip, checkIdempotent, checkDeadCodeComplete, checkPermutation,
} from './laws'

// ─── Rendering ──────────────────────────────────────────────────────────────
export {
  type RenderOptions,
  renderOptionsSchema, toGraphviz, renderDot,
} from './render'
