/**
 * Law checkers for the rewrite passes.
 *
 *   1. Junction round trip:  remJunctions(addJunctions(d)) ≅ d   (d without junctions)
 *   2. Idempotence:          pass(pass(d)) ≅ pass(d)
 *   3. Dead-code completeness: after normalizeDelete, every box reaches an output
 *   4. Permutation: crossing minimization returns a reordering of its input
 *
 * "≅" is diagram isomorphism. Every checker works on clones and leaves its
 * argument untouched. Designed for use with fast-check property-based tests.
 */

import type { WiringDiagram } from './diagram'
import { isIsomorphic } from './isomorphism'
import { addJunctions, remJunctions } from './junctions'
import type { LayerOptions } from './layout'
import { crossingMinimizationBySort, crossingMinimizationPermutation } from './layout'
import { normalizeDelete } from './normalize'
import { liveBoxes } from './traversal'

/** A rewrite pass mutating its argument in place and returning it. */
export type DiagramPass<V, T> = (d: WiringDiagram<V, T>) => WiringDiagram<V, T>

// ─── Junction Laws ──────────────────────────────────────────────────────────

export function checkJunctionRoundTrip<V, T>(d: WiringDiagram<V, T>): boolean {
  const roundTrip = remJunctions(addJunctions(d.clone()))
  return isIsomorphic(roundTrip, d)
}

// ─── Normalization Laws ─────────────────────────────────────────────────────

/** Check `pass(pass(d)) ≅ pass(d)`. */
export function checkIdempotent<V, T>(pass: DiagramPass<V, T>, d: WiringDiagram<V, T>): boolean {
  const once = pass(d.clone())
  const twice = pass(once.clone())
  return isIsomorphic(once, twice)
}

export function checkDeadCodeComplete<V, T>(d: WiringDiagram<V, T>): boolean {
  const normalized = normalizeDelete(d.clone())
  return liveBoxes(normalized).size === normalized.boxCount
}

// ─── Layout Laws ────────────────────────────────────────────────────────────

/**
 * Check that the permutation is a bijection on `0..n-1` and that it agrees
 * with the id ordering.
 */
export function checkPermutation<V, T>(
  d: WiringDiagram<V, T>,
  nodeIds: readonly number[],
  options: LayerOptions = {},
): boolean {
  const perm = crossingMinimizationPermutation(d, nodeIds, options)
  const sorted = crossingMinimizationBySort(d, nodeIds, options)
  if (perm.length !== nodeIds.length || sorted.length !== nodeIds.length) return false
  const seen = new Set(perm)
  if (seen.size !== perm.length) return false
  return perm.every((p, i) => Number.isInteger(p) && p >= 0 && p < nodeIds.length && nodeIds[p] === sorted[i])
}
