/**
 * Copy and delete normalization.
 *
 * Rewrites a diagram to a canonical form under two laws of cartesian
 * categories:
 *
 *   naturality of copying:  f ; copy  =  copy ; (f ⊗ f)
 *   deletion of dead code:  f ; delete = delete
 *
 * Passes run in junction form. A diagram given without junctions is
 * converted on entry and expanded back into generators on exit; one given
 * with junctions stays in junction form. Each pass loops until a round
 * changes nothing, bounded by `maxRounds`.
 */

import { createLogger, settings } from '@wirekit/config'
import type { WiringDiagram } from './diagram'
import { FixpointLimitError, UnsupportedStructureError } from './errors'
import { addJunctions, remJunctions } from './junctions'
import {
  bypassPassThroughs, compactJunctions, fuseCopyJunctions,
  materializeFanOut, mergeDuplicateBoxes, removeDeadBoxes,
} from './rewrites'

const log = createLogger('wiring:normalize')

export interface NormalizeOptions {
  /** Round bound for the fixpoint loop; defaults to the configured bound. */
  maxRounds?: number
}

/**
 * Push copies downstream: boxes applying the same morphism to copies of the
 * same value are merged and their result is copied instead.
 *
 *   copy ; (f ⊗ f)  ↦  f ; copy
 */
export function normalizeCopy<V, T>(d: WiringDiagram<V, T>, options: NormalizeOptions = {}): WiringDiagram<V, T> {
  return inJunctionForm(d, () => fixpoint('normalizeCopy', options, () => copyRound(d)))
}

/** Remove every box whose outputs never reach the diagram's outputs. */
export function normalizeDelete<V, T>(d: WiringDiagram<V, T>, options: NormalizeOptions = {}): WiringDiagram<V, T> {
  return inJunctionForm(d, () => fixpoint('normalizeDelete', options, () => deleteRound(d)))
}

/**
 * Copy and delete normalization together, until neither applies.
 * Rejects diagrams with merge or create structure.
 */
export function normalizeCartesian<V, T>(d: WiringDiagram<V, T>, options: NormalizeOptions = {}): WiringDiagram<V, T> {
  const offending = d.boxes()
    .filter(([, b]) => b.kind === 'merge' || b.kind === 'create' || (b.kind === 'junction' && b.ninputs !== 1))
    .map(([id]) => id)
  if (offending.length > 0) throw new UnsupportedStructureError('normalizeCartesian', offending)

  return inJunctionForm(d, () => fixpoint('normalizeCartesian', options, () => {
    const copied = copyRound(d)
    const deleted = deleteRound(d)
    return copied || deleted
  }))
}

// ─── Rounds ─────────────────────────────────────────────────────────────────

function copyRound<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = fuseCopyJunctions(d)
  changed = mergeDuplicateBoxes(d) || changed
  changed = materializeFanOut(d) || changed
  changed = compactJunctions(d) || changed
  changed = bypassPassThroughs(d) || changed
  return changed
}

function deleteRound<V, T>(d: WiringDiagram<V, T>): boolean {
  let changed = removeDeadBoxes(d)
  changed = compactJunctions(d) || changed
  changed = bypassPassThroughs(d) || changed
  return changed
}

// ─── Drivers ────────────────────────────────────────────────────────────────

function inJunctionForm<V, T>(d: WiringDiagram<V, T>, body: () => void): WiringDiagram<V, T> {
  const hadJunctions = d.boxes().some(([, b]) => b.kind === 'junction')
  addJunctions(d)
  body()
  if (!hadJunctions) remJunctions(d)
  return d
}

function fixpoint(pass: string, options: NormalizeOptions, round: () => boolean): void {
  const maxRounds = options.maxRounds ?? settings.maxRounds
  for (let rounds = 1; rounds <= maxRounds; rounds++) {
    if (!round()) {
      log.debug('fixpoint reached', { pass, rounds })
      return
    }
  }
  throw new FixpointLimitError(pass, maxRounds)
}
