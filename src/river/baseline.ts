/**
 * baseline.ts — Chooses the vertical offset of each river-plot row.
 *
 * A river plot stacks bands of width prevalence × load. Shifting a whole row
 * up or down does not change the data but does change how much the band
 * boundaries jump between consecutive rows ("shear"). A short randomized
 * local search picks offsets that keep the boundaries smooth.
 */

import type { Cell, SignalTable } from '../types.js'
import { ShapeMismatchError } from '../errors.js'
import { createRandomSource, randomNormal, type RandomSource } from '../utils/random.js'

export const DEFAULT_BASELINE_ITERATIONS = 128

/** Damping added to the round number when scaling proposal noise. */
const NOISE_DAMPING = 48

export interface BaselineOptions {
  readonly iterations?: number
  readonly rng?: RandomSource
}

export interface BaselineResult {
  /** One offset per input row; null before the first scored row. */
  readonly offsets: readonly Cell[]
  /** Initial shear followed by the shear after every accepted step. */
  readonly scores: readonly number[]
}

/**
 * Sum over consecutive rows of the squared boundary jump, each jump weighted
 * by the band's prevalence in the later row.
 *
 * @param prevalence scored rows only, all cells present
 * @param widths per-row band widths (prevalence × load)
 */
export function shearScore(
  offsets: readonly number[],
  prevalence: readonly (readonly number[])[],
  widths: readonly (readonly number[])[],
): number {
  let score = 0
  let previous: number[] | null = null
  for (let i = 0; i < prevalence.length; i++) {
    const row = prevalence[i] ?? []
    let edge = offsets[i] ?? 0
    const boundaries = (widths[i] ?? []).map((w) => (edge += w))
    if (previous !== null) {
      for (let j = 0; j < boundaries.length; j++) {
        const jump = ((boundaries[j] ?? 0) - (previous[j] ?? 0)) * (row[j] ?? 0)
        score += jump * jump
      }
    }
    previous = boundaries
  }
  return score
}

function isCompleteRow(row: readonly Cell[]): row is readonly number[] {
  return row.every((v) => v !== null && Number.isFinite(v))
}

/**
 * Spreads the offsets of the scored rows back over every row: linear
 * interpolation between scored rows, the last value carried forward after
 * them, null before the first one.
 */
function expandOffsets(rowCount: number, scored: readonly number[], offsets: readonly number[]): Cell[] {
  const out: Cell[] = new Array<Cell>(rowCount).fill(null)
  scored.forEach((row, k) => {
    const value = offsets[k] ?? 0
    out[row] = value
    const nextRow = scored[k + 1]
    const nextValue = offsets[k + 1]
    const end = nextRow ?? rowCount
    for (let i = row + 1; i < end; i++) {
      out[i] = nextRow !== undefined && nextValue !== undefined
        ? value + ((nextValue - value) * (i - row)) / (nextRow - row)
        : value
    }
  })
  return out
}

/**
 * Optimizes per-row offsets for a stacked river plot.
 *
 * Rows count towards the score only when their weight is finite and every
 * cell is present; the other rows get interpolated offsets.
 *
 * @throws {ShapeMismatchError} if `weights` is not aligned with the rows.
 */
export function riverplotBaseline(
  table: SignalTable,
  weights: readonly (number | null)[],
  options: BaselineOptions = {},
): BaselineResult {
  if (weights.length !== table.rows.length) {
    throw new ShapeMismatchError(`Got ${weights.length} weights for ${table.rows.length} rows`)
  }
  const iterations = options.iterations ?? DEFAULT_BASELINE_ITERATIONS
  const rng = options.rng ?? createRandomSource(null)

  const scored: number[] = []
  const prevalence: (readonly number[])[] = []
  const widths: number[][] = []
  const loads: number[] = []
  table.rows.forEach((row, i) => {
    const weight = weights[i]
    if (weight == null || !Number.isFinite(weight) || !isCompleteRow(row)) return
    scored.push(i)
    prevalence.push(row)
    widths.push(row.map((v) => v * weight))
    loads.push(weight)
  })
  if (scored.length === 0) {
    return { offsets: table.rows.map(() => null), scores: [] }
  }

  let offsets = loads.map((w) => -w / 2)
  let best = shearScore(offsets, prevalence, widths)
  const scores = [best]

  for (let round = 0; round < iterations; round++) {
    const proposal = offsets.map((o) => o + (2 * randomNormal(rng)) / (round + NOISE_DAMPING))
    const score = shearScore(proposal, prevalence, widths)
    if (score < best) {
      const center = proposal.reduce((sum, o) => sum + o, 0) / proposal.length
      offsets = proposal.map((o) => o - center)
      best = score
      scores.push(score)
    }
  }

  return { offsets: expandOffsets(table.rows.length, scored, offsets), scores }
}
