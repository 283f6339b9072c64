/**
 * weights.ts — Default sample weights for aggregating wastewater signals.
 *
 * A wastewater sample speaks for its sewershed's population and, optionally,
 * for how much virus it carried. Unreported values fall back to fixed
 * defaults so that a sparse metadata column never drops a sample.
 */

import { least, rollup } from 'd3-array'
import { parseISO } from 'date-fns'

export const DEFAULT_POPULATION = 1000
export const DEFAULT_VIRAL_LOAD = 0.5

export interface WastewaterSample {
  readonly population?: number | null
  readonly normedViralLoad?: number | null
}

export interface WastewaterWeightOptions {
  /** Multiply by normalized viral load. Default true. */
  readonly loaded?: boolean
  readonly defaultPopulation?: number
  readonly defaultViralLoad?: number
}

function orDefault(value: number | null | undefined, fallback: number): number {
  return value != null && Number.isFinite(value) ? value : fallback
}

/** Population × (optionally) normalized viral load, per sample. */
export function wastewaterWeights(
  samples: readonly WastewaterSample[],
  options: WastewaterWeightOptions = {},
): number[] {
  const loaded = options.loaded ?? true
  const population = options.defaultPopulation ?? DEFAULT_POPULATION
  const viralLoad = options.defaultViralLoad ?? DEFAULT_VIRAL_LOAD
  return samples.map((s) => {
    const weight = orDefault(s.population, population)
    return loaded ? weight * orDefault(s.normedViralLoad, viralLoad) : weight
  })
}

/** Earliest sample date for each value of `key` (e.g. per collection site). */
export function firstDates<T extends { readonly date: string }>(
  samples: readonly T[],
  key: (sample: T) => string,
): Map<string, string> {
  const earliest = rollup(
    samples,
    (group) => least(group, (s) => parseISO(s.date).getTime())?.date ?? '',
    key,
  )
  return new Map(earliest)
}
