/**
 * binning.ts — Reduces long-format samples into a date-bin × category table.
 *
 * Algorithm:
 *   1. Extend the date range by one day on each side and cut it into
 *      right-closed bins `(lo, hi]` of the requested width (the last bin may
 *      run past the end date so every sample in range lands in a bin).
 *   2. Drop samples outside the range or with a missing value/weight.
 *   3. Per (bin, category) sum value × weight, then divide by the bin's total
 *      (normalize: shares summing to 1) or by the category's weight (weighted
 *      mean).
 *   4. Fold "X-like" categories into "X".
 *
 * Zero denominators produce null cells, never exceptions.
 */

import { ascending, fsum, max, min, rollup } from 'd3-array'
import { addDays, differenceInCalendarDays, formatISO, isValid, parseISO, subDays } from 'date-fns'
import type { Cell, SignalTable } from '../types.js'
import { InvalidBinningError, ShapeMismatchError } from '../errors.js'
import { FREQUENCY_RE } from '../config.js'

/** A long-format observation: one category measured in one sample on one date. */
export interface SampleRow {
  /** ISO date (YYYY-MM-DD or full ISO timestamp). */
  readonly date: string
  readonly category: string
  readonly values: Readonly<Record<string, number | null | undefined>>
}

/** A right-closed date interval `(start, end]`, as ISO dates. */
export interface DateBin {
  readonly start: string
  readonly end: string
}

/** Binned output; row keys are bin end dates. */
export interface BinnedTable extends SignalTable {
  readonly bins: readonly DateBin[]
}

export interface BinningOptions {
  /** Per-sample weights aligned with the samples; default 1 each. */
  readonly weights?: readonly number[] | null
  /** Bin width such as "7D" or "2W"; null = one bin for the whole range. Default "7D". */
  readonly frequency?: string | null
  /** Default: earliest sample date. */
  readonly startDate?: string
  /** Default: latest sample date. */
  readonly endDate?: string
  /** Value column to aggregate. Default "prevalence". */
  readonly column?: string
  /** Default true. */
  readonly normalize?: boolean
}

export const DEFAULT_FREQUENCY = '7D'
export const DEFAULT_VALUE_COLUMN = 'prevalence'

const LIKE_SUFFIX = '-like'

/** Bin width in days for a frequency string such as "7D" or "2W". */
export function parseFrequencyDays(frequency: string): number {
  const match = FREQUENCY_RE.exec(frequency)
  if (match === null) {
    throw new InvalidBinningError(`Unsupported bin frequency "${frequency}" (expected e.g. "7D" or "2W")`)
  }
  const count = match[1] !== undefined ? Number.parseInt(match[1], 10) : 1
  return match[2] === 'W' ? count * 7 : count
}

/** A time part ending in `Z` or a numeric offset such as `+02:00`. */
const UTC_OFFSET_RE = /[T ].*(?:Z|[+-]\d{2}(?::?\d{2})?)$/i

/**
 * Parses an ISO date or timestamp to the calendar day it falls on, as local
 * midnight. Timestamps with an offset fall on their UTC day; bare dates and
 * local timestamps on the day they name. The host time zone never moves a
 * sample across a day boundary.
 */
function parseDay(value: string, what: string): Date {
  const instant = parseISO(value)
  if (!isValid(instant)) throw new InvalidBinningError(`Invalid ${what} date "${value}"`)
  const day = UTC_OFFSET_RE.test(value) ? instant.toISOString().slice(0, 10) : isoDay(instant)
  return parseISO(day)
}

function isoDay(date: Date): string {
  return formatISO(date, { representation: 'date' })
}

/** "BA.2-like" → "BA.2"; other names unchanged. */
export function baseCategory(category: string): string {
  const cut = category.indexOf(LIKE_SUFFIX)
  return cut === -1 ? category : category.slice(0, cut)
}

/**
 * Cuts `(start − 1 day, end + 1 day]` into right-closed bins of `widthDays`,
 * or returns that whole interval as a single bin when widthDays is null.
 */
export function buildDateBins(start: Date, end: Date, widthDays: number | null): DateBin[] {
  const lo = subDays(start, 1)
  const hi = addDays(end, 1)
  const span = differenceInCalendarDays(hi, lo)
  if (span <= 0) throw new InvalidBinningError(`End date ${isoDay(end)} precedes start date ${isoDay(start)}`)
  if (widthDays === null) return [{ start: isoDay(lo), end: isoDay(hi) }]

  const count = Math.ceil(span / widthDays)
  return Array.from({ length: count }, (_, k) => ({
    start: isoDay(addDays(lo, k * widthDays)),
    end: isoDay(addDays(lo, (k + 1) * widthDays)),
  }))
}

interface BinnedSample {
  readonly bin: number
  readonly category: string
  readonly value: number
  readonly weight: number
}

/**
 * Aggregates samples into a bin × category table.
 *
 * @throws {ShapeMismatchError} if weights are not aligned with samples.
 * @throws {InvalidBinningError} on an unsupported frequency or invalid dates.
 */
export function binAndAggregate(samples: readonly SampleRow[], options: BinningOptions = {}): BinnedTable {
  const weights = options.weights ?? null
  if (weights !== null && weights.length !== samples.length) {
    throw new ShapeMismatchError(`Got ${weights.length} weights for ${samples.length} samples`)
  }
  const column = options.column ?? DEFAULT_VALUE_COLUMN
  const normalize = options.normalize ?? true
  const frequency = options.frequency === undefined ? DEFAULT_FREQUENCY : options.frequency
  const widthDays = frequency === null ? null : parseFrequencyDays(frequency)

  if (samples.length === 0) return { rowKeys: [], columns: [], rows: [], bins: [] }

  const dates = samples.map((s) => parseDay(s.date, 'sample'))
  const times = dates.map((d) => d.getTime())
  const start = options.startDate !== undefined
    ? parseDay(options.startDate, 'start')
    : new Date(min(times) ?? 0)
  const end = options.endDate !== undefined
    ? parseDay(options.endDate, 'end')
    : new Date(max(times) ?? 0)

  const bins = buildDateBins(start, end, widthDays)
  const lo = subDays(start, 1)
  const span = differenceInCalendarDays(addDays(end, 1), lo)
  const binOf = (date: Date): number | null => {
    const offset = differenceInCalendarDays(date, lo)
    if (offset < 1 || offset > span) return null
    return widthDays === null ? 0 : Math.ceil(offset / widthDays) - 1
  }

  const kept: BinnedSample[] = []
  samples.forEach((sample, i) => {
    const value = sample.values[column]
    const weight = weights === null ? 1 : weights[i]
    const date = dates[i]
    if (value == null || !Number.isFinite(value)) return
    if (weight === undefined || !Number.isFinite(weight) || date === undefined) return
    const bin = binOf(date)
    if (bin === null) return
    kept.push({ bin, category: sample.category, value, weight })
  })

  const numerators = rollup(kept, (g) => fsum(g, (s) => s.value * s.weight), (s) => s.bin, (s) => s.category)
  const binTotals = rollup(kept, (g) => fsum(g, (s) => s.value * s.weight), (s) => s.bin)
  const binWeights = rollup(kept, (g) => fsum(g, (s) => s.weight), (s) => s.bin)
  const categoryWeights = rollup(kept, (g) => fsum(g, (s) => s.weight), (s) => s.bin, (s) => s.category)

  const rawCategories = Array.from(new Set(kept.map((s) => s.category)))
  const columns = Array.from(new Set(rawCategories.map(baseCategory))).sort(ascending)
  const observedBins = Array.from(numerators.keys()).sort(ascending)

  const rows = observedBins.map((bin): Cell[] => {
    const binNumerators = numerators.get(bin) ?? new Map<string, number>()
    const total = normalize ? binTotals.get(bin) ?? 0 : binWeights.get(bin) ?? 0
    if (total === 0) return columns.map(() => null)

    const cells = new Map(columns.map((c): [string, Cell] => [c, 0]))
    const contributed = new Set<string>()
    for (const [category, numerator] of binNumerators) {
      const denominator = normalize ? total : categoryWeights.get(bin)?.get(category) ?? 0
      const base = baseCategory(category)
      if (denominator === 0) {
        if (!contributed.has(base)) cells.set(base, null)
        continue
      }
      const previous = contributed.has(base) ? cells.get(base) ?? null : null
      cells.set(base, (previous ?? 0) + numerator / denominator)
      contributed.add(base)
    }
    return columns.map((c) => cells.get(c) ?? null)
  })

  const keptBins = observedBins.flatMap((bin) => {
    const b = bins[bin]
    return b ? [b] : []
  })
  return {
    rowKeys: keptBins.map((b) => b.end),
    columns,
    rows,
    bins: keptBins,
  }
}
