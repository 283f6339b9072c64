import { mean } from 'd3-array'
import type { PrevalenceVector, SignalTable } from '../types.js'

/** True when every cell of the row is missing. */
export function isMissingRow(row: readonly (number | null)[]): boolean {
  return row.every((v) => v === null || !Number.isFinite(v))
}

/**
 * Column means over the rows that carry any data, as a prevalence vector.
 * Missing cells inside an observed row count as 0. Used as the
 * representative snapshot a whole time window is clustered on.
 */
export function meanPrevalence(table: SignalTable): PrevalenceVector {
  const observed = table.rows.filter((row) => !isMissingRow(row))
  const prevalence = new Map<string, number>()
  table.columns.forEach((column, j) => {
    const value = mean(observed, (row) => {
      const cell = row[j]
      return cell != null && Number.isFinite(cell) ? cell : 0
    })
    if (value !== undefined) prevalence.set(column, value)
  })
  return prevalence
}
