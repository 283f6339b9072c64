/**
 * projector.ts — Maps a lineage signal table onto a cluster partition.
 *
 * Each output column is one selected lineage's bucket. The root's bucket is
 * the "other" catch-all: it absorbs whatever the selected buckets do not
 * account for so that every valid row sums to 1.
 */

import type {
  AuxiliarySeries,
  Cell,
  ClusterPartition,
  LineageNode,
  LineageTree,
  PrevalenceVector,
  ProjectedTable,
  SignalTable,
} from '../types.js'
import { ShapeMismatchError } from '../errors.js'
import { aggregate } from './aggregate.js'
import { selectedNames } from './splitter.js'

/** Rows whose clustered mass falls below this are treated as unobserved. */
export const DEFAULT_COVERAGE_THRESHOLD = 0.5

export interface ProjectOptions {
  readonly coverageThreshold?: number
  /** Series carried through unaggregated (e.g. viral load), joined by row key. */
  readonly auxiliary?: AuxiliarySeries
}

/**
 * Legend label for a cluster column. Exclusive clusters read "other X*" since
 * they hold only what their selected descendants do not.
 */
export function clusterLabel(node: LineageNode, inclusive: boolean): string {
  const suffix = node.name !== node.alias ? ` (${node.name})` : ''
  return `${inclusive ? '' : 'other '}${node.alias}*${suffix}`
}

function compareAlias(a: LineageNode, b: LineageNode): number {
  return a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0
}

function validateTable(table: SignalTable, tree: LineageTree): void {
  if (table.rows.length !== table.rowKeys.length) {
    throw new ShapeMismatchError(
      `Signal table has ${table.rows.length} rows but ${table.rowKeys.length} row keys`
    )
  }
  const seen = new Set<string>()
  for (const column of table.columns) {
    if (seen.has(column)) throw new ShapeMismatchError(`Signal table repeats column "${column}"`)
    if (!tree.index.has(column)) throw new ShapeMismatchError(`Signal column "${column}" is not a known lineage`)
    seen.add(column)
  }
  table.rows.forEach((row, i) => {
    if (row.length !== table.columns.length) {
      throw new ShapeMismatchError(
        `Row ${table.rowKeys[i] ?? i} has ${row.length} cells but the table has ${table.columns.length} columns`
      )
    }
  })
}

function validatePartition(partition: ClusterPartition, tree: LineageTree): void {
  const inclusive = new Set(partition.inclusive.map((n) => n.name))
  for (const node of [...partition.inclusive, ...partition.exclusive]) {
    if (!tree.index.has(node.name)) throw new ShapeMismatchError(`Cluster "${node.name}" is not a known lineage`)
  }
  for (const node of partition.exclusive) {
    if (inclusive.has(node.name)) {
      throw new ShapeMismatchError(`Cluster "${node.name}" is both inclusive and exclusive`)
    }
  }
  if (!selectedNames(partition).has(tree.root.name)) {
    throw new ShapeMismatchError(
      `Partition does not select the root "${tree.root.name}", so nothing absorbs uncovered mass`
    )
  }
}

/** One table row as a prevalence vector; missing cells are left out. */
export function rowToPrevalence(columns: readonly string[], row: readonly Cell[]): PrevalenceVector {
  const prevalence = new Map<string, number>()
  columns.forEach((column, j) => {
    const value = row[j]
    if (value !== null && value !== undefined && Number.isFinite(value)) prevalence.set(column, value)
  })
  return prevalence
}

/**
 * Aggregates every row of `table` into the partition's buckets.
 *
 * Columns are ordered by ascending alias. A row whose buckets sum to less
 * than the coverage threshold becomes all-null; otherwise the root's column
 * absorbs `1 − sum` and is clipped to `[0, 1]`.
 *
 * @throws {ShapeMismatchError} if the table is ragged, repeats a column, or
 *   names a lineage missing from the tree; or if the partition leaves out the
 *   root or lists a cluster as both inclusive and exclusive.
 */
export function projectClusters(
  table: SignalTable,
  partition: ClusterPartition,
  tree: LineageTree,
  options: ProjectOptions = {},
): ProjectedTable {
  validateTable(table, tree)
  validatePartition(partition, tree)
  const threshold = options.coverageThreshold ?? DEFAULT_COVERAGE_THRESHOLD

  const members = [
    ...partition.inclusive.map((node) => ({ node, inclusive: true })),
    ...partition.exclusive.map((node) => ({ node, inclusive: false })),
  ].sort((a, b) => compareAlias(a.node, b.node))
  const exclude = selectedNames(partition)
  const catchAll = members.findIndex((m) => m.node.name === tree.root.name)

  const rows = table.rows.map((row): Cell[] => {
    const prevalence = rowToPrevalence(table.columns, row)
    const buckets = members.map((m) => aggregate(m.node, prevalence, exclude))
    const total = buckets.reduce((sum, v) => sum + v, 0)
    if (!(total >= threshold)) return buckets.map(() => null)
    buckets[catchAll] = Math.min(1, Math.max(0, (buckets[catchAll] ?? 0) + 1 - total))
    return buckets
  })

  const auxiliary = options.auxiliary
  return {
    rowKeys: [...table.rowKeys],
    columns: members.map((m) => clusterLabel(m.node, m.inclusive)),
    rows,
    names: members.map((m) => m.node.name),
    inclusive: members.map((m) => m.inclusive),
    ...(auxiliary !== undefined
      ? {
          auxiliary: {
            name: auxiliary.name,
            values: table.rowKeys.map((key) => auxiliary.values.get(key) ?? null),
          },
        }
      : {}),
  }
}
