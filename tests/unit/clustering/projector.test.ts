import { describe, it, expect } from 'vitest'
import { clusterLabel, projectClusters, rowToPrevalence } from '../../../src/clustering/projector.js'
import { clusterLineages } from '../../../src/clustering/splitter.js'
import { ShapeMismatchError } from '../../../src/errors.js'
import { buildTree } from '../../../src/tree/builder.js'
import type { Cell, ClusterPartition, SignalTable } from '../../../src/types.js'
import { SMALL_PREVALENCE, nodeOf, smallTree } from '../../fixtures/lineages.js'

const TABLE: SignalTable = {
  rowKeys: ['2024-01-07', '2024-01-14', '2024-01-21'],
  columns: ['A', 'B', 'C', 'D'],
  rows: [
    [0, 0.2, 0.3, 0.5],
    [0, 0.1, 0.1, 0.1],
    [null, null, null, null],
  ],
}

function closeRow(actual: readonly Cell[] | undefined, expected: readonly number[]): void {
  expect(actual).toHaveLength(expected.length)
  expected.forEach((value, j) => expect(actual?.[j]).toBeCloseTo(value, 9))
}

// ---------------------------------------------------------------------------
// clusterLabel
// ---------------------------------------------------------------------------

describe('clusterLabel', () => {
  it('prefixes exclusive clusters with "other"', () => {
    const tree = smallTree()
    expect(clusterLabel(nodeOf(tree, 'B'), true)).toBe('B*')
    expect(clusterLabel(nodeOf(tree, 'B'), false)).toBe('other B*')
    expect(clusterLabel(tree.root, false)).toBe('other **')
  })

  it('appends the full name when the alias differs', () => {
    const tree = buildTree([{ name: 'B.1.1.529', alias: 'BA' }])
    expect(clusterLabel(nodeOf(tree, 'B.1.1.529'), true)).toBe('BA* (B.1.1.529)')
  })
})

describe('rowToPrevalence', () => {
  it('leaves out missing cells', () => {
    expect(rowToPrevalence(['A', 'B', 'C'], [0.5, null, Number.NaN])).toEqual(new Map([['A', 0.5]]))
  })
})

// ---------------------------------------------------------------------------
// projectClusters
// ---------------------------------------------------------------------------

describe('projectClusters', () => {
  const tree = smallTree()
  const partition = clusterLineages(tree, SMALL_PREVALENCE, 3, 0.1)

  it('orders columns by alias and labels them', () => {
    const projected = projectClusters(TABLE, partition, tree)
    expect(projected.columns).toEqual(['other **', 'other A*', 'B*'])
    expect(projected.names).toEqual(['*', 'A', 'B'])
    expect(projected.inclusive).toEqual([false, false, true])
    expect(projected.rowKeys).toEqual(TABLE.rowKeys)
  })

  it('aggregates each row into buckets summing to 1', () => {
    const projected = projectClusters(TABLE, partition, tree)
    closeRow(projected.rows[0], [0, 0.3, 0.7])
  })

  it('marks rows below the coverage threshold as missing', () => {
    const projected = projectClusters(TABLE, partition, tree)
    expect(projected.rows[1]).toEqual([null, null, null])
    expect(projected.rows[2]).toEqual([null, null, null])
  })

  it('lets the catch-all absorb uncovered mass above a lower threshold', () => {
    const projected = projectClusters(TABLE, partition, tree, { coverageThreshold: 0.2 })
    closeRow(projected.rows[1], [0.7, 0.1, 0.2])
  })

  it('clips the catch-all when the buckets exceed 1', () => {
    const table: SignalTable = { rowKeys: ['d'], columns: ['B', 'C'], rows: [[0.9, 0.4]] }
    const projected = projectClusters(table, partition, tree)
    closeRow(projected.rows[0], [0, 0.4, 0.9])
  })

  it('joins an auxiliary series by row key', () => {
    const projected = projectClusters(TABLE, partition, tree, {
      auxiliary: { name: 'load', values: new Map([['2024-01-07', 2.5], ['2024-02-01', 9]]) },
    })
    expect(projected.auxiliary).toEqual({ name: 'load', values: [2.5, null, null] })
  })

  it('omits the auxiliary series when none is given', () => {
    expect(projectClusters(TABLE, partition, tree).auxiliary).toBeUndefined()
  })
})

describe('projectClusters — shape errors', () => {
  const tree = smallTree()
  const partition = clusterLineages(tree, SMALL_PREVALENCE, 3, 0.1)

  it('rejects an unknown lineage column', () => {
    const table: SignalTable = { rowKeys: ['d'], columns: ['Z'], rows: [[1]] }
    expect(() => projectClusters(table, partition, tree)).toThrow(ShapeMismatchError)
    expect(() => projectClusters(table, partition, tree)).toThrow('Signal column "Z" is not a known lineage')
  })

  it('rejects a repeated column', () => {
    const table: SignalTable = { rowKeys: ['d'], columns: ['B', 'B'], rows: [[0.5, 0.5]] }
    expect(() => projectClusters(table, partition, tree)).toThrow('repeats column "B"')
  })

  it('rejects a ragged row', () => {
    const table: SignalTable = { rowKeys: ['d'], columns: ['B', 'C'], rows: [[0.5]] }
    expect(() => projectClusters(table, partition, tree)).toThrow('Row d has 1 cells but the table has 2 columns')
  })

  it('rejects a partition without the root', () => {
    const table: SignalTable = { rowKeys: ['d'], columns: ['C', 'D'], rows: [[0.3, 0.4]] }
    const rootless: ClusterPartition = {
      inclusive: [nodeOf(tree, 'C'), nodeOf(tree, 'D')],
      exclusive: [nodeOf(tree, 'A')],
    }
    expect(() => projectClusters(table, rootless, tree)).toThrow(ShapeMismatchError)
    expect(() => projectClusters(table, rootless, tree)).toThrow('Partition does not select the root "*"')
  })

  it('rejects a cluster listed as both inclusive and exclusive', () => {
    const overlapping: ClusterPartition = {
      inclusive: [nodeOf(tree, 'B')],
      exclusive: [tree.root, nodeOf(tree, 'B')],
    }
    expect(() => projectClusters(TABLE, overlapping, tree)).toThrow('Cluster "B" is both inclusive and exclusive')
  })

  it('rejects a cluster from another tree', () => {
    const other = buildTree([{ name: 'Q' }])
    const foreign: ClusterPartition = { inclusive: [nodeOf(other, 'Q')], exclusive: [tree.root] }
    expect(() => projectClusters(TABLE, foreign, tree)).toThrow('Cluster "Q" is not a known lineage')
  })

  it('rejects misaligned row keys', () => {
    const table: SignalTable = { rowKeys: [], columns: ['B'], rows: [[1]] }
    expect(() => projectClusters(table, partition, tree)).toThrow(ShapeMismatchError)
  })
})
