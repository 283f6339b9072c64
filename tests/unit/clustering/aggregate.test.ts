import { describe, it, expect } from 'vitest'
import { aggregate, computeSubtreeTotals, ownPrevalence, propagateDelta } from '../../../src/clustering/aggregate.js'
import { SMALL_PREVALENCE, nodeOf, smallTree } from '../../fixtures/lineages.js'

describe('ownPrevalence', () => {
  it('treats absent and non-finite entries as 0', () => {
    const p = new Map([['A', 0.4], ['B', Number.NaN]])
    expect(ownPrevalence(p, 'A')).toBe(0.4)
    expect(ownPrevalence(p, 'B')).toBe(0)
    expect(ownPrevalence(p, 'Z')).toBe(0)
  })
})

describe('aggregate', () => {
  it('sums the whole tree at the root', () => {
    const tree = smallTree()
    expect(aggregate(tree.root, SMALL_PREVALENCE)).toBeCloseTo(1, 12)
  })

  it('skips the subtree of an excluded descendant', () => {
    const tree = smallTree()
    expect(aggregate(nodeOf(tree, 'A'), SMALL_PREVALENCE, new Set(['B']))).toBeCloseTo(0.3, 12)
  })

  it('ignores whether the node itself is excluded', () => {
    const tree = smallTree()
    expect(aggregate(nodeOf(tree, 'B'), SMALL_PREVALENCE, new Set(['B']))).toBeCloseTo(0.7, 12)
  })

  it('ignores names outside the tree', () => {
    const tree = smallTree()
    const p = new Map([['C', 0.25], ['NOT.IN.TREE', 5]])
    expect(aggregate(tree.root, p)).toBe(0.25)
  })

  it('clips negative totals to 0', () => {
    const tree = smallTree()
    expect(aggregate(nodeOf(tree, 'C'), new Map([['C', -1]]))).toBe(0)
  })

  it('equals the full total minus maximal excluded subtrees', () => {
    const tree = smallTree()
    const root = tree.root
    const full = aggregate(root, SMALL_PREVALENCE)
    const excluded = aggregate(nodeOf(tree, 'B'), SMALL_PREVALENCE) + aggregate(nodeOf(tree, 'C'), SMALL_PREVALENCE)
    // D lies inside B, so only B and C are maximal.
    expect(aggregate(root, SMALL_PREVALENCE, new Set(['B', 'C', 'D']))).toBeCloseTo(full - excluded, 12)
  })
})

describe('computeSubtreeTotals', () => {
  it('matches aggregate for every node', () => {
    const tree = smallTree()
    const totals = computeSubtreeTotals(tree, SMALL_PREVALENCE)
    for (const node of tree.index.values()) {
      expect(totals[node.lindex]).toBeCloseTo(aggregate(node, SMALL_PREVALENCE), 12)
    }
  })
})

describe('propagateDelta', () => {
  it('updates ancestors up to the nearest selected one', () => {
    const tree = smallTree()
    const totals = computeSubtreeTotals(tree, SMALL_PREVALENCE)
    const b = nodeOf(tree, 'B')

    propagateDelta(tree, totals, b, -(totals[b.lindex] ?? 0), new Set(['*', 'A']))

    expect(totals[nodeOf(tree, 'A').lindex]).toBeCloseTo(0.3, 12)
    expect(totals[tree.root.lindex]).toBeCloseTo(1, 12)
  })

  it('agrees with a fresh aggregate after the exclusion set grows', () => {
    const tree = smallTree()
    const totals = computeSubtreeTotals(tree, SMALL_PREVALENCE)
    const selected = new Set(['*'])
    for (const name of ['A', 'B', 'D']) {
      const node = nodeOf(tree, name)
      propagateDelta(tree, totals, node, -(totals[node.lindex] ?? 0), selected)
      selected.add(name)
    }
    for (const node of tree.index.values()) {
      expect(totals[node.lindex]).toBeCloseTo(aggregate(node, SMALL_PREVALENCE, selected), 12)
    }
  })

  it('never drives a total below 0', () => {
    const tree = smallTree()
    const totals = computeSubtreeTotals(tree, SMALL_PREVALENCE)
    propagateDelta(tree, totals, nodeOf(tree, 'C'), -10, new Set(['*']))
    expect(totals[nodeOf(tree, 'A').lindex]).toBe(0)
  })
})
