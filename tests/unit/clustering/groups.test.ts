import { describe, it, expect } from 'vitest'
import { gatherGroups } from '../../../src/clustering/groups.js'
import { clusterLineages, selectedNames } from '../../../src/clustering/splitter.js'
import type { MetaGroup } from '../../../src/types.js'
import { SMALL_PREVALENCE, names, smallTree } from '../../fixtures/lineages.js'

const DEFAULT_SCORES = [0, 2, 3, 2, 1]

function summary(groups: readonly MetaGroup[]): [string, string[]][] {
  return groups.map((g): [string, string[]] => [g.anchor.name, names(g.members)])
}

describe('gatherGroups', () => {
  it('anchors on the best-scoring exclusive cluster', () => {
    const partition = clusterLineages(smallTree(), SMALL_PREVALENCE, 5, 0.1)
    // A nests 3 lineages (score 2 × 1); * would nest 4 (1 × 1); B nests 1 (2 × 0.7).
    expect(summary(gatherGroups(partition, SMALL_PREVALENCE, DEFAULT_SCORES))).toEqual([
      ['A', ['A', 'B', 'C', 'D']],
      ['*', ['*']],
    ])
  })

  it('favours small families when count scores say so', () => {
    const partition = clusterLineages(smallTree(), SMALL_PREVALENCE, 5, 0.1)
    expect(summary(gatherGroups(partition, SMALL_PREVALENCE, [0, 5, 0, 0, 0]))).toEqual([
      ['B', ['B', 'D']],
      ['A', ['A', 'C']],
      ['*', ['*']],
    ])
  })

  it('treats counts beyond the score table as worthless', () => {
    const partition = clusterLineages(smallTree(), SMALL_PREVALENCE, 3, 0.1)
    // * nests A and B (3 × 1) ahead of A nesting B (2 × 1).
    expect(summary(gatherGroups(partition, SMALL_PREVALENCE, DEFAULT_SCORES))).toEqual([
      ['*', ['*', 'A', 'B']],
    ])
    expect(summary(gatherGroups(partition, SMALL_PREVALENCE, [0, 2]))).toEqual([
      ['A', ['A', 'B']],
      ['*', ['*']],
    ])
  })

  it('makes singleton groups of ungrouped inclusive clusters', () => {
    const partition = clusterLineages(smallTree(), SMALL_PREVALENCE, 1, 0.1)
    expect(summary(gatherGroups(partition, SMALL_PREVALENCE, DEFAULT_SCORES))).toEqual([['*', ['*']]])
  })

  it('covers every selected lineage exactly once', () => {
    const partition = clusterLineages(smallTree(), SMALL_PREVALENCE, 4, 0.1)
    const groups = gatherGroups(partition, SMALL_PREVALENCE, DEFAULT_SCORES)
    const members = groups.flatMap((g) => names(g.members))
    expect(members).toHaveLength(4)
    expect(new Set(members)).toEqual(selectedNames(partition))
  })
})
