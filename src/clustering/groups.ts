/**
 * groups.ts — Nests selected lineages into legend groups.
 *
 * Exclusive clusters are natural group anchors: their selected descendants
 * render as shades of the same family. `countScores[k]` rewards an anchor
 * with k still-ungrouped selected descendants, so the legend favours small
 * families over one group swallowing everything.
 */

import type { ClusterPartition, LineageNode, MetaGroup, PrevalenceVector } from '../types.js'
import { descendantsOf } from '../tree/traversal.js'
import { aggregate } from './aggregate.js'
import { selectedNames } from './splitter.js'

function byAlias(a: LineageNode, b: LineageNode): number {
  return a.alias < b.alias ? -1 : a.alias > b.alias ? 1 : 0
}

/**
 * Greedily anchors groups on exclusive clusters, highest
 * `countScores[k] × subtree prevalence` first. Inclusive clusters left
 * ungrouped become singleton groups.
 *
 * @returns groups sorted by anchor alias, descending; members within a group
 *   sorted by alias, ascending.
 */
export function gatherGroups(
  partition: ClusterPartition,
  prevalence: PrevalenceVector,
  countScores: readonly number[],
): MetaGroup[] {
  const ungrouped = selectedNames(partition)
  const pending: LineageNode[] = [...partition.exclusive]
  const groups: MetaGroup[] = []

  while (pending.length > 0) {
    let bestIndex = 0
    let bestScore = -Infinity
    let bestNested: LineageNode[] = []
    for (let i = 0; i < pending.length; i++) {
      const candidate = pending[i]
      if (candidate === undefined) continue
      const nested = descendantsOf(candidate).filter((d) => ungrouped.has(d.name))
      const score = (countScores[nested.length] ?? 0) * aggregate(candidate, prevalence)
      if (score > bestScore) {
        bestIndex = i
        bestScore = score
        bestNested = nested
      }
    }

    const [anchor] = pending.splice(bestIndex, 1)
    if (anchor === undefined) break
    const members = [anchor, ...bestNested]
    for (const member of members) ungrouped.delete(member.name)
    for (let i = pending.length - 1; i >= 0; i--) {
      const node = pending[i]
      if (node !== undefined && !ungrouped.has(node.name)) pending.splice(i, 1)
    }
    groups.push({ anchor, members: members.sort(byAlias) })
  }

  for (const node of partition.inclusive) {
    if (ungrouped.has(node.name)) groups.push({ anchor: node, members: [node] })
  }

  return groups.sort((a, b) => byAlias(b.anchor, a.anchor))
}
