/**
 * splitter.ts — Greedy selection of representative lineages.
 *
 * Algorithm:
 *   1. Start with the root as the only (inclusive) cluster.
 *   2. Pick the member whose best unselected child holds the most prevalence
 *      (plus a 10% bonus for the member's own bucket) and select that child.
 *   3. Subtract the child's bucket from its parent, which becomes exclusive.
 *   4. Merge back at most one small exclusive cluster per iteration when it
 *      falls below `alpha` × the mean inclusive bucket.
 *   5. Stop when `targetSize` lineages are selected.
 *
 * Each call owns its aggregate array, so one tree can be clustered against
 * many prevalence snapshots concurrently.
 */

import type { ClusterPartition, LineageNode, LineageTree, PrevalenceVector } from '../types.js'
import { UnreachableTargetSizeError } from '../errors.js'
import { descendantsOf } from '../tree/traversal.js'
import { computeSubtreeTotals, propagateDelta } from './aggregate.js'

/** Weight of a member's own bucket when choosing which member to split. */
const OWN_BUCKET_BONUS = 0.1

/** Default pruning budget, in multiples of the tree size. */
const MAX_ITERATIONS_PER_NODE = 8

export interface ClusterOptions {
  /**
   * Iterations after which merge-back is disabled, which guarantees the loop
   * terminates. null/undefined = 8 × tree size.
   */
  readonly maxIterations?: number | null
}

interface SplitChoice {
  readonly target: LineageNode
  readonly child: LineageNode
}

function nodesByLindex(tree: LineageTree, names: Iterable<string>): LineageNode[] {
  const nodes: LineageNode[] = []
  for (const name of names) {
    const node = tree.index.get(name)
    if (node) nodes.push(node)
  }
  return nodes.sort((a, b) => a.lindex - b.lindex)
}

/**
 * Selects `targetSize` lineages that partition total prevalence into
 * inclusive and exclusive buckets.
 *
 * @throws {UnreachableTargetSizeError} if targetSize is not an integer in `[1, tree.size]`.
 * @throws {RangeError} if alpha is outside `[0, 1)`.
 */
export function clusterLineages(
  tree: LineageTree,
  prevalence: PrevalenceVector,
  targetSize: number,
  alpha: number,
  options: ClusterOptions = {},
): ClusterPartition {
  if (!Number.isInteger(targetSize) || targetSize < 1 || targetSize > tree.size) {
    throw new UnreachableTargetSizeError(targetSize, tree.size)
  }
  if (!(alpha >= 0 && alpha < 1)) {
    throw new RangeError(`alpha must lie in [0, 1), got ${alpha}`)
  }

  const root = tree.root
  const aggregates = computeSubtreeTotals(tree, prevalence)
  const bucket = (node: LineageNode): number => aggregates[node.lindex] ?? 0

  // Insertion-ordered; iteration order decides ties.
  const selected = new Set<string>([root.name])
  const inclusive = new Set<string>([root.name])
  const exclusive = new Set<string>()
  const maxIterations = options.maxIterations ?? MAX_ITERATIONS_PER_NODE * tree.size

  function chooseSplit(): SplitChoice | null {
    let best: SplitChoice | null = null
    let bestScore = -Infinity
    for (const name of selected) {
      const member = tree.index.get(name)
      if (!member) continue
      let child: LineageNode | null = null
      for (const candidate of member.children) {
        if (selected.has(candidate.name)) continue
        if (child === null || bucket(candidate) > bucket(child)) child = candidate
      }
      if (child === null) continue
      const score = OWN_BUCKET_BONUS * bucket(member) + bucket(child)
      if (score > bestScore) {
        best = { target: member, child }
        bestScore = score
      }
    }
    return best
  }

  function pruneOnce(): void {
    if (inclusive.size < 2) return
    const candidates = [...exclusive].filter((name) => name !== root.name)
    if (candidates.length < 2) return

    let weakest: LineageNode | null = null
    for (const name of candidates) {
      const node = tree.index.get(name)
      if (!node) continue
      if (weakest === null || bucket(node) < bucket(weakest)) weakest = node
    }
    if (weakest === null) return

    let inclusiveTotal = 0
    for (const name of inclusive) {
      const node = tree.index.get(name)
      if (node) inclusiveTotal += bucket(node)
    }
    if (bucket(weakest) >= alpha * (inclusiveTotal / inclusive.size)) return

    exclusive.delete(weakest.name)
    selected.delete(weakest.name)
    propagateDelta(tree, aggregates, weakest, bucket(weakest), selected)
  }

  let iteration = 0
  while (selected.size < targetSize) {
    iteration++
    const choice = chooseSplit()
    if (choice === null) {
      // Every child of every member is selected, i.e. the whole tree.
      throw new UnreachableTargetSizeError(targetSize, selected.size)
    }
    const { target, child } = choice

    propagateDelta(tree, aggregates, child, -bucket(child), selected)
    selected.add(child.name)

    if (inclusive.delete(target.name)) exclusive.add(target.name)
    if (descendantsOf(child).some((d) => selected.has(d.name))) exclusive.add(child.name)
    else inclusive.add(child.name)

    if (iteration <= maxIterations) pruneOnce()
  }

  return {
    inclusive: nodesByLindex(tree, inclusive),
    exclusive: nodesByLindex(tree, exclusive),
  }
}

/** All selected nodes of a partition, as a name set. */
export function selectedNames(partition: ClusterPartition): Set<string> {
  return new Set([...partition.inclusive, ...partition.exclusive].map((n) => n.name))
}
