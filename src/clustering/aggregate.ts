/**
 * aggregate.ts — Rolls sparse lineage prevalence up through the tree.
 *
 * Two paths share one definition of a bucket:
 *   - `aggregate` recomputes a node's total from scratch for any exclusion set.
 *   - `computeSubtreeTotals` + `propagateDelta` keep a per-lindex array in
 *     step with a growing or shrinking exclusion set, touching only the
 *     ancestors between a node and the nearest selected ancestor.
 * Both agree within floating-point tolerance.
 */

import type { LineageNode, LineageTree, PrevalenceVector } from '../types.js'
import { parentOf, walkTree } from '../tree/traversal.js'

/** A node's own prevalence; absent or non-finite entries count as 0. */
export function ownPrevalence(prevalence: PrevalenceVector, name: string): number {
  const value = prevalence.get(name)
  return value !== undefined && Number.isFinite(value) ? value : 0
}

/**
 * Total prevalence of `node`'s subtree, skipping the entire subtree of any
 * descendant in `exclude`. Whether `node` itself is excluded does not matter.
 * Clipped below at 0.
 */
export function aggregate(
  node: LineageNode,
  prevalence: PrevalenceVector,
  exclude: ReadonlySet<string> = new Set(),
): number {
  let total = ownPrevalence(prevalence, node.name)
  const stack: LineageNode[] = [...node.children]
  while (stack.length > 0) {
    const current = stack.pop()
    if (current === undefined) break
    if (exclude.has(current.name)) continue
    total += ownPrevalence(prevalence, current.name)
    stack.push(...current.children)
  }
  return Math.max(0, total)
}

/**
 * Cold pass: `aggregate(v, prevalence)` for every node, indexed by lindex.
 * The returned array belongs to the caller.
 */
export function computeSubtreeTotals(tree: LineageTree, prevalence: PrevalenceVector): Float64Array {
  const totals = new Float64Array(tree.size)
  // Reversed pre-order visits every child before its parent.
  const order = walkTree(tree.root).reverse()
  for (const node of order) {
    let total = ownPrevalence(prevalence, node.name)
    for (const child of node.children) total += totals[child.lindex] ?? 0
    totals[node.lindex] = Math.max(0, total)
  }
  return totals
}

/**
 * Adds `delta` to every strict ancestor of `node` up to and including the
 * nearest ancestor in `selected` (the exclusion frontier). Ancestors above
 * that frontier already exclude the whole branch.
 */
export function propagateDelta(
  tree: LineageTree,
  aggregates: Float64Array,
  node: LineageNode,
  delta: number,
  selected: ReadonlySet<string>,
): void {
  let current = parentOf(tree, node)
  while (current !== null) {
    aggregates[current.lindex] = Math.max(0, (aggregates[current.lindex] ?? 0) + delta)
    if (selected.has(current.name)) return
    current = parentOf(tree, current)
  }
}
